/**
 * @aclforge/renderer
 *
 * Translates a vendor-neutral policy into Cisco IOS access-list text:
 * extended, standard, object-group and IPv6 access lists.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. Diagnostics leave the
 * package only through an injected DiagnosticSink.
 */

// Entry point
export {
  CiscoRenderer,
  DEFAULT_FILTER_TYPE,
  DOCUMENT_HEADER,
  FILTER_TYPES,
  accessListForms,
  isFilterType,
  preamble,
  renderPolicy,
  validateFilterName,
} from './assembler/cisco-renderer.js';
export type { AccessListForm, FilterType } from './assembler/cisco-renderer.js';

// Options
export { DEFAULT_RENDER_OPTIONS, FILTER_SCOPES, resolveRenderOptions } from './config/options.js';
export type { FilterScope, RenderOptions } from './config/options.js';

// Errors
export {
  InvalidFilterNameError,
  InvalidRenderOptionsError,
  NoPlatformPolicyError,
  StandardAclTermError,
  UnknownProtocolError,
  UnsupportedAccessListError,
  UnsupportedFilterTypeError,
} from './errors.js';

// Diagnostics
export { DiagnosticLogger } from './logging/diagnostic-log.js';
export type { DiagnosticScope } from './logging/diagnostic-log.js';
export { MemoryDiagnosticSink } from './logging/diagnostic-sink.js';
export type { Diagnostic, DiagnosticCode, DiagnosticLevel, DiagnosticSink } from './logging/diagnostic-sink.js';

// Normalisation
export { ANY_ADDRESS, effectiveAddresses, effectivePorts } from './normalize/addresses.js';
export type { AddressMatch, AnyAddress, PortMatch } from './normalize/addresses.js';
export { HIGH_PORTS, applyEstablishedHighPorts, hasEstablishedOption } from './normalize/established.js';
export { TCP_PROTOCOL, includesTcp, resolveProtocol, resolveProtocols } from './normalize/protocol.js';
export type { ResolvedProtocol, ResolveProtocolOptions } from './normalize/protocol.js';

// Term renderers
export { ExtendedTerm, optionKeywords } from './render/extended-term.js';
export { StandardTerm, validateStandardTerm } from './render/standard-term.js';
export { ANY_GROUP, ObjectGroupCollector, ObjectGroupTerm, groupName, portGroupName } from './render/object-group.js';
export { ACTION_TABLE, renderAddress, renderPort } from './render/format.js';
export type { TermRenderContext } from './render/format.js';
