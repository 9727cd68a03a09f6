/**
 * aclforge Renderer: Cisco Policy Renderer
 *
 * Assembles a complete Cisco IOS access-list document from a policy.
 *
 * Each targeted filter becomes one access-list block (two for `mixed`):
 *
 *   1. the filter name is checked against the numbering rule of its form
 *   2. the removal and declaration statements are emitted, then the header
 *      comments as remarks
 *   3. every term is rendered by the renderer of the form
 *   4. the block ends with a blank line
 *
 * Object-group definitions collected on the way are placed ahead of all
 * blocks, after the two document header lines.
 *
 * Rendering is pure: the same policy and options always produce the same
 * document, and any error aborts the render without partial output.
 */

import { filterOptions, targetsPlatform } from '@aclforge/policy-model';
import type { AddressFamily, Filter, Policy, Term } from '@aclforge/policy-model';
import { resolveRenderOptions } from '../config/options.js';
import type { RenderOptions } from '../config/options.js';
import { InvalidFilterNameError, NoPlatformPolicyError, UnsupportedFilterTypeError } from '../errors.js';
import { DiagnosticLogger } from '../logging/diagnostic-log.js';
import type { DiagnosticSink } from '../logging/diagnostic-sink.js';
import { applyEstablishedHighPorts } from '../normalize/established.js';
import { ExtendedTerm } from '../render/extended-term.js';
import { remarks } from '../render/format.js';
import type { TermRenderContext } from '../render/format.js';
import { ObjectGroupCollector, ObjectGroupTerm } from '../render/object-group.js';
import { StandardTerm } from '../render/standard-term.js';

// ---------------------------------------------------------------------------
// Filter types
// ---------------------------------------------------------------------------

/** Access-list forms a filter header may request. `mixed` renders two. */
export const FILTER_TYPES = ['extended', 'standard', 'object-group', 'inet6', 'mixed'] as const;

export type FilterType = (typeof FILTER_TYPES)[number];

/** A single access-list block form. */
export type AccessListForm = Exclude<FilterType, 'mixed'>;

export const DEFAULT_FILTER_TYPE: FilterType = 'extended';

/** Fixed version-control keyword lines at the top of every document. */
export const DOCUMENT_HEADER: ReadonlyArray<string> = ['! $Id:$', '! $Date:$'];

export function isFilterType(value: string): value is FilterType {
  return (FILTER_TYPES as ReadonlyArray<string>).includes(value);
}

/** The blocks a filter type expands to, in output order. */
export function accessListForms(filterType: FilterType): AccessListForm[] {
  return filterType === 'mixed' ? ['extended', 'inet6'] : [filterType];
}

// ---------------------------------------------------------------------------
// Names and preambles
// ---------------------------------------------------------------------------

/** Numbers 1-99 identify standard access lists on IOS. */
function isStandardNumber(name: string): boolean {
  if (!/^\d+$/.test(name)) {
    return false;
  }
  const number = Number(name);
  return number >= 1 && number <= 99;
}

/**
 * @throws {InvalidFilterNameError} when the name breaks the form's numbering rule
 */
export function validateFilterName(form: AccessListForm, name: string): void {
  switch (form) {
    case 'extended':
    case 'object-group':
      if (isStandardNumber(name)) {
        throw new InvalidFilterNameError(name, 'access lists numbered 1-99 are reserved for standard ACLs');
      }
      return;
    case 'standard':
      if (!isStandardNumber(name)) {
        throw new InvalidFilterNameError(name, 'standard access lists must be numbered between 1 and 99');
      }
      return;
    case 'inet6':
      return;
  }
}

/** Statements that drop and redeclare the access list. */
export function preamble(form: AccessListForm, name: string): string[] {
  switch (form) {
    case 'extended':
    case 'object-group':
      return [`no ip access-list extended ${name}`, `ip access-list extended ${name}`];
    case 'standard':
      return [`no ip access-list ${name}`];
    case 'inet6':
      return [`no ipv6 access-list ${name}`, `ipv6 access-list ${name}`];
  }
}

// ---------------------------------------------------------------------------
// CiscoRenderer
// ---------------------------------------------------------------------------

export class CiscoRenderer {
  readonly options: RenderOptions;
  private readonly policy: Policy;

  /**
   * @param policy - Resolved policy; it is not modified
   * @param options - Overrides for DEFAULT_RENDER_OPTIONS
   * @param logger - Receives diagnostics for every element left out
   *
   * @throws {NoPlatformPolicyError} when no filter header targets the platform
   * @throws {InvalidRenderOptionsError} on out-of-range options
   */
  constructor(
    policy: Policy,
    options: Partial<RenderOptions> = {},
    private readonly logger: DiagnosticLogger = new DiagnosticLogger(),
  ) {
    this.options = resolveRenderOptions(options);
    const { platform } = this.options;
    if (!policy.filters.some((filter) => targetsPlatform(filter.header, platform))) {
      throw new NoPlatformPolicyError(platform);
    }
    this.policy = applyEstablishedHighPorts(policy);
  }

  /** The policy after preprocessing, as the term renderers see it. */
  get normalizedPolicy(): Policy {
    return this.policy;
  }

  /**
   * Render the document.
   *
   * @throws {UnsupportedFilterTypeError} for an unknown filter type option
   * @throws {InvalidFilterNameError} for a missing or misnumbered filter name
   * @throws {StandardAclTermError} for a standard term using extended fields
   * @throws {UnknownProtocolError} for unknown protocols under strictProtocols
   */
  render(): string {
    const collector = new ObjectGroupCollector(this.logger);
    const blocks: string[] = [];

    for (const filter of this.policy.filters) {
      if (!targetsPlatform(filter.header, this.options.platform)) {
        this.logger.debug('filter-not-targeted', `Filter does not target ${this.options.platform}; skipped`, {
          filter: filter.header.targets[0]?.options[0],
        });
        continue;
      }
      blocks.push(...this.renderFilter(filter, collector));
      if (this.options.filterScope === 'first') {
        break;
      }
    }

    const groups = collector.valid ? collector.render() : [];
    return [...DOCUMENT_HEADER, ...groups, ...blocks].join('\n') + '\n';
  }

  private renderFilter(filter: Filter, collector: ObjectGroupCollector): string[] {
    const [name, filterType = DEFAULT_FILTER_TYPE] = filterOptions(filter.header, this.options.platform);
    if (name === undefined || name === '') {
      throw new InvalidFilterNameError('', 'the filter header names no access list');
    }
    if (!isFilterType(filterType)) {
      throw new UnsupportedFilterTypeError(filterType, FILTER_TYPES);
    }
    return accessListForms(filterType).flatMap((form) => this.renderBlock(form, name, filter, collector));
  }

  private renderBlock(
    form: AccessListForm,
    name: string,
    filter: Filter,
    collector: ObjectGroupCollector,
  ): string[] {
    validateFilterName(form, name);

    const lines = preamble(form, name);
    if (form === 'object-group') {
      collector.addName(name);
    }
    lines.push(...remarks(filter.header.comment, this.options.remarkWidth));

    const context: TermRenderContext = { filterName: name, options: this.options, logger: this.logger };
    for (const term of filter.terms) {
      lines.push(...this.renderTerm(form, term, context, collector));
    }

    lines.push('');
    return lines;
  }

  private renderTerm(
    form: AccessListForm,
    term: Term,
    context: TermRenderContext,
    collector: ObjectGroupCollector,
  ): string[] {
    switch (form) {
      case 'standard':
        return new StandardTerm(term, context).render();
      case 'extended':
        return this.renderFamilyTerm(term, 4, context);
      case 'inet6':
        return this.renderFamilyTerm(term, 6, context);
      case 'object-group':
        collector.addTerm(term, context.filterName);
        return ['', ...new ObjectGroupTerm(term, context).render()];
    }
  }

  private renderFamilyTerm(term: Term, family: AddressFamily, context: TermRenderContext): string[] {
    if (term.addressFamily !== undefined && term.addressFamily !== family) {
      this.logger.debug(
        'address-family-mismatch',
        `Term is restricted to IPv${term.addressFamily}; skipped in the IPv${family} access list`,
        { filter: context.filterName, term: term.name },
      );
      return [];
    }
    return ['', ...new ExtendedTerm(term, family, context).render()];
  }
}

/**
 * Render a policy in one call.
 *
 * @param sink - Optional receiver for render diagnostics
 */
export function renderPolicy(
  policy: Policy,
  options: Partial<RenderOptions> = {},
  sink?: DiagnosticSink,
): string {
  return new CiscoRenderer(policy, options, new DiagnosticLogger(sink)).render();
}
