/**
 * aclforge Renderer: Protocol Resolution
 *
 * Cisco ACLs accept protocol numbers everywhere but only some protocol
 * names, so named protocols are rendered by number. The table mirrors the
 * IANA assignments shipped in /etc/protocols.
 */

import protocolTable from './protocols.json' with { type: 'json' };
import { UnknownProtocolError } from '../errors.js';

const PROTOCOL_NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(protocolTable));

/** A protocol number, or a name the table could not resolve (including `ip`). */
export type ResolvedProtocol = number | string;

export const TCP_PROTOCOL = 6;

export interface ResolveProtocolOptions {
  /** Raise UnknownProtocolError instead of passing unknown names through. */
  readonly strict?: boolean | undefined;
}

/**
 * Map a protocol name to its number.
 *
 * Numbers, numeric strings and the literal `ip` are returned unchanged.
 * Lookup is case-insensitive; an unknown name is returned verbatim unless
 * `strict` is set.
 *
 * @throws {UnknownProtocolError} in strict mode, for a name missing from the table
 */
export function resolveProtocol(
  protocol: string | number,
  options: ResolveProtocolOptions = {},
): ResolvedProtocol {
  if (typeof protocol === 'number' || protocol === 'ip' || /^\d+$/.test(protocol)) {
    return protocol;
  }
  const number = PROTOCOL_NUMBERS.get(protocol.toLowerCase());
  if (number !== undefined) {
    return number;
  }
  if (options.strict === true) {
    throw new UnknownProtocolError(protocol);
  }
  return protocol;
}

/** Resolve a term's protocol list; an empty list means `ip` (any protocol). */
export function resolveProtocols(
  protocols: ReadonlyArray<string | number>,
  options: ResolveProtocolOptions = {},
): ResolvedProtocol[] {
  if (protocols.length === 0) {
    return ['ip'];
  }
  return protocols.map((protocol) => resolveProtocol(protocol, options));
}

export function includesTcp(protocols: ReadonlyArray<ResolvedProtocol>): boolean {
  return protocols.some((protocol) => String(protocol) === String(TCP_PROTOCOL));
}
