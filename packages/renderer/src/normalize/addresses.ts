/**
 * aclforge Renderer: Effective Addresses and Ports
 *
 * Turns a term's address and port fields into the lists the term renderers
 * expand: family-filtered, exclusions applied, and unset fields replaced by
 * match-anything sentinels.
 */

import { excludeAddresses } from '@aclforge/policy-model';
import type { Address, AddressFamily, AddressField, PortRange, Term } from '@aclforge/policy-model';

/** Matches every address of either family. Rendered as `any`. */
export interface AnyAddress {
  readonly family: 'any';
}

export const ANY_ADDRESS: AnyAddress = { family: 'any' };

/** An address to render, or the `any` sentinel. */
export type AddressMatch = Address | AnyAddress;

/**
 * A port range to render, or `null` for "no port restriction". `null` is
 * never the same as a match on port 0.
 */
export type PortMatch = PortRange | null;

export function fieldAddresses(term: Term, field: AddressField): ReadonlyArray<Address> {
  return field === 'source' ? term.sourceAddress : term.destinationAddress;
}

export function fieldExclusions(term: Term, field: AddressField): ReadonlyArray<Address> {
  return field === 'source' ? term.sourceAddressExclude : term.destinationAddressExclude;
}

/**
 * The addresses of `field` to render in a pass of `family`.
 *
 * An unset field yields `[ANY_ADDRESS]`. A set field yields its addresses of
 * `family` minus the exclusions of `family`, which may be empty: the term
 * then renders no statements in this pass.
 */
export function effectiveAddresses(term: Term, field: AddressField, family: AddressFamily): AddressMatch[] {
  const addresses = fieldAddresses(term, field);
  if (addresses.length === 0) {
    return [ANY_ADDRESS];
  }
  const positive = addresses.filter((address) => address.family === family);
  const negative = fieldExclusions(term, field).filter((address) => address.family === family);
  return negative.length > 0 ? excludeAddresses(positive, negative) : positive;
}

/** The port ranges of `field`, or `[null]` when unset. */
export function effectivePorts(term: Term, field: AddressField): PortMatch[] {
  const ports = field === 'source' ? term.sourcePort : term.destinationPort;
  return ports.length > 0 ? [...ports] : [null];
}
