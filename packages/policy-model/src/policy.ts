/**
 * aclforge Policy Model: Term and Header Helpers
 */

import type { FilterHeader, Term, TermAction } from './types.js';

/** Fields a caller must provide; everything else defaults to "not set". */
export type TermInit = { readonly name: string; readonly action: TermAction } & Partial<
  Omit<Term, 'name' | 'action'>
>;

/**
 * Build a Term, filling unset list fields with empty lists and `logging`
 * with false.
 */
export function createTerm(init: TermInit): Term {
  return {
    name: init.name,
    action: init.action,
    comment: init.comment ?? [],
    protocol: init.protocol ?? [],
    address: init.address ?? [],
    sourceAddress: init.sourceAddress ?? [],
    sourceAddressExclude: init.sourceAddressExclude ?? [],
    destinationAddress: init.destinationAddress ?? [],
    destinationAddressExclude: init.destinationAddressExclude ?? [],
    sourcePort: init.sourcePort ?? [],
    destinationPort: init.destinationPort ?? [],
    option: init.option ?? [],
    logging: init.logging ?? false,
    counter: init.counter,
    verbatim: init.verbatim ?? [],
    addressFamily: init.addressFamily,
  };
}

/** Platforms named by the header's targets, in declaration order. */
export function headerPlatforms(header: FilterHeader): string[] {
  return header.targets.map((target) => target.platform);
}

export function targetsPlatform(header: FilterHeader, platform: string): boolean {
  return header.targets.some((target) => target.platform === platform);
}

/** Options of the first target naming `platform`, or an empty list. */
export function filterOptions(header: FilterHeader, platform: string): ReadonlyArray<string> {
  return header.targets.find((target) => target.platform === platform)?.options ?? [];
}

/** The filter name for `platform`: its first option. */
export function filterName(header: FilterHeader, platform: string): string | undefined {
  return filterOptions(header, platform)[0];
}
