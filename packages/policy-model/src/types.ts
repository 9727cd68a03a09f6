/**
 * aclforge Policy Model: Core Type Definitions
 *
 * The vendor-neutral filter model consumed by every platform renderer:
 * addresses, port ranges, terms, filter headers, and the validation result
 * types shared with the policy loader.
 *
 * These types are the base layer of the aclforge packages. The renderer
 * depends on this package; this package has no internal dependencies.
 * Everything here is produced upstream (by the policy parser and the naming
 * database) and is read-only to the renderers.
 */

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

/** IP address family. */
export type AddressFamily = 4 | 6;

/**
 * Identity tokens carried by an address.
 *
 * `token` is the symbolic name the address was resolved from.
 * `parentToken` names the term-level group the address belongs to, so that
 * sibling addresses can be collapsed into one named object group.
 */
export interface AddressTokens {
  readonly token?: string | undefined;
  readonly parentToken?: string | undefined;
}

/**
 * An IPv4 network. `network` is the 32-bit network number with host bits
 * cleared; a host is a /32.
 */
export interface IPv4Address extends AddressTokens {
  readonly family: 4;
  readonly network: bigint;
  readonly prefixLength: number;
}

/**
 * An IPv6 network. `network` is the 128-bit network number with host bits
 * cleared; a host is a /128.
 */
export interface IPv6Address extends AddressTokens {
  readonly family: 6;
  readonly network: bigint;
  readonly prefixLength: number;
}

/** An address of either family, discriminated by `family`. */
export type Address = IPv4Address | IPv6Address;

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

/** Closed port interval. A single port is `{ low: p, high: p }`. */
export interface PortRange {
  readonly low: number;
  readonly high: number;
}

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

/** Every action a term may carry. */
export const TERM_ACTIONS = ['accept', 'deny', 'reject', 'next', 'reject-with-tcp-rst'] as const;

export type TermAction = (typeof TERM_ACTIONS)[number];

/** Raw configuration text that replaces a term's rendering on one platform. */
export interface VerbatimEntry {
  readonly platform: string;
  readonly text: string;
}

/** Address fields of a term that may be rendered or excluded. */
export type AddressField = 'source' | 'destination';

/**
 * A single match/action rule.
 *
 * Empty lists mean "not set". Protocols are names (`tcp`) or numbers (`6`).
 * `address` holds addresses attached directly to the term, which only the
 * standard ACL form uses.
 */
export interface Term {
  readonly name: string;
  readonly comment: ReadonlyArray<string>;
  readonly action: TermAction;
  readonly protocol: ReadonlyArray<string | number>;
  readonly address: ReadonlyArray<Address>;
  readonly sourceAddress: ReadonlyArray<Address>;
  readonly sourceAddressExclude: ReadonlyArray<Address>;
  readonly destinationAddress: ReadonlyArray<Address>;
  readonly destinationAddressExclude: ReadonlyArray<Address>;
  readonly sourcePort: ReadonlyArray<PortRange>;
  readonly destinationPort: ReadonlyArray<PortRange>;
  readonly option: ReadonlyArray<string>;
  readonly logging: boolean;
  readonly counter?: string | undefined;
  readonly verbatim: ReadonlyArray<VerbatimEntry>;
  /** Restricts the term to one family when a filter renders both. */
  readonly addressFamily?: AddressFamily | undefined;
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

/**
 * One `target::` line of a filter header: the platform name followed by its
 * options. For every platform the first option is the filter name.
 */
export interface FilterTarget {
  readonly platform: string;
  readonly options: ReadonlyArray<string>;
}

export interface FilterHeader {
  readonly targets: ReadonlyArray<FilterTarget>;
  readonly comment: ReadonlyArray<string>;
}

/** A named ruleset: a header plus its ordered terms. */
export interface Filter {
  readonly header: FilterHeader;
  readonly terms: ReadonlyArray<Term>;
}

/** An ordered sequence of filters, as produced by the policy parser. */
export interface Policy {
  readonly filters: ReadonlyArray<Filter>;
}

// ---------------------------------------------------------------------------
// Validation Result Types
// ---------------------------------------------------------------------------

/**
 * A validation error produced by a structural validator.
 * `context` locates the offending value (for example a JSON path).
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
