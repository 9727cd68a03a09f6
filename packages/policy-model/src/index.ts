/**
 * @aclforge/policy-model
 *
 * The vendor-neutral filter model and the address arithmetic every platform
 * renderer builds on:
 * - Filter, Term, header and address/port types
 * - Address parsing, formatting and exclusion
 * - Validation result types and the error base class
 *
 * This package has no internal aclforge dependencies.
 */

// Types
export type {
  Address,
  AddressFamily,
  AddressField,
  AddressTokens,
  Filter,
  FilterHeader,
  FilterTarget,
  IPv4Address,
  IPv6Address,
  Policy,
  PortRange,
  Term,
  TermAction,
  ValidationError,
  ValidationResult,
  VerbatimEntry,
} from './types.js';
export { TERM_ACTIONS } from './types.js';

// Errors
export { AclForgeError, InvalidAddressError } from './errors.js';

// Addresses
export {
  addressText,
  contains,
  excludeAddresses,
  formatIp,
  hostCount,
  hostmask,
  hostmaskText,
  ipText,
  ipv4,
  ipv6,
  isHost,
  netmask,
  netmaskText,
  overlaps,
  parseAddress,
} from './address.js';

// Terms and headers
export type { TermInit } from './policy.js';
export { createTerm, filterName, filterOptions, headerPlatforms, targetsPlatform } from './policy.js';
