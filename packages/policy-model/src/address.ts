/**
 * aclforge Policy Model: Address Arithmetic
 *
 * Parsing, formatting and set arithmetic over IPv4/IPv6 networks.
 *
 * Network numbers are held as bigint so that both families share one code
 * path. Every constructor clears host bits: `10.1.2.3/8` becomes `10.0.0.0/8`.
 */

import { InvalidAddressError } from './errors.js';
import type { Address, AddressFamily, AddressTokens, IPv4Address, IPv6Address } from './types.js';

// ---------------------------------------------------------------------------
// Masks and derived values
// ---------------------------------------------------------------------------

const FAMILY_BITS: Readonly<Record<AddressFamily, number>> = { 4: 32, 6: 128 };

function allOnes(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

function maskFor(bits: number, prefixLength: number): bigint {
  return allOnes(bits) ^ allOnes(bits - prefixLength);
}

export function netmask(address: Address): bigint {
  return maskFor(FAMILY_BITS[address.family], address.prefixLength);
}

/** Inverse of the netmask, the "wildcard" form Cisco ACLs expect. */
export function hostmask(address: Address): bigint {
  return allOnes(FAMILY_BITS[address.family] - address.prefixLength);
}

/** Number of addresses covered by the network, network and broadcast included. */
export function hostCount(address: Address): bigint {
  return 1n << BigInt(FAMILY_BITS[address.family] - address.prefixLength);
}

/** True for a /32 (IPv4) or /128 (IPv6). */
export function isHost(address: Address): boolean {
  return address.prefixLength === FAMILY_BITS[address.family];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function splitPrefix(input: string, bits: number): [string, number] {
  const trimmed = input.trim();
  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    return [trimmed, bits];
  }
  const lengthText = trimmed.slice(slash + 1);
  if (!/^\d{1,3}$/.test(lengthText) || Number(lengthText) > bits) {
    throw new InvalidAddressError(input, `prefix length must be between 0 and ${bits}`);
  }
  return [trimmed.slice(0, slash), Number(lengthText)];
}

function parseIPv4Number(ip: string, input: string): bigint {
  const octets = ip.split('.');
  if (octets.length !== 4) {
    throw new InvalidAddressError(input, 'expected four dotted octets');
  }
  let value = 0n;
  for (const octet of octets) {
    if (!/^\d{1,3}$/.test(octet) || Number(octet) > 255) {
      throw new InvalidAddressError(input, `bad octet ${JSON.stringify(octet)}`);
    }
    value = (value << 8n) | BigInt(octet);
  }
  return value;
}

function parseGroups(section: string, input: string, allowDottedTail: boolean): number[] {
  if (section === '') {
    return [];
  }
  const parts = section.split(':');
  const groups: number[] = [];
  parts.forEach((part, index) => {
    if (allowDottedTail && index === parts.length - 1 && part.includes('.')) {
      const embedded = parseIPv4Number(part, input);
      groups.push(Number(embedded >> 16n), Number(embedded & 0xffffn));
      return;
    }
    if (!/^[0-9a-fA-F]{1,4}$/.test(part)) {
      throw new InvalidAddressError(input, `bad group ${JSON.stringify(part)}`);
    }
    groups.push(parseInt(part, 16));
  });
  return groups;
}

function parseIPv6Number(ip: string, input: string): bigint {
  const halves = ip.split('::');
  if (halves.length > 2) {
    throw new InvalidAddressError(input, "'::' may appear only once");
  }
  const compressed = halves.length === 2;
  const head = parseGroups(halves[0] ?? '', input, !compressed);
  const tail = compressed ? parseGroups(halves[1] ?? '', input, true) : [];

  if (compressed ? head.length + tail.length > 7 : head.length !== 8) {
    throw new InvalidAddressError(input, 'expected eight 16-bit groups');
  }

  const zeros = new Array<number>(8 - head.length - tail.length).fill(0);
  return [...head, ...zeros, ...tail].reduce((acc, group) => (acc << 16n) | BigInt(group), 0n);
}

/**
 * Parse `a.b.c.d[/len]`. A missing prefix length means a single host.
 *
 * @throws {InvalidAddressError} on malformed input
 */
export function ipv4(input: string, tokens: AddressTokens = {}): IPv4Address {
  const [ip, prefixLength] = splitPrefix(input, 32);
  return {
    family: 4,
    network: parseIPv4Number(ip, input) & maskFor(32, prefixLength),
    prefixLength,
    token: tokens.token,
    parentToken: tokens.parentToken,
  };
}

/**
 * Parse IPv6 text with optional `::` compression, an optional dotted IPv4
 * tail (`::ffff:192.0.2.1`) and an optional `/len`.
 *
 * @throws {InvalidAddressError} on malformed input
 */
export function ipv6(input: string, tokens: AddressTokens = {}): IPv6Address {
  const [ip, prefixLength] = splitPrefix(input, 128);
  return {
    family: 6,
    network: parseIPv6Number(ip, input) & maskFor(128, prefixLength),
    prefixLength,
    token: tokens.token,
    parentToken: tokens.parentToken,
  };
}

/** Parse an address of either family; text containing `:` is IPv6. */
export function parseAddress(input: string, tokens: AddressTokens = {}): Address {
  return input.includes(':') ? ipv6(input, tokens) : ipv4(input, tokens);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatIPv4(value: bigint): string {
  return [24n, 16n, 8n, 0n].map((shift) => ((value >> shift) & 0xffn).toString()).join('.');
}

/** RFC 5952 text: lowercase, leading zeros dropped, longest zero run compressed. */
function formatIPv6(value: bigint): string {
  const groups = Array.from({ length: 8 }, (_, i) => Number((value >> BigInt(112 - i * 16)) & 0xffffn));

  let runStart = -1;
  let runLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i += 1;
      continue;
    }
    let end = i;
    while (end < groups.length && groups[end] === 0) {
      end += 1;
    }
    if (end - i > runLength) {
      runStart = i;
      runLength = end - i;
    }
    i = end;
  }

  const hex = groups.map((group) => group.toString(16));
  if (runLength < 2) {
    return hex.join(':');
  }
  return `${hex.slice(0, runStart).join(':')}::${hex.slice(runStart + runLength).join(':')}`;
}

/** Format a raw address number of the given family. */
export function formatIp(family: AddressFamily, value: bigint): string {
  switch (family) {
    case 4:
      return formatIPv4(value);
    case 6:
      return formatIPv6(value);
  }
}

/** The network address, e.g. `10.0.0.0`. */
export function ipText(address: Address): string {
  return formatIp(address.family, address.network);
}

export function netmaskText(address: Address): string {
  return formatIp(address.family, netmask(address));
}

export function hostmaskText(address: Address): string {
  return formatIp(address.family, hostmask(address));
}

/** CIDR text, e.g. `10.0.0.0/8` or `2001:db8::/32`. */
export function addressText(address: Address): string {
  return `${ipText(address)}/${address.prefixLength}`;
}

// ---------------------------------------------------------------------------
// Set arithmetic
// ---------------------------------------------------------------------------

/** True when `inner` lies entirely inside `outer` (same family only). */
export function contains(outer: Address, inner: Address): boolean {
  return (
    outer.family === inner.family &&
    outer.prefixLength <= inner.prefixLength &&
    (inner.network & netmask(outer)) === outer.network
  );
}

export function overlaps(a: Address, b: Address): boolean {
  return contains(a, b) || contains(b, a);
}

function halves(address: Address): [Address, Address] {
  const prefixLength = address.prefixLength + 1;
  const upperBit = 1n << BigInt(FAMILY_BITS[address.family] - prefixLength);
  return [
    { ...address, prefixLength },
    { ...address, network: address.network | upperBit, prefixLength },
  ];
}

function subtract(address: Address, excluded: Address): Address[] {
  if (!overlaps(address, excluded)) {
    return [address];
  }
  if (contains(excluded, address)) {
    return [];
  }
  const [lower, upper] = halves(address);
  return [...subtract(lower, excluded), ...subtract(upper, excluded)];
}

/**
 * Remove `excluded` from `addresses`.
 *
 * The remainder of each address is fragmented into the minimal set of
 * covering prefixes, in ascending order, and keeps the tokens of the address
 * it came from. Exclusions of the other family have no effect.
 */
export function excludeAddresses(
  addresses: ReadonlyArray<Address>,
  excluded: ReadonlyArray<Address>,
): Address[] {
  const remaining: Address[] = [];
  for (const address of addresses) {
    let fragments: Address[] = [address];
    for (const exclusion of excluded) {
      if (exclusion.family === address.family) {
        fragments = fragments.flatMap((fragment) => subtract(fragment, exclusion));
      }
    }
    remaining.push(...fragments);
  }
  return remaining;
}
