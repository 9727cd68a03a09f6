/**
 * aclforge Policy Model: Address Tests
 *
 * address/parse-v4: IPv4 text parses with host bits cleared
 * address/parse-v6: IPv6 text parses with and without compression
 * address/format-v6: IPv6 output follows the compressed canonical form
 * address/masks: netmask, hostmask and host count derive from the prefix
 * address/invalid: malformed input raises InvalidAddressError
 * address/containment: contains/overlaps respect family and prefix
 *
 * Tests are pure: no I/O, no state.
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidAddressError,
  addressText,
  contains,
  hostCount,
  hostmaskText,
  ipText,
  ipv4,
  ipv6,
  isHost,
  netmaskText,
  overlaps,
  parseAddress,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// address/parse-v4
// ---------------------------------------------------------------------------

describe('address/parse-v4: IPv4 parsing', () => {
  it('keeps the prefix length and network number', () => {
    const address = ipv4('192.168.1.0/24');
    expect(address.family).toBe(4);
    expect(address.prefixLength).toBe(24);
    expect(address.network).toBe(0xc0a80100n);
  });

  it('clears host bits', () => {
    expect(addressText(ipv4('10.1.2.3/8'))).toBe('10.0.0.0/8');
  });

  it('treats a missing prefix as a single host', () => {
    const address = ipv4('10.0.0.1');
    expect(address.prefixLength).toBe(32);
    expect(isHost(address)).toBe(true);
  });

  it('carries identity tokens', () => {
    const address = ipv4('10.0.0.0/8', { token: 'RFC1918', parentToken: 'internal' });
    expect(address.token).toBe('RFC1918');
    expect(address.parentToken).toBe('internal');
  });

  it('parseAddress picks the family from the text', () => {
    expect(parseAddress('172.16.0.0/12').family).toBe(4);
    expect(parseAddress('2001:db8::/32').family).toBe(6);
  });
});

// ---------------------------------------------------------------------------
// address/parse-v6 and address/format-v6
// ---------------------------------------------------------------------------

describe('address/parse-v6: IPv6 parsing', () => {
  it('expands a fully written address', () => {
    expect(ipText(ipv6('2001:0db8:0000:0000:0000:0000:0000:0001'))).toBe('2001:db8::1');
  });

  it('accepts the unspecified and loopback forms', () => {
    expect(ipText(ipv6('::'))).toBe('::');
    expect(ipText(ipv6('::1'))).toBe('::1');
    expect(ipv6('::1').prefixLength).toBe(128);
  });

  it('accepts a dotted IPv4 tail', () => {
    expect(ipText(ipv6('::ffff:192.0.2.1'))).toBe('::ffff:c000:201');
  });

  it('clears host bits', () => {
    expect(addressText(ipv6('2001:db8:1:2::5/48'))).toBe('2001:db8:1::/48');
  });
});

describe('address/format-v6: canonical text', () => {
  it('compresses the longest run of zero groups', () => {
    expect(ipText(ipv6('2001:db8:0:1:0:0:0:1'))).toBe('2001:db8:0:1::1');
  });

  it('compresses the first run when two runs tie', () => {
    expect(ipText(ipv6('1:0:0:2:0:0:3:4'))).toBe('1::2:0:0:3:4');
  });

  it('does not compress a single zero group', () => {
    expect(ipText(ipv6('1:2:3:4:5:6:0:8'))).toBe('1:2:3:4:5:6:0:8');
  });

  it('compresses a trailing run', () => {
    expect(ipText(ipv6('2001:db8::/32'))).toBe('2001:db8::');
  });
});

// ---------------------------------------------------------------------------
// address/masks
// ---------------------------------------------------------------------------

describe('address/masks: derived values', () => {
  it('derives IPv4 netmask and hostmask', () => {
    const address = ipv4('192.168.1.0/24');
    expect(netmaskText(address)).toBe('255.255.255.0');
    expect(hostmaskText(address)).toBe('0.0.0.255');
    expect(hostCount(address)).toBe(256n);
  });

  it('derives the /0 masks', () => {
    const address = ipv4('0.0.0.0/0');
    expect(netmaskText(address)).toBe('0.0.0.0');
    expect(hostmaskText(address)).toBe('255.255.255.255');
  });

  it('derives IPv6 masks', () => {
    const address = ipv6('2001:db8::/64');
    expect(netmaskText(address)).toBe('ffff:ffff:ffff:ffff::');
    expect(hostmaskText(address)).toBe('::ffff:ffff:ffff:ffff');
  });

  it('a /31 is not a host', () => {
    expect(isHost(ipv4('10.0.0.0/31'))).toBe(false);
    expect(hostCount(ipv4('10.0.0.0/31'))).toBe(2n);
  });
});

// ---------------------------------------------------------------------------
// address/invalid
// ---------------------------------------------------------------------------

describe('address/invalid: malformed input', () => {
  it.each([
    '10.0.0.256',
    '10.0.0',
    '10.0.0.0/33',
    '10.0.0.0/x',
    '1::2::3',
    '12345::',
    'fe80::/129',
    '1:2:3:4:5:6:7',
  ])('rejects %s', (input) => {
    expect(() => parseAddress(input)).toThrow(InvalidAddressError);
  });

  it('names the offending input in the message', () => {
    expect(() => ipv4('10.0.0.999')).toThrow('Invalid address "10.0.0.999": bad octet "999"');
  });
});

// ---------------------------------------------------------------------------
// address/containment
// ---------------------------------------------------------------------------

describe('address/containment', () => {
  it('a network contains its subnets', () => {
    expect(contains(ipv4('10.0.0.0/8'), ipv4('10.1.0.0/16'))).toBe(true);
    expect(contains(ipv4('10.1.0.0/16'), ipv4('10.0.0.0/8'))).toBe(false);
  });

  it('overlap is symmetric', () => {
    expect(overlaps(ipv4('10.1.0.0/16'), ipv4('10.0.0.0/8'))).toBe(true);
    expect(overlaps(ipv4('10.0.0.0/8'), ipv4('11.0.0.0/8'))).toBe(false);
  });

  it('families never contain each other', () => {
    expect(contains(ipv4('0.0.0.0/0'), ipv6('::/128'))).toBe(false);
  });
});
