/**
 * aclforge Renderer: Protocol Resolution Tests
 *
 * protocol/names: protocol names resolve to IANA numbers, case-insensitively
 * protocol/passthrough: numbers, numeric strings, `ip` and unknown names pass through
 * protocol/strict: strict mode rejects unknown names
 * protocol/default: an empty protocol list means `ip`
 *
 * Tests are pure: no I/O, no state.
 */

import { describe, it, expect } from 'vitest';
import { UnknownProtocolError, includesTcp, resolveProtocol, resolveProtocols } from '../src/index.js';

describe('protocol/names', () => {
  const cases: Array<[string, number]> = [
    ['tcp', 6],
    ['udp', 17],
    ['icmp', 1],
    ['gre', 47],
    ['esp', 50],
    ['ipv6-icmp', 58],
    ['ospf', 89],
    ['TCP', 6],
  ];

  it.each(cases)('%s resolves to %d', (name, number) => {
    expect(resolveProtocol(name)).toBe(number);
  });
});

describe('protocol/passthrough', () => {
  it('keeps the literal ip', () => {
    expect(resolveProtocol('ip')).toBe('ip');
  });

  it('keeps numbers and numeric strings unchanged', () => {
    expect(resolveProtocol(6)).toBe(6);
    expect(resolveProtocol('112')).toBe('112');
  });

  it('returns an unknown name verbatim', () => {
    expect(resolveProtocol('Frobnicate')).toBe('Frobnicate');
  });
});

describe('protocol/strict', () => {
  it('raises on an unknown name', () => {
    expect(() => resolveProtocol('frobnicate', { strict: true })).toThrow(UnknownProtocolError);
    expect(() => resolveProtocol('frobnicate', { strict: true })).toThrow('Unknown protocol "frobnicate"');
  });

  it('still accepts ip and numbers', () => {
    expect(resolveProtocol('ip', { strict: true })).toBe('ip');
    expect(resolveProtocol('47', { strict: true })).toBe('47');
  });
});

describe('protocol/default', () => {
  it('an empty list resolves to ip', () => {
    expect(resolveProtocols([])).toEqual(['ip']);
  });

  it('resolves every entry in order', () => {
    expect(resolveProtocols(['udp', 'tcp', 'pim'])).toEqual([17, 6, 103]);
  });

  it('detects tcp by number in either form', () => {
    expect(includesTcp([17, 6])).toBe(true);
    expect(includesTcp(['6'])).toBe(true);
    expect(includesTcp(['ip', 17])).toBe(false);
  });
});
