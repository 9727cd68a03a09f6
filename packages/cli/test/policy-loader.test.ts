/**
 * aclforge CLI: Policy Loader Tests
 *
 * loader/valid: a well-formed document becomes a Policy with defaults filled in
 * loader/forms: address and port shorthand forms
 * loader/errors: every structural error is reported with its JSON path
 * loader/parse: invalid JSON and invalid documents raise PolicyFormatError
 *
 * Tests are pure: no file I/O.
 */

import { describe, it, expect } from 'vitest';
import { ipv4, ipv6 } from '@aclforge/policy-model';
import { PolicyFormatError, parsePolicy, validatePolicyDocument } from '../src/index.js';

function filterWith(term: Record<string, unknown>): unknown {
  return {
    filters: [{ header: { targets: [{ platform: 'cisco', options: ['edge-in'] }] }, terms: [term] }],
  };
}

// ---------------------------------------------------------------------------
// loader/valid
// ---------------------------------------------------------------------------

describe('loader/valid', () => {
  it('reads a minimal policy', () => {
    const result = validatePolicyDocument(filterWith({ name: 'allow-web', action: 'accept', protocol: ['tcp'] }));
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const filter = result.value.filters[0];
    expect(filter?.header).toEqual({ targets: [{ platform: 'cisco', options: ['edge-in'] }], comment: [] });
    expect(filter?.terms[0]).toEqual({
      name: 'allow-web',
      action: 'accept',
      comment: [],
      protocol: ['tcp'],
      address: [],
      sourceAddress: [],
      sourceAddressExclude: [],
      destinationAddress: [],
      destinationAddressExclude: [],
      sourcePort: [],
      destinationPort: [],
      option: [],
      logging: false,
      counter: undefined,
      verbatim: [],
      addressFamily: undefined,
    });
  });

  it('keeps every optional field', () => {
    const result = validatePolicyDocument(
      filterWith({
        name: 'full',
        action: 'deny',
        comment: ['one', 'two'],
        protocol: ['udp', 47],
        option: ['established'],
        logging: true,
        counter: 'hits',
        verbatim: [{ platform: 'cisco', text: 'deny ip any any' }],
        addressFamily: 6,
      }),
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const term = result.value.filters[0]?.terms[0];
    expect(term?.comment).toEqual(['one', 'two']);
    expect(term?.protocol).toEqual(['udp', 47]);
    expect(term?.option).toEqual(['established']);
    expect(term?.logging).toBe(true);
    expect(term?.counter).toBe('hits');
    expect(term?.verbatim).toEqual([{ platform: 'cisco', text: 'deny ip any any' }]);
    expect(term?.addressFamily).toBe(6);
  });
});

// ---------------------------------------------------------------------------
// loader/forms
// ---------------------------------------------------------------------------

describe('loader/forms', () => {
  it('accepts address strings and token objects', () => {
    const result = validatePolicyDocument(
      filterWith({
        name: 't',
        action: 'accept',
        sourceAddress: ['10.0.0.0/8', { address: '2001:db8::/32', token: 'V6', parentToken: 'corp' }],
      }),
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.filters[0]?.terms[0]?.sourceAddress).toEqual([
      ipv4('10.0.0.0/8'),
      ipv6('2001:db8::/32', { token: 'V6', parentToken: 'corp' }),
    ]);
  });

  it('accepts a port, a pair and a range object', () => {
    const result = validatePolicyDocument(
      filterWith({ name: 't', action: 'accept', destinationPort: [80, [8000, 8080], { low: 443, high: 443 }] }),
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.filters[0]?.terms[0]?.destinationPort).toEqual([
      { low: 80, high: 80 },
      { low: 8000, high: 8080 },
      { low: 443, high: 443 },
    ]);
  });
});

// ---------------------------------------------------------------------------
// loader/errors
// ---------------------------------------------------------------------------

describe('loader/errors', () => {
  it('rejects a document that is not an object', () => {
    expect(validatePolicyDocument([])).toEqual({ ok: false, errors: [{ message: 'expected an object', context: '$' }] });
  });

  it('rejects a missing or empty filter list', () => {
    expect(validatePolicyDocument({})).toEqual({
      ok: false,
      errors: [{ message: 'expected an array', context: 'filters' }],
    });
    expect(validatePolicyDocument({ filters: [] })).toEqual({
      ok: false,
      errors: [{ message: 'expected at least one filter', context: 'filters' }],
    });
  });

  it('reports every bad term field with its path', () => {
    const result = validatePolicyDocument(
      filterWith({
        name: '',
        action: 'allow',
        sourceAddress: ['10.0.0.300/8'],
        destinationPort: [70000, [90, 80]],
        logging: 'yes',
        addressFamily: 5,
        sourcePrefix: ['x'],
      }),
    );
    expect(result).toEqual({
      ok: false,
      errors: [
        { context: 'filters[0].terms[0].sourcePrefix', message: 'unknown term field' },
        { context: 'filters[0].terms[0].name', message: 'expected a non-empty string' },
        {
          context: 'filters[0].terms[0].action',
          message: 'expected one of accept, deny, reject, next, reject-with-tcp-rst',
        },
        { context: 'filters[0].terms[0].logging', message: 'expected a boolean' },
        {
          context: 'filters[0].terms[0].sourceAddress[0]',
          message: 'Invalid address "10.0.0.300/8": bad octet "300"',
        },
        {
          context: 'filters[0].terms[0].destinationPort[0]',
          message: 'expected a port, [low, high] or { low, high } within 0-65535',
        },
        { context: 'filters[0].terms[0].destinationPort[1]', message: 'port range 90-80 is inverted' },
        { context: 'filters[0].terms[0].addressFamily', message: 'expected 4 or 6' },
      ],
    });
  });

  it('reports a header target without a platform', () => {
    const result = validatePolicyDocument({ filters: [{ header: { targets: [{ options: ['x'] }] }, terms: [] }] });
    expect(result).toEqual({
      ok: false,
      errors: [{ context: 'filters[0].header.targets[0]', message: 'expected an object with a string "platform"' }],
    });
  });
});

// ---------------------------------------------------------------------------
// loader/parse
// ---------------------------------------------------------------------------

describe('loader/parse', () => {
  it('parses JSON text into a policy', () => {
    const policy = parsePolicy(JSON.stringify(filterWith({ name: 't', action: 'deny' })));
    expect(policy.filters[0]?.terms[0]?.name).toBe('t');
  });

  it('raises PolicyFormatError on invalid JSON', () => {
    expect(() => parsePolicy('{ not json', 'broken.json')).toThrow(PolicyFormatError);
    expect(() => parsePolicy('{ not json', 'broken.json')).toThrow(/^Invalid policy broken\.json:\n  \$: not valid JSON: /);
  });

  it('lists the validation errors in the message', () => {
    expect(() => parsePolicy('{"filters": []}', 'empty.json')).toThrow(
      'Invalid policy empty.json:\n  filters: expected at least one filter',
    );
  });

  it('carries the errors on the exception', () => {
    try {
      parsePolicy('[]', 'array.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyFormatError);
      if (error instanceof PolicyFormatError) {
        expect(error.errors).toEqual([{ message: 'expected an object', context: '$' }]);
      }
    }
  });
});
