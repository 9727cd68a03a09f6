/**
 * aclforge Renderer: Object-Group Tests
 *
 * object-group/term: entries reference address and port groups by name
 * object-group/collector: each group is defined once per render, in first-use order,
 *   with a warning for a group whose IPv6 members are dropped
 */

import { describe, it, expect } from 'vitest';
import { createTerm, ipv4, ipv6 } from '@aclforge/policy-model';
import {
  ANY_GROUP,
  DiagnosticLogger,
  MemoryDiagnosticSink,
  ObjectGroupCollector,
  ObjectGroupTerm,
  groupName,
  portGroupName,
  resolveRenderOptions,
} from '../src/index.js';
import type { TermRenderContext } from '../src/index.js';

function context(): TermRenderContext {
  return {
    filterName: 'og-in',
    options: resolveRenderOptions(),
    logger: new DiagnosticLogger(new MemoryDiagnosticSink()),
  };
}

const corpSource = [
  ipv4('10.0.0.0/8', { token: 'RFC1918-10', parentToken: 'corp-src' }),
  ipv4('172.16.0.0/12', { token: 'RFC1918-172', parentToken: 'corp-src' }),
];

// ---------------------------------------------------------------------------
// object-group/term
// ---------------------------------------------------------------------------

describe('object-group/term', () => {
  it('names groups by parent token, then token, then address', () => {
    expect(groupName(ipv4('10.0.0.0/8', { token: 'NET', parentToken: 'PARENT' }))).toBe('PARENT');
    expect(groupName(ipv4('10.0.0.0/8', { token: 'NET' }))).toBe('NET');
    expect(groupName(ipv4('10.0.0.0/8'))).toBe('10.0.0.0/8');
    expect(groupName(ANY_GROUP)).toBe('ANY');
    expect(portGroupName({ low: 1024, high: 65535 })).toBe('1024-65535');
  });

  it('renders one entry per address, naming its group, with ANY for an unset field', () => {
    const term = createTerm({
      name: 'web',
      action: 'accept',
      protocol: ['tcp'],
      sourceAddress: corpSource,
      destinationPort: [{ low: 443, high: 443 }],
    });
    expect(new ObjectGroupTerm(term, context()).render()).toEqual([
      'remark web',
      ' permit 6 addrgroup corp-src addrgroup ANY portgroup 443-443',
      ' permit 6 addrgroup corp-src addrgroup ANY portgroup 443-443',
    ]);
  });

  it('repeats the entry for sibling sources against one destination', () => {
    const term = createTerm({
      name: 'to-dmz',
      action: 'deny',
      sourceAddress: corpSource,
      destinationAddress: [ipv4('192.168.0.0/16', { token: 'DMZ' })],
    });
    expect(new ObjectGroupTerm(term, context()).render()).toEqual([
      'remark to-dmz',
      ' deny ip addrgroup corp-src addrgroup DMZ',
      ' deny ip addrgroup corp-src addrgroup DMZ',
    ]);
  });

  it('places the source port group after the source address group', () => {
    const term = createTerm({
      name: 'web',
      action: 'accept',
      protocol: ['tcp'],
      sourcePort: [{ low: 1024, high: 65535 }],
      destinationPort: [{ low: 443, high: 443 }],
    });
    expect(new ObjectGroupTerm(term, context()).render()[1]).toBe(
      ' permit 6 addrgroup ANY portgroup 1024-65535 addrgroup ANY portgroup 443-443',
    );
  });
});

// ---------------------------------------------------------------------------
// object-group/collector
// ---------------------------------------------------------------------------

describe('object-group/collector', () => {
  it('is not valid until a term is added', () => {
    const collector = new ObjectGroupCollector();
    collector.addName('og-in');
    expect(collector.valid).toBe(false);
    expect(collector.filterNames()).toEqual(['og-in']);
    collector.addTerm(createTerm({ name: 't', action: 'accept' }));
    expect(collector.valid).toBe(true);
  });

  it('defines address and port groups in first-use order', () => {
    const collector = new ObjectGroupCollector();
    collector.addTerm(
      createTerm({
        name: 'https',
        action: 'accept',
        protocol: ['tcp'],
        sourceAddress: corpSource,
        destinationPort: [{ low: 443, high: 443 }],
      }),
    );
    collector.addTerm(
      createTerm({
        name: 'dmz',
        action: 'accept',
        protocol: ['tcp'],
        sourceAddress: corpSource,
        destinationAddress: [ipv4('192.168.0.0/16', { token: 'DMZ', parentToken: 'dmz' })],
        destinationPort: [{ low: 80, high: 80 }, { low: 443, high: 443 }],
      }),
    );

    expect(collector.render()).toEqual([
      'object-group ip address corp-src',
      ' 10.0.0.0 255.0.0.0',
      ' 172.16.0.0 255.240.0.0',
      'exit',
      '',
      'object-group ip port 443-443',
      ' eq 443',
      'exit',
      '',
      'object-group ip address dmz',
      ' 192.168.0.0 255.255.0.0',
      'exit',
      '',
      'object-group ip port 80-80',
      ' eq 80',
      'exit',
      '',
    ]);
  });

  it('emits a token shared by five terms exactly once', () => {
    const collector = new ObjectGroupCollector();
    for (const name of ['a', 'b', 'c', 'd', 'e']) {
      collector.addTerm(createTerm({ name, action: 'accept', sourceAddress: corpSource }));
    }
    const lines = collector.render();
    expect(lines.filter((line) => line === 'object-group ip address corp-src')).toHaveLength(1);
    expect(lines).toHaveLength(5);
  });

  it('renders port ranges with range', () => {
    const collector = new ObjectGroupCollector();
    collector.addTerm(createTerm({ name: 'high', action: 'accept', sourcePort: [{ low: 1024, high: 65535 }] }));
    expect(collector.render()).toEqual(['object-group ip port 1024-65535', ' range 1024 65535', 'exit', '']);
  });

  it('leaves IPv6 members out of address groups', () => {
    const collector = new ObjectGroupCollector();
    collector.addTerm(
      createTerm({
        name: 'dual',
        action: 'accept',
        sourceAddress: [
          ipv4('10.0.0.0/8', { parentToken: 'dual-net' }),
          ipv6('2001:db8::/32', { parentToken: 'dual-net' }),
        ],
      }),
    );
    expect(collector.render()).toEqual(['object-group ip address dual-net', ' 10.0.0.0 255.0.0.0', 'exit', '']);
  });

  it('warns once for a group whose IPv6 members are dropped', () => {
    const sink = new MemoryDiagnosticSink();
    const collector = new ObjectGroupCollector(new DiagnosticLogger(sink));
    const v6net = [ipv6('2001:db8::/32', { parentToken: 'v6net' })];
    collector.addTerm(createTerm({ name: 'v6-in', action: 'accept', sourceAddress: v6net }), 'og-in');
    collector.addTerm(createTerm({ name: 'v6-out', action: 'accept', destinationAddress: v6net }), 'og-in');

    expect(collector.render()).toEqual([]);
    expect(sink.all()).toEqual([
      {
        level: 'warn',
        code: 'ipv6-address-ignored',
        message: 'Object group "v6net" holds IPv4 addresses only; its IPv6 members are not defined',
        filter: 'og-in',
        term: 'v6-in',
      },
    ]);
  });

  it('does not warn for an all-IPv4 group', () => {
    const sink = new MemoryDiagnosticSink();
    const collector = new ObjectGroupCollector(new DiagnosticLogger(sink));
    collector.addTerm(createTerm({ name: 't', action: 'accept', sourceAddress: corpSource }), 'og-in');
    collector.render();
    expect(sink.all()).toEqual([]);
  });

  it('starts a fresh set of groups in every collector', () => {
    const term = createTerm({ name: 't', action: 'accept', sourceAddress: corpSource });
    const first = new ObjectGroupCollector();
    first.addTerm(term);
    const second = new ObjectGroupCollector();
    second.addTerm(term);
    expect(second.render()).toEqual(first.render());
  });
});
