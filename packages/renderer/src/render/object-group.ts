/**
 * aclforge Renderer: Object-Group Access Lists
 *
 * Object-group ACL entries reference named address and port groups instead
 * of spelling out every address:
 *
 *   permit 6 addrgroup corp-src portgroup 1024-65535 addrgroup ANY portgroup 443-443
 *
 * The groups themselves are defined once, ahead of every filter:
 *
 *   object-group ip address corp-src
 *    10.0.0.0 255.0.0.0
 *   exit
 *
 *   object-group ip port 443-443
 *    eq 443
 *   exit
 *
 * Address groups are named after the addresses' parent token. Ports carry
 * no token, so a port group is named `<low>-<high>`.
 */

import { addressText, ipText, ipv4, netmaskText } from '@aclforge/policy-model';
import type { Address, IPv4Address, PortRange, Term } from '@aclforge/policy-model';
import { DiagnosticLogger } from '../logging/diagnostic-log.js';
import { effectivePorts } from '../normalize/addresses.js';
import type { PortMatch } from '../normalize/addresses.js';
import { resolveProtocols } from '../normalize/protocol.js';
import { ACTION_TABLE, statement, termRemarks, verbatimLines } from './format.js';
import type { TermRenderContext } from './format.js';

/** Stands in for an unset source or destination. */
export const ANY_GROUP: IPv4Address = ipv4('0.0.0.0/0', { token: 'ANY' });

/** The name of the object group an address belongs to. */
export function groupName(address: Address): string {
  return address.parentToken ?? address.token ?? addressText(address);
}

function distinctGroupNames(addresses: ReadonlyArray<Address>): string[] {
  return [...new Set(addresses.map(groupName))];
}

export function portGroupName(port: PortRange): string {
  return `${port.low}-${port.high}`;
}

function portGroupReference(port: PortMatch): string {
  return port === null ? '' : `portgroup ${portGroupName(port)}`;
}

// ---------------------------------------------------------------------------
// Term entries
// ---------------------------------------------------------------------------

/**
 * Renders one term as object-group entries: one per combination of source
 * address, destination address, source port, destination port and protocol
 * (protocol innermost), each address named by its group. Addresses are not
 * filtered by family, so sibling addresses repeat the same entry.
 */
export class ObjectGroupTerm {
  constructor(
    private readonly term: Term,
    private readonly context: TermRenderContext,
  ) {}

  render(): string[] {
    const { term, context } = this;
    const lines = termRemarks(term, context.options.remarkWidth);

    const verbatim = verbatimLines(term, context);
    if (verbatim !== undefined) {
      return [...lines, ...verbatim];
    }

    const protocols = resolveProtocols(term.protocol, { strict: context.options.strictProtocols });
    const sources = term.sourceAddress.length > 0 ? term.sourceAddress : [ANY_GROUP];
    const destinations = term.destinationAddress.length > 0 ? term.destinationAddress : [ANY_GROUP];
    const sourcePorts = effectivePorts(term, 'source');
    const destinationPorts = effectivePorts(term, 'destination');
    const action = ACTION_TABLE[term.action];

    for (const source of sources) {
      for (const destination of destinations) {
        for (const sourcePort of sourcePorts) {
          for (const destinationPort of destinationPorts) {
            for (const protocol of protocols) {
              lines.push(
                statement([
                  action,
                  String(protocol),
                  'addrgroup',
                  groupName(source),
                  portGroupReference(sourcePort),
                  'addrgroup',
                  groupName(destination),
                  portGroupReference(destinationPort),
                ]),
              );
            }
          }
        }
      }
    }
    return lines;
  }
}

// ---------------------------------------------------------------------------
// Group definitions
// ---------------------------------------------------------------------------

function addressGroups(
  addresses: ReadonlyArray<Address>,
  seen: Set<string>,
  skipped: (name: string) => void,
): string[] {
  const lines: string[] = [];
  for (const name of distinctGroupNames(addresses)) {
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    const group = addresses.filter((address) => groupName(address) === name);
    const members = group.filter((address) => address.family === 4);
    if (members.length < group.length) {
      skipped(name);
    }
    if (members.length === 0) {
      continue;
    }
    lines.push(`object-group ip address ${name}`);
    for (const member of members) {
      lines.push(` ${ipText(member)} ${netmaskText(member)}`);
    }
    lines.push('exit', '');
  }
  return lines;
}

function portGroups(ports: ReadonlyArray<PortRange>, seen: Set<string>): string[] {
  const lines: string[] = [];
  for (const port of ports) {
    const name = portGroupName(port);
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    lines.push(
      `object-group ip port ${name}`,
      port.low === port.high ? ` eq ${port.low}` : ` range ${port.low} ${port.high}`,
      'exit',
      '',
    );
  }
  return lines;
}

interface CollectedTerm {
  readonly term: Term;
  readonly filterName: string | undefined;
}

/**
 * Collects the terms of every object-group filter in one render and emits
 * each address and port group they reference exactly once, in the order
 * the terms first use them.
 *
 * Address groups hold IPv4 members only. A group with IPv6 members is
 * reported as `ipv6-address-ignored` at warn level; one with no IPv4 member
 * is not defined at all.
 *
 * A collector belongs to a single render call.
 */
export class ObjectGroupCollector {
  private readonly terms: CollectedTerm[] = [];
  private readonly names: string[] = [];

  constructor(private readonly logger: DiagnosticLogger = new DiagnosticLogger()) {}

  addTerm(term: Term, filterName?: string): void {
    this.terms.push({ term, filterName });
  }

  addName(filterName: string): void {
    this.names.push(filterName);
  }

  /** Names of the object-group filters registered so far. */
  filterNames(): ReadonlyArray<string> {
    return [...this.names];
  }

  /** True once any term has been collected. */
  get valid(): boolean {
    return this.terms.length > 0;
  }

  render(): string[] {
    const seenAddresses = new Set<string>();
    const seenPorts = new Set<string>();
    const lines: string[] = [];
    for (const { term, filterName } of this.terms) {
      const skipped = (name: string): void => {
        this.logger.warn(
          'ipv6-address-ignored',
          `Object group "${name}" holds IPv4 addresses only; its IPv6 members are not defined`,
          { filter: filterName, term: term.name },
        );
      };
      lines.push(...addressGroups(term.sourceAddress, seenAddresses, skipped));
      lines.push(...addressGroups(term.destinationAddress, seenAddresses, skipped));
      lines.push(...portGroups([...term.sourcePort, ...term.destinationPort], seenPorts));
    }
    return lines;
  }
}
