/**
 * aclforge Renderer: Extended Term
 *
 * Renders one term as extended (IPv4) or IPv6 access-list entries. A term
 * expands to one entry per combination of source address, destination
 * address, source port, destination port and protocol, in that order from
 * outermost to innermost.
 */

import type { AddressFamily, AddressField, Term } from '@aclforge/policy-model';
import { effectiveAddresses, effectivePorts } from '../normalize/addresses.js';
import type { AddressMatch } from '../normalize/addresses.js';
import { includesTcp, resolveProtocols } from '../normalize/protocol.js';
import type { ResolvedProtocol } from '../normalize/protocol.js';
import {
  ACTION_TABLE,
  renderAddress,
  renderPort,
  statement,
  termRemarks,
  verbatimLines,
} from './format.js';
import type { TermRenderContext } from './format.js';

/** Trailing keywords: `established` (TCP only) and `log`. */
export function optionKeywords(term: Term, protocols: ReadonlyArray<ResolvedProtocol>): string[] {
  const keywords: string[] = [];
  const established = term.option.some(
    (option) => option.startsWith('established') || option.startsWith('tcp-established'),
  );
  if (established && includesTcp(protocols)) {
    keywords.push('established');
  }
  if (term.logging) {
    keywords.push('log');
  }
  return keywords;
}

export class ExtendedTerm {
  constructor(
    private readonly term: Term,
    private readonly family: AddressFamily,
    private readonly context: TermRenderContext,
  ) {}

  render(): string[] {
    const { term } = this;
    const { options } = this.context;
    const lines = termRemarks(term, options.remarkWidth);

    const verbatim = verbatimLines(term, this.context);
    if (verbatim !== undefined) {
      return [...lines, ...verbatim];
    }

    const protocols = resolveProtocols(term.protocol, { strict: options.strictProtocols });
    const sources = this.addresses('source');
    const destinations = this.addresses('destination');
    const sourcePorts = effectivePorts(term, 'source');
    const destinationPorts = effectivePorts(term, 'destination');
    const keywords = optionKeywords(term, protocols);
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
                  renderAddress(source),
                  renderPort(sourcePort),
                  renderAddress(destination),
                  renderPort(destinationPort),
                  ...keywords,
                ]),
              );
            }
          }
        }
      }
    }
    return lines;
  }

  private addresses(field: AddressField): AddressMatch[] {
    const addresses = effectiveAddresses(this.term, field, this.family);
    if (addresses.length === 0) {
      const declared = field === 'source' ? this.term.sourceAddress : this.term.destinationAddress;
      const scope = { filter: this.context.filterName, term: this.term.name };
      if (declared.some((address) => address.family === this.family)) {
        this.context.logger.debug(
          'address-set-empty',
          `Exclusions remove every ${field} address; the term renders no IPv${this.family} entries`,
          scope,
        );
      } else {
        this.context.logger.debug(
          'address-family-mismatch',
          `No IPv${this.family} ${field} address; the term renders no IPv${this.family} entries`,
          scope,
        );
      }
    }
    return addresses;
  }
}
