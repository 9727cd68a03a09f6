/**
 * aclforge Renderer: Standard Term
 *
 * Standard access lists match on one IPv4 address and nothing else. A term
 * using any other field is rejected when the StandardTerm is constructed,
 * before anything is rendered.
 */

import { hostmaskText, ipText, isHost } from '@aclforge/policy-model';
import type { Term } from '@aclforge/policy-model';
import { StandardAclTermError } from '../errors.js';
import { ACTION_TABLE, termRemarks, verbatimLines } from './format.js';
import type { TermRenderContext } from './format.js';

/**
 * @throws {StandardAclTermError} naming the first field standard ACLs lack
 */
export function validateStandardTerm(term: Term): void {
  if (term.protocol.length > 0) {
    throw new StandardAclTermError(term.name, 'Standard ACLs cannot specify protocols');
  }
  if (
    term.sourceAddress.length > 0 ||
    term.sourceAddressExclude.length > 0 ||
    term.destinationAddress.length > 0 ||
    term.destinationAddressExclude.length > 0
  ) {
    throw new StandardAclTermError(term.name, 'Standard ACLs cannot use source or destination addresses');
  }
  if (term.option.length > 0) {
    throw new StandardAclTermError(term.name, 'Standard ACLs prohibit use of options');
  }
  if (term.sourcePort.length > 0 || term.destinationPort.length > 0) {
    throw new StandardAclTermError(term.name, 'Standard ACLs prohibit use of port numbers');
  }
  if (term.counter !== undefined && term.counter !== '') {
    throw new StandardAclTermError(term.name, 'Counters are not implemented in standard ACLs');
  }
  if (term.logging) {
    throw new StandardAclTermError(term.name, 'Logging is not implemented in standard ACLs');
  }
}

export class StandardTerm {
  constructor(
    private readonly term: Term,
    private readonly context: TermRenderContext,
  ) {
    validateStandardTerm(term);
  }

  render(): string[] {
    const { term, context } = this;
    const lines = termRemarks(term, context.options.remarkWidth);

    const verbatim = verbatimLines(term, context);
    if (verbatim !== undefined) {
      return [...lines, ...verbatim];
    }

    const prefix = `access-list ${context.filterName} ${ACTION_TABLE[term.action]}`;
    for (const address of term.address) {
      if (address.family === 6) {
        context.logger.debug('ipv6-address-ignored', 'Ignoring unsupported IPv6 address in a standard ACL', {
          filter: context.filterName,
          term: term.name,
        });
        continue;
      }
      lines.push(
        isHost(address) ? `${prefix} ${ipText(address)}` : `${prefix} ${ipText(address)} ${hostmaskText(address)}`,
      );
    }
    return lines;
  }
}
