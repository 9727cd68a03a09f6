/**
 * aclforge Renderer: Statement Formatting
 *
 * The text forms shared by every Cisco term renderer: actions, addresses,
 * ports, remarks and verbatim passthrough.
 */

import { addressText, hostmaskText, ipText, isHost } from '@aclforge/policy-model';
import type { IPv4Address, IPv6Address, Term, TermAction } from '@aclforge/policy-model';
import type { RenderOptions } from '../config/options.js';
import type { DiagnosticLogger } from '../logging/diagnostic-log.js';
import type { AddressMatch, PortMatch } from '../normalize/addresses.js';

/** What every term renderer needs besides the term itself. */
export interface TermRenderContext {
  readonly filterName: string;
  readonly options: RenderOptions;
  readonly logger: DiagnosticLogger;
}

/**
 * Cisco keyword per term action. Cisco has no TCP reset action, so
 * `reject-with-tcp-rst` renders as a plain deny; `next` becomes a comment.
 */
export const ACTION_TABLE: Readonly<Record<TermAction, string>> = {
  accept: 'permit',
  deny: 'deny',
  reject: 'deny',
  next: '! next',
  'reject-with-tcp-rst': 'deny',
};

function renderIPv4(address: IPv4Address): string {
  return isHost(address) ? `host ${ipText(address)}` : `${ipText(address)} ${hostmaskText(address)}`;
}

function renderIPv6(address: IPv6Address): string {
  return isHost(address) ? `host ${ipText(address)}` : addressText(address);
}

/** `host <ip>`, `<network> <hostmask>`, `<ip>/<len>` or `any`. */
export function renderAddress(address: AddressMatch): string {
  switch (address.family) {
    case 'any':
      return 'any';
    case 4:
      return renderIPv4(address);
    case 6:
      return renderIPv6(address);
  }
}

/** Empty for no restriction, `eq <p>` for one port, else `range <low> <high>`. */
export function renderPort(port: PortMatch): string {
  if (port === null) {
    return '';
  }
  return port.low === port.high ? `eq ${port.low}` : `range ${port.low} ${port.high}`;
}

/** One ACL entry line: a leading space, then the non-empty fields. */
export function statement(fields: ReadonlyArray<string>): string {
  return ' ' + fields.filter((field) => field !== '').join(' ');
}

/** Split multi-line comments into one `remark` per line, each cut to `width`. */
export function remarks(comments: ReadonlyArray<string>, width: number): string[] {
  return comments
    .flatMap((comment) => comment.split('\n'))
    .map((line) => `remark ${line.slice(0, width)}`);
}

/** `remark <term name>` followed by the term's comments. */
export function termRemarks(term: Term, width: number): string[] {
  return [`remark ${term.name}`, ...remarks(term.comment, width)];
}

/**
 * The raw lines of a verbatim term, or undefined for an ordinary term.
 *
 * A term carrying any verbatim entry renders nothing but the entries for
 * this platform; entries for other platforms are dropped.
 */
export function verbatimLines(term: Term, context: TermRenderContext): string[] | undefined {
  if (term.verbatim.length === 0) {
    return undefined;
  }
  const lines: string[] = [];
  for (const entry of term.verbatim) {
    if (entry.platform === context.options.platform) {
      lines.push(entry.text);
    } else {
      context.logger.debug(
        'verbatim-other-platform',
        `Verbatim text for ${entry.platform} is not rendered for ${context.options.platform}`,
        { filter: context.filterName, term: term.name },
      );
    }
  }
  return lines;
}
