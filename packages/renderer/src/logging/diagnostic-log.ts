/**
 * aclforge Renderer: Diagnostic Logger
 *
 * Renderers report every element they drop (an IPv6 address in a standard
 * ACL, a verbatim entry for another platform, a filter that targets a
 * different platform) through this logger, so that callers can see the
 * narrowing of the output.
 *
 * The sink is optional: when omitted, record() is a no-op.
 */

import type { Diagnostic, DiagnosticCode, DiagnosticSink } from './diagnostic-sink.js';

/** Where in the policy a diagnostic arose. */
export interface DiagnosticScope {
  readonly filter?: string | undefined;
  readonly term?: string | undefined;
}

export class DiagnosticLogger {
  constructor(private readonly sink?: DiagnosticSink) {}

  record(entry: Diagnostic): void {
    this.sink?.append(entry);
  }

  debug(code: DiagnosticCode, message: string, scope: DiagnosticScope = {}): void {
    this.record({ level: 'debug', code, message, filter: scope.filter, term: scope.term });
  }

  warn(code: DiagnosticCode, message: string, scope: DiagnosticScope = {}): void {
    this.record({ level: 'warn', code, message, filter: scope.filter, term: scope.term });
  }
}
