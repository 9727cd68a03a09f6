/**
 * aclforge CLI: Console Diagnostic Sink
 *
 * Implements the DiagnosticSink interface from @aclforge/renderer by writing
 * one coloured line per diagnostic to stderr, keeping stdout free for the
 * rendered document.
 *
 * The renderer owns the DiagnosticSink interface and DiagnosticLogger class.
 * The CLI owns this concrete implementation.
 */

import chalk, { Chalk } from 'chalk';
import type { Diagnostic, DiagnosticSink } from '@aclforge/renderer';
import { levelColor, t, themeFor } from '../theme.js';
import type { Theme } from '../theme.js';

export interface ConsoleSinkOptions {
  /** Print debug entries as well as warnings. */
  readonly verbose: boolean;
  /** Force colour on or off; defaults to chalk's terminal detection. */
  readonly color?: boolean | undefined;
  /** Line writer; defaults to stderr. */
  readonly write?: ((line: string) => void) | undefined;
}

/** `<level> <code> (<filter>/<term>): <message>` */
export function formatDiagnostic(entry: Diagnostic, theme: Theme = t): string {
  const location = [entry.filter, entry.term].filter((part) => part !== undefined).join('/');
  const scope = location === '' ? '' : ` (${location})`;
  return `${levelColor(theme, entry.level)(entry.level)} ${theme.text(entry.code)}${scope}: ${entry.message}`;
}

export class ConsoleDiagnosticSink implements DiagnosticSink {
  private readonly theme: Theme;
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleSinkOptions) {
    if (options.color === undefined) {
      this.theme = t;
    } else {
      const level = options.color ? (chalk.level === 0 ? 1 : chalk.level) : 0;
      this.theme = themeFor(new Chalk({ level }));
    }
    this.write = options.write ?? ((line) => process.stderr.write(line + '\n'));
  }

  append(entry: Diagnostic): void {
    if (entry.level === 'debug' && !this.options.verbose) {
      return;
    }
    this.write(formatDiagnostic(entry, this.theme));
  }
}
