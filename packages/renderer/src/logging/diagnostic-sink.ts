/**
 * aclforge Renderer: Diagnostic Sink Interface
 *
 * Defines the injection point for render diagnostics.
 *
 * The renderer owns the contract (this interface) and the DiagnosticLogger
 * class. Concrete sinks that print or persist entries live with the caller
 * (the CLI ships a console sink); the renderer never writes output itself.
 */

/** Severity of a diagnostic. Neither level stops the render. */
export type DiagnosticLevel = 'debug' | 'warn';

/** Stable identifiers for every diagnostic the renderer emits. */
export type DiagnosticCode =
  | 'ipv6-address-ignored'
  | 'verbatim-other-platform'
  | 'filter-not-targeted'
  | 'address-family-mismatch'
  | 'address-set-empty';

/**
 * A non-fatal render event. Each one means some part of the input was left
 * out of the document.
 */
export interface Diagnostic {
  readonly level: DiagnosticLevel;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly filter?: string | undefined;
  readonly term?: string | undefined;
}

/** A sink that receives diagnostics as the renderer produces them. */
export interface DiagnosticSink {
  append(entry: Diagnostic): void;
}

/** Collects diagnostics in memory, for tests and embedders. */
export class MemoryDiagnosticSink implements DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  append(entry: Diagnostic): void {
    this.entries.push(entry);
  }

  /** Every entry received so far, in order. */
  all(): ReadonlyArray<Diagnostic> {
    return [...this.entries];
  }

  codes(): DiagnosticCode[] {
    return this.entries.map((entry) => entry.code);
  }
}
