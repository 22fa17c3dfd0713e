/**
 * Diagnostics Sink
 *
 * Collects errors from every pipeline phase in report order.
 * The sink never aborts anything; the pipeline decides when to stop.
 */

import type { ErrorCategory } from './error-registry.js';
import type { TarnError } from './error-classes.js';

export type DiagnosticPhase = ErrorCategory;

export interface Diagnostic {
  readonly phase: DiagnosticPhase;
  readonly line: number;
  readonly message: string;
  /** Offending token, e.g. ` at 'x'` or ` at end`; empty when not tied to a token */
  readonly where: string;
  readonly errorId?: string | undefined;
}

export interface DiagnosticSink {
  readonly diagnostics: readonly Diagnostic[];
  report(
    phase: DiagnosticPhase,
    line: number,
    message: string,
    where?: string
  ): void;
  reportError(error: TarnError): void;
  hasErrors(phase?: DiagnosticPhase): boolean;
  clear(): void;
}

export function createDiagnosticSink(): DiagnosticSink {
  const diagnostics: Diagnostic[] = [];

  return {
    get diagnostics() {
      return diagnostics;
    },

    report(phase, line, message, where = '') {
      diagnostics.push({ phase, line, message, where });
    },

    reportError(error) {
      const data = error.toData();
      diagnostics.push({
        phase: error.category,
        line: error.line,
        message: data.message,
        where: error.where,
        errorId: error.errorId,
      });
    },

    hasErrors(phase) {
      if (phase === undefined) return diagnostics.length > 0;
      return diagnostics.some((d) => d.phase === phase);
    },

    clear() {
      diagnostics.length = 0;
    },
  };
}

/**
 * Render a diagnostic for display.
 *
 * @example
 * formatDiagnostic({ phase: 'parse', line: 3, message: 'Expect expression.', where: " at ';'" })
 * // "[line 3] Error at ';': Expect expression."
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `[line ${diagnostic.line}] Error${diagnostic.where}: ${diagnostic.message}`;
}
