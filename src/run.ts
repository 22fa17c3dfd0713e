/**
 * Pipeline
 *
 * Runs source text through scan, parse, resolve and execute, reporting every
 * error to a diagnostic sink. The first phase that reports anything ends the
 * run.
 */

import {
  createDiagnosticSink,
  type Diagnostic,
  type DiagnosticPhase,
  type DiagnosticSink,
} from './diagnostics.js';
import { TarnError } from './error-classes.js';
import { scan } from './lexer/index.js';
import { parseTokens } from './parser/index.js';
import { resolve } from './resolver/index.js';
import { createRuntimeContext } from './runtime/core/context.js';
import { execute } from './runtime/core/execute.js';
import type { RuntimeContext, RuntimeOptions } from './runtime/core/types.js';

interface SinkOptions {
  /** Sink receiving diagnostics; a fresh one is created when omitted */
  diagnostics?: DiagnosticSink;
}

/** Run in a new context built from the runtime options */
export interface FreshRunOptions extends RuntimeOptions, SinkOptions {
  context?: undefined;
}

/**
 * Run in an existing context, so globals carry over between runs.
 * The context keeps the runtime options it was created with.
 */
export type ContextRunOptions = SinkOptions & {
  context: RuntimeContext;
} & { [K in keyof RuntimeOptions]?: never };

export type RunOptions = FreshRunOptions | ContextRunOptions;

export interface RunResult {
  readonly success: boolean;
  /** Phase that ended the run, or null when it completed */
  readonly failedPhase: DiagnosticPhase | null;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Run a Tarn program.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const result = run('print 1 + 2;', {
 *   callbacks: { onPrint: (text) => lines.push(text) },
 * });
 * // lines: ['3'], result.success: true
 * ```
 */
export function run(source: string, options: RunOptions = {}): RunResult {
  const diagnostics = options.diagnostics ?? createDiagnosticSink();

  const fail = (phase: DiagnosticPhase): RunResult => ({
    success: false,
    failedPhase: phase,
    diagnostics: diagnostics.diagnostics,
  });

  const scanned = scan(source);
  scanned.errors.forEach((err) => diagnostics.reportError(err));
  if (scanned.errors.length > 0) return fail('lexer');

  const parsed = parseTokens(scanned.tokens);
  parsed.errors.forEach((err) => diagnostics.reportError(err));
  if (!parsed.success) return fail('parse');

  const resolved = resolve(parsed.ast);
  resolved.errors.forEach((err) => diagnostics.reportError(err));
  if (resolved.errors.length > 0) return fail('resolve');

  const ctx = options.context ?? createRuntimeContext(options);
  try {
    execute(parsed.ast, ctx, resolved.locals);
  } catch (error) {
    if (error instanceof TarnError) {
      diagnostics.reportError(error);
      return fail('runtime');
    }
    throw error;
  }

  return {
    success: true,
    failedPhase: null,
    diagnostics: diagnostics.diagnostics,
  };
}
