/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for program execution.
 * Public API for host applications.
 */

import type { SourceSpan } from '../../types.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import { callable } from './callable.js';
import { createEnvironment, define } from './environment.js';
import type {
  CallFrame,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

const DEFAULT_MAX_CALL_DEPTH = 200;

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (text) => {
    console.log(text);
  },
};

const wallClock = (): number => Date.now() / 1000;

/**
 * Create a runtime context for program execution.
 * This is the main entry point for configuring the Tarn runtime.
 *
 * Globals are defined in order: built-ins, host functions, then variables,
 * so later entries override earlier ones with the same name.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const globals = createEnvironment();

  for (const builtin of BUILTIN_FUNCTIONS) {
    define(globals, builtin.name, builtin);
  }

  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      if (!Number.isInteger(definition.arity) || definition.arity < 0) {
        throw new Error(
          `Function '${name}' has invalid arity ${definition.arity}`
        );
      }
      define(globals, name, callable(name, definition));
    }
  }

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      define(globals, name, value);
    }
  }

  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new Error(
      `maxCallDepth must be a positive integer, got ${maxCallDepth}`
    );
  }

  return {
    globals,
    environment: globals,
    locals: new WeakMap(),
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    maxCallDepth,
    callStack: [],
    clock: options.clock ?? wallClock,
  };
}

// ============================================================
// CALL STACK
// ============================================================

/**
 * Push a frame for a call about to run.
 * @returns false when the frame would exceed maxCallDepth; nothing is pushed
 */
export function pushCallFrame(
  ctx: RuntimeContext,
  functionName: string,
  location: SourceSpan
): boolean {
  if (ctx.callStack.length >= ctx.maxCallDepth) return false;
  ctx.callStack.push({ functionName, location });
  return true;
}

export function popCallFrame(ctx: RuntimeContext): void {
  ctx.callStack.pop();
}

/** Snapshot of active calls, innermost first */
export function getCallStack(ctx: RuntimeContext): readonly CallFrame[] {
  return [...ctx.callStack].reverse();
}
