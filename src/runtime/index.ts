/**
 * Tarn Runtime
 *
 * Public API for executing Tarn programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - callable.ts: Callable and instance types, type guards
 *   - values.ts: TarnValue and value utilities
 *   - environment.ts: Lexical scope chain
 *   - signals.ts: Statement completions (normal, return, break)
 *   - context.ts: Runtime context factory and call stack
 *   - execute.ts: Program execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Built-in natives
 *   - builtins.ts: Built-in native functions
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CallFrame,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// CALLABLE TYPES AND GUARDS
// ============================================================

export type {
  ApplicationCallable,
  BoundMethod,
  CallableFn,
  ClassCallable,
  HostFunctionDefinition,
  RuntimeCallable,
  ScriptCallable,
  TarnCallable,
  TarnInstance,
} from './core/callable.js';

export {
  callable,
  formatCallable,
  getArity,
  isCallable,
  isClass,
  isInstance,
  isNativeCallable,
} from './core/callable.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type { TarnValue } from './core/values.js';

export {
  formatNumber,
  formatValue,
  inferType,
  isTruthy,
  valuesEqual,
} from './core/values.js';

// ============================================================
// ENVIRONMENTS AND COMPLETIONS
// ============================================================

export type { Environment } from './core/environment.js';
export {
  ancestor,
  assignAt,
  createEnvironment,
  define,
  getAt,
} from './core/environment.js';

export type { Completion } from './core/signals.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export { createRuntimeContext, getCallStack } from './core/context.js';
export { createStepper, execute } from './core/execute.js';
export { BUILTIN_FUNCTIONS } from './ext/builtins.js';
