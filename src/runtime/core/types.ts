/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { ResolvableNode, SourceSpan } from '../../types.js';
import type { HostFunctionDefinition } from './callable.js';
import type { Environment } from './environment.js';
import type { TarnValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with the canonical string form of each printed value */
  onPrint: (text: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a built-in or host function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after a user function or method returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  /** Value of an expression statement; nil for other statements */
  value: TarnValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a native call */
export interface HostCallEvent {
  name: string;
  args: TarnValue[];
}

/** Event emitted after a user function returns */
export interface FunctionReturnEvent {
  name: string;
  value: TarnValue;
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/**
 * Call stack frame information for error reporting.
 */
export interface CallFrame {
  /** Source span of the call expression */
  readonly location: SourceSpan;
  /** Name of the function, method or class being called */
  readonly functionName: string;
}

/** Runtime context with environments, resolution data, and callbacks */
export interface RuntimeContext {
  /** Root environment; holds natives, host functions and top-level declarations */
  readonly globals: Environment;
  /** Environment of the code currently executing */
  environment: Environment;
  /**
   * Hop counts for resolved references, accumulated across every program
   * executed in this context. Keyed weakly so finished programs can be
   * collected.
   */
  readonly locals: WeakMap<ResolvableNode, number>;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  /** Calls nested deeper than this raise a stack overflow */
  readonly maxCallDepth: number;
  /** Active calls, innermost last */
  readonly callStack: CallFrame[];
  /** Time source for the clock native, in seconds */
  readonly clock: () => number;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Global variables defined before execution */
  variables?: Record<string, TarnValue>;
  /** Host functions, callable from scripts by name */
  functions?: Record<string, HostFunctionDefinition>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Maximum nested call depth (default: 200) */
  maxCallDepth?: number;
  /** Time source for the clock native, in seconds (default: wall clock) */
  clock?: () => number;
}

/** Result of program execution */
export interface ExecutionResult {
  /** Value of the last top-level expression statement, or nil */
  value: TarnValue;
  /** Global bindings after execution */
  variables: Record<string, TarnValue>;
}

/** Result of a single step execution */
export interface StepResult {
  /** Value produced by this step */
  value: TarnValue;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement just executed (0-based) */
  index: number;
  /** Total number of statements */
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Current statement index (0-based) */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** The runtime context (for inspecting globals between steps) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Get final result (only valid after done=true) */
  getResult(): ExecutionResult;
}
