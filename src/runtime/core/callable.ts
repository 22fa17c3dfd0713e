/**
 * Callable Types
 *
 * Unified representation of everything that can be called from Tarn:
 * - ScriptCallable: functions and methods declared in source
 * - ClassCallable: classes (calling one constructs an instance)
 * - BoundMethod: a method paired with the instance it was read from
 * - RuntimeCallable: built-in natives such as clock
 * - ApplicationCallable: host-provided functions
 */

import type { FunctionDeclNode, SourceLocation } from '../../types.js';
import { createEnvironment, define, type Environment } from './environment.js';
import type { RuntimeContext } from './types.js';
import type { TarnValue } from './values.js';

/**
 * Native function signature.
 * Used for both built-in and host-provided functions.
 */
export type CallableFn = (
  args: TarnValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => TarnValue;

/**
 * Host function registration.
 * The runtime checks the argument count against `arity` before invoking.
 */
export interface HostFunctionDefinition {
  readonly arity: number;
  readonly fn: CallableFn;
  /** Human-readable function description (optional) */
  readonly description?: string;
}

/** Common fields for all callable types */
interface CallableBase {
  readonly __type: 'callable';
  readonly name: string;
}

/** Function or method declared in source, closed over its defining scope */
export interface ScriptCallable extends CallableBase {
  readonly kind: 'script';
  readonly declaration: FunctionDeclNode;
  readonly closure: Environment;
  /** `init` methods always return their instance */
  readonly isInitializer: boolean;
}

export interface ClassCallable extends CallableBase {
  readonly kind: 'class';
  readonly superclass: ClassCallable | null;
  readonly methods: ReadonlyMap<string, ScriptCallable>;
}

/** Method bound to a receiver; `environment` binds `this` */
export interface BoundMethod extends CallableBase {
  readonly kind: 'bound';
  readonly receiver: TarnInstance;
  readonly method: ScriptCallable;
  readonly environment: Environment;
}

/** Built-in native function */
export interface RuntimeCallable extends CallableBase {
  readonly kind: 'runtime';
  readonly arity: number;
  readonly fn: CallableFn;
}

/** Host application-provided function */
export interface ApplicationCallable extends CallableBase {
  readonly kind: 'application';
  readonly arity: number;
  readonly fn: CallableFn;
  readonly description?: string | undefined;
}

/** Union of all callable types */
export type TarnCallable =
  | ScriptCallable
  | ClassCallable
  | BoundMethod
  | RuntimeCallable
  | ApplicationCallable;

/** Instance of a user class; shared by reference */
export interface TarnInstance {
  readonly __type: 'instance';
  readonly klass: ClassCallable;
  readonly fields: Map<string, TarnValue>;
}

// ============================================================
// TYPE GUARDS
// ============================================================

/** Type guard for any callable */
export function isCallable(value: TarnValue): value is TarnCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    value.__type === 'callable'
  );
}

export function isInstance(value: TarnValue): value is TarnInstance {
  return (
    typeof value === 'object' &&
    value !== null &&
    value.__type === 'instance'
  );
}

export function isClass(value: TarnValue): value is ClassCallable {
  return isCallable(value) && value.kind === 'class';
}

/** Type guard for built-in and host functions */
export function isNativeCallable(
  value: TarnValue
): value is RuntimeCallable | ApplicationCallable {
  return (
    isCallable(value) &&
    (value.kind === 'runtime' || value.kind === 'application')
  );
}

// ============================================================
// CONSTRUCTION
// ============================================================

/**
 * Create an application callable from a host function.
 * @param name Name the function is registered under
 */
export function callable(
  name: string,
  definition: HostFunctionDefinition
): ApplicationCallable {
  return {
    __type: 'callable',
    kind: 'application',
    name,
    arity: definition.arity,
    fn: definition.fn,
    description: definition.description,
  };
}

export function scriptCallable(
  declaration: FunctionDeclNode,
  closure: Environment,
  isInitializer = false
): ScriptCallable {
  return {
    __type: 'callable',
    kind: 'script',
    name: declaration.name,
    declaration,
    closure,
    isInitializer,
  };
}

export function classCallable(
  name: string,
  superclass: ClassCallable | null,
  methods: ReadonlyMap<string, ScriptCallable>
): ClassCallable {
  return { __type: 'callable', kind: 'class', name, superclass, methods };
}

export function createInstance(klass: ClassCallable): TarnInstance {
  return { __type: 'instance', klass, fields: new Map() };
}

// ============================================================
// CLASS AND METHOD HELPERS
// ============================================================

/** Look up a method on the class, then up the superclass chain */
export function findMethod(
  klass: ClassCallable,
  name: string
): ScriptCallable | undefined {
  for (
    let current: ClassCallable | null = klass;
    current !== null;
    current = current.superclass
  ) {
    const method = current.methods.get(name);
    if (method) return method;
  }
  return undefined;
}

/** Pair a method with a receiver in a new scope binding `this` */
export function bindMethod(
  method: ScriptCallable,
  receiver: TarnInstance
): BoundMethod {
  const environment = createEnvironment(method.closure);
  define(environment, 'this', receiver);
  return {
    __type: 'callable',
    kind: 'bound',
    name: method.name,
    receiver,
    method,
    environment,
  };
}

/** Number of arguments a call must pass */
export function getArity(fn: TarnCallable): number {
  switch (fn.kind) {
    case 'script':
      return fn.declaration.params.length;
    case 'bound':
      return fn.method.declaration.params.length;
    case 'class': {
      const init = findMethod(fn, 'init');
      return init ? init.declaration.params.length : 0;
    }
    case 'runtime':
    case 'application':
      return fn.arity;
  }
}

/** Canonical string form of a callable */
export function formatCallable(fn: TarnCallable): string {
  switch (fn.kind) {
    case 'script':
    case 'bound':
      return `<fn ${fn.name}>`;
    case 'class':
      return fn.name;
    case 'runtime':
    case 'application':
      return '<native fn>';
  }
}
