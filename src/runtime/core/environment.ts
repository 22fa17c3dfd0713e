/**
 * Environments
 *
 * Lexical scope chain. Each environment maps names to values and links to
 * its enclosing environment; the global environment has none.
 */

import type { TarnValue } from './values.js';

export interface Environment {
  readonly enclosing: Environment | undefined;
  readonly values: Map<string, TarnValue>;
}

export function createEnvironment(enclosing?: Environment): Environment {
  return { enclosing, values: new Map() };
}

/** Bind a name in this environment, replacing any earlier binding */
export function define(env: Environment, name: string, value: TarnValue): void {
  env.values.set(name, value);
}

/**
 * Walk `distance` links up the chain.
 * The resolver guarantees the chain is long enough; a short chain means the
 * resolution table does not match the AST being executed.
 */
export function ancestor(env: Environment, distance: number): Environment {
  let target = env;
  for (let i = 0; i < distance; i++) {
    const next = target.enclosing;
    if (next === undefined) {
      throw new Error(
        `Environment chain ended ${i} hops up, expected ${distance}`
      );
    }
    target = next;
  }
  return target;
}

/** Read a binding exactly `distance` hops up; undefined when absent */
export function getAt(
  env: Environment,
  distance: number,
  name: string
): TarnValue | undefined {
  return ancestor(env, distance).values.get(name);
}

/** Overwrite a binding exactly `distance` hops up */
export function assignAt(
  env: Environment,
  distance: number,
  name: string,
  value: TarnValue
): void {
  ancestor(env, distance).values.set(name, value);
}
