/**
 * Resolver Types
 */

import type { ResolveError, ResolvableNode } from '../types.js';

/**
 * Side table from reference nodes to hop counts, keyed by node identity.
 * A missing entry means the reference is global.
 */
export type ResolutionTable = ReadonlyMap<ResolvableNode, number>;

export interface ResolveResult {
  readonly locals: ResolutionTable;
  readonly errors: ResolveError[];
}

/** Kind of function body being resolved */
export type FunctionType = 'none' | 'function' | 'method' | 'initializer';

/** Kind of class body being resolved */
export type ClassType = 'none' | 'class' | 'subclass';

/**
 * Mutable state threaded through one resolution pass.
 * Each scope maps a name to whether its initializer has finished.
 * @internal
 */
export interface ResolverContext {
  readonly scopes: Map<string, boolean>[];
  readonly locals: Map<ResolvableNode, number>;
  readonly errors: ResolveError[];
  currentFunction: FunctionType;
  currentClass: ClassType;
  /** Loops enclosing the current point within the current function */
  loopDepth: number;
}
