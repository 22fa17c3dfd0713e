/**
 * Control Flow Completions
 *
 * Result of executing a statement. `return` and `break` travel outward as
 * values until a call boundary or loop consumes them; nothing is thrown.
 */

import type { TarnValue } from './values.js';

export type Completion =
  | { readonly type: 'normal' }
  | { readonly type: 'return'; readonly value: TarnValue }
  | { readonly type: 'break' };

/** Statement finished; continue with the next one */
export const NORMAL: Completion = { type: 'normal' };

/** Exit the innermost loop */
export const BREAK: Completion = { type: 'break' };

/** Unwind to the enclosing call with a value */
export function returnCompletion(value: TarnValue): Completion {
  return { type: 'return', value };
}
