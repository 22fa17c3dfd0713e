/**
 * Built-in Functions
 *
 * Natives defined in every global environment.
 */

import type { RuntimeCallable } from '../core/callable.js';

/** Seconds from the context's clock */
const clock: RuntimeCallable = {
  __type: 'callable',
  kind: 'runtime',
  name: 'clock',
  arity: 0,
  fn: (_args, ctx) => ctx.clock(),
};

export const BUILTIN_FUNCTIONS: readonly RuntimeCallable[] = [clock];
