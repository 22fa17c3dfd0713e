/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Context access, dispatch stubs
 * 2. VariablesMixin - Declaration, lookup, assignment
 * 3. ExpressionsMixin - Unary, binary, logical operators
 * 4. ControlFlowMixin - Blocks, conditionals, loops
 * 5. ClosuresMixin - Function declaration and calls
 * 6. ClassesMixin - Classes, properties, this, super
 * 7. CoreMixin - Node dispatch (outermost)
 *
 * Each mixin may call methods of the mixins below it.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { ClassesMixin } from './mixins/classes.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { VariablesMixin } from './mixins/variables.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = CoreMixin(
  ClassesMixin(
    ClosuresMixin(
      ControlFlowMixin(ExpressionsMixin(VariablesMixin(EvaluatorBase)))
    )
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: RuntimeContext object reference
 * Value: Evaluator instance for that context
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
