/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides context access and the dispatch entry points every mixin calls.
 *
 * @internal
 */

import type {
  ExpressionNode,
  SourceLocation,
  StatementNode,
} from '../../../types.js';
import type { Completion } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import type { TarnValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Mixins stacked on top of it call `evaluate` and `execute`, which the
 * outermost CoreMixin overrides with the node-type dispatch.
 */
export class EvaluatorBase {
  constructor(readonly ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  getNodeLocation(node?: {
    span: { start: SourceLocation };
  }): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Evaluate an expression.
   *
   * NOTE: Stub implementation - actual dispatch lives in CoreMixin.
   */
  evaluate(_node: ExpressionNode): TarnValue {
    throw new Error(
      'evaluate requires full Evaluator composition with CoreMixin'
    );
  }

  /**
   * Execute a statement.
   *
   * NOTE: Stub implementation - actual dispatch lives in CoreMixin.
   */
  execute(_node: StatementNode): Completion {
    throw new Error(
      'execute requires full Evaluator composition with CoreMixin'
    );
  }
}
