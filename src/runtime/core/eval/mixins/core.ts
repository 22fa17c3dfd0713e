/**
 * CoreMixin: Main Expression and Statement Dispatch
 *
 * Overrides the base evaluate()/execute() stubs with exhaustive dispatch on
 * the node type. Composed outermost so every other mixin reaches it through
 * the base entry points.
 *
 * Methods added:
 * - evaluate(node) -> TarnValue
 * - execute(node) -> Completion
 * - executeTopLevel(node) -> TarnValue
 * - executePrint(node) -> Completion
 *
 * @internal
 */

import type {
  ExpressionNode,
  PrintNode,
  StatementNode,
} from '../../../../types.js';
import { BREAK, NORMAL, type Completion } from '../../signals.js';
import { formatValue, type TarnValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { ClassesEvaluator } from './classes.js';

function createCoreMixin(Base: EvaluatorConstructor<ClassesEvaluator>) {
  return class CoreEvaluator extends Base {
    override evaluate(node: ExpressionNode): TarnValue {
      switch (node.type) {
        case 'Literal':
          return node.value;
        case 'Grouping':
          return this.evaluate(node.expression);
        case 'Unary':
          return this.evaluateUnary(node);
        case 'Binary':
          return this.evaluateBinary(node);
        case 'Logical':
          return this.evaluateLogical(node);
        case 'Variable':
          return this.evaluateVariable(node);
        case 'Assign':
          return this.evaluateAssign(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'Get':
          return this.evaluateGet(node);
        case 'Set':
          return this.evaluateSet(node);
        case 'This':
          return this.evaluateThis(node);
        case 'Super':
          return this.evaluateSuper(node);
      }
    }

    override execute(node: StatementNode): Completion {
      switch (node.type) {
        case 'ExpressionStmt':
          this.evaluate(node.expression);
          return NORMAL;
        case 'Print':
          return this.executePrint(node);
        case 'Var':
          return this.executeVarDecl(node);
        case 'Block':
          return this.executeBlockStatement(node);
        case 'If':
          return this.executeIf(node);
        case 'While':
          return this.executeWhile(node);
        case 'For':
          return this.executeFor(node);
        case 'Function':
          return this.executeFunctionDecl(node);
        case 'Return':
          return this.executeReturn(node);
        case 'Break':
          return BREAK;
        case 'Class':
          return this.executeClassDecl(node);
      }
    }

    /**
     * Execute a top-level statement.
     * Expression statements report their value; everything else yields nil.
     */
    executeTopLevel(node: StatementNode): TarnValue {
      if (node.type === 'ExpressionStmt') {
        return this.evaluate(node.expression);
      }
      this.execute(node);
      return null;
    }

    executePrint(node: PrintNode): Completion {
      const value = this.evaluate(node.expression);
      this.ctx.callbacks.onPrint(formatValue(value));
      return NORMAL;
    }
  };
}

export const CoreMixin = createCoreMixin;
