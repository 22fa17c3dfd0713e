/**
 * ExpressionsMixin: Unary, Binary and Logical Operators
 *
 * Operators never coerce: arithmetic and comparison take numbers only,
 * and `+` takes two numbers or two strings.
 *
 * Depends on:
 * - EvaluatorBase: evaluate()
 *
 * Methods added:
 * - evaluateUnary(node) -> TarnValue
 * - evaluateBinary(node) -> TarnValue
 * - evaluateLogical(node) -> TarnValue
 *
 * @internal
 */

import type {
  BinaryNode,
  LogicalNode,
  UnaryNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { isTruthy, valuesEqual, type TarnValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { VariablesEvaluator } from './variables.js';

function checkNumberOperands(
  node: BinaryNode,
  left: TarnValue,
  right: TarnValue
): [number, number] {
  if (typeof left === 'number' && typeof right === 'number') {
    return [left, right];
  }
  throw RuntimeError.fromNode('TARN-R002', node);
}

function createExpressionsMixin(
  Base: EvaluatorConstructor<VariablesEvaluator>
) {
  return class ExpressionsEvaluator extends Base {
    evaluateUnary(node: UnaryNode): TarnValue {
      const operand = this.evaluate(node.operand);

      switch (node.op) {
        case '!':
          return !isTruthy(operand);
        case '-':
          if (typeof operand !== 'number') {
            throw RuntimeError.fromNode('TARN-R001', node);
          }
          return -operand;
      }
    }

    /** Both operands are evaluated, left first, before the operator applies */
    evaluateBinary(node: BinaryNode): TarnValue {
      const left = this.evaluate(node.left);
      const right = this.evaluate(node.right);

      switch (node.op) {
        case '+':
          if (typeof left === 'number' && typeof right === 'number') {
            return left + right;
          }
          if (typeof left === 'string' && typeof right === 'string') {
            return left + right;
          }
          throw RuntimeError.fromNode('TARN-R003', node);
        case '-': {
          const [a, b] = checkNumberOperands(node, left, right);
          return a - b;
        }
        case '*': {
          const [a, b] = checkNumberOperands(node, left, right);
          return a * b;
        }
        case '/': {
          const [a, b] = checkNumberOperands(node, left, right);
          if (b === 0) {
            throw RuntimeError.fromNode('TARN-R004', node);
          }
          return a / b;
        }
        case '<': {
          const [a, b] = checkNumberOperands(node, left, right);
          return a < b;
        }
        case '<=': {
          const [a, b] = checkNumberOperands(node, left, right);
          return a <= b;
        }
        case '>': {
          const [a, b] = checkNumberOperands(node, left, right);
          return a > b;
        }
        case '>=': {
          const [a, b] = checkNumberOperands(node, left, right);
          return a >= b;
        }
        case '==':
          return valuesEqual(left, right);
        case '!=':
          return !valuesEqual(left, right);
      }
    }

    /** Short-circuits and yields the deciding operand itself */
    evaluateLogical(node: LogicalNode): TarnValue {
      const left = this.evaluate(node.left);

      if (node.op === 'or') {
        if (isTruthy(left)) return left;
      } else if (!isTruthy(left)) {
        return left;
      }

      return this.evaluate(node.right);
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;

export type ExpressionsEvaluator = InstanceType<
  ReturnType<typeof createExpressionsMixin>
>;
