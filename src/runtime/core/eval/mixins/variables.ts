/**
 * VariablesMixin: Variable Declaration, Lookup and Assignment
 *
 * Resolved references walk exactly their hop count from the current
 * environment. Unresolved references go straight to the globals.
 *
 * Depends on:
 * - EvaluatorBase: ctx, evaluate()
 *
 * Methods added:
 * - lookUpVariable(name, node) -> TarnValue
 * - evaluateVariable(node) -> TarnValue
 * - evaluateAssign(node) -> TarnValue
 * - executeVarDecl(node) -> Completion
 *
 * @internal
 */

import type {
  AssignNode,
  ResolvableNode,
  VarDeclNode,
  VariableNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { assignAt, define, getAt } from '../../environment.js';
import { NORMAL, type Completion } from '../../signals.js';
import type { TarnValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createVariablesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class VariablesEvaluator extends Base {
    lookUpVariable(name: string, node: ResolvableNode): TarnValue {
      const distance = this.ctx.locals.get(node);
      const value =
        distance === undefined
          ? this.ctx.globals.values.get(name)
          : getAt(this.ctx.environment, distance, name);

      if (value === undefined) {
        throw RuntimeError.fromNode('TARN-R005', node, { name });
      }
      return value;
    }

    evaluateVariable(node: VariableNode): TarnValue {
      return this.lookUpVariable(node.name, node);
    }

    /** Assignment evaluates to the assigned value */
    evaluateAssign(node: AssignNode): TarnValue {
      const value = this.evaluate(node.value);
      const distance = this.ctx.locals.get(node);

      if (distance !== undefined) {
        assignAt(this.ctx.environment, distance, node.name, value);
        return value;
      }

      if (!this.ctx.globals.values.has(node.name)) {
        throw RuntimeError.fromNode('TARN-R005', node, { name: node.name });
      }
      define(this.ctx.globals, node.name, value);
      return value;
    }

    /** Uninitialized variables hold nil */
    executeVarDecl(node: VarDeclNode): Completion {
      const value = node.initializer ? this.evaluate(node.initializer) : null;
      define(this.ctx.environment, node.name, value);
      return NORMAL;
    }
  };
}

export const VariablesMixin = createVariablesMixin;

export type VariablesEvaluator = InstanceType<
  ReturnType<typeof createVariablesMixin>
>;
