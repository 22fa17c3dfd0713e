/**
 * ClassesMixin: Class Declaration, Properties, this and super
 *
 * Depends on:
 * - EvaluatorBase: ctx, evaluate()
 * - VariablesMixin: evaluateVariable(), lookUpVariable()
 *
 * Methods added:
 * - executeClassDecl(node) -> Completion
 * - evaluateGet(node) -> TarnValue
 * - evaluateSet(node) -> TarnValue
 * - evaluateThis(node) -> TarnValue
 * - evaluateSuper(node) -> TarnValue
 *
 * @internal
 */

import type {
  ClassDeclNode,
  GetNode,
  SetNode,
  SuperNode,
  ThisNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import {
  bindMethod,
  classCallable,
  findMethod,
  isClass,
  isInstance,
  scriptCallable,
  type ClassCallable,
  type ScriptCallable,
} from '../../callable.js';
import { createEnvironment, define, getAt } from '../../environment.js';
import { NORMAL, type Completion } from '../../signals.js';
import type { TarnValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { ClosuresEvaluator } from './closures.js';

function createClassesMixin(Base: EvaluatorConstructor<ClosuresEvaluator>) {
  return class ClassesEvaluator extends Base {
    /**
     * With a superclass, methods close over an extra scope binding `super`,
     * matching the scope the resolver opens around them.
     */
    executeClassDecl(node: ClassDeclNode): Completion {
      let superclass: ClassCallable | null = null;
      if (node.superclass) {
        const value = this.evaluateVariable(node.superclass);
        if (!isClass(value)) {
          throw RuntimeError.fromNode('TARN-R011', node.superclass);
        }
        superclass = value;
      }

      const declaring = this.ctx.environment;
      define(declaring, node.name, null);

      let methodEnv = declaring;
      if (superclass) {
        methodEnv = createEnvironment(declaring);
        define(methodEnv, 'super', superclass);
      }

      const methods = new Map<string, ScriptCallable>();
      for (const method of node.methods) {
        methods.set(
          method.name,
          scriptCallable(method, methodEnv, method.name === 'init')
        );
      }

      define(declaring, node.name, classCallable(node.name, superclass, methods));
      return NORMAL;
    }

    /** Fields shadow methods; methods come back bound to the instance */
    evaluateGet(node: GetNode): TarnValue {
      const object = this.evaluate(node.object);
      if (!isInstance(object)) {
        throw RuntimeError.fromNode('TARN-R008', node);
      }

      const field = object.fields.get(node.name);
      if (field !== undefined) return field;

      const method = findMethod(object.klass, node.name);
      if (method) return bindMethod(method, object);

      throw RuntimeError.fromNode('TARN-R009', node, { name: node.name });
    }

    evaluateSet(node: SetNode): TarnValue {
      const object = this.evaluate(node.object);
      if (!isInstance(object)) {
        throw RuntimeError.fromNode('TARN-R010', node);
      }

      const value = this.evaluate(node.value);
      object.fields.set(node.name, value);
      return value;
    }

    evaluateThis(node: ThisNode): TarnValue {
      return this.lookUpVariable('this', node);
    }

    /**
     * `super` sits one scope outside the scope binding `this`, so the
     * receiver is found one hop closer than the superclass.
     */
    evaluateSuper(node: SuperNode): TarnValue {
      const distance = this.ctx.locals.get(node);
      if (distance === undefined) {
        throw new Error(`Unresolved 'super' at line ${node.span.start.line}`);
      }

      const superclass = getAt(this.ctx.environment, distance, 'super');
      const receiver = getAt(this.ctx.environment, distance - 1, 'this');
      if (
        superclass === undefined ||
        receiver === undefined ||
        !isClass(superclass) ||
        !isInstance(receiver)
      ) {
        throw new Error(
          `Malformed method scope for 'super' at line ${node.span.start.line}`
        );
      }

      const method = findMethod(superclass, node.method);
      if (!method) {
        throw RuntimeError.fromNode('TARN-R009', node, { name: node.method });
      }
      return bindMethod(method, receiver);
    }
  };
}

export const ClassesMixin = createClassesMixin;

export type ClassesEvaluator = InstanceType<
  ReturnType<typeof createClassesMixin>
>;
