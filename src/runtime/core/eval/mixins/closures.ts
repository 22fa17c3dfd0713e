/**
 * ClosuresMixin: Function Declaration, Calls and Invocation
 *
 * Every call goes through callValue(), which checks the callee and arity,
 * tracks the call frame, and dispatches on the callable kind. A host stack
 * overflow under a call is reported as a Tarn stack overflow.
 *
 * Depends on:
 * - EvaluatorBase: ctx, evaluate()
 * - ControlFlowMixin: executeBlock()
 *
 * Methods added:
 * - evaluateCall(node) -> TarnValue
 * - callValue(callee, args, node) -> TarnValue
 * - invokeFunction(fn, closure, args) -> TarnValue
 * - invokeNative(fn, args, node) -> TarnValue
 * - instantiate(klass, args) -> TarnInstance
 * - executeFunctionDecl(node) -> Completion
 * - executeReturn(node) -> Completion
 *
 * @internal
 */

import type {
  CallNode,
  FunctionDeclNode,
  ReturnNode,
} from '../../../../types.js';
import {
  isStackOverflow,
  RuntimeError,
  TarnError,
} from '../../../../types.js';
import {
  bindMethod,
  createInstance,
  findMethod,
  getArity,
  isCallable,
  scriptCallable,
  type ApplicationCallable,
  type ClassCallable,
  type RuntimeCallable,
  type ScriptCallable,
  type TarnInstance,
} from '../../callable.js';
import { popCallFrame, pushCallFrame } from '../../context.js';
import {
  createEnvironment,
  define,
  getAt,
  type Environment,
} from '../../environment.js';
import {
  NORMAL,
  returnCompletion,
  type Completion,
} from '../../signals.js';
import type { TarnValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { ControlFlowEvaluator } from './control-flow.js';

function createClosuresMixin(
  Base: EvaluatorConstructor<ControlFlowEvaluator>
) {
  return class ClosuresEvaluator extends Base {
    /** Callee first, then arguments left to right */
    evaluateCall(node: CallNode): TarnValue {
      const callee = this.evaluate(node.callee);
      const args: TarnValue[] = [];
      for (const arg of node.args) {
        args.push(this.evaluate(arg));
      }
      return this.callValue(callee, args, node);
    }

    callValue(callee: TarnValue, args: TarnValue[], node: CallNode): TarnValue {
      if (!isCallable(callee)) {
        throw RuntimeError.fromNode('TARN-R006', node);
      }

      const arity = getArity(callee);
      if (args.length !== arity) {
        throw RuntimeError.fromNode('TARN-R007', node, {
          expected: arity,
          actual: args.length,
        });
      }

      if (!pushCallFrame(this.ctx, callee.name, node.span)) {
        throw RuntimeError.fromNode('TARN-R012', node, {
          depth: this.ctx.maxCallDepth,
        });
      }

      try {
        switch (callee.kind) {
          case 'script':
            return this.invokeFunction(callee, callee.closure, args);
          case 'bound':
            return this.invokeFunction(callee.method, callee.environment, args);
          case 'class':
            return this.instantiate(callee, args);
          case 'runtime':
          case 'application':
            return this.invokeNative(callee, args, node);
        }
      } catch (error) {
        // The host stack can run out before maxCallDepth is reached
        if (isStackOverflow(error)) {
          throw RuntimeError.fromNode('TARN-R012', node, {
            depth: this.ctx.callStack.length,
          });
        }
        throw error;
      } finally {
        popCallFrame(this.ctx);
      }
    }

    /**
     * Run a function body in a new environment chained to `closure`.
     * Falling off the end yields nil; initializers always yield `this`.
     */
    invokeFunction(
      fn: ScriptCallable,
      closure: Environment,
      args: TarnValue[]
    ): TarnValue {
      const startTime = Date.now();
      const environment = createEnvironment(closure);
      fn.declaration.params.forEach((param, i) => {
        define(environment, param.name, args[i] ?? null);
      });

      const completion = this.executeBlock(fn.declaration.body, environment);

      let value: TarnValue =
        completion.type === 'return' ? completion.value : null;
      if (fn.isInitializer) {
        value = getAt(closure, 0, 'this') ?? null;
      }

      this.ctx.observability.onFunctionReturn?.({
        name: fn.name,
        value,
        durationMs: Date.now() - startTime,
      });
      return value;
    }

    /**
     * Call a built-in or host function.
     * Errors other than Tarn errors are wrapped so the failing call site is
     * reported with a line.
     */
    invokeNative(
      fn: RuntimeCallable | ApplicationCallable,
      args: TarnValue[],
      node: CallNode
    ): TarnValue {
      this.ctx.observability.onHostCall?.({ name: fn.name, args });

      try {
        return fn.fn(args, this.ctx, this.getNodeLocation(node));
      } catch (error) {
        if (error instanceof TarnError || isStackOverflow(error)) throw error;
        throw RuntimeError.fromNode('TARN-R013', node, {
          name: fn.name,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    /** Allocate an instance and run `init` bound to it, if the class has one */
    instantiate(klass: ClassCallable, args: TarnValue[]): TarnInstance {
      const instance = createInstance(klass);
      const initializer = findMethod(klass, 'init');
      if (initializer) {
        const bound = bindMethod(initializer, instance);
        this.invokeFunction(initializer, bound.environment, args);
      }
      return instance;
    }

    executeFunctionDecl(node: FunctionDeclNode): Completion {
      const fn = scriptCallable(node, this.ctx.environment);
      define(this.ctx.environment, node.name, fn);
      return NORMAL;
    }

    executeReturn(node: ReturnNode): Completion {
      const value = node.value ? this.evaluate(node.value) : null;
      return returnCompletion(value);
    }
  };
}

export const ClosuresMixin = createClosuresMixin;

export type ClosuresEvaluator = InstanceType<
  ReturnType<typeof createClosuresMixin>
>;
