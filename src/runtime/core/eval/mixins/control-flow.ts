/**
 * ControlFlowMixin: Blocks, Conditionals and Loops
 *
 * Depends on:
 * - EvaluatorBase: ctx, evaluate(), execute()
 *
 * Methods added:
 * - executeBlock(statements, environment) -> Completion
 * - executeBlockStatement(node) -> Completion
 * - executeIf(node) -> Completion
 * - executeWhile(node) -> Completion
 * - executeFor(node) -> Completion
 *
 * @internal
 */

import type {
  BlockNode,
  ForNode,
  IfNode,
  StatementNode,
  WhileNode,
} from '../../../../types.js';
import {
  createEnvironment,
  define,
  type Environment,
} from '../../environment.js';
import { NORMAL, type Completion } from '../../signals.js';
import { isTruthy } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { ExpressionsEvaluator } from './expressions.js';

function createControlFlowMixin(
  Base: EvaluatorConstructor<ExpressionsEvaluator>
) {
  return class ControlFlowEvaluator extends Base {
    /**
     * Run statements in `environment`, stopping at the first non-normal
     * completion. The previous environment is restored however the block
     * exits, including by a thrown runtime error.
     */
    executeBlock(
      statements: StatementNode[],
      environment: Environment
    ): Completion {
      const previous = this.ctx.environment;
      this.ctx.environment = environment;
      try {
        for (const stmt of statements) {
          const completion = this.execute(stmt);
          if (completion.type !== 'normal') return completion;
        }
        return NORMAL;
      } finally {
        this.ctx.environment = previous;
      }
    }

    executeBlockStatement(node: BlockNode): Completion {
      return this.executeBlock(
        node.statements,
        createEnvironment(this.ctx.environment)
      );
    }

    executeIf(node: IfNode): Completion {
      if (isTruthy(this.evaluate(node.condition))) {
        return this.execute(node.thenBranch);
      }
      if (node.elseBranch) {
        return this.execute(node.elseBranch);
      }
      return NORMAL;
    }

    executeWhile(node: WhileNode): Completion {
      while (isTruthy(this.evaluate(node.condition))) {
        const completion = this.execute(node.body);
        if (completion.type === 'break') break;
        if (completion.type === 'return') return completion;
      }
      return NORMAL;
    }

    /**
     * The initializer runs once in a loop scope. Before each increment the
     * loop variable is copied into a fresh scope, so closures created by the
     * body keep the value of their own iteration.
     */
    executeFor(node: ForNode): Completion {
      const previous = this.ctx.environment;
      const loopVariable =
        node.initializer?.type === 'Var' ? node.initializer.name : null;
      let loopEnv = createEnvironment(previous);
      this.ctx.environment = loopEnv;

      try {
        if (node.initializer) {
          this.execute(node.initializer);
        }

        for (;;) {
          if (node.condition && !isTruthy(this.evaluate(node.condition))) {
            break;
          }

          const completion = this.execute(node.body);
          if (completion.type === 'break') break;
          if (completion.type === 'return') return completion;

          if (loopVariable !== null) {
            const next = createEnvironment(previous);
            const current = loopEnv.values.get(loopVariable) ?? null;
            define(next, loopVariable, current);
            loopEnv = next;
            this.ctx.environment = loopEnv;
          }

          if (node.increment) {
            this.evaluate(node.increment);
          }
        }
        return NORMAL;
      } finally {
        this.ctx.environment = previous;
      }
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;

export type ControlFlowEvaluator = InstanceType<
  ReturnType<typeof createControlFlowMixin>
>;
