/**
 * Program Execution
 *
 * Public API for executing resolved Tarn programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { isStackOverflow, RuntimeError } from '../../types.js';
import type { ResolutionTable } from '../../resolver/index.js';
import { getEvaluator } from './eval/evaluator.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { TarnValue } from './values.js';

/**
 * Execute a resolved program.
 * The first runtime error stops execution and propagates to the caller.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @param locals The resolution table for this program (from resolve())
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext,
  locals: ResolutionTable
): ExecutionResult {
  const stepper = createStepper(program, context, locals);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect globals
 * between top-level statements.
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext,
  locals: ResolutionTable
): ExecutionStepper {
  // Node identities are unique, so tables from earlier programs stay valid
  for (const [node, distance] of locals) {
    context.locals.set(node, distance);
  }

  const evaluator = getEvaluator(context);
  const statements = program.statements;
  const total = statements.length;
  let index = 0;
  let lastValue: TarnValue = null;
  let isDone = total === 0;

  const collectVariables = (): Record<string, TarnValue> => {
    const vars: Record<string, TarnValue> = {};
    for (const [name, value] of context.globals.values) {
      vars[name] = value;
    }
    return vars;
  };

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const value = evaluator.executeTopLevel(stmt);
        lastValue = value;

        context.observability.onStepEnd?.({
          index,
          total,
          value,
          durationMs: Date.now() - startTime,
        });

        index++;
        isDone = index >= total;

        return { value, done: isDone, index: index - 1, total };
      } catch (caught) {
        // A failed statement ends the run
        const error = isStackOverflow(caught)
          ? RuntimeError.fromNode('TARN-R012', stmt, {
              depth: context.callStack.length,
            })
          : caught;
        isDone = true;
        context.environment = context.globals;
        context.callStack.length = 0;
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        variables: collectVariables(),
      };
    },
  };
}
