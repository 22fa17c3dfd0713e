/**
 * Test utilities for Tarn runtime tests
 */

import {
  createRuntimeContext,
  createStepper,
  execute,
  parse,
  resolve,
  run,
  type ExecutionResult,
  type FreshRunOptions,
  type ObservabilityCallbacks,
  type RunResult,
  type RuntimeOptions,
  type StepResult,
  type TarnValue,
} from '../../src/index.js';

/** Shared setup for all execution modes; throws on parse or resolve errors */
function setup(source: string, options: RuntimeOptions = {}) {
  const ast = parse(source);
  const { locals, errors } = resolve(ast);
  const [first] = errors;
  if (first) throw first;
  return { ast, locals, ctx: createRuntimeContext(options) };
}

/** Execute a Tarn script and return everything it printed */
export function runScript(
  source: string,
  options: RuntimeOptions = {}
): string[] {
  const output: string[] = [];
  const { ast, locals, ctx } = setup(source, {
    ...options,
    callbacks: { onPrint: (text) => output.push(text) },
  });
  execute(ast, ctx, locals);
  return output;
}

/** Execute and return full result with variables */
export function runFull(
  source: string,
  options: RuntimeOptions = {}
): ExecutionResult {
  const { ast, locals, ctx } = setup(source, {
    callbacks: { onPrint: () => {} },
    ...options,
  });
  return execute(ast, ctx, locals);
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: RuntimeOptions = {}
): StepResult[] {
  const { ast, locals, ctx } = setup(source, options);
  const stepper = createStepper(ast, ctx, locals);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(stepper.step());
  }

  return results;
}

/** Run through the full pipeline, collecting printed lines */
export function runPipeline(
  source: string,
  options: FreshRunOptions = {}
): RunResult & { output: string[] } {
  const output: string[] = [];
  const result = run(source, {
    ...options,
    callbacks: { onPrint: (text) => output.push(text) },
  });
  return { ...result, output };
}

/** Event collector for observability testing */
export interface CollectedEvents {
  stepStart: { index: number; total: number }[];
  stepEnd: {
    index: number;
    total: number;
    value: TarnValue;
    durationMs: number;
  }[];
  hostCall: { name: string; args: TarnValue[] }[];
  functionReturn: { name: string; value: TarnValue; durationMs: number }[];
  error: { error: Error; index?: number | undefined }[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = {
    stepStart: [],
    stepEnd: [],
    hostCall: [],
    functionReturn: [],
    error: [],
  };

  const callbacks: ObservabilityCallbacks = {
    onStepStart: (e) => events.stepStart.push(e),
    onStepEnd: (e) => events.stepEnd.push(e),
    onHostCall: (e) => events.hostCall.push(e),
    onFunctionReturn: (e) => events.functionReturn.push(e),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}
