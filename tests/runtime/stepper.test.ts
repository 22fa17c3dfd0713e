/**
 * Tarn Runtime Tests: Step Execution
 * Tests for createStepper and step-by-step execution
 */

import { describe, expect, it } from 'vitest';
import {
  createRuntimeContext,
  createStepper,
  parse,
  resolve,
  RuntimeError,
} from '../../src/index.js';
import { runFull, runStepped } from '../helpers/runtime.js';

function stepperFor(source: string) {
  const ast = parse(source);
  const ctx = createRuntimeContext({ callbacks: { onPrint: () => {} } });
  return { ctx, stepper: createStepper(ast, ctx, resolve(ast).locals) };
}

describe('Tarn Runtime: Step Execution', () => {
  it('reports done for an empty program', () => {
    const { stepper } = stepperFor('');

    expect(stepper.done).toBe(true);
    expect(stepper.total).toBe(0);
    expect(stepper.step()).toEqual({
      value: null,
      done: true,
      index: 0,
      total: 0,
    });
  });

  it('steps one top-level statement at a time', () => {
    const results = runStepped('1 + 1; var x = 2; x * 3;', {
      callbacks: { onPrint: () => {} },
    });

    expect(results).toEqual([
      { value: 2, done: false, index: 0, total: 3 },
      { value: null, done: false, index: 1, total: 3 },
      { value: 6, done: true, index: 2, total: 3 },
    ]);
  });

  it('exposes globals between steps', () => {
    const { ctx, stepper } = stepperFor('var x = 1; x = x + 1;');

    stepper.step();
    expect(ctx.globals.values.get('x')).toBe(1);
    stepper.step();
    expect(stepper.getResult().variables['x']).toBe(2);
  });

  it('returns the last expression value and globals', () => {
    const result = runFull('var a = 1; a + 41;');

    expect(result.value).toBe(42);
    expect(result.variables['a']).toBe(1);
    expect(Object.keys(result.variables)).toEqual(['clock', 'a']);
  });

  it('ends the run and resets the environment on error', () => {
    const { ctx, stepper } = stepperFor('fun f() { return nil + 1; } f(); 2;');

    stepper.step();
    expect(() => stepper.step()).toThrow(RuntimeError);
    expect(stepper.done).toBe(true);
    expect(ctx.environment).toBe(ctx.globals);
    expect(ctx.callStack).toEqual([]);
  });
});
