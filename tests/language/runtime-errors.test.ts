/**
 * Tarn Language Tests: Runtime Errors
 * Each error stops the run and is reported with its line
 */

import { describe, expect, it } from 'vitest';
import { formatDiagnostic, type FreshRunOptions } from '../../src/index.js';
import { runPipeline } from '../helpers/runtime.js';

/** Run a failing program; returns the single runtime diagnostic */
function runtimeError(source: string, options: FreshRunOptions = {}) {
  const result = runPipeline(source, options);
  expect(result.failedPhase).toBe('runtime');
  expect(result.diagnostics).toHaveLength(1);
  const [diagnostic] = result.diagnostics;
  if (!diagnostic) throw new Error('expected a diagnostic');
  return diagnostic;
}

describe('Tarn Language: Runtime Errors', () => {
  it.each([
    ['print -"a";', 'TARN-R001', 'Operand must be a number.'],
    ['print 1 < "a";', 'TARN-R002', 'Operands must be numbers.'],
    ['print 1 + "1";', 'TARN-R003', 'Operands must be two numbers or two strings.'],
    ['print 1 / 0;', 'TARN-R004', 'Division by zero.'],
    ['print missing;', 'TARN-R005', "Undefined variable 'missing'."],
    ['missing = 1;', 'TARN-R005', "Undefined variable 'missing'."],
    ['"str"();', 'TARN-R006', 'Can only call functions and classes.'],
    ['fun f(a) {} f();', 'TARN-R007', 'Expected 1 arguments but got 0.'],
    ['class P { init(a, b) {} } P(1);', 'TARN-R007', 'Expected 2 arguments but got 1.'],
    ['var x = 1; print x.y;', 'TARN-R008', 'Only instances have properties.'],
    ['class P {} print P().nope;', 'TARN-R009', "Undefined property 'nope'."],
    ['var x = 1; x.y = 2;', 'TARN-R010', 'Only instances have fields.'],
    ['var NotClass = "x"; class B < NotClass {}', 'TARN-R011', 'Superclass must be a class.'],
  ])('%s fails with %s', (source, errorId, message) => {
    const diagnostic = runtimeError(source);
    expect(diagnostic.errorId).toBe(errorId);
    expect(diagnostic.message).toBe(message);
    expect(diagnostic.line).toBe(1);
  });

  it('reports the line of the failing statement', () => {
    const result = runPipeline('print 1;\nprint 2;\nprint nil + 1;');
    const [diagnostic] = result.diagnostics;
    if (!diagnostic) throw new Error('expected a diagnostic');

    expect(result.output).toEqual(['1', '2']);
    expect(formatDiagnostic(diagnostic)).toBe(
      '[line 3] Error: Operands must be two numbers or two strings.'
    );
  });

  it('stops at the first runtime error', () => {
    const result = runPipeline('print "a"; print -nil; print "b";');
    expect(result.output).toEqual(['a']);
    expect(result.success).toBe(false);
  });

  it('overflows the stack on unbounded recursion', () => {
    const diagnostic = runtimeError('fun r() { r(); } r();', {
      maxCallDepth: 50,
    });
    expect(diagnostic.errorId).toBe('TARN-R012');
    expect(diagnostic.message).toBe('Stack overflow.');
  });

  it('reports host stack exhaustion as a stack overflow', () => {
    const diagnostic = runtimeError('fun r(n) { return r(n + 1); } r(0);', {
      maxCallDepth: 1_000_000,
    });
    expect(diagnostic.errorId).toBe('TARN-R012');
    expect(diagnostic.message).toBe('Stack overflow.');
    expect(diagnostic.line).toBe(1);
  });

  it('allows recursion up to the default depth', () => {
    const result = runPipeline(
      'fun down(n) { if (n == 0) return "ok"; return down(n - 1); } print down(150);'
    );
    expect(result.output).toEqual(['ok']);
  });

  it('wraps host function failures', () => {
    const diagnostic = runtimeError('boom();', {
      functions: {
        boom: {
          arity: 0,
          fn: () => {
            throw new Error('kaput');
          },
        },
      },
    });
    expect(diagnostic.errorId).toBe('TARN-R013');
    expect(diagnostic.message).toBe("Native function 'boom' failed: kaput");
  });

  it('checks native arity', () => {
    expect(runtimeError('clock(1);').message).toBe(
      'Expected 0 arguments but got 1.'
    );
  });
});
