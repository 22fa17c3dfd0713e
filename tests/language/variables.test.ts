/**
 * Tarn Language Tests: Variables and Scope
 */

import { describe, expect, it } from 'vitest';
import { runScript } from '../helpers/runtime.js';

describe('Tarn Language: Variables', () => {
  it('initializes declared variables to nil', () => {
    expect(runScript('var a; print a;')).toEqual(['nil']);
  });

  it('allows redeclaring a global', () => {
    expect(runScript('var a = 1; var a = 2; print a;')).toEqual(['2']);
  });

  it('allows redeclaring a local', () => {
    expect(runScript('{ var a = 1; var a = 2; print a; }')).toEqual(['2']);
  });

  it('shadows outer variables inside blocks', () => {
    expect(
      runScript(
        'var a = "global"; { var a = "local"; print a; } print a;'
      )
    ).toEqual(['local', 'global']);
  });

  it('evaluates assignment to the assigned value', () => {
    expect(runScript('var a; var b; a = b = 3; print a; print b;')).toEqual([
      '3',
      '3',
    ]);
  });

  it('assigns through enclosing scopes', () => {
    expect(runScript('var a = 1; { { a = 5; } } print a;')).toEqual(['5']);
  });

  it('binds references statically', () => {
    const source = `
      var a = "global";
      {
        fun showA() { print a; }
        showA();
        var a = "block";
        showA();
      }
    `;
    expect(runScript(source)).toEqual(['global', 'global']);
  });

  it('reads globals supplied by the host', () => {
    expect(
      runScript('print greeting + "!";', { variables: { greeting: 'hi' } })
    ).toEqual(['hi!']);
  });
});
