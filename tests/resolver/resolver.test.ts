/**
 * Tarn Resolver Tests
 * Hop counts for local references and semantic errors
 */

import { describe, expect, it } from 'vitest';
import { parse, resolve, type ResolvableNode } from '../../src/index.js';

function nodeName(node: ResolvableNode): string {
  switch (node.type) {
    case 'Variable':
    case 'Assign':
      return node.name;
    case 'This':
      return 'this';
    case 'Super':
      return 'super';
  }
}

/** Resolved references as [name, hops], in resolution order */
function distances(source: string): [string, number][] {
  const { locals, errors } = resolve(parse(source));
  expect(errors).toEqual([]);
  return [...locals].map(([node, hops]): [string, number] => [nodeName(node), hops]);
}

function errorIds(source: string): string[] {
  return resolve(parse(source)).errors.map((e) => e.errorId);
}

describe('Tarn Resolver', () => {
  describe('hop counts', () => {
    it('counts enclosing blocks', () => {
      expect(distances('{ var a = 1; { print a; } }')).toEqual([['a', 1]]);
    });

    it('leaves globals out of the table', () => {
      expect(distances('var g = 1; print g; g = 2;')).toEqual([]);
    });

    it('resolves parameters in the function scope', () => {
      expect(distances('fun f(x) { return x; }')).toEqual([['x', 0]]);
    });

    it('resolves captured variables through nested functions', () => {
      expect(
        distances('fun outer() { var a = 1; fun inner() { return a; } }')
      ).toEqual([['a', 1]]);
    });

    it('resolves assignment targets', () => {
      expect(distances('{ var a; a = 2; }')).toEqual([['a', 0]]);
    });

    it('resolves the innermost shadowing declaration', () => {
      expect(
        distances('var a = 1; { var a = 2; print a; } print a;')
      ).toEqual([['a', 0]]);
    });

    it('puts this one scope outside the method body', () => {
      expect(distances('class A { m() { return this; } }')).toEqual([
        ['this', 1],
      ]);
    });

    it('puts super one scope outside this', () => {
      expect(
        distances('class A {} class B < A { m() { return super.m; } }')
      ).toEqual([['super', 2]]);
    });

    it('scopes the for initializer around the body', () => {
      expect(
        distances('for (var i = 0; i < 1; i = i + 1) { print i; }')
      ).toEqual([
        ['i', 0],
        ['i', 0],
        ['i', 0],
        ['i', 1],
      ]);
    });

    it('lets a function refer to itself', () => {
      expect(distances('{ fun f() { f(); } }')).toEqual([['f', 1]]);
    });
  });

  describe('purity', () => {
    it('resolves the same tree to identical tables', () => {
      const ast = parse(
        'fun make() { var n = 0; fun inc() { n = n + 1; return n; } return inc; }'
      );
      const first = resolve(ast);
      const second = resolve(ast);

      expect([...second.locals]).toEqual([...first.locals]);
      expect(second.locals.size).toBe(4);
    });
  });

  describe('errors', () => {
    it('rejects reading a local in its own initializer', () => {
      const { errors } = resolve(parse('{ var a = a; }'));

      expect(errors).toHaveLength(1);
      expect(errors[0]?.errorId).toBe('TARN-S001');
      expect(errors[0]?.toData().message).toBe(
        "Can't read local variable in its own initializer."
      );
      expect(errors[0]?.where).toBe(" at 'a'");
    });

    it('allows a global to read itself in its initializer', () => {
      expect(errorIds('var a = a;')).toEqual([]);
    });

    it('allows redeclaring a local', () => {
      expect(errorIds('{ var a = 1; var a = 2; }')).toEqual([]);
    });

    it('rejects top-level return', () => {
      expect(errorIds('return 1;')).toEqual(['TARN-S002']);
    });

    it('rejects returning a value from an initializer', () => {
      expect(errorIds('class A { init() { return 1; } }')).toEqual([
        'TARN-S003',
      ]);
      expect(errorIds('class A { init() { return; } }')).toEqual([]);
    });

    it('rejects this outside a class', () => {
      expect(errorIds('print this;')).toEqual(['TARN-S004']);
      expect(errorIds('fun f() { return this; }')).toEqual(['TARN-S004']);
    });

    it('rejects super outside a class', () => {
      expect(errorIds('print super.x;')).toEqual(['TARN-S005']);
    });

    it('rejects super without a superclass', () => {
      expect(errorIds('class A { m() { super.m(); } }')).toEqual([
        'TARN-S006',
      ]);
    });

    it('rejects a class inheriting from itself', () => {
      const { errors } = resolve(parse('class A < A {}'));
      expect(errors.map((e) => e.errorId)).toEqual(['TARN-S007']);
      expect(errors[0]?.where).toBe(" at 'A'");
    });

    it('rejects break outside a loop', () => {
      expect(errorIds('break;')).toEqual(['TARN-S008']);
      expect(errorIds('while (true) break;')).toEqual([]);
      expect(
        errorIds('while (true) { fun g() { break; } }')
      ).toEqual(['TARN-S008']);
    });

    it('collects every error in source order', () => {
      const { errors } = resolve(parse('return;\n\nprint this;'));
      expect(errors.map((e) => [e.errorId, e.line])).toEqual([
        ['TARN-S002', 1],
        ['TARN-S004', 3],
      ]);
    });
  });
});
