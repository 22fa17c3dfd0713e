/**
 * Tarn Parser Tests
 * Precedence, statement forms and error reporting
 */

import { describe, expect, it } from 'vitest';
import { parse, ParseError, toSExpr } from '../../src/index.js';

function sexpr(source: string): string {
  return toSExpr(parse(source));
}

describe('Tarn Parser', () => {
  describe('expressions', () => {
    it('binds factor tighter than term', () => {
      expect(sexpr('print 1 + 2 * 3;')).toBe('(print (+ 1 (* 2 3)))');
    });

    it('associates binary operators to the left', () => {
      expect(sexpr('1 - 2 - 3;')).toBe('(expr (- (- 1 2) 3))');
    });

    it('keeps grouping nodes', () => {
      expect(sexpr('(1 + 2) * 3;')).toBe('(expr (* (group (+ 1 2)) 3))');
    });

    it('nests unary operators', () => {
      expect(sexpr('!!true; -x;')).toBe('(expr (! (! true)))\n(expr (- x))');
    });

    it('ranks comparison above equality', () => {
      expect(sexpr('a < b == c >= d;')).toBe('(expr (== (< a b) (>= c d)))');
    });

    it('ranks and above or', () => {
      expect(sexpr('a or b and c;')).toBe('(expr (or a (and b c)))');
    });

    it('associates assignment to the right', () => {
      expect(sexpr('a = b = 1;')).toBe('(expr (= a (= b 1)))');
    });

    it('turns an assigned property get into a set', () => {
      expect(sexpr('obj.x.y = 3;')).toBe('(expr (.= (. obj x) y 3))');
    });

    it('chains calls', () => {
      expect(sexpr('f(1, 2)(3);')).toBe('(expr (call (call f 1 2) 3))');
    });

    it('parses literals', () => {
      expect(sexpr('print nil == false;')).toBe('(print (== nil false))');
      expect(sexpr('print 2.50;')).toBe('(print 2.5)');
      expect(sexpr('print "a b";')).toBe('(print "a b")');
    });
  });

  describe('statements', () => {
    it('parses variable declarations', () => {
      expect(sexpr('var a; var b = "s";')).toBe('(var a)\n(var b "s")');
    });

    it('parses blocks', () => {
      expect(sexpr('{ var x = 1; print x; }')).toBe(
        '(block (var x 1) (print x))'
      );
    });

    it('parses if with else', () => {
      expect(sexpr('if (a) print 1; else print 2;')).toBe(
        '(if a (print 1) (print 2))'
      );
    });

    it('binds a dangling else to the nearest if', () => {
      expect(sexpr('if (a) if (b) print 1; else print 2;')).toBe(
        '(if a (if b (print 1) (print 2)))'
      );
    });

    it('parses while loops', () => {
      expect(sexpr('while (x) x = x - 1;')).toBe(
        '(while x (expr (= x (- x 1))))'
      );
    });

    it('parses for loops with every clause', () => {
      expect(sexpr('for (var i = 0; i < 3; i = i + 1) print i;')).toBe(
        '(for (var i 0) (< i 3) (= i (+ i 1)) (print i))'
      );
    });

    it('parses for loops with empty clauses', () => {
      expect(sexpr('for (;;) break;')).toBe('(for nil nil nil (break))');
    });

    it('parses function declarations', () => {
      expect(sexpr('fun add(a, b) { return a + b; }')).toBe(
        '(fun add (a b) (return (+ a b)))'
      );
    });

    it('parses bare return', () => {
      expect(sexpr('fun f() { return; }')).toBe('(fun f () (return))');
    });

    it('parses classes with a superclass', () => {
      expect(
        sexpr('class A < B { m() { return super.m(this); } }')
      ).toBe('(class A < B (method m () (return (call (super m) this))))');
    });
  });

  describe('spans', () => {
    it('covers a statement through its semicolon', () => {
      const [stmt] = parse('print 1 + 2;').statements;
      expect(stmt?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 13, offset: 12 },
      });
    });

    it('runs a call span from callee to closing paren', () => {
      const [stmt] = parse('foo(1);').statements;
      if (stmt?.type !== 'ExpressionStmt') throw new Error('expected expr');
      expect(stmt.expression.span.start.column).toBe(1);
      expect(stmt.expression.span.end.column).toBe(7);
    });
  });

  describe('errors', () => {
    it('expects an expression', () => {
      try {
        parse('print ;');
        expect.fail('Should have thrown');
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        expect(err.errorId).toBe('TARN-P001');
        expect(err.toData().message).toBe('Expect expression.');
        expect(err.where).toBe(" at ';'");
      }
    });

    it('reports a missing token at end of input', () => {
      try {
        parse('var x = 1');
        expect.fail('Should have thrown');
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        expect(err.errorId).toBe('TARN-P002');
        expect(err.toData().message).toBe(
          "Expect ';' after variable declaration."
        );
        expect(err.where).toBe(' at end');
      }
    });

    it('rejects an invalid assignment target', () => {
      expect(() => parse('1 = 2;')).toThrow('Invalid assignment target.');
    });

    it('requires a method name after super', () => {
      expect(() => parse('super;')).toThrow("Expect '.' after 'super'.");
    });
  });
});
