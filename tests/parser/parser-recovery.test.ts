/**
 * Tarn Parser Recovery Tests
 * Panic-mode synchronization and non-unwinding errors
 */

import { describe, expect, it } from 'vitest';
import {
  MAX_ARITY,
  parse,
  parseWithRecovery,
  scan,
  parseTokens,
  toSExpr,
} from '../../src/index.js';

describe('Parser Recovery', () => {
  it('skips failed declarations and keeps the rest', () => {
    const result = parseWithRecovery(
      'print 1 +; print 2; var = 3; print 4;'
    );

    expect(result.success).toBe(false);
    expect(result.errors.map((e) => e.errorId)).toEqual([
      'TARN-P001',
      'TARN-P002',
    ]);
    expect(result.errors[1]?.toData().message).toBe('Expect variable name.');
    expect(toSExpr(result.ast)).toBe('(print 2)\n(print 4)');
  });

  it('recovers inside a block', () => {
    const result = parseWithRecovery('{ print ; }');

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.where).toBe(" at ';'");
    expect(toSExpr(result.ast)).toBe('(block)');
  });

  it('drops a block left open at end of input', () => {
    const result = parseWithRecovery('{ print 1;');

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.toData().message).toBe("Expect '}' after block.");
    expect(result.errors[0]?.where).toBe(' at end');
    expect(result.ast.statements).toEqual([]);
  });

  it('reports an invalid assignment target without unwinding', () => {
    const result = parseWithRecovery('a + b = c; print 1;');

    expect(result.errors.map((e) => e.errorId)).toEqual(['TARN-P003']);
    expect(result.errors[0]?.where).toBe(" at '='");
    expect(toSExpr(result.ast)).toBe('(expr (+ a b))\n(print 1)');
  });

  it('reports too many parameters and keeps the function', () => {
    const names = Array.from({ length: MAX_ARITY + 1 }, (_, i) => `p${i}`);
    const result = parseWithRecovery(`fun f(${names.join(', ')}) {}`);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.toData().message).toBe(
      "Can't have more than 255 parameters."
    );
    expect(result.errors[0]?.where).toBe(" at 'p255'");
    expect(result.ast.statements).toHaveLength(1);
  });

  it('reports too many arguments', () => {
    const args = Array.from({ length: MAX_ARITY + 1 }, () => '1');
    const result = parseWithRecovery(`f(${args.join(', ')});`);

    expect(result.errors.map((e) => e.toData().message)).toEqual([
      "Can't have more than 255 arguments.",
    ]);
  });

  it('accepts exactly the maximum arity', () => {
    const args = Array.from({ length: MAX_ARITY }, () => '1');
    expect(parseWithRecovery(`f(${args.join(', ')});`).success).toBe(true);
  });

  it('combines lexer and parse errors', () => {
    const result = parseWithRecovery('print @1; print ;');

    expect(result.errors.map((e) => e.errorId)).toEqual([
      'TARN-L002',
      'TARN-P001',
    ]);
    expect(toSExpr(result.ast)).toBe('(print 1)');
  });

  describe('nesting limit', () => {
    const nestedParens = (depth: number): string =>
      `print ${'('.repeat(depth)}1${')'.repeat(depth)};`;

    it('reports deeply nested expressions once and moves on', () => {
      const result = parseWithRecovery(`${nestedParens(20000)} print 2;`);

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.errorId).toBe('TARN-P005');
      expect(result.errors[0]?.toData().message).toBe('Too much nesting.');
      expect(result.errors[0]?.where).toBe(" at '('");
      expect(toSExpr(result.ast)).toBe('(print 2)');
    });

    it('reports deeply nested blocks once', () => {
      const result = parseWithRecovery(`${'{'.repeat(300)}${'}'.repeat(300)}`);

      expect(result.errors.map((e) => e.errorId)).toEqual(['TARN-P005']);
      expect(result.ast.statements).toEqual([]);
    });

    it('counts long operator chains as nesting', () => {
      const terms = (count: number): string =>
        Array.from({ length: count }, () => '1').join(' + ');

      expect(parseWithRecovery(`print ${terms(150)};`).success).toBe(true);
      expect(
        parseWithRecovery(`print ${terms(250)};`).errors.map((e) => e.where)
      ).toEqual([" at '+'"]);
    });

    it('accepts nesting below the limit', () => {
      expect(parseWithRecovery(nestedParens(150)).success).toBe(true);
      expect(parseWithRecovery('if (a) if (b) while (c) { { print 1; } }').success).toBe(
        true
      );
    });

    it('throws outside recovery mode', () => {
      expect(() => parse(nestedParens(20000))).toThrow('Too much nesting.');
    });
  });

  it('parses a token stream directly', () => {
    const result = parseTokens(scan('print 1;').tokens);
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });
});
