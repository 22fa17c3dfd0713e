/**
 * Tarn Printer Tests
 * Canonical source output and parse round-trips
 */

import { describe, expect, it } from 'vitest';
import { formatSource, parse, toSExpr } from '../../src/index.js';

const PROGRAMS = [
  'print 1 + 2 * (3 - 4) / -5;',
  'var a; var b = "text"; a = b = nil;',
  'fun f(a,b){if(a>b)return a;else{return b;}}',
  'class P<Q{init(x){this.x=-x;}get(){return super.get()+this.x;}}',
  'for(var i=0;i<2;i=i+1)print "s"+nil;',
  'for(;;){break;}',
  'while(!done and (x or y)){done=true;}',
  'obj.field.inner(1)(2).last = !false == true;',
  'print 1000000000000000000000;',
  'print 0.0000001;',
];

describe('Tarn Printer', () => {
  describe('formatSource', () => {
    it('prints canonical source with two-space indentation', () => {
      const source =
        'fun f(a,b){if(a>b)return a;else{return b;}}' +
        'class P<Q{init(x){this.x=-x;}}' +
        'for(var i=0;i<2;i=i+1)print "s"+nil;';

      expect(formatSource(parse(source))).toBe(
        [
          'fun f(a, b) {',
          '  if (a > b) return a; else {',
          '    return b;',
          '  }',
          '}',
          'class P < Q {',
          '  init(x) {',
          '    this.x = -x;',
          '  }',
          '}',
          'for (var i = 0; i < 2; i = i + 1) print "s" + nil;',
          '',
        ].join('\n')
      );
    });

    it('adds no parentheses beyond grouping', () => {
      expect(formatSource(parse('print (1+2)*-(3);'))).toBe(
        'print (1 + 2) * -(3);\n'
      );
    });

    it('prints empty bodies inline', () => {
      expect(formatSource(parse('class E{} fun g(){}'))).toBe(
        'class E {}\nfun g() {}\n'
      );
    });

    it('prints numbers canonically', () => {
      expect(formatSource(parse('print 1.50;'))).toBe('print 1.5;\n');
    });

    it('prints very large and very small numbers without exponents', () => {
      expect(formatSource(parse('print 1000000000000000000000;'))).toBe(
        'print 1000000000000000000000;\n'
      );
      expect(formatSource(parse('print 0.0000001;'))).toBe(
        'print 0.0000001;\n'
      );
      expect(formatSource(parse('print 0.00000015;'))).toBe(
        'print 0.00000015;\n'
      );
      expect(toSExpr(parse('print 2500000000000000000000;'))).toBe(
        '(print 2500000000000000000000)'
      );
    });

    it('prints empty for clauses', () => {
      expect(formatSource(parse('for(;x;)print 1;'))).toBe(
        'for (; x;) print 1;\n'
      );
    });

    it('prints a single statement or expression', () => {
      const [stmt] = parse('return;').statements;
      if (!stmt) throw new Error('expected a statement');
      expect(formatSource(stmt)).toBe('return;');

      const [print] = parse('print a.b;').statements;
      if (print?.type !== 'Print') throw new Error('expected print');
      expect(formatSource(print.expression)).toBe('a.b');
    });
  });

  describe('round trip', () => {
    it.each(PROGRAMS)('reparses printed source to the same tree: %s', (source) => {
      const first = parse(source);
      const printed = formatSource(first);
      const second = parse(printed);

      expect(toSExpr(second)).toBe(toSExpr(first));
      expect(formatSource(second)).toBe(printed);
    });
  });
});
