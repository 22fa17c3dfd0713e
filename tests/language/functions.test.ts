/**
 * Tarn Language Tests: Functions and Closures
 */

import { describe, expect, it } from 'vitest';
import { runScript } from '../helpers/runtime.js';

describe('Tarn Language: Functions', () => {
  it('returns nil when falling off the end', () => {
    expect(runScript('fun f() {} print f();')).toEqual(['nil']);
  });

  it('returns nil from a bare return', () => {
    expect(runScript('fun f() { return; print "unreached"; } print f();')).toEqual([
      'nil',
    ]);
  });

  it('passes arguments by position', () => {
    expect(
      runScript('fun sub(a, b) { return a - b; } print sub(5, 2);')
    ).toEqual(['3']);
  });

  it('prints functions and natives', () => {
    expect(runScript('fun f() {} print f; print clock;')).toEqual([
      '<fn f>',
      '<native fn>',
    ]);
  });

  it('recurses', () => {
    const source = `
      fun fib(n) {
        if (n < 2) return n;
        return fib(n - 1) + fib(n - 2);
      }
      print fib(10);
    `;
    expect(runScript(source)).toEqual(['55']);
  });

  it('returns from inside loops', () => {
    const source = `
      fun first() {
        for (var i = 0; ; i = i + 1) {
          if (i == 3) return i;
        }
      }
      fun second() { while (true) return "done"; }
      print first();
      print second();
    `;
    expect(runScript(source)).toEqual(['3', 'done']);
  });

  describe('closures', () => {
    it('keep their own captured state', () => {
      const source = `
        fun makeCounter() {
          var i = 0;
          fun count() {
            i = i + 1;
            return i;
          }
          return count;
        }
        var c = makeCounter();
        print c();
        print c();
        var d = makeCounter();
        print d();
      `;
      expect(runScript(source)).toEqual(['1', '2', '1']);
    });

    it('capture each for iteration separately', () => {
      const source = `
        var f0; var f1; var f2;
        for (var i = 0; i < 3; i = i + 1) {
          fun show() { print i; }
          if (i == 0) f0 = show;
          if (i == 1) f1 = show;
          if (i == 2) f2 = show;
        }
        f0();
        f1();
        f2();
      `;
      expect(runScript(source)).toEqual(['0', '1', '2']);
    });

    it('share a variable between sibling closures', () => {
      const source = `
        var get; var set;
        {
          var shared = "a";
          fun g() { return shared; }
          fun s(v) { shared = v; }
          get = g;
          set = s;
        }
        set("b");
        print get();
      `;
      expect(runScript(source)).toEqual(['b']);
    });
  });

  describe('natives', () => {
    it('reads the configured clock', () => {
      expect(runScript('print clock();', { clock: () => 42 })).toEqual(['42']);
    });

    it('calls host functions', () => {
      const output = runScript('print double(4);', {
        functions: {
          double: {
            arity: 1,
            fn: ([x]) => (typeof x === 'number' ? x * 2 : null),
          },
        },
      });
      expect(output).toEqual(['8']);
    });
  });
});
