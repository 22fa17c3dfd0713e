/**
 * Tarn Language Tests: Classes and Inheritance
 */

import { describe, expect, it } from 'vitest';
import { runScript } from '../helpers/runtime.js';

describe('Tarn Language: Classes', () => {
  it('prints classes and instances', () => {
    expect(runScript('class A {} print A; print A();')).toEqual([
      'A',
      'A instance',
    ]);
  });

  it('stores fields on instances', () => {
    expect(
      runScript('class P {} var p = P(); p.x = 1; print p.x;')
    ).toEqual(['1']);
  });

  it('shares instances by reference', () => {
    expect(
      runScript('class P {} var a = P(); var b = a; b.x = 3; print a.x;')
    ).toEqual(['3']);
  });

  it('compares instances by identity', () => {
    expect(
      runScript('class P {} var a = P(); print a == a; print a == P();')
    ).toEqual(['true', 'false']);
  });

  it('runs init with constructor arguments', () => {
    const source = `
      class Counter {
        init(n) { this.n = n; }
        get() { return this.n; }
      }
      print Counter(5).get();
    `;
    expect(runScript(source)).toEqual(['5']);
  });

  it('returns the instance from a direct init call', () => {
    const source = `
      class C { init() { this.v = 1; return; } }
      var c = C();
      print c.init();
      print c.init() == c;
    `;
    expect(runScript(source)).toEqual(['C instance', 'true']);
  });

  it('binds methods to their receiver', () => {
    const source = `
      class C {
        init() { this.v = "me"; }
        say() { print this.v; }
      }
      var m = C().say;
      m();
      print m;
    `;
    expect(runScript(source)).toEqual(['me', '<fn say>']);
  });

  it('lets fields shadow methods', () => {
    const source = `
      class C { m() { return "method"; } }
      var c = C();
      c.m = "field";
      print c.m;
    `;
    expect(runScript(source)).toEqual(['field']);
  });

  describe('inheritance', () => {
    it('inherits methods', () => {
      expect(
        runScript('class A { hi() { return "A"; } } class B < A {} print B().hi();')
      ).toEqual(['A']);
    });

    it('inherits init', () => {
      const source = `
        class A { init(x) { this.x = x; } }
        class B < A {}
        print B(7).x;
      `;
      expect(runScript(source)).toEqual(['7']);
    });

    it('keeps the subclass receiver through super', () => {
      const source = `
        class A {
          name() { return "A"; }
          describe() { return "I am " + this.name(); }
        }
        class B < A {
          name() { return "B"; }
          describe() { return super.describe() + "!"; }
        }
        print B().describe();
      `;
      expect(runScript(source)).toEqual(['I am B!']);
    });

    it('resolves super from the declaring class', () => {
      const source = `
        class A { m() { return "A"; } }
        class B < A { m() { return "B" + super.m(); } }
        class C < B { m() { return "C" + super.m(); } }
        print C().m();
      `;
      expect(runScript(source)).toEqual(['CBA']);
    });
  });
});
