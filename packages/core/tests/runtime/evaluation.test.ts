/**
 * Runtime Tests: Evaluation
 * Operators, type checks, variables, and printing
 */

import { describe, expect, it } from 'vitest';
import { ErrorState } from '../../src/index.js';
import { run, runFull, runPrinted, runUntilError } from '../helpers/runtime.js';

/** Formatted message of the error that stops `source` */
function runtimeError(source: string): string {
  const { error } = runUntilError(source);
  if (!(error instanceof ErrorState)) throw error;
  expect(error.phase).toBe('runtime');
  return error.format();
}

describe('Runtime: evaluation', () => {
  describe('arithmetic', () => {
    it('adds, subtracts, multiplies and divides numbers', () => {
      expect(run('1 + 2;')).toBe(3);
      expect(run('10 - 4;')).toBe(6);
      expect(run('3 * 4;')).toBe(12);
      expect(run('9 / 2;')).toBe(4.5);
    });

    it('honours precedence and grouping', () => {
      expect(run('1 + 2 * 3;')).toBe(7);
      expect(run('(1 + 2) * 3;')).toBe(9);
      expect(run('1 - 2 - 3;')).toBe(-4);
    });

    it('rounds results to 32-bit floats', () => {
      expect(run('0.1 + 0.2;')).toBe(Math.fround(Math.fround(0.1) + Math.fround(0.2)));
      expect(run('16777216 + 1;')).toBe(16777216);
    });

    it('divides by zero without an error', () => {
      expect(run('1 / 0;')).toBe(Infinity);
      expect(run('-1 / 0;')).toBe(-Infinity);
      expect(run('0 / 0;')).toBeNaN();
    });

    it('concatenates strings', () => {
      expect(run('"foo" + "bar";')).toBe('foobar');
    });

    it('negates numbers', () => {
      expect(run('-(2 + 3);')).toBe(-5);
    });
  });

  describe('comparison and equality', () => {
    it('compares numbers', () => {
      expect(run('1 < 2;')).toBe(true);
      expect(run('2 <= 2;')).toBe(true);
      expect(run('1 > 2;')).toBe(false);
      expect(run('3 >= 4;')).toBe(false);
    });

    it('compares values of the same type', () => {
      expect(run('"a" == "a";')).toBe(true);
      expect(run('true != false;')).toBe(true);
      expect(run('nil == nil;')).toBe(true);
      expect(run('2 == 2.0;')).toBe(true);
    });

    it('treats values of different types as unequal', () => {
      expect(run('1 == "1";')).toBe(false);
      expect(run('nil == false;')).toBe(false);
      expect(run('0 != nil;')).toBe(true);
    });

    it('treats NaN as unequal to itself', () => {
      expect(run('var n = 0 / 0; n == n;')).toBe(false);
    });

    it('inverts booleans', () => {
      expect(run('!true;')).toBe(false);
      expect(run('!(1 > 2);')).toBe(true);
    });
  });

  describe('type errors', () => {
    it('rejects adding a number and a boolean', () => {
      expect(runtimeError('1 + true;')).toBe(
        '[1]: can only add numbers or strings'
      );
    });

    it('rejects adding a string and a number', () => {
      expect(runtimeError('"a" + 1;')).toBe(
        '[1]: can only add numbers or strings'
      );
    });

    it('rejects comparing strings', () => {
      expect(runtimeError('"a" < "b";')).toBe('[1]: can only compare numbers');
    });

    it('names the failing arithmetic operation', () => {
      expect(runtimeError('"a" - 1;')).toBe('[1]: can only subtract numbers');
      expect(runtimeError('nil / 1;')).toBe('[1]: can only divide numbers');
      expect(runtimeError('true * 2;')).toBe('[1]: can only multiply numbers');
    });

    it('rejects negating a non-number', () => {
      expect(runtimeError('-"a";')).toBe(
        '[1]: - can only be applied to numbers'
      );
    });

    it('rejects inverting a non-boolean', () => {
      expect(runtimeError('!nil;')).toBe(
        '[1]: ! can only be applied to booleans'
      );
      expect(runtimeError('!0;')).toBe('[1]: ! can only be applied to booleans');
    });

    it('reports the line of the failing expression', () => {
      expect(runtimeError('print 1;\n\nprint 2 +\n"x";')).toBe(
        '[3]: can only add numbers or strings'
      );
    });
  });

  describe('variables', () => {
    it('reads a declared variable', () => {
      expect(runPrinted('var x = 1; print x + 1;')).toEqual([2]);
    });

    it('rebinds a name on redeclaration', () => {
      expect(runFull('var x = 1; var x = "two";').variables).toEqual({
        x: 'two',
      });
    });

    it('binds nil', () => {
      expect(runFull('var nothing = nil;').variables).toEqual({
        nothing: null,
      });
    });

    it('evaluates the initializer before binding', () => {
      expect(run('var n = 2; var n = n * n; n;')).toBe(4);
    });

    it('reports an undefined variable', () => {
      expect(runtimeError('print y;')).toBe('[1]: undefined variable: y');
    });

    it('keeps names that shadow object properties in the snapshot', () => {
      const { variables } = runFull('var __proto__ = 1; var y = 2;');
      expect(Object.keys(variables)).toEqual(['__proto__', 'y']);
      expect(Object.getOwnPropertyDescriptor(variables, '__proto__')?.value).toBe(
        1
      );
    });

    it('reads host-supplied variables', () => {
      expect(run('greeting + "!";', { variables: { greeting: 'hi' } })).toBe(
        'hi!'
      );
    });
  });

  describe('statements', () => {
    it('prints values in order', () => {
      expect(runPrinted('print 1; print "two"; print true; print nil;')).toEqual(
        [1, 'two', true, null]
      );
    });

    it('does not print expression statements', () => {
      expect(runPrinted('1 + 1;')).toEqual([]);
    });

    it('returns the value of the last declaration', () => {
      expect(run('var a = 5; a * 2;')).toBe(10);
      expect(run('print "out";')).toBe('out');
    });

    it('returns nil for an empty program', () => {
      expect(runFull('')).toEqual({ value: null, variables: {} });
    });

    it('evaluates a literal to an equal value every time', () => {
      expect(run('"same";')).toBe(run('"same";'));
      expect(run('2.5;')).toBe(run('2.5;'));
    });
  });

  describe('fatal stop', () => {
    it('runs nothing after a runtime error', () => {
      const { printed, ctx } = runUntilError(
        'print 1; var a = 1; print missing; var b = 2; print 3;'
      );
      expect(printed).toEqual([1]);
      expect([...ctx.variables.keys()]).toEqual(['a']);
    });

    it('stops on an error in an expression statement', () => {
      const { printed } = runUntilError('print 1; 1 + nil; print 2;');
      expect(printed).toEqual([1]);
    });
  });
});
