/**
 * Built-in Function Tests
 */

import { describe, expect, it } from 'vitest';

import {
  createEvaluationContext,
  FunctionArgumentError,
  listFunctions,
  NonFiniteResultError,
  roundHalfEven,
} from '../../src/index.js';
import { failure, value } from '../helpers/runtime.js';

describe('Built-in Functions', () => {
  it('lists every built-in in sorted order', () => {
    expect(listFunctions(createEvaluationContext())).toEqual([
      'abs',
      'coalesce',
      'concat',
      'if_else',
      'is_empty',
      'lower',
      'max',
      'min',
      'now',
      'pow',
      'round',
      'strip',
      'sum',
      'upper',
    ]);
  });

  describe('abs', () => {
    it('returns the absolute value', () => {
      expect(value('abs(-5)')).toBe(5);
      expect(value('abs(2.5)')).toBe(2.5);
    });

    it('keeps null', () => {
      expect(value('abs(x)', { x: null })).toBe(null);
    });

    it('rejects text', () => {
      const error = failure('abs("x")');
      expect(error).toBeInstanceOf(FunctionArgumentError);
      expect(error.message).toBe(
        'abs(): expected value to be a number, got text at position 0'
      );
    });

    it('checks arity', () => {
      expect(failure('abs()').message).toBe(
        'abs(): expected 1 argument, got 0 at position 0'
      );
      expect(failure('abs(1, 2)').message).toBe(
        'abs(): expected 1 argument, got 2 at position 0'
      );
    });
  });

  describe('min and max', () => {
    it('pick among numbers', () => {
      expect(value('min(3, 1, 2)')).toBe(1);
      expect(value('max(3, 1, 2)')).toBe(3);
    });

    it('pick among text', () => {
      expect(value('min("pear", "apple")')).toBe('apple');
      expect(value('max("pear", "apple")')).toBe('pear');
    });

    it('ignore nulls', () => {
      expect(value('min(x, 4)', { x: null })).toBe(4);
    });

    it('return null with nothing to compare', () => {
      expect(value('max()')).toBe(null);
      expect(value('max(null, null)')).toBe(null);
    });

    it('reject mixed kinds', () => {
      expect(failure('max(1, "a")').message).toBe(
        'max(): cannot compare number and text at position 0'
      );
    });
  });

  describe('round', () => {
    it('rounds half to even', () => {
      expect(value('round(2.5)')).toBe(2);
      expect(value('round(3.5)')).toBe(4);
      expect(value('round(-2.5)')).toBe(-2);
    });

    it('rounds at the given digits', () => {
      expect(value('round(1.234, 2)')).toBe(1.23);
      expect(value('round(10 / 4, 1)')).toBe(2.5);
    });

    it('rejects fractional digits', () => {
      expect(failure('round(1, 0.5)').message).toBe(
        'round(): expected digits to be a whole number at position 0'
      );
    });

    it('allows at most two arguments', () => {
      expect(failure('round(1, 2, 3)').message).toBe(
        'round(): expected at most 2 arguments, got 3 at position 0'
      );
    });

    it('roundHalfEven works on plain numbers', () => {
      expect(roundHalfEven(0.5)).toBe(0);
      expect(roundHalfEven(1.5)).toBe(2);
      expect(roundHalfEven(2.675, 1)).toBe(2.7);
    });
  });

  describe('sum and pow', () => {
    it('sum skips nulls and is 0 when empty', () => {
      expect(value('sum(1, x, 2.5)', { x: null })).toBe(3.5);
      expect(value('sum()')).toBe(0);
    });

    it('sum rejects text', () => {
      expect(failure('sum(1, "2")').message).toBe(
        'sum(): expected argument 2 to be a number, got text at position 0'
      );
    });

    it('pow raises and propagates null', () => {
      expect(value('pow(2, 10)')).toBe(1024);
      expect(value('pow(x, 2)', { x: null })).toBe(null);
    });

    it('pow fails on overflow and on roots of negative numbers', () => {
      const overflow = failure('pow(10, 400)');
      expect(overflow).toBeInstanceOf(NonFiniteResultError);
      expect(overflow.message).toBe("'pow()' produced a non-finite result at position 0");
      expect(failure('pow(-8, 0.5)').errorId).toBe('CALC-R008');
    });

    it('sum fails when the total overflows', () => {
      expect(failure('sum(x, x)', { x: 1.7e308 }).message).toBe(
        "'sum()' produced a non-finite result at position 0"
      );
    });
  });

  describe('text functions', () => {
    it('upper, lower and strip', () => {
      expect(value('upper("core")')).toBe('CORE');
      expect(value('lower("CORE")')).toBe('core');
      expect(value('strip("  core  ")')).toBe('core');
    });

    it('convert non-text through its text form', () => {
      expect(value('upper(true)')).toBe('TRUE');
      expect(value('lower(5)')).toBe('5.0');
    });

    it('keep null', () => {
      expect(value('upper(x)', { x: null })).toBe(null);
    });

    it('concat joins text forms; null adds nothing', () => {
      expect(value('concat("BH-", n, x, "!")', { n: 7, x: null })).toBe('BH-7.0!');
    });
  });

  describe('conditionals and emptiness', () => {
    it('if_else picks by truthiness', () => {
      expect(value('if_else(depth > 10, "deep", "shallow")', { depth: 12 })).toBe('deep');
      expect(value('if_else("", 1, 2)')).toBe(2);
    });

    it('if_else evaluates both branches', () => {
      expect(failure('if_else(true, 1, 1 / 0)').errorId).toBe('CALC-R003');
    });

    it('is_empty is true for null and blank text only', () => {
      expect(value('is_empty(null)')).toBe(true);
      expect(value('is_empty("  ")')).toBe(true);
      expect(value('is_empty(0)')).toBe(false);
      expect(value('is_empty(false)')).toBe(false);
    });

    it('coalesce returns the first non-null', () => {
      expect(value('coalesce(a, b, 3)', { a: null, b: 0 })).toBe(0);
      expect(value('coalesce(null)')).toBe(null);
    });
  });

  describe('now', () => {
    it('reads the context clock', () => {
      const clock = () => new Date('2024-03-01T08:30:00.000Z');
      expect(value('now()', {}, { clock })).toBe('2024-03-01T08:30:00.000Z');
    });

    it('takes no arguments', () => {
      expect(failure('now(1)').message).toBe(
        'now(): expected 0 arguments, got 1 at position 0'
      );
    });
  });
});
