/**
 * Formula Evaluator Tests
 * Operators, truthiness, short-circuiting and runtime errors
 */

import { describe, expect, it, vi } from 'vitest';

import {
  createEvaluationContext,
  DivisionByZeroError,
  evaluate,
  NonFiniteResultError,
  TypeMismatchError,
  UndefinedFieldError,
  UnknownFunctionError,
} from '../../src/index.js';
import { ast, failure, value } from '../helpers/runtime.js';

describe('Formula Evaluator', () => {
  describe('literals and fields', () => {
    it('literals evaluate to themselves', () => {
      expect(value('42')).toBe(42);
      expect(value('"abc"')).toBe('abc');
      expect(value('true')).toBe(true);
      expect(value('null')).toBe(null);
    });

    it('reads fields from the snapshot', () => {
      expect(value('depth_from + depth_to', { depth_from: 5, depth_to: 10 })).toBe(15);
    });

    it('a null field is defined', () => {
      expect(value('x', { x: null })).toBe(null);
    });

    it('a missing field is an error naming it', () => {
      const error = failure('depth_from + depth_to', { depth_from: 5 });
      expect(error).toBeInstanceOf(UndefinedFieldError);
      expect(error.message).toBe("Field 'depth_to' is not defined at position 13");
    });

    it('prototype names are not inherited fields', () => {
      expect(failure('constructor').errorId).toBe('CALC-R001');
    });

    it('does not modify the snapshot', () => {
      const snapshot = Object.freeze({ a: 1 });
      expect(value('a + 1', snapshot)).toBe(2);
      expect(snapshot).toEqual({ a: 1 });
    });
  });

  describe('arithmetic', () => {
    it('follows precedence', () => {
      expect(value('2 + 3 * 4')).toBe(14);
      expect(value('(2 + 3) * 4')).toBe(20);
    });

    it('power is right-associative', () => {
      expect(value('2 ** 3 ** 2')).toBe(512);
    });

    it('unary minus applies before power', () => {
      expect(value('-2 ** 2')).toBe(4);
    });

    it('division yields fractions', () => {
      expect(value('7 / 2')).toBe(3.5);
    });

    it('modulo takes the sign of the divisor', () => {
      expect(value('7 % 3')).toBe(1);
      expect(value('-7 % 3')).toBe(2);
      expect(value('7 % -3')).toBe(-2);
    });

    it('division by zero fails', () => {
      const error = failure('x / 0', { x: 4 });
      expect(error).toBeInstanceOf(DivisionByZeroError);
      expect(error.message).toBe("Division by zero in '/' at position 0");
    });

    it('modulo by zero fails', () => {
      expect(failure('x % 0', { x: 4 }).errorId).toBe('CALC-R003');
    });

    it('a fractional power of a negative number fails', () => {
      const error = failure('(0 - 8) ** 0.5');
      expect(error).toBeInstanceOf(NonFiniteResultError);
      expect(error.message).toBe("'**' produced a non-finite result at position 1");
    });

    it('overflow to infinity fails', () => {
      expect(failure('10 ** 400').message).toBe(
        "'**' produced a non-finite result at position 0"
      );
      expect(failure('x * x', { x: 1e200 }).errorId).toBe('CALC-R008');
      expect(failure('x + x', { x: 1.7e308 }).errorId).toBe('CALC-R008');
    });

    it('text operands are rejected', () => {
      const error = failure('"a" + 1');
      expect(error).toBeInstanceOf(TypeMismatchError);
      expect(error.message).toBe(
        "Operator '+' cannot be applied to text and number at position 0"
      );
    });

    it('booleans are not numbers', () => {
      expect(failure('true + 1').message).toBe(
        "Operator '+' cannot be applied to boolean and number at position 0"
      );
    });

    it('null operands are rejected', () => {
      expect(failure('x * 2', { x: null }).errorId).toBe('CALC-R002');
    });

    it('unary minus requires a number', () => {
      expect(failure('-"5"').message).toBe(
        "Operator '-' cannot be applied to text at position 0"
      );
    });

    it('unary plus keeps the number', () => {
      expect(value('+x', { x: -3 })).toBe(-3);
    });

    it('deeply nested formulas fail as syntax errors', () => {
      const error = failure('('.repeat(5000) + '1' + ')'.repeat(5000));
      expect(error.errorId).toBe('CALC-P004');
      expect(failure(Array.from({ length: 5000 }, () => 'x').join(' + '), { x: 1 }).errorId).toBe(
        'CALC-P004'
      );
    });
  });

  describe('comparison', () => {
    it('compares numbers', () => {
      expect(value('1 < 2')).toBe(true);
      expect(value('2 <= 2')).toBe(true);
      expect(value('3 > 4')).toBe(false);
      expect(value('4 >= 5')).toBe(false);
    });

    it('compares text lexicographically', () => {
      expect(value('"apple" < "banana"')).toBe(true);
    });

    it('ordering across kinds fails', () => {
      expect(failure('1 < "2"').message).toBe(
        "Operator '<' cannot be applied to number and text at position 0"
      );
    });

    it('equality across kinds is false, never an error', () => {
      expect(value('1 == "1"')).toBe(false);
      expect(value('1 == true')).toBe(false);
      expect(value('0 != ""')).toBe(true);
      expect(value('null == null')).toBe(true);
    });

    it('chained comparison compares a boolean with a number', () => {
      expect(failure('1 < 2 < 3').errorId).toBe('CALC-R002');
    });
  });

  describe('logic', () => {
    it('not uses truthiness', () => {
      expect(value('not 0')).toBe(true);
      expect(value('not ""')).toBe(true);
      expect(value('not null')).toBe(true);
      expect(value('not "x"')).toBe(false);
      expect(value('not 0.5')).toBe(false);
    });

    it('and/or return the deciding operand', () => {
      expect(value('0 or "fallback"')).toBe('fallback');
      expect(value('"first" or "second"')).toBe('first');
      expect(value('"" and 1')).toBe('');
      expect(value('1 and 2')).toBe(2);
    });

    it('or short-circuits past an undefined field', () => {
      expect(value('true or missing')).toBe(true);
    });

    it('and short-circuits past a division by zero', () => {
      expect(value('b != 0 and a / b', { a: 1, b: 0 })).toBe(false);
    });

    it('short-circuiting skips function calls', () => {
      const fn = vi.fn(() => 1);
      const result = value('false and probe()', {}, {
        functions: { probe: { params: [], fn } },
      });
      expect(result).toBe(false);
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe('function calls', () => {
    it('dispatches to built-ins', () => {
      expect(value('abs(-5)')).toBe(5);
      expect(value('min(3, 1, 2)')).toBe(1);
    });

    it('unknown function fails after its arguments evaluate', () => {
      const error = failure('nope(1)');
      expect(error).toBeInstanceOf(UnknownFunctionError);
      expect(error.message).toBe("Unknown function 'nope' at position 0");
    });

    it('argument errors take precedence over the unknown name', () => {
      expect(failure('nope(missing)').errorId).toBe('CALC-R001');
    });

    it('evaluates arguments left to right', () => {
      const seen: number[] = [];
      value('pair(tap(1), tap(2))', {}, {
        functions: {
          tap: {
            params: [{ name: 'n' }],
            fn: ([n = null]) => {
              if (typeof n === 'number') seen.push(n);
              return n;
            },
          },
          pair: { params: [{ name: 'a' }, { name: 'b' }], fn: () => null },
        },
      });
      expect(seen).toEqual([1, 2]);
    });

    it('the first failing argument aborts the call', () => {
      expect(failure('max(1 / 0, missing)').errorId).toBe('CALC-R003');
    });
  });

  describe('evaluate()', () => {
    it('reports failures to onError', () => {
      const onError = vi.fn();
      const ctx = createEvaluationContext({ observability: { onError } });
      const result = evaluate(ast('x'), {}, ctx);
      expect(result.ok).toBe(false);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]?.error.errorId).toBe('CALC-R001');
    });

    it('does not call onError on success', () => {
      const onError = vi.fn();
      const ctx = createEvaluationContext({ observability: { onError } });
      expect(evaluate(ast('1 + 1'), {}, ctx)).toEqual({ ok: true, value: 2 });
      expect(onError).not.toHaveBeenCalled();
    });
  });
});
