/**
 * Output Coercion Tests
 * Conversion of evaluated values to TEXT, NUMBER and BOOLEAN
 */

import { describe, expect, it } from 'vitest';

import {
  coerce,
  CoercionError,
  formatValue,
  isOutputTarget,
  type FormulaValue,
} from '../../src/index.js';

describe('Output Coercion', () => {
  describe('TEXT', () => {
    it.each<[FormulaValue, string]>([
      [15, '15.0'],
      [2.5, '2.5'],
      [-3, '-3.0'],
      ['abc', 'abc'],
      [true, 'true'],
      [false, 'false'],
      [null, ''],
    ])('%j renders as %j', (input, expected) => {
      expect(coerce(input, 'TEXT')).toEqual({ ok: true, value: expected });
    });

    it('very large whole numbers use exponent form', () => {
      expect(formatValue(1e21)).toBe('1e+21');
    });
  });

  describe('NUMBER', () => {
    it('accepts numbers unchanged', () => {
      expect(coerce(12.5, 'NUMBER')).toEqual({ ok: true, value: 12.5 });
      expect(coerce(0, 'NUMBER')).toEqual({ ok: true, value: 0 });
    });

    it('rejects booleans', () => {
      const result = coerce(true, 'NUMBER');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(CoercionError);
        expect(result.error.message).toBe('Cannot convert BOOLEAN to NUMBER');
      }
    });

    it('rejects numeric-looking text', () => {
      const result = coerce('42', 'NUMBER');
      expect(!result.ok && result.error.message).toBe(
        'Cannot convert TEXT to NUMBER'
      );
    });

    it('rejects null', () => {
      const result = coerce(null, 'NUMBER');
      expect(!result.ok && result.error.errorId).toBe('CALC-C001');
    });
  });

  describe('BOOLEAN', () => {
    it.each<[FormulaValue, boolean]>([
      [null, false],
      [true, true],
      [false, false],
      [0, false],
      [-1, true],
      ['', false],
      ['false', true],
    ])('%j converts to %j', (input, expected) => {
      expect(coerce(input, 'BOOLEAN')).toEqual({ ok: true, value: expected });
    });
  });

  it('recognizes output targets', () => {
    expect(isOutputTarget('TEXT')).toBe(true);
    expect(isOutputTarget('text')).toBe(false);
    expect(isOutputTarget(1)).toBe(false);
  });
});
