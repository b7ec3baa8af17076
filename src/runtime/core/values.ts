/**
 * Formula Values
 * Kinds, truthiness, equality and text rendering of runtime values
 */

import type { FormulaValue, ValueKind } from '../../types.js';

/** Semantic kind of a value; booleans are never numbers */
export function valueKind(value: FormulaValue): ValueKind {
  if (value === null) return 'null';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  return 'text';
}

/**
 * Truthiness shared by `and`, `or`, `not` and BOOLEAN coercion:
 * null, false, 0 and empty text are falsy; everything else is truthy.
 */
export function isTruthy(value: FormulaValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return value.length > 0;
}

/**
 * Equality for `==` and `!=`.
 * Values of different kinds are never equal: 1 == true and 0 == "" are false.
 */
export function valuesEqual(a: FormulaValue, b: FormulaValue): boolean {
  if (valueKind(a) !== valueKind(b)) return false;
  return a === b;
}

/**
 * Text representation of a value.
 * Numbers are double precision throughout, so whole numbers keep one
 * decimal place (15 renders as "15.0"). Null renders as empty text.
 */
export function formatValue(value: FormulaValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Number.isInteger(value) && Math.abs(value) < 1e16) {
    return value.toFixed(1);
  }
  return String(value);
}
