/**
 * Output Coercion
 *
 * TEXT and BOOLEAN accept every value. NUMBER accepts numbers only: a
 * boolean is not a number, numeric-looking text is not parsed, and null
 * has no numeric form.
 */

import type { FormulaValue, OutputTarget, Result } from '../../types.js';
import { CoercionError, fail, ok } from '../../types.js';
import { formatValue, isTruthy, valueKind } from './values.js';

/** Value produced for each output target */
export interface CoercedValueMap {
  TEXT: string;
  NUMBER: number;
  BOOLEAN: boolean;
}

export type CoercedValue = CoercedValueMap[OutputTarget];

export const OUTPUT_TARGETS: readonly OutputTarget[] = [
  'TEXT',
  'NUMBER',
  'BOOLEAN',
];

export function isOutputTarget(value: unknown): value is OutputTarget {
  return OUTPUT_TARGETS.some((target) => target === value);
}

/**
 * Convert an evaluated value to `target`.
 *
 * @example
 * coerce(12.5, 'NUMBER') // { ok: true, value: 12.5 }
 * coerce(null, 'TEXT')   // { ok: true, value: '' }
 * coerce(true, 'NUMBER') // { ok: false, error: CoercionError }
 */
export function coerce<T extends OutputTarget>(
  value: FormulaValue,
  target: T
): Result<CoercedValueMap[T], CoercionError>;
export function coerce(
  value: FormulaValue,
  target: OutputTarget
): Result<CoercedValue, CoercionError> {
  switch (target) {
    case 'TEXT':
      return ok(formatValue(value));
    case 'BOOLEAN':
      return ok(isTruthy(value));
    case 'NUMBER':
      if (typeof value === 'number') return ok(value);
      return fail(new CoercionError(valueKind(value), target));
  }
}
