/**
 * Result Type
 * Success-or-failure return value for every fallible operation
 */

import type { FormulaError } from './error-classes.js';

export type Result<T, E extends FormulaError = FormulaError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E extends FormulaError>(
  error: E
): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
