/**
 * Test utilities for formula runtime tests
 */

import {
  createEvaluationContext,
  evaluateFormula,
  parse,
  type EvaluationOptions,
  type FieldSnapshot,
  type FormulaError,
  type FormulaNode,
  type FormulaValue,
  type Result,
} from '../../src/index.js';

/** Evaluate formula text and return the full Result */
export function run(
  source: string,
  fields: FieldSnapshot = {},
  options: EvaluationOptions = {}
): Result<FormulaValue> {
  return evaluateFormula(source, fields, createEvaluationContext(options));
}

/** Evaluate formula text and return its value; fails the test on error */
export function value(
  source: string,
  fields: FieldSnapshot = {},
  options: EvaluationOptions = {}
): FormulaValue {
  const result = run(source, fields, options);
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.message}`);
  }
  return result.value;
}

/** Evaluate formula text and return its error; fails the test on success */
export function failure(
  source: string,
  fields: FieldSnapshot = {},
  options: EvaluationOptions = {}
): FormulaError {
  const result = run(source, fields, options);
  if (result.ok) {
    throw new Error(`Expected failure, got ${String(result.value)}`);
  }
  return result.error;
}

/** Parse formula text; fails the test on a syntax error */
export function ast(source: string): FormulaNode {
  const result = parse(source);
  if (!result.ok) {
    throw new Error(`Expected parse success, got ${result.error.message}`);
  }
  return result.value;
}

/** Unwrap a Result; fails the test on error */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.message}`);
  }
  return result.value;
}

/** Timer returning the given readings in order, then the last one forever */
export function scriptedTimer(...readings: number[]): () => number {
  let i = 0;
  return () => {
    const reading = readings[Math.min(i, readings.length - 1)] ?? 0;
    i++;
    return reading;
  };
}
