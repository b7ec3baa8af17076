/**
 * Formula Execution
 * Compile-and-evaluate convenience for a single formula text
 */

import { compileFormula, type FormulaCache } from '../../formula.js';
import type { FieldSnapshot, FormulaValue, Result } from '../../types.js';
import { evaluate } from './evaluate.js';
import type { EvaluationContext } from './types.js';

/**
 * Parse and evaluate `text` against `snapshot`.
 * Syntax errors and evaluation errors both arrive as failures; onError is
 * emitted for either.
 *
 * @example
 * evaluateFormula('round(total / count, 2)', { total: 10, count: 3 }, ctx)
 * // { ok: true, value: 3.33 }
 */
export function evaluateFormula(
  text: string,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext,
  cache?: FormulaCache
): Result<FormulaValue> {
  const compiled = cache ? cache.compile(text) : compileFormula(text);
  if (!compiled.ok) {
    ctx.observability.onError?.({ error: compiled.error });
    return compiled;
  }
  return evaluate(compiled.value.ast, snapshot, ctx);
}
