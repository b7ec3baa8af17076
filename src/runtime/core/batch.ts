/**
 * Batch Evaluation
 *
 * Evaluates every calculated field of one entity in dependency order,
 * threading freshly computed values into the snapshot seen by later
 * fields. One result per field: a failing field does not stop the batch,
 * but its dependants fail with an undefined-field error naming it.
 */

import { buildGraphFromReferences, topologicalOrder } from '../../analysis/dependency-graph.js';
import { compileFormula, type Formula, type FormulaCache } from '../../formula.js';
import { createRecord } from '../../records.js';
import type {
  CircularDependencyError,
  FieldSnapshot,
  FormulaError,
  FormulaNode,
  FormulaValue,
  Result,
} from '../../types.js';
import { fail, ok, TimeoutError } from '../../types.js';
import { evaluateNode } from './evaluate.js';
import type { EvaluationContext } from './types.js';

export interface EntityEvaluation {
  /** Calculated fields in the order they were evaluated */
  readonly order: readonly string[];
  /** One result per calculated field */
  readonly results: Readonly<Record<string, Result<FormulaValue>>>;
  /** Newly computed values only; the caller merges them into its snapshot */
  readonly values: Readonly<Record<string, FormulaValue>>;
  /** Fields whose formula failed to compile or evaluate */
  readonly failed: readonly string[];
}

export interface EntityEvaluationOptions {
  /** Reuse compiled formulas across batches */
  cache?: FormulaCache;
}

/**
 * Evaluate one calculated field, reporting observability events and
 * enforcing the context budget.
 */
export function evaluateField(
  field: string,
  ast: FormulaNode,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext
): Result<FormulaValue> {
  ctx.observability.onFieldStart?.({ field });
  const startTime = ctx.timer();

  let result: Result<FormulaValue> = evaluateNode(ast, snapshot, ctx);
  const durationMs = ctx.timer() - startTime;

  // Evaluation is not interrupted; an overrun is judged afterwards
  if (result.ok && ctx.budgetMs !== undefined && durationMs > ctx.budgetMs) {
    result = fail(new TimeoutError(field, ctx.budgetMs, durationMs));
  }

  if (!result.ok) {
    ctx.observability.onError?.({ error: result.error, field });
  }
  ctx.observability.onFieldEnd?.({ field, result, durationMs });
  return result;
}

/**
 * Evaluate `{ field id → formula text }` against `snapshot`.
 *
 * Fails as a whole only for a dependency cycle, since no order can be
 * established. A formula with a syntax error yields a failure for that
 * field and takes part in ordering without edges.
 */
export function evaluateEntity(
  formulas: Readonly<Record<string, string>>,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext,
  options: EntityEvaluationOptions = {}
): Result<EntityEvaluation, CircularDependencyError> {
  const compiled = new Map<string, Result<Formula, FormulaError>>();
  const references = createRecord<ReadonlySet<string>>();

  for (const [field, text] of Object.entries(formulas)) {
    const result = options.cache
      ? options.cache.compile(text)
      : compileFormula(text);
    compiled.set(field, result);
    references[field] = result.ok ? result.value.references : new Set();
  }

  const order = topologicalOrder(buildGraphFromReferences(references));
  if (!order.ok) {
    ctx.observability.onError?.({ error: order.error });
    return order;
  }

  const working = createRecord<FormulaValue>(Object.entries(snapshot));
  const results = createRecord<Result<FormulaValue>>();
  const values = createRecord<FormulaValue>();
  const failed: string[] = [];

  for (const field of order.value) {
    const formula = compiled.get(field);
    if (!formula) continue;

    let result: Result<FormulaValue>;
    if (formula.ok) {
      result = evaluateField(field, formula.value.ast, working, ctx);
    } else {
      result = formula;
      ctx.observability.onError?.({ error: formula.error, field });
    }
    results[field] = result;

    if (result.ok) {
      working[field] = result.value;
      values[field] = result.value;
    } else {
      // Dependants must see this field as undefined, not as a stale input
      delete working[field];
      failed.push(field);
    }
  }

  return ok({ order: order.value, results, values, failed });
}
