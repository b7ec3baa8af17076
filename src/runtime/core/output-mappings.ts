/**
 * Output Mappings
 *
 * A calculated field may declare several (formula, target) mappings. They
 * are tried in order and the first one that evaluates and coerces wins.
 * When none does, every attempt is reported together.
 */

import { compileFormula, type FormulaCache } from '../../formula.js';
import { createRecord } from '../../records.js';
import type {
  FieldSnapshot,
  FormulaError,
  OutputMappingAttempt,
  OutputTarget,
  Result,
} from '../../types.js';
import { fail, ok, OutputMappingError } from '../../types.js';
import { evaluateField } from './batch.js';
import { coerce, type CoercedValue } from './coerce.js';
import type { EvaluationContext } from './types.js';

export interface OutputMapping {
  readonly formula: string;
  readonly target: OutputTarget;
}

export interface MappedOutput {
  readonly value: CoercedValue;
  readonly target: OutputTarget;
  /** Position of the winning mapping */
  readonly index: number;
}

export interface MappingOptions {
  /** Name reported in errors and observability events */
  fieldName?: string;
  cache?: FormulaCache;
}

function attempt(
  mapping: OutputMapping,
  field: string,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext,
  cache: FormulaCache | undefined
): Result<CoercedValue, FormulaError> {
  const compiled = cache ? cache.compile(mapping.formula) : compileFormula(mapping.formula);
  if (!compiled.ok) return compiled;

  const evaluated = evaluateField(field, compiled.value.ast, snapshot, ctx);
  if (!evaluated.ok) return evaluated;

  return coerce(evaluated.value, mapping.target);
}

/**
 * Try `mappings` in order against `snapshot`.
 *
 * @example
 * evaluateOutputMappings(
 *   [{ formula: 'label', target: 'NUMBER' }, { formula: 'label', target: 'TEXT' }],
 *   { label: 'A1' },
 *   ctx
 * ) // { ok: true, value: { value: 'A1', target: 'TEXT', index: 1 } }
 */
export function evaluateOutputMappings(
  mappings: readonly OutputMapping[],
  snapshot: FieldSnapshot,
  ctx: EvaluationContext,
  options: MappingOptions = {}
): Result<MappedOutput, OutputMappingError> {
  const field = options.fieldName ?? '<output>';

  if (mappings.length === 0) {
    const error = OutputMappingError.noMappings(field);
    ctx.observability.onError?.({ error, field });
    return fail(error);
  }

  const attempts: OutputMappingAttempt[] = [];
  for (const [index, mapping] of mappings.entries()) {
    const result = attempt(mapping, field, snapshot, ctx, options.cache);
    if (result.ok) {
      return ok({ value: result.value, target: mapping.target, index });
    }
    attempts.push({
      formula: mapping.formula,
      target: mapping.target,
      error: result.error,
    });
  }

  const error = OutputMappingError.allFailed(attempts);
  ctx.observability.onError?.({ error, field });
  return fail(error);
}

export interface EntityOutputs {
  /** Winning value per field */
  readonly values: Readonly<Record<string, MappedOutput>>;
  /** Fields where no mapping succeeded */
  readonly failures: Readonly<Record<string, OutputMappingError>>;
  /** True when any field failed; the entity must not be saved */
  readonly blocked: boolean;
}

/**
 * Resolve the output mappings of every calculated field of one entity.
 * Each field is independent; fields are processed in ascending id order
 * so observability events are deterministic. A field with no mappings has
 * nothing to resolve and is skipped.
 */
export function evaluateEntityOutputs(
  fields: Readonly<Record<string, readonly OutputMapping[]>>,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext,
  cache?: FormulaCache
): EntityOutputs {
  const values = createRecord<MappedOutput>();
  const failures = createRecord<OutputMappingError>();

  for (const field of Object.keys(fields).sort()) {
    const mappings = fields[field] ?? [];
    if (mappings.length === 0) continue;
    const options: MappingOptions = cache ? { fieldName: field, cache } : { fieldName: field };
    const result = evaluateOutputMappings(mappings, snapshot, ctx, options);
    if (result.ok) {
      values[field] = result.value;
    } else {
      failures[field] = result.error;
    }
  }

  return { values, failures, blocked: Object.keys(failures).length > 0 };
}

