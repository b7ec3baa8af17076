/**
 * fieldcalc exec
 *
 * Evaluates every calculated field of an entity described in YAML, then
 * resolves its output mappings.
 *
 * ```yaml
 * values:
 *   depth_from: 5
 *   depth_to: 10
 * formulas:
 *   depth_total: depth_from + depth_to
 * outputs:
 *   depth_label:
 *     - { formula: depth_total, target: NUMBER }
 *     - { formula: 'concat(depth_total, " m")', target: TEXT }
 * ```
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import {
  errorToJson,
  formatError,
  formatOutput,
  isRecord,
  toFormulaValue,
  type CommandOptions,
  type CommandResult,
} from './cli-shared.js';
import {
  createEvaluationContext,
  evaluateEntity,
  evaluateEntityOutputs,
  FormulaCache,
  isOutputTarget,
} from './index.js';
import type { FormulaValue, OutputMapping } from './index.js';
import { createRecord } from './records.js';

/** Parsed entity file */
export interface EntityFile {
  readonly values: Readonly<Record<string, FormulaValue>>;
  readonly formulas: Readonly<Record<string, string>>;
  readonly outputs: Readonly<Record<string, readonly OutputMapping[]>>;
}

// ============================================================
// ENTITY FILE PARSING
// ============================================================

function readSection(
  document: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const section = document[key];
  if (section === undefined || section === null) return {};
  if (!isRecord(section)) {
    throw new Error(`Invalid entity: ${key} must be a mapping`);
  }
  return section;
}

function readMappings(field: string, raw: unknown): OutputMapping[] {
  if (!Array.isArray(raw)) {
    throw new Error(`Invalid entity: outputs.${field} must be a list`);
  }
  return raw.map((entry: unknown, i): OutputMapping => {
    const label = `outputs.${field}[${i}]`;
    if (!isRecord(entry)) {
      throw new Error(`Invalid entity: ${label} must be a mapping`);
    }
    const { formula, target } = entry;
    if (typeof formula !== 'string') {
      throw new Error(`Invalid entity: ${label}.formula must be text`);
    }
    if (!isOutputTarget(target)) {
      throw new Error(
        `Invalid entity: ${label}.target must be TEXT, NUMBER or BOOLEAN`
      );
    }
    return { formula, target };
  });
}

/**
 * Parse entity YAML.
 *
 * @throws Error with "Invalid entity: {reason}" for malformed documents
 */
export function parseEntity(source: string): EntityFile {
  const document: unknown = yaml.parse(source);
  if (!isRecord(document)) {
    throw new Error('Invalid entity: document must be a mapping');
  }

  const values = createRecord<FormulaValue>();
  for (const [name, raw] of Object.entries(readSection(document, 'values'))) {
    values[name] = toFormulaValue(raw, `values.${name}`);
  }

  const formulas = createRecord<string>();
  for (const [name, raw] of Object.entries(readSection(document, 'formulas'))) {
    if (typeof raw !== 'string') {
      throw new Error(`Invalid entity: formulas.${name} must be text`);
    }
    formulas[name] = raw;
  }

  const outputs = createRecord<OutputMapping[]>();
  for (const [name, raw] of Object.entries(readSection(document, 'outputs'))) {
    outputs[name] = readMappings(name, raw);
  }

  return { values, formulas, outputs };
}

/**
 * Read and parse an entity file.
 *
 * @throws Error if the file is missing or malformed
 */
export async function loadEntity(file: string): Promise<EntityFile> {
  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }
  return parseEntity(await fs.readFile(file, 'utf-8'));
}

// ============================================================
// EXECUTION
// ============================================================

/**
 * Evaluate the calculated fields of `entity`, then its output mappings
 * against the input values merged with the computed ones.
 * Exits 1 when any field or output fails.
 */
export function runEntity(
  entity: EntityFile,
  options: CommandOptions
): CommandResult {
  const ctx = createEvaluationContext({
    observability: options.observability ?? {},
    ...(options.budgetMs !== undefined ? { budgetMs: options.budgetMs } : {}),
  });
  const cache = new FormulaCache();

  const batch = evaluateEntity(entity.formulas, entity.values, ctx, { cache });
  if (!batch.ok) {
    return options.format === 'json'
      ? {
          code: 1,
          stdout: JSON.stringify({ ok: false, error: errorToJson(batch.error) }, null, 2),
          stderr: '',
        }
      : { code: 1, stdout: '', stderr: formatError(batch.error) };
  }

  const { order, results, values } = batch.value;
  const outputs = evaluateEntityOutputs(
    entity.outputs,
    createRecord([...Object.entries(entity.values), ...Object.entries(values)]),
    ctx,
    cache
  );
  const code = batch.value.failed.length > 0 || outputs.blocked ? 1 : 0;

  if (options.format === 'json') {
    const errors = createRecord<unknown>();
    for (const field of batch.value.failed) {
      const result = results[field];
      if (result && !result.ok) errors[field] = errorToJson(result.error);
    }
    const outputErrors = createRecord<unknown>();
    for (const [field, error] of Object.entries(outputs.failures)) {
      outputErrors[field] = errorToJson(error);
    }
    const body = {
      ok: code === 0,
      order,
      values,
      errors,
      outputs: outputs.values,
      outputErrors,
    };
    return { code, stdout: JSON.stringify(body, null, 2), stderr: '' };
  }

  const stdout: string[] = [];
  const stderr: string[] = [];
  for (const field of order) {
    const result = results[field];
    if (!result) continue;
    if (result.ok) {
      stdout.push(`${field} = ${formatOutput(result.value)}`);
    } else {
      stderr.push(`${field}: ${formatError(result.error)}`);
    }
  }
  for (const [field, output] of Object.entries(outputs.values)) {
    stdout.push(`${field} -> ${output.target} ${formatOutput(output.value)}`);
  }
  for (const [field, error] of Object.entries(outputs.failures)) {
    stderr.push(`${field}: ${formatError(error)}`);
  }

  return { code, stdout: stdout.join('\n'), stderr: stderr.join('\n') };
}
