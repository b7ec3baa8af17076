/**
 * fieldcalc eval
 *
 * Evaluates one formula against field values given on the command line.
 *
 * Usage:
 *   fieldcalc eval 'depth_from + depth_to' --field depth_from=5 --field depth_to=10
 */

import * as yaml from 'yaml';
import {
  errorToJson,
  formatError,
  formatOutput,
  toFormulaValue,
  type CommandOptions,
  type CommandResult,
} from './cli-shared.js';
import { createEvaluationContext, evaluateFormula } from './index.js';
import type { FieldSnapshot, FormulaValue } from './index.js';

/**
 * Parse a `name=value` assignment. The value is read as YAML, so `5` is a
 * number, `true` a boolean, `~` or nothing null, and anything else text.
 *
 * @example
 * parseFieldAssignment('depth=5')      // ['depth', 5]
 * parseFieldAssignment('code="007"')   // ['code', '007']
 */
export function parseFieldAssignment(arg: string): [string, FormulaValue] {
  const separator = arg.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Invalid field assignment: ${arg} (expected name=value)`);
  }

  const name = arg.slice(0, separator).trim();
  const raw = arg.slice(separator + 1);

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch {
    // Unparseable YAML is plain text
    parsed = raw;
  }
  return [name, toFormulaValue(parsed, `field ${name}`)];
}

/**
 * Evaluate `formula` against `fields`.
 */
export function runEval(
  formula: string,
  fields: FieldSnapshot,
  options: CommandOptions
): CommandResult {
  const ctx = createEvaluationContext({
    observability: options.observability ?? {},
    ...(options.budgetMs !== undefined ? { budgetMs: options.budgetMs } : {}),
  });

  const result = evaluateFormula(formula, fields, ctx);

  if (options.format === 'json') {
    const body = result.ok
      ? { ok: true, value: result.value }
      : { ok: false, error: errorToJson(result.error) };
    return {
      code: result.ok ? 0 : 1,
      stdout: JSON.stringify(body, null, 2),
      stderr: '',
    };
  }

  if (result.ok) {
    return { code: 0, stdout: formatOutput(result.value), stderr: '' };
  }
  return { code: 1, stdout: '', stderr: formatError(result.error) };
}
