/**
 * CLI Shared Utilities
 * Common formatting and input helpers for the fieldcalc commands
 */

import * as fs from 'fs';
import { formatValue } from './runtime/index.js';
import type { ObservabilityCallbacks } from './runtime/index.js';
import { ERROR_REGISTRY, FormulaError } from './types.js';
import type { ErrorCategory, FormulaValue } from './types.js';

/** Output style for results and errors */
export type OutputFormat = 'human' | 'json';

/** Settings shared by every command */
export interface CommandOptions {
  readonly format: OutputFormat;
  readonly budgetMs: number | undefined;
  /** Trace callbacks for --verbose */
  readonly observability?: ObservabilityCallbacks | undefined;
}

/** What a command prints and how the process exits */
export interface CommandResult {
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a formula value to a human-readable string.
 * Null prints as `null` so it stays distinguishable from empty text.
 */
export function formatOutput(value: FormulaValue): string {
  if (value === null) return 'null';
  return formatValue(value);
}

const CATEGORY_LABELS: Record<ErrorCategory, string> = {
  lexer: 'Syntax error',
  parse: 'Syntax error',
  runtime: 'Runtime error',
  dependency: 'Dependency error',
  coercion: 'Coercion error',
};

/**
 * Format error for stderr output
 *
 * @example
 * formatError(new DivisionByZeroError('/', { line: 1, column: 3, offset: 2 }))
 * // "Runtime error [CALC-R003] at position 2: Division by zero in '/'"
 */
export function formatError(err: Error): string {
  if (err instanceof FormulaError) {
    const { errorId, message, location } = err.toData();
    const category = ERROR_REGISTRY.get(errorId)?.category;
    const label = category ? CATEGORY_LABELS[category] : 'Error';
    const position = location ? ` at position ${location.offset}` : '';
    return `${label} [${errorId}]${position}: ${message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Error as plain data for --format json */
export function errorToJson(err: Error): Record<string, unknown> {
  if (err instanceof FormulaError) {
    const { errorId, message, location } = err.toData();
    return location ? { errorId, message, location } : { errorId, message };
  }
  return { message: formatError(err) };
}

/**
 * Accept a value read from YAML or the command line as a formula value.
 *
 * @throws Error for objects, arrays and non-finite numbers
 */
export function toFormulaValue(value: unknown, label: string): FormulaValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new Error(
    `Invalid value for ${label}: expected a number, text, boolean or null`
  );
}

/**
 * Observability callbacks that trace evaluation to `write`.
 * Wired to stderr by --verbose.
 */
export function createVerboseCallbacks(
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onFieldStart: ({ field }) => write(`[field] ${field} start`),
    onFieldEnd: ({ field, result, durationMs }) => {
      const outcome = result.ok
        ? `= ${formatOutput(result.value)}`
        : `failed ${result.error.errorId}`;
      write(`[field] ${field} ${outcome} (${durationMs.toFixed(2)}ms)`);
    },
    onFunctionCall: ({ name, args }) =>
      write(`[call] ${name}(${args.map(formatOutput).join(', ')})`),
    onFunctionReturn: ({ name, value, durationMs }) =>
      write(
        `[return] ${name} = ${formatOutput(value)} (${durationMs.toFixed(2)}ms)`
      ),
    onError: ({ error, field }) =>
      write(`[error] ${field ? `${field}: ` : ''}${formatError(error)}`),
  };
}

/**
 * Package version from package.json beside the sources or the build
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (isRecord(data) && typeof data['version'] === 'string') {
    return data['version'];
  }
  throw new Error('package.json has no version');
}
