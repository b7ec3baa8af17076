/**
 * Built-in Functions
 *
 * Null-safe helpers available in every formula. Host applications add
 * domain-specific functions through createEvaluationContext.
 */

import type { FormulaValue, Result, RuntimeError } from '../../types.js';
import { argumentError } from '../core/callable.js';
import type { FunctionCallContext, FunctionDefinition } from '../core/types.js';
import { formatValue, isTruthy, valueKind } from '../core/values.js';

type NumericResult = Result<FormulaValue, RuntimeError> | number | null;

// ============================================================
// HELPERS
// ============================================================

function expectNumber(
  call: FunctionCallContext,
  value: FormulaValue,
  param: string
): Result<FormulaValue, RuntimeError> | number {
  if (typeof value === 'number') return value;
  return argumentError(
    call,
    `expected ${param} to be a number, got ${valueKind(value)}`
  );
}

/**
 * Round half to even: 2.5 → 2, 3.5 → 4, -2.5 → -2.
 */
export function roundHalfEven(value: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff < 0.5) rounded = floor;
  else if (diff > 0.5) rounded = floor + 1;
  else rounded = floor % 2 === 0 ? floor : floor + 1;

  return rounded / factor;
}

/**
 * Smallest or largest of the non-null arguments.
 * All must be numbers or all text; null when nothing is left.
 */
function extreme(
  call: FunctionCallContext,
  args: readonly FormulaValue[],
  pick: 'min' | 'max'
): FormulaValue | Result<FormulaValue, RuntimeError> {
  const values = args.filter(
    (v): v is number | string | boolean => v !== null
  );
  if (values.length === 0) return null;

  if (values.every((v): v is number => typeof v === 'number')) {
    return pick === 'min' ? Math.min(...values) : Math.max(...values);
  }
  if (values.every((v): v is string => typeof v === 'string')) {
    return values.reduce((best, v) =>
      (pick === 'min' ? v < best : v > best) ? v : best
    );
  }

  const kinds = [...new Set(values.map(valueKind))].join(' and ');
  return argumentError(call, `cannot compare ${kinds}`);
}

/** Apply `transform` to the argument's text, leaving null as null */
function textFunction(
  description: string,
  transform: (text: string) => string
): FunctionDefinition {
  return {
    params: [{ name: 'value' }],
    description,
    returnType: 'TEXT',
    fn: ([value = null]) =>
      value === null ? null : transform(formatValue(value)),
  };
}

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: Readonly<Record<string, FunctionDefinition>> =
  {
    abs: {
      params: [{ name: 'value' }],
      description: 'Absolute value; null stays null',
      returnType: 'NUMBER',
      fn: ([value = null], call): NumericResult => {
        if (value === null) return null;
        const n = expectNumber(call, value, 'value');
        return typeof n === 'number' ? Math.abs(n) : n;
      },
    },

    min: {
      params: [],
      variadic: true,
      description: 'Smallest non-null argument (numbers or text)',
      returnType: 'NUMBER',
      fn: (args, call) => extreme(call, args, 'min'),
    },

    max: {
      params: [],
      variadic: true,
      description: 'Largest non-null argument (numbers or text)',
      returnType: 'NUMBER',
      fn: (args, call) => extreme(call, args, 'max'),
    },

    round: {
      params: [{ name: 'value' }, { name: 'digits', defaultValue: 0 }],
      description: 'Round half to even at the given decimal digits',
      returnType: 'NUMBER',
      fn: ([value = null, digits = 0], call): NumericResult => {
        if (value === null) return null;
        const n = expectNumber(call, value, 'value');
        if (typeof n !== 'number') return n;
        if (typeof digits !== 'number' || !Number.isInteger(digits)) {
          return argumentError(call, 'expected digits to be a whole number');
        }
        return roundHalfEven(n, digits);
      },
    },

    sum: {
      params: [],
      variadic: true,
      description: 'Sum of non-null arguments; 0 when there are none',
      returnType: 'NUMBER',
      fn: (args, call): NumericResult => {
        let total = 0;
        for (const [i, value] of args.entries()) {
          if (value === null) continue;
          const n = expectNumber(call, value, `argument ${i + 1}`);
          if (typeof n !== 'number') return n;
          total += n;
        }
        return total;
      },
    },

    pow: {
      params: [{ name: 'base' }, { name: 'exponent' }],
      description: 'base raised to exponent; null if either is null',
      returnType: 'NUMBER',
      fn: ([base = null, exponent = null], call): NumericResult => {
        if (base === null || exponent === null) return null;
        const b = expectNumber(call, base, 'base');
        if (typeof b !== 'number') return b;
        const e = expectNumber(call, exponent, 'exponent');
        if (typeof e !== 'number') return e;
        return b ** e;
      },
    },

    upper: textFunction('Text in upper case', (text) => text.toUpperCase()),
    lower: textFunction('Text in lower case', (text) => text.toLowerCase()),
    strip: textFunction('Text without surrounding whitespace', (text) =>
      text.trim()
    ),

    concat: {
      params: [],
      variadic: true,
      description: 'Arguments joined as text; null contributes nothing',
      returnType: 'TEXT',
      fn: (args) => args.map(formatValue).join(''),
    },

    if_else: {
      params: [{ name: 'condition' }, { name: 'then' }, { name: 'else' }],
      description: 'then when condition is truthy, else otherwise',
      fn: ([condition = null, whenTrue = null, whenFalse = null]) =>
        isTruthy(condition) ? whenTrue : whenFalse,
    },

    is_empty: {
      params: [{ name: 'value' }],
      description: 'True for null and blank text',
      returnType: 'BOOLEAN',
      fn: ([value = null]) =>
        value === null || (typeof value === 'string' && value.trim() === ''),
    },

    coalesce: {
      params: [],
      variadic: true,
      description: 'First non-null argument, or null',
      fn: (args) => args.find((value) => value !== null) ?? null,
    },

    now: {
      params: [],
      description: 'Current time as ISO-8601 text',
      returnType: 'TEXT',
      fn: (_args, call) => call.now().toISOString(),
    },
  };
