/**
 * Function Invocation
 *
 * Arity checks, default filling, and the boundary between the evaluator
 * and built-in or host functions. A host function that throws, or returns
 * something that is not a formula value, becomes a FunctionExecutionError.
 * A NaN or infinite number becomes a NonFiniteResultError.
 */

import type { FormulaValue, Result, SourceLocation } from '../../types.js';
import {
  fail,
  FunctionArgumentError,
  FunctionExecutionError,
  NonFiniteResultError,
  ok,
  RuntimeError,
  UnknownFunctionError,
} from '../../types.js';
import type {
  EvaluationContext,
  FunctionCallContext,
  FunctionDefinition,
} from './types.js';

/** Failure for a function's own argument validation */
export function argumentError(
  call: FunctionCallContext,
  reason: string
): Result<FormulaValue, RuntimeError> {
  return fail(new FunctionArgumentError(call.name, reason, call.location));
}

export function isFormulaValue(value: unknown): value is FormulaValue {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

function plural(count: number): string {
  return count === 1 ? 'argument' : 'arguments';
}

/**
 * Check arity and apply defaults for omitted trailing arguments.
 */
export function bindArguments(
  definition: FunctionDefinition,
  name: string,
  args: readonly FormulaValue[],
  location?: SourceLocation
): Result<FormulaValue[], RuntimeError> {
  const { params } = definition;
  const required = params.filter((p) => p.defaultValue === undefined).length;

  if (args.length < required) {
    const qualifier =
      definition.variadic || required < params.length ? 'at least ' : '';
    return fail(
      new FunctionArgumentError(
        name,
        `expected ${qualifier}${required} ${plural(required)}, got ${args.length}`,
        location
      )
    );
  }

  if (!definition.variadic && args.length > params.length) {
    const qualifier = required < params.length ? 'at most ' : '';
    return fail(
      new FunctionArgumentError(
        name,
        `expected ${qualifier}${params.length} ${plural(params.length)}, got ${args.length}`,
        location
      )
    );
  }

  const bound = [...args];
  for (let i = args.length; i < params.length; i++) {
    const fallback = params[i]?.defaultValue;
    if (fallback !== undefined) bound.push(fallback);
  }
  return ok(bound);
}

/**
 * Look up `name`, bind its arguments and invoke it.
 * Emits onFunctionCall before and onFunctionReturn after a successful call.
 */
export function invokeFunction(
  name: string,
  args: readonly FormulaValue[],
  ctx: EvaluationContext,
  location?: SourceLocation
): Result<FormulaValue, RuntimeError> {
  const definition = ctx.functions.get(name);
  if (!definition) {
    return fail(new UnknownFunctionError(name, location));
  }

  const bound = bindArguments(definition, name, args, location);
  if (!bound.ok) return bound;

  const call: FunctionCallContext = {
    name,
    location,
    now: () => ctx.clock(),
  };

  ctx.observability.onFunctionCall?.({ name, args: bound.value });
  const startTime = ctx.timer();

  let returned: unknown;
  try {
    returned = definition.fn(bound.value, call);
  } catch (error) {
    return fail(new FunctionExecutionError(name, error, location));
  }

  let result: Result<FormulaValue, RuntimeError>;
  if (isFormulaValue(returned)) {
    result = ok(returned);
  } else if (isResult(returned)) {
    result = returned;
  } else {
    return fail(
      new FunctionExecutionError(
        name,
        `returned unsupported value ${describe(returned)}`,
        location
      )
    );
  }

  if (result.ok && typeof result.value === 'number' && !Number.isFinite(result.value)) {
    return fail(new NonFiniteResultError(`${name}()`, location));
  }

  if (result.ok) {
    ctx.observability.onFunctionReturn?.({
      name,
      value: result.value,
      durationMs: ctx.timer() - startTime,
    });
  }
  return result;
}

function isResult(value: unknown): value is Result<FormulaValue, RuntimeError> {
  if (typeof value !== 'object' || value === null || !('ok' in value)) {
    return false;
  }
  if (value.ok === true) {
    return 'value' in value && isFormulaValue(value.value);
  }
  return (
    value.ok === false && 'error' in value && value.error instanceof RuntimeError
  );
}

function describe(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
