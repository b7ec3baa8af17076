/**
 * Formula Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';
import type { OutputTarget, ValueKind } from './value-types.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface FormulaErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

const LOCATION_SUFFIX = / at position \d+$/;

function lookupDefinition(errorId: string, category?: ErrorCategory) {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/**
 * Renders the registry template for `errorId` with `context`.
 *
 * @throws TypeError if errorId is not registered
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown>
): string {
  return renderMessage(lookupDefinition(errorId).messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all formula errors.
 * Provides structured data for host applications to format as needed.
 */
export class FormulaError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: FormulaErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at position ${data.location.offset}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'FormulaError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): FormulaErrorData {
    return {
      errorId: this.errorId,
      message: this.location
        ? this.message.replace(LOCATION_SUFFIX, '')
        : this.message,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: FormulaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SYNTAX ERRORS
// ============================================================

/** Parse-time errors (the syntax error kind for token sequences) */
export class ParseError extends FormulaError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

// ============================================================
// RUNTIME ERRORS
// ============================================================

/** Evaluation errors */
export class RuntimeError extends FormulaError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
  }
}

/** A referenced field is missing from the snapshot */
export class UndefinedFieldError extends RuntimeError {
  readonly fieldName: string;

  constructor(fieldName: string, location?: SourceLocation) {
    super(
      'CALC-R001',
      messageFor('CALC-R001', { name: fieldName }),
      location,
      { fieldName }
    );
    this.name = 'UndefinedFieldError';
    this.fieldName = fieldName;
  }
}

/** An operator received operands of the wrong kind */
export class TypeMismatchError extends RuntimeError {
  readonly operator: string;
  readonly operandKinds: readonly ValueKind[];

  constructor(
    operator: string,
    operandKinds: readonly ValueKind[],
    location?: SourceLocation
  ) {
    super(
      'CALC-R002',
      messageFor('CALC-R002', { operator, operands: operandKinds.join(' and ') }),
      location,
      { operator, operandKinds }
    );
    this.name = 'TypeMismatchError';
    this.operator = operator;
    this.operandKinds = operandKinds;
  }
}

export class DivisionByZeroError extends RuntimeError {
  readonly operator: string;

  constructor(operator: string, location?: SourceLocation) {
    super('CALC-R003', messageFor('CALC-R003', { operator }), location, {
      operator,
    });
    this.name = 'DivisionByZeroError';
    this.operator = operator;
  }
}

/** Arithmetic or a function produced NaN or an infinity */
export class NonFiniteResultError extends RuntimeError {
  readonly operation: string;

  constructor(operation: string, location?: SourceLocation) {
    super('CALC-R008', messageFor('CALC-R008', { operation }), location, {
      operation,
    });
    this.name = 'NonFiniteResultError';
    this.operation = operation;
  }
}

export class UnknownFunctionError extends RuntimeError {
  readonly functionName: string;

  constructor(functionName: string, location?: SourceLocation) {
    super(
      'CALC-R004',
      messageFor('CALC-R004', { name: functionName }),
      location,
      { functionName }
    );
    this.name = 'UnknownFunctionError';
    this.functionName = functionName;
  }
}

/** Raised by a function's own arity or argument validation */
export class FunctionArgumentError extends RuntimeError {
  readonly functionName: string;
  readonly reason: string;

  constructor(functionName: string, reason: string, location?: SourceLocation) {
    super(
      'CALC-R005',
      messageFor('CALC-R005', { name: functionName, reason }),
      location,
      { functionName, reason }
    );
    this.name = 'FunctionArgumentError';
    this.functionName = functionName;
    this.reason = reason;
  }
}

/** A host function threw instead of returning a failure */
export class FunctionExecutionError extends RuntimeError {
  readonly functionName: string;
  override readonly cause: unknown;

  constructor(functionName: string, cause: unknown, location?: SourceLocation) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'CALC-R007',
      messageFor('CALC-R007', { name: functionName, reason }),
      location,
      { functionName, reason }
    );
    this.name = 'FunctionExecutionError';
    this.functionName = functionName;
    this.cause = cause;
  }
}

/** A field's evaluation exceeded the configured budget */
export class TimeoutError extends RuntimeError {
  readonly fieldName: string;
  readonly budgetMs: number;
  readonly elapsedMs: number;

  constructor(fieldName: string, budgetMs: number, elapsedMs: number) {
    super(
      'CALC-R006',
      messageFor('CALC-R006', { field: fieldName, budgetMs }),
      undefined,
      { fieldName, budgetMs, elapsedMs }
    );
    this.name = 'TimeoutError';
    this.fieldName = fieldName;
    this.budgetMs = budgetMs;
    this.elapsedMs = elapsedMs;
  }
}

// ============================================================
// DEPENDENCY ERRORS
// ============================================================

/** Calculated fields reference each other in a loop */
export class CircularDependencyError extends FormulaError {
  /** Fields on the cycle, in traversal order, without the closing repeat */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    const path = [...cycle, cycle[0] ?? ''].join(' → ');
    super({
      errorId: 'CALC-D001',
      message: messageFor('CALC-D001', { path }),
      context: { cycle },
    });
    this.name = 'CircularDependencyError';
    this.cycle = cycle;
  }
}

// ============================================================
// COERCION ERRORS
// ============================================================

export class CoercionError extends FormulaError {
  readonly kind: ValueKind;
  readonly target: OutputTarget;

  constructor(kind: ValueKind, target: OutputTarget) {
    super({
      errorId: 'CALC-C001',
      message: messageFor('CALC-C001', { kind: kind.toUpperCase(), target }),
      context: { kind, target },
    });
    this.name = 'CoercionError';
    this.kind = kind;
    this.target = target;
  }
}

/** One failed (formula, target) attempt inside an output mapping evaluation */
export interface OutputMappingAttempt {
  readonly formula: string;
  readonly target: OutputTarget;
  readonly error: FormulaError;
}

/**
 * Output mapping evaluation failed as a whole.
 * Either no mapping was supplied, or every attempt failed (see `attempts`).
 */
export class OutputMappingError extends FormulaError {
  readonly attempts: readonly OutputMappingAttempt[];

  private constructor(
    errorId: string,
    message: string,
    attempts: readonly OutputMappingAttempt[],
    context: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'coercion');
    super({ errorId, message, context });
    this.name = 'OutputMappingError';
    this.attempts = attempts;
  }

  static allFailed(attempts: readonly OutputMappingAttempt[]): OutputMappingError {
    const details = attempts
      .map((attempt) => `Target '${attempt.target}': ${attempt.error.message}`)
      .join('; ');
    return new OutputMappingError(
      'CALC-C002',
      messageFor('CALC-C002', { details }),
      attempts,
      { attempts: attempts.length }
    );
  }

  static noMappings(fieldName: string): OutputMappingError {
    return new OutputMappingError(
      'CALC-C003',
      messageFor('CALC-C003', { field: fieldName }),
      [],
      { field: fieldName }
    );
  }
}
