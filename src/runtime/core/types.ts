/**
 * Runtime Types
 *
 * Public types for evaluation configuration and observability.
 * These types are the primary interface for host applications.
 */

import type {
  FormulaError,
  FormulaResultType,
  FormulaValue,
  Result,
  RuntimeError,
  SourceLocation,
} from '../../types.js';

// ============================================================
// FUNCTIONS
// ============================================================

/** Call-site information handed to every function */
export interface FunctionCallContext {
  /** Name the function was called by */
  readonly name: string;
  /** Location of the call in the formula */
  readonly location: SourceLocation | undefined;
  /** Current time from the context clock */
  now(): Date;
}

/**
 * Function implementation.
 * Receives already-evaluated arguments, left to right. Returns a plain
 * value, or a Result to report a failure without throwing.
 */
export type FormulaFunction = (
  args: readonly FormulaValue[],
  call: FunctionCallContext
) => FormulaValue | Result<FormulaValue, RuntimeError>;

/** Parameter metadata for arity checks and documentation */
export interface FunctionParam {
  readonly name: string;
  /** Default used when the argument is omitted; makes the parameter optional */
  readonly defaultValue?: FormulaValue;
  readonly description?: string;
}

/**
 * Function with declared parameters.
 * The evaluator checks arity and fills defaults before invoking `fn`.
 */
export interface FunctionDefinition {
  readonly params: readonly FunctionParam[];
  /** Accept any number of arguments beyond `params` */
  readonly variadic?: boolean;
  readonly fn: FormulaFunction;
  readonly description?: string;
  /** Result type reported by design-time analysis (default UNKNOWN) */
  readonly returnType?: FormulaResultType;
}

// ============================================================
// OBSERVABILITY
// ============================================================

/** Observability callbacks for monitoring evaluation */
export interface ObservabilityCallbacks {
  /** Called before a calculated field is evaluated */
  onFieldStart?: (event: FieldStartEvent) => void;
  /** Called after a calculated field is evaluated, successfully or not */
  onFieldEnd?: (event: FieldEndEvent) => void;
  /** Called before a function is invoked */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called after a function returns a value */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when an error occurs */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a field is evaluated */
export interface FieldStartEvent {
  field: string;
}

/** Event emitted after a field is evaluated */
export interface FieldEndEvent {
  field: string;
  result: Result<FormulaValue>;
  /** Evaluation time in milliseconds */
  durationMs: number;
}

/** Event emitted before a function call */
export interface FunctionCallEvent {
  name: string;
  args: readonly FormulaValue[];
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  name: string;
  value: FormulaValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: FormulaError;
  /** Field being evaluated, when inside a batch */
  field?: string | undefined;
}

// ============================================================
// CONTEXT
// ============================================================

/** Evaluation context: function table, callbacks and limits */
export interface EvaluationContext {
  /** Built-in and host functions by name */
  readonly functions: ReadonlyMap<string, FunctionDefinition>;
  readonly observability: ObservabilityCallbacks;
  /** Wall clock used by now() */
  readonly clock: () => Date;
  /** Monotonic milliseconds used for durations and the budget */
  readonly timer: () => number;
  /** Per-field budget in milliseconds (undefined = unlimited) */
  readonly budgetMs: number | undefined;
}

/** Options for creating an evaluation context */
export interface EvaluationOptions {
  /** Host functions; a name already built in is replaced */
  functions?: Record<string, FunctionDefinition>;
  /** Observability callbacks for monitoring evaluation */
  observability?: ObservabilityCallbacks;
  /** Wall clock for now() (default: current time) */
  clock?: () => Date;
  /** Monotonic millisecond source (default: performance.now) */
  timer?: () => number;
  /** Per-field evaluation budget in milliseconds */
  budgetMs?: number;
}
