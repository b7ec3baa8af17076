/**
 * Formula Runtime
 *
 * Public API for evaluating formulas.
 *
 * Module Structure:
 * - core/: Evaluation engine
 *   - types.ts: Public types (EvaluationContext, EvaluationOptions, etc.)
 *   - callable.ts: Argument binding and function dispatch
 *   - values.ts: Truthiness, equality and text rendering of values
 *   - context.ts: Evaluation context factory
 *   - evaluate.ts: AST evaluation
 *   - execute.ts: Compile-and-evaluate for formula text
 *   - batch.ts: Dependency-ordered evaluation of an entity
 *   - coerce.ts: Conversion to output targets
 *   - output-mappings.ts: First-success output mapping resolution
 *   - equals.ts: AST structural equality
 * - ext/: Self-contained extensions
 *   - builtins.ts: Built-in functions
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  EvaluationContext,
  EvaluationOptions,
  FieldEndEvent,
  FieldStartEvent,
  FormulaFunction,
  FunctionCallContext,
  FunctionCallEvent,
  FunctionDefinition,
  FunctionParam,
  FunctionReturnEvent,
  ObservabilityCallbacks,
} from './core/types.js';

// ============================================================
// FUNCTIONS
// ============================================================

export {
  argumentError,
  bindArguments,
  invokeFunction,
  isFormulaValue,
} from './core/callable.js';

export { BUILTIN_FUNCTIONS, roundHalfEven } from './ext/builtins.js';

// ============================================================
// VALUE UTILITIES
// ============================================================

export {
  formatValue,
  isTruthy,
  valueKind,
  valuesEqual,
} from './core/values.js';

export { astEquals } from './core/equals.js';

// ============================================================
// CONTEXT FACTORY
// ============================================================

export { createEvaluationContext, listFunctions } from './core/context.js';

// ============================================================
// EVALUATION
// ============================================================

export { evaluate } from './core/evaluate.js';

export { evaluateFormula } from './core/execute.js';

export type {
  EntityEvaluation,
  EntityEvaluationOptions,
} from './core/batch.js';

export { evaluateEntity, evaluateField } from './core/batch.js';

// ============================================================
// OUTPUT COERCION
// ============================================================

export type { CoercedValue, CoercedValueMap } from './core/coerce.js';

export { coerce, isOutputTarget, OUTPUT_TARGETS } from './core/coerce.js';

export type {
  EntityOutputs,
  MappedOutput,
  MappingOptions,
  OutputMapping,
} from './core/output-mappings.js';

export {
  evaluateEntityOutputs,
  evaluateOutputMappings,
} from './core/output-mappings.js';
