/**
 * fieldcalc
 * Exports lexer, parser, analysis, runtime, and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export {
  MAX_NESTING_DEPTH,
  parse,
  parseTokens,
  type FormulaSyntaxError,
} from './parser/index.js';
export { compileFormula, FormulaCache, type Formula } from './formula.js';

// ============================================================
// ANALYSIS
// ============================================================
export {
  extractFieldReferences,
  extractFunctionCalls,
} from './analysis/references.js';
export {
  buildDependencyGraph,
  buildGraphFromReferences,
  computeEvaluationOrder,
  findCycle,
  planEvaluation,
  topologicalOrder,
  type DependencyGraph,
} from './analysis/dependency-graph.js';
export {
  detectCycles,
  type CycleAnalysis,
  type FormulaCycle,
} from './analysis/cycles.js';
export {
  analyzeDependencies,
  inferResultType,
  validateFormula,
  type AnalysisOptions,
  type DependencyAnalysis,
  type FieldDependency,
  type FormulaValidation,
  type SchemaField,
  type SchemaFieldType,
} from './analysis/validation.js';

// ============================================================
// RUNTIME
// ============================================================
export * from './runtime/index.js';

export * from './types.js';
