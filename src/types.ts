/**
 * Formula Types
 * Re-exports source locations, tokens, AST nodes, values and errors
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type {
  ArithmeticOperator,
  BinaryOperator,
  BinaryOpNode,
  ComparisonOperator,
  FieldReferenceNode,
  FormulaNode,
  FunctionCallNode,
  LiteralNode,
  LogicalOperator,
  NodeType,
  UnaryOperator,
  UnaryOpNode,
} from './ast-nodes.js';
export type {
  FieldSnapshot,
  FormulaResultType,
  FormulaValue,
  OutputTarget,
  ValueKind,
} from './value-types.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  CircularDependencyError,
  CoercionError,
  DivisionByZeroError,
  FormulaError,
  FunctionArgumentError,
  FunctionExecutionError,
  messageFor,
  NonFiniteResultError,
  OutputMappingError,
  ParseError,
  RuntimeError,
  TimeoutError,
  TypeMismatchError,
  UndefinedFieldError,
  UnknownFunctionError,
  type FormulaErrorData,
  type OutputMappingAttempt,
} from './error-classes.js';
export { fail, ok, type Result } from './result.js';
