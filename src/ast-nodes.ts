import type { SourceSpan } from './source-location.js';
import type { FormulaValue } from './value-types.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// OPERATORS
// ============================================================

export type UnaryOperator = '+' | '-' | 'not';

export type LogicalOperator = 'or' | 'and';

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | '**';

export type BinaryOperator =
  | LogicalOperator
  | ComparisonOperator
  | ArithmeticOperator;

// ============================================================
// NODES
// ============================================================

/**
 * Literal: 42, 3.5, "text", 'text', true, false, null
 */
export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: FormulaValue;
}

/**
 * Field reference: an identifier not followed by `(`.
 * Examples: depth_from, total
 */
export interface FieldReferenceNode extends BaseNode {
  readonly type: 'FieldReference';
  readonly name: string;
}

/**
 * Unary operation: -x, +x, not x
 */
export interface UnaryOpNode extends BaseNode {
  readonly type: 'UnaryOp';
  readonly op: UnaryOperator;
  readonly operand: FormulaNode;
}

/**
 * Binary operation: left op right
 * Logical: (a or b), (a and b)
 * Comparison: (a == b), (a < b)
 * Arithmetic: (a + b), (2 ** 3)
 */
export interface BinaryOpNode extends BaseNode {
  readonly type: 'BinaryOp';
  readonly op: BinaryOperator;
  readonly left: FormulaNode;
  readonly right: FormulaNode;
}

/**
 * Function call: name(arg, arg, ...)
 * The argument list may be empty: now()
 */
export interface FunctionCallNode extends BaseNode {
  readonly type: 'FunctionCall';
  readonly name: string;
  readonly args: readonly FormulaNode[];
}

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type FormulaNode =
  | LiteralNode
  | FieldReferenceNode
  | UnaryOpNode
  | BinaryOpNode
  | FunctionCallNode;

export type NodeType = FormulaNode['type'];
