/**
 * Parser Extension: Expression Parsing
 * Precedence chain, lowest to highest:
 * or → and → not → comparison → additive → multiplicative → power → unary
 */

import { Parser } from './parser.js';
import type {
  BinaryOperator,
  FormulaNode,
  ParseError,
  Result,
  TokenType,
  UnaryOperator,
} from '../types.js';
import { ok, TOKEN_TYPES } from '../types.js';
import { advance, check, current, makeSpan } from './state.js';

type NodeResult = Result<FormulaNode, ParseError>;

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): NodeResult;
    parseLogicalOr(): NodeResult;
    parseLogicalAnd(): NodeResult;
    parseNot(): NodeResult;
    parseComparison(): NodeResult;
    parseAdditive(): NodeResult;
    parseMultiplicative(): NodeResult;
    parsePower(): NodeResult;
    parseUnary(): NodeResult;
    parseBinaryLevel(
      operators: Partial<Record<TokenType, BinaryOperator>>,
      operand: () => NodeResult
    ): NodeResult;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const OR_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  [TOKEN_TYPES.OR]: 'or',
};

const AND_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  [TOKEN_TYPES.AND]: 'and',
};

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
};

const ADDITIVE_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

const UNARY_OPS: Partial<Record<TokenType, UnaryOperator>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

// ============================================================
// EXPRESSIONS
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): NodeResult {
  return this.parseLogicalOr();
};

/**
 * Left-associative binary level: operand (op operand)*
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: Partial<Record<TokenType, BinaryOperator>>,
  operand: () => NodeResult
): NodeResult {
  const first = operand();
  if (!first.ok) return first;
  let left = first.value;

  for (;;) {
    const op = operators[current(this.state).type];
    if (op === undefined) break;
    advance(this.state);

    const right = operand();
    if (!right.ok) return right;

    left = {
      type: 'BinaryOp',
      op,
      left,
      right: right.value,
      span: makeSpan(left.span.start, right.value.span.end),
    };
  }

  return ok(left);
};

Parser.prototype.parseLogicalOr = function (this: Parser): NodeResult {
  return this.parseBinaryLevel(OR_OPS, () => this.parseLogicalAnd());
};

Parser.prototype.parseLogicalAnd = function (this: Parser): NodeResult {
  return this.parseBinaryLevel(AND_OPS, () => this.parseNot());
};

/**
 * Prefix `not`, right-associative: not not x
 */
Parser.prototype.parseNot = function (this: Parser): NodeResult {
  if (!check(this.state, TOKEN_TYPES.NOT)) {
    return this.parseComparison();
  }

  const opToken = advance(this.state);
  const operand = this.nested(opToken, () => this.parseNot());
  if (!operand.ok) return operand;

  const node: FormulaNode = {
    type: 'UnaryOp',
    op: 'not',
    operand: operand.value,
    span: makeSpan(opToken.span.start, operand.value.span.end),
  };
  return ok(node);
};

/**
 * Comparisons group left to right: a < b < c is (a < b) < c
 */
Parser.prototype.parseComparison = function (this: Parser): NodeResult {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): NodeResult {
  return this.parseBinaryLevel(ADDITIVE_OPS, () => this.parseMultiplicative());
};

Parser.prototype.parseMultiplicative = function (this: Parser): NodeResult {
  return this.parseBinaryLevel(MULTIPLICATIVE_OPS, () => this.parsePower());
};

/**
 * Power, right-associative: 2 ** 3 ** 2 is 2 ** (3 ** 2).
 * Operands are unary expressions, so -2 ** 2 is (-2) ** 2.
 */
Parser.prototype.parsePower = function (this: Parser): NodeResult {
  const base = this.parseUnary();
  if (!base.ok || !check(this.state, TOKEN_TYPES.POWER)) return base;

  const opToken = advance(this.state);
  const exponent = this.nested(opToken, () => this.parsePower());
  if (!exponent.ok) return exponent;

  const node: FormulaNode = {
    type: 'BinaryOp',
    op: '**',
    left: base.value,
    right: exponent.value,
    span: makeSpan(base.value.span.start, exponent.value.span.end),
  };
  return ok(node);
};

Parser.prototype.parseUnary = function (this: Parser): NodeResult {
  const op = UNARY_OPS[current(this.state).type];
  if (op === undefined) {
    return this.parsePrimary();
  }

  const opToken = advance(this.state);
  const operand = this.nested(opToken, () => this.parseUnary());
  if (!operand.ok) return operand;

  const node: FormulaNode = {
    type: 'UnaryOp',
    op,
    operand: operand.value,
    span: makeSpan(opToken.span.start, operand.value.span.end),
  };
  return ok(node);
};
