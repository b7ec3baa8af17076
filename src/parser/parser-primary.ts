/**
 * Parser Extension: Primary Expressions
 * Literals, field references, function calls, and grouping
 */

import { Parser } from './parser.js';
import type {
  FormulaNode,
  FormulaValue,
  ParseError,
  Result,
  Token,
} from '../types.js';
import { fail, ok, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  unexpected,
} from './state.js';

type NodeResult = Result<FormulaNode, ParseError>;

declare module './parser.js' {
  interface Parser {
    parsePrimary(): NodeResult;
    parseIdentifier(): NodeResult;
    parseFunctionCall(name: Token): NodeResult;
    parseGrouped(): NodeResult;
  }
}

function literal(token: Token, value: FormulaValue): NodeResult {
  const node: FormulaNode = { type: 'Literal', value, span: token.span };
  return ok(node);
}

Parser.prototype.parsePrimary = function (this: Parser): NodeResult {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return literal(token, Number(token.value));
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return literal(token, token.value);
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return literal(token, true);
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return literal(token, false);
    case TOKEN_TYPES.NULL:
      advance(this.state);
      return literal(token, null);
    case TOKEN_TYPES.IDENTIFIER:
      return this.parseIdentifier();
    case TOKEN_TYPES.LPAREN:
      return this.parseGrouped();
    default:
      return fail(unexpected(token));
  }
};

/**
 * Identifier: function call when immediately followed by `(`,
 * field reference otherwise.
 */
Parser.prototype.parseIdentifier = function (this: Parser): NodeResult {
  const name = advance(this.state);

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseFunctionCall(name);
  }

  const node: FormulaNode = {
    type: 'FieldReference',
    name: name.value,
    span: name.span,
  };
  return ok(node);
};

/**
 * Function call: name '(' [expression (',' expression)*] ')'
 */
Parser.prototype.parseFunctionCall = function (
  this: Parser,
  name: Token
): NodeResult {
  advance(this.state); // consume (

  const args: FormulaNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    for (;;) {
      const arg = this.nested(name, () => this.parseExpression());
      if (!arg.ok) return arg;
      args.push(arg.value);

      if (!check(this.state, TOKEN_TYPES.COMMA)) break;
      advance(this.state); // consume ,
    }
  }

  const close = expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
  if (!close.ok) return close;

  const node: FormulaNode = {
    type: 'FunctionCall',
    name: name.value,
    args,
    span: makeSpan(name.span.start, close.value.span.end),
  };
  return ok(node);
};

/**
 * Grouped expression: '(' expression ')'
 * Grouping leaves no node of its own in the tree.
 */
Parser.prototype.parseGrouped = function (this: Parser): NodeResult {
  const open = advance(this.state);

  const inner = this.nested(open, () => this.parseExpression());
  if (!inner.ok) return inner;

  const close = expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  if (!close.ok) return close;

  return inner;
};
