/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { fail, ok, ParseError, TOKEN_TYPES, type Result } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  /** Always ends with an EOF token */
  readonly tokens: readonly Token[];
  pos: number;
  /** Open groups, prefix operators, calls and right-nested powers */
  depth: number;
}

/** Deepest nesting a formula may use, in the source and in its tree */
export const MAX_NESTING_DEPTH = 100;

export function createParserState(tokens: readonly Token[]): ParserState {
  return { tokens, pos: 0, depth: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

const MISSING_EOF: Token = {
  type: TOKEN_TYPES.EOF,
  value: '',
  span: {
    start: { line: 1, column: 1, offset: 0 },
    end: { line: 1, column: 1, offset: 0 },
  },
};

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  return (
    state.tokens[state.pos + offset] ??
    state.tokens[state.tokens.length - 1] ??
    MISSING_EOF
  );
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of `type`, or fail naming what was expected and found.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Result<Token, ParseError> {
  if (check(state, type)) return ok(advance(state));
  const token = current(state);
  return fail(
    new ParseError(
      'CALC-P003',
      `Expected ${expected}, got ${describeToken(token)}`,
      token.span.start,
      { expected, found: token.type }
    )
  );
}

/**
 * Failure for a token that cannot appear where it was found.
 * @internal
 */
export function unexpected(token: Token): ParseError {
  return new ParseError(
    'CALC-P001',
    `Unexpected token ${describeToken(token)}`,
    token.span.start,
    { found: token.type }
  );
}

/**
 * Failure for a formula nested past MAX_NESTING_DEPTH.
 * @internal
 */
export function tooDeep(location: SourceLocation): ParseError {
  return new ParseError(
    'CALC-P004',
    `Formula nests deeper than ${MAX_NESTING_DEPTH} levels`,
    location,
    { max: MAX_NESTING_DEPTH }
  );
}

/** @internal */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of formula';
    case TOKEN_TYPES.STRING:
      return `string "${token.value}"`;
    case TOKEN_TYPES.NUMBER:
      return `number ${token.value}`;
    default:
      return `'${token.value}'`;
  }
}

/** @internal */
export function makeSpan(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}
