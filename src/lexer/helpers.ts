/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { advanceBy, spanFrom, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function isQuote(ch: string): boolean {
  return ch === '"' || ch === "'";
}

/** Token ending at the current cursor */
export function makeToken(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: spanFrom(state, start) };
}

/** Consume an operator of `length` characters and return its token */
export function consumeOperator(
  state: LexerState,
  length: number,
  type: TokenType,
  start: SourceLocation
): Token {
  const lexeme = advanceBy(state, length);
  return makeToken(state, type, lexeme, start);
}
