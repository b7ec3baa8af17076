/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { fail, ok, TOKEN_TYPES, type Result } from '../types.js';
import { LexerError } from './errors.js';
import {
  consumeOperator,
  isDigit,
  isIdentifierStart,
  isQuote,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  readWhile,
} from './state.js';

export function nextToken(state: LexerState): Result<Token, LexerError> {
  readWhile(state, isWhitespace);

  const start = currentLocation(state);

  if (isAtEnd(state)) {
    return ok(makeToken(state, TOKEN_TYPES.EOF, '', start));
  }

  const ch = peek(state);

  if (isQuote(ch)) {
    return readString(state);
  }

  // Numbers are unsigned; the parser handles unary minus
  if (isDigit(ch)) {
    return ok(readNumber(state));
  }

  if (isIdentifierStart(ch)) {
    return ok(readIdentifier(state));
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return ok(consumeOperator(state, 2, twoCharType, start));
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return ok(consumeOperator(state, 1, singleCharType, start));
  }

  return fail(new LexerError('CALC-L002', start, { char: ch }));
}

/**
 * Convert formula text into tokens.
 * On success the last token is always EOF; the first invalid character or
 * unterminated string fails the whole run.
 */
export function tokenize(source: string): Result<Token[], LexerError> {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (;;) {
    const result = nextToken(state);
    if (!result.ok) return result;
    tokens.push(result.value);
    if (result.value.type === TOKEN_TYPES.EOF) return ok(tokens);
  }
}
