/**
 * Token Readers
 * Functions to read specific token types from formula text
 */

import type { Token } from '../types.js';
import { fail, ok, TOKEN_TYPES, type Result } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  readWhile,
} from './state.js';

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
};

/** Unknown escapes keep the escaped character (`\q` reads as `q`) */
function unescape(ch: string): string {
  return Object.hasOwn(ESCAPES, ch) ? (ESCAPES[ch] ?? ch) : ch;
}

/**
 * Read a string delimited by `"` or `'`.
 * The token value is the unescaped content without quotes.
 */
export function readString(state: LexerState): Result<Token, LexerError> {
  const start = currentLocation(state);
  const quote = advance(state); // consume opening quote

  let value = '';
  while (!isAtEnd(state) && peek(state) !== quote) {
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      if (isAtEnd(state)) break;
      value += unescape(advance(state));
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    return fail(new LexerError('CALC-L001', start));
  }

  advance(state); // consume closing quote
  return ok(makeToken(state, TOKEN_TYPES.STRING, value, start));
}

/** Integer or decimal; a `.` only belongs to the number when a digit follows */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let lexeme = readWhile(state, isDigit);

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    lexeme += advance(state); // consume .
    lexeme += readWhile(state, isDigit);
  }

  return makeToken(state, TOKEN_TYPES.NUMBER, lexeme, start);
}

/** Identifier or keyword; keywords match case-insensitively */
export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const lexeme = readWhile(state, isIdentifierChar);

  const lower = lexeme.toLowerCase();
  const keyword = Object.hasOwn(KEYWORDS, lower) ? KEYWORDS[lower] : undefined;
  if (keyword !== undefined) {
    return makeToken(state, keyword, lower, start);
  }
  return makeToken(state, TOKEN_TYPES.IDENTIFIER, lexeme, start);
}
