/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '**': TOKEN_TYPES.POWER,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  ',': TOKEN_TYPES.COMMA,
};

/** Keyword lookup table, keyed by lowercase spelling */
export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  null: TOKEN_TYPES.NULL,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
};
