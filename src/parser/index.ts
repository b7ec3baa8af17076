/**
 * Formula Parser
 * Main entry point and re-exports
 */

import { tokenize, type LexerError } from '../lexer/index.js';
import type { FormulaNode, ParseError, Result, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-primary.js';

/** Failure from either tokenizing or parsing formula text */
export type FormulaSyntaxError = LexerError | ParseError;

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token sequence (ending in EOF) into an AST.
 */
export function parseTokens(
  tokens: readonly Token[]
): Result<FormulaNode, ParseError> {
  return new Parser(tokens).parse();
}

/**
 * Parse formula text into an AST.
 *
 * Fails on the first lexical or syntax error; never returns a partial tree.
 *
 * @example
 * ```typescript
 * const result = parse('depth_from + depth_to');
 * if (result.ok) console.log(result.value.type); // 'BinaryOp'
 * ```
 */
export function parse(
  source: string
): Result<FormulaNode, FormulaSyntaxError> {
  const tokens = tokenize(source);
  if (!tokens.ok) return tokens;
  return parseTokens(tokens.value);
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  createParserState,
  MAX_NESTING_DEPTH,
  type ParserState,
} from './state.js';
export { Parser } from './parser.js';
