/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { FormulaNode, Result, Token } from '../types.js';
import { fail, ParseError } from '../types.js';
import {
  type ParserState,
  createParserState,
  current,
  isAtEnd,
  MAX_NESTING_DEPTH,
  tooDeep,
  unexpected,
} from './state.js';

/** Height of a tree, walked without recursion */
function treeHeight(root: FormulaNode): number {
  let height = 0;
  const pending: Array<[FormulaNode, number]> = [[root, 1]];

  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const [node, level] = entry;
    height = Math.max(height, level);

    switch (node.type) {
      case 'UnaryOp':
        pending.push([node.operand, level + 1]);
        break;
      case 'BinaryOp':
        pending.push([node.left, level + 1], [node.right, level + 1]);
        break;
      case 'FunctionCall':
        for (const arg of node.args) pending.push([arg, level + 1]);
        break;
      default:
        break;
    }
  }

  return height;
}

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-expr.ts: precedence chain from `or` down to unary
 * - parser-primary.ts: literals, field references, calls, grouping
 *
 * Every method returns a Result; the first failure stops parsing and no
 * partial tree is produced.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const result = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens and position */
  state: ParserState;

  constructor(tokens: readonly Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Run `parseInner` one nesting level deeper, failing at `token` once
   * MAX_NESTING_DEPTH levels are open.
   */
  nested(
    token: Token,
    parseInner: () => Result<FormulaNode, ParseError>
  ): Result<FormulaNode, ParseError> {
    if (this.state.depth >= MAX_NESTING_DEPTH) {
      return fail(tooDeep(token.span.start));
    }
    this.state.depth++;
    const result = parseInner();
    this.state.depth--;
    return result;
  }

  /**
   * Parse exactly one expression followed by end of input.
   * Long operator chains nest in the tree, so its height is limited too.
   */
  parse(): Result<FormulaNode, ParseError> {
    if (isAtEnd(this.state)) {
      return fail(
        new ParseError('CALC-P002', 'Empty formula', current(this.state).span.start)
      );
    }

    const expr = this.parseExpression();
    if (!expr.ok) return expr;

    if (!isAtEnd(this.state)) {
      return fail(unexpected(current(this.state)));
    }
    if (treeHeight(expr.value) > MAX_NESTING_DEPTH) {
      return fail(tooDeep(expr.value.span.start));
    }
    return expr;
  }
}
