/**
 * Compiled Formulas
 *
 * A Formula pairs the authored text with its AST and referenced fields.
 * The AST is derived data: the cache can be dropped at any time because
 * re-parsing the same text yields an equal tree.
 */

import { extractFieldReferences } from './analysis/references.js';
import { parse, type FormulaSyntaxError } from './parser/index.js';
import type { FormulaNode, Result } from './types.js';
import { ok } from './types.js';

export interface Formula {
  /** Text as authored */
  readonly text: string;
  readonly ast: FormulaNode;
  /** Field names referenced anywhere in the formula */
  readonly references: ReadonlySet<string>;
}

/**
 * Parse `text` into a Formula.
 */
export function compileFormula(
  text: string
): Result<Formula, FormulaSyntaxError> {
  const parsed = parse(text);
  if (!parsed.ok) return parsed;

  return ok({
    text,
    ast: parsed.value,
    references: extractFieldReferences(parsed.value),
  });
}

/**
 * Memoises compileFormula per formula text, failures included.
 * Entries beyond `maxEntries` evict the least recently used one.
 */
export class FormulaCache {
  private readonly entries = new Map<
    string,
    Result<Formula, FormulaSyntaxError>
  >();

  private readonly maxEntries: number;

  constructor(maxEntries = 500) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new TypeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  compile(text: string): Result<Formula, FormulaSyntaxError> {
    const cached = this.entries.get(text);
    if (cached) {
      // Refresh recency
      this.entries.delete(text);
      this.entries.set(text, cached);
      return cached;
    }

    const result = compileFormula(text);
    this.entries.set(text, result);
    if (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    return result;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
