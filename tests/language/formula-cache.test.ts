/**
 * Compiled Formula Tests
 */

import { describe, expect, it } from 'vitest';

import { compileFormula, FormulaCache } from '../../src/index.js';
import { unwrap } from '../helpers/runtime.js';

describe('compileFormula', () => {
  it('keeps the text, tree and references together', () => {
    const formula = unwrap(compileFormula('price * qty + price'));
    expect(formula.text).toBe('price * qty + price');
    expect(formula.ast.type).toBe('BinaryOp');
    expect([...formula.references].sort()).toEqual(['price', 'qty']);
  });

  it('fails with the syntax error', () => {
    const result = compileFormula('1 2');
    expect(!result.ok && result.error.message).toBe(
      'Unexpected token number 2 at position 2'
    );
  });
});

describe('FormulaCache', () => {
  it('returns the same compiled formula for the same text', () => {
    const cache = new FormulaCache();
    const first = cache.compile('a + 1');
    expect(cache.compile('a + 1')).toBe(first);
    expect(cache.size).toBe(1);
  });

  it('caches failures too', () => {
    const cache = new FormulaCache();
    const first = cache.compile('(');
    expect(first.ok).toBe(false);
    expect(cache.compile('(')).toBe(first);
  });

  it('evicts the least recently used entry', () => {
    const cache = new FormulaCache(2);
    const a = cache.compile('a');
    cache.compile('b');
    cache.compile('a');
    cache.compile('c');

    expect(cache.size).toBe(2);
    expect(cache.compile('a')).toBe(a);
    expect(cache.size).toBe(2);
  });

  it('recompiles after an eviction', () => {
    const cache = new FormulaCache(1);
    const a = cache.compile('a');
    cache.compile('b');
    expect(cache.compile('a')).not.toBe(a);
  });

  it('clear drops every entry', () => {
    const cache = new FormulaCache();
    cache.compile('x');
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('rejects a capacity below one', () => {
    expect(() => new FormulaCache(0)).toThrow(
      'maxEntries must be a positive integer, got 0'
    );
  });
});
