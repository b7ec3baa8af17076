/**
 * AST Structural Equality
 *
 * Compares AST nodes for structural equality, ignoring source locations.
 * Re-parsing the same formula text must yield trees equal under this test.
 */

import type { FormulaNode } from '../../types.js';

function argsEqual(
  a: readonly FormulaNode[],
  b: readonly FormulaNode[]
): boolean {
  if (a.length !== b.length) return false;
  return a.every((arg, i) => {
    const other = b[i];
    return other !== undefined && astEquals(arg, other);
  });
}

/**
 * Compare two AST nodes for structural equality.
 * Ignores source locations (span) - only compares structure and values.
 */
export function astEquals(a: FormulaNode, b: FormulaNode): boolean {
  switch (a.type) {
    case 'Literal':
      return b.type === 'Literal' && a.value === b.value;

    case 'FieldReference':
      return b.type === 'FieldReference' && a.name === b.name;

    case 'UnaryOp':
      return (
        b.type === 'UnaryOp' &&
        a.op === b.op &&
        astEquals(a.operand, b.operand)
      );

    case 'BinaryOp':
      return (
        b.type === 'BinaryOp' &&
        a.op === b.op &&
        astEquals(a.left, b.left) &&
        astEquals(a.right, b.right)
      );

    case 'FunctionCall':
      return (
        b.type === 'FunctionCall' &&
        a.name === b.name &&
        argsEqual(a.args, b.args)
      );
  }
}
