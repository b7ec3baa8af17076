/**
 * Field Reference Extraction
 * Read-only walks over an AST collecting names it mentions
 */

import type { FormulaNode } from '../types.js';

function collect(
  node: FormulaNode,
  visit: (node: FormulaNode) => void
): void {
  visit(node);
  switch (node.type) {
    case 'Literal':
    case 'FieldReference':
      return;
    case 'UnaryOp':
      collect(node.operand, visit);
      return;
    case 'BinaryOp':
      collect(node.left, visit);
      collect(node.right, visit);
      return;
    case 'FunctionCall':
      for (const arg of node.args) collect(arg, visit);
      return;
  }
}

/**
 * Names of every field referenced anywhere in `ast`.
 * Duplicates collapse; function names are not field references.
 *
 * @example
 * extractFieldReferences(parse('a + abs(b - a)')) // Set { 'a', 'b' }
 */
export function extractFieldReferences(ast: FormulaNode): ReadonlySet<string> {
  const names = new Set<string>();
  collect(ast, (node) => {
    if (node.type === 'FieldReference') names.add(node.name);
  });
  return names;
}

/** Names of every function called anywhere in `ast` */
export function extractFunctionCalls(ast: FormulaNode): ReadonlySet<string> {
  const names = new Set<string>();
  collect(ast, (node) => {
    if (node.type === 'FunctionCall') names.add(node.name);
  });
  return names;
}
