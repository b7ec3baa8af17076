/**
 * Cycle Analysis
 *
 * Reports every cycle reachable by depth-first search over formula
 * dependencies. Informational only: nothing is blocked or changed.
 */

/** One dependency cycle */
export interface FormulaCycle {
  /** Fields on the cycle, starting with the smallest id */
  readonly fieldIds: readonly string[];
  /** Readable path closing back on its start: "a → b → a" */
  readonly path: string;
}

export interface CycleAnalysis {
  readonly hasCycles: boolean;
  /** Ordered by path */
  readonly cycles: readonly FormulaCycle[];
  readonly analyzedFieldCount: number;
}

/** Rotate a cycle so it starts at its smallest id */
function normalize(cycle: readonly string[]): string[] {
  let minIndex = 0;
  cycle.forEach((field, i) => {
    const smallest = cycle[minIndex];
    if (smallest !== undefined && field < smallest) minIndex = i;
  });
  return [...cycle.slice(minIndex), ...cycle.slice(0, minIndex)];
}

/**
 * Find the dependency cycles among formula fields.
 *
 * Edges only lead to fields present as keys, so references to plain
 * input fields never form cycles. A field referencing itself is a cycle of
 * one. The same cycle reached from different starting points is reported
 * once.
 *
 * @example
 * detectCycles({ a: ['b'], b: ['a'] }).cycles[0]?.path // 'a → b → a'
 */
export function detectCycles(
  dependencies: Readonly<Record<string, readonly string[]>>
): CycleAnalysis {
  const fields = Object.keys(dependencies).sort();
  const visited = new Set<string>();
  const onPath = new Set<string>();
  const path: string[] = [];
  const found = new Map<string, FormulaCycle>();

  const visit = (field: string): void => {
    if (onPath.has(field)) {
      const fieldIds = normalize(path.slice(path.indexOf(field)));
      const first = fieldIds[0] ?? field;
      const cyclePath = [...fieldIds, first].join(' → ');
      if (!found.has(cyclePath)) {
        found.set(cyclePath, { fieldIds, path: cyclePath });
      }
      return;
    }
    if (visited.has(field)) return;

    visited.add(field);
    onPath.add(field);
    path.push(field);

    const deps = [...(dependencies[field] ?? [])].sort();
    for (const dep of deps) {
      if (Object.hasOwn(dependencies, dep)) visit(dep);
    }

    path.pop();
    onPath.delete(field);
  };

  for (const field of fields) visit(field);

  const cycles = [...found.values()].sort((a, b) =>
    a.path < b.path ? -1 : a.path > b.path ? 1 : 0
  );

  return {
    hasCycles: cycles.length > 0,
    cycles,
    analyzedFieldCount: fields.length,
  };
}
