/**
 * Dependency Graph & Scheduler
 *
 * Orders an entity's calculated fields so every field is evaluated after
 * the calculated fields it references. References to fields without a
 * formula are leaves: they come from the caller's snapshot and impose no
 * ordering.
 */

import { parse, type FormulaSyntaxError } from '../parser/index.js';
import { createRecord } from '../records.js';
import type { FormulaNode, Result } from '../types.js';
import { CircularDependencyError, fail, ok } from '../types.js';
import { extractFieldReferences } from './references.js';

// ============================================================
// GRAPH
// ============================================================

export interface DependencyGraph {
  /** Calculated field ids in ascending order */
  readonly nodes: readonly string[];
  /** field → calculated fields it references, ascending */
  readonly edges: ReadonlyMap<string, readonly string[]>;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Build the graph from each calculated field's referenced names.
 * Names outside the key set are dropped.
 */
export function buildGraphFromReferences(
  references: Readonly<Record<string, Iterable<string>>>
): DependencyGraph {
  const nodes = Object.keys(references).sort(compareIds);
  const calculated = new Set(nodes);
  const edges = new Map<string, readonly string[]>();

  for (const field of nodes) {
    const targets = new Set<string>();
    for (const name of references[field] ?? []) {
      if (calculated.has(name)) targets.add(name);
    }
    edges.set(field, [...targets].sort(compareIds));
  }

  return { nodes, edges };
}

/**
 * Build the graph for `{ field id → AST }` of one entity.
 */
export function buildDependencyGraph(
  asts: Readonly<Record<string, FormulaNode>>
): DependencyGraph {
  const references = createRecord<ReadonlySet<string>>();
  for (const [field, ast] of Object.entries(asts)) {
    references[field] = extractFieldReferences(ast);
  }
  return buildGraphFromReferences(references);
}

function neighbors(graph: DependencyGraph, field: string): readonly string[] {
  return graph.edges.get(field) ?? [];
}

// ============================================================
// CYCLE DETECTION
// ============================================================

type Color = 'white' | 'gray' | 'black';

/**
 * Three-color depth-first search for the first cycle.
 * Roots and neighbors are visited in ascending id order, so the same graph
 * always reports the same cycle.
 *
 * @returns Fields on the cycle in traversal order, or null when acyclic
 */
export function findCycle(graph: DependencyGraph): string[] | null {
  const color = new Map<string, Color>();
  const path: string[] = [];

  const visit = (field: string): string[] | null => {
    color.set(field, 'gray');
    path.push(field);

    for (const next of neighbors(graph, field)) {
      const state = color.get(next) ?? 'white';
      if (state === 'gray') {
        return path.slice(path.indexOf(next));
      }
      if (state === 'white') {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
    }

    path.pop();
    color.set(field, 'black');
    return null;
  };

  for (const field of graph.nodes) {
    if ((color.get(field) ?? 'white') === 'white') {
      const cycle = visit(field);
      if (cycle) return cycle;
    }
  }
  return null;
}

// ============================================================
// TOPOLOGICAL ORDER
// ============================================================

/**
 * Evaluation order for an acyclic graph.
 * Among fields whose dependencies are all placed, the smallest id goes
 * first, so the order is fully determined by the graph.
 */
export function topologicalOrder(
  graph: DependencyGraph
): Result<string[], CircularDependencyError> {
  const cycle = findCycle(graph);
  if (cycle) {
    return fail(new CircularDependencyError(cycle));
  }

  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const field of graph.nodes) {
    const deps = neighbors(graph, field);
    remaining.set(field, deps.length);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(field);
      dependents.set(dep, list);
    }
  }

  const ready = graph.nodes.filter((field) => remaining.get(field) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort(compareIds);
    const field = ready.shift();
    if (field === undefined) break;
    order.push(field);

    for (const dependent of dependents.get(field) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) ready.push(dependent);
    }
  }

  return ok(order);
}

/**
 * Evaluation order for `{ field id → AST }`.
 */
export function computeEvaluationOrder(
  asts: Readonly<Record<string, FormulaNode>>
): Result<string[], CircularDependencyError> {
  return topologicalOrder(buildDependencyGraph(asts));
}

/**
 * Evaluation order for `{ field id → formula text }`.
 * Formulas are parsed in ascending id order and the first syntax error
 * fails the plan.
 *
 * @example
 * planEvaluation({ total: 'subtotal + tax', subtotal: 'price * qty', tax: 'subtotal * 0.2' })
 * // ok(['subtotal', 'tax', 'total'])
 */
export function planEvaluation(
  formulas: Readonly<Record<string, string>>
): Result<string[], FormulaSyntaxError | CircularDependencyError> {
  const asts = createRecord<FormulaNode>();

  for (const field of Object.keys(formulas).sort(compareIds)) {
    const parsed = parse(formulas[field] ?? '');
    if (!parsed.ok) return parsed;
    asts[field] = parsed.value;
  }

  return computeEvaluationOrder(asts);
}
