/**
 * Evaluation Context Factory
 *
 * Creates and configures the context formulas are evaluated in.
 * Public API for host applications.
 */

import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import type {
  EvaluationContext,
  EvaluationOptions,
  FunctionDefinition,
} from './types.js';

/**
 * Create an evaluation context.
 * Host functions are registered after the built-ins and replace any
 * built-in of the same name.
 *
 * @throws TypeError for a budget that is not a positive number
 */
export function createEvaluationContext(
  options: EvaluationOptions = {}
): EvaluationContext {
  const functions = new Map<string, FunctionDefinition>();

  for (const [name, definition] of Object.entries(BUILTIN_FUNCTIONS)) {
    functions.set(name, definition);
  }

  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new TypeError(`Invalid function name: '${name}'`);
      }
      functions.set(name, definition);
    }
  }

  const { budgetMs } = options;
  if (
    budgetMs !== undefined &&
    (!Number.isFinite(budgetMs) || budgetMs <= 0)
  ) {
    throw new TypeError(`budgetMs must be a positive number, got ${budgetMs}`);
  }

  return {
    functions,
    observability: options.observability ?? {},
    clock: options.clock ?? (() => new Date()),
    timer: options.timer ?? (() => performance.now()),
    budgetMs,
  };
}

/** Names of every function callable in `ctx`, sorted */
export function listFunctions(ctx: EvaluationContext): string[] {
  return [...ctx.functions.keys()].sort();
}
