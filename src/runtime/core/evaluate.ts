/**
 * Expression Evaluator
 *
 * Tree-walking interpreter over a formula AST. Reads the snapshot, never
 * writes it. The first failing sub-expression aborts the whole formula.
 */

import type {
  BinaryOpNode,
  FieldSnapshot,
  FormulaNode,
  FormulaValue,
  FunctionCallNode,
  Result,
  UnaryOpNode,
} from '../../types.js';
import {
  DivisionByZeroError,
  fail,
  NonFiniteResultError,
  ok,
  RuntimeError,
  TypeMismatchError,
  UndefinedFieldError,
} from '../../types.js';
import { invokeFunction } from './callable.js';
import type { EvaluationContext } from './types.js';
import { isTruthy, valueKind, valuesEqual } from './values.js';

type ValueResult = Result<FormulaValue, RuntimeError>;

// ============================================================
// OPERATORS
// ============================================================

function evaluateUnary(
  node: UnaryOpNode,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext
): ValueResult {
  const operand = evaluateNode(node.operand, snapshot, ctx);
  if (!operand.ok) return operand;
  const value = operand.value;

  if (node.op === 'not') {
    return ok(!isTruthy(value));
  }
  if (typeof value !== 'number') {
    return fail(
      new TypeMismatchError(node.op, [valueKind(value)], node.span.start)
    );
  }
  return ok(node.op === '-' ? -value : value);
}

/** Floored modulo: the result takes the sign of the divisor */
function floorMod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

function computeArithmetic(
  node: BinaryOpNode,
  left: number,
  right: number
): ValueResult {
  switch (node.op) {
    case '+':
      return ok(left + right);
    case '-':
      return ok(left - right);
    case '*':
      return ok(left * right);
    case '/':
      if (right === 0) {
        return fail(new DivisionByZeroError('/', node.span.start));
      }
      return ok(left / right);
    case '%':
      if (right === 0) {
        return fail(new DivisionByZeroError('%', node.span.start));
      }
      return ok(floorMod(left, right));
    case '**':
      return ok(left ** right);
    default:
      return fail(
        new RuntimeError(
          'CALC-R002',
          `Operator '${node.op}' is not arithmetic`,
          node.span.start
        )
      );
  }
}

/** Numeric results are always finite: overflow and NaN fail the formula */
function applyArithmetic(
  node: BinaryOpNode,
  left: number,
  right: number
): ValueResult {
  const result = computeArithmetic(node, left, right);
  if (
    result.ok &&
    typeof result.value === 'number' &&
    !Number.isFinite(result.value)
  ) {
    return fail(new NonFiniteResultError(node.op, node.span.start));
  }
  return result;
}

function applyOrdering(
  op: '<' | '<=' | '>' | '>=',
  left: number | string,
  right: number | string
): boolean {
  switch (op) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

function evaluateBinary(
  node: BinaryOpNode,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext
): ValueResult {
  const leftResult = evaluateNode(node.left, snapshot, ctx);
  if (!leftResult.ok) return leftResult;
  const left = leftResult.value;

  // Short-circuit: the deciding operand is the result
  if (node.op === 'or' && isTruthy(left)) return ok(left);
  if (node.op === 'and' && !isTruthy(left)) return ok(left);

  const rightResult = evaluateNode(node.right, snapshot, ctx);
  if (!rightResult.ok) return rightResult;
  const right = rightResult.value;

  switch (node.op) {
    case 'or':
    case 'and':
      return ok(right);

    case '==':
      return ok(valuesEqual(left, right));
    case '!=':
      return ok(!valuesEqual(left, right));

    case '<':
    case '<=':
    case '>':
    case '>=':
      if (typeof left === 'number' && typeof right === 'number') {
        return ok(applyOrdering(node.op, left, right));
      }
      if (typeof left === 'string' && typeof right === 'string') {
        return ok(applyOrdering(node.op, left, right));
      }
      break;

    default:
      if (typeof left === 'number' && typeof right === 'number') {
        return applyArithmetic(node, left, right);
      }
  }

  return fail(
    new TypeMismatchError(
      node.op,
      [valueKind(left), valueKind(right)],
      node.span.start
    )
  );
}

function evaluateCall(
  node: FunctionCallNode,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext
): ValueResult {
  // Arguments are evaluated eagerly, left to right, before dispatch
  const args: FormulaValue[] = [];
  for (const arg of node.args) {
    const result = evaluateNode(arg, snapshot, ctx);
    if (!result.ok) return result;
    args.push(result.value);
  }
  return invokeFunction(node.name, args, ctx, node.span.start);
}

// ============================================================
// ENTRY POINTS
// ============================================================

/**
 * Evaluate one node without emitting onError.
 * @internal
 */
export function evaluateNode(
  node: FormulaNode,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext
): ValueResult {
  switch (node.type) {
    case 'Literal':
      return ok(node.value);

    case 'FieldReference': {
      const value = snapshot[node.name];
      if (!Object.hasOwn(snapshot, node.name) || value === undefined) {
        return fail(new UndefinedFieldError(node.name, node.span.start));
      }
      return ok(value);
    }

    case 'UnaryOp':
      return evaluateUnary(node, snapshot, ctx);

    case 'BinaryOp':
      return evaluateBinary(node, snapshot, ctx);

    case 'FunctionCall':
      return evaluateCall(node, snapshot, ctx);
  }
}

/**
 * Evaluate an AST against a snapshot of field values.
 *
 * @example
 * ```typescript
 * const ast = parse('depth_from + depth_to');
 * if (ast.ok) evaluate(ast.value, { depth_from: 5, depth_to: 10 }, ctx);
 * // { ok: true, value: 15 }
 * ```
 */
export function evaluate(
  ast: FormulaNode,
  snapshot: FieldSnapshot,
  ctx: EvaluationContext
): ValueResult {
  const result = evaluateNode(ast, snapshot, ctx);
  if (!result.ok) {
    ctx.observability.onError?.({ error: result.error });
  }
  return result;
}
