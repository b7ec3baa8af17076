/**
 * Design-Time Analysis
 *
 * Checks a formula against a schema without evaluating it: syntax, field
 * and function names, a best-effort result type, and warnings for
 * operations that will fail at runtime on text operands.
 */

import { parse, type FormulaSyntaxError } from '../parser/index.js';
import { BUILTIN_FUNCTIONS } from '../runtime/ext/builtins.js';
import type { FunctionDefinition } from '../runtime/core/types.js';
import type {
  BinaryOpNode,
  FormulaNode,
  FormulaResultType,
  Result,
} from '../types.js';
import { ok } from '../types.js';
import { extractFieldReferences, extractFunctionCalls } from './references.js';

// ============================================================
// SCHEMA
// ============================================================

/** Field kinds a schema may declare */
export type SchemaFieldType =
  | 'TEXT'
  | 'TEXTAREA'
  | 'NUMBER'
  | 'DATE'
  | 'DROPDOWN'
  | 'CHECKBOX'
  | 'RADIO'
  | 'CALCULATED'
  | 'LOOKUP'
  | 'FILE'
  | 'IMAGE'
  | 'TABLE';

export interface SchemaField {
  readonly id: string;
  readonly type: SchemaFieldType;
}

/** Formula type of a value read from each field kind */
const FIELD_RESULT_TYPES: Readonly<Record<SchemaFieldType, FormulaResultType>> = {
  TEXT: 'TEXT',
  TEXTAREA: 'TEXT',
  NUMBER: 'NUMBER',
  DATE: 'TEXT',
  DROPDOWN: 'TEXT',
  CHECKBOX: 'BOOLEAN',
  RADIO: 'TEXT',
  CALCULATED: 'UNKNOWN',
  LOOKUP: 'UNKNOWN',
  FILE: 'TEXT',
  IMAGE: 'TEXT',
  TABLE: 'UNKNOWN',
};

export interface AnalysisOptions {
  /** Callable functions (default: the built-ins) */
  functions?: ReadonlyMap<string, FunctionDefinition>;
}

const BUILTIN_TABLE: ReadonlyMap<string, FunctionDefinition> = new Map(
  Object.entries(BUILTIN_FUNCTIONS)
);

function lookupFields(
  schemaFields: readonly SchemaField[]
): ReadonlyMap<string, SchemaField> {
  return new Map(schemaFields.map((field) => [field.id, field]));
}

// ============================================================
// TYPE INFERENCE
// ============================================================

interface InferenceScope {
  readonly fields: ReadonlyMap<string, SchemaField>;
  readonly functions: ReadonlyMap<string, FunctionDefinition>;
}

const COMPARISONS = new Set(['==', '!=', '<', '<=', '>', '>=']);

function inferBinary(node: BinaryOpNode, scope: InferenceScope): FormulaResultType {
  if (COMPARISONS.has(node.op)) return 'BOOLEAN';
  if (node.op === 'and' || node.op === 'or') {
    // The deciding operand is the result, so the type is only known when
    // both sides agree
    const left = inferNode(node.left, scope);
    return left === inferNode(node.right, scope) ? left : 'UNKNOWN';
  }
  return 'NUMBER';
}

function inferNode(node: FormulaNode, scope: InferenceScope): FormulaResultType {
  switch (node.type) {
    case 'Literal':
      if (typeof node.value === 'boolean') return 'BOOLEAN';
      if (typeof node.value === 'number') return 'NUMBER';
      if (typeof node.value === 'string') return 'TEXT';
      return 'UNKNOWN';

    case 'FieldReference': {
      const field = scope.fields.get(node.name);
      return field ? FIELD_RESULT_TYPES[field.type] : 'UNKNOWN';
    }

    case 'UnaryOp':
      return node.op === 'not' ? 'BOOLEAN' : 'NUMBER';

    case 'BinaryOp':
      return inferBinary(node, scope);

    case 'FunctionCall':
      return scope.functions.get(node.name)?.returnType ?? 'UNKNOWN';
  }
}

// ============================================================
// WARNINGS
// ============================================================

const ARITHMETIC = new Set(['+', '-', '*', '/', '%', '**']);

function collectWarnings(
  node: FormulaNode,
  scope: InferenceScope,
  warnings: string[]
): void {
  switch (node.type) {
    case 'Literal':
    case 'FieldReference':
      return;

    case 'UnaryOp':
      if (node.op !== 'not' && inferNode(node.operand, scope) === 'TEXT') {
        warnings.push(`Unary '${node.op}' on TEXT type may fail`);
      }
      collectWarnings(node.operand, scope, warnings);
      return;

    case 'BinaryOp':
      if (ARITHMETIC.has(node.op)) {
        for (const side of [node.left, node.right]) {
          if (inferNode(side, scope) === 'TEXT') {
            warnings.push(`Arithmetic operation '${node.op}' on TEXT type may fail`);
          }
        }
      }
      collectWarnings(node.left, scope, warnings);
      collectWarnings(node.right, scope, warnings);
      return;

    case 'FunctionCall':
      for (const arg of node.args) collectWarnings(arg, scope, warnings);
      return;
  }
}

// ============================================================
// PUBLIC API
// ============================================================

export interface FormulaValidation {
  /** True when there are no errors; warnings do not count */
  readonly valid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly inferredType: FormulaResultType;
  /** Referenced field names, ascending */
  readonly references: readonly string[];
  /** Underlying failure when the formula does not parse */
  readonly syntaxError: FormulaSyntaxError | undefined;
}

function invalid(
  message: string,
  syntaxError: FormulaSyntaxError | undefined
): FormulaValidation {
  return {
    valid: false,
    errors: [message],
    warnings: [],
    inferredType: 'UNKNOWN',
    references: [],
    syntaxError,
  };
}

/**
 * Validate `text` against the fields of a schema.
 *
 * @example
 * validateFormula('price * qty', [
 *   { id: 'price', type: 'NUMBER' },
 *   { id: 'qty', type: 'NUMBER' },
 * ]).inferredType // 'NUMBER'
 */
export function validateFormula(
  text: string,
  schemaFields: readonly SchemaField[],
  options: AnalysisOptions = {}
): FormulaValidation {
  if (text.trim() === '') {
    return invalid('Formula cannot be empty', undefined);
  }

  const parsed = parse(text);
  if (!parsed.ok) {
    return invalid(`Syntax error: ${parsed.error.message}`, parsed.error);
  }

  const ast = parsed.value;
  const scope: InferenceScope = {
    fields: lookupFields(schemaFields),
    functions: options.functions ?? BUILTIN_TABLE,
  };
  const errors: string[] = [];

  const references = [...extractFieldReferences(ast)].sort();
  for (const name of references) {
    if (!scope.fields.has(name)) errors.push(`Unknown field: '${name}'`);
  }

  const allowed = [...scope.functions.keys()].sort().join(', ');
  for (const name of [...extractFunctionCalls(ast)].sort()) {
    if (!scope.functions.has(name)) {
      errors.push(`Unknown function: '${name}'. Allowed: ${allowed}`);
    }
  }

  const warnings: string[] = [];
  collectWarnings(ast, scope, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    inferredType: inferNode(ast, scope),
    references,
    syntaxError: undefined,
  };
}

/**
 * Best-effort result type of `text`; UNKNOWN when it does not parse.
 */
export function inferResultType(
  text: string,
  schemaFields: readonly SchemaField[],
  options: AnalysisOptions = {}
): FormulaResultType {
  const parsed = parse(text);
  if (!parsed.ok) return 'UNKNOWN';
  return inferNode(parsed.value, {
    fields: lookupFields(schemaFields),
    functions: options.functions ?? BUILTIN_TABLE,
  });
}

export interface FieldDependency {
  readonly fieldId: string;
  /** Declared in the schema */
  readonly known: boolean;
  readonly fieldType: SchemaFieldType | undefined;
}

export interface DependencyAnalysis {
  /** Every referenced field, ascending */
  readonly dependencies: readonly FieldDependency[];
  /** Referenced fields missing from the schema, ascending */
  readonly unknownFields: readonly string[];
}

/**
 * Fields `text` depends on, resolved against the schema.
 */
export function analyzeDependencies(
  text: string,
  schemaFields: readonly SchemaField[]
): Result<DependencyAnalysis, FormulaSyntaxError> {
  const parsed = parse(text);
  if (!parsed.ok) return parsed;

  const fields = lookupFields(schemaFields);
  const dependencies: FieldDependency[] = [];
  const unknownFields: string[] = [];

  for (const fieldId of [...extractFieldReferences(parsed.value)].sort()) {
    const field = fields.get(fieldId);
    dependencies.push({ fieldId, known: field !== undefined, fieldType: field?.type });
    if (!field) unknownFields.push(fieldId);
  }

  return ok({ dependencies, unknownFields });
}
