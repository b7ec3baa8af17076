/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory =
  | 'lexer'
  | 'parse'
  | 'runtime'
  | 'dependency'
  | 'coercion';

/**
 * Example demonstrating an error condition.
 * Used by `fieldcalc --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: CALC-{category letter}{3-digit} (e.g., CALC-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (CALC-L0xx)
  {
    errorId: 'CALC-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'A string was opened with a quote but the formula ended first.',
    resolution: 'Add the closing quote that matches the opening one.',
    examples: [{ description: 'Missing closing quote', code: '"hello' }],
  },
  {
    errorId: 'CALC-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: "Unexpected character '{char}'",
    cause: 'Character is not part of the formula syntax.',
    resolution:
      'Remove or replace the character. Field names may only contain letters, digits and underscores.',
    examples: [
      { description: 'Dollar sign in a field name', code: 'price$ * 2' },
      { description: 'Single equals sign', code: 'status = 1' },
    ],
  },

  // Parse Errors (CALC-P0xx)
  {
    errorId: 'CALC-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token {found}',
    cause: 'The parser found a token that cannot appear at this point.',
    resolution:
      'Check for missing operators between values, or a stray operator or parenthesis.',
    examples: [
      { description: 'Missing operators', code: '1 2 3' },
      { description: 'Dangling operator', code: 'a +' },
    ],
  },
  {
    errorId: 'CALC-P002',
    category: 'parse',
    description: 'Empty formula',
    messageTemplate: 'Empty formula',
    cause: 'The formula contains no tokens.',
    resolution: 'Write exactly one expression.',
  },
  {
    errorId: 'CALC-P003',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expected {expected}, got {found}',
    cause: 'A closing parenthesis or argument separator is missing.',
    resolution: 'Balance parentheses and separate function arguments with commas.',
    examples: [
      { description: 'Unclosed parenthesis', code: '(a + b' },
      { description: 'Missing comma', code: 'min(a b)' },
    ],
  },
  {
    errorId: 'CALC-P004',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Formula nests deeper than {max} levels',
    cause:
      'Parentheses, prefix operators, function calls or chained operators are nested beyond the parser limit.',
    resolution: 'Split the formula into calculated fields that reference each other.',
  },

  // Runtime Errors (CALC-R0xx)
  {
    errorId: 'CALC-R001',
    category: 'runtime',
    description: 'Undefined field',
    messageTemplate: "Field '{name}' is not defined",
    cause:
      'The formula references a field that is missing from the value snapshot, or whose own formula failed.',
    resolution:
      'Check the field name for typos and make sure the field has a value before evaluation.',
    examples: [{ description: 'Typo in field name', code: 'depth_form + 1' }],
  },
  {
    errorId: 'CALC-R002',
    category: 'runtime',
    description: 'Type mismatch',
    messageTemplate: "Operator '{operator}' cannot be applied to {operands}",
    cause: 'An operator received operands of the wrong kind.',
    resolution:
      'Arithmetic needs numbers; ordering comparisons need two numbers or two texts. Use concat() to join text.',
    examples: [
      { description: 'Adding text to a number', code: '"a" + 1' },
      { description: 'Comparing a number with text', code: '1 < "2"' },
    ],
  },
  {
    errorId: 'CALC-R003',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: "Division by zero in '{operator}'",
    cause: 'The right operand of / or % evaluated to zero.',
    resolution:
      'Guard the divisor with a short-circuit, e.g. b != 0 and a / b. Function arguments are always evaluated, so if_else() does not guard.',
    examples: [{ description: 'Literal zero divisor', code: 'x / 0' }],
  },
  {
    errorId: 'CALC-R004',
    category: 'runtime',
    description: 'Unknown function',
    messageTemplate: "Unknown function '{name}'",
    cause: 'The function is neither built in nor registered by the host.',
    resolution: 'Check the spelling or register the function in the context.',
    examples: [{ description: 'Misspelled function', code: 'mx(a, b)' }],
  },
  {
    errorId: 'CALC-R005',
    category: 'runtime',
    description: 'Invalid function arguments',
    messageTemplate: "{name}(): {reason}",
    cause: 'A function rejected the number or kind of its arguments.',
    resolution: 'Check the arity and argument kinds the function expects.',
    examples: [{ description: 'abs() of text', code: 'abs("x")' }],
  },
  {
    errorId: 'CALC-R006',
    category: 'runtime',
    description: 'Evaluation budget exceeded',
    messageTemplate: "Field '{field}' exceeded its {budgetMs}ms budget",
    cause: 'Evaluating the field took longer than the configured budget.',
    resolution: 'Raise budgetMs or simplify the formula and its host functions.',
  },
  {
    errorId: 'CALC-R007',
    category: 'runtime',
    description: 'Function failed',
    messageTemplate: "{name}() failed: {reason}",
    cause: 'A host-supplied function threw instead of returning a failure.',
    resolution: 'Fix the host function; it should return argumentError() results.',
  },
  {
    errorId: 'CALC-R008',
    category: 'runtime',
    description: 'Non-finite result',
    messageTemplate: "'{operation}' produced a non-finite result",
    cause:
      'Arithmetic or a function overflowed to infinity or had no real result, e.g. a fractional power of a negative number.',
    resolution: 'Keep operands in range, or guard them with a comparison first.',
    examples: [
      { description: 'Overflow', code: '10 ** 400' },
      { description: 'Square root of a negative number', code: '(0 - 8) ** 0.5' },
    ],
  },

  // Dependency Errors (CALC-D0xx)
  {
    errorId: 'CALC-D001',
    category: 'dependency',
    description: 'Circular dependency',
    messageTemplate: 'Circular dependency: {path}',
    cause: 'Calculated fields reference each other in a loop.',
    resolution: 'Break the loop so that at least one field does not depend on the others.',
    examples: [{ description: 'Two fields referencing each other', code: 'A: B + 1\nB: A + 1' }],
  },

  // Coercion Errors (CALC-C0xx)
  {
    errorId: 'CALC-C001',
    category: 'coercion',
    description: 'Coercion failed',
    messageTemplate: 'Cannot convert {kind} to {target}',
    cause: 'The computed value has no representation in the requested output type.',
    resolution:
      'NUMBER accepts numbers only; booleans, text and null are rejected. Change the formula or target.',
    examples: [{ description: 'Boolean to NUMBER', code: 'a > b  (target NUMBER)' }],
  },
  {
    errorId: 'CALC-C002',
    category: 'coercion',
    description: 'All output mappings failed',
    messageTemplate: 'All output mappings failed: {details}',
    cause: 'Every candidate (formula, target) pair failed to evaluate or coerce.',
    resolution: 'Inspect the individual attempts listed in the message.',
  },
  {
    errorId: 'CALC-C003',
    category: 'coercion',
    description: 'No output mapping',
    messageTemplate: "No output mapping defined for field '{field}'",
    cause: 'Output evaluation was requested for a field with no mappings.',
    resolution: 'Add at least one (formula, target) mapping to the field.',
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} slots with values
 * from `context`. Missing values render as empty text; `{{` and `}}` stay
 * literal braces.
 *
 * @example
 * renderMessage("Field '{name}' is not defined", { name: 'total' })
 * // "Field 'total' is not defined"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i];

    if (char === '{' && template[i + 1] === '{') {
      result += '{';
      i += 2;
      continue;
    }
    if (char === '}' && template[i + 1] === '}') {
      result += '}';
      i += 2;
      continue;
    }

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        // Unclosed brace is literal text
        result += template.slice(i);
        break;
      }
      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
