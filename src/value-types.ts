/** Any value a formula can read or produce */
export type FormulaValue = number | string | boolean | null;

/** Semantic kind of a FormulaValue, used in error messages */
export type ValueKind = 'number' | 'text' | 'boolean' | 'null';

/** Externally visible representation a computed value can be coerced to */
export type OutputTarget = 'TEXT' | 'NUMBER' | 'BOOLEAN';

/** Result type inferred for a formula at design time */
export type FormulaResultType = OutputTarget | 'UNKNOWN';

/**
 * Read-only mapping from field identifier to its current value.
 * A missing key means the field is undefined, never null.
 */
export type FieldSnapshot = Readonly<Record<string, FormulaValue>>;
