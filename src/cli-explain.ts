/**
 * CLI Error Explanation
 * Function for rendering full error documentation
 */

import { ERROR_REGISTRY } from './types.js';

/**
 * Render full error documentation for --explain.
 *
 * @param errorId - Error identifier (format: CALC-{category}{3-digit})
 * @returns Formatted documentation, or null for a malformed or unknown id
 *
 * @example
 * explainError('CALC-R003')
 * // 'CALC-R003: Division by zero\n\nCause:\n  ...'
 */
export function explainError(errorId: string): string | null {
  if (!/^CALC-[LPRDC]\d{3}$/.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}

/** Every registered error id with its description, one per line */
export function listErrors(): string {
  return [...ERROR_REGISTRY.entries()]
    .map(([id, definition]) => `${id}  ${definition.description}`)
    .join('\n');
}
