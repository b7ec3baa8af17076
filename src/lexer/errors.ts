/**
 * Lexer Errors
 */

import { ERROR_REGISTRY, FormulaError, messageFor } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends FormulaError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    location: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    if (ERROR_REGISTRY.get(errorId)?.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message: messageFor(errorId, context), location, context });

    this.name = 'LexerError';
    this.location = location;
  }
}
