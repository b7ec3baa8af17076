/**
 * Lexer State
 * Cursor over the formula text with line/column tracking
 */

import type { SourceLocation, SourceSpan } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Span from `start` to the current cursor */
export function spanFrom(state: LexerState, start: SourceLocation): SourceSpan {
  return { start, end: currentLocation(state) };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function advanceBy(state: LexerState, count: number): string {
  let consumed = '';
  for (let i = 0; i < count && !isAtEnd(state); i++) {
    consumed += advance(state);
  }
  return consumed;
}

/** Consume characters while `predicate` holds; returns what was consumed */
export function readWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): string {
  let consumed = '';
  while (!isAtEnd(state) && predicate(peek(state))) {
    consumed += advance(state);
  }
  return consumed;
}
