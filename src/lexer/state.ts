/**
 * Lexer State
 * Tracks the grapheme cursor and collected diagnostics during scanning
 */

import {
  advanceCursor,
  closeSpan,
  createCursor,
  ErrorLog,
  snapshotSpan,
  splitGraphemes,
  type CursorSpan,
  type SourceSpan,
} from '../types.js';

export interface LexerState {
  readonly graphemes: readonly string[];
  pos: number;
  /** Span of the token being scanned; closed after each token */
  readonly cursor: CursorSpan;
  readonly errors: ErrorLog;
}

export function createLexerState(source: string): LexerState {
  return {
    graphemes: splitGraphemes(source),
    pos: 0,
    cursor: createCursor(),
    errors: new ErrorLog(),
  };
}

export function peek(state: LexerState, offset = 0): string {
  return state.graphemes[state.pos + offset] ?? '';
}

export function advance(state: LexerState): string {
  const grapheme = state.graphemes[state.pos] ?? '';
  if (grapheme !== '') {
    state.pos++;
    advanceCursor(state.cursor, grapheme);
  }
  return grapheme;
}

/** Consume the next grapheme only when it equals `expected` */
export function match(state: LexerState, expected: string): boolean {
  if (peek(state) !== expected) return false;
  advance(state);
  return true;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.graphemes.length;
}

export function currentSpan(state: LexerState): SourceSpan {
  return snapshotSpan(state.cursor);
}

export function startNextToken(state: LexerState): void {
  closeSpan(state.cursor);
}
