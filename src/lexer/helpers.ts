/**
 * Lexer Helper Functions
 * Grapheme classification and token construction
 */

import type { SourceToken, Token } from '../types.js';
import { currentSpan, type LexerState } from './state.js';

export function isDigit(grapheme: string): boolean {
  return grapheme.length === 1 && grapheme >= '0' && grapheme <= '9';
}

/** A letter, optionally followed by combining marks */
export function isAlphabetic(grapheme: string): boolean {
  return /^\p{Alphabetic}\p{M}*$/u.test(grapheme);
}

export function isIdentifierStart(grapheme: string): boolean {
  return grapheme === '_' || isAlphabetic(grapheme);
}

export function isIdentifierChar(grapheme: string): boolean {
  return grapheme === '_' || /^[\p{Alphabetic}\p{N}]\p{M}*$/u.test(grapheme);
}

/** Snapshot the cursor span into a token */
export function makeToken(state: LexerState, token: Token): SourceToken {
  return { token, span: currentSpan(state) };
}
