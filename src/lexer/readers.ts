/**
 * Token Readers
 * Each reader runs after its lead grapheme has been consumed
 */

import type { SourceToken } from '../types.js';
import {
  createError,
  InternalError,
  isNewlineGrapheme,
  TOKEN_TYPES,
} from '../types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentSpan,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a string literal; the opening quote is already consumed.
 * Strings may span lines. Returns null, after recording a diagnostic,
 * when input ends before the closing quote.
 */
export function readString(state: LexerState): SourceToken | null {
  let text = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    text += advance(state);
  }

  if (isAtEnd(state)) {
    state.errors.push(
      createError('LOX-S002', {}, { location: currentSpan(state) })
    );
    return null;
  }

  advance(state); // consume closing "
  return makeToken(state, { type: TOKEN_TYPES.STRING, text });
}

/**
 * Read a number literal starting with the consumed `lead` digit.
 * A `.` is only part of the number when a digit follows it.
 */
export function readNumber(state: LexerState, lead: string): SourceToken {
  let lexeme = lead;

  while (isDigit(peek(state))) {
    lexeme += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    lexeme += advance(state); // consume .
    while (isDigit(peek(state))) {
      lexeme += advance(state);
    }
  }

  const value = Number(lexeme);
  if (Number.isNaN(value)) {
    throw new InternalError(
      `Scanned numeric lexeme is not a number: ${lexeme}`
    );
  }
  return makeToken(state, { type: TOKEN_TYPES.NUMBER, value });
}

export function readIdentifier(state: LexerState, lead: string): SourceToken {
  let text = lead;

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    text += advance(state);
  }

  const keyword = KEYWORDS.get(text);
  if (keyword) {
    return makeToken(state, { type: keyword });
  }
  return makeToken(state, { type: TOKEN_TYPES.IDENTIFIER, text });
}

/** Read a line comment; both slashes are already consumed */
export function readComment(state: LexerState): SourceToken {
  let text = '//';
  while (!isAtEnd(state) && !isNewlineGrapheme(peek(state))) {
    text += advance(state);
  }
  return makeToken(state, { type: TOKEN_TYPES.COMMENT, text });
}
