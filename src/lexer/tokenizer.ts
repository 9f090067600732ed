/**
 * Tokenizer
 * Main scanning loop: lead grapheme dispatch, span bookkeeping, EOF sentinel
 */

import type { SourceToken } from '../types.js';
import { createError, type ErrorLog, TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierStart, makeToken } from './helpers.js';
import {
  EQUAL_SUFFIX_OPERATORS,
  SINGLE_CHAR_OPERATORS,
  WHITESPACE,
} from './operators.js';
import {
  readComment,
  readIdentifier,
  readNumber,
  readString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentSpan,
  isAtEnd,
  type LexerState,
  match,
  startNextToken,
} from './state.js';

export interface ScanResult {
  /** Always ends with exactly one EOF token */
  readonly tokens: SourceToken[];
  readonly errors: ErrorLog;
}

/**
 * Scan the token starting at the cursor.
 * Returns null when the lead grapheme produced a diagnostic instead.
 */
export function nextToken(state: LexerState): SourceToken | null {
  const lead = advance(state);

  const single = SINGLE_CHAR_OPERATORS[lead];
  if (single) {
    return makeToken(state, { type: single });
  }

  const pair = EQUAL_SUFFIX_OPERATORS[lead];
  if (pair) {
    const [alone, withEqual] = pair;
    return makeToken(state, { type: match(state, '=') ? withEqual : alone });
  }

  if (lead === '/') {
    if (match(state, '/')) {
      return readComment(state);
    }
    return makeToken(state, { type: TOKEN_TYPES.SLASH });
  }

  const whitespace = WHITESPACE[lead];
  if (whitespace) {
    return makeToken(state, {
      type: TOKEN_TYPES.WHITESPACE,
      kind: whitespace,
    });
  }

  if (lead === '"') {
    return readString(state);
  }

  if (isDigit(lead)) {
    return readNumber(state, lead);
  }

  if (isIdentifierStart(lead)) {
    return readIdentifier(state, lead);
  }

  state.errors.push(
    createError(
      'LOX-S001',
      {},
      { subject: lead, location: currentSpan(state) }
    )
  );
  return null;
}

/**
 * Scan source text into positioned tokens.
 * Lexical errors are collected; scanning never stops early except at an
 * unterminated string, which consumes the rest of the input.
 */
export function scan(source: string): ScanResult {
  const state = createLexerState(source);
  const tokens: SourceToken[] = [];

  while (!isAtEnd(state)) {
    const token = nextToken(state);
    if (token) tokens.push(token);
    startNextToken(state);
  }

  tokens.push(makeToken(state, { type: TOKEN_TYPES.EOF }));
  return { tokens, errors: state.errors };
}
