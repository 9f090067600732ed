/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { LoxError, SourceToken, TokenType } from '../types.js';
import {
  createError,
  ErrorLog,
  InternalError,
  TOKEN_TYPES,
  tokenLexeme,
  tokenTypeLexeme,
} from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export const DEFAULT_MAX_DEPTH = 200;

export interface ParserState {
  readonly tokens: readonly SourceToken[];
  pos: number;
  /** Errors collected while resynchronizing after failed declarations */
  readonly errors: ErrorLog;
  /** Active nesting: unary/primary levels plus left folds in progress */
  depth: number;
  readonly maxDepth: number;
}

export interface ParserStateOptions {
  /** Deepest expression nesting accepted before reporting an error */
  maxDepth?: number;
}

export function createParserState(
  tokens: readonly SourceToken[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    errors: new ErrorLog(),
    depth: 0,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/**
 * Token at the cursor, EOF included.
 * The scanner guarantees an EOF sentinel; running off the list breaks that.
 * @internal
 */
export function current(state: ParserState): SourceToken {
  const token = state.tokens[state.pos];
  if (!token) {
    throw new InternalError('Consumed all tokens without encountering EOF');
  }
  return token;
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).token.type === TOKEN_TYPES.EOF;
}

/**
 * Token at the cursor, or null at EOF. Never advances.
 * @internal
 */
export function peek(state: ParserState): SourceToken | null {
  return isAtEnd(state) ? null : current(state);
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  const token = peek(state);
  return token !== null && types.includes(token.token.type);
}

/**
 * Return the token at the cursor and move past it.
 * Stops at EOF, returning null there.
 * @internal
 */
export function advance(state: ParserState): SourceToken | null {
  const token = peek(state);
  if (token) state.pos++;
  return token;
}

/** @internal */
export function previous(state: ParserState): SourceToken | null {
  return state.pos > 0 ? (state.tokens[state.pos - 1] ?? null) : null;
}

/**
 * Advance and require the consumed token to be of `type`.
 * The payload is not compared.
 * @internal
 */
export function consume(
  state: ParserState,
  type: TokenType,
  context: string
): SourceToken {
  const expected = tokenTypeLexeme(type);
  const token = advance(state);

  if (!token) {
    throw endOfFileError(state, expected);
  }
  if (token.token.type !== type) {
    throw createError(
      'LOX-P001',
      { expected, context, found: tokenLexeme(token.token) },
      { location: token.span }
    );
  }
  return token;
}

/**
 * "Reached end of file" diagnostic, located at the last real token.
 * @internal
 */
export function endOfFileError(
  state: ParserState,
  expected: string
): LoxError {
  return createError(
    'LOX-P002',
    { expected },
    { location: (previous(state) ?? current(state)).span }
  );
}

// ============================================================
// NESTING GUARD
// ============================================================

/**
 * Enter one nesting level; the caller restores `depth` when it leaves.
 * @internal
 */
export function enterLevel(state: ParserState): void {
  if (state.depth >= state.maxDepth) {
    throw createError(
      'LOX-P005',
      { maxDepth: state.maxDepth },
      { location: current(state).span }
    );
  }
  state.depth++;
}

/**
 * Run `parse` one nesting level deeper, failing with a diagnostic instead
 * of exhausting the call stack.
 * @internal
 */
export function nested<T>(state: ParserState, parse: () => T): T {
  enterLevel(state);
  try {
    return parse();
  } finally {
    state.depth--;
  }
}
