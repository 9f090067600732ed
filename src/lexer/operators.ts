/**
 * Operator Lookup Tables
 */

import type { SimpleTokenType, TokenType, WhitespaceKind } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character punctuation that never combines with a following `=` */
export const SINGLE_CHAR_OPERATORS: Record<string, SimpleTokenType> = {
  '(': TOKEN_TYPES.LEFT_PAREN,
  ')': TOKEN_TYPES.RIGHT_PAREN,
  '{': TOKEN_TYPES.LEFT_BRACE,
  '}': TOKEN_TYPES.RIGHT_BRACE,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  '-': TOKEN_TYPES.MINUS,
  '+': TOKEN_TYPES.PLUS,
  ';': TOKEN_TYPES.SEMICOLON,
  '*': TOKEN_TYPES.STAR,
  '?': TOKEN_TYPES.QUESTION,
  ':': TOKEN_TYPES.COLON,
};

/** Lead symbol -> [alone, followed by `=`] */
export const EQUAL_SUFFIX_OPERATORS: Record<
  string,
  readonly [SimpleTokenType, SimpleTokenType]
> = {
  '!': [TOKEN_TYPES.BANG, TOKEN_TYPES.BANG_EQUAL],
  '=': [TOKEN_TYPES.EQUAL, TOKEN_TYPES.EQUAL_EQUAL],
  '<': [TOKEN_TYPES.LESS, TOKEN_TYPES.LESS_EQUAL],
  '>': [TOKEN_TYPES.GREATER, TOKEN_TYPES.GREATER_EQUAL],
};

export const WHITESPACE: Record<string, WhitespaceKind> = {
  ' ': 'space',
  '\t': 'tab',
  '\r': 'carriage-return',
  '\n': 'newline',
  '\r\n': 'newline',
};

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, SimpleTokenType> = new Map<
  string,
  SimpleTokenType
>([
  ['and', TOKEN_TYPES.AND],
  ['class', TOKEN_TYPES.CLASS],
  ['else', TOKEN_TYPES.ELSE],
  ['false', TOKEN_TYPES.FALSE],
  ['fun', TOKEN_TYPES.FUN],
  ['for', TOKEN_TYPES.FOR],
  ['if', TOKEN_TYPES.IF],
  ['nil', TOKEN_TYPES.NIL],
  ['or', TOKEN_TYPES.OR],
  ['print', TOKEN_TYPES.PRINT],
  ['return', TOKEN_TYPES.RETURN],
  ['super', TOKEN_TYPES.SUPER],
  ['this', TOKEN_TYPES.THIS],
  ['true', TOKEN_TYPES.TRUE],
  ['var', TOKEN_TYPES.VAR],
  ['while', TOKEN_TYPES.WHILE],
]);

/** Keywords that begin a statement; the parser resynchronizes on these */
export const STATEMENT_KEYWORDS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.RETURN,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.WHILE,
]);
