import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Single-character punctuation
  LEFT_PAREN: 'LEFT_PAREN', // (
  RIGHT_PAREN: 'RIGHT_PAREN', // )
  LEFT_BRACE: 'LEFT_BRACE', // {
  RIGHT_BRACE: 'RIGHT_BRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *
  QUESTION: 'QUESTION', // ?
  COLON: 'COLON', // :

  // One or two character operators
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FUN: 'FUN',
  FOR: 'FOR',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  // Meta
  COMMENT: 'COMMENT',
  WHITESPACE: 'WHITESPACE',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export type WhitespaceKind = 'space' | 'tab' | 'carriage-return' | 'newline';

/** Token types whose variant carries a payload */
type PayloadTokenType =
  | 'IDENTIFIER'
  | 'STRING'
  | 'NUMBER'
  | 'COMMENT'
  | 'WHITESPACE';

export type SimpleTokenType = Exclude<TokenType, PayloadTokenType>;

export type Token =
  | { readonly type: SimpleTokenType }
  | { readonly type: 'IDENTIFIER'; readonly text: string }
  | { readonly type: 'STRING'; readonly text: string }
  | { readonly type: 'NUMBER'; readonly value: number }
  | { readonly type: 'COMMENT'; readonly text: string }
  | { readonly type: 'WHITESPACE'; readonly kind: WhitespaceKind };

/** A token paired with the span it was lexed from */
export interface SourceToken {
  readonly token: Token;
  readonly span: SourceSpan;
}

// ============================================================
// LEXEMES
// ============================================================

const FIXED_LEXEMES: Record<SimpleTokenType, string> = {
  LEFT_PAREN: '(',
  RIGHT_PAREN: ')',
  LEFT_BRACE: '{',
  RIGHT_BRACE: '}',
  COMMA: ',',
  DOT: '.',
  MINUS: '-',
  PLUS: '+',
  SEMICOLON: ';',
  SLASH: '/',
  STAR: '*',
  QUESTION: '?',
  COLON: ':',
  BANG: '!',
  BANG_EQUAL: '!=',
  EQUAL: '=',
  EQUAL_EQUAL: '==',
  GREATER: '>',
  GREATER_EQUAL: '>=',
  LESS: '<',
  LESS_EQUAL: '<=',
  AND: 'and',
  CLASS: 'class',
  ELSE: 'else',
  FALSE: 'false',
  FUN: 'fun',
  FOR: 'for',
  IF: 'if',
  NIL: 'nil',
  OR: 'or',
  PRINT: 'print',
  RETURN: 'return',
  SUPER: 'super',
  THIS: 'this',
  TRUE: 'true',
  VAR: 'var',
  WHILE: 'while',
  EOF: 'EOF',
};

const WHITESPACE_LEXEMES: Record<WhitespaceKind, string> = {
  space: ' ',
  tab: '\t',
  'carriage-return': '\r',
  newline: '\n',
};

/** Source-like rendering of a token, used in diagnostics */
export function tokenLexeme(token: Token): string {
  switch (token.type) {
    case 'IDENTIFIER':
    case 'COMMENT':
      return token.text;
    case 'STRING':
      return `"${token.text}"`;
    case 'NUMBER':
      return String(token.value);
    case 'WHITESPACE':
      return WHITESPACE_LEXEMES[token.kind];
    default:
      return FIXED_LEXEMES[token.type];
  }
}

/** Rendering of a bare token type, for "expected X" messages */
export function tokenTypeLexeme(type: TokenType): string {
  switch (type) {
    case 'IDENTIFIER':
      return 'identifier';
    case 'STRING':
      return 'string';
    case 'NUMBER':
      return 'number';
    case 'COMMENT':
      return 'comment';
    case 'WHITESPACE':
      return 'whitespace';
    default:
      return FIXED_LEXEMES[type];
  }
}
