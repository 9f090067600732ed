/**
 * Lexer Module
 * Converts source text into positioned tokens
 */

export { createLexerState, type LexerState } from './state.js';
export { nextToken, scan, type ScanResult } from './tokenizer.js';
