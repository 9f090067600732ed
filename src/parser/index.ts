/**
 * Lox Parser
 * Main entry point and re-exports
 */

import type { ErrorLog, SourceToken, StmtNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

export interface ParserOptions {
  /** Deepest expression nesting accepted (default 200) */
  maxDepth?: number;
  /** Drop comment tokens instead of rejecting them (default false) */
  skipComments?: boolean;
}

export interface ParseResult {
  readonly statements: StmtNode[];
  readonly errors: ErrorLog;
}

/**
 * Parse a scanned token list into statements.
 *
 * Whitespace tokens are dropped first. Failed declarations are collected
 * in `errors` and parsing resumes at the next statement boundary.
 *
 * @example
 * ```typescript
 * const { tokens } = scan('print 1 + 2;');
 * const { statements, errors } = parse(tokens);
 * ```
 */
export function parse(
  tokens: readonly SourceToken[],
  options: ParserOptions = {}
): ParseResult {
  const significant = tokens.filter(
    ({ token }) =>
      token.type !== TOKEN_TYPES.WHITESPACE &&
      !(options.skipComments && token.type === TOKEN_TYPES.COMMENT)
  );

  const parserOptions =
    options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {};
  const parser = new Parser(significant, parserOptions);
  const statements = parser.parse();

  return { statements, errors: parser.errors };
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export {
  createParserState,
  DEFAULT_MAX_DEPTH,
  type ParserState,
  type ParserStateOptions,
} from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
