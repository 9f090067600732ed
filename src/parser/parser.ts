/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ErrorLog, SourceToken, StmtNode } from '../types.js';
import {
  type ParserState,
  type ParserStateOptions,
  createParserState,
} from './state.js';

/**
 * Parser class that converts a whitespace-free token list into statements.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declarations, statements, resynchronization
 * - parser-expr.ts: Ternary and the binary precedence chain, unary
 * - parser-literals.ts: Primary expressions
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const statements = parser.parse();
 * if (!parser.errors.isEmpty()) console.error(parser.errors.toString());
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: readonly SourceToken[], options?: ParserStateOptions) {
    this.state = createParserState(tokens, options);
  }

  /**
   * Parse every declaration up to EOF. Failed declarations are recorded in
   * `errors` and skipped.
   */
  parse(): StmtNode[] {
    return this.parseProgram();
  }

  get errors(): ErrorLog {
    return this.state.errors;
  }
}
