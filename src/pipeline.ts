/**
 * Pipeline
 * Scan, parse and interpret one source text, stopping at the first stage
 * that reports diagnostics
 */

import { scan } from './lexer/index.js';
import { parse, type ParserOptions } from './parser/index.js';
import { interpret, type RuntimeOptions } from './runtime/index.js';
import type { ErrorLog, SourceToken, StmtNode } from './types.js';

export type Stage = 'scan' | 'parse' | 'runtime';

export interface RunOptions extends RuntimeOptions, ParserOptions {}

export interface RunResult {
  /** Stage whose diagnostics stopped the run, or null on success */
  readonly failedStage: Stage | null;
  readonly errors: ErrorLog;
  readonly tokens: readonly SourceToken[];
  /** Empty when scanning failed */
  readonly statements: readonly StmtNode[];
}

/**
 * Run source text through every stage.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const result = runSource('print 1 + 2;', {
 *   callbacks: { writeLine: (line) => lines.push(line) },
 * });
 * // result.failedStage === null, lines === ['3']
 * ```
 */
export function runSource(source: string, options: RunOptions = {}): RunResult {
  const scanned = scan(source);
  if (!scanned.errors.isEmpty()) {
    return {
      failedStage: 'scan',
      errors: scanned.errors,
      tokens: scanned.tokens,
      statements: [],
    };
  }

  const parsed = parse(scanned.tokens, options);
  if (!parsed.errors.isEmpty()) {
    return {
      failedStage: 'parse',
      errors: parsed.errors,
      tokens: scanned.tokens,
      statements: parsed.statements,
    };
  }

  const errors = interpret(parsed.statements, options);
  return {
    failedStage: errors.isEmpty() ? null : 'runtime',
    errors,
    tokens: scanned.tokens,
    statements: parsed.statements,
  };
}
