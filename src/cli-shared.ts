/**
 * CLI Shared Utilities
 * Argument parsing, exit codes and output formatting for the tlox binary
 */

import type { Stage } from './pipeline.js';
import type { ErrorLog, SourceToken } from './types.js';
import { tokenLexeme } from './types.js';

// ============================================================
// EXIT CODES
// ============================================================

/** Process exit statuses, following the BSD sysexits convention */
export const EXIT_CODES = {
  OK: 0,
  USAGE: 64,
  DATA: 65,
  NO_INPUT: 66,
  SOFTWARE: 70,
  INTERNAL: 71,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Exit status for a run that stopped at `stage` (null = success) */
export function exitCodeForStage(stage: Stage | null): ExitCode {
  switch (stage) {
    case null:
      return EXIT_CODES.OK;
    case 'scan':
    case 'parse':
      return EXIT_CODES.DATA;
    case 'runtime':
      return EXIT_CODES.SOFTWARE;
  }
}

// ============================================================
// ARGUMENT PARSING
// ============================================================

/** Command-line misuse; reported with the usage text */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type OutputMode = 'run' | 'tokens' | 'ast';

export type ScriptSource =
  | { kind: 'file'; path: string }
  | { kind: 'inline'; text: string };

interface CommonArgs {
  configPath: string | undefined;
  trace: boolean;
  output: OutputMode;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'help' }
  | { mode: 'version' }
  | ({ mode: 'script'; source: ScriptSource } & CommonArgs)
  | ({ mode: 'repl' } & CommonArgs);

function onlySource(
  current: ScriptSource | undefined,
  next: ScriptSource
): ScriptSource {
  if (current) {
    throw new UsageError('Only one script may be given');
  }
  return next;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws UsageError for unknown options, missing option values, or more
 * than one script
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  // --help and --version win in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const common: CommonArgs = {
    configPath: undefined,
    trace: false,
    output: 'run',
  };
  let source: ScriptSource | undefined = undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '-e': {
        const text = argv[++i];
        if (text === undefined) {
          throw new UsageError('Missing source after -e');
        }
        source = onlySource(source, { kind: 'inline', text });
        break;
      }
      case '--config': {
        const path = argv[++i];
        if (path === undefined) {
          throw new UsageError('Missing file after --config');
        }
        common.configPath = path;
        break;
      }
      case '--tokens':
        common.output = 'tokens';
        break;
      case '--ast':
        common.output = 'ast';
        break;
      case '--trace':
        common.trace = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        source = onlySource(source, { kind: 'file', path: arg });
    }
  }

  if (!source) {
    return { mode: 'repl', ...common };
  }
  return { mode: 'script', source, ...common };
}

export const USAGE = `Usage:
  tlox [options] [script]

Runs the script file, or starts an interactive session when no script is
given. An empty line ends the session.

Options:
  -e <source>        Run inline source instead of a file
  --tokens           Print the scanned tokens instead of running
  --ast              Print the parsed statements instead of running
  --config <file>    Read settings from <file> (default: ./tlox.config.yaml)
  --trace            Report each executed statement on stderr
  -h, --help         Show this help message
  -v, --version      Show version information

Examples:
  tlox script.lox
  tlox -e 'print 1 + 2;'
  tlox --ast -e 'print true ? "yes" : "no";'`;

// ============================================================
// FORMATTING
// ============================================================

/** Display form of every diagnostic, one per line */
export function formatDiagnostics(errors: ErrorLog): string[] {
  return errors.toArray().map((error) => error.message);
}

/**
 * One token per line: position, type, and payload where the type has one.
 *
 * @example
 * formatToken(token) // '1:7 NUMBER 12.5'
 */
export function formatToken({ token, span }: SourceToken): string {
  const position = `${span.start.line}:${span.start.column}`;
  switch (token.type) {
    case 'IDENTIFIER':
    case 'STRING':
    case 'NUMBER':
    case 'COMMENT':
      return `${position} ${token.type} ${tokenLexeme(token)}`;
    case 'WHITESPACE':
      return `${position} ${token.type} ${token.kind}`;
    default:
      return `${position} ${token.type}`;
  }
}
