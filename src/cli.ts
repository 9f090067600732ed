#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main() for the tlox binary: script files, inline source,
 * token and AST dumps, and the interactive session.
 */

import * as fs from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import * as readline from 'node:readline';
import { ConfigError, loadConfig, type LoxConfig } from './cli-config.js';
import {
  EXIT_CODES,
  exitCodeForStage,
  formatDiagnostics,
  formatToken,
  parseArgs,
  USAGE,
  UsageError,
  type ExitCode,
  type OutputMode,
  type ParsedArgs,
} from './cli-shared.js';
import { scan } from './lexer/index.js';
import { parse } from './parser/index.js';
import { runSource, type RunOptions } from './pipeline.js';
import { printStmt } from './printer.js';
import {
  Environment,
  inspectValue,
  typeName,
  type ObservabilityCallbacks,
} from './runtime/index.js';
import { InternalError } from './types.js';

/** Line sinks for regular output and diagnostics */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/** Streams the interactive session reads from and prompts on */
export interface ReplStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

// ============================================================
// VERSION
// ============================================================

/** Version from the package.json beside src/ and dist/ */
export function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

// ============================================================
// RUN OPTIONS
// ============================================================

function traceCallbacks(io: CliIO): ObservabilityCallbacks {
  return {
    onStepStart: ({ index, total }) => {
      io.stderr(`[trace] step ${index + 1}/${total}`);
    },
    onStepEnd: ({ index, total, value, durationMs }) => {
      io.stderr(
        `[trace] step ${index + 1}/${total} = ${inspectValue(value)} ` +
          `(${typeName(value)}, ${durationMs.toFixed(3)}ms)`
      );
    },
    onError: ({ index, error }) => {
      io.stderr(`[trace] step ${index + 1} failed: ${error.name}`);
    },
  };
}

/** Pipeline options for a config, printing through `io` */
export function createRunOptions(
  config: LoxConfig,
  io: CliIO,
  trace: boolean
): RunOptions {
  return {
    maxDepth: config.maxDepth,
    skipComments: config.skipComments,
    ternary: config.ternary,
    callbacks: { writeLine: io.stdout },
    observability: trace ? traceCallbacks(io) : {},
  };
}

// ============================================================
// SCRIPT MODE
// ============================================================

/**
 * Run, or dump the tokens or statements of, one complete source text.
 * Diagnostics go to stderr in display form.
 */
export function runScript(
  source: string,
  output: OutputMode,
  options: RunOptions,
  io: CliIO
): ExitCode {
  if (output === 'run') {
    const result = runSource(source, options);
    formatDiagnostics(result.errors).forEach(io.stderr);
    return exitCodeForStage(result.failedStage);
  }

  const scanned = scan(source);
  if (output === 'tokens') {
    scanned.tokens.map(formatToken).forEach(io.stdout);
    formatDiagnostics(scanned.errors).forEach(io.stderr);
    return scanned.errors.isEmpty() ? EXIT_CODES.OK : EXIT_CODES.DATA;
  }

  if (!scanned.errors.isEmpty()) {
    formatDiagnostics(scanned.errors).forEach(io.stderr);
    return EXIT_CODES.DATA;
  }

  const parsed = parse(scanned.tokens, options);
  parsed.statements.map(printStmt).forEach(io.stdout);
  formatDiagnostics(parsed.errors).forEach(io.stderr);
  return parsed.errors.isEmpty() ? EXIT_CODES.OK : EXIT_CODES.DATA;
}

// ============================================================
// INTERACTIVE SESSION
// ============================================================

/**
 * Read-eval-print loop. Each line runs as its own program against a
 * shared environment, so variables persist between lines. With `--tokens`
 * or `--ast` each line is dumped instead of run. An empty line or end of
 * input ends the session. Diagnostics are reported and the session
 * continues.
 */
export function runRepl(
  options: RunOptions,
  io: CliIO,
  output: OutputMode = 'run',
  streams: ReplStreams = { input: process.stdin, output: process.stdout }
): Promise<ExitCode> {
  const environment = new Environment();
  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
    prompt: '> ',
  });

  return new Promise<ExitCode>((resolve, reject) => {
    let closed = false;

    rl.on('line', (line) => {
      // Lines already buffered may still arrive after close()
      if (closed) return;

      if (line.trim() === '') {
        closed = true;
        rl.close();
        return;
      }

      try {
        if (output === 'run') {
          const result = runSource(line, { ...options, environment });
          formatDiagnostics(result.errors).forEach(io.stderr);
        } else {
          runScript(line, output, options, io);
        }
      } catch (err) {
        closed = true;
        rl.close();
        reject(err);
        return;
      }
      rl.prompt();
    });

    rl.on('close', () => {
      closed = true;
      resolve(EXIT_CODES.OK);
    });

    rl.prompt();
  });
}

// ============================================================
// MAIN
// ============================================================

/**
 * Entry point for the tlox binary.
 *
 * @returns Process exit status; the caller decides when to exit
 */
export async function main(
  argv: readonly string[],
  io: CliIO = consoleIO
): Promise<ExitCode> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(err.message);
      io.stderr(USAGE);
      return EXIT_CODES.USAGE;
    }
    throw err;
  }

  if (parsed.mode === 'help') {
    io.stdout(USAGE);
    return EXIT_CODES.OK;
  }
  if (parsed.mode === 'version') {
    io.stdout(readVersion());
    return EXIT_CODES.OK;
  }

  let config: LoxConfig;
  try {
    config = loadConfig(parsed.configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(err.message);
      return EXIT_CODES.USAGE;
    }
    throw err;
  }
  const options = createRunOptions(config, io, parsed.trace);

  try {
    if (parsed.mode === 'repl') {
      return await runRepl(options, io, parsed.output);
    }

    let source: string;
    if (parsed.source.kind === 'inline') {
      source = parsed.source.text;
    } else {
      try {
        source = await fs.readFile(parsed.source.path, 'utf-8');
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        io.stderr(`Cannot read ${parsed.source.path}: ${reason}`);
        return EXIT_CODES.NO_INPUT;
      }
    }

    return runScript(source, parsed.output, options, io);
  } catch (err) {
    if (err instanceof InternalError) {
      io.stderr(`Internal error: ${err.message}`);
      return EXIT_CODES.INTERNAL;
    }
    throw err;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_CODES.INTERNAL;
    }
  );
}
