/**
 * tlox CLI Tests
 * Script runs, dumps, interactive sessions and exit statuses
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough, Readable } from 'stream';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  createRunOptions,
  main,
  readVersion,
  runRepl,
  runScript,
  type CliIO,
} from '../../src/cli.js';
import { createDefaultConfig } from '../../src/cli-config.js';
import { USAGE } from '../../src/cli-shared.js';

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
}

describe('tlox CLI', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tlox-cli-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  describe('runScript', () => {
    const options = (io: CliIO) => createRunOptions(createDefaultConfig(), io, false);

    it('runs and prints', () => {
      const io = captureIO();
      expect(runScript('print 1 + 2; // sum', 'run', options(io), io)).toBe(0);
      expect(io.out).toEqual(['3']);
      expect(io.err).toEqual([]);
    });

    it('dumps statements', () => {
      const io = captureIO();
      expect(runScript('var a = -1;', 'ast', options(io), io)).toBe(0);
      expect(io.out).toEqual(['Variable Statement: a = (- 1)']);
    });

    it('dumps tokens and still reports scan errors', () => {
      const io = captureIO();
      expect(runScript('1 @', 'tokens', options(io), io)).toBe(65);
      expect(io.out).toEqual(['1:1 NUMBER 1', '1:2 WHITESPACE space', '1:4 EOF']);
      expect(io.err).toEqual([
        '[line: 1, col: 3] Scanning Error (Unexpected character): @',
      ]);
    });

    it('prints the statements that parsed before a parse error', () => {
      const io = captureIO();
      expect(runScript('print 1; print;', 'ast', options(io), io)).toBe(65);
      expect(io.out).toEqual(['Print Statement: 1']);
      expect(io.err).toEqual([
        "[line: 1, col: 15] Parsing Error (Expected value or expression, found ';')",
      ]);
    });

    it('exits 70 on a runtime error', () => {
      const io = captureIO();
      expect(runScript('print nope;', 'run', options(io), io)).toBe(70);
      expect(io.err).toEqual([
        "[line: 1, col: 7] Runtime Error (Undefined variable 'nope')",
      ]);
    });
  });

  describe('main', () => {
    it('prints usage for --help', async () => {
      const io = captureIO();
      expect(await main(['--help'], io)).toBe(0);
      expect(io.out).toEqual([USAGE]);
    });

    it('prints the package version', async () => {
      const io = captureIO();
      expect(await main(['-v'], io)).toBe(0);
      expect(io.out).toEqual([readVersion()]);
      expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
    });

    it('reports usage errors with exit 64', async () => {
      const io = captureIO();
      expect(await main(['--bogus'], io)).toBe(64);
      expect(io.err).toEqual(['Unknown option: --bogus', USAGE]);
    });

    it('runs inline source', async () => {
      const io = captureIO();
      expect(await main(['-e', 'print "hi";'], io)).toBe(0);
      expect(io.out).toEqual(['"hi"']);
    });

    it('runs a script file', async () => {
      const file = await writeFile('ok.lox', 'var n = 4;\nprint n * n;\n');
      const io = captureIO();
      expect(await main([file], io)).toBe(0);
      expect(io.out).toEqual(['16']);
    });

    it('exits 66 for a missing script', async () => {
      const file = path.join(tempDir, 'absent.lox');
      const io = captureIO();
      expect(await main([file], io)).toBe(66);
      expect(io.err).toHaveLength(1);
      expect(io.err[0]?.startsWith(`Cannot read ${file}: `)).toBe(true);
    });

    it('applies an explicit config file', async () => {
      const config = await writeFile('eager.yaml', 'ternary: eager\n');
      const io = captureIO();
      expect(
        await main(['--config', config, '-e', 'print true ? 1 : -nil;'], io)
      ).toBe(70);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual([
        "[line: 1, col: 18] Runtime Error (Illegal operand for unary '-' expression: nil)",
      ]);
    });

    it('exits 64 for an invalid config file', async () => {
      const config = await writeFile('bad.yaml', 'maxDepth: 0\n');
      const io = captureIO();
      expect(await main(['--config', config, '-e', '1;'], io)).toBe(64);
      expect(io.err).toEqual([
        'Invalid configuration: maxDepth must be a positive integer',
      ]);
    });

    it('traces each statement on stderr', async () => {
      const io = captureIO();
      expect(await main(['--trace', '-e', 'print 1;'], io)).toBe(0);
      expect(io.out).toEqual(['1']);
      expect(io.err).toHaveLength(2);
      expect(io.err[0]).toBe('[trace] step 1/1');
      expect(io.err[1]).toMatch(/^\[trace\] step 1\/1 = 1 \(number, \d+\.\d{3}ms\)$/);
    });
  });

  describe('runRepl', () => {
    function session(lines: string[]) {
      return {
        input: Readable.from(lines.map((line) => `${line}\n`)),
        output: new PassThrough(),
      };
    }

    it('keeps variables between lines and stops at an empty line', async () => {
      const io = captureIO();
      const options = createRunOptions(createDefaultConfig(), io, false);
      const code = await runRepl(
        options,
        io,
        'run',
        session(['var a = 2;', 'print a * 3;', '', 'print 99;'])
      );
      expect(code).toBe(0);
      expect(io.out).toEqual(['6']);
    });

    it('dumps each line instead of running it', async () => {
      const io = captureIO();
      const options = createRunOptions(createDefaultConfig(), io, false);
      const code = await runRepl(
        options,
        io,
        'ast',
        session(['print 1 + 2;', 'var a;'])
      );
      expect(code).toBe(0);
      expect(io.out).toEqual([
        'Print Statement: (+ 1 2)',
        'Variable Statement: a',
      ]);
    });

    it('dumps tokens of each line', async () => {
      const io = captureIO();
      const options = createRunOptions(createDefaultConfig(), io, false);
      await runRepl(options, io, 'tokens', session(['x;']));
      expect(io.out).toEqual(['1:1 IDENTIFIER x', '1:2 SEMICOLON', '1:3 EOF']);
    });

    it('reports errors and continues', async () => {
      const io = captureIO();
      const options = createRunOptions(createDefaultConfig(), io, false);
      const code = await runRepl(
        options,
        io,
        'run',
        session(['print -nil;', 'print 1;'])
      );
      expect(code).toBe(0);
      expect(io.err).toEqual([
        "[line: 1, col: 7] Runtime Error (Illegal operand for unary '-' expression: nil)",
      ]);
      expect(io.out).toEqual(['1']);
    });
  });
});
