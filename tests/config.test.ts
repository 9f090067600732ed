/**
 * Configuration Tests
 * YAML parsing, validation and file lookup
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from '../src/cli-config.js';

describe('parseConfig', () => {
  it('yields the defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({
      maxDepth: 200,
      ternary: 'short-circuit',
      skipComments: true,
    });
  });

  it('merges given keys over the defaults', () => {
    expect(parseConfig('ternary: eager\nmaxDepth: 12\n')).toEqual({
      maxDepth: 12,
      ternary: 'eager',
      skipComments: true,
    });
    expect(parseConfig('skipComments: false').skipComments).toBe(false);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('maxDepth: [1, 2')).toThrow(ConfigError);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- maxDepth')).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });
});

describe('validateConfig', () => {
  it('accepts a complete configuration', () => {
    expect(() =>
      validateConfig({ maxDepth: 5, ternary: 'eager', skipComments: false })
    ).not.toThrow();
  });

  it('names unknown keys', () => {
    expect(() => validateConfig({ timeout: 10 })).toThrow(
      'Invalid configuration: unknown key timeout'
    );
  });

  it('requires a positive integer depth', () => {
    for (const maxDepth of [0, -3, 1.5, '10']) {
      expect(() => validateConfig({ maxDepth })).toThrow(
        'Invalid configuration: maxDepth must be a positive integer'
      );
    }
  });

  it('requires a known ternary mode', () => {
    expect(() => validateConfig({ ternary: 'lazy' })).toThrow(
      "Invalid configuration: ternary must be 'short-circuit' or 'eager'"
    );
  });

  it('requires a boolean skipComments', () => {
    expect(() => validateConfig({ skipComments: 'yes' })).toThrow(
      'Invalid configuration: skipComments must be a boolean'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tlox-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the defaults when no file exists', () => {
    expect(loadConfig(undefined, dir)).toEqual(createDefaultConfig());
  });

  it('reads the config file from the working directory', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'maxDepth: 3\n');
    expect(loadConfig(undefined, dir).maxDepth).toBe(3);
  });

  it('reads an explicit path', () => {
    const path = join(dir, 'custom.yaml');
    writeFileSync(path, 'ternary: eager\n');
    expect(loadConfig(path, dir).ternary).toBe('eager');
  });

  it('fails when an explicit path is missing', () => {
    const path = join(dir, 'absent.yaml');
    expect(() => loadConfig(path, dir)).toThrow(
      `Invalid configuration: file not found ${path}`
    );
  });

  it('fails on an invalid file', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'colour: blue\n');
    expect(() => loadConfig(undefined, dir)).toThrow(
      'Invalid configuration: unknown key colour'
    );
  });
});
