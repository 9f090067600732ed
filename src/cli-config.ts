/**
 * Configuration Loader for tlox
 * Loads and validates tlox.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_DEPTH } from './parser/index.js';
import type { TernaryMode } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'tlox.config.yaml';

// ============================================================
// TYPES
// ============================================================

export interface LoxConfig {
  /** Deepest expression nesting the parser accepts */
  readonly maxDepth: number;
  readonly ternary: TernaryMode;
  /** Strip comments before parsing instead of rejecting them */
  readonly skipComments: boolean;
}

/** Invalid or unreadable configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LoxConfig {
  return {
    maxDepth: DEFAULT_MAX_DEPTH,
    ternary: 'short-circuit',
    skipComments: true,
  };
}

// ============================================================
// VALIDATION
// ============================================================

interface ConfigFile {
  maxDepth?: number;
  ternary?: TernaryMode;
  skipComments?: boolean;
}

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'maxDepth',
  'ternary',
  'skipComments',
]);

function isTernaryMode(value: unknown): value is TernaryMode {
  return value === 'short-circuit' || value === 'eager';
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed configuration structure and values.
 * Throws ConfigError naming the first offending key.
 */
export function validateConfig(data: unknown): asserts data is ConfigFile {
  if (!isRecord(data)) {
    throw new ConfigError('must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`unknown key ${key}`);
    }
  }

  const maxDepth = data['maxDepth'];
  if (maxDepth !== undefined && !isPositiveInteger(maxDepth)) {
    throw new ConfigError('maxDepth must be a positive integer');
  }

  const ternary = data['ternary'];
  if (ternary !== undefined && !isTernaryMode(ternary)) {
    throw new ConfigError("ternary must be 'short-circuit' or 'eager'");
  }

  const skipComments = data['skipComments'];
  if (skipComments !== undefined && typeof skipComments !== 'boolean') {
    throw new ConfigError('skipComments must be a boolean');
  }
}

/**
 * Parse YAML configuration text and merge it over the defaults.
 * An empty document yields the defaults.
 */
export function parseConfig(text: string): LoxConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(reason);
  }

  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }

  validateConfig(data);
  return {
    maxDepth: data.maxDepth ?? defaults.maxDepth,
    ternary: data.ternary ?? defaults.ternary,
    skipComments: data.skipComments ?? defaults.skipComments,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from an explicit path, or from tlox.config.yaml in
 * `cwd` when no path is given.
 *
 * @returns Defaults when no path is given and the file does not exist
 * @throws ConfigError if an explicit file is missing, or any file is invalid
 */
export function loadConfig(
  configPath: string | undefined,
  cwd: string = process.cwd()
): LoxConfig {
  const path = configPath ?? join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath === undefined) {
      return createDefaultConfig();
    }
    throw new ConfigError(`file not found ${configPath}`);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read ${path}: ${reason}`);
  }

  return parseConfig(text);
}
