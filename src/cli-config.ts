/**
 * Configuration Loader for the sprig CLI
 * Loads and validates .sprig.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// TYPES
// ============================================================

/** What the CLI prints for each parsed input */
export type OutputMode = 'tokens' | 'ast';

export interface CliConfig {
  /** REPL prompt */
  readonly prompt: string;
  readonly output: OutputMode;
  /** Print parse rule entry/exit lines */
  readonly trace: boolean;
  /** Inputs longer than this many characters are rejected; null for no limit */
  readonly maxInputLength: number | null;
}

/** Configuration file name */
export const CONFIG_FILE_NAME = '.sprig.yaml';

const KNOWN_KEYS = new Set(['prompt', 'output', 'trace', 'maxInputLength']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): CliConfig {
  return {
    prompt: '>> ',
    output: 'ast',
    trace: false,
    maxInputLength: null,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputMode(value: unknown): value is OutputMode {
  return value === 'tokens' || value === 'ast';
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate parsed file contents and merge them over the defaults.
 * Throws Error with "Invalid configuration: {reason}" on any bad value.
 */
export function resolveConfig(data: unknown): CliConfig {
  const defaults = createDefaultConfig();

  // An empty file parses to null
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const { prompt, output, trace, maxInputLength } = data;
  let config = defaults;

  if (prompt !== undefined) {
    if (typeof prompt !== 'string') {
      throw new Error('Invalid configuration: prompt must be a string');
    }
    config = { ...config, prompt };
  }

  if (output !== undefined) {
    if (!isOutputMode(output)) {
      throw new Error(
        `Invalid configuration: output has invalid value "${String(output)}" (must be 'tokens' or 'ast')`
      );
    }
    config = { ...config, output };
  }

  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error('Invalid configuration: trace must be a boolean');
    }
    config = { ...config, trace };
  }

  if (maxInputLength !== undefined) {
    if (maxInputLength !== null && !isPositiveInteger(maxInputLength)) {
      throw new Error(
        'Invalid configuration: maxInputLength must be a positive integer or null'
      );
    }
    config = { ...config, maxInputLength };
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .sprig.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over defaults; defaults when no file exists
 * @throws Error with "Invalid configuration: {reason}" if the file is unreadable or invalid
 */
export function loadConfig(cwd: string): CliConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return resolveConfig(parsedData);
}
