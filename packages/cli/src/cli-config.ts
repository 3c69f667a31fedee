/**
 * Configuration Loader
 * Loads and validates .treelox.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name, looked up in the working directory */
export const CONFIG_FILE_NAME = '.treelox.yaml';

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** Print each declaration's tree before executing it */
  readonly debugAst: boolean;
  /** REPL prompt */
  readonly prompt: string;
}

export const DEFAULT_CONFIG: CliConfig = {
  debugAst: false,
  prompt: '> ',
};

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS: ReadonlySet<string> = new Set(['debugAst', 'prompt']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(
  data: unknown
): asserts data is { debugAst?: boolean; prompt?: string } {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  if ('debugAst' in data && typeof data['debugAst'] !== 'boolean') {
    throw new Error('Invalid configuration: debugAst must be a boolean');
  }

  if ('prompt' in data && typeof data['prompt'] !== 'string') {
    throw new Error('Invalid configuration: prompt must be a string');
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text. An empty document yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(text: string): CliConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // An empty document parses to null
  if (parsedData === null || parsedData === undefined) {
    return DEFAULT_CONFIG;
  }

  validateConfig(parsedData);

  return {
    debugAst: parsedData.debugAst ?? DEFAULT_CONFIG.debugAst,
    prompt: parsedData.prompt ?? DEFAULT_CONFIG.prompt,
  };
}

/**
 * Load configuration from an explicit path, or from .treelox.yaml in the
 * given directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @param configPath - Explicit file (from --config); must exist
 * @returns The configuration, or the defaults when no file is found
 */
export function loadConfig(cwd: string, configPath?: string): CliConfig {
  const path = configPath ?? join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return DEFAULT_CONFIG;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}
