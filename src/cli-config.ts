/**
 * Configuration Loader for fieldcalc
 * Loads and validates .fieldcalc.json configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { isOutputFormat, isRecord, type OutputFormat } from './cli-shared.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.fieldcalc.json';

const KNOWN_KEYS = new Set(['format', 'budgetMs']);

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  readonly format: OutputFormat;
  /** Per-field evaluation budget; undefined means unlimited */
  readonly budgetMs: number | undefined;
}

export function createDefaultConfig(): CliConfig {
  return { format: 'human', budgetMs: undefined };
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): CliConfig {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const defaults = createDefaultConfig();

  const format = data['format'] ?? defaults.format;
  if (!isOutputFormat(format)) {
    throw new Error(
      `Invalid configuration: format "${String(format)}" must be 'human' or 'json'`
    );
  }

  const budgetMs = data['budgetMs'];
  if (
    budgetMs !== undefined &&
    (typeof budgetMs !== 'number' || !Number.isFinite(budgetMs) || budgetMs <= 0)
  ) {
    throw new Error('Invalid configuration: budgetMs must be a positive number');
  }

  return { format, budgetMs };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .fieldcalc.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CliConfig, or null if the file does not exist
 * @throws Error with "Invalid configuration: {reason}" for unreadable, malformed or invalid files
 */
export function loadConfig(cwd: string): CliConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
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
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
