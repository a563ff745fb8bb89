/**
 * Configuration Loader for flatcall
 * Loads and validates .flatcall.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { isOutputFormat, type OutputFormat } from './cli-error-formatter.js';
import { ConfigError } from './error-classes.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = '.flatcall.yaml';

const KNOWN_KEYS = ['maxDepth', 'format'];

// ============================================================
// TYPES
// ============================================================

export interface FlatcallConfig {
  readonly maxDepth?: number | undefined;
  readonly format?: OutputFormat | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Validate parsed YAML content.
 * An empty document yields an empty configuration.
 */
export function parseConfig(data: unknown, path: string): FlatcallConfig {
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(path, 'must be a mapping');
  }

  const entries: [string, unknown][] = Object.entries(data);
  let maxDepth: number | undefined;
  let format: OutputFormat | undefined;

  for (const [key, value] of entries) {
    if (!KNOWN_KEYS.includes(key)) {
      throw new ConfigError(path, `unknown option ${key}`);
    }
    if (key === 'maxDepth') {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new ConfigError(path, 'maxDepth must be a positive integer');
      }
      maxDepth = value;
    }
    if (key === 'format') {
      if (!isOutputFormat(value)) {
        throw new ConfigError(
          path,
          'format must be one of: human, json, compact'
        );
      }
      format = value;
    }
  }

  return { maxDepth, format };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load configuration.
 *
 * Without an explicit path, a missing .flatcall.yaml in `cwd` yields the
 * empty configuration. An explicit path, resolved against `cwd`, must exist.
 */
export function loadConfig(cwd: string, explicitPath?: string): FlatcallConfig {
  const path =
    explicitPath !== undefined
      ? resolve(cwd, explicitPath)
      : join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (explicitPath !== undefined) {
      throw new ConfigError(path, 'file not found');
    }
    return {};
  }

  let data: unknown;
  try {
    data = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(path, reason);
  }

  return parseConfig(data, path);
}
