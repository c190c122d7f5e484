/**
 * Configuration Loader for kite-lex
 * Loads and validates .kite-lex.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  isDiagnosticFormat,
  type DiagnosticFormat,
} from './cli-error-formatter.js';
import { createError } from './error-classes.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.kite-lex.yaml';

const KNOWN_KEYS = new Set(['prompt', 'spans', 'format']);

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** REPL prompt */
  readonly prompt: string;
  /** Print token start locations */
  readonly spans: boolean;
  /** Diagnostic layout */
  readonly format: DiagnosticFormat;
}

export function createDefaultConfig(): CliConfig {
  return { prompt: '>> ', spans: false, format: 'human' };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): Error {
  return createError('KITE-C001', { reason });
}

/**
 * Validate configuration structure and values.
 * Throws KiteError KITE-C001 if configuration is invalid.
 */
function validateConfig(data: unknown): Partial<CliConfig> {
  // An empty file parses to null
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw invalid('must be a mapping');
  }

  const config: { -readonly [K in keyof CliConfig]?: CliConfig[K] } = {};
  const entries: [string, unknown][] = Object.entries(data);
  for (const [key, value] of entries) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown key ${key}`);
    }
    if (key === 'prompt') {
      if (typeof value !== 'string') {
        throw invalid('prompt must be a string');
      }
      config.prompt = value;
    } else if (key === 'spans') {
      if (typeof value !== 'boolean') {
        throw invalid('spans must be a boolean');
      }
      config.spans = value;
    } else if (key === 'format') {
      if (!isDiagnosticFormat(value)) {
        throw invalid(`format must be 'human' or 'compact'`);
      }
      config.format = value;
    }
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .kite-lex.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over the defaults; the defaults alone
 * when no file exists
 * @throws KiteError KITE-C001 if the file is unreadable, not YAML, or invalid
 */
export function loadConfig(cwd: string): CliConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  const defaults = createDefaultConfig();

  if (!existsSync(configPath)) {
    return defaults;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...defaults, ...validateConfig(parsedData) };
}
