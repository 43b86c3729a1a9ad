/**
 * Configuration Loader
 * Loads and validates .faultscope.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { terminalSupportsColor } from './ansi.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.faultscope.yaml';

// ============================================================
// TYPES
// ============================================================

export interface ReporterConfig {
  /** Emit ANSI escape sequences */
  readonly color: boolean;
  /** Show the System Info and Module Search Paths sections */
  readonly systemInfo: boolean;
  /** Print a confirmation line when the reporter is installed */
  readonly banner: boolean;
}

type ConfigKey = keyof ReporterConfig;

const CONFIG_KEYS: readonly ConfigKey[] = ['color', 'systemInfo', 'banner'];

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create the default configuration.
 * Color follows chalk's detection for stdout (FORCE_COLOR, --no-color,
 * whether stdout is a terminal).
 */
export function createDefaultConfig(): ReporterConfig {
  return {
    color: terminalSupportsColor,
    systemInfo: true,
    banner: true,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Validate parsed YAML and keep the options it sets.
 * An empty document sets nothing.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(data: unknown): Partial<ReporterConfig> {
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const config: { -readonly [K in ConfigKey]?: boolean } = {};
  for (const [key, value] of Object.entries(data)) {
    if (!isConfigKey(key)) {
      throw new Error(`Invalid configuration: unknown option ${key}`);
    }
    if (typeof value !== 'boolean') {
      throw new Error(
        `Invalid configuration: ${key} must be true or false, got ${JSON.stringify(value)}`
      );
    }
    config[key] = value;
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .faultscope.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Options set by the file, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" on malformed YAML
 *   or invalid options
 */
export function loadConfig(cwd: string): Partial<ReporterConfig> | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  const content = readFileSync(configPath, 'utf-8');
  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration: ${reason}`);
  }

  return parseConfig(data);
}

/**
 * Resolve the effective configuration: defaults, then the file in `cwd`,
 * then explicit overrides.
 */
export function resolveConfig(
  cwd: string,
  overrides: Partial<ReporterConfig> = {}
): ReporterConfig {
  return {
    ...createDefaultConfig(),
    ...(loadConfig(cwd) ?? {}),
    ...overrides,
  };
}
