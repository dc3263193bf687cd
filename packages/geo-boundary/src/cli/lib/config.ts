/**
 * CLI Configuration Management
 *
 * Loads settings from an `.h3filterrc` file (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (H3_FILTER_*)
 * 3. Config file (.h3filterrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_FILTER_OPTIONS } from '../../core/constants.js';
import { ConfigurationError } from '../../core/errors.js';
import type { FilterOptions, RecordErrorPolicy } from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  readonly maxRecordLength: number;
  readonly onError: RecordErrorPolicy;
  /** Write the KML footer before exiting on a fatal error */
  readonly closeOnError: boolean;

  /** Enable debug logging */
  readonly verbose: boolean;
  /** Log as JSON lines */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure: snake_case keys `version`, `max_record_length`,
 * `on_error`, `close_on_error`, `verbose`, `json`
 */
type ConfigFileSchema = Readonly<Record<string, unknown>>;

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'configPath'> = {
  version: 1,
  maxRecordLength: DEFAULT_FILTER_OPTIONS.maxRecordLength,
  onError: DEFAULT_FILTER_OPTIONS.onRecordError,
  closeOnError: DEFAULT_FILTER_OPTIONS.closeKmlOnError,
  verbose: false,
  json: false,
};

const RECORD_ERROR_POLICIES: readonly RecordErrorPolicy[] = ['fail', 'skip'];

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.h3filterrc',
  '.h3filterrc.yaml',
  '.h3filterrc.yml',
  '.h3filterrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFileSchema {
  let parsed: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    parsed = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isMapping(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[`H3_FILTER_${name}`];
}

function getEnvBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return parseStrictInteger(value, `H3_FILTER_${name}`);
}

/**
 * Parse a base-10 integer literal, rejecting trailing junk that
 * parseInt would accept
 */
export function parseStrictInteger(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${label} must be an integer, got ${JSON.stringify(value)}`);
  }
  return Number.parseInt(trimmed, 10);
}

function fileNumber(value: unknown, key: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ConfigurationError(`Config key ${key} must be a number`);
  }
  return value;
}

function fileBool(value: unknown, key: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`Config key ${key} must be true or false`);
  }
  return value;
}

function toPolicy(value: unknown, source: string): RecordErrorPolicy | undefined {
  if (value === undefined) return undefined;
  const match = RECORD_ERROR_POLICIES.find((policy) => policy === value);
  if (!match) {
    throw new ConfigurationError(
      `Invalid ${source}: ${JSON.stringify(value)}. Must be one of: ${RECORD_ERROR_POLICIES.join(', ')}`
    );
  }
  return match;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    maxRecordLength?: number;
    onError?: string;
    closeOnError?: boolean;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for a missing explicit file, unreadable file or
 *   invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};

  const config: CLIConfig = {
    version: fileNumber(fileConfig.version, 'version') ?? DEFAULT_CONFIG.version,

    maxRecordLength:
      overrides.maxRecordLength ??
      getEnvNumber(env, 'MAX_RECORD_LENGTH') ??
      fileNumber(fileConfig.max_record_length, 'max_record_length') ??
      DEFAULT_CONFIG.maxRecordLength,

    onError:
      toPolicy(overrides.onError, '--on-error') ??
      toPolicy(getEnvVar(env, 'ON_ERROR'), 'H3_FILTER_ON_ERROR') ??
      toPolicy(fileConfig.on_error, 'on_error') ??
      DEFAULT_CONFIG.onError,

    closeOnError:
      overrides.closeOnError ??
      getEnvBool(env, 'CLOSE_ON_ERROR') ??
      fileBool(fileConfig.close_on_error, 'close_on_error') ??
      DEFAULT_CONFIG.closeOnError,

    verbose:
      overrides.verbose ??
      getEnvBool(env, 'VERBOSE') ??
      fileBool(fileConfig.verbose, 'verbose') ??
      DEFAULT_CONFIG.verbose,

    json:
      overrides.json ??
      getEnvBool(env, 'JSON') ??
      fileBool(fileConfig.json, 'json') ??
      DEFAULT_CONFIG.json,

    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate configuration
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!Number.isInteger(config.maxRecordLength) || config.maxRecordLength <= 0) {
    throw new ConfigurationError('Max record length must be a positive integer');
  }
}

/**
 * Pipeline options derived from the loaded configuration
 */
export function toFilterOptions(config: CLIConfig): FilterOptions {
  return {
    maxRecordLength: config.maxRecordLength,
    onRecordError: config.onError,
    closeKmlOnError: config.closeOnError,
  };
}
