/**
 * Toolkit Configuration
 *
 * Sources, lowest to highest precedence:
 * - built-in defaults
 * - JSON file (`.recstat/config.json` under the working directory by default)
 * - environment (`HA_DB_URL`, `LOG_LEVEL`)
 *
 * Command-line flags are applied on top by the CLI.
 *
 * @module @recstat/core/config
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { ConfigurationError } from '../reliability/errors.js';

// =============================================================================
// Configuration Schema
// =============================================================================

export const DEFAULT_DB_URL = 'sqlite:///home-assistant_v2.db';

export const LogLevel = z.enum(['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR']);

export const RecorderConfig = z.object({
  database: z
    .object({
      /** SQLite URL or file path of the recorder database */
      url: z.string().min(1).default(DEFAULT_DB_URL),
    })
    .default({}),

  logging: z
    .object({
      level: LogLevel.default('WARNING'),
      pretty: z.boolean().default(false),
    })
    .default({}),
});

export type RecorderConfig = z.infer<typeof RecorderConfig>;

export interface LoadConfigOptions {
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory for the default config path */
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Get config file path
 */
export function getConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, '.recstat', 'config.json');
}

function readConfigFile(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): RecorderConfig {
  const env = options.env ?? process.env;

  let raw: unknown = {};
  if (options.configPath) {
    if (!existsSync(options.configPath)) {
      throw new ConfigurationError(`Config file not found: ${options.configPath}`);
    }
    raw = readConfigFile(options.configPath);
  } else {
    const defaultPath = getConfigPath(options.cwd);
    if (existsSync(defaultPath)) {
      raw = readConfigFile(defaultPath);
    }
  }

  const parsed = RecorderConfig.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const config = parsed.data;

  if (env.HA_DB_URL) {
    config.database.url = env.HA_DB_URL;
  }

  if (env.LOG_LEVEL) {
    const level = LogLevel.safeParse(env.LOG_LEVEL.toUpperCase());
    if (!level.success) {
      throw new ConfigurationError(
        `Invalid LOG_LEVEL "${env.LOG_LEVEL}" (expected one of ${LogLevel.options.join(', ')})`
      );
    }
    config.logging.level = level.data;
  }

  return config;
}

// =============================================================================
// Database URL
// =============================================================================

export const IN_MEMORY_PATH = ':memory:';

/**
 * Resolve a recorder database URL to a better-sqlite3 path.
 *
 * `sqlite:///rel.db` is relative to `cwd`, `sqlite:////abs.db` is absolute,
 * `sqlite://` is in-memory. Anything without a scheme is a file path.
 */
export function resolveDatabasePath(url: string, cwd: string = process.cwd()): string {
  if (url === IN_MEMORY_PATH) {
    return IN_MEMORY_PATH;
  }

  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(url);
  if (!scheme) {
    return isAbsolute(url) ? url : resolve(cwd, url);
  }

  // sqlite+pysqlite:// style driver suffixes name the same engine
  const dialect = scheme[1].toLowerCase().split('+')[0];
  if (dialect !== 'sqlite') {
    throw new ConfigurationError(
      `Unsupported database URL scheme "${scheme[1]}": only sqlite databases are supported`
    );
  }

  const rest = url.slice(scheme[0].length);
  if (rest === '' || rest === `/${IN_MEMORY_PATH}`) {
    return IN_MEMORY_PATH;
  }
  if (!rest.startsWith('/')) {
    throw new ConfigurationError(`Malformed sqlite URL "${url}": expected sqlite:///<path>`);
  }

  const path = rest.slice(1);
  return isAbsolute(path) ? path : resolve(cwd, path);
}
