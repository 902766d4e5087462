/**
 * Configuration File Loader
 *
 * Loads configuration from .distillerrc or .distillerrc.json files.
 * Configuration precedence: per-call overrides > Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.distillerrc)
 * 3. Package root
 *
 * @example
 * // .distillerrc in project root
 * {
 *   "log": { "level": "debug" },
 *   "extraction": {
 *     "linkDensityThreshold": 0.4,
 *     "keepClassAndId": false
 *   }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  logConfigSchema,
  extractionEnvSchema,
  extractionConfigSchema,
  EXTRACTION_CONFIG_KEYS,
  EXTRACTION_ENV_VARS,
  parseOrThrow,
  type LogConfig,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from './config-schemas.js';
import { findPackageRoot } from './package-root.js';
import { configureLogger, logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  extraction: extractionConfigSchema.partial().optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

/**
 * Names of config files to search for (in priority order).
 */
const CONFIG_FILE_NAMES = [
  '.distillerrc',
  '.distillerrc.json',
  'distillerrc.json',
];

/**
 * Get directories to search for config files.
 */
function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  const home = homedir();
  if (home && !paths.includes(home)) {
    paths.push(home);
  }

  const packageRoot = findPackageRoot();
  if (packageRoot && !paths.includes(packageRoot)) {
    paths.push(packageRoot);
  }

  return paths;
}

/**
 * Find the first existing config file.
 */
function findConfigFile(): string | null {
  const searchPaths = getSearchPaths();

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and parse a config file. Invalid files are reported and ignored.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');

    // Allow // and /* */ comments in the config file
    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    parsed = JSON.parse(stripped);
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', { path: filePath, error: error.message });
    } else {
      log.warn('Failed to read config file', { path: filePath, error: String(error) });
    }
    return {};
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    log.warn('Config file validation failed', {
      path: filePath,
      errors: result.error.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    });
    return {};
  }

  log.info('Loaded config file', {
    path: filePath,
    sections: Object.keys(result.data),
  });

  return result.data;
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;
let cachedConfigFilePath: string | null = null;
let configFileLoaded = false;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(): ConfigFile {
  if (!configFileLoaded) {
    cachedConfigFilePath = findConfigFile();
    cachedConfigFile = cachedConfigFilePath ? loadConfigFile(cachedConfigFilePath) : {};
    configFileLoaded = true;
  }
  return cachedConfigFile ?? {};
}

/**
 * Clear the config file cache.
 * Useful for testing or reloading configuration.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
  cachedConfigFilePath = null;
  configFileLoaded = false;
}

// ============================================
// MERGE HELPERS
// ============================================

/**
 * Convert a config file value to its environment variable string form.
 */
function toEnvString(value: string | number | boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

/**
 * Get merged log configuration.
 * Config file values are used unless overridden by environment variables.
 */
export function getMergedLogConfig(): LogConfig {
  const file = getConfigFile().log ?? {};

  const merged = {
    level: process.env.LOG_LEVEL ?? file.level,
    prettyPrint: process.env.LOG_PRETTY ?? toEnvString(file.prettyPrint),
  };

  return parseOrThrow(logConfigSchema, merged, 'log');
}

/**
 * Reconfigure the shared logger from the environment and config file.
 */
export function applyLogConfig(): LogConfig {
  const config = getMergedLogConfig();
  configureLogger(config);
  return config;
}

/**
 * Get merged extraction configuration (environment over config file over defaults).
 */
export function getMergedExtractionConfig(): ExtractionConfig {
  const file = getConfigFile().extraction ?? {};
  const merged: Record<string, string | undefined> = {};

  for (const key of EXTRACTION_CONFIG_KEYS) {
    merged[key] = process.env[EXTRACTION_ENV_VARS[key]] ?? toEnvString(file[key]);
  }

  return parseOrThrow(extractionEnvSchema, merged, 'extraction');
}

/**
 * Apply per-call overrides on top of a resolved configuration.
 */
export function resolveExtractionConfig(
  base: ExtractionConfig,
  overrides: Partial<ExtractionConfigInput> = {}
): ExtractionConfig {
  return parseOrThrow(extractionConfigSchema, { ...base, ...overrides }, 'extraction overrides');
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Get the path to the loaded config file, if any.
 */
export function getConfigFilePath(): string | null {
  getConfigFile();
  return cachedConfigFilePath;
}

/**
 * Check if a config file exists.
 */
export function hasConfigFile(): boolean {
  getConfigFile();
  return cachedConfigFilePath !== null;
}

/**
 * Generate a sample .distillerrc file with all available options.
 */
export function generateSampleConfig(): string {
  const sample = {
    log: {
      level: 'info',
      prettyPrint: false,
    },
    extraction: extractionConfigSchema.parse({}),
  };

  return JSON.stringify(sample, null, 2);
}
