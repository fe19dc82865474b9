/**
 * Configuration File Loader
 *
 * Loads configuration from .selfhealrc or .selfhealrc.json files.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.selfhealrc)
 *
 * @example
 * // .selfhealrc in project root
 * {
 *   "log": { "level": "debug" },
 *   "healing": {
 *     "dataDir": "./artifacts/healing",
 *     "minSamplesForModel": 20,
 *     "synthesisFallback": true
 *   }
 * }
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import {
  logConfigSchema,
  healingConfigSchema,
  corpusPersistenceSchema,
  logLevelSchema,
  ConfigValidationError,
  type LogConfig,
  type HealingConfig,
} from './config-schemas.js';
import { configureLogger, logger } from './logger.js';

const log = logger.create('ConfigLoader');

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: logLevelSchema.optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  healing: z.object({
    dataDir: z.string().optional(),
    goldenFile: z.string().optional(),
    corpusFile: z.string().optional(),
    modelFile: z.string().optional(),
    minSamplesForModel: z.number().int().min(1).optional(),
    synthesisFallback: z.boolean().optional(),
    corpusPersistence: corpusPersistenceSchema.optional(),
    trainingEpochs: z.number().int().min(1).optional(),
    learningRate: z.number().positive().optional(),
  }).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

const CONFIG_FILE_NAMES = [
  '.selfhealrc',
  '.selfhealrc.json',
  'selfhealrc.json',
];

function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  const home = homedir();
  if (home && !paths.includes(home)) {
    paths.push(home);
  }

  return paths;
}

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

function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    // Allow // and /* */ comments in the config file
    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
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
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', { path: filePath, error: error.message });
    } else {
      log.warn('Failed to read config file', { path: filePath, error });
    }
    return {};
  }
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

export function getConfigFilePath(): string | null {
  getConfigFile();
  return cachedConfigFilePath;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

function parseSection<T>(section: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
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

  return parseSection('log', logConfigSchema, {
    level: process.env.LOG_LEVEL ?? file.level,
    prettyPrint: process.env.LOG_PRETTY ?? boolToEnvString(file.prettyPrint),
  });
}

/**
 * Resolve the log configuration and apply it to the shared logger
 */
export function applyLogConfig(): LogConfig {
  const config = getMergedLogConfig();
  configureLogger(config);
  return config;
}

/**
 * Get merged healing configuration, with optional programmatic overrides
 * taking precedence over everything else.
 */
export function getMergedHealingConfig(overrides: Partial<HealingConfig> = {}): HealingConfig {
  const file = getConfigFile().healing ?? {};

  const merged = parseSection('healing', healingConfigSchema, {
    dataDir: process.env.SELF_HEAL_DATA_DIR ?? file.dataDir,
    goldenFile: process.env.SELF_HEAL_GOLDEN_FILE ?? file.goldenFile,
    corpusFile: process.env.SELF_HEAL_CORPUS_FILE ?? file.corpusFile,
    modelFile: process.env.SELF_HEAL_MODEL_FILE ?? file.modelFile,
    minSamplesForModel: process.env.SELF_HEAL_MIN_SAMPLES ?? numToEnvString(file.minSamplesForModel),
    synthesisFallback: process.env.SELF_HEAL_SYNTHESIS_FALLBACK ?? boolToEnvString(file.synthesisFallback),
    corpusPersistence: process.env.SELF_HEAL_CORPUS_PERSISTENCE ?? file.corpusPersistence,
    trainingEpochs: process.env.SELF_HEAL_TRAINING_EPOCHS ?? numToEnvString(file.trainingEpochs),
    learningRate: process.env.SELF_HEAL_LEARNING_RATE ?? numToEnvString(file.learningRate),
  });

  return { ...merged, ...overrides };
}
