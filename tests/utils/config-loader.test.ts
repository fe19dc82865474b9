/**
 * Configuration Loader Tests
 *
 * Tests for the .selfhealrc configuration file loading system.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  configFileSchema,
  getConfigFile,
  getConfigFilePath,
  clearConfigFileCache,
  getMergedLogConfig,
  getMergedHealingConfig,
  applyLogConfig,
} from '../../src/utils/config-loader.js';
import { configureLogger, getLogger } from '../../src/utils/logger.js';
import { ConfigValidationError } from '../../src/utils/config-schemas.js';

const ENV_KEYS = [
  'LOG_LEVEL',
  'LOG_PRETTY',
  'SELF_HEAL_DATA_DIR',
  'SELF_HEAL_GOLDEN_FILE',
  'SELF_HEAL_CORPUS_FILE',
  'SELF_HEAL_MODEL_FILE',
  'SELF_HEAL_MIN_SAMPLES',
  'SELF_HEAL_SYNTHESIS_FALLBACK',
  'SELF_HEAL_CORPUS_PERSISTENCE',
  'SELF_HEAL_TRAINING_EPOCHS',
  'SELF_HEAL_LEARNING_RATE',
];

describe('ConfigLoader', () => {
  let testDir: string;
  const savedEnv: Record<string, string | undefined> = {};

  const writeConfig = (name: string, content: string) => writeFileSync(join(testDir, name), content, 'utf-8');

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'selfheal-config-test-'));
    vi.spyOn(process, 'cwd').mockReturnValue(testDir);
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    clearConfigFileCache();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    clearConfigFileCache();
    configureLogger({ level: 'silent' });
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('configFileSchema', () => {
    it('should accept a full configuration', () => {
      const result = configFileSchema.safeParse({
        log: { level: 'debug', prettyPrint: true },
        healing: {
          dataDir: './artifacts',
          minSamplesForModel: 10,
          synthesisFallback: true,
          corpusPersistence: 'every-round',
        },
      });
      expect(result.success).toBe(true);
    });

    it('should accept an empty configuration', () => {
      expect(configFileSchema.safeParse({}).success).toBe(true);
    });

    it('should reject an invalid corpus persistence mode', () => {
      expect(configFileSchema.safeParse({ healing: { corpusPersistence: 'sometimes' } }).success).toBe(false);
    });

    it('should reject unknown keys (strict mode)', () => {
      expect(configFileSchema.safeParse({ browser: {} }).success).toBe(false);
    });
  });

  describe('getConfigFile', () => {
    it('should return an empty object when no config file exists', () => {
      expect(getConfigFile()).toEqual({});
      expect(getConfigFilePath()).toBeNull();
    });

    it('should cache the config file', () => {
      expect(getConfigFile()).toBe(getConfigFile());
    });

    it('should load .selfhealrc from the working directory', () => {
      writeConfig('.selfhealrc', JSON.stringify({ healing: { minSamplesForModel: 12 } }));

      expect(getConfigFile()).toEqual({ healing: { minSamplesForModel: 12 } });
      expect(getConfigFilePath()).toBe(join(testDir, '.selfhealrc'));
    });

    it('should strip comments', () => {
      writeConfig(
        '.selfhealrc.json',
        `{
          // line comment
          "log": { "level": "warn" },
          /* block
             comment */
          "healing": { "synthesisFallback": true }
        }`
      );

      expect(getConfigFile()).toEqual({ log: { level: 'warn' }, healing: { synthesisFallback: true } });
    });

    it('should ignore a file that fails validation', () => {
      writeConfig('.selfhealrc', JSON.stringify({ healing: { minSamplesForModel: 0 } }));
      expect(getConfigFile()).toEqual({});
    });

    it('should ignore a file with invalid JSON', () => {
      writeConfig('.selfhealrc', '{ "healing": ');
      expect(getConfigFile()).toEqual({});
    });
  });

  describe('getMergedHealingConfig', () => {
    it('should return defaults when there is no config', () => {
      expect(getMergedHealingConfig()).toEqual({
        dataDir: './.self-healing',
        goldenFile: 'global_golden.json',
        corpusFile: 'training_data.json',
        modelFile: 'ranker_model.json',
        minSamplesForModel: 5,
        synthesisFallback: false,
        corpusPersistence: 'on-retrain',
        trainingEpochs: 200,
        learningRate: 0.1,
      });
    });

    it('should use config file values', () => {
      writeConfig(
        '.selfhealrc',
        JSON.stringify({ healing: { dataDir: './artifacts', synthesisFallback: true, learningRate: 0.5 } })
      );

      expect(getMergedHealingConfig()).toMatchObject({
        dataDir: './artifacts',
        synthesisFallback: true,
        learningRate: 0.5,
      });
    });

    it('should prefer environment variables over the config file', () => {
      writeConfig('.selfhealrc', JSON.stringify({ healing: { minSamplesForModel: 12, synthesisFallback: true } }));
      process.env.SELF_HEAL_MIN_SAMPLES = '3';
      process.env.SELF_HEAL_SYNTHESIS_FALLBACK = 'false';

      expect(getMergedHealingConfig()).toMatchObject({ minSamplesForModel: 3, synthesisFallback: false });
    });

    it('should prefer programmatic overrides over everything else', () => {
      process.env.SELF_HEAL_DATA_DIR = '/tmp/from-env';
      expect(getMergedHealingConfig({ dataDir: '/tmp/override' }).dataDir).toBe('/tmp/override');
    });

    it('should throw ConfigValidationError for invalid environment values', () => {
      process.env.SELF_HEAL_MIN_SAMPLES = 'lots';
      expect(() => getMergedHealingConfig()).toThrow(ConfigValidationError);
    });

    it('should reject an unknown corpus persistence mode from the environment', () => {
      process.env.SELF_HEAL_CORPUS_PERSISTENCE = 'sometimes';
      expect(() => getMergedHealingConfig()).toThrow(/corpusPersistence/);
    });
  });

  describe('getMergedLogConfig', () => {
    it('should return defaults when there is no config', () => {
      expect(getMergedLogConfig()).toEqual({ level: 'info', prettyPrint: false });
    });

    it('should read the level from the environment', () => {
      process.env.LOG_LEVEL = 'debug';
      process.env.LOG_PRETTY = 'true';
      expect(getMergedLogConfig()).toEqual({ level: 'debug', prettyPrint: true });
    });
  });

  describe('applyLogConfig', () => {
    it('should set the active logger level from the config file', () => {
      writeConfig('.selfhealrc', '{"log":{"level":"error"}}');

      expect(applyLogConfig()).toEqual({ level: 'error', prettyPrint: false });
      expect(getLogger().level).toBe('error');
    });

    it('should let the environment override the config file level', () => {
      writeConfig('.selfhealrc', '{"log":{"level":"error"}}');
      process.env.LOG_LEVEL = 'warn';

      applyLogConfig();

      expect(getLogger().level).toBe('warn');
    });
  });
});
