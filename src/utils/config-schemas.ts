/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * Environment variables and config file values go through these schemas
 * for consistent validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return schema.default(options.default);
}

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// HEALING CONFIGURATION
// ============================================

export const corpusPersistenceSchema = z.enum(['on-retrain', 'every-round']);
export type CorpusPersistence = z.infer<typeof corpusPersistenceSchema>;

export const healingConfigSchema = z.object({
  dataDir: z.string().min(1).default('./.self-healing'),
  goldenFile: z.string().min(1).default('global_golden.json'),
  corpusFile: z.string().min(1).default('training_data.json'),
  modelFile: z.string().min(1).default('ranker_model.json'),
  minSamplesForModel: integerStringSchema({ min: 1, max: 1_000_000, default: 5 }),
  // Try the next synthesis rule when a synthesized locator fails verification
  synthesisFallback: booleanStringSchema,
  corpusPersistence: corpusPersistenceSchema.default('on-retrain'),
  trainingEpochs: integerStringSchema({ min: 1, max: 10_000, default: 200 }),
  learningRate: z.coerce.number().positive().max(10).default(0.1),
});

export type HealingConfig = z.infer<typeof healingConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
