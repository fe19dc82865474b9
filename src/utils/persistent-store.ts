/**
 * Persistent Store - Write-through & Atomic File Persistence
 *
 * Every piece of healing state (golden table, training corpus, model) is
 * persisted through the StateStore capability, so sessions can be handed
 * an in-memory store in tests and a file store in real runs.
 *
 * - Write-through: every save() hits the disk before it resolves
 * - Atomic writes: temp file + rename, a reader sees the old or the new file
 * - Validated loads: the stored document is parsed with a zod schema
 *
 * Usage:
 *   const store = new JsonFileStore('./data.json', mySchema);
 *   await store.save(data);
 *   const data = await store.load();  // null when the file does not exist
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';
import { formatConfigErrors } from './config-schemas.js';
import { logger } from './logger.js';

/**
 * Load/save capability for one piece of persisted state
 */
export interface StateStore<S> {
  /** Returns null when nothing has been persisted yet */
  load(): Promise<S | null>;
  save(state: S): Promise<void>;
}

/**
 * Thrown when a persisted document exists but does not match its schema
 */
export class StateValidationError extends Error {
  constructor(
    public readonly source: string,
    public readonly zodError: z.ZodError
  ) {
    super(`Persisted state in ${source} is invalid:\n${formatConfigErrors(zodError)}`);
    this.name = 'StateValidationError';
  }
}

/**
 * Configuration for JsonFileStore
 */
export interface JsonFileStoreConfig {
  /** Pretty-print JSON with indentation (default: true) */
  prettyPrint: boolean;

  /** JSON indentation spaces (default: 2) */
  indent: number;

  /** Create parent directories if they don't exist (default: true) */
  createDirs: boolean;

  /** Component name for logging */
  componentName: string;
}

export const DEFAULT_JSON_FILE_STORE_CONFIG: JsonFileStoreConfig = {
  prettyPrint: true,
  indent: 2,
  createDirs: true,
  componentName: 'JsonFileStore',
};

/**
 * Statistics about store operations
 */
export interface JsonFileStoreStats {
  writes: number;
  failedWrites: number;
  lastWriteTime: number | null;
  lastError: string | null;
}

/**
 * JsonFileStore - atomic JSON file persistence validated by a zod schema
 */
export class JsonFileStore<S> implements StateStore<S> {
  private filePath: string;
  private schema: z.ZodType<S, z.ZodTypeDef, unknown>;
  private config: JsonFileStoreConfig;
  private stats: JsonFileStoreStats;

  constructor(
    filePath: string,
    schema: z.ZodType<S, z.ZodTypeDef, unknown>,
    config: Partial<JsonFileStoreConfig> = {}
  ) {
    this.filePath = path.resolve(filePath);
    this.schema = schema;
    this.config = { ...DEFAULT_JSON_FILE_STORE_CONFIG, ...config };
    this.stats = {
      writes: 0,
      failedWrites: 0,
      lastWriteTime: null,
      lastError: null,
    };
  }

  getFilePath(): string {
    return this.filePath;
  }

  getStats(): JsonFileStoreStats {
    return { ...this.stats };
  }

  async load(): Promise<S | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      logger.store.error(`${this.config.componentName}: Failed to load from ${this.filePath}`, { error });
      throw error;
    }

    const result = this.schema.safeParse(JSON.parse(content));
    if (!result.success) {
      throw new StateValidationError(this.filePath, result.error);
    }
    return result.data;
  }

  async save(state: S): Promise<void> {
    await this.atomicWrite(state);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  async delete(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }
  }

  /**
   * Perform atomic write: write to temp file, then rename
   */
  private async atomicWrite(data: S): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;

    try {
      if (this.config.createDirs) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      }

      const content = this.config.prettyPrint
        ? JSON.stringify(data, null, this.config.indent)
        : JSON.stringify(data);

      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);

      this.stats.writes++;
      this.stats.lastWriteTime = Date.now();
      this.stats.lastError = null;

      logger.store.debug(`${this.config.componentName}: Saved to ${this.filePath}`, {
        size: content.length,
      });
    } catch (error) {
      this.stats.failedWrites++;
      this.stats.lastError = String(error);

      logger.store.error(`${this.config.componentName}: Failed to save to ${this.filePath}`, { error });

      await fs.rm(tempPath, { force: true });

      throw error;
    }
  }
}

/**
 * In-memory StateStore. Values are cloned on the way in and out, so callers
 * observe the same copy semantics as a file round-trip.
 */
export class MemoryStore<S> implements StateStore<S> {
  private value: S | null;
  private saveCount = 0;

  constructor(initial: S | null = null) {
    this.value = initial === null ? null : structuredClone(initial);
  }

  async load(): Promise<S | null> {
    return this.value === null ? null : structuredClone(this.value);
  }

  async save(state: S): Promise<void> {
    this.value = structuredClone(state);
    this.saveCount++;
  }

  /** Number of save() calls so far */
  getSaveCount(): number {
    return this.saveCount;
  }

  peek(): S | null {
    return this.value;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Create a JsonFileStore with a component name for its log lines
 */
export function createJsonFileStore<S>(
  filePath: string,
  schema: z.ZodType<S, z.ZodTypeDef, unknown>,
  componentName: string,
  config: Partial<JsonFileStoreConfig> = {}
): JsonFileStore<S> {
  return new JsonFileStore<S>(filePath, schema, { componentName, ...config });
}
