/**
 * Self-Healing Agent
 *
 * Session orchestrator for one page-automation driver. Owns the golden table,
 * the training corpus and the learned ranker for its lifetime and threads
 * them through every resolver call.
 *
 * Usage:
 * ```typescript
 * const agent = await createSelfHealingAgent(new PlaywrightDriver(page));
 * await agent.fill("//input[@id='email']", 'user@example.com');
 * await agent.click("//*[@id='submit-btn']");
 * console.log(agent.getHealingHistory());
 * ```
 *
 * One agent per set of data files: concurrent agents sharing the same files
 * race on read-modify-write and are not supported.
 */

import * as path from 'node:path';
import type { DriverElement, PageDriver } from '../types/driver.js';
import { DriverError, isHealingError } from '../types/errors.js';
import {
  goldenTableSchema,
  serializedModelSchema,
  trainingCorpusDataSchema,
  type GoldenTable,
  type HealingEvent,
  type SerializedModel,
  type TrainingCorpusData,
} from '../types/healing.js';
import type { HealingConfig } from '../utils/config-schemas.js';
import { applyLogConfig, getMergedHealingConfig } from '../utils/config-loader.js';
import { logger } from '../utils/logger.js';
import { createJsonFileStore, type StateStore } from '../utils/persistent-store.js';
import { toPageKey } from './golden-identifier.js';
import { GoldenReferenceStore } from './golden-store.js';
import {
  BatchRetrainPolicy,
  LearnedRanker,
  type ClassifierTrainer,
  type RetrainPolicy,
} from './learned-ranker.js';
import { LogisticRegressionTrainer } from './logistic-trainer.js';
import { SelfHealingResolver, type ResolutionResult } from './self-healing-resolver.js';
import { TrainingCorpus, TrainingCorpusStore } from './training-corpus.js';

const log = logger.agent;

// ============================================
// TYPES
// ============================================

export interface SelfHealingAgentOptions {
  /** Overrides applied on top of environment, config file and defaults */
  config?: Partial<HealingConfig>;
  /** Persistence for the golden table (default: JSON file under dataDir) */
  goldenStore?: StateStore<GoldenTable>;
  /** Persistence for the training corpus (default: JSON file under dataDir) */
  corpusStore?: StateStore<TrainingCorpusData>;
  /** Persistence for the ranker model (default: JSON file under dataDir) */
  modelStore?: StateStore<SerializedModel>;
  /** Classifier behind the learned ranker (default: tfjs logistic regression) */
  trainer?: ClassifierTrainer;
  /** When the ranker is refitted (default: batch refit at minSamplesForModel) */
  retrainPolicy?: RetrainPolicy;
}

/**
 * Read-only view of a session
 */
export interface AgentState {
  goldens: GoldenTable;
  corpusSize: number;
  hasModel: boolean;
  modelTrainedOn: number;
  healingRounds: number;
}

// ============================================
// AGENT
// ============================================

export class SelfHealingAgent {
  readonly config: HealingConfig;
  private readonly goldens: GoldenReferenceStore;
  private readonly corpusStore: TrainingCorpusStore;
  private readonly ranker: LearnedRanker;
  private readonly resolver: SelfHealingResolver;
  private corpus = new TrainingCorpus();
  private history: HealingEvent[] = [];
  private initialized = false;

  constructor(
    private readonly driver: PageDriver,
    options: SelfHealingAgentOptions = {}
  ) {
    applyLogConfig();
    this.config = getMergedHealingConfig(options.config);
    const dataFile = (file: string) => path.join(this.config.dataDir, file);

    this.goldens = new GoldenReferenceStore(
      options.goldenStore ??
        createJsonFileStore(dataFile(this.config.goldenFile), goldenTableSchema, 'GoldenTableStore')
    );
    this.corpusStore = new TrainingCorpusStore(
      options.corpusStore ??
        createJsonFileStore(dataFile(this.config.corpusFile), trainingCorpusDataSchema, 'TrainingCorpusStore', {
          prettyPrint: false,
        })
    );
    this.ranker = new LearnedRanker(
      options.trainer ??
        new LogisticRegressionTrainer({
          epochs: this.config.trainingEpochs,
          learningRate: this.config.learningRate,
        }),
      options.modelStore ?? createJsonFileStore(dataFile(this.config.modelFile), serializedModelSchema, 'ModelStore'),
      options.retrainPolicy ?? new BatchRetrainPolicy(this.config.minSamplesForModel)
    );
    this.resolver = new SelfHealingResolver({
      synthesisFallback: this.config.synthesisFallback,
      corpusPersistence: this.config.corpusPersistence,
    });
  }

  /**
   * Load the golden table, the training corpus and the model
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.goldens.load();
    this.corpus = await this.corpusStore.load();
    await this.ranker.load();
    this.initialized = true;

    log.info('Self-healing agent initialized', {
      dataDir: this.config.dataDir,
      corpusSize: this.corpus.size,
      hasModel: this.ranker.hasModel(),
      minSamples: this.ranker.policy.minSamples,
    });
  }

  /**
   * Resolve a locator to a live element, healing it if needed
   */
  async locate(locator: string): Promise<DriverElement> {
    return (await this.locateWithDetails(locator)).element;
  }

  /**
   * Resolve a locator and report how it was resolved
   */
  async locateWithDetails(locator: string): Promise<ResolutionResult> {
    this.ensureInitialized();

    const title = await this.driverCall('read page title', locator, () => this.driver.title());
    const pageKey = toPageKey(title);
    const capture = await this.goldens.capture(this.driver, title, locator);

    const result = await this.resolver.resolve(
      {
        driver: this.driver,
        corpus: this.corpus,
        corpusStore: this.corpusStore,
        ranker: this.ranker,
      },
      { locator, pageKey, goldenId: capture.identifier, golden: capture.snapshot }
    );

    if (result.healed && result.rule && result.strategy) {
      this.history.push({
        pageKey,
        goldenId: capture.identifier,
        originalLocator: locator,
        healedLocator: result.locator,
        rule: result.rule,
        strategy: result.strategy,
        candidateCount: result.candidateCount,
        corpusSize: this.corpus.size,
        retrained: result.retrained,
        timestamp: Date.now(),
      });
    }

    return result;
  }

  async click(locator: string): Promise<void> {
    const element = await this.locate(locator);
    await this.driverCall('click element', locator, () => element.click());
    log.debug('Clicked element', { locator });
  }

  /**
   * Clear a field and type a value into it. The value is never logged.
   */
  async fill(locator: string, value: string): Promise<void> {
    const element = await this.locate(locator);
    await this.driverCall('fill element', locator, async () => {
      await element.clear();
      await element.type(value);
    });
    log.debug('Filled element', { locator });
  }

  /**
   * Healing rounds of this session, oldest first
   */
  getHealingHistory(): HealingEvent[] {
    return this.history.map((event) => ({ ...event }));
  }

  getState(): AgentState {
    return {
      goldens: this.goldens.getTable(),
      corpusSize: this.corpus.size,
      hasModel: this.ranker.hasModel(),
      modelTrainedOn: this.ranker.getTrainedOn(),
      healingRounds: this.history.length,
    };
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('SelfHealingAgent is not initialized; call initialize() or use createSelfHealingAgent()');
    }
  }

  private async driverCall<T>(operation: string, locator: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isHealingError(error)) {
        throw error;
      }
      log.error(`Failed to ${operation}`, { locator, error });
      throw new DriverError(`Page driver failed to ${operation}`, error, { locator });
    }
  }
}

/**
 * Create and initialize an agent
 */
export async function createSelfHealingAgent(
  driver: PageDriver,
  options: SelfHealingAgentOptions = {}
): Promise<SelfHealingAgent> {
  const agent = new SelfHealingAgent(driver, options);
  await agent.initialize();
  return agent;
}
