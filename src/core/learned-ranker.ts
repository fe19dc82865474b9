/**
 * Learned Ranker
 *
 * Binary classifier over candidate feature vectors, fitted on the whole
 * training corpus and persisted after every fit. The classifier itself is a
 * black box behind ClassifierTrainer/ClassifierModel; when it fires is a
 * RetrainPolicy decision, so an online learner can replace the batch refit
 * without touching the resolver.
 */

import type { FeatureVector, Label, SerializedModel } from '../types/healing.js';
import type { StateStore } from '../utils/persistent-store.js';
import { logger } from '../utils/logger.js';
import { argMax } from './heuristic-scorer.js';
import type { TrainingCorpus } from './training-corpus.js';

const log = logger.ranker;

// ============================================
// CLASSIFIER CAPABILITY
// ============================================

/**
 * A fitted classifier
 */
export interface ClassifierModel {
  /** Probability of class 1 for each feature vector, in input order */
  predict(features: FeatureVector[]): Promise<number[]>;

  serialize(): Promise<SerializedModel>;

  /** Release the resources held by the fitted classifier */
  dispose(): void;
}

/**
 * Fits classifiers and restores them from their serialized form
 */
export interface ClassifierTrainer {
  /** Written into SerializedModel.format; a stored model with another format is ignored */
  readonly format: string;

  fit(features: FeatureVector[], labels: Label[]): Promise<ClassifierModel>;

  restore(serialized: SerializedModel): Promise<ClassifierModel>;
}

// ============================================
// RETRAIN POLICY
// ============================================

export interface RetrainPolicy {
  readonly name: string;

  /** Minimum corpus size at which a model may be used */
  readonly minSamples: number;

  /** Whether a healing round that leaves the corpus at this size refits the model */
  shouldRetrain(corpusSize: number): boolean;

  /** Number of examples the refit at this corpus size trains on (0 when no refit) */
  retrainCost(corpusSize: number): number;
}

/**
 * Full refit on the entire corpus every round once the threshold is reached
 */
export class BatchRetrainPolicy implements RetrainPolicy {
  readonly name = 'batch';

  constructor(readonly minSamples = 5) {
    if (!Number.isInteger(minSamples) || minSamples < 1) {
      throw new Error(`minSamples must be a positive integer, got ${minSamples}`);
    }
  }

  shouldRetrain(corpusSize: number): boolean {
    return corpusSize >= this.minSamples;
  }

  retrainCost(corpusSize: number): number {
    return this.shouldRetrain(corpusSize) ? corpusSize : 0;
  }
}

// ============================================
// RANKER
// ============================================

export interface RankResult {
  /** Index of the winning candidate */
  index: number;
  probabilities: number[];
}

export class LearnedRanker {
  private model: ClassifierModel | null = null;
  private trainedOn = 0;

  constructor(
    private readonly trainer: ClassifierTrainer,
    private readonly persistence: StateStore<SerializedModel>,
    readonly policy: RetrainPolicy = new BatchRetrainPolicy()
  ) {}

  /**
   * Restore the persisted model, if any. Returns whether a model is available.
   */
  async load(): Promise<boolean> {
    const serialized = await this.persistence.load();
    if (!serialized) {
      log.info('No ranker model found, heuristic ranking until the corpus reaches the threshold', {
        minSamples: this.policy.minSamples,
      });
      return false;
    }

    if (serialized.format !== this.trainer.format) {
      log.warn('Ignoring ranker model in a different format', {
        stored: serialized.format,
        expected: this.trainer.format,
      });
      return false;
    }

    this.replaceModel(await this.trainer.restore(serialized));
    this.trainedOn = serialized.trainedOn;
    log.info('Ranker model loaded', { trainedOn: this.trainedOn, trainedAt: serialized.trainedAt });
    return true;
  }

  hasModel(): boolean {
    return this.model !== null;
  }

  /** Corpus size the current model was fitted on */
  getTrainedOn(): number {
    return this.trainedOn;
  }

  /**
   * Whether ranking uses the model for a corpus of this size
   */
  isActive(corpusSize: number): boolean {
    return this.model !== null && corpusSize >= this.policy.minSamples;
  }

  /**
   * Refit from scratch on the entire corpus and persist the result
   */
  async retrain(corpus: TrainingCorpus): Promise<void> {
    const startTime = Date.now();
    const model = await this.trainer.fit(corpus.getFeatures(), corpus.getLabels());

    try {
      await this.persistence.save(await model.serialize());
    } catch (error) {
      model.dispose();
      throw error;
    }
    this.replaceModel(model);
    this.trainedOn = corpus.size;
    log.timed('Ranker retrained', startTime, {
      samples: corpus.size,
      cost: this.policy.retrainCost(corpus.size),
      policy: this.policy.name,
    });
  }

  /**
   * Swap in a model and dispose the one it replaces
   */
  private replaceModel(model: ClassifierModel): void {
    const previous = this.model;
    this.model = model;
    previous?.dispose();
  }

  /**
   * Pick the candidate with the highest probability of class 1
   */
  async rank(features: FeatureVector[]): Promise<RankResult> {
    if (!this.model) {
      throw new Error('No ranker model is loaded');
    }
    const probabilities = await this.model.predict(features);
    if (probabilities.length !== features.length) {
      throw new Error(`Ranker returned ${probabilities.length} probabilities for ${features.length} candidates`);
    }
    return { index: argMax(probabilities), probabilities };
  }
}
