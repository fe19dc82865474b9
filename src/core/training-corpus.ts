/**
 * Training Corpus
 *
 * Append-only accumulation of (feature vector, label) pairs across healing
 * rounds and across runs. Labels are self-supervised: in every round the
 * heuristic's top candidate is labeled 1 and every other candidate 0, so the
 * learned ranker is trained to imitate the heuristic and can only diverge
 * from it on candidate shapes it has not seen.
 */

import {
  FEATURE_COUNT,
  type FeatureVector,
  type Label,
  type TrainingCorpusData,
} from '../types/healing.js';
import type { StateStore } from '../utils/persistent-store.js';
import { logger } from '../utils/logger.js';
import { argMax } from './heuristic-scorer.js';

const log = logger.corpus;

/**
 * Labels for one round: 1 for the heuristic arg-max (first wins ties), 0 otherwise
 */
export function labelRound(heuristicScores: readonly number[]): Label[] {
  const best = argMax(heuristicScores);
  return heuristicScores.map((_, index) => (index === best ? 1 : 0));
}

export class TrainingCorpus {
  private readonly features: FeatureVector[];
  private readonly labels: Label[];

  constructor(data: TrainingCorpusData = { features: [], labels: [] }) {
    if (data.features.length !== data.labels.length) {
      throw new Error(
        `Corpus has ${data.features.length} feature vectors but ${data.labels.length} labels`
      );
    }
    this.features = data.features.map((vector) => [...vector]);
    this.labels = [...data.labels];
  }

  get size(): number {
    return this.labels.length;
  }

  /**
   * Append one round of examples
   */
  append(features: readonly FeatureVector[], labels: readonly Label[]): void {
    if (features.length !== labels.length) {
      throw new Error(`Cannot append ${features.length} feature vectors with ${labels.length} labels`);
    }
    for (const vector of features) {
      if (vector.length !== FEATURE_COUNT) {
        throw new Error(`Feature vectors must have ${FEATURE_COUNT} entries, got ${vector.length}`);
      }
    }
    this.features.push(...features.map((vector) => [...vector]));
    this.labels.push(...labels);
  }

  getFeatures(): FeatureVector[] {
    return this.features.map((vector) => [...vector]);
  }

  getLabels(): Label[] {
    return [...this.labels];
  }

  toJSON(): TrainingCorpusData {
    return { features: this.getFeatures(), labels: this.getLabels() };
  }
}

/**
 * Loads and saves the corpus through a StateStore
 */
export class TrainingCorpusStore {
  constructor(private readonly persistence: StateStore<TrainingCorpusData>) {}

  async load(): Promise<TrainingCorpus> {
    const data = await this.persistence.load();
    if (!data) {
      log.info('No training data found, starting fresh');
      return new TrainingCorpus();
    }
    log.info('Training data loaded', { samples: data.labels.length });
    return new TrainingCorpus(data);
  }

  async save(corpus: TrainingCorpus): Promise<void> {
    await this.persistence.save(corpus.toJSON());
    log.debug('Training data saved', { samples: corpus.size });
  }
}
