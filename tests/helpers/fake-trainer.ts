/**
 * Deterministic ClassifierTrainer for ranker and resolver tests
 */

import type { ClassifierModel, ClassifierTrainer } from '../../src/core/learned-ranker.js';
import type { FeatureVector, Label, SerializedModel } from '../../src/types/healing.js';

export const FAKE_MODEL_FORMAT = 'fake-v1';

/** Feature index of the normalized heuristic score */
const HEURISTIC_FEATURE = 6;

export type ScoreFn = (features: FeatureVector) => number;

export class FakeModel implements ClassifierModel {
  disposed = false;

  constructor(
    private readonly score: ScoreFn,
    private readonly trainedOn: number
  ) {}

  async predict(features: FeatureVector[]): Promise<number[]> {
    return features.map(this.score);
  }

  async serialize(): Promise<SerializedModel> {
    return {
      format: FAKE_MODEL_FORMAT,
      trainedOn: this.trainedOn,
      trainedAt: '2026-01-01T00:00:00.000Z',
      payload: { kind: 'fake' },
    };
  }

  dispose(): void {
    this.disposed = true;
  }
}

export class FakeTrainer implements ClassifierTrainer {
  readonly format = FAKE_MODEL_FORMAT;
  readonly fits: Array<{ features: FeatureVector[]; labels: Label[] }> = [];
  /** Every model handed out by fit() or restore(), oldest first */
  readonly models: FakeModel[] = [];
  restored = 0;

  /** Defaults to echoing the normalized heuristic score */
  constructor(private readonly score: ScoreFn = (features) => features[HEURISTIC_FEATURE]) {}

  async fit(features: FeatureVector[], labels: Label[]): Promise<ClassifierModel> {
    this.fits.push({ features, labels });
    return this.track(new FakeModel(this.score, features.length));
  }

  async restore(serialized: SerializedModel): Promise<ClassifierModel> {
    this.restored++;
    return this.track(new FakeModel(this.score, serialized.trainedOn));
  }

  private track(model: FakeModel): FakeModel {
    this.models.push(model);
    return model;
  }
}
