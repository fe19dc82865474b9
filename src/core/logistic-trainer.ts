/**
 * Logistic Regression Trainer (TensorFlow.js)
 *
 * Default ClassifierTrainer: a single sigmoid unit over the feature vector.
 * Runs on the tfjs CPU backend with zero-initialised weights, full-batch
 * gradient descent and no shuffling, so the same corpus always produces the
 * same model.
 */

import * as tf from '@tensorflow/tfjs';
import { z } from 'zod';
import { FEATURE_COUNT, type FeatureVector, type Label, type SerializedModel } from '../types/healing.js';
import { logger } from '../utils/logger.js';
import type { ClassifierModel, ClassifierTrainer } from './learned-ranker.js';

const log = logger.create('LogisticTrainer');

export const LOGISTIC_MODEL_FORMAT = 'tfjs-logistic-v1';

export interface LogisticTrainerOptions {
  /** Passes over the corpus (default: 200) */
  epochs?: number;
  /** SGD learning rate (default: 0.1) */
  learningRate?: number;
}

const weightSchema = z.object({
  shape: z.array(z.number().int().nonnegative()),
  values: z.array(z.number()),
});

const logisticPayloadSchema = z.object({
  inputSize: z.literal(FEATURE_COUNT),
  weights: z.array(weightSchema).length(2),
});

type LogisticPayload = z.infer<typeof logisticPayloadSchema>;

let backendReady: Promise<void> | null = null;

function ensureBackend(): Promise<void> {
  if (!backendReady) {
    backendReady = (async () => {
      await tf.setBackend('cpu');
      await tf.ready();
      log.debug('TensorFlow.js backend ready', { backend: tf.getBackend() });
    })();
  }
  return backendReady;
}

function buildNetwork(): tf.Sequential {
  const network = tf.sequential();
  network.add(
    tf.layers.dense({
      units: 1,
      inputShape: [FEATURE_COUNT],
      activation: 'sigmoid',
      kernelInitializer: 'zeros',
      biasInitializer: 'zeros',
    })
  );
  return network;
}

class LogisticModel implements ClassifierModel {
  constructor(
    private readonly network: tf.Sequential,
    private readonly trainedOn: number
  ) {}

  async predict(features: FeatureVector[]): Promise<number[]> {
    if (features.length === 0) {
      return [];
    }
    const input = tf.tensor2d(features, [features.length, FEATURE_COUNT]);
    const output = this.network.predict(input);
    try {
      if (Array.isArray(output)) {
        throw new Error('Logistic model produced more than one output tensor');
      }
      return Array.from(await output.data());
    } finally {
      input.dispose();
      tf.dispose(output);
    }
  }

  async serialize(): Promise<SerializedModel> {
    const weights: LogisticPayload['weights'] = [];
    for (const tensor of this.network.getWeights()) {
      weights.push({ shape: [...tensor.shape], values: Array.from(await tensor.data()) });
    }
    const payload: LogisticPayload = { inputSize: FEATURE_COUNT, weights };
    return {
      format: LOGISTIC_MODEL_FORMAT,
      trainedOn: this.trainedOn,
      trainedAt: new Date().toISOString(),
      payload,
    };
  }

  dispose(): void {
    this.network.dispose();
  }
}

export class LogisticRegressionTrainer implements ClassifierTrainer {
  readonly format = LOGISTIC_MODEL_FORMAT;
  private readonly epochs: number;
  private readonly learningRate: number;

  constructor(options: LogisticTrainerOptions = {}) {
    this.epochs = options.epochs ?? 200;
    this.learningRate = options.learningRate ?? 0.1;
  }

  async fit(features: FeatureVector[], labels: Label[]): Promise<ClassifierModel> {
    if (features.length === 0 || features.length !== labels.length) {
      throw new Error(`Cannot fit on ${features.length} feature vectors with ${labels.length} labels`);
    }
    await ensureBackend();

    const network = buildNetwork();
    const optimizer = tf.train.sgd(this.learningRate);
    network.compile({ optimizer, loss: 'binaryCrossentropy' });

    const xs = tf.tensor2d(features, [features.length, FEATURE_COUNT]);
    const ys = tf.tensor2d(
      labels.map((label) => [label]),
      [labels.length, 1]
    );
    try {
      const history = await network.fit(xs, ys, {
        epochs: this.epochs,
        batchSize: features.length,
        shuffle: false,
        verbose: 0,
      });
      const losses = history.history.loss ?? [];
      log.debug('Logistic model fitted', {
        samples: features.length,
        epochs: this.epochs,
        finalLoss: losses[losses.length - 1],
      });
    } catch (error) {
      network.dispose();
      throw error;
    } finally {
      xs.dispose();
      ys.dispose();
      // The network does not own an optimizer passed in by instance
      optimizer.dispose();
    }

    return new LogisticModel(network, features.length);
  }

  async restore(serialized: SerializedModel): Promise<ClassifierModel> {
    if (serialized.format !== LOGISTIC_MODEL_FORMAT) {
      throw new Error(`Cannot restore model of format ${serialized.format}`);
    }
    const parsed = logisticPayloadSchema.safeParse(serialized.payload);
    if (!parsed.success) {
      throw new Error(`Invalid logistic model payload: ${parsed.error.message}`);
    }
    await ensureBackend();

    const network = buildNetwork();
    const tensors = parsed.data.weights.map((weight) => tf.tensor(weight.values, weight.shape));
    try {
      network.setWeights(tensors);
    } finally {
      tf.dispose(tensors);
    }
    return new LogisticModel(network, serialized.trainedOn);
  }
}
