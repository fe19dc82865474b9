/**
 * Healing Domain Types
 *
 * Golden references, training data and model envelopes, each with the zod
 * schema used to validate it at the driver boundary and when it is loaded
 * back from disk.
 */

import { z } from 'zod';

// ============================================
// ATTRIBUTE SNAPSHOT
// ============================================

export const parentSnapshotSchema = z.object({
  tag: z.string(),
  id: z.string().nullable(),
  name: z.string().nullable(),
  'data-testid': z.string().nullable(),
  class: z.string().nullable(),
});

export type ParentSnapshot = z.infer<typeof parentSnapshotSchema>;

export const attributeSnapshotSchema = z.object({
  tag: z.string().min(1),
  id: z.string().nullable(),
  name: z.string().nullable(),
  'data-testid': z.string().nullable(),
  class: z.string().nullable(),
  text: z.string(),
  /** Only captured for container-like tags */
  innerHTML: z.string().optional(),
  parent: parentSnapshotSchema.nullable(),
  /** Locator the snapshot was captured through */
  sourceLocator: z.string().optional(),
});

/**
 * Durable description of an element: its stable attributes plus its parent's
 */
export type AttributeSnapshot = z.infer<typeof attributeSnapshotSchema>;

/**
 * The attributes golden identifiers are derived from
 */
export type IdentityAttributes = Pick<AttributeSnapshot, 'tag' | 'id' | 'name' | 'data-testid' | 'class' | 'text'>;

// ============================================
// GOLDEN TABLE
// ============================================

export const pageGoldensSchema = z.record(z.string(), attributeSnapshotSchema);

/** goldenIdentifier -> snapshot, for one page */
export type PageGoldens = z.infer<typeof pageGoldensSchema>;

export const goldenTableSchema = z.record(z.string(), pageGoldensSchema);

/** pageKey -> (goldenIdentifier -> snapshot) */
export type GoldenTable = z.infer<typeof goldenTableSchema>;

// ============================================
// TRAINING CORPUS
// ============================================

export const FEATURE_COUNT = 10;

/** Fixed-length numeric description of a (golden, candidate) pair */
export type FeatureVector = number[];

export type Label = 0 | 1;

export const featureVectorSchema = z.array(z.number()).length(FEATURE_COUNT);

export const trainingCorpusDataSchema = z
  .object({
    features: z.array(featureVectorSchema),
    labels: z.array(z.union([z.literal(0), z.literal(1)])),
  })
  .refine((data) => data.features.length === data.labels.length, {
    message: 'features and labels must have the same length',
    path: ['labels'],
  });

export type TrainingCorpusData = z.infer<typeof trainingCorpusDataSchema>;

// ============================================
// MODEL
// ============================================

export const serializedModelSchema = z.object({
  /** Identifies the trainer that can restore the payload */
  format: z.string().min(1),
  /** Corpus size the model was fitted on */
  trainedOn: z.number().int().nonnegative(),
  trainedAt: z.string(),
  payload: z.unknown(),
});

/**
 * Persisted classifier. The payload is opaque to everything but its trainer.
 */
export type SerializedModel = z.infer<typeof serializedModelSchema>;

// ============================================
// RESOLUTION
// ============================================

export type ResolverState =
  | 'TRY_ORIGINAL'
  | 'ENUMERATE_CANDIDATES'
  | 'SCORE_AND_LABEL'
  | 'RETRAIN'
  | 'RANK'
  | 'SYNTHESIZE'
  | 'VERIFY'
  | 'DONE'
  | 'FAILED';

export type RankingStrategy = 'learned' | 'heuristic';

export type SynthesisRule = 'id' | 'data-testid' | 'placeholder' | 'text' | 'class' | 'tag';

/**
 * One entry of a session's healing history
 */
export interface HealingEvent {
  pageKey: string;
  goldenId: string;
  originalLocator: string;
  healedLocator: string;
  rule: SynthesisRule;
  strategy: RankingStrategy;
  candidateCount: number;
  corpusSize: number;
  retrained: boolean;
  timestamp: number;
}
