/**
 * Feature Extractor
 *
 * Turns a (golden, candidate) pair into the fixed 10-dimensional vector the
 * learned ranker is trained and queried on. The order is part of the
 * persisted corpus format and must not change.
 *
 *   f0 id match           f5 innerHTML containment
 *   f1 name match         f6 heuristic score / MAX_HEURISTIC_SCORE
 *   f2 data-testid match  f7 parent tag match
 *   f3 class match        f8 parent id match
 *   f4 text containment   f9 parent class match
 */

import { FEATURE_COUNT, type AttributeSnapshot, type FeatureVector } from '../types/healing.js';
import { MAX_HEURISTIC_SCORE, matchFlags, similarity } from './heuristic-scorer.js';

export { FEATURE_COUNT };

export const FEATURE_NAMES = [
  'id',
  'name',
  'data-testid',
  'class',
  'text',
  'innerHTML',
  'heuristic',
  'parent-tag',
  'parent-id',
  'parent-class',
] as const;

const flag = (value: boolean): number => (value ? 1 : 0);

export interface ScoredFeatures {
  features: FeatureVector;
  /** Raw heuristic score */
  score: number;
}

/**
 * Features plus the raw heuristic score they were normalized from
 */
export function scoreCandidate(golden: AttributeSnapshot, candidate: AttributeSnapshot): ScoredFeatures {
  const flags = matchFlags(golden, candidate);
  const score = similarity(golden, candidate);

  return {
    score,
    features: [
      flag(flags.id),
      flag(flags.name),
      flag(flags.testId),
      flag(flags.class),
      flag(flags.text),
      flag(flags.innerHTML),
      score / MAX_HEURISTIC_SCORE,
      flag(flags.parentTag),
      flag(flags.parentId),
      flag(flags.parentClass),
    ],
  };
}

export function extractFeatures(golden: AttributeSnapshot, candidate: AttributeSnapshot): FeatureVector {
  return scoreCandidate(golden, candidate).features;
}
