/**
 * Heuristic Scorer
 *
 * Deterministic weighted-attribute similarity between a golden snapshot and a
 * live candidate. Used three ways: as the fallback ranking, as the label
 * generator for training data, and (normalized) as a feature of the learned
 * ranker.
 *
 * Tag equality is a hard gate: a tag mismatch scores 0 whatever else matches.
 * Weights follow attribute reliability: explicit test hooks and ids first,
 * then classes, then structural and text hints.
 */

import type { AttributeSnapshot } from '../types/healing.js';

export const HEURISTIC_WEIGHTS = {
  id: 10,
  name: 10,
  testId: 8,
  class: 5,
  text: 3,
  innerHTML: 2,
  parentTag: 2,
  parentId: 5,
  parentClass: 3,
} as const;

export type MatchSignal = keyof typeof HEURISTIC_WEIGHTS;

const SIGNALS = [
  'id',
  'name',
  'testId',
  'class',
  'text',
  'innerHTML',
  'parentTag',
  'parentId',
  'parentClass',
] as const satisfies readonly MatchSignal[];

/** Sum of all weights, the score of a candidate matching on every signal */
export const MAX_HEURISTIC_SCORE = SIGNALS.reduce((sum, signal) => sum + HEURISTIC_WEIGHTS[signal], 0);

export type MatchFlags = Record<MatchSignal, boolean>;

/** Absent or empty values never count as a match */
function same(a: string | null | undefined, b: string | null | undefined): boolean {
  return Boolean(a) && a === b;
}

function sameTag(a: string | null | undefined, b: string | null | undefined): boolean {
  return Boolean(a) && Boolean(b) && a?.toLowerCase() === b?.toLowerCase();
}

function contains(haystack: string | undefined, needle: string | undefined): boolean {
  return Boolean(needle) && Boolean(haystack) && (haystack ?? '').includes(needle ?? '');
}

/**
 * Per-signal match flags. Does not apply the tag gate.
 */
export function matchFlags(golden: AttributeSnapshot, candidate: AttributeSnapshot): MatchFlags {
  const goldenParent = golden.parent;
  const candidateParent = candidate.parent;
  const parents = goldenParent && candidateParent ? { g: goldenParent, c: candidateParent } : null;

  return {
    id: same(golden.id, candidate.id),
    name: same(golden.name, candidate.name),
    testId: same(golden['data-testid'], candidate['data-testid']),
    class: same(golden.class, candidate.class),
    text: contains(candidate.text, golden.text),
    innerHTML: contains(candidate.innerHTML, golden.innerHTML),
    parentTag: parents !== null && sameTag(parents.g.tag, parents.c.tag),
    parentId: parents !== null && same(parents.g.id, parents.c.id),
    parentClass: parents !== null && same(parents.g.class, parents.c.class),
  };
}

export function tagsMatch(golden: AttributeSnapshot, candidate: AttributeSnapshot): boolean {
  return sameTag(golden.tag, candidate.tag);
}

/**
 * Weighted similarity in [0, MAX_HEURISTIC_SCORE]
 */
export function similarity(golden: AttributeSnapshot, candidate: AttributeSnapshot): number {
  if (!tagsMatch(golden, candidate)) {
    return 0;
  }
  const flags = matchFlags(golden, candidate);
  let score = 0;
  for (const signal of SIGNALS) {
    if (flags[signal]) {
      score += HEURISTIC_WEIGHTS[signal];
    }
  }
  return score;
}

/**
 * Index of the highest score; the first one wins ties
 */
export function argMax(scores: readonly number[]): number {
  let best = -1;
  let bestScore = Number.NEGATIVE_INFINITY;
  scores.forEach((score, index) => {
    if (score > bestScore) {
      best = index;
      bestScore = score;
    }
  });
  return best;
}
