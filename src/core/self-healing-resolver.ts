/**
 * Self-Healing Resolver
 *
 * State machine that turns a locator into a verified live element:
 *
 *   TRY_ORIGINAL -> DONE
 *               \-> ENUMERATE_CANDIDATES -> SCORE_AND_LABEL -> [RETRAIN] -> RANK
 *                   -> SYNTHESIZE -> VERIFY -> DONE | FAILED
 *
 * Every stage returns an Outcome. A recoverable outcome moves to the next
 * stage (only the original locator missing is recoverable); a fatal one ends
 * in FAILED and is thrown to the caller. Each transition is logged with the
 * candidate count, ranking strategy and selector known at that point.
 */

import type { DriverElement, PageDriver } from '../types/driver.js';
import {
  DriverError,
  HealingVerificationFailedError,
  NoCandidatesFoundError,
  PersistenceError,
  RankerError,
  fatal,
  isHealingError,
  ok,
  recoverable,
  type HealingError,
  type HealingErrorContext,
  type Outcome,
} from '../types/errors.js';
import type {
  AttributeSnapshot,
  FeatureVector,
  RankingStrategy,
  ResolverState,
  SynthesisRule,
} from '../types/healing.js';
import type { CorpusPersistence } from '../utils/config-schemas.js';
import { logger, type Logger } from '../utils/logger.js';
import { captureSnapshot } from './attribute-snapshot.js';
import { scoreCandidate } from './feature-extractor.js';
import { argMax } from './heuristic-scorer.js';
import type { LearnedRanker } from './learned-ranker.js';
import { synthesizeAll, type SynthesizedLocator } from './selector-synthesizer.js';
import { labelRound, type TrainingCorpus, type TrainingCorpusStore } from './training-corpus.js';

// ============================================
// TYPES
// ============================================

export interface ResolverOptions {
  /** Try lower-priority synthesis rules when a synthesized locator fails verification */
  synthesisFallback: boolean;
  /** When the corpus is written during a healing round */
  corpusPersistence: CorpusPersistence;
}

/**
 * Session state the resolver reads and extends. Owned by the agent.
 */
export interface ResolverSession {
  driver: PageDriver;
  corpus: TrainingCorpus;
  corpusStore: TrainingCorpusStore;
  ranker: LearnedRanker;
}

export interface ResolveRequest {
  locator: string;
  pageKey: string;
  goldenId: string;
  /** Null when no golden was ever captured for this locator */
  golden: AttributeSnapshot | null;
}

export interface ResolutionResult {
  /** The original locator, or the verified synthesized one */
  locator: string;
  element: DriverElement;
  healed: boolean;
  strategy: RankingStrategy | null;
  rule: SynthesisRule | null;
  candidateCount: number;
  retrained: boolean;
  /** Every state entered, in order */
  states: ResolverState[];
}

interface ScoredRound {
  candidates: DriverElement[];
  features: FeatureVector[];
  scores: number[];
}

interface RankedPick {
  index: number;
  strategy: RankingStrategy;
}

// ============================================
// RESOLVER
// ============================================

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  synthesisFallback: false,
  corpusPersistence: 'on-retrain',
};

export class SelfHealingResolver {
  private readonly options: ResolverOptions;

  constructor(options: Partial<ResolverOptions> = {}) {
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
  }

  /**
   * Resolve a locator, healing it when the original no longer matches.
   * Throws a HealingError when no verified element can be produced.
   */
  async resolve(session: ResolverSession, request: ResolveRequest): Promise<ResolutionResult> {
    const run = new ResolutionRun(session, request, this.options);
    return run.execute();
  }
}

/**
 * One resolve() call: holds the state trail and the per-round log context
 */
class ResolutionRun {
  private readonly states: ResolverState[] = [];
  private readonly log: Logger;
  private candidateCount = 0;
  private strategy: RankingStrategy | null = null;
  private retrained = false;

  constructor(
    private readonly session: ResolverSession,
    private readonly request: ResolveRequest,
    private readonly options: ResolverOptions
  ) {
    this.log = logger.resolver.child({
      page: request.pageKey,
      goldenId: request.goldenId,
      locator: request.locator,
    });
  }

  async execute(): Promise<ResolutionResult> {
    const original = await this.tryOriginal();
    if (original.status === 'ok') {
      return this.done(this.request.locator, original.value, null);
    }
    if (original.status === 'fatal') {
      return this.fail(original.error);
    }

    const golden = this.request.golden;
    if (!golden) {
      return this.fail(
        new NoCandidatesFoundError(`No golden reference recorded for ${this.request.goldenId}`, this.errorContext())
      );
    }

    const candidates = await this.enumerateCandidates(golden);
    if (candidates.status !== 'ok') {
      return this.fail(this.asFatal(candidates));
    }

    try {
      return await this.heal(golden, candidates.value);
    } finally {
      await this.releaseAll(candidates.value);
    }
  }

  /**
   * Score, rank, synthesize and verify. Candidate handles stay live until it returns.
   */
  private async heal(golden: AttributeSnapshot, candidates: DriverElement[]): Promise<ResolutionResult> {
    const round = await this.scoreAndLabel(golden, candidates);
    if (round.status !== 'ok') {
      return this.fail(this.asFatal(round));
    }

    if (this.session.ranker.policy.shouldRetrain(this.session.corpus.size)) {
      const retrained = await this.retrain();
      if (retrained.status !== 'ok') {
        return this.fail(this.asFatal(retrained));
      }
    }

    const pick = await this.rank(round.value);
    if (pick.status !== 'ok') {
      return this.fail(this.asFatal(pick));
    }
    const chosen = round.value.candidates[pick.value.index];

    const synthesized = await this.synthesize(chosen);
    if (synthesized.status !== 'ok') {
      return this.fail(this.asFatal(synthesized));
    }

    const verified = await this.verify(chosen, synthesized.value);
    if (verified.status !== 'ok') {
      return this.fail(this.asFatal(verified));
    }

    return this.done(verified.value.synthesized.locator, verified.value.element, verified.value.synthesized.rule);
  }

  // ============================================
  // STAGES
  // ============================================

  private async tryOriginal(): Promise<Outcome<DriverElement>> {
    this.enter('TRY_ORIGINAL');
    const found = await this.driverCall('find original element', () =>
      this.session.driver.findElement(this.request.locator)
    );
    if (found.status !== 'ok') {
      return found;
    }
    if (!found.value) {
      this.log.info('Original locator did not match, healing');
      return recoverable(`No element matches ${this.request.locator}`);
    }
    return ok(found.value);
  }

  private async enumerateCandidates(golden: AttributeSnapshot): Promise<Outcome<DriverElement[]>> {
    this.enter('ENUMERATE_CANDIDATES', { tag: golden.tag });
    const found = await this.driverCall('enumerate candidates', () => this.session.driver.findElements(golden.tag));
    if (found.status !== 'ok') {
      return found;
    }
    if (found.value.length === 0) {
      return fatal(
        new NoCandidatesFoundError(
          `No candidate elements found with tag: ${golden.tag}`,
          this.errorContext({ tag: golden.tag })
        )
      );
    }
    this.candidateCount = found.value.length;
    return ok(found.value);
  }

  private async scoreAndLabel(golden: AttributeSnapshot, candidates: DriverElement[]): Promise<Outcome<ScoredRound>> {
    this.enter('SCORE_AND_LABEL');
    const features: FeatureVector[] = [];
    const scores: number[] = [];

    for (const candidate of candidates) {
      const snapshot = await this.driverCall('inspect candidate', () =>
        captureSnapshot(candidate, { includeInnerHTML: golden.innerHTML !== undefined })
      );
      if (snapshot.status !== 'ok') {
        return snapshot;
      }
      const scored = scoreCandidate(golden, snapshot.value);
      features.push(scored.features);
      scores.push(scored.score);
    }

    const { corpus, corpusStore, ranker } = this.session;
    corpus.append(features, labelRound(scores));

    const retrainNext = ranker.policy.shouldRetrain(corpus.size);
    if (retrainNext || this.options.corpusPersistence === 'every-round') {
      const saved = await this.stageCall(
        () => corpusStore.save(corpus),
        (error) => new PersistenceError('Failed to persist the training corpus', error, this.errorContext())
      );
      if (saved.status !== 'ok') {
        return saved;
      }
    }

    this.log.debug('Candidates scored', {
      scores,
      corpusSize: corpus.size,
      corpusPersisted: retrainNext || this.options.corpusPersistence === 'every-round',
    });
    return ok({ candidates, features, scores });
  }

  private async retrain(): Promise<Outcome<void>> {
    const { corpus, ranker } = this.session;
    this.enter('RETRAIN', { corpusSize: corpus.size, retrainCost: ranker.policy.retrainCost(corpus.size) });
    const trained = await this.stageCall(
      () => ranker.retrain(corpus),
      (error) => new RankerError('Failed to retrain the learned ranker', error, this.errorContext())
    );
    if (trained.status === 'ok') {
      this.retrained = true;
    }
    return trained;
  }

  private async rank(round: ScoredRound): Promise<Outcome<RankedPick>> {
    const { corpus, ranker } = this.session;

    if (ranker.isActive(corpus.size)) {
      this.strategy = 'learned';
      this.enter('RANK');
      const ranked = await this.stageCall(
        () => ranker.rank(round.features),
        (error) => new RankerError('Failed to rank candidates with the learned ranker', error, this.errorContext())
      );
      if (ranked.status !== 'ok') {
        return ranked;
      }
      const { index, probabilities } = ranked.value;
      this.log.info('Learned ranker selected candidate', { index, probability: probabilities[index] });
      return ok({ index, strategy: 'learned' });
    }

    this.strategy = 'heuristic';
    this.enter('RANK', { corpusSize: corpus.size, minSamples: ranker.policy.minSamples });
    const index = argMax(round.scores);
    this.log.info('Heuristic selected candidate', { index, score: round.scores[index] });
    return ok({ index, strategy: 'heuristic' });
  }

  private async synthesize(chosen: DriverElement): Promise<Outcome<SynthesizedLocator[]>> {
    this.enter('SYNTHESIZE');
    const all = await this.driverCall('synthesize locator', () => synthesizeAll(chosen));
    if (all.status !== 'ok') {
      return all;
    }
    const attempts = this.options.synthesisFallback ? all.value : all.value.slice(0, 1);
    this.log.debug('Synthesized locators', { locators: attempts.map((attempt) => attempt.locator) });
    return ok(attempts);
  }

  private async verify(
    chosen: DriverElement,
    attempts: SynthesizedLocator[]
  ): Promise<Outcome<{ synthesized: SynthesizedLocator; element: DriverElement }>> {
    const tried: string[] = [];

    for (const synthesized of attempts) {
      this.enter('VERIFY', { selector: synthesized.locator, rule: synthesized.rule });
      tried.push(synthesized.locator);

      const verified = await this.driverCall('verify synthesized locator', async () => {
        const element = await this.session.driver.findElement(synthesized.locator);
        if (!element) {
          return null;
        }
        if (await element.isSameElement(chosen)) {
          return element;
        }
        await element.release();
        return null;
      });
      if (verified.status !== 'ok') {
        return verified;
      }
      if (verified.value) {
        return ok({ synthesized, element: verified.value });
      }
      this.log.warn('Synthesized locator did not resolve to the chosen candidate', {
        selector: synthesized.locator,
        rule: synthesized.rule,
      });
    }

    return fatal(
      new HealingVerificationFailedError(
        `Self-healing failed: the generated selector did not locate the chosen element (tried ${tried.join(', ')})`,
        this.errorContext({ attemptedLocators: tried })
      )
    );
  }

  // ============================================
  // HELPERS
  // ============================================

  private enter(state: ResolverState, context: Record<string, unknown> = {}): void {
    this.states.push(state);
    this.log.info(`Resolver state ${state}`, {
      state,
      candidateCount: this.candidateCount,
      strategy: this.strategy ?? undefined,
      ...context,
    });
  }

  /**
   * Run a stage's side effect, turning a thrown error into a fatal outcome
   */
  private async stageCall<T>(fn: () => Promise<T>, wrap: (error: unknown) => HealingError): Promise<Outcome<T>> {
    try {
      return ok(await fn());
    } catch (error) {
      return fatal(isHealingError(error) ? error : wrap(error));
    }
  }

  private driverCall<T>(operation: string, fn: () => Promise<T>): Promise<Outcome<T>> {
    return this.stageCall(fn, (error) => new DriverError(`Page driver failed to ${operation}`, error, this.errorContext()));
  }

  /**
   * Release every candidate handle. Release failures are logged only.
   */
  private async releaseAll(elements: DriverElement[]): Promise<void> {
    const results = await Promise.allSettled(elements.map((element) => element.release()));
    const failed = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failed.length > 0) {
      this.log.warn('Failed to release candidate handles', { failed: failed.length, error: failed[0].reason });
    }
  }

  private asFatal(outcome: { status: 'recoverable'; reason: string } | { status: 'fatal'; error: HealingError }): HealingError {
    if (outcome.status === 'fatal') {
      return outcome.error;
    }
    return new NoCandidatesFoundError(outcome.reason, this.errorContext());
  }

  private errorContext(extra: HealingErrorContext = {}): HealingErrorContext {
    return {
      locator: this.request.locator,
      goldenId: this.request.goldenId,
      pageKey: this.request.pageKey,
      state: this.states[this.states.length - 1],
      ...extra,
    };
  }

  private done(locator: string, element: DriverElement, rule: SynthesisRule | null): ResolutionResult {
    this.enter('DONE', { selector: locator });
    const healed = rule !== null;
    if (healed) {
      this.log.info('Self-healing successful', { originalLocator: this.request.locator, selector: locator, rule });
    }
    return {
      locator,
      element,
      healed,
      strategy: this.strategy,
      rule,
      candidateCount: this.candidateCount,
      retrained: this.retrained,
      states: [...this.states],
    };
  }

  private fail(error: HealingError): never {
    this.enter('FAILED', { code: error.code });
    this.log.error('Resolution failed', { code: error.code, error });
    throw error;
  }
}
