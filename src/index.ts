/**
 * Self-Healing Locators
 *
 * Resolves XPath locators against a live page and heals them when the markup
 * has drifted: a golden description of each element is captured the first
 * time its locator works, and later failures are repaired by scoring every
 * same-tag candidate against it, first heuristically, then with a classifier
 * trained on the heuristic's own past picks.
 *
 * Usage:
 * ```typescript
 * import { chromium } from 'playwright';
 * import { createSelfHealingAgent, PlaywrightDriver } from 'self-healing-locators';
 *
 * const page = await (await chromium.launch()).newPage();
 * const agent = await createSelfHealingAgent(new PlaywrightDriver(page));
 * await agent.click("//*[@id='submit-btn']");
 * ```
 */

// Agent
export {
  SelfHealingAgent,
  createSelfHealingAgent,
  type SelfHealingAgentOptions,
  type AgentState,
} from './core/healing-agent.js';

// Resolver
export {
  SelfHealingResolver,
  DEFAULT_RESOLVER_OPTIONS,
  type ResolverOptions,
  type ResolverSession,
  type ResolveRequest,
  type ResolutionResult,
} from './core/self-healing-resolver.js';

// Golden references
export { captureSnapshot, isContainerTag, CONTAINER_TAGS, type CaptureOptions } from './core/attribute-snapshot.js';
export {
  deriveGoldenIdentifier,
  deriveIdentifier,
  sanitizeLocator,
  toPageKey,
  type DerivedIdentifier,
  type IdentifierSource,
} from './core/golden-identifier.js';
export { GoldenReferenceStore, type CaptureResult } from './core/golden-store.js';

// Scoring and learning
export {
  HEURISTIC_WEIGHTS,
  MAX_HEURISTIC_SCORE,
  similarity,
  matchFlags,
  tagsMatch,
  argMax,
  type MatchFlags,
  type MatchSignal,
} from './core/heuristic-scorer.js';
export { FEATURE_NAMES, extractFeatures, scoreCandidate, type ScoredFeatures } from './core/feature-extractor.js';
export { TrainingCorpus, TrainingCorpusStore, labelRound } from './core/training-corpus.js';
export {
  LearnedRanker,
  BatchRetrainPolicy,
  type ClassifierModel,
  type ClassifierTrainer,
  type RetrainPolicy,
  type RankResult,
} from './core/learned-ranker.js';
export { LogisticRegressionTrainer, LOGISTIC_MODEL_FORMAT, type LogisticTrainerOptions } from './core/logistic-trainer.js';

// Synthesis
export { synthesize, synthesizeAll, xpathLiteral, type SynthesizedLocator } from './core/selector-synthesizer.js';

// Drivers
export { PlaywrightDriver, PlaywrightElement } from './drivers/playwright-driver.js';
export type { DriverElement, PageDriver } from './types/driver.js';

// Types and errors
export * from './types/healing.js';
export * from './types/errors.js';

// Persistence, configuration, logging
export {
  JsonFileStore,
  MemoryStore,
  StateValidationError,
  createJsonFileStore,
  type StateStore,
  type JsonFileStoreConfig,
  type JsonFileStoreStats,
} from './utils/persistent-store.js';
export {
  getMergedHealingConfig,
  getMergedLogConfig,
  applyLogConfig,
  getConfigFile,
  getConfigFilePath,
  clearConfigFileCache,
} from './utils/config-loader.js';
export {
  healingConfigSchema,
  ConfigValidationError,
  type HealingConfig,
  type LogConfig,
  type CorpusPersistence,
} from './utils/config-schemas.js';
export { configureLogger, logger, Logger, type LoggerConfig, type LogContext } from './utils/logger.js';
