/**
 * Pipeline module — candidate pipeline framework and the prompt feed built on it.
 */

// Core pipeline framework
export { CandidatePipeline } from './candidate-pipeline.js';
export type { CandidatePipelineConfig } from './candidate-pipeline.js';

// Interfaces
export type {
  QueryHydrator,
  Source,
  Hydrator,
  Filter,
  Scorer,
  Selector,
  Mixer,
  SideEffect,
} from './interfaces.js';

// Types
export { PipelineStage, SCORE_SIGNALS, toFeedCandidate } from './types.js';
export type {
  ScoreSignal,
  ScoreBreakdown,
  FeedQuery,
  FeedCandidate,
  FilterResult,
  PipelineResult,
  PipelineMetrics,
} from './types.js';

// Concrete implementations
export { ItemStoreSource } from './sources.js';
export {
  UserProfileHydrator,
  CategoryHydrator,
  CreatorTrustHydrator,
  TrendMomentumHydrator,
} from './hydrators.js';
export { DeduplicateFilter, DiversityFilter } from './filters.js';
export {
  UtilityScorer,
  ExplorationAppetiteScorer,
  scoreCandidate,
  computeSignals,
  viralPotential,
} from './scorers.js';
export { ScoreSelector } from './selector.js';
export { ExplorationMixer, explorationSlotCount, injectExploration } from './mixers.js';
export type { RandomSource } from './mixers.js';
export { ImpressionSideEffect, CacheFeedSideEffect, MetricsLogSideEffect } from './side-effects.js';

// Feed pipeline assembler
export { createFeedPipeline } from './feed-pipeline.js';
export type { FeedPipelineDeps } from './feed-pipeline.js';
