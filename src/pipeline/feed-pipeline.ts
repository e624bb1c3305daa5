/**
 * Feed Pipeline — assembles the personalized prompt feed from the concrete
 * pipeline components.
 *
 * Query Hydration -> Candidate Sourcing -> Hydration -> Filtering ->
 * Scoring -> Selection -> Diversity -> Exploration -> Side effects
 */

import { CandidatePipeline } from './candidate-pipeline.js';
import type { FeedQuery, FeedCandidate } from './types.js';
import type { RankingConfig } from '../config/ranking.js';
import type { EngagementStateStore } from '../state/state-store.js';
import type { ProfileBuilder } from '../services/profile-builder.service.js';
import type { TrendTracker } from '../services/trend-tracker.service.js';
import type { Categorizer, ExplorationSource, ItemStore } from '../types/index.js';

import { ItemStoreSource } from './sources.js';
import {
  UserProfileHydrator,
  CategoryHydrator,
  CreatorTrustHydrator,
  TrendMomentumHydrator,
} from './hydrators.js';
import { DeduplicateFilter, DiversityFilter } from './filters.js';
import { UtilityScorer, ExplorationAppetiteScorer } from './scorers.js';
import { ScoreSelector } from './selector.js';
import { ExplorationMixer } from './mixers.js';
import type { RandomSource } from './mixers.js';
import { ImpressionSideEffect, CacheFeedSideEffect, MetricsLogSideEffect } from './side-effects.js';

export interface FeedPipelineDeps {
  itemStore: ItemStore;
  explorationSource: ExplorationSource;
  categorizer: Categorizer;
  stateStore: EngagementStateStore;
  profileBuilder: ProfileBuilder;
  trendTracker: TrendTracker;
  config: RankingConfig;
  random?: RandomSource;
  /** Store served feeds in Redis. */
  cacheFeeds?: boolean;
}

/**
 * Create the personalized feed pipeline.
 *
 * 1. **Query Hydration**: user profile from the event log and impressions
 * 2. **Candidate Sourcing**: item store, over-fetched by the candidate multiplier
 * 3. **Candidate Hydration**: category, creator trust, live trend momentum
 * 4. **Filters**: drop duplicate item IDs
 * 5. **Scoring**: six-signal utility, then the exploration-appetite boost
 * 6. **Selection**: stable sort by score, no truncation
 * 7. **Post-Selection Filters**: per-creator and per-category caps up to the limit
 * 8. **Mixers**: exploration slots from the high-quality pool
 * 9. **Side Effects**: impressions, feed cache, metrics log
 */
export function createFeedPipeline(
  resultSize: number,
  deps: FeedPipelineDeps,
): CandidatePipeline<FeedQuery, FeedCandidate> {
  const { config } = deps;

  return new CandidatePipeline<FeedQuery, FeedCandidate>({
    name: 'PromptFeedPipeline',
    resultSize,

    queryHydrators: [new UserProfileHydrator(deps.stateStore, deps.profileBuilder)],

    sources: [new ItemStoreSource(deps.itemStore, config.candidateMultiplier)],

    hydrators: [
      new CategoryHydrator(deps.categorizer),
      new CreatorTrustHydrator(deps.itemStore),
      new TrendMomentumHydrator(deps.trendTracker),
    ],

    filters: [new DeduplicateFilter()],

    scorers: [new UtilityScorer(config), new ExplorationAppetiteScorer(config)],

    selector: new ScoreSelector(),

    postSelectionFilters: [new DiversityFilter(config.maxPerCreator, config.maxPerCategory)],

    mixers: [new ExplorationMixer(deps.explorationSource, deps.categorizer, config, deps.random)],

    sideEffects: [
      new ImpressionSideEffect(deps.stateStore),
      ...(deps.cacheFeeds ? [new CacheFeedSideEffect()] : []),
      new MetricsLogSideEffect(),
    ],
  });
}
