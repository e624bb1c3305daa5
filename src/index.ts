export { FeedEngine } from './services/feed-engine.service.js';
export type { FeedEngineOptions } from './services/feed-engine.service.js';
export { ProfileBuilder } from './services/profile-builder.service.js';
export { TrendTracker } from './services/trend-tracker.service.js';
export type { TrendingItem, ViralCheckInput } from './services/trend-tracker.service.js';
export { cacheService } from './services/cache.service.js';
export { InMemoryStateStore } from './state/state-store.js';
export type { EngagementStateStore, TrendEntry } from './state/state-store.js';
export { InMemoryCatalog } from './catalog/in-memory-catalog.js';
export type { InMemoryCatalogOptions } from './catalog/in-memory-catalog.js';
export { KeywordCategorizer, DEFAULT_KEYWORD_RULES } from './categorization/keyword-categorizer.js';
export {
  DEFAULT_RANKING_CONFIG,
  createRankingConfig,
  rankingConfigSchema,
} from './config/ranking.js';
export type { RankingConfig, RankingConfigOverrides, ScoringWeights, ExplorationPolicy } from './config/ranking.js';
export { AppError, UpstreamUnavailableError, ConfigError } from './utils/errors.js';
export { KeyedLock } from './utils/keyed-lock.js';
export * from './pipeline/index.js';
export * from './types/index.js';
