/**
 * FeedEngine — the two entry points callers use: getFeed and
 * recordInteraction. Owns the collaborators and the state store and builds
 * a pipeline per request.
 */

import { env } from '../config/env.js';
import { closeRedis } from '../config/redis.js';
import type { RankingConfig, RankingConfigOverrides } from '../config/ranking.js';
import { createRankingConfig, rankingOverridesFromEnv } from '../config/ranking.js';
import { KeywordCategorizer } from '../categorization/keyword-categorizer.js';
import { createFeedPipeline } from '../pipeline/feed-pipeline.js';
import type { RandomSource } from '../pipeline/mixers.js';
import type { FeedCandidate, FeedQuery, PipelineResult } from '../pipeline/types.js';
import { InMemoryStateStore } from '../state/state-store.js';
import type { EngagementStateStore } from '../state/state-store.js';
import type {
  CandidateItem,
  Categorizer,
  Category,
  ExplorationSource,
  ItemStore,
  UserProfile,
} from '../types/index.js';
import { isInteractionKind } from '../types/index.js';
import { AppError, UpstreamUnavailableError } from '../utils/errors.js';
import { generateRequestId } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import { cacheService } from './cache.service.js';
import type { CachedFeed } from './cache.service.js';
import { ProfileBuilder } from './profile-builder.service.js';
import { TrendTracker } from './trend-tracker.service.js';
import type { TrendingItem } from './trend-tracker.service.js';

export interface FeedEngineOptions {
  itemStore: ItemStore;
  explorationSource: ExplorationSource;
  categorizer?: Categorizer;
  stateStore?: EngagementStateStore;
  /** A validated config, or overrides merged onto the defaults. */
  config?: RankingConfig | RankingConfigOverrides;
  /** Epoch ms. */
  clock?: () => number;
  random?: RandomSource;
  /** Cache served feeds and trending snapshots in Redis. Defaults to whether REDIS_URL is set. */
  cache?: boolean;
}

export class FeedEngine {
  readonly config: RankingConfig;
  private itemStore: ItemStore;
  private explorationSource: ExplorationSource;
  private categorizer: Categorizer;
  private stateStore: EngagementStateStore;
  private profileBuilder: ProfileBuilder;
  private trendTracker: TrendTracker;
  private clock: () => number;
  private random: RandomSource | undefined;
  private cache: boolean;

  constructor(options: FeedEngineOptions) {
    this.config = createRankingConfig({ ...rankingOverridesFromEnv(env), ...options.config });
    this.itemStore = options.itemStore;
    this.explorationSource = options.explorationSource;
    this.categorizer = options.categorizer ?? new KeywordCategorizer();
    this.stateStore = options.stateStore ?? new InMemoryStateStore();
    this.profileBuilder = new ProfileBuilder(this.config);
    this.trendTracker = new TrendTracker(this.stateStore, this.config);
    this.clock = options.clock ?? Date.now;
    this.random = options.random;
    this.cache = options.cache ?? Boolean(env.REDIS_URL);
  }

  /**
   * Ranked, diversified feed with exploration slots, at most `count` items.
   * Throws UpstreamUnavailableError when the item store or exploration source fails.
   */
  async getFeed(userId: string, count: number): Promise<CandidateItem[]> {
    const result = await this.runFeedPipeline(userId, count);
    return result.selectedCandidates.map((c) => c.item);
  }

  /** Same as getFeed, with scores, sources and per-stage metrics. */
  async runFeedPipeline(userId: string, count: number): Promise<PipelineResult<FeedQuery, FeedCandidate>> {
    if (!userId) {
      throw new AppError(400, 'INVALID_INPUT', 'userId is required');
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new AppError(400, 'INVALID_INPUT', 'count must be an integer >= 1');
    }

    const now = this.clock();
    const pipeline = createFeedPipeline(count, {
      itemStore: this.itemStore,
      explorationSource: this.explorationSource,
      categorizer: this.categorizer,
      stateStore: this.stateStore,
      profileBuilder: this.profileBuilder,
      trendTracker: this.trendTracker,
      config: this.config,
      random: this.random,
      cacheFeeds: this.cache,
    });

    const query: FeedQuery = {
      requestId: generateRequestId(userId, now),
      userId,
      limit: count,
      now,
      // Populated by UserProfileHydrator
      profile: null,
    };

    return pipeline.execute(query);
  }

  /**
   * Record a user interaction. Unknown kinds are ignored without touching
   * state. The trend update and viral check run under the item's lock; the
   * event-log append runs under the user's lock.
   */
  async recordInteraction(
    userId: string,
    itemId: string,
    kind: string,
    metadata: Record<string, unknown> = {},
  ): Promise<void> {
    if (!isInteractionKind(kind)) {
      logger.debug({ userId, itemId, kind }, 'FeedEngine: ignoring unknown interaction kind');
      return;
    }
    if (!userId || !itemId) {
      throw new AppError(400, 'INVALID_INPUT', 'userId and itemId are required');
    }

    const now = this.clock();

    const category = await this.stateStore.withItemLock(itemId, async (): Promise<Category | null> => {
      const item = await this.lookupItem(itemId);
      this.trendTracker.recordEvent(itemId, kind, now);
      if (!item) return null;
      this.trendTracker.viralCheck(item, now);
      return item.category ?? this.categorizer.categorize(item.template);
    });

    await this.stateStore.withUserLock(userId, () => {
      this.stateStore.appendEvent({ userId, itemId, kind, timestamp: now, metadata, category });
    });

    if (this.cache) {
      await cacheService.invalidateFeed(userId);
    }

    logger.debug({ userId, itemId, kind, category }, 'FeedEngine: interaction recorded');
  }

  /** The profile getFeed would rank with right now. */
  buildProfile(userId: string): UserProfile {
    return this.profileBuilder.buildProfile(
      userId,
      this.stateStore.getEvents(userId),
      this.stateStore.getExposures(userId),
    );
  }

  momentum(itemId: string): number {
    return this.trendTracker.getMomentum(itemId, this.clock());
  }

  /** Items with the highest momentum. With caching on, a snapshot up to 60 s old may be served. */
  async getTrending(limit = 10): Promise<TrendingItem[]> {
    if (this.cache) {
      const cached = await cacheService.getTrending(limit);
      if (cached) return cached;
    }

    const items = this.trendTracker.trending(limit, this.clock());
    if (this.cache) {
      await cacheService.setTrending(limit, items);
    }
    return items;
  }

  /** Summary of the feed last served to the user, until their next interaction. Null without caching. */
  async lastServedFeed(userId: string): Promise<CachedFeed | null> {
    if (!this.cache) return null;
    return cacheService.getFeed(userId);
  }

  /** Release the Redis connection, if one was opened. */
  async close(): Promise<void> {
    await closeRedis();
  }

  private async lookupItem(itemId: string): Promise<CandidateItem | null> {
    try {
      return await this.itemStore.getItem(itemId);
    } catch (error) {
      logger.error({ itemId, error }, 'FeedEngine: item store lookup failed');
      throw new UpstreamUnavailableError('item-store', error);
    }
  }
}
