/**
 * Pipeline side effects — operations after candidate selection that don't
 * block the response.
 */

import type { SideEffect } from './interfaces.js';
import type { FeedQuery, FeedCandidate } from './types.js';
import type { EngagementStateStore } from '../state/state-store.js';
import type { Category } from '../types/index.js';
import { cacheService } from '../services/cache.service.js';
import { logger } from '../utils/logger.js';

/**
 * ImpressionSideEffect — counts served items per category for the user.
 * These counts drive the novelty signal on the next request.
 */
export class ImpressionSideEffect implements SideEffect<FeedQuery, FeedCandidate> {
  name = 'ImpressionSideEffect';
  private store: EngagementStateStore;

  constructor(store: EngagementStateStore) {
    this.store = store;
  }

  enable(): boolean {
    return true;
  }

  async run(query: FeedQuery, selectedCandidates: FeedCandidate[]): Promise<void> {
    const categories: Category[] = selectedCandidates.map((c) => c.category ?? 'general');
    this.store.recordImpressions(query.userId, categories);
  }
}

/**
 * CacheFeedSideEffect — caches the served feed for the user.
 */
export class CacheFeedSideEffect implements SideEffect<FeedQuery, FeedCandidate> {
  name = 'CacheFeedSideEffect';

  enable(): boolean {
    return true;
  }

  async run(query: FeedQuery, selectedCandidates: FeedCandidate[]): Promise<void> {
    try {
      await cacheService.setFeed(query.userId, {
        userId: query.userId,
        generatedAt: query.now,
        items: selectedCandidates.map((c) => ({
          id: c.item.id,
          creatorId: c.item.creatorId,
          category: c.category,
          source: c.source,
          finalScore: c.finalScore,
        })),
      });
    } catch (error) {
      logger.warn({ error, sideEffect: this.name }, 'Feed cache side effect failed');
    }
  }
}

/**
 * MetricsLogSideEffect — logs feed composition for observability.
 */
export class MetricsLogSideEffect implements SideEffect<FeedQuery, FeedCandidate> {
  name = 'MetricsLogSideEffect';

  enable(): boolean {
    return true;
  }

  async run(query: FeedQuery, selectedCandidates: FeedCandidate[]): Promise<void> {
    const sourceBreakdown: Record<string, number> = {};
    const categoryBreakdown: Record<string, number> = {};
    for (const c of selectedCandidates) {
      sourceBreakdown[c.source] = (sourceBreakdown[c.source] || 0) + 1;
      const category = c.category ?? 'general';
      categoryBreakdown[category] = (categoryBreakdown[category] || 0) + 1;
    }

    const ranked = selectedCandidates.filter((c) => c.source === 'personalized');

    logger.info(
      {
        requestId: query.requestId,
        userId: query.userId,
        totalSelected: selectedCandidates.length,
        sourceBreakdown,
        categoryBreakdown,
        coldStart: query.profile?.isColdStart ?? true,
        avgScore:
          ranked.length > 0 ? ranked.reduce((sum, c) => sum + c.finalScore, 0) / ranked.length : 0,
      },
      'Pipeline: feed metrics',
    );
  }
}
