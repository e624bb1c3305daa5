/**
 * Candidate filters — partition candidates into kept and removed sets.
 *
 *   - DeduplicateFilter (pre-scoring)
 *   - DiversityFilter (post-selection)
 */

import type { Filter } from './interfaces.js';
import type { FeedQuery, FeedCandidate, FilterResult } from './types.js';

/**
 * Remove duplicate item IDs, keeping the first occurrence.
 */
export class DeduplicateFilter implements Filter<FeedQuery, FeedCandidate> {
  name = 'DeduplicateFilter';

  enable(): boolean {
    return true;
  }

  async filter(_query: FeedQuery, candidates: FeedCandidate[]): Promise<FilterResult<FeedCandidate>> {
    const seen = new Set<string>();
    const kept: FeedCandidate[] = [];
    const removed: FeedCandidate[] = [];

    for (const c of candidates) {
      if (seen.has(c.item.id)) {
        removed.push(c);
      } else {
        seen.add(c.item.id);
        kept.push(c);
      }
    }

    return { kept, removed };
  }
}

/**
 * Post-selection filter: cap repetition per creator and per category.
 *
 * Greedy single pass over the score-ordered list. A candidate whose creator
 * or category is already at its cap is dropped (not deferred). Stops once
 * `query.limit` candidates are accepted; everything after that is removed too.
 */
export class DiversityFilter implements Filter<FeedQuery, FeedCandidate> {
  name = 'DiversityFilter';
  private maxPerCreator: number;
  private maxPerCategory: number;

  constructor(maxPerCreator = 2, maxPerCategory = 5) {
    this.maxPerCreator = maxPerCreator;
    this.maxPerCategory = maxPerCategory;
  }

  enable(): boolean {
    return true;
  }

  async filter(query: FeedQuery, candidates: FeedCandidate[]): Promise<FilterResult<FeedCandidate>> {
    const creatorCount = new Map<string, number>();
    const categoryCount = new Map<string, number>();
    const kept: FeedCandidate[] = [];
    const removed: FeedCandidate[] = [];

    for (const c of candidates) {
      if (kept.length >= query.limit) {
        removed.push(c);
        continue;
      }

      const category = c.category ?? 'general';
      const creators = creatorCount.get(c.item.creatorId) || 0;
      const categories = categoryCount.get(category) || 0;

      if (creators >= this.maxPerCreator || categories >= this.maxPerCategory) {
        removed.push(c);
      } else {
        creatorCount.set(c.item.creatorId, creators + 1);
        categoryCount.set(category, categories + 1);
        kept.push(c);
      }
    }

    return { kept, removed };
  }
}
