/**
 * Candidate sources — fetch raw prompts for ranking.
 */

import type { Source } from './interfaces.js';
import type { FeedQuery, FeedCandidate } from './types.js';
import { toFeedCandidate } from './types.js';
import type { ItemStore } from '../types/index.js';

/**
 * ItemStoreSource — personalized candidates from the item store.
 *
 * Over-fetches (limit × multiplier) so the diversity filter still has enough
 * material after dropping repeated creators and categories. Critical: without
 * it there is no feed, so a store failure surfaces as upstream unavailable.
 */
export class ItemStoreSource implements Source<FeedQuery, FeedCandidate> {
  name = 'ItemStoreSource';
  critical = true;
  private store: ItemStore;
  private multiplier: number;

  constructor(store: ItemStore, multiplier = 5) {
    this.store = store;
    this.multiplier = multiplier;
  }

  enable(): boolean {
    return true;
  }

  async getCandidates(query: FeedQuery): Promise<FeedCandidate[]> {
    const items = await this.store.fetchCandidates(query.userId, query.limit * this.multiplier);
    return items.map((item) => toFeedCandidate(item, 'personalized'));
  }
}
