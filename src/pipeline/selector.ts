/**
 * Candidate selector — sorts by score, optionally picking top-K.
 */

import type { Selector } from './interfaces.js';
import type { FeedQuery, FeedCandidate } from './types.js';

/**
 * ScoreSelector — sorts candidates by finalScore descending.
 *
 * The sort is stable, so equal scores keep source order. Without a size the
 * full ordering is returned, which is what the diversity filter needs: it
 * has to see candidates past the first `limit` to backfill what it drops.
 */
export class ScoreSelector implements Selector<FeedQuery, FeedCandidate> {
  name = 'ScoreSelector';
  private size: number | null;

  constructor(size?: number) {
    this.size = size ?? null;
  }

  enable(): boolean {
    return true;
  }

  select(_query: FeedQuery, candidates: FeedCandidate[]): FeedCandidate[] {
    const sorted = [...candidates].sort((a, b) => b.finalScore - a.finalScore);
    return this.size === null ? sorted : sorted.slice(0, this.size);
  }
}
