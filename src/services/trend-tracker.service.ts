/**
 * Trend tracker — decayed, event-weighted momentum per item plus viral
 * threshold detection.
 *
 * There are no timers: decay is applied lazily whenever an entry is read or
 * written, from the elapsed time since its last update. Callers that need
 * read-modify-write atomicity run these methods under the store's item lock.
 */

import type { RankingConfig } from '../config/ranking.js';
import type { EngagementStateStore } from '../state/state-store.js';
import type { CandidateItem, InteractionKind } from '../types/index.js';
import { safeRatio } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';

export interface TrendingItem {
  itemId: string;
  momentum: number;
}

export type ViralCheckInput = Pick<CandidateItem, 'id' | 'usageCount' | 'remixCount'>;

export class TrendTracker {
  private store: EngagementStateStore;
  private config: RankingConfig;

  constructor(store: EngagementStateStore, config: RankingConfig) {
    this.store = store;
    this.config = config;
  }

  /** Current momentum after decay; 0 for untracked or evicted items. */
  getMomentum(itemId: string, now: number): number {
    return this.settle(itemId, now);
  }

  /**
   * Add the event's weight to the item's decayed momentum. Negative results
   * clamp to 0 and anything under the eviction epsilon drops the entry.
   * Returns the new momentum.
   */
  recordEvent(itemId: string, kind: InteractionKind, now: number): number {
    const current = this.settle(itemId, now);
    const next = Math.max(0, current + this.config.trendEventWeights[kind]);

    if (next < this.config.trendEvictionEpsilon) {
      this.store.deleteTrend(itemId);
      return 0;
    }

    const previous = this.store.getTrend(itemId);
    this.store.setTrend(itemId, {
      momentum: next,
      updatedAt: Math.max(now, previous?.updatedAt ?? now),
    });
    return next;
  }

  /**
   * Amplify momentum once when the remix-to-usage ratio crosses the viral
   * threshold. Returns true only on the check that performs the amplification;
   * the item re-arms once its ratio falls back to or below the threshold.
   * A crossing with no momentum to amplify leaves the item armed.
   */
  viralCheck(item: ViralCheckInput, now: number): boolean {
    const remixRate = safeRatio(item.remixCount, item.usageCount);
    const flagged = this.store.isViralFlagged(item.id);

    if (remixRate <= this.config.viralRemixThreshold) {
      if (flagged) this.store.setViralFlag(item.id, false);
      return false;
    }

    if (flagged) return false;

    const momentum = this.settle(item.id, now);
    if (momentum <= 0) return false;

    const amplified = momentum * this.config.viralAmplification;
    const entry = this.store.getTrend(item.id);
    this.store.setTrend(item.id, { momentum: amplified, updatedAt: entry?.updatedAt ?? now });
    this.store.setViralFlag(item.id, true);

    logger.info({ itemId: item.id, remixRate, momentum: amplified }, 'TrendTracker: viral threshold crossed');
    return true;
  }

  /** Top items by decayed momentum. Decays and evicts every entry on the way. */
  trending(limit: number, now: number): TrendingItem[] {
    const items: TrendingItem[] = [];
    for (const itemId of this.store.trendItemIds()) {
      const momentum = this.settle(itemId, now);
      if (momentum > 0) items.push({ itemId, momentum });
    }
    items.sort((a, b) => b.momentum - a.momentum || a.itemId.localeCompare(b.itemId));
    return items.slice(0, Math.max(0, limit));
  }

  private settle(itemId: string, now: number): number {
    const entry = this.store.getTrend(itemId);
    if (!entry) return 0;

    const elapsed = now - entry.updatedAt;
    if (elapsed <= 0) return entry.momentum;

    const momentum =
      entry.momentum * Math.pow(this.config.trendDecayFactor, elapsed / this.config.trendDecayUnitMs);

    if (momentum < this.config.trendEvictionEpsilon) {
      this.store.deleteTrend(itemId);
      return 0;
    }

    this.store.setTrend(itemId, { momentum, updatedAt: now });
    return momentum;
  }
}
