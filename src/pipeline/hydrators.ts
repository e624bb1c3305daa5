/**
 * Hydrators — enrich the query with the user profile and candidates with
 * category, creator trust and live trend momentum.
 */

import type { Hydrator, QueryHydrator } from './interfaces.js';
import type { FeedQuery, FeedCandidate } from './types.js';
import type { Categorizer, ItemStore } from '../types/index.js';
import type { EngagementStateStore } from '../state/state-store.js';
import type { ProfileBuilder } from '../services/profile-builder.service.js';
import type { TrendTracker } from '../services/trend-tracker.service.js';
import { clamp } from '../utils/helpers.js';

/**
 * UserProfileHydrator — rebuilds the profile from the event log and
 * impression counts. New users get the cold-start profile.
 */
export class UserProfileHydrator implements QueryHydrator<FeedQuery> {
  name = 'UserProfileHydrator';
  private store: EngagementStateStore;
  private builder: ProfileBuilder;

  constructor(store: EngagementStateStore, builder: ProfileBuilder) {
    this.store = store;
    this.builder = builder;
  }

  enable(): boolean {
    return true;
  }

  async hydrate(query: FeedQuery): Promise<Partial<FeedQuery>> {
    const profile = this.builder.buildProfile(
      query.userId,
      this.store.getEvents(query.userId),
      this.store.getExposures(query.userId),
    );
    return { profile };
  }
}

/**
 * CategoryHydrator — labels candidates the store did not categorize.
 */
export class CategoryHydrator implements Hydrator<FeedQuery, FeedCandidate> {
  name = 'CategoryHydrator';
  private categorizer: Categorizer;

  constructor(categorizer: Categorizer) {
    this.categorizer = categorizer;
  }

  enable(): boolean {
    return true;
  }

  async hydrate(_query: FeedQuery, candidates: FeedCandidate[]): Promise<FeedCandidate[]> {
    return candidates.map((c) =>
      c.category ? c : { ...c, category: this.categorizer.categorize(c.item.template) },
    );
  }
}

/**
 * CreatorTrustHydrator — one trust lookup per distinct creator.
 * Not critical: if the lookup fails the pipeline keeps the candidates
 * unhydrated and scoring falls back to neutral trust.
 */
export class CreatorTrustHydrator implements Hydrator<FeedQuery, FeedCandidate> {
  name = 'CreatorTrustHydrator';
  private store: ItemStore;

  constructor(store: ItemStore) {
    this.store = store;
  }

  enable(): boolean {
    return true;
  }

  async hydrate(_query: FeedQuery, candidates: FeedCandidate[]): Promise<FeedCandidate[]> {
    const creatorIds = [...new Set(candidates.map((c) => c.item.creatorId))];
    const trusts = await Promise.all(creatorIds.map((id) => this.store.getCreatorTrust(id)));
    const trustMap = new Map(creatorIds.map((id, i) => [id, trusts[i]]));

    return candidates.map((c) => {
      const trust = trustMap.get(c.item.creatorId);
      return trust === null || trust === undefined ? c : { ...c, creatorTrust: clamp(trust, 0, 1) };
    });
  }
}

/**
 * TrendMomentumHydrator — replaces the store's momentum snapshot with the
 * tracker's live value for items the tracker is following.
 */
export class TrendMomentumHydrator implements Hydrator<FeedQuery, FeedCandidate> {
  name = 'TrendMomentumHydrator';
  private tracker: TrendTracker;

  constructor(tracker: TrendTracker) {
    this.tracker = tracker;
  }

  enable(): boolean {
    return true;
  }

  async hydrate(query: FeedQuery, candidates: FeedCandidate[]): Promise<FeedCandidate[]> {
    return candidates.map((c) => {
      const live = this.tracker.getMomentum(c.item.id, query.now);
      return live > 0 ? { ...c, trendingMomentum: live } : c;
    });
  }
}
