/**
 * In-process item store and exploration pool. Backs local runs and tests;
 * production deployments plug their own ItemStore / ExplorationSource in.
 */

import type { CandidateItem, ExplorationSource, ItemStore } from '../types/index.js';
import type { RandomSource } from '../pipeline/mixers.js';

export interface InMemoryCatalogOptions {
  items?: CandidateItem[];
  creatorTrust?: Record<string, number>;
  /** Minimum effectiveness for the exploration pool. */
  explorationQualityFloor?: number;
  random?: RandomSource;
}

export class InMemoryCatalog implements ItemStore, ExplorationSource {
  private items = new Map<string, CandidateItem>();
  private trust = new Map<string, number>();
  private qualityFloor: number;
  private random: RandomSource;

  constructor(options: InMemoryCatalogOptions = {}) {
    for (const item of options.items ?? []) this.items.set(item.id, item);
    for (const [creatorId, trust] of Object.entries(options.creatorTrust ?? {})) {
      this.trust.set(creatorId, trust);
    }
    this.qualityFloor = options.explorationQualityFloor ?? 0.7;
    this.random = options.random ?? Math.random;
  }

  upsert(item: CandidateItem): void {
    this.items.set(item.id, item);
  }

  setCreatorTrust(creatorId: string, trust: number): void {
    this.trust.set(creatorId, trust);
  }

  /** Most effective first, newest breaking ties. */
  async fetchCandidates(_userId: string, limit: number): Promise<CandidateItem[]> {
    return [...this.items.values()]
      .sort(
        (a, b) =>
          b.effectivenessScore - a.effectivenessScore ||
          new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime(),
      )
      .slice(0, limit);
  }

  async getCreatorTrust(creatorId: string): Promise<number | null> {
    return this.trust.get(creatorId) ?? null;
  }

  async getItem(itemId: string): Promise<CandidateItem | null> {
    return this.items.get(itemId) ?? null;
  }

  /** Random sample (Fisher-Yates) of items at or above the quality floor. */
  async sampleHighQuality(count: number): Promise<CandidateItem[]> {
    const pool = [...this.items.values()].filter((i) => i.effectivenessScore >= this.qualityFloor);
    for (let i = pool.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, Math.max(0, count));
  }
}
