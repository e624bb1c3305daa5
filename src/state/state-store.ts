/**
 * Engagement state: per-user event logs and impressions, plus the global
 * trend map. Injected into the engine instead of living as module globals.
 *
 * Reads are lock-free. Writers serialize through withUserLock / withItemLock,
 * so contention is scoped to the user or item being touched.
 */

import type { Category, InteractionEvent } from '../types/index.js';
import { emptyCategoryRecord } from '../types/index.js';
import { KeyedLock } from '../utils/keyed-lock.js';

export interface TrendEntry {
  momentum: number;
  /** Epoch ms of the last decay/update. */
  updatedAt: number;
}

export interface EngagementStateStore {
  withUserLock<T>(userId: string, fn: () => Promise<T> | T): Promise<T>;
  withItemLock<T>(itemId: string, fn: () => Promise<T> | T): Promise<T>;

  appendEvent(event: InteractionEvent): void;
  getEvents(userId: string): readonly InteractionEvent[];

  recordImpressions(userId: string, categories: Category[]): void;
  getExposures(userId: string): Record<Category, number>;

  getTrend(itemId: string): TrendEntry | undefined;
  setTrend(itemId: string, entry: TrendEntry): void;
  deleteTrend(itemId: string): void;
  trendItemIds(): string[];

  isViralFlagged(itemId: string): boolean;
  setViralFlag(itemId: string, flagged: boolean): void;
}

export class InMemoryStateStore implements EngagementStateStore {
  private userLocks = new KeyedLock();
  private itemLocks = new KeyedLock();
  private events = new Map<string, InteractionEvent[]>();
  private exposures = new Map<string, Record<Category, number>>();
  private trends = new Map<string, TrendEntry>();
  private viralFlags = new Set<string>();

  withUserLock<T>(userId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.userLocks.runExclusive(userId, fn);
  }

  withItemLock<T>(itemId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.itemLocks.runExclusive(itemId, fn);
  }

  appendEvent(event: InteractionEvent): void {
    const log = this.events.get(event.userId);
    const frozen = Object.freeze({ ...event, metadata: Object.freeze({ ...event.metadata }) });
    if (log) {
      log.push(frozen);
    } else {
      this.events.set(event.userId, [frozen]);
    }
  }

  getEvents(userId: string): readonly InteractionEvent[] {
    return [...(this.events.get(userId) ?? [])];
  }

  recordImpressions(userId: string, categories: Category[]): void {
    const counts = this.exposures.get(userId) ?? emptyCategoryRecord();
    for (const category of categories) {
      counts[category] += 1;
    }
    this.exposures.set(userId, counts);
  }

  getExposures(userId: string): Record<Category, number> {
    return { ...(this.exposures.get(userId) ?? emptyCategoryRecord()) };
  }

  getTrend(itemId: string): TrendEntry | undefined {
    const entry = this.trends.get(itemId);
    return entry ? { ...entry } : undefined;
  }

  setTrend(itemId: string, entry: TrendEntry): void {
    this.trends.set(itemId, { ...entry });
  }

  deleteTrend(itemId: string): void {
    this.trends.delete(itemId);
  }

  trendItemIds(): string[] {
    return [...this.trends.keys()];
  }

  isViralFlagged(itemId: string): boolean {
    return this.viralFlags.has(itemId);
  }

  setViralFlag(itemId: string, flagged: boolean): void {
    if (flagged) {
      this.viralFlags.add(itemId);
    } else {
      this.viralFlags.delete(itemId);
    }
  }
}
