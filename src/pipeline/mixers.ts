/**
 * Mixers — blend non-personalized exploration content into the ranked feed.
 */

import type { Mixer } from './interfaces.js';
import type { FeedQuery, FeedCandidate } from './types.js';
import { toFeedCandidate } from './types.js';
import type { ExplorationPolicy, RankingConfig } from '../config/ranking.js';
import type { Categorizer, ExplorationSource } from '../types/index.js';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export function explorationSlotCount(
  targetCount: number,
  config: Pick<RankingConfig, 'explorationRate' | 'minExplorationSlots'>,
): number {
  return Math.max(config.minExplorationSlots, Math.round(targetCount * config.explorationRate));
}

/**
 * Place exploration candidates into the feed.
 *
 * Below target they are appended. At target, the 'overwrite' policy replaces
 * a uniformly random position in [0, targetCount) per candidate: a ranked item
 * can be evicted by the draw, trading precision for serendipity. The
 * 'append-only' policy never evicts and only fills free slots. Candidates
 * already present in the feed are skipped. Output holds at most
 * `targetCount` items.
 */
export function injectExploration(
  feed: FeedCandidate[],
  targetCount: number,
  exploration: FeedCandidate[],
  policy: ExplorationPolicy,
  random: RandomSource,
): FeedCandidate[] {
  const result = [...feed];

  for (const candidate of exploration) {
    if (result.some((c) => c.item.id === candidate.item.id)) continue;

    if (result.length < targetCount) {
      result.push(candidate);
    } else if (policy === 'overwrite') {
      const index = Math.min(targetCount - 1, Math.floor(random() * targetCount));
      result[index] = candidate;
    }
  }

  return result.slice(0, targetCount);
}

/**
 * ExplorationMixer — pulls `explorationSlotCount(limit)` items from the
 * exploration source and injects them. Critical: a failing source aborts
 * the feed as upstream unavailable.
 */
export class ExplorationMixer implements Mixer<FeedQuery, FeedCandidate> {
  name = 'ExplorationMixer';
  critical = true;
  private source: ExplorationSource;
  private categorizer: Categorizer;
  private config: RankingConfig;
  private random: RandomSource;

  constructor(
    source: ExplorationSource,
    categorizer: Categorizer,
    config: RankingConfig,
    random: RandomSource = Math.random,
  ) {
    this.source = source;
    this.categorizer = categorizer;
    this.config = config;
    this.random = random;
  }

  enable(query: FeedQuery): boolean {
    return explorationSlotCount(query.limit, this.config) > 0;
  }

  async mix(query: FeedQuery, candidates: FeedCandidate[]): Promise<FeedCandidate[]> {
    const slots = explorationSlotCount(query.limit, this.config);
    const sampled = await this.source.sampleHighQuality(slots);

    const exploration = sampled.slice(0, slots).map((item) => {
      const candidate = toFeedCandidate(item, 'exploration');
      return { ...candidate, category: candidate.category ?? this.categorizer.categorize(item.template) };
    });

    return injectExploration(candidates, query.limit, exploration, this.config.explorationPolicy, this.random);
  }
}
