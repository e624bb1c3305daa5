/**
 * Builds a UserProfile from a user's interaction log. Profiles are derived on
 * every feed request and never stored.
 */

import type { RankingConfig } from '../config/ranking.js';
import type {
  Category,
  InteractionEvent,
  InteractionKind,
  TimePatterns,
  UserProfile,
} from '../types/index.js';
import { CATEGORIES, emptyCategoryRecord } from '../types/index.js';

const SKILL_VOLUME_SCALE = 20;

export class ProfileBuilder {
  private config: RankingConfig;

  constructor(config: RankingConfig) {
    this.config = config;
  }

  buildProfile(
    userId: string,
    events: readonly InteractionEvent[],
    exposures: Record<Category, number> = emptyCategoryRecord(),
  ): UserProfile {
    const chronological = [...events].sort((a, b) => a.timestamp - b.timestamp);
    const interactionCounts = countByKind(chronological);
    const categorized = chronological.filter((e) => e.category !== null);
    const isColdStart = categorized.length < this.config.coldStartEventThreshold;

    return {
      userId,
      categoryAffinities: this.computeAffinities(chronological),
      categoryExposures: { ...exposures },
      interactionCounts,
      skillLevel: estimateSkillLevel(interactionCounts),
      explorationAppetite: isColdStart
        ? this.config.coldStartExplorationAppetite
        : distinctCategories(categorized) / CATEGORIES.length,
      timePatterns: analyzeTimePatterns(chronological),
      isColdStart,
    };
  }

  /**
   * Exponential moving average per category. Only use, remix and skip move
   * affinity; views and shares count towards the other traits only.
   */
  private computeAffinities(events: readonly InteractionEvent[]): Record<Category, number> {
    const affinities = emptyCategoryRecord();
    const retention = this.config.affinityRetention;

    for (const event of events) {
      if (event.category === null) continue;
      const weight = this.affinityWeight(event.kind);
      if (weight === null) continue;
      affinities[event.category] = affinities[event.category] * retention + weight * (1 - retention);
    }

    return affinities;
  }

  private affinityWeight(kind: InteractionKind): number | null {
    switch (kind) {
      case 'use':
        return this.config.affinityWeights.use;
      case 'remix':
        return this.config.affinityWeights.remix;
      case 'skip':
        return this.config.affinityWeights.skip;
      default:
        return null;
    }
  }
}

function countByKind(events: readonly InteractionEvent[]): Record<InteractionKind, number> {
  const counts: Record<InteractionKind, number> = { view: 0, use: 0, remix: 0, skip: 0, share: 0 };
  for (const event of events) {
    counts[event.kind] += 1;
  }
  return counts;
}

// Saturates towards 1 with usage volume; remixes count double.
function estimateSkillLevel(counts: Record<InteractionKind, number>): number {
  const volume = counts.use + 2 * counts.remix;
  return 1 - Math.exp(-volume / SKILL_VOLUME_SCALE);
}

function distinctCategories(events: readonly InteractionEvent[]): number {
  return new Set(events.map((e) => e.category)).size;
}

function analyzeTimePatterns(events: readonly InteractionEvent[]): TimePatterns {
  const hourHistogram = new Array<number>(24).fill(0);
  for (const event of events) {
    hourHistogram[new Date(event.timestamp).getUTCHours()] += 1;
  }

  let peakHour: number | null = null;
  for (let hour = 0; hour < 24; hour++) {
    if (hourHistogram[hour] > 0 && (peakHour === null || hourHistogram[hour] > hourHistogram[peakHour])) {
      peakHour = hour;
    }
  }

  return { hourHistogram, peakHour };
}
