/**
 * Candidate scorers.
 *
 *   1. UtilityScorer: six weighted signals -> utility score
 *   2. ExplorationAppetiteScorer: boost for users with a high exploration appetite
 *
 * The signal maths lives in plain functions so a score can be computed (and
 * tested) without running a pipeline. Everything is a function of the
 * candidate, the profile, the config and the query's `now`.
 */

import type { Scorer } from './interfaces.js';
import type { FeedQuery, FeedCandidate, ScoreBreakdown, ScoreSignal } from './types.js';
import { SCORE_SIGNALS } from './types.js';
import type { RankingConfig } from '../config/ranking.js';
import type { UserProfile } from '../types/index.js';
import { ageHours, clamp, safeRatio } from '../utils/helpers.js';

/**
 * Likelihood of spread: remix signal, retention, momentum and a freshness
 * bonus. Ratios are 0 when the item has no usage yet.
 */
export function viralPotential(candidate: FeedCandidate, now: number, config: RankingConfig): number {
  const { usageCount, remixCount, uniqueUsers, createdAt } = candidate.item;
  const remixRate = safeRatio(remixCount, usageCount);
  const retention = safeRatio(uniqueUsers, usageCount);
  const momentum = Math.max(0, candidate.trendingMomentum);
  const freshness = ageHours(createdAt, now) < config.freshnessWindowHours ? 1.0 : 0.8;

  return (
    0.4 * Math.min(remixRate * 10, 1) +
    0.3 * Math.min(retention, 1) +
    0.2 * (momentum / (1 + momentum)) +
    0.1 * freshness
  );
}

export function computeSignals(
  candidate: FeedCandidate,
  profile: UserProfile | null,
  now: number,
  config: RankingConfig,
): ScoreBreakdown {
  const category = candidate.category ?? 'general';
  const seenSimilar = profile?.categoryExposures[category] ?? 0;
  const affinity = profile?.categoryAffinities[category] ?? 0;

  return {
    effectiveness: candidate.item.effectivenessScore,
    novelty: 1 / (1 + seenSimilar),
    viralPotential: viralPotential(candidate, now, config),
    userAffinity: clamp(affinity, 0, 1),
    recency: Math.exp(-ageHours(candidate.item.createdAt, now) / config.recencyScaleHours),
    creatorTrust: candidate.creatorTrust ?? config.neutralCreatorTrust,
  };
}

export function weightedSum(breakdown: ScoreBreakdown, weights: Record<ScoreSignal, number>): number {
  let total = 0;
  for (const signal of SCORE_SIGNALS) {
    total += weights[signal] * breakdown[signal];
  }
  return total;
}

export function appetiteMultiplier(profile: UserProfile | null, config: RankingConfig): number {
  if (profile && profile.explorationAppetite > config.explorationAppetiteThreshold) {
    return config.explorationBoost;
  }
  return 1;
}

/** Final utility of one candidate for one profile. */
export function scoreCandidate(
  candidate: FeedCandidate,
  profile: UserProfile | null,
  now: number,
  config: RankingConfig,
): number {
  const utility = weightedSum(computeSignals(candidate, profile, now, config), config.weights);
  return utility * appetiteMultiplier(profile, config);
}

/**
 * UtilityScorer — computes every signal and their weighted combination.
 * The breakdown is kept on the candidate for debugging and metrics.
 */
export class UtilityScorer implements Scorer<FeedQuery, FeedCandidate> {
  name = 'UtilityScorer';
  private config: RankingConfig;

  constructor(config: RankingConfig) {
    this.config = config;
  }

  enable(): boolean {
    return true;
  }

  async score(query: FeedQuery, candidates: FeedCandidate[]): Promise<FeedCandidate[]> {
    return candidates.map((c) => {
      const scoreBreakdown = computeSignals(c, query.profile, query.now, this.config);
      return { ...c, scoreBreakdown, finalScore: weightedSum(scoreBreakdown, this.config.weights) };
    });
  }
}

/**
 * ExplorationAppetiteScorer — uniform boost for users who like to explore.
 * Only enabled when the profile's appetite is above the threshold.
 */
export class ExplorationAppetiteScorer implements Scorer<FeedQuery, FeedCandidate> {
  name = 'ExplorationAppetiteScorer';
  private config: RankingConfig;

  constructor(config: RankingConfig) {
    this.config = config;
  }

  enable(query: FeedQuery): boolean {
    return appetiteMultiplier(query.profile, this.config) !== 1;
  }

  async score(query: FeedQuery, candidates: FeedCandidate[]): Promise<FeedCandidate[]> {
    const multiplier = appetiteMultiplier(query.profile, this.config);
    return candidates.map((c) => ({ ...c, finalScore: c.finalScore * multiplier }));
  }
}
