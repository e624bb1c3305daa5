/**
 * Ranking configuration — every tunable of the feed engine in one validated
 * structure. Scoring weights must sum to 1.
 */

import { z } from 'zod';
import type { Env } from './env.js';
import { ConfigError } from '../utils/errors.js';

const WEIGHT_SUM_TOLERANCE = 1e-6;

const unit = z.number().min(0).max(1);

export const scoringWeightsSchema = z
  .object({
    effectiveness: unit,
    novelty: unit,
    viralPotential: unit,
    userAffinity: unit,
    recency: unit,
    creatorTrust: unit,
  })
  .refine(
    (w) =>
      Math.abs(
        w.effectiveness + w.novelty + w.viralPotential + w.userAffinity + w.recency + w.creatorTrust - 1,
      ) <= WEIGHT_SUM_TOLERANCE,
    { message: 'Scoring weights must sum to 1.0' },
  );

export type ScoringWeights = z.infer<typeof scoringWeightsSchema>;

export const rankingConfigSchema = z.object({
  weights: scoringWeightsSchema,

  // Scorer
  explorationAppetiteThreshold: unit,
  explorationBoost: z.number().positive(),
  neutralCreatorTrust: unit,
  recencyScaleHours: z.number().positive(),
  freshnessWindowHours: z.number().positive(),

  // Profile builder
  affinityRetention: unit,
  affinityWeights: z.object({ use: z.number(), remix: z.number(), skip: z.number() }),
  coldStartEventThreshold: z.number().int().min(0),
  coldStartExplorationAppetite: unit,

  // Trend tracker
  trendEventWeights: z.object({
    view: z.number(),
    use: z.number(),
    remix: z.number(),
    share: z.number(),
    skip: z.number(),
  }),
  trendDecayFactor: z.number().gt(0).max(1),
  trendDecayUnitMs: z.number().positive(),
  trendEvictionEpsilon: z.number().positive(),
  viralRemixThreshold: z.number().min(0),
  viralAmplification: z.number().min(1),

  // Diversity filter
  maxPerCreator: z.number().int().positive(),
  maxPerCategory: z.number().int().positive(),

  // Exploration injector
  explorationRate: unit,
  minExplorationSlots: z.number().int().min(0),
  explorationPolicy: z.enum(['overwrite', 'append-only']),

  // Orchestrator
  candidateMultiplier: z.number().int().positive(),
});

export type RankingConfig = z.infer<typeof rankingConfigSchema>;

export type ExplorationPolicy = RankingConfig['explorationPolicy'];

export const DEFAULT_RANKING_CONFIG: RankingConfig = {
  weights: {
    effectiveness: 0.3,
    novelty: 0.2,
    viralPotential: 0.2,
    userAffinity: 0.15,
    recency: 0.1,
    creatorTrust: 0.05,
  },
  explorationAppetiteThreshold: 0.7,
  explorationBoost: 1.2,
  neutralCreatorTrust: 0.5,
  recencyScaleHours: 168,
  freshnessWindowHours: 24,

  affinityRetention: 0.9,
  affinityWeights: { use: 1.0, remix: 2.0, skip: -0.5 },
  coldStartEventThreshold: 5,
  coldStartExplorationAppetite: 0.8,

  trendEventWeights: { view: 0.1, use: 0.5, remix: 2.0, share: 1.5, skip: -0.3 },
  trendDecayFactor: 0.99,
  trendDecayUnitMs: 60_000,
  trendEvictionEpsilon: 0.01,
  viralRemixThreshold: 0.1,
  viralAmplification: 2.0,

  maxPerCreator: 2,
  maxPerCategory: 5,

  explorationRate: 0.1,
  minExplorationSlots: 2,
  explorationPolicy: 'overwrite',

  candidateMultiplier: 5,
};

export type RankingConfigOverrides = Partial<
  Omit<RankingConfig, 'weights' | 'affinityWeights' | 'trendEventWeights'>
> & {
  weights?: Partial<ScoringWeights>;
  affinityWeights?: Partial<RankingConfig['affinityWeights']>;
  trendEventWeights?: Partial<RankingConfig['trendEventWeights']>;
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigError when any value is out of range or the weights do not sum to 1.
 */
export function createRankingConfig(overrides: RankingConfigOverrides = {}): RankingConfig {
  const merged = {
    ...DEFAULT_RANKING_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_RANKING_CONFIG.weights, ...overrides.weights },
    affinityWeights: { ...DEFAULT_RANKING_CONFIG.affinityWeights, ...overrides.affinityWeights },
    trendEventWeights: { ...DEFAULT_RANKING_CONFIG.trendEventWeights, ...overrides.trendEventWeights },
  };

  const result = rankingConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ranking config: ${issues}`);
  }
  return result.data;
}

export function rankingOverridesFromEnv(source: Env): RankingConfigOverrides {
  const overrides: RankingConfigOverrides = {};
  if (source.FEED_VIRAL_REMIX_THRESHOLD !== undefined) {
    overrides.viralRemixThreshold = source.FEED_VIRAL_REMIX_THRESHOLD;
  }
  if (source.FEED_MAX_PER_CREATOR !== undefined) overrides.maxPerCreator = source.FEED_MAX_PER_CREATOR;
  if (source.FEED_MAX_PER_CATEGORY !== undefined) overrides.maxPerCategory = source.FEED_MAX_PER_CATEGORY;
  if (source.FEED_EXPLORATION_RATE !== undefined) overrides.explorationRate = source.FEED_EXPLORATION_RATE;
  if (source.FEED_EXPLORATION_POLICY !== undefined) {
    overrides.explorationPolicy = source.FEED_EXPLORATION_POLICY;
  }
  if (source.TREND_DECAY_UNIT_MS !== undefined) overrides.trendDecayUnitMs = source.TREND_DECAY_UNIT_MS;
  return overrides;
}
