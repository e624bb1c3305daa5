/**
 * Core types for the candidate pipeline framework, specialised for the
 * prompt feed: queries carry the derived user profile, candidates carry the
 * item snapshot plus everything hydrators and scorers attach to it.
 */

import type { CandidateItem, Category, UserProfile } from '../types/index.js';

/**
 * Pipeline stages in execution order:
 * QueryHydration -> Source -> Hydration -> Filter -> Score -> Select -> PostFilter -> Mix
 */
export enum PipelineStage {
  QueryHydrator = 'QueryHydrator',
  Source = 'Source',
  Hydrator = 'Hydrator',
  Filter = 'Filter',
  Scorer = 'Scorer',
  Selector = 'Selector',
  PostSelectionFilter = 'PostSelectionFilter',
  Mixer = 'Mixer',
  SideEffect = 'SideEffect',
}

/**
 * The six signals combined into a candidate's utility score.
 * Each is normalised to roughly [0, 1] before weighting.
 */
export const SCORE_SIGNALS = [
  'effectiveness',
  'novelty',
  'viralPotential',
  'userAffinity',
  'recency',
  'creatorTrust',
] as const;

export type ScoreSignal = (typeof SCORE_SIGNALS)[number];

export type ScoreBreakdown = Record<ScoreSignal, number>;

/** Query context passed through the pipeline — hydrated with the user profile. */
export interface FeedQuery {
  requestId: string;
  userId: string;
  limit: number;
  /** Epoch ms every time-dependent stage evaluates against. */
  now: number;

  // Hydrated fields (populated by QueryHydrators)
  profile: UserProfile | null;
}

/** A candidate prompt flowing through the pipeline. */
export interface FeedCandidate {
  item: CandidateItem;

  // Hydrated fields
  category: Category | null;
  creatorTrust: number | null;
  trendingMomentum: number;

  // Pipeline-assigned fields
  source: 'personalized' | 'exploration';
  scoreBreakdown: ScoreBreakdown | null;
  finalScore: number;
}

/** Result of a filter stage: kept and removed candidate sets. */
export interface FilterResult<C> {
  kept: C[];
  removed: C[];
}

/** Output returned by the pipeline after all stages execute. */
export interface PipelineResult<Q, C> {
  query: Q;
  retrievedCandidates: C[];
  filteredCandidates: C[];
  selectedCandidates: C[];
  pipelineMetrics: PipelineMetrics;
}

/** Timing and count metrics for observability. */
export interface PipelineMetrics {
  totalMs: number;
  stageMetrics: Record<string, { durationMs: number; candidateCount: number }>;
}

export function toFeedCandidate(item: CandidateItem, source: FeedCandidate['source']): FeedCandidate {
  return {
    item,
    category: item.category ?? null,
    creatorTrust: null,
    trendingMomentum: Math.max(0, item.trendingMomentum),
    source,
    scoreBreakdown: null,
    finalScore: 0,
  };
}
