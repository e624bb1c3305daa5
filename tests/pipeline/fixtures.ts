import type { FeedCandidate, FeedQuery } from '../../src/pipeline/types.js';
import type { CandidateItem, InteractionEvent, UserProfile } from '../../src/types/index.js';
import { emptyCategoryRecord } from '../../src/types/index.js';

export const HOUR = 60 * 60 * 1000;
export const NOW = Date.parse('2026-01-15T12:00:00.000Z');

export function createMockItem(overrides: Partial<CandidateItem> = {}): CandidateItem {
  return {
    id: 'item-1',
    creatorId: 'creator-1',
    template: 'Summarize the following notes',
    effectivenessScore: 0.5,
    usageCount: 0,
    remixCount: 0,
    uniqueUsers: 0,
    trendingMomentum: 0,
    createdAt: new Date(NOW - 2 * HOUR).toISOString(),
    ...overrides,
  };
}

export function createMockCandidate(
  overrides: Partial<FeedCandidate> = {},
  item: Partial<CandidateItem> = {},
): FeedCandidate {
  return {
    item: createMockItem(item),
    category: 'general',
    creatorTrust: null,
    trendingMomentum: 0,
    source: 'personalized',
    scoreBreakdown: null,
    finalScore: 0,
    ...overrides,
  };
}

export function createMockProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId: 'user-1',
    categoryAffinities: emptyCategoryRecord(),
    categoryExposures: emptyCategoryRecord(),
    interactionCounts: { view: 0, use: 0, remix: 0, skip: 0, share: 0 },
    skillLevel: 0,
    explorationAppetite: 0.5,
    timePatterns: { hourHistogram: new Array<number>(24).fill(0), peakHour: null },
    isColdStart: false,
    ...overrides,
  };
}

export function createMockQuery(overrides: Partial<FeedQuery> = {}): FeedQuery {
  return {
    requestId: 'req-1',
    userId: 'user-1',
    limit: 20,
    now: NOW,
    profile: createMockProfile(),
    ...overrides,
  };
}

export function createMockEvent(overrides: Partial<InteractionEvent> = {}): InteractionEvent {
  return {
    userId: 'user-1',
    itemId: 'item-1',
    kind: 'use',
    timestamp: NOW,
    metadata: {},
    category: 'technical',
    ...overrides,
  };
}
