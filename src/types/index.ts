/**
 * Domain types shared by the ranking engine and its collaborators.
 */

export const CATEGORIES = ['business', 'technical', 'creative', 'analytical', 'general'] as const;

export type Category = (typeof CATEGORIES)[number];

export const INTERACTION_KINDS = ['view', 'use', 'remix', 'skip', 'share'] as const;

export type InteractionKind = (typeof INTERACTION_KINDS)[number];

export function isInteractionKind(value: string): value is InteractionKind {
  return (INTERACTION_KINDS as readonly string[]).includes(value);
}

/** Read-only snapshot of a prompt as the item store reports it. */
export interface CandidateItem {
  id: string;
  creatorId: string;
  template: string;
  effectivenessScore: number;
  usageCount: number;
  remixCount: number;
  uniqueUsers: number;
  trendingMomentum: number;
  createdAt: string;
  /** Set when the store has already categorized the template. */
  category?: Category;
}

export interface InteractionEvent {
  userId: string;
  itemId: string;
  kind: InteractionKind;
  timestamp: number;
  metadata: Readonly<Record<string, unknown>>;
  /** Category of the item at record time; null when the store did not know the item. */
  category: Category | null;
}

export interface TimePatterns {
  /** Event counts per UTC hour of day (24 buckets). */
  hourHistogram: number[];
  peakHour: number | null;
}

export interface UserProfile {
  userId: string;
  categoryAffinities: Record<Category, number>;
  /** Impressions served per category, used for novelty. */
  categoryExposures: Record<Category, number>;
  interactionCounts: Record<InteractionKind, number>;
  skillLevel: number;
  explorationAppetite: number;
  timePatterns: TimePatterns;
  isColdStart: boolean;
}

/** External content store. Implementations may throw; the engine reports that as upstream unavailable. */
export interface ItemStore {
  fetchCandidates(userId: string, limit: number): Promise<CandidateItem[]>;
  /** Trust in [0, 1], or null for a creator the store knows nothing about. */
  getCreatorTrust(creatorId: string): Promise<number | null>;
  getItem(itemId: string): Promise<CandidateItem | null>;
}

/** Pre-vetted, non-personalized pool used for exploration slots. */
export interface ExplorationSource {
  sampleHighQuality(count: number): Promise<CandidateItem[]>;
}

export interface Categorizer {
  categorize(template: string): Category;
}

export function emptyCategoryRecord(): Record<Category, number> {
  return { business: 0, technical: 0, creative: 0, analytical: 0, general: 0 };
}
