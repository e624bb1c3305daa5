/**
 * Pipeline component interfaces.
 *
 * Every component has a name (for logs and metrics) and an enable() gate
 * evaluated against the query. Components marked `critical` abort the
 * pipeline on failure; all others are logged and skipped.
 */

import type { FilterResult } from './types.js';

/**
 * QueryHydrator enriches the query with user context data.
 * Hydrators run in parallel; their partial results are merged.
 */
export interface QueryHydrator<Q> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q): Promise<Partial<Q>>;
}

/**
 * Source fetches raw candidates from a data store.
 * Multiple sources run in parallel and their results are merged in source order.
 */
export interface Source<Q, C> {
  name: string;
  critical?: boolean;
  enable(query: Q): boolean;
  getCandidates(query: Q): Promise<C[]>;
}

/**
 * Hydrator enriches candidates with additional data after sourcing.
 * Must return the same number of candidates in the same order.
 */
export interface Hydrator<Q, C> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q, candidates: C[]): Promise<C[]>;
}

/**
 * Filter partitions candidates into kept and removed sets.
 * Filters run sequentially — each sees the output of the previous.
 */
export interface Filter<Q, C> {
  name: string;
  enable(query: Q): boolean;
  filter(query: Q, candidates: C[]): Promise<FilterResult<C>>;
}

/**
 * Scorer assigns scores to candidates. Runs sequentially so scorers
 * can depend on earlier scorers' results (the appetite boost multiplies
 * the utility score).
 *
 * IMPORTANT: Must return the same candidates in the same order.
 * Dropping candidates in a scorer is not allowed — use a Filter instead.
 */
export interface Scorer<Q, C> {
  name: string;
  enable(query: Q): boolean;
  score(query: Q, candidates: C[]): Promise<C[]>;
}

/** Selector orders scored candidates, optionally truncating. */
export interface Selector<Q, C> {
  name: string;
  enable(query: Q): boolean;
  select(query: Q, candidates: C[]): C[];
}

/**
 * Mixer blends candidates from outside the ranked set into the final list
 * (exploration content). Runs after post-selection filters.
 */
export interface Mixer<Q, C> {
  name: string;
  critical?: boolean;
  enable(query: Q): boolean;
  mix(query: Q, candidates: C[]): Promise<C[]>;
}

/**
 * SideEffect runs after selection (impressions, caching, logging).
 * Fire-and-forget — does not block the response.
 */
export interface SideEffect<Q, C> {
  name: string;
  enable(query: Q): boolean;
  run(query: Q, selectedCandidates: C[]): Promise<void>;
}
