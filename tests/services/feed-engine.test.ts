import { describe, it, expect, vi } from 'vitest';
import { FeedEngine } from '../../src/services/feed-engine.service.js';
import type { FeedEngineOptions } from '../../src/services/feed-engine.service.js';
import { InMemoryCatalog } from '../../src/catalog/in-memory-catalog.js';
import { weightedSum } from '../../src/pipeline/scorers.js';
import { UpstreamUnavailableError } from '../../src/utils/errors.js';
import type { CandidateItem, Category, ExplorationSource, ItemStore } from '../../src/types/index.js';
import { HOUR, NOW, createMockItem } from '../pipeline/fixtures.js';

const TEMPLATES: Record<Category, string> = {
  business: 'Draft a marketing plan',
  technical: 'Debug the request handler',
  creative: 'Write a poem about autumn',
  analytical: 'Analyze weekly churn',
  general: 'Summarize the meeting notes',
};
const CATEGORY_ORDER: Category[] = ['business', 'technical', 'creative', 'analytical', 'general'];

function buildCatalogItems(): CandidateItem[] {
  return Array.from({ length: 100 }, (_, i) => {
    const category = CATEGORY_ORDER[i % CATEGORY_ORDER.length];
    return createMockItem({
      id: `item-${i}`,
      creatorId: `creator-${i}`,
      template: `${TEMPLATES[category]} #${i}`,
      effectivenessScore: 0.5 + (i % 10) * 0.05,
      createdAt: new Date(NOW - i * HOUR).toISOString(),
    });
  });
}

const explorationPool = Array.from({ length: 6 }, (_, i) =>
  createMockItem({
    id: `explore-${i + 1}`,
    creatorId: `explorer-${i + 1}`,
    template: 'Write a haiku',
    effectivenessScore: 0.9,
  }),
);

function stubExploration(): ExplorationSource {
  return { sampleHighQuality: (count: number) => Promise.resolve(explorationPool.slice(0, count)) };
}

function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

function createEngine(overrides: Partial<FeedEngineOptions> = {}): FeedEngine {
  return new FeedEngine({
    itemStore: new InMemoryCatalog({ items: buildCatalogItems() }),
    explorationSource: stubExploration(),
    clock: () => NOW,
    random: sequence([0.1, 0.6]),
    cache: false,
    ...overrides,
  });
}

describe('FeedEngine', () => {
  describe('getFeed', () => {
    it('should return at most count items with exploration slots overwritten in place', async () => {
      const engine = createEngine();

      const feed = await engine.getFeed('user-1', 20);

      expect(feed).toHaveLength(20);
      // floor(0.1 * 20) = 2, floor(0.6 * 20) = 12
      expect(feed[2].id).toBe('explore-1');
      expect(feed[12].id).toBe('explore-2');
      expect(new Set(feed.map((i) => i.id)).size).toBe(20);
    });

    it('should respect the per-category cap among ranked items', async () => {
      const engine = createEngine();

      const result = await engine.runFeedPipeline('user-1', 20);
      const ranked = result.selectedCandidates.filter((c) => c.source === 'personalized');

      const perCategory = new Map<string, number>();
      for (const c of ranked) {
        const category = c.category ?? 'general';
        perCategory.set(category, (perCategory.get(category) ?? 0) + 1);
      }
      expect(Math.max(...perCategory.values())).toBeLessThanOrEqual(5);
      expect(ranked).toHaveLength(18);
    });

    it('should append exploration items when diversity leaves the feed short', async () => {
      const engine = createEngine();

      const feed = await engine.getFeed('user-1', 50);

      // 5 categories x 5 per category, then round(50 * 0.1) exploration slots
      expect(feed).toHaveLength(30);
      expect(feed.slice(25).map((i) => i.id)).toEqual([
        'explore-1',
        'explore-2',
        'explore-3',
        'explore-4',
        'explore-5',
      ]);
    });

    it('should keep ranked items in place under the append-only policy', async () => {
      const engine = createEngine({ config: { explorationPolicy: 'append-only' } });

      const result = await engine.runFeedPipeline('user-1', 20);

      expect(result.selectedCandidates).toHaveLength(20);
      expect(result.selectedCandidates.every((c) => c.source === 'personalized')).toBe(true);
    });

    it('should boost every score for a cold-start user', async () => {
      const engine = createEngine();

      const result = await engine.runFeedPipeline('new-user', 20);
      const top = result.selectedCandidates[0];

      expect(result.query.profile?.isColdStart).toBe(true);
      expect(top.source).toBe('personalized');
      expect(top.scoreBreakdown).not.toBeNull();
      if (top.scoreBreakdown) {
        expect(top.finalScore).toBeCloseTo(weightedSum(top.scoreBreakdown, engine.config.weights) * 1.2, 10);
      }
    });

    it('should record impressions for every served item', async () => {
      const engine = createEngine();

      await engine.getFeed('user-1', 20);
      const exposures = engine.buildProfile('user-1').categoryExposures;

      expect(Object.values(exposures).reduce((sum, n) => sum + n, 0)).toBe(20);
    });

    it('should reject invalid arguments', async () => {
      const engine = createEngine();

      await expect(engine.getFeed('user-1', 0)).rejects.toMatchObject({ code: 'INVALID_INPUT', statusCode: 400 });
      await expect(engine.getFeed('user-1', 2.5)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
      await expect(engine.getFeed('', 10)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('should report an item store failure as upstream unavailable', async () => {
      const failing: ItemStore = {
        fetchCandidates: () => Promise.reject(new Error('connection refused')),
        getCreatorTrust: () => Promise.resolve(null),
        getItem: () => Promise.resolve(null),
      };
      const engine = createEngine({ itemStore: failing });

      const error = await engine.getFeed('user-1', 20).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error).toMatchObject({ upstream: 'ItemStoreSource' });
    });

    it('should report an exploration source failure as upstream unavailable', async () => {
      const engine = createEngine({
        explorationSource: { sampleHighQuality: () => Promise.reject(new Error('timeout')) },
      });

      await expect(engine.getFeed('user-1', 20)).rejects.toMatchObject({
        code: 'UPSTREAM_UNAVAILABLE',
        upstream: 'ExplorationMixer',
      });
    });

    it('should fall back to neutral trust when the trust lookup fails', async () => {
      const catalog = new InMemoryCatalog({ items: buildCatalogItems() });
      const store: ItemStore = {
        fetchCandidates: (userId, limit) => catalog.fetchCandidates(userId, limit),
        getCreatorTrust: () => Promise.reject(new Error('trust service down')),
        getItem: (itemId) => catalog.getItem(itemId),
      };
      const engine = createEngine({ itemStore: store });

      const result = await engine.runFeedPipeline('user-1', 20);

      expect(result.selectedCandidates).toHaveLength(20);
      expect(result.selectedCandidates[0].scoreBreakdown?.creatorTrust).toBe(0.5);
    });
  });

  describe('recordInteraction', () => {
    it('should amplify a viral item exactly once', async () => {
      const catalog = new InMemoryCatalog({
        items: [
          createMockItem({ id: 'viral', usageCount: 100, remixCount: 15 }),
          createMockItem({ id: 'steady', usageCount: 100, remixCount: 5 }),
        ],
      });
      const engine = createEngine({ itemStore: catalog });

      for (let i = 0; i < 3; i++) {
        await engine.recordInteraction('user-1', 'viral', 'use');
        await engine.recordInteraction('user-1', 'steady', 'use');
      }

      // viral: 0.5 -> amplified 1.0 -> 1.5 -> 2.0
      expect(engine.momentum('viral')).toBe(2);
      expect(engine.momentum('steady')).toBe(1.5);
    });

    it('should amplify a viral item whose first interaction is a skip', async () => {
      const catalog = new InMemoryCatalog({
        items: [createMockItem({ id: 'viral', usageCount: 100, remixCount: 15 })],
      });
      const engine = createEngine({ itemStore: catalog });

      await engine.recordInteraction('user-1', 'viral', 'skip');
      await engine.recordInteraction('user-1', 'viral', 'remix');

      // skip clamps to 0, then remix 2.0 -> amplified 4.0
      expect(engine.momentum('viral')).toBe(4);
    });

    it('should ignore unknown interaction kinds', async () => {
      const engine = createEngine();

      await engine.recordInteraction('user-1', 'item-0', 'like');

      expect(engine.momentum('item-0')).toBe(0);
      expect(engine.buildProfile('user-1').interactionCounts).toEqual({
        view: 0,
        use: 0,
        remix: 0,
        skip: 0,
        share: 0,
      });
    });

    it('should update affinity for the item category', async () => {
      const engine = createEngine();

      // item-1 is technical
      await engine.recordInteraction('user-1', 'item-1', 'use', { surface: 'home' });

      const profile = engine.buildProfile('user-1');
      expect(profile.categoryAffinities.technical).toBeCloseTo(0.1, 10);
      expect(profile.interactionCounts.use).toBe(1);
    });

    it('should leave a warm profile after enough categorized events', async () => {
      const engine = createEngine();

      for (const itemId of ['item-1', 'item-6', 'item-11', 'item-16', 'item-21']) {
        await engine.recordInteraction('user-1', itemId, 'use');
      }

      const profile = engine.buildProfile('user-1');
      expect(profile.isColdStart).toBe(false);
      expect(profile.explorationAppetite).toBe(0.2);
    });

    it('should track momentum for items the store does not know', async () => {
      const engine = createEngine();

      await engine.recordInteraction('user-1', 'ghost', 'remix');

      expect(engine.momentum('ghost')).toBe(2);
      expect(engine.buildProfile('user-1').categoryAffinities.general).toBe(0);
    });

    it('should stay consistent under concurrent interactions on one item', async () => {
      const engine = createEngine();

      await Promise.all(
        Array.from({ length: 50 }, (_, i) => engine.recordInteraction(`user-${i % 5}`, 'item-0', 'use')),
      );

      expect(engine.momentum('item-0')).toBe(25);
      const total = [0, 1, 2, 3, 4]
        .map((u) => engine.buildProfile(`user-${u}`).interactionCounts.use)
        .reduce((sum, n) => sum + n, 0);
      expect(total).toBe(50);
    });

    it('should not mutate state when the item lookup fails', async () => {
      const getItem = vi.fn(() => Promise.reject(new Error('db down')));
      const engine = createEngine({
        itemStore: {
          fetchCandidates: () => Promise.resolve([]),
          getCreatorTrust: () => Promise.resolve(null),
          getItem,
        },
      });

      const error = await engine.recordInteraction('user-1', 'item-0', 'use').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error).toMatchObject({ upstream: 'item-store' });
      expect(engine.momentum('item-0')).toBe(0);
      expect(engine.buildProfile('user-1').interactionCounts.use).toBe(0);
    });
  });

  describe('getTrending', () => {
    it('should list items by live momentum', async () => {
      const engine = createEngine();

      await engine.recordInteraction('user-1', 'item-3', 'share');
      await engine.recordInteraction('user-1', 'item-4', 'remix');
      await engine.recordInteraction('user-1', 'item-5', 'view');

      expect(await engine.getTrending(2)).toEqual([
        { itemId: 'item-4', momentum: 2 },
        { itemId: 'item-3', momentum: 1.5 },
      ]);
    });
  });
});
