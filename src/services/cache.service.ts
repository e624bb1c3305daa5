import { z } from 'zod';
import { getRedis } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

const TTL = {
  FEED: env.FEED_CACHE_TTL_SECONDS,
  TRENDING: 60,
};

const REDIS_TIMEOUT = 2000;

export const cachedFeedSchema = z.object({
  userId: z.string(),
  generatedAt: z.number(),
  items: z.array(
    z.object({
      id: z.string(),
      creatorId: z.string(),
      category: z.string().nullable(),
      source: z.enum(['personalized', 'exploration']),
      finalScore: z.number(),
    }),
  ),
});

export type CachedFeed = z.infer<typeof cachedFeedSchema>;

export const cachedTrendingSchema = z.array(z.object({ itemId: z.string(), momentum: z.number() }));

export type CachedTrending = z.infer<typeof cachedTrendingSchema>;

function withTimeout<T>(operation: Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('Redis timeout')), REDIS_TIMEOUT);
  });
  return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
}

async function safeGet(key: string): Promise<string | null> {
  const redis = getRedis();
  if (!redis) return null;
  try {
    return await withTimeout(redis.get(key));
  } catch (err) {
    logger.warn({ key, err }, 'Cache get failed, skipping');
    return null;
  }
}

async function safeSet(key: string, ttl: number, value: string): Promise<void> {
  const redis = getRedis();
  if (!redis) return;
  try {
    await withTimeout(redis.setex(key, ttl, value));
  } catch (err) {
    logger.warn({ key, err }, 'Cache set failed, skipping');
  }
}

async function safeDel(key: string): Promise<void> {
  const redis = getRedis();
  if (!redis) return;
  try {
    await withTimeout(redis.del(key));
  } catch (err) {
    logger.warn({ key, err }, 'Cache del failed, skipping');
  }
}

function parseCached<T>(key: string, raw: string | null, schema: z.ZodType<T>): T | null {
  if (!raw) return null;
  try {
    const result = schema.safeParse(JSON.parse(raw));
    if (result.success) return result.data;
    logger.warn({ key, issues: result.error.issues }, 'Cached value has unexpected shape, ignoring');
  } catch (err) {
    logger.warn({ key, err }, 'Cached value is not valid JSON, ignoring');
  }
  return null;
}

export const cacheService = {
  async getFeed(userId: string): Promise<CachedFeed | null> {
    const key = `feed:${userId}`;
    return parseCached(key, await safeGet(key), cachedFeedSchema);
  },

  async setFeed(userId: string, feed: CachedFeed) {
    await safeSet(`feed:${userId}`, TTL.FEED, JSON.stringify(feed));
  },

  async invalidateFeed(userId: string) {
    await safeDel(`feed:${userId}`);
  },

  async getTrending(limit: number): Promise<CachedTrending | null> {
    const key = `trending:prompts:${limit}`;
    return parseCached(key, await safeGet(key), cachedTrendingSchema);
  },

  async setTrending(limit: number, items: CachedTrending) {
    await safeSet(`trending:prompts:${limit}`, TTL.TRENDING, JSON.stringify(items));
  },
};
