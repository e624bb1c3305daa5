import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  REDIS_URL: z.string().url().optional(),
  FEED_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),

  // Ranking overrides; unset values keep DEFAULT_RANKING_CONFIG
  FEED_VIRAL_REMIX_THRESHOLD: z.coerce.number().min(0).optional(),
  FEED_MAX_PER_CREATOR: z.coerce.number().int().positive().optional(),
  FEED_MAX_PER_CATEGORY: z.coerce.number().int().positive().optional(),
  FEED_EXPLORATION_RATE: z.coerce.number().min(0).max(1).optional(),
  FEED_EXPLORATION_POLICY: z.enum(['overwrite', 'append-only']).optional(),
  TREND_DECAY_UNIT_MS: z.coerce.number().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return result.data;
}

export const env = parseEnv(process.env);
