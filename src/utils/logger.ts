import { pino } from 'pino';
import { env } from '../config/env.js';

const defaultLevel = env.NODE_ENV === 'test' ? 'silent' : env.NODE_ENV === 'production' ? 'info' : 'debug';

export const logger = pino({
  name: 'prompt-feed',
  level: env.LOG_LEVEL ?? defaultLevel,
});
