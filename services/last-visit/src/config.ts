import 'dotenv/config';

const DEFAULT_MAX_BATCH_SIZE = 500;

/** Positive integer from the environment, or the fallback when unset or malformed. */
export function positiveIntFromEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !/^\s*\d+\s*$/.test(raw)) return fallback;
  const n = parseInt(raw, 10);
  return n > 0 ? n : fallback;
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  // every key this service touches lives under this prefix
  keyPrefix: process.env.REDIS_KEY_PREFIX || 'bz:',
  auth: {
    // Fastify lower-cases incoming header names
    apiKeyHeader: (process.env.API_KEY_HEADER || 'x-bugzilla-api-key').toLowerCase(),
  },
  lastVisit: {
    maxBatchSize: positiveIntFromEnv(process.env.MAX_BATCH_SIZE, DEFAULT_MAX_BATCH_SIZE),
  },
};
