import Fastify, { type FastifyServerOptions } from 'fastify';
import { config } from './config';
import type { LastVisitStorageBackend } from './contracts/storage';
import { registerLastVisitRoutes } from './routes/lastVisit';
import { redisLastVisitStorageBackend } from './storage/redisLastVisitStorage';

export interface BuildAppOptions {
  storage?: LastVisitStorageBackend;
  logger?: FastifyServerOptions['logger'];
  apiKeyHeader?: string;
  maxBatchSize?: number;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const storage = options.storage ?? redisLastVisitStorageBackend;
  const app = Fastify({ logger: options.logger ?? false });

  app.get('/health', async () => {
    try {
      await storage.ping();
      return { status: 'ok', redis: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Storage health check failed');
      return { status: 'degraded', redis: 'error' };
    }
  });

  await registerLastVisitRoutes(app, {
    storage,
    apiKeyHeader: options.apiKeyHeader ?? config.auth.apiKeyHeader,
    maxBatchSize: options.maxBatchSize ?? config.lastVisit.maxBatchSize,
  });
  return app;
}
