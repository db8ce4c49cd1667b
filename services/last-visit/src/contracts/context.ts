import type { FastifyBaseLogger } from 'fastify';
import type { User } from '../types';
import type { LastVisitStorageBackend } from './storage';
import { VisibilityCache } from '../lastVisit/visibilityCache';

export type ContextLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn'>;

/**
 * Everything one request needs, threaded explicitly through the core.
 * Built per request; never shared between requests.
 */
export interface RequestContext {
  user: User;
  storage: LastVisitStorageBackend;
  visibility: VisibilityCache;
  log: ContextLogger;
}

export function createRequestContext(
  user: User,
  storage: LastVisitStorageBackend,
  log: ContextLogger,
): RequestContext {
  return {
    user,
    storage,
    visibility: new VisibilityCache(storage, user),
    log,
  };
}
