import type { FastifyRequest } from 'fastify';
import { config } from '../config';
import type { LastVisitStorageBackend } from '../contracts/storage';
import { AuthenticationRequiredError } from '../errors';
import { ANONYMOUS_USER, type User } from '../types';

/** Maps the request's API key header to a user; anonymous when absent or unknown. */
export async function resolveUser(
  req: FastifyRequest,
  storage: LastVisitStorageBackend,
  headerName: string = config.auth.apiKeyHeader,
): Promise<User> {
  const raw = req.headers[headerName.toLowerCase()];
  const apiKey = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (!apiKey) return ANONYMOUS_USER;

  const user = await storage.findUserByApiKey(apiKey);
  if (!user) {
    req.log.debug('Unknown API key presented');
    return ANONYMOUS_USER;
  }
  return user;
}

export function requireLogin(user: User): void {
  if (!user.authenticated) {
    throw new AuthenticationRequiredError();
  }
}
