import type { ChainableCommander } from 'ioredis';
import type { LastVisitStorageBackend, VisitBatch } from '../contracts/storage';
import { canSeeBug } from '../lastVisit/involvement';
import { getRedis } from '../redis/client';
import { keys } from '../redis/keys';
import { isNumericRef, type Bug, type BugId, type BugRef, type Timestamp, type User, type UserId, type VisitRecord } from '../types';

type PipelineResult = Array<[error: Error | null, result: unknown]> | null;

/**
 * Stages HSETs on a MULTI that is only sent on commit.
 * Rolling back simply drops the queue: the server never sees the batch.
 */
class RedisVisitBatch implements VisitBatch {
  private readonly multi: ChainableCommander;
  private staged = 0;
  private closed = false;

  constructor(private readonly userId: UserId) {
    this.multi = getRedis().multi();
  }

  put(bugId: BugId, lastVisitTs: Timestamp) {
    if (this.closed) throw new Error('visit batch already closed');
    this.multi.hset(keys.lastVisit(this.userId), String(bugId), String(lastVisitTs));
    this.staged += 1;
  }

  async commit() {
    if (this.closed) throw new Error('visit batch already closed');
    this.closed = true;
    if (this.staged === 0) return;
    const res: PipelineResult = await this.multi.exec();
    if (!res) throw new Error('visit batch transaction was aborted');
    for (const [err] of res) {
      if (err) throw err;
    }
  }

  rollback() {
    this.closed = true;
  }
}

/** Implements `LastVisitStorageBackend` on top of ioredis. */
export class RedisLastVisitStorageBackend implements LastVisitStorageBackend {
  async ping() {
    await getRedis().ping();
  }

  async now(): Promise<Timestamp> {
    // TIME replies [seconds, microseconds]
    const [seconds] = await getRedis().time();
    return Number(seconds);
  }

  async findUserByApiKey(apiKey: string): Promise<User | null> {
    const redis = getRedis();
    const rawId = await redis.get(keys.apiKey(apiKey));
    const userId = toPositiveInt(rawId);
    if (userId === null) return null;

    const hash = await redis.hgetall(keys.user(userId));
    if (!hash || Object.keys(hash).length === 0) return null;
    return { id: userId, login: hash.login ?? '', authenticated: true };
  }

  async getBug(ref: BugRef): Promise<Bug | null> {
    const redis = getRedis();
    const bugId = isNumericRef(ref) ? ref : toPositiveInt(await redis.get(keys.bugAlias(String(ref))));
    if (bugId === null) return null;

    const [hash, cc] = await Promise.all([
      redis.hgetall(keys.bug(bugId)),
      redis.smembers(keys.bugCc(bugId)),
    ]);
    return toBug(bugId, hash, cc);
  }

  async visibleBugs(bugIds: BugId[], userId: UserId): Promise<Map<BugId, boolean>> {
    const visible = new Map<BugId, boolean>();
    if (bugIds.length === 0) return visible;

    const pipeline = getRedis().pipeline();
    for (const bugId of bugIds) {
      pipeline.hgetall(keys.bug(bugId));
      pipeline.smembers(keys.bugCc(bugId));
    }
    const res: PipelineResult = await pipeline.exec();
    if (!res) throw new Error('visibility lookup returned no replies');

    const user: User = { id: userId, login: '', authenticated: userId > 0 };
    bugIds.forEach((bugId, idx) => {
      const bug = toBug(bugId, asHash(replyOf(res, idx * 2)), asMembers(replyOf(res, idx * 2 + 1)));
      visible.set(bugId, bug !== null && canSeeBug(bug, user));
    });
    return visible;
  }

  beginVisitBatch(userId: UserId): VisitBatch {
    return new RedisVisitBatch(userId);
  }

  async lastVisited(userId: UserId, bugIds?: BugId[]): Promise<VisitRecord[]> {
    const redis = getRedis();
    const key = keys.lastVisit(userId);

    if (bugIds) {
      if (bugIds.length === 0) return [];
      const values = await redis.hmget(key, ...bugIds.map(String));
      const records: VisitRecord[] = [];
      bugIds.forEach((bugId, idx) => {
        const ts = values[idx];
        if (ts != null) records.push({ userId, bugId, lastVisitTs: Number(ts) });
      });
      return records;
    }

    const hash = await redis.hgetall(key);
    return Object.entries(hash).map(([field, ts]) => ({
      userId,
      bugId: Number(field),
      lastVisitTs: Number(ts),
    }));
  }
}

/** Empty hash means the bug does not exist. */
function toBug(bugId: BugId, hash: Record<string, string> | null, cc: string[]): Bug | null {
  if (!hash || Object.keys(hash).length === 0) return null;
  return {
    id: bugId,
    alias: hash.alias || undefined,
    reporter: Number(hash.reporter),
    assignedTo: toPositiveInt(hash.assigned_to) ?? undefined,
    qaContact: toPositiveInt(hash.qa_contact) ?? undefined,
    cc: cc.map(Number).filter(Number.isInteger),
    isPrivate: hash.is_private === '1',
  };
}

function asHash(value: unknown): Record<string, string> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const hash: Record<string, string> = {};
  for (const [field, v] of Object.entries(value)) {
    if (typeof v === 'string') hash[field] = v;
  }
  return hash;
}

function asMembers(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((m): m is string => typeof m === 'string') : [];
}

function replyOf(res: NonNullable<PipelineResult>, idx: number): unknown {
  const entry = res[idx];
  if (!entry) throw new Error(`missing pipeline reply #${idx}`);
  const [err, value] = entry;
  if (err) throw err;
  return value;
}

function toPositiveInt(value: string | null | undefined): number | null {
  if (value == null || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return n > 0 ? n : null;
}

export const redisLastVisitStorageBackend = new RedisLastVisitStorageBackend();
