import type { Bug, BugId, BugRef, Timestamp, User, UserId, VisitRecord } from '../types';

/**
 * Writes staged for one user inside one atomic scope.
 * Nothing staged is visible to readers until `commit` resolves.
 */
export interface VisitBatch {
  put(bugId: BugId, lastVisitTs: Timestamp): void;
  commit(): Promise<void>;
  /** Drops every staged write. Safe to call more than once. */
  rollback(): void;
}

/** Persistence and authorization lookups the last-visit routes rely on. */
export interface LastVisitStorageBackend {
  ping(): Promise<void>;
  /** Current time of the storage clock, in whole seconds. */
  now(): Promise<Timestamp>;
  findUserByApiKey(apiKey: string): Promise<User | null>;
  /** Resolves a numeric id or an alias; null when no such bug exists. */
  getBug(ref: BugRef): Promise<Bug | null>;
  /** One bulk lookup; ids that do not exist map to false. */
  visibleBugs(bugIds: BugId[], userId: UserId): Promise<Map<BugId, boolean>>;
  beginVisitBatch(userId: UserId): VisitBatch;
  /** Records for the given ids, or the user's whole history when omitted. */
  lastVisited(userId: UserId, bugIds?: BugId[]): Promise<VisitRecord[]>;
}
