import type { LastVisitStorageBackend, VisitBatch } from '../../src/contracts/storage';
import { canSeeBug } from '../../src/lastVisit/involvement';
import type { Bug, BugId, BugRef, Timestamp, User, UserId, VisitRecord } from '../../src/types';

/** In-process stand-in for the Redis backend. */
export class MemoryLastVisitStorage implements LastVisitStorageBackend {
  readonly users = new Map<UserId, User>();
  readonly apiKeys = new Map<string, UserId>();
  readonly bugs = new Map<BugId, Bug>();
  readonly visits = new Map<UserId, Map<BugId, Timestamp>>();

  clock: Timestamp = 1_700_000_000;
  nowCalls = 0;
  visibleBugsCalls: BugId[][] = [];
  commits = 0;
  rollbacks = 0;
  failCommit = false;
  healthy = true;

  addUser(id: UserId, login: string, apiKey?: string): User {
    const user: User = { id, login, authenticated: true };
    this.users.set(id, user);
    if (apiKey) this.apiKeys.set(apiKey, id);
    return user;
  }

  addBug(bug: Partial<Bug> & Pick<Bug, 'id' | 'reporter'>): Bug {
    const full: Bug = { cc: [], isPrivate: false, ...bug };
    this.bugs.set(full.id, full);
    return full;
  }

  async ping() {
    if (!this.healthy) throw new Error('storage unavailable');
  }

  async now() {
    this.nowCalls += 1;
    return this.clock;
  }

  async findUserByApiKey(apiKey: string) {
    const id = this.apiKeys.get(apiKey);
    return id === undefined ? null : this.users.get(id) ?? null;
  }

  async getBug(ref: BugRef) {
    if (typeof ref === 'number') return this.bugs.get(ref) ?? null;
    for (const bug of this.bugs.values()) {
      if (bug.alias === ref) return bug;
    }
    return null;
  }

  async visibleBugs(bugIds: BugId[], userId: UserId) {
    this.visibleBugsCalls.push([...bugIds]);
    const user = this.users.get(userId) ?? { id: userId, login: '', authenticated: false };
    const visible = new Map<BugId, boolean>();
    for (const id of bugIds) {
      const bug = this.bugs.get(id);
      visible.set(id, bug ? canSeeBug(bug, user) : false);
    }
    return visible;
  }

  beginVisitBatch(userId: UserId): VisitBatch {
    const staged = new Map<BugId, Timestamp>();
    let closed = false;
    return {
      put: (bugId, ts) => {
        if (closed) throw new Error('visit batch already closed');
        staged.set(bugId, ts);
      },
      commit: async () => {
        closed = true;
        if (this.failCommit) throw new Error('commit failed');
        const visits = this.visits.get(userId) ?? new Map<BugId, Timestamp>();
        for (const [bugId, ts] of staged) visits.set(bugId, ts);
        this.visits.set(userId, visits);
        this.commits += 1;
      },
      rollback: () => {
        if (!closed) this.rollbacks += 1;
        closed = true;
        staged.clear();
      },
    };
  }

  async lastVisited(userId: UserId, bugIds?: BugId[]): Promise<VisitRecord[]> {
    const visits = this.visits.get(userId) ?? new Map<BugId, Timestamp>();
    const ids = bugIds ?? [...visits.keys()];
    const records: VisitRecord[] = [];
    for (const bugId of ids) {
      const ts = visits.get(bugId);
      if (ts !== undefined) records.push({ userId, bugId, lastVisitTs: ts });
    }
    return records;
  }
}
