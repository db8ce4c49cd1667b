import type { LastVisitStorageBackend } from '../contracts/storage';
import { isNumericRef, type BugId, type BugRef, type User } from '../types';

/**
 * Request-scoped record of which bugs the acting user may see.
 *
 * `prime` turns a whole batch into one storage round trip; later `canSee`
 * calls for primed ids are answered from memory. Aliases are skipped when
 * priming since the bulk lookup only takes numeric ids.
 */
export class VisibilityCache {
  private readonly decisions = new Map<BugId, boolean>();
  private lookups = 0;

  constructor(
    private readonly storage: LastVisitStorageBackend,
    private readonly user: User,
  ) {}

  async prime(refs: readonly BugRef[]): Promise<void> {
    const pending = new Set<BugId>();
    for (const ref of refs) {
      if (isNumericRef(ref) && !this.decisions.has(ref)) pending.add(ref);
    }
    if (pending.size === 0) return;

    const ids = [...pending];
    const visible = await this.storage.visibleBugs(ids, this.user.id);
    this.lookups += 1;
    for (const id of ids) {
      this.decisions.set(id, visible.get(id) ?? false);
    }
  }

  has(bugId: BugId): boolean {
    return this.decisions.has(bugId);
  }

  /** Falls back to a single-id lookup for anything not primed. */
  async canSee(bugId: BugId): Promise<boolean> {
    if (!this.decisions.has(bugId)) {
      await this.prime([bugId]);
    }
    return this.decisions.get(bugId) ?? false;
  }

  /** Number of bulk lookups sent to storage so far. */
  get lookupCount(): number {
    return this.lookups;
  }
}
