import { requireLogin } from '../auth/identity';
import type { RequestContext } from '../contracts/context';
import { isNumericRef, type BugId, type BugRef, type Timestamp } from '../types';

export interface LastVisitEntry {
  bugId: BugId;
  lastVisitTs: Timestamp | null;
}

/**
 * With refs: one entry per visible ref in input order, null when never visited.
 * Without refs: the user's whole history in storage order.
 * Bugs the user cannot currently see are left out either way.
 */
export async function getLastVisits(
  ctx: RequestContext,
  refs?: readonly BugRef[],
): Promise<LastVisitEntry[]> {
  const { user, storage, visibility } = ctx;
  requireLogin(user);

  if (refs) {
    await visibility.prime(refs);

    const resolved: BugId[] = [];
    for (const ref of refs) {
      const bugId = await resolveVisible(ctx, ref);
      if (bugId !== null) resolved.push(bugId);
    }
    if (resolved.length === 0) return [];

    const records = await storage.lastVisited(user.id, [...new Set(resolved)]);
    const byBug = new Map(records.map((record) => [record.bugId, record.lastVisitTs]));
    return resolved.map((bugId) => ({ bugId, lastVisitTs: byBug.get(bugId) ?? null }));
  }

  const history = await storage.lastVisited(user.id);
  await visibility.prime(history.map((record) => record.bugId));

  const entries: LastVisitEntry[] = [];
  for (const record of history) {
    if (await visibility.canSee(record.bugId)) {
      entries.push({ bugId: record.bugId, lastVisitTs: record.lastVisitTs });
    }
  }
  return entries;
}

async function resolveVisible(ctx: RequestContext, ref: BugRef): Promise<BugId | null> {
  let bugId: BugId;
  if (isNumericRef(ref)) {
    bugId = ref;
  } else {
    const bug = await ctx.storage.getBug(ref);
    if (!bug) return null;
    bugId = bug.id;
  }
  return (await ctx.visibility.canSee(bugId)) ? bugId : null;
}
