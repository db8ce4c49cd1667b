import { requireLogin } from '../auth/identity';
import { config } from '../config';
import type { RequestContext } from '../contracts/context';
import { AuthorizationError, LastVisitError, NotFoundError, ValidationError } from '../errors';
import type { BugRef, VisitRecord } from '../types';
import { isInvolved } from './involvement';

export interface UpdateOptions {
  maxBatchSize?: number;
}

/**
 * Stamps every referenced bug with one shared "now" for the acting user.
 *
 * All-or-nothing: the first bug that is missing, hidden, or that the user is
 * not involved in rolls back every write staged earlier in the same call.
 */
export async function updateLastVisits(
  ctx: RequestContext,
  refs: readonly BugRef[] | undefined,
  options: UpdateOptions = {},
): Promise<VisitRecord[]> {
  const { user, storage, visibility, log } = ctx;
  requireLogin(user);

  if (!refs || refs.length === 0) {
    throw new ValidationError('param_required', 'ids');
  }
  const maxBatchSize = options.maxBatchSize ?? config.lastVisit.maxBatchSize;
  if (refs.length > maxBatchSize) {
    throw new ValidationError('invalid_param', 'ids', `At most ${maxBatchSize} ids may be updated at once.`);
  }

  await visibility.prime(refs);

  const batch = storage.beginVisitBatch(user.id);
  const written: VisitRecord[] = [];
  let current: BugRef | undefined;
  try {
    const now = await storage.now();
    for (const ref of refs) {
      current = ref;
      const bug = await storage.getBug(ref);
      if (!bug) throw new NotFoundError(ref);
      if (!(await visibility.canSee(bug.id))) throw new AuthorizationError('bug_access_denied', ref);
      if (!isInvolved(bug, user)) throw new AuthorizationError('user_not_involved', bug.id);

      batch.put(bug.id, now);
      written.push({ userId: user.id, bugId: bug.id, lastVisitTs: now });
    }
    await batch.commit();
  } catch (err) {
    batch.rollback();
    log.warn(
      {
        userId: user.id,
        bug: current,
        code: err instanceof LastVisitError ? err.code : undefined,
        staged: written.length,
      },
      'Last-visit batch rolled back',
    );
    throw err;
  }

  log.info(
    { userId: user.id, count: written.length, lastVisitTs: written[0]?.lastVisitTs },
    'Last-visit batch committed',
  );
  return written;
}
