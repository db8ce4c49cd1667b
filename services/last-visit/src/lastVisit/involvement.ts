import type { Bug, User } from '../types';

/** Reporter, assignee, QA contact or anyone on the CC list. */
export function isInvolved(bug: Bug, user: User): boolean {
  if (!user.authenticated) return false;
  return (
    bug.reporter === user.id ||
    bug.assignedTo === user.id ||
    bug.qaContact === user.id ||
    bug.cc.includes(user.id)
  );
}

/** Public bugs are visible to everyone; private ones only to involved users. */
export function canSeeBug(bug: Bug, user: User): boolean {
  return !bug.isPrivate || isInvolved(bug, user);
}
