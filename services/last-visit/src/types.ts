export type BugId = number;
export type UserId = number;

/** A caller-supplied bug reference: numeric id or alias. */
export type BugRef = BugId | string;

/** Epoch seconds, as read from the storage clock. */
export type Timestamp = number;

export interface User {
  id: UserId;
  login: string;
  authenticated: boolean;
}

export interface Bug {
  id: BugId;
  alias?: string;
  reporter: UserId;
  assignedTo?: UserId;
  qaContact?: UserId;
  cc: UserId[];
  isPrivate: boolean;
}

export interface VisitRecord {
  userId: UserId;
  bugId: BugId;
  lastVisitTs: Timestamp;
}

export const ANONYMOUS_USER: User = Object.freeze({ id: 0, login: '', authenticated: false });

export function isNumericRef(ref: BugRef): ref is BugId {
  return typeof ref === 'number' && Number.isInteger(ref) && ref > 0;
}
