import { config } from '../config';
import type { BugId, UserId } from '../types';

const p = () => config.keyPrefix;

export const keys = {
  bug: (bugId: BugId) => `${p()}bug:${bugId}`,
  bugCc: (bugId: BugId) => `${p()}bug:${bugId}:cc`,
  bugAlias: (alias: string) => `${p()}bug_alias:${alias}`,
  user: (userId: UserId) => `${p()}user:${userId}`,
  apiKey: (apiKey: string) => `${p()}api_key:${apiKey}`,
  lastVisit: (userId: UserId) => `${p()}user:${userId}:last_visit`,
};
