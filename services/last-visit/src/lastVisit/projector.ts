import type { BugId, Timestamp } from '../types';

/** Wire shape of one last-visit entry. */
export interface LastVisitRecord {
  id: number;
  last_visit_ts: string | null;
}

export type LastVisitField = keyof LastVisitRecord;

export const LAST_VISIT_FIELDS: readonly LastVisitField[] = ['id', 'last_visit_ts'];

/** Caller-requested narrowing of the output. Unknown names are ignored. */
export interface FieldFilter {
  include?: readonly string[];
  exclude?: readonly string[];
}

/** `YYYY-MM-DDTHH:MM:SSZ`, always UTC, no fractional seconds. */
export function formatTimestamp(ts: Timestamp): string {
  return new Date(Math.trunc(ts) * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function selectFields(filter?: FieldFilter): Set<LastVisitField> {
  const include = filter?.include ?? [];
  const exclude = new Set(filter?.exclude ?? []);
  const selected = new Set<LastVisitField>();
  for (const field of LAST_VISIT_FIELDS) {
    if (include.length > 0 && !include.includes(field)) continue;
    if (exclude.has(field)) continue;
    selected.add(field);
  }
  return selected;
}

export function toRecord(
  bugId: BugId,
  lastVisitTs: Timestamp | null,
  filter?: FieldFilter,
): Partial<LastVisitRecord> {
  const fields = selectFields(filter);
  const record: Partial<LastVisitRecord> = {};
  if (fields.has('id')) record.id = Math.trunc(bugId);
  if (fields.has('last_visit_ts')) {
    record.last_visit_ts = lastVisitTs === null ? null : formatTimestamp(lastVisitTs);
  }
  return record;
}
