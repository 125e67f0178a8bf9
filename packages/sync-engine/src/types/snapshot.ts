import { z } from 'zod';
import { entityRecordSchema } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';

/** Prefix of snapshot keys for locally created records not yet assigned an id */
export const PLACEHOLDER_PREFIX = 'placeholder:';

/**
 * Last known desktop-side truth for one entity type
 */
export interface SnapshotDocument {
  entityType: string;
  /** Incremented on every commit */
  version: number;
  committedAt: string | null;
  /** id (or placeholder key) -> record */
  records: Record<string, EntityRecord>;
  /** Local edits of existing records queued for push, by id */
  localEdits: Record<string, EntityRecord>;
}

export const snapshotDocumentSchema = z.object({
  entityType: z.string(),
  version: z.number().int().nonnegative(),
  committedAt: z.string().nullable(),
  records: z.record(entityRecordSchema),
  localEdits: z.record(entityRecordSchema).default({}),
});

export type CommitAction = 'added' | 'assigned' | 'updated' | 'deleted';

/** Outcome of one snapshot commit */
export interface CommitSummary {
  entityType: string;
  version: number;
  added: string[];
  /** Placeholders replaced by the record the desktop system assigned an id to */
  assigned: string[];
  updated: string[];
  deleted: string[];
  unchanged: number;
  conflicts: number;
  total: number;
}

export function isPlaceholderKey(key: string): boolean {
  return key.startsWith(PLACEHOLDER_PREFIX);
}

export function placeholderKey(secondaryValue: string): string {
  return `${PLACEHOLDER_PREFIX}${secondaryValue}`;
}

export function emptySnapshot(entityType: string): SnapshotDocument {
  return { entityType, version: 0, committedAt: null, records: {}, localEdits: {} };
}
