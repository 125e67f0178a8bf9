import { z } from 'zod';
import { entityRecordSchema } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';
import { ENTITY_TAGS, type EntityTag, type QueryParams } from '@ledgerlink/qbxml';

/**
 * Task lifecycle:
 * awaiting_first_page -> awaiting_next_page -> ... -> complete, or -> error
 */
export type TaskState = 'awaiting_first_page' | 'awaiting_next_page' | 'complete' | 'error';

export interface TaskParams extends QueryParams {
  /** A full refresh removes cached records the desktop system no longer reports */
  fullRefresh: boolean;
}

export interface SyncTask {
  entityType: EntityTag;
  /** Iterator id of the in-flight query, null before the first page and after the last */
  cursor: string | null;
  /** Remaining count reported with the last page */
  remaining: number;
  /** requestID of the next query; starts at 1, incremented per continuation */
  requestSeq: number;
  params: TaskParams;
  state: TaskState;
  /** Local changes are pushed at most once per task per session */
  mutationsSent: boolean;
  /** Kind of the request the connector is currently executing */
  pendingRequest: 'query' | 'mutation' | null;
  /** Records received so far for this refresh, by id */
  accumulator: Record<string, EntityRecord>;
  /** Continued from a persisted cursor; earlier pages are not in the accumulator */
  resumed: boolean;
  error?: string;
}

export interface Session {
  ticket: string;
  username: string;
  tasks: SyncTask[];
  taskIndex: number;
  createdAt: string;
  lastActivityAt: string;
  lastError: string | null;
  companyFile?: string;
  qbxmlVersion?: string;
  country?: string;
}

const entityTagSchema = z.string().refine((value): value is EntityTag => ENTITY_TAGS.some((t) => t === value), {
  message: 'Unknown entity type',
});

const taskParamsSchema = z.object({
  fullRefresh: z.boolean(),
  maxReturned: z.number().int().positive().optional(),
  activeStatus: z.enum(['ActiveOnly', 'InactiveOnly', 'All']).optional(),
  fromModifiedDate: z.string().optional(),
  toModifiedDate: z.string().optional(),
  fromTxnDate: z.string().optional(),
  toTxnDate: z.string().optional(),
  includeLineItems: z.boolean().optional(),
  nameStartsWith: z.string().optional(),
});

const taskSchema = z.object({
  entityType: entityTagSchema,
  cursor: z.string().nullable(),
  remaining: z.number().int().nonnegative(),
  requestSeq: z.number().int().positive(),
  params: taskParamsSchema,
  state: z.enum(['awaiting_first_page', 'awaiting_next_page', 'complete', 'error']),
  mutationsSent: z.boolean(),
  pendingRequest: z.enum(['query', 'mutation']).nullable(),
  accumulator: z.record(entityRecordSchema),
  resumed: z.boolean(),
  error: z.string().optional(),
});

export const sessionSchema = z.object({
  ticket: z.string().min(1),
  username: z.string(),
  tasks: z.array(taskSchema),
  taskIndex: z.number().int().nonnegative(),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  lastError: z.string().nullable(),
  companyFile: z.string().optional(),
  qbxmlVersion: z.string().optional(),
  country: z.string().optional(),
});

/** Persisted position of the in-flight paginated query */
export interface CursorState {
  entityType: string;
  iteratorID: string;
  remaining: number;
  savedAt: string;
}

export const cursorStateSchema = z.object({
  entityType: z.string(),
  iteratorID: z.string().min(1),
  remaining: z.number().int().nonnegative(),
  savedAt: z.string(),
});
