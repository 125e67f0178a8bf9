import type { EntityTag, QueryParams } from '@ledgerlink/qbxml';
import type { SyncTask, TaskParams } from '../types/index.js';

export interface TaskTemplateEntry extends QueryParams {
  entityType: EntityTag;
  fullRefresh?: boolean;
}

/** Modified-date floor that still selects every record */
export const UNBOUNDED_MODIFIED_DATE = '1980-01-01';

/** Tasks every session starts with, in queue order */
export const DEFAULT_TASK_TEMPLATE: readonly TaskTemplateEntry[] = [
  { entityType: 'Customer', fromModifiedDate: UNBOUNDED_MODIFIED_DATE },
  { entityType: 'Vendor', fromModifiedDate: UNBOUNDED_MODIFIED_DATE },
  { entityType: 'ItemInventory' },
  { entityType: 'Invoice', includeLineItems: true },
  { entityType: 'Bill', includeLineItems: true },
  { entityType: 'ReceivePayment', includeLineItems: true },
  { entityType: 'CreditMemo', includeLineItems: true },
  { entityType: 'SalesOrder', includeLineItems: true },
  { entityType: 'PurchaseOrder', includeLineItems: true },
  { entityType: 'JournalEntry', includeLineItems: true },
];

/**
 * Whether a query selects only part of the records. A narrowed query is an incremental update
 * and must not imply deletions.
 */
export function isNarrowedQuery(query: QueryParams): boolean {
  return Boolean(
    (query.fromModifiedDate && query.fromModifiedDate !== UNBOUNDED_MODIFIED_DATE) ||
      query.toModifiedDate ||
      query.fromTxnDate ||
      query.toTxnDate ||
      query.nameStartsWith ||
      (query.activeStatus && query.activeStatus !== 'All')
  );
}

export function createTask(entry: TaskTemplateEntry): SyncTask {
  const { entityType, fullRefresh, ...query } = entry;
  const params: TaskParams = { ...query, fullRefresh: fullRefresh ?? !isNarrowedQuery(query) };
  return {
    entityType,
    cursor: null,
    remaining: 0,
    requestSeq: 1,
    params,
    state: 'awaiting_first_page',
    mutationsSent: false,
    pendingRequest: null,
    accumulator: {},
    resumed: false,
  };
}

/**
 * Percent complete reported to the connector: 100 only once the queue is exhausted
 */
export function progressOf(taskIndex: number, taskCount: number): number {
  if (taskIndex >= taskCount) return 100;
  return Math.min(99, Math.floor((taskIndex / taskCount) * 100));
}

/** Reported while the active task still has pages or a query after its mutations */
export const CONTINUE_PROGRESS = 50;
