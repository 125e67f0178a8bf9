import type { ChangeSet, EntityRecord } from '@ledgerlink/core';
import type { XmlElement } from '../document.js';

/** Entity tags known to the registry */
export type EntityTag =
  | 'Customer'
  | 'Vendor'
  | 'ItemInventory'
  | 'Invoice'
  | 'Bill'
  | 'ReceivePayment'
  | 'CreditMemo'
  | 'SalesOrder'
  | 'PurchaseOrder'
  | 'JournalEntry';

export const ENTITY_TAGS: readonly EntityTag[] = [
  'Customer',
  'Vendor',
  'ItemInventory',
  'Invoice',
  'Bill',
  'ReceivePayment',
  'CreditMemo',
  'SalesOrder',
  'PurchaseOrder',
  'JournalEntry',
];

export function isEntityTag(value: string): value is EntityTag {
  return ENTITY_TAGS.some((tag) => tag === value);
}

/** Query parameters a task carries from session start */
export interface QueryParams {
  maxReturned?: number;
  activeStatus?: 'ActiveOnly' | 'InactiveOnly' | 'All';
  fromModifiedDate?: string;
  toModifiedDate?: string;
  fromTxnDate?: string;
  toTxnDate?: string;
  includeLineItems?: boolean;
  nameStartsWith?: string;
}

/**
 * How a field takes part in the diff.
 * `ref` fields are compared by `FullName`, since both systems assign their own ids.
 */
export type FieldKind = 'text' | 'amount' | 'boolean' | 'ref';

export interface FieldSpec {
  name: string;
  kind: FieldKind;
}

/** Mutation support for entities that can be pushed back to the desktop system */
export interface MutationSupport {
  /** Fields compared for modify requests, in the dialect's element order */
  fields: FieldSpec[];
  /** Concurrency token the desktop system requires on modify */
  tokenField: string;
  /** Body of `<Tag>Add` built from a full local record */
  buildAdd(record: EntityRecord): XmlElement;
  /** Body of `<Tag>Mod` built from the stable id, token and change set */
  buildMod(id: string, token: string, changes: ChangeSet): XmlElement;
}

export interface EntityDefinition {
  tag: EntityTag;
  /** 'list' entities carry ListID, 'txn' entities TxnID */
  kind: 'list' | 'txn';
  idField: 'ListID' | 'TxnID';
  /** Matches records that have not been assigned an id yet */
  secondaryKey: string;
  /** Fixed page size */
  pageSize: number;
  /** Body of the first-page `<Tag>QueryRq` (continuations only carry MaxReturned) */
  buildQuery(params: QueryParams): XmlElement;
  /** Convert a `<Tag>Ret` element into the stored record */
  parseRecord(node: unknown): EntityRecord;
  mutation?: MutationSupport;
}
