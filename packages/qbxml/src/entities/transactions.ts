import { toEntityRecord } from '../document.js';
import { txnQueryBody } from './query.js';
import type { EntityDefinition, EntityTag } from './types.js';

function transactionEntity(tag: EntityTag, pageSize: number): EntityDefinition {
  return {
    tag,
    kind: 'txn',
    idField: 'TxnID',
    secondaryKey: 'RefNumber',
    pageSize,
    buildQuery: (params) => txnQueryBody(params, pageSize),
    parseRecord: toEntityRecord,
  };
}

export const invoiceEntity = transactionEntity('Invoice', 10);
export const billEntity = transactionEntity('Bill', 50);
export const creditMemoEntity = transactionEntity('CreditMemo', 50);
export const salesOrderEntity = transactionEntity('SalesOrder', 50);
export const purchaseOrderEntity = transactionEntity('PurchaseOrder', 50);
export const journalEntryEntity = transactionEntity('JournalEntry', 10);

/** Payments always ask for applied-to lines so paid invoices can be traced */
export const receivePaymentEntity: EntityDefinition = {
  ...transactionEntity('ReceivePayment', 50),
  buildQuery: (params) => txnQueryBody({ ...params, includeLineItems: true }, 50),
};
