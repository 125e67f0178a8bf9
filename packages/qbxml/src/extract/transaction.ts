import { getNumber, getRefName, getText, isPlainObject, toArray } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';
import type {
  CanonicalJournalEntry,
  CanonicalPayment,
  CanonicalTransaction,
  JournalLine,
  PurchaseTxnType,
  SalesTxnType,
  TransactionLine,
} from './types.js';

const LINE_ELEMENT: Record<SalesTxnType | PurchaseTxnType, string> = {
  Invoice: 'InvoiceLineRet',
  CreditMemo: 'CreditMemoLineRet',
  SalesOrder: 'SalesOrderLineRet',
  PurchaseOrder: 'PurchaseOrderLineRet',
  Bill: 'ItemLineRet',
};

function records(value: unknown): EntityRecord[] {
  return toArray(value).filter(isPlainObject);
}

function optionalNumber(record: EntityRecord, field: string): number | undefined {
  return getText(record, field) === undefined ? undefined : getNumber(record, field);
}

function extractLine(line: EntityRecord, txnType: SalesTxnType | PurchaseTxnType): TransactionLine {
  const purchase = txnType === 'PurchaseOrder' || txnType === 'Bill';
  return {
    itemName: getRefName(line, 'ItemRef'),
    description: getText(line, 'Desc'),
    quantity: getNumber(line, 'Quantity'),
    rate: getNumber(line, 'Rate'),
    cost: purchase ? getNumber(line, 'Cost') : undefined,
    amount: getNumber(line, 'Amount'),
  };
}

export function isSalesTxn(tag: string): tag is SalesTxnType {
  return tag === 'Invoice' || tag === 'CreditMemo' || tag === 'SalesOrder';
}

export function isPurchaseTxn(tag: string): tag is PurchaseTxnType {
  return tag === 'Bill' || tag === 'PurchaseOrder';
}

export function extractTransaction(
  record: EntityRecord,
  txnType: SalesTxnType | PurchaseTxnType
): CanonicalTransaction {
  const txn: CanonicalTransaction = {
    txnType,
    txnId: getText(record, 'TxnID'),
    refNumber: getText(record, 'RefNumber'),
    txnDate: getText(record, 'TxnDate'),
    dueDate: getText(record, 'DueDate'),
    memo: getText(record, 'Memo'),
    lines: records(record[LINE_ELEMENT[txnType]]).map((line) => extractLine(line, txnType)),
    expenseLines: [],
  };

  if (isSalesTxn(txnType)) {
    txn.customerName = getRefName(record, 'CustomerRef');
    txn.subtotal = optionalNumber(record, 'Subtotal');
  } else {
    txn.vendorName = getRefName(record, 'VendorRef');
    txn.amountDue = optionalNumber(record, 'AmountDue');
  }

  if (txnType === 'Bill') {
    txn.expenseLines = records(record['ExpenseLineRet']).map((line) => ({
      accountName: getRefName(line, 'AccountRef'),
      quantity: 0,
      rate: 0,
      amount: getNumber(line, 'Amount'),
      memo: getText(line, 'Memo'),
    }));
  }
  return txn;
}

function journalLines(value: unknown, side: JournalLine['side']): JournalLine[] {
  return records(value).map((line) => ({
    side,
    accountName: getRefName(line, 'AccountRef'),
    amount: getNumber(line, 'Amount'),
    memo: getText(line, 'Memo'),
    entityName: getRefName(line, 'EntityRef'),
  }));
}

export function extractJournalEntry(record: EntityRecord): CanonicalJournalEntry {
  return {
    txnId: getText(record, 'TxnID'),
    refNumber: getText(record, 'RefNumber'),
    txnDate: getText(record, 'TxnDate'),
    memo: getText(record, 'Memo'),
    lines: [
      ...journalLines(record['JournalDebitLine'], 'debit'),
      ...journalLines(record['JournalCreditLine'], 'credit'),
    ],
  };
}

export function extractPayment(record: EntityRecord): CanonicalPayment {
  return {
    txnId: getText(record, 'TxnID'),
    refNumber: getText(record, 'RefNumber'),
    txnDate: getText(record, 'TxnDate'),
    customerName: getRefName(record, 'CustomerRef'),
    totalAmount: getNumber(record, 'TotalAmount'),
    memo: getText(record, 'Memo'),
    applied: records(record['AppliedToTxnRet']).map((applied) => ({
      txnId: getText(applied, 'TxnID'),
      amount: getNumber(applied, 'PaymentAmount'),
    })),
  };
}

/** Sum of debit and credit amounts; a postable entry has both equal and non-zero */
export function journalTotals(entry: CanonicalJournalEntry): { debit: number; credit: number } {
  let debit = 0;
  let credit = 0;
  for (const line of entry.lines) {
    if (line.side === 'debit') debit += line.amount;
    else credit += line.amount;
  }
  return { debit: Math.round(debit * 100) / 100, credit: Math.round(credit * 100) / 100 };
}
