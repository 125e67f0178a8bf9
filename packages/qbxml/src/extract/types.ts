/**
 * Canonical shapes handed to the cloud side. Field names are the ERP-neutral vocabulary used by
 * the propagator and the field mapping document.
 */

export interface PostalAddress {
  lines: string[];
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface PartyContact {
  listId?: string;
  firstName?: string;
  lastName?: string;
  salutation?: string;
}

export interface CanonicalParty {
  kind: 'customer' | 'vendor';
  listId?: string;
  name: string;
  fullName?: string;
  companyName?: string;
  firstName?: string;
  lastName?: string;
  email?: string;
  phone?: string;
  altPhone?: string;
  fax?: string;
  contact?: string;
  notes?: string;
  isActive: boolean;
  /** Set on jobs (customers nested under another customer) */
  parentName?: string;
  termsName?: string;
  balance?: number;
  address?: PostalAddress;
  shippingAddress?: PostalAddress;
  contacts: PartyContact[];
}

export interface CanonicalItem {
  listId?: string;
  name: string;
  fullName?: string;
  partNumber?: string;
  salesDescription?: string;
  purchaseDescription?: string;
  salesPrice: number;
  purchaseCost: number;
  quantityOnHand: number;
  isActive: boolean;
  incomeAccount?: string;
  expenseAccount?: string;
  assetAccount?: string;
}

export type SalesTxnType = 'Invoice' | 'CreditMemo' | 'SalesOrder';
export type PurchaseTxnType = 'Bill' | 'PurchaseOrder';

export interface TransactionLine {
  itemName?: string;
  accountName?: string;
  description?: string;
  quantity: number;
  rate: number;
  cost?: number;
  amount: number;
  memo?: string;
}

export interface CanonicalTransaction {
  txnType: SalesTxnType | PurchaseTxnType;
  txnId?: string;
  refNumber?: string;
  txnDate?: string;
  dueDate?: string;
  memo?: string;
  customerName?: string;
  vendorName?: string;
  subtotal?: number;
  amountDue?: number;
  lines: TransactionLine[];
  /** Bills only */
  expenseLines: TransactionLine[];
}

export interface JournalLine {
  side: 'debit' | 'credit';
  accountName?: string;
  amount: number;
  memo?: string;
  entityName?: string;
}

export interface CanonicalJournalEntry {
  txnId?: string;
  refNumber?: string;
  txnDate?: string;
  memo?: string;
  lines: JournalLine[];
}

export interface AppliedPayment {
  txnId?: string;
  amount: number;
}

export interface CanonicalPayment {
  txnId?: string;
  refNumber?: string;
  txnDate?: string;
  customerName?: string;
  totalAmount: number;
  memo?: string;
  applied: AppliedPayment[];
}
