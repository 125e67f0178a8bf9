import { getRecord, getText, isEmptyValue } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';
import { toEntityRecord, type XmlElement } from '../document.js';
import { appendFields } from './fields.js';
import { listQueryBody } from './query.js';
import type { EntityDefinition, FieldSpec } from './types.js';

/** Item comparison fields in ItemInventoryMod element order */
export const ITEM_INVENTORY_FIELDS: FieldSpec[] = [
  { name: 'Name', kind: 'text' },
  { name: 'IsActive', kind: 'boolean' },
  { name: 'ParentRef', kind: 'ref' },
  { name: 'ManufacturerPartNumber', kind: 'text' },
  { name: 'SalesTaxCodeRef', kind: 'ref' },
  { name: 'SalesDesc', kind: 'text' },
  { name: 'SalesPrice', kind: 'amount' },
  { name: 'IncomeAccountRef', kind: 'ref' },
  { name: 'PurchaseDesc', kind: 'text' },
  { name: 'PurchaseCost', kind: 'amount' },
  { name: 'COGSAccountRef', kind: 'ref' },
  { name: 'AssetAccountRef', kind: 'ref' },
];

/** Accounts a new inventory item is posted to unless the local record names its own */
export const DEFAULT_ITEM_ACCOUNTS = {
  IncomeAccountRef: 'Merchandise Sales',
  COGSAccountRef: 'Cost of Goods Sold',
  AssetAccountRef: 'Inventory Asset',
} as const;

function withDefaults(record: EntityRecord): EntityRecord {
  const out: EntityRecord = {
    ...record,
    IsActive: record['IsActive'] ?? 'true',
    SalesPrice: isEmptyValue(record['SalesPrice']) ? '0.00' : record['SalesPrice'],
  };
  for (const [field, fullName] of Object.entries(DEFAULT_ITEM_ACCOUNTS)) {
    if (!getText(getRecord(record, field), 'FullName')) {
      out[field] = { FullName: fullName };
    }
  }
  return out;
}

export const itemInventoryEntity: EntityDefinition = {
  tag: 'ItemInventory',
  kind: 'list',
  idField: 'ListID',
  secondaryKey: 'Name',
  pageSize: 100,
  buildQuery: (params) => listQueryBody(params, 100),
  parseRecord: toEntityRecord,
  mutation: {
    fields: ITEM_INVENTORY_FIELDS,
    tokenField: 'EditSequence',
    buildAdd(record) {
      return appendFields({}, ITEM_INVENTORY_FIELDS, withDefaults(record));
    },
    buildMod(id, token, changes) {
      const body: XmlElement = { ListID: id, EditSequence: token };
      return appendFields(body, ITEM_INVENTORY_FIELDS, changes);
    },
  },
};
