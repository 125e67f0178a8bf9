import { getNumber, getRefName, getText } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';
import type { CanonicalItem } from './types.js';

export function extractItem(record: EntityRecord): CanonicalItem {
  return {
    listId: getText(record, 'ListID'),
    name: getText(record, 'Name') ?? '',
    fullName: getText(record, 'FullName'),
    partNumber: getText(record, 'ManufacturerPartNumber'),
    salesDescription: getText(record, 'SalesDesc'),
    purchaseDescription: getText(record, 'PurchaseDesc'),
    salesPrice: getNumber(record, 'SalesPrice'),
    purchaseCost: getNumber(record, 'PurchaseCost'),
    quantityOnHand: getNumber(record, 'QuantityOnHand'),
    isActive: (getText(record, 'IsActive') ?? 'true').toLowerCase() === 'true',
    incomeAccount: getRefName(record, 'IncomeAccountRef'),
    expenseAccount: getRefName(record, 'COGSAccountRef'),
    assetAccount: getRefName(record, 'AssetAccountRef'),
  };
}

/**
 * Short code of an item: its part number, else the segment after the last `:` of its full name
 * (`Hardware:Widget-100` -> `Widget-100`), else its name
 */
export function itemCode(item: CanonicalItem): string {
  if (item.partNumber) return item.partNumber;
  if (item.fullName?.includes(':')) {
    const segment = item.fullName.slice(item.fullName.lastIndexOf(':') + 1).trim();
    if (segment) return segment;
  }
  return item.name;
}
