/**
 * Inventory pull (ERP -> desktop)
 *
 * Reads ERP products and stages them against the cached inventory items so the next session
 * pushes them: matched items get a local edit with the fields that differ, unmatched products
 * become placeholders the desktop system will create.
 */

import { getText, silentLogger, type EntityRecord, type Logger } from '@ledgerlink/core';
import { extractItem, itemCode, type EntityDefinition } from '@ledgerlink/qbxml';
import { isPlaceholderKey, type SnapshotStore } from '@ledgerlink/sync-engine';
import type { OdooRecord, OdooRpc } from './client.js';
import type { OdooDomain } from './domain.js';

/** Longest item name the desktop system accepts */
export const MAX_ITEM_NAME_LENGTH = 31;

export const PRODUCT_PULL_FIELDS = [
  'id',
  'name',
  'default_code',
  'list_price',
  'standard_price',
  'description_sale',
  'description_purchase',
];

export interface InventoryPullOptions {
  rpc: OdooRpc;
  snapshots: SnapshotStore;
  /** The inventory item definition */
  definition: EntityDefinition;
  /** Narrows the products read; all active products by default */
  domain?: OdooDomain;
  limit?: number;
  logger?: Logger;
}

export interface InventoryPullSummary {
  products: number;
  matched: number;
  edited: number;
  unchanged: number;
  placeholders: number;
  skipped: number;
}

type MatchRule = 'part_number' | 'full_name_suffix' | 'name';

interface ItemIndex {
  byPartNumber: Map<string, EntityRecord>;
  bySuffix: Map<string, EntityRecord>;
  byName: Map<string, EntityRecord>;
}

function indexKey(value: string): string {
  return value.trim().toLowerCase();
}

function buildIndex(records: Record<string, EntityRecord>): ItemIndex {
  const index: ItemIndex = { byPartNumber: new Map(), bySuffix: new Map(), byName: new Map() };
  for (const [key, record] of Object.entries(records)) {
    if (isPlaceholderKey(key)) continue;
    const item = extractItem(record);
    if (item.partNumber) index.byPartNumber.set(indexKey(item.partNumber), record);
    const fullName = item.fullName ?? item.name;
    if (fullName.includes(':')) index.bySuffix.set(indexKey(fullName.slice(fullName.lastIndexOf(':') + 1)), record);
    if (item.name) index.byName.set(indexKey(item.name), record);
  }
  return index;
}

/**
 * Cached item for a product: part number equal to the product's internal reference, then the
 * full-name segment after the last `:`, then the item name
 */
export function matchItem(
  index: ItemIndex,
  code: string | undefined,
  name: string
): { record: EntityRecord; rule: MatchRule } | undefined {
  if (code) {
    const byPart = index.byPartNumber.get(indexKey(code));
    if (byPart) return { record: byPart, rule: 'part_number' };
  }
  for (const candidate of [code, name]) {
    if (!candidate) continue;
    const bySuffix = index.bySuffix.get(indexKey(candidate));
    if (bySuffix) return { record: bySuffix, rule: 'full_name_suffix' };
  }
  const byName = index.byName.get(indexKey(name));
  return byName ? { record: byName, rule: 'name' } : undefined;
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function amount(value: unknown): string | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value.toFixed(2) : undefined;
}

/** Desktop fields a product carries; empty ERP values are left out */
export function productFields(product: OdooRecord): EntityRecord {
  const fields: EntityRecord = {};
  const entries: Array<[string, string | undefined]> = [
    ['SalesDesc', text(product['description_sale'])],
    ['SalesPrice', amount(product['list_price'])],
    ['PurchaseDesc', text(product['description_purchase'])],
    ['PurchaseCost', amount(product['standard_price'])],
  ];
  for (const [field, value] of entries) {
    if (value !== undefined) fields[field] = value;
  }
  return fields;
}

function differs(field: string, cached: unknown, wanted: string): boolean {
  if (field === 'SalesPrice' || field === 'PurchaseCost') {
    const current = Number(typeof cached === 'string' || typeof cached === 'number' ? cached : NaN);
    return !Number.isFinite(current) || current.toFixed(2) !== wanted;
  }
  return (typeof cached === 'string' ? cached.trim() : undefined) !== wanted;
}

export async function pullInventory(options: InventoryPullOptions): Promise<InventoryPullSummary> {
  const logger = options.logger ?? silentLogger();
  const { definition, snapshots } = options;
  const summary: InventoryPullSummary = {
    products: 0,
    matched: 0,
    edited: 0,
    unchanged: 0,
    placeholders: 0,
    skipped: 0,
  };

  const products = await options.rpc.searchRead('product.product', options.domain ?? [], {
    fields: PRODUCT_PULL_FIELDS,
    limit: options.limit,
  });
  summary.products = products.length;

  const doc = await snapshots.load(definition.tag);
  const index = buildIndex(doc.records);

  for (const product of products) {
    const name = text(product['name']);
    if (!name) {
      summary.skipped += 1;
      logger.warn('ERP product without a name skipped', { id: product['id'] });
      continue;
    }
    const code = text(product['default_code']);
    const fields = productFields(product);
    const match = matchItem(index, code, name);

    if (!match) {
      const itemName = name.slice(0, MAX_ITEM_NAME_LENGTH);
      await snapshots.stageChange(definition, {
        Name: itemName,
        IsActive: 'true',
        ...(code ? { ManufacturerPartNumber: code } : {}),
        ...fields,
      });
      summary.placeholders += 1;
      logger.info('ERP product staged as new item', { product: name, itemName });
      continue;
    }

    summary.matched += 1;
    const listId = getText(match.record, definition.idField);
    if (!listId) {
      summary.skipped += 1;
      continue;
    }

    const pending = doc.localEdits[listId] ?? {};
    const changed: EntityRecord = {};
    for (const [field, value] of Object.entries(fields)) {
      if (typeof value !== 'string') continue;
      const current = field in pending ? pending[field] : match.record[field];
      if (differs(field, current, value)) changed[field] = value;
    }

    if (Object.keys(changed).length === 0) {
      summary.unchanged += 1;
      continue;
    }

    await snapshots.stageChange(definition, { [definition.idField]: listId, ...changed });
    summary.edited += 1;
    logger.info('ERP product staged as item edit', {
      product: name,
      item: itemCode(extractItem(match.record)),
      listId,
      matchedBy: match.rule,
      fields: Object.keys(changed),
    });
  }

  logger.info('Inventory pull finished', { ...summary });
  return summary;
}
