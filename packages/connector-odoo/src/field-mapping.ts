/**
 * Field Mapping
 *
 * Which canonical field lands in which ERP field, per record kind. Relational targets name the
 * reference kind the resolver turns a display name into an id with.
 */

import { z } from 'zod';
import { isPlainObject, silentLogger, type Logger } from '@ledgerlink/core';
import type { OdooRecord } from './client.js';
import { loadJsonDocument } from './documents.js';
import type { ReferenceKind, ReferenceResolver } from './reference-resolver.js';

const referenceKindSchema = z.enum(['country', 'state', 'paymentTerm', 'tax', 'category']);

const mappingTargetSchema = z.union([
  z.string().min(1),
  z.object({ field: z.string().min(1), resolve: referenceKindSchema }).strict(),
]);

const mappingSectionSchema = z
  .object({
    /** canonical path (`address.city`, `address.lines.0`) -> ERP field */
    fields: z.record(mappingTargetSchema),
    /** Set only when the ERP record is created */
    createValues: z.record(z.unknown()).default({}),
  })
  .strict();

export const fieldMappingSchema = z
  .object({
    customer: mappingSectionSchema,
    vendor: mappingSectionSchema,
    product: mappingSectionSchema,
  })
  .strict();

export type FieldMappingDocument = z.infer<typeof fieldMappingSchema>;
export type MappingKind = keyof FieldMappingDocument;
export type MappingTarget = z.infer<typeof mappingTargetSchema>;

const PARTY_FIELDS: Record<string, MappingTarget> = {
  name: 'name',
  email: 'email',
  phone: 'phone',
  'address.lines.0': 'street',
  'address.lines.1': 'street2',
  'address.city': 'city',
  'address.postalCode': 'zip',
  'address.country': { field: 'country_id', resolve: 'country' },
  'address.state': { field: 'state_id', resolve: 'state' },
};

export const DEFAULT_FIELD_MAPPING: FieldMappingDocument = {
  customer: {
    fields: {
      ...PARTY_FIELDS,
      altPhone: 'mobile',
      notes: 'comment',
      termsName: { field: 'property_payment_term_id', resolve: 'paymentTerm' },
    },
    createValues: { customer_rank: 1, is_company: true },
  },
  vendor: {
    fields: {
      ...PARTY_FIELDS,
      termsName: { field: 'property_supplier_payment_term_id', resolve: 'paymentTerm' },
    },
    createValues: { supplier_rank: 1, is_company: true },
  },
  product: {
    fields: {
      name: 'name',
      code: 'default_code',
      salesDescription: 'description_sale',
      purchaseDescription: 'description_purchase',
      salesPrice: 'list_price',
      purchaseCost: 'standard_price',
      categoryName: { field: 'categ_id', resolve: 'category' },
    },
    createValues: { type: 'product', sale_ok: true, purchase_ok: true },
  },
};

/**
 * Value at a dotted path; numeric segments index arrays
 */
export function valueAt(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      current = /^\d+$/.test(segment) ? current[Number(segment)] : undefined;
    } else if (isPlainObject(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

function scalarValue(value: unknown): string | number | boolean | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'boolean') return value;
  return undefined;
}

export class FieldMapping {
  constructor(readonly document: FieldMappingDocument = DEFAULT_FIELD_MAPPING) {}

  /**
   * Load a mapping document; a missing file falls back to the built-in mapping
   */
  static async load(filePath: string | undefined, logger: Logger = silentLogger()): Promise<FieldMapping> {
    if (!filePath) return new FieldMapping();
    const doc = await loadJsonDocument(filePath, fieldMappingSchema, 'field mapping');
    if (!doc) {
      logger.warn('Field mapping file not found, using built-in mapping', { path: filePath });
      return new FieldMapping();
    }
    logger.info('Field mapping loaded', { path: filePath });
    return new FieldMapping(doc);
  }

  createValues(kind: MappingKind): OdooRecord {
    return { ...this.document[kind].createValues };
  }

  /**
   * ERP values for a canonical record. Empty source values are left out rather than cleared;
   * references the resolver cannot find are left out too (the resolver logs them).
   */
  async toValues(kind: MappingKind, source: unknown, resolver: ReferenceResolver): Promise<OdooRecord> {
    const values: OdooRecord = {};
    let countryId: number | undefined;

    for (const [path, target] of Object.entries(this.document[kind].fields)) {
      const value = scalarValue(valueAt(source, path));
      if (value === undefined) continue;

      if (typeof target === 'string') {
        values[target] = value;
        continue;
      }

      const id = await this.resolveReference(resolver, target.resolve, String(value), countryId);
      if (id === undefined) continue;
      if (target.resolve === 'country') countryId = id;
      values[target.field] = id;
    }

    return values;
  }

  private resolveReference(
    resolver: ReferenceResolver,
    kind: ReferenceKind,
    name: string,
    countryId: number | undefined
  ): Promise<number | undefined> {
    return kind === 'state' ? resolver.state(name, countryId) : resolver.resolve(kind, name);
  }
}
