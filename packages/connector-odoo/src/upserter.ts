/**
 * Upsert Layer
 *
 * Idempotent create-or-update against the ERP, keyed by a field on the ERP record that stores
 * the desktop system's identifier. Lookup order: stored external reference, then natural key,
 * then create. A record whose values already match is not written.
 */

import { errorMessage, silentLogger, type Logger } from '@ledgerlink/core';
import type { OdooRecord, OdooRpc } from './client.js';
import { eq, many2oneId, personNameVariants, type OdooDomainTuple } from './domain.js';

export type EnsureKind = 'partner' | 'product';

export type EnsureAction = 'created' | 'updated' | 'unchanged';

export type EnsureResult =
  | {
      status: 'ok';
      id: number;
      action: EnsureAction;
      matchedBy: 'external_ref' | 'natural_key' | 'none';
      /** Fields written on update */
      written: string[];
    }
  | { status: 'failed'; error: string };

export interface EnsureOptions {
  /** Ordered natural-key lookups; derived from the values when omitted */
  naturalKeys?: OdooDomainTuple[];
  /** Merged into the values only when a record is created */
  createValues?: OdooRecord;
}

export interface ExternalRefFields {
  partner: string;
  product: string;
}

export const DEFAULT_EXTERNAL_REF_FIELDS: ExternalRefFields = {
  partner: 'ref',
  product: 'x_qb_list_id',
};

const MODELS: Record<EnsureKind, string> = {
  partner: 'res.partner',
  product: 'product.product',
};

export interface OdooUpserterOptions {
  externalRefFields?: Partial<ExternalRefFields>;
  logger?: Logger;
}

export class OdooUpserter {
  private readonly refFields: ExternalRefFields;
  private readonly logger: Logger;

  constructor(
    private readonly rpc: OdooRpc,
    options: OdooUpserterOptions = {}
  ) {
    this.refFields = { ...DEFAULT_EXTERNAL_REF_FIELDS, ...options.externalRefFields };
    this.logger = options.logger ?? silentLogger();
  }

  model(kind: EnsureKind): string {
    return MODELS[kind];
  }

  externalRefField(kind: EnsureKind): string {
    return this.refFields[kind];
  }

  async ensure(
    kind: EnsureKind,
    externalKey: string | null,
    fields: OdooRecord,
    options: EnsureOptions = {}
  ): Promise<EnsureResult> {
    const model = MODELS[kind];
    const refField = this.refFields[kind];
    const desired: OdooRecord = externalKey ? { ...fields, [refField]: externalKey } : { ...fields };
    const readFields = [...new Set(['id', refField, ...Object.keys(desired)])];

    try {
      let existing: OdooRecord | undefined;
      let matchedBy: 'external_ref' | 'natural_key' | 'none' = 'none';

      if (externalKey) {
        existing = await this.findOne(model, eq(refField, externalKey), readFields);
        if (existing) matchedBy = 'external_ref';
      }

      if (!existing) {
        for (const key of options.naturalKeys ?? this.naturalKeys(kind, fields)) {
          const candidate = await this.findOne(model, key, readFields);
          if (!candidate) continue;
          const otherRef = candidate[refField];
          if (externalKey && typeof otherRef === 'string' && otherRef !== '' && otherRef !== externalKey) {
            this.logger.debug('Natural key match belongs to another record', {
              model,
              key: key[2],
              externalKey,
              otherRef,
            });
            continue;
          }
          existing = candidate;
          matchedBy = 'natural_key';
          break;
        }
      }

      if (!existing) {
        const id = await this.rpc.create(model, { ...(options.createValues ?? {}), ...desired });
        this.logger.info('ERP record created', { model, id, externalKey });
        return { status: 'ok', id, action: 'created', matchedBy, written: Object.keys(desired) };
      }

      const id = existing['id'];
      if (typeof id !== 'number') {
        return { status: 'failed', error: `${model} search returned a record without an id` };
      }

      const delta = changedValues(existing, desired);
      const written = Object.keys(delta);
      if (written.length === 0) {
        this.logger.debug('ERP record unchanged', { model, id, matchedBy });
        return { status: 'ok', id, action: 'unchanged', matchedBy, written };
      }

      await this.rpc.write(model, [id], delta);
      this.logger.info('ERP record updated', { model, id, matchedBy, fields: written });
      return { status: 'ok', id, action: 'updated', matchedBy, written };
    } catch (err) {
      this.logger.error('ERP upsert failed', { model, externalKey, error: errorMessage(err) });
      return { status: 'failed', error: errorMessage(err) };
    }
  }

  private naturalKeys(kind: EnsureKind, fields: OdooRecord): OdooDomainTuple[] {
    const name = typeof fields['name'] === 'string' ? fields['name'] : undefined;
    if (kind === 'partner') {
      return name ? personNameVariants(name).map((variant) => eq('name', variant)) : [];
    }

    const keys: OdooDomainTuple[] = [];
    const code = fields['default_code'];
    if (typeof code === 'string' && code !== '') keys.push(eq('default_code', code));
    if (name) keys.push(eq('name', name));
    return keys;
  }

  private async findOne(model: string, condition: OdooDomainTuple, fields: string[]): Promise<OdooRecord | undefined> {
    const rows = await this.rpc.searchRead(model, [condition], { fields, limit: 1 });
    return rows[0];
  }
}

/**
 * Desired values that differ from what the ERP holds. Many2one values compare by id, and
 * `false`, `null` and the empty string all mean "empty".
 */
export function changedValues(current: OdooRecord, desired: OdooRecord): OdooRecord {
  const delta: OdooRecord = {};
  for (const [field, value] of Object.entries(desired)) {
    if (!sameValue(current[field], value)) delta[field] = value;
  }
  return delta;
}

function sameValue(current: unknown, desired: unknown): boolean {
  if (isBlank(current) && isBlank(desired)) return true;

  if (typeof desired === 'number') {
    const currentNumber = Array.isArray(current) ? many2oneId(current) : current;
    return typeof currentNumber === 'number' && Math.abs(currentNumber - desired) < 1e-6;
  }

  if (typeof desired === 'string' || typeof desired === 'boolean') {
    return current === desired;
  }

  // x2many commands and other structures are always sent
  return false;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === false || value === '';
}
