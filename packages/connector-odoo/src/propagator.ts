/**
 * Cloud propagator
 *
 * Pushes records that a snapshot commit added or changed into the ERP: customers and vendors
 * as partners, inventory items as products, journal entries as balanced moves. Each record is
 * handled on its own; a failure is logged and counted, never thrown.
 */

import { errorMessage, silentLogger, type EntityRecord, type Logger } from '@ledgerlink/core';
import {
  extractCustomer,
  extractItem,
  extractJournalEntry,
  extractVendor,
  isJob,
  itemCode,
  journalTotals,
  type CanonicalJournalEntry,
  type EntityTag,
} from '@ledgerlink/qbxml';
import type { CloudPropagator } from '@ledgerlink/sync-engine';
import type { AccountResolver } from './accounts.js';
import type { OdooRecord, OdooRpc } from './client.js';
import { eq, personNameVariants, type OdooDomainTuple } from './domain.js';
import type { FieldMapping } from './field-mapping.js';
import type { ReferenceResolver } from './reference-resolver.js';
import type { EnsureResult, OdooUpserter } from './upserter.js';

export interface PropagationReport {
  entityType: EntityTag;
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
}

export interface OdooPropagatorOptions {
  rpc: OdooRpc;
  upserter: OdooUpserter;
  resolver: ReferenceResolver;
  accounts: AccountResolver;
  mapping: FieldMapping;
  /** Journal receiving desktop journal entries */
  journalName?: string;
  logger?: Logger;
}

type RecordOutcome = 'created' | 'updated' | 'unchanged' | 'skipped';

export const DEFAULT_JOURNAL_NAME = 'Miscellaneous Operations';

/** Reference stored on moves created from a desktop journal entry */
export function moveReference(entry: CanonicalJournalEntry): string | undefined {
  if (!entry.txnId) return undefined;
  return entry.refNumber ? `${entry.refNumber} [${entry.txnId}]` : `[${entry.txnId}]`;
}

export class OdooPropagator implements CloudPropagator {
  private readonly logger: Logger;

  constructor(private readonly options: OdooPropagatorOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async propagate(entityType: EntityTag, records: EntityRecord[]): Promise<void> {
    await this.run(entityType, records);
  }

  async run(entityType: EntityTag, records: EntityRecord[]): Promise<PropagationReport> {
    const report: PropagationReport = { entityType, created: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };

    if (!this.handles(entityType)) {
      this.logger.debug('No ERP mapping for entity type', { entityType, records: records.length });
      report.skipped = records.length;
      return report;
    }

    for (const record of records) {
      const key = typeof record['ListID'] === 'string' ? record['ListID'] : record['TxnID'];
      try {
        const outcome = await this.propagateOne(entityType, record);
        report[outcome] += 1;
      } catch (err) {
        report.failed += 1;
        this.logger.error('Record propagation failed', { entityType, key, error: errorMessage(err) });
      }
    }

    this.logger.info('Propagation finished', { ...report });
    return report;
  }

  handles(entityType: EntityTag): boolean {
    return (
      entityType === 'Customer' ||
      entityType === 'Vendor' ||
      entityType === 'ItemInventory' ||
      entityType === 'JournalEntry'
    );
  }

  private async propagateOne(entityType: EntityTag, record: EntityRecord): Promise<RecordOutcome> {
    switch (entityType) {
      case 'Customer':
      case 'Vendor':
        return this.propagateParty(entityType, record);
      case 'ItemInventory':
        return this.propagateItem(record);
      case 'JournalEntry':
        return this.propagateJournalEntry(record);
      default:
        return 'skipped';
    }
  }

  private async propagateParty(entityType: 'Customer' | 'Vendor', record: EntityRecord): Promise<RecordOutcome> {
    const party = entityType === 'Customer' ? extractCustomer(record) : extractVendor(record);
    if (isJob(party)) {
      this.logger.debug('Job not propagated as a partner', { listId: party.listId, parent: party.parentName });
      return 'skipped';
    }
    if (!party.name) {
      this.logger.warn('Partner without a name skipped', { entityType, listId: party.listId });
      return 'skipped';
    }

    const { mapping, resolver, upserter } = this.options;
    const section = entityType === 'Customer' ? 'customer' : 'vendor';
    const values = await mapping.toValues(section, party, resolver);
    const naturalNames = [party.name, ...(party.companyName ? [party.companyName] : [])];
    const result = await upserter.ensure('partner', party.listId ?? null, values, {
      naturalKeys: personNames(naturalNames, party.firstName, party.lastName),
      createValues: mapping.createValues(section),
    });
    return this.outcome(entityType, party.listId, result);
  }

  private async propagateItem(record: EntityRecord): Promise<RecordOutcome> {
    const item = extractItem(record);
    if (!item.name) {
      this.logger.warn('Item without a name skipped', { listId: item.listId });
      return 'skipped';
    }

    const { mapping, resolver, upserter } = this.options;
    const fullName = item.fullName ?? item.name;
    const source = {
      ...item,
      code: itemCode(item),
      categoryName: fullName.includes(':') ? fullName.slice(0, fullName.lastIndexOf(':')) : undefined,
    };
    const values = await mapping.toValues('product', source, resolver);
    const result = await upserter.ensure('product', item.listId ?? null, values, {
      createValues: mapping.createValues('product'),
    });
    return this.outcome('ItemInventory', item.listId, result);
  }

  private async propagateJournalEntry(record: EntityRecord): Promise<RecordOutcome> {
    const entry = extractJournalEntry(record);
    const ref = moveReference(entry);
    if (!ref) {
      this.logger.warn('Journal entry without TxnID skipped', { refNumber: entry.refNumber });
      return 'skipped';
    }

    const { debit, credit } = journalTotals(entry);
    if (debit !== credit || debit === 0) {
      throw new Error(`Journal entry ${entry.txnId} is not balanced: debit ${debit}, credit ${credit}`);
    }

    const { rpc, accounts } = this.options;
    const journalId = await accounts.journal(this.options.journalName ?? DEFAULT_JOURNAL_NAME);

    const existing = await rpc.searchRead('account.move', [eq('ref', ref), eq('journal_id', journalId)], {
      fields: ['id'],
      limit: 1,
    });
    if (existing.length > 0) {
      this.logger.debug('Journal entry already in the ERP', { txnId: entry.txnId, ref });
      return 'unchanged';
    }

    const lines: Array<[0, 0, OdooRecord]> = [];
    for (const line of entry.lines) {
      if (!line.accountName) {
        throw new Error(`Journal entry ${entry.txnId} has a ${line.side} line without an account`);
      }
      const values: OdooRecord = {
        account_id: await accounts.account(line.accountName),
        name: line.memo ?? entry.memo ?? ref,
        debit: line.side === 'debit' ? line.amount : 0,
        credit: line.side === 'credit' ? line.amount : 0,
      };
      const partnerId = line.entityName ? await this.partnerByName(line.entityName) : undefined;
      if (partnerId !== undefined) values['partner_id'] = partnerId;
      lines.push([0, 0, values]);
    }

    const move: OdooRecord = { journal_id: journalId, ref, line_ids: lines };
    if (entry.txnDate) move['date'] = entry.txnDate;
    if (entry.memo) move['narration'] = entry.memo;

    const id = await rpc.create('account.move', move);
    this.logger.info('Journal entry created in the ERP', { txnId: entry.txnId, id, debit, credit });
    return 'created';
  }

  private async partnerByName(name: string): Promise<number | undefined> {
    const rows = await this.options.rpc.searchRead('res.partner', [eq('name', name)], { fields: ['id'], limit: 1 });
    const id = rows[0]?.['id'];
    if (typeof id === 'number') return id;
    this.logger.warn('Journal line partner not found, line posted without partner', { name });
    return undefined;
  }

  private outcome(entityType: EntityTag, listId: string | undefined, result: EnsureResult): RecordOutcome {
    if (result.status === 'failed') {
      throw new Error(result.error);
    }
    this.logger.debug('Record propagated', { entityType, listId, id: result.id, action: result.action });
    return result.action;
  }
}

function personNames(names: string[], firstName?: string, lastName?: string): OdooDomainTuple[] {
  const seen = new Set<string>();
  const keys: OdooDomainTuple[] = [];
  for (const [index, name] of names.entries()) {
    const variants = index === 0 ? personNameVariants(name, firstName, lastName) : [name.trim()];
    for (const variant of variants) {
      if (seen.has(variant)) continue;
      seen.add(variant);
      keys.push(eq('name', variant));
    }
  }
  return keys;
}
