/**
 * Chart-of-accounts lookups for journal entries: desktop account names go through the
 * crosswalk to an ERP account code; journals are found by name.
 */

import { ConnectorError, silentLogger, type Logger } from '@ledgerlink/core';
import type { OdooRpc } from './client.js';
import type { AccountCrosswalk } from './crosswalk.js';
import { eq, eqIgnoreCase, isIn } from './domain.js';

export const JOURNAL_TYPES = ['general', 'sale', 'purchase'] as const;

export class AccountResolver {
  private readonly accounts = new Map<string, number>();
  private readonly journals = new Map<string, number>();
  private readonly logger: Logger;

  constructor(
    private readonly rpc: OdooRpc,
    private readonly crosswalk: AccountCrosswalk,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * ERP account id for a desktop account full name. An account the crosswalk names but the ERP
   * lacks is created with its account type resolved by name.
   */
  async account(accountFullName: string): Promise<number> {
    const entry = this.crosswalk.get(accountFullName);
    if (!entry) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Account "${accountFullName}" is not in the account crosswalk`,
        source: 'odoo',
        suggestion: 'Add the account to the crosswalk file and reload it.',
      });
    }

    const cached = this.accounts.get(entry.code);
    if (cached !== undefined) return cached;

    const found = await this.rpc.searchRead('account.account', [eq('code', entry.code)], {
      fields: ['id', 'name'],
      limit: 1,
    });
    const foundId = found[0]?.['id'];
    if (typeof foundId === 'number') {
      this.accounts.set(entry.code, foundId);
      return foundId;
    }

    if (!entry.type) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Account ${entry.code} for "${accountFullName}" does not exist and the crosswalk names no type to create it with`,
        source: 'odoo',
      });
    }

    const types = await this.rpc.searchRead('account.account.type', [['name', 'ilike', entry.type]], {
      fields: ['id', 'name'],
      limit: 1,
    });
    const typeId = types[0]?.['id'];
    if (typeof typeId !== 'number') {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Account type "${entry.type}" not found; cannot create account ${entry.code}`,
        source: 'odoo',
      });
    }

    const id = await this.rpc.create('account.account', {
      code: entry.code,
      name: entry.name ?? accountFullName,
      user_type_id: typeId,
      reconcile: entry.reconcile,
    });
    this.logger.info('ERP account created', { code: entry.code, id, accountFullName });
    this.accounts.set(entry.code, id);
    return id;
  }

  /**
   * Journal id by name, among general, sale and purchase journals
   */
  async journal(name: string): Promise<number> {
    const cached = this.journals.get(name);
    if (cached !== undefined) return cached;

    const rows = await this.rpc.searchRead(
      'account.journal',
      [eqIgnoreCase('name', name), isIn('type', [...JOURNAL_TYPES])],
      { fields: ['id', 'name'], limit: 1 }
    );
    const id = rows[0]?.['id'];
    if (typeof id !== 'number') {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Journal "${name}" not found`,
        source: 'odoo',
        suggestion: 'Set odoo.journalName to an existing general, sale or purchase journal.',
      });
    }
    this.journals.set(name, id);
    return id;
  }

  /** Forget cached ids, e.g. after the crosswalk was reloaded */
  reset(): void {
    this.accounts.clear();
    this.journals.clear();
  }
}
