/**
 * Account Crosswalk
 *
 * Maps desktop account full names to ERP account codes. Loaded from a JSON document that
 * operators edit while the server runs; `reload()` swaps the table in place.
 */

import { z } from 'zod';
import { silentLogger, type Logger } from '@ledgerlink/core';
import { loadJsonDocument } from './documents.js';

export const crosswalkEntrySchema = z
  .object({
    code: z.string().min(1),
    name: z.string().min(1).optional(),
    /** ERP account type, matched by name when the account has to be created */
    type: z.string().min(1).optional(),
    reconcile: z.boolean().default(false),
  })
  .strict();

export const crosswalkDocumentSchema = z.record(crosswalkEntrySchema);

export type CrosswalkEntry = z.infer<typeof crosswalkEntrySchema>;

export class AccountCrosswalk {
  private entries = new Map<string, CrosswalkEntry>();
  private readonly logger: Logger;

  constructor(
    private readonly filePath?: string,
    options: { logger?: Logger; entries?: Record<string, CrosswalkEntry> } = {}
  ) {
    this.logger = options.logger ?? silentLogger();
    if (options.entries) this.replace(options.entries);
  }

  /**
   * Re-read the document. A missing file leaves an empty crosswalk; an invalid one throws and
   * keeps the previous table.
   */
  async reload(): Promise<number> {
    if (!this.filePath) return this.entries.size;

    const doc = await loadJsonDocument(this.filePath, crosswalkDocumentSchema, 'account crosswalk');
    if (!doc) {
      this.logger.warn('Account crosswalk file not found', { path: this.filePath });
      this.entries.clear();
      return 0;
    }

    this.replace(doc);
    this.logger.info('Account crosswalk loaded', { path: this.filePath, accounts: this.entries.size });
    return this.entries.size;
  }

  /**
   * Look up by exact full name, then case-insensitively
   */
  get(accountFullName: string): CrosswalkEntry | undefined {
    const exact = this.entries.get(accountFullName);
    if (exact) return exact;
    const wanted = accountFullName.trim().toLowerCase();
    for (const [name, entry] of this.entries) {
      if (name.toLowerCase() === wanted) return entry;
    }
    return undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  private replace(doc: Record<string, CrosswalkEntry>): void {
    this.entries = new Map(Object.entries(doc));
  }
}
