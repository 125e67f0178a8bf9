/**
 * Snapshot Store
 *
 * One JSON document per entity type holding the last known desktop-side records plus the
 * local changes queued for push. Commits are exclusive per entity type and atomic on disk.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { getText, silentLogger, type EntityRecord, type Logger } from '@ledgerlink/core';
import type { EntityDefinition } from '@ledgerlink/qbxml';
import { SyncError } from '../errors/index.js';
import { KeyedMutex } from '../storage/keyed-mutex.js';
import { readJsonFile, sanitizeFileName, writeJsonFileAtomic } from '../storage/json-file.js';
import {
  emptySnapshot,
  placeholderKey,
  snapshotDocumentSchema,
  type SnapshotDocument,
} from '../types/index.js';

export interface SnapshotStoreOptions {
  baseDir?: string;
  logger?: Logger;
}

/** Mutation applied to a freshly loaded document inside a commit */
export type SnapshotMutator<T> = (doc: SnapshotDocument) => T;

export type StageResult =
  | { kind: 'placeholder'; key: string }
  | { kind: 'edit'; id: string };

export class SnapshotStore {
  private readonly baseDir: string;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex();

  constructor(options: SnapshotStoreOptions = {}) {
    this.baseDir = options.baseDir ?? './.snapshots';
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Get the file path for an entity type's document
   */
  filePath(entityType: string): string {
    return path.join(this.baseDir, `${sanitizeFileName(entityType)}.json`);
  }

  /**
   * Load the committed document; an entity type never committed yields an empty document
   */
  async load(entityType: string): Promise<SnapshotDocument> {
    const doc = await readJsonFile(this.filePath(entityType), snapshotDocumentSchema, 'SNAPSHOT_CORRUPT');
    return doc ?? emptySnapshot(entityType);
  }

  /**
   * Load, mutate and write back a document while holding the entity type's lock.
   * The version is bumped only when the mutator returns normally.
   */
  async commit<T>(entityType: string, mutate: SnapshotMutator<T>): Promise<{ doc: SnapshotDocument; result: T }> {
    return this.locks.runExclusive(entityType, async () => {
      const doc = await this.load(entityType);
      const result = mutate(doc);
      doc.version += 1;
      doc.committedAt = new Date().toISOString();
      await writeJsonFileAtomic(this.filePath(entityType), doc, 'SNAPSHOT_ERROR');
      this.logger.debug('Snapshot committed', {
        entityType,
        version: doc.version,
        records: Object.keys(doc.records).length,
      });
      return { doc, result };
    });
  }

  /**
   * Queue a local change for push: a record without an id becomes a placeholder keyed by its
   * secondary key, a record with an id becomes (or extends) a local edit.
   */
  async stageChange(
    definition: Pick<EntityDefinition, 'tag' | 'idField' | 'secondaryKey' | 'mutation'>,
    record: EntityRecord
  ): Promise<StageResult> {
    if (!definition.mutation) {
      throw new SyncError({
        code: 'STAGING_ERROR',
        message: `${definition.tag} records cannot be pushed to the desktop system`,
        context: { entityType: definition.tag },
      });
    }

    const id = getText(record, definition.idField);
    if (id) {
      await this.commit(definition.tag, (doc) => {
        doc.localEdits[id] = { ...(doc.localEdits[id] ?? {}), ...record };
      });
      this.logger.info('Local edit staged', { entityType: definition.tag, id });
      return { kind: 'edit', id };
    }

    const secondary = getText(record, definition.secondaryKey);
    if (!secondary) {
      throw new SyncError({
        code: 'STAGING_ERROR',
        message: `${definition.tag} record has neither ${definition.idField} nor ${definition.secondaryKey}`,
        suggestion: `Provide ${definition.secondaryKey} so the record can be matched once the desktop system assigns an id.`,
        context: { entityType: definition.tag },
      });
    }

    const key = placeholderKey(secondary);
    await this.commit(definition.tag, (doc) => {
      doc.records[key] = { ...(doc.records[key] ?? {}), ...record };
    });
    this.logger.info('Placeholder staged', { entityType: definition.tag, key });
    return { kind: 'placeholder', key };
  }

  /**
   * Entity types with a committed document
   */
  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.baseDir);
    } catch {
      return [];
    }
    return files
      .filter((file) => file.endsWith('.json') && !file.startsWith('.'))
      .map((file) => file.slice(0, -'.json'.length))
      .sort();
  }
}
