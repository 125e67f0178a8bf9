/**
 * Response Reconciler
 *
 * Consumes one response document for the active task. Query pages accumulate in the task until
 * the final page, which is merged into the snapshot in a single commit. Mutation responses swap
 * placeholders and local edits for the records the desktop system returned.
 */

import {
  ConnectorError,
  findChangedFields,
  getText,
  isPlainObject,
  silentLogger,
  toArray,
  valuesEqual,
  type EntityRecord,
  type Logger,
} from '@ledgerlink/core';
import {
  childOf,
  isSuccessStatus,
  parseResponse,
  type EntityDefinition,
  type EntityRegistry,
  type EntityTag,
  type ResponseMessage,
} from '@ledgerlink/qbxml';
import { detectConflicts, diff } from '../diff/index.js';
import type { CursorStore } from '../session/index.js';
import type { SnapshotStore } from '../snapshot/index.js';
import {
  isPlaceholderKey,
  placeholderKey,
  type CommitSummary,
  type SnapshotDocument,
  type SyncTask,
} from '../types/index.js';

/** Receives records that were added or changed by a commit */
export interface CloudPropagator {
  propagate(entityType: EntityTag, records: EntityRecord[]): Promise<void>;
}

export type ReconcileOutcome =
  | { kind: 'more'; received: number; rejected?: string }
  | { kind: 'final'; summary: CommitSummary }
  | { kind: 'failed'; error: string };

export interface ResponseReconcilerOptions {
  registry: EntityRegistry;
  snapshots: SnapshotStore;
  cursors?: CursorStore;
  propagator?: CloudPropagator;
  logger?: Logger;
  /** Called after every snapshot commit */
  onCommit?: (summary: CommitSummary) => void;
}

export class ResponseReconciler {
  private readonly logger: Logger;

  constructor(private readonly options: ResponseReconcilerOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Apply a response to `task`, mutating its cursor, accumulator and state
   */
  async reconcile(task: SyncTask, xml: string): Promise<ReconcileOutcome> {
    const definition = this.options.registry.getOrThrow(task.entityType);

    let messages: ResponseMessage[];
    try {
      messages = await parseResponse(xml);
    } catch (err) {
      if (err instanceof ConnectorError && err.code === 'PARSE_FAILED') {
        return this.fail(task, `${err.message} (${describePayload(xml)})`);
      }
      throw err;
    }

    if (task.pendingRequest === 'mutation') {
      return this.reconcileMutations(task, definition, messages);
    }
    return this.reconcileQuery(task, definition, messages);
  }

  private async fail(task: SyncTask, error: string): Promise<ReconcileOutcome> {
    task.state = 'error';
    task.error = error;
    task.cursor = null;
    task.accumulator = {};
    task.pendingRequest = null;
    await this.options.cursors?.clear(task.entityType);
    this.logger.warn('Task failed', { entityType: task.entityType, error });
    return { kind: 'failed', error };
  }

  private async reconcileQuery(
    task: SyncTask,
    definition: EntityDefinition,
    messages: ResponseMessage[]
  ): Promise<ReconcileOutcome> {
    const rsTag = `${definition.tag}QueryRs`;
    const rs = messages.find((m) => m.tag === rsTag);
    if (!rs) {
      return this.fail(task, `Response has no ${rsTag} message`);
    }
    if (!isSuccessStatus(rs)) {
      return this.fail(task, statusError(rs));
    }

    let received = 0;
    for (const node of toArray(childOf(rs.node, `${definition.tag}Ret`))) {
      const record = definition.parseRecord(node);
      const id = getText(record, definition.idField);
      if (!id) {
        this.logger.warn('Record without id skipped', {
          entityType: definition.tag,
          [definition.secondaryKey]: getText(record, definition.secondaryKey),
        });
        continue;
      }
      task.accumulator[id] = record;
      received += 1;
    }

    const remaining = rs.iteratorRemainingCount ?? 0;
    if (rs.iteratorID && remaining > 0) {
      task.cursor = rs.iteratorID;
      task.remaining = remaining;
      task.requestSeq += 1;
      task.state = 'awaiting_next_page';
      task.pendingRequest = null;
      await this.options.cursors?.save(definition.tag, rs.iteratorID, remaining);
      this.logger.debug('Page received', { entityType: definition.tag, received, remaining });
      return { kind: 'more', received };
    }

    const accumulated = task.accumulator;
    const deleteMissing = task.params.fullRefresh && !task.resumed;
    const { doc, result } = await this.options.snapshots.commit(definition.tag, (current) =>
      this.mergeRefresh(current, definition, accumulated, deleteMissing)
    );
    const summary: CommitSummary = { ...result, version: doc.version, total: Object.keys(doc.records).length };

    task.cursor = null;
    task.remaining = 0;
    task.accumulator = {};
    task.state = 'complete';
    task.pendingRequest = null;
    await this.options.cursors?.clear(definition.tag);

    this.logger.info('Snapshot reconciled', {
      entityType: definition.tag,
      added: summary.added.length,
      assigned: summary.assigned.length,
      updated: summary.updated.length,
      deleted: summary.deleted.length,
      unchanged: summary.unchanged,
      conflicts: summary.conflicts,
    });
    this.options.onCommit?.(summary);

    const changedIds = [...summary.added, ...summary.assigned, ...summary.updated];
    await this.propagate(
      definition.tag,
      changedIds.flatMap((id) => {
        const record = doc.records[id];
        return record ? [record] : [];
      })
    );
    return { kind: 'final', summary };
  }

  /**
   * Merge a complete refresh into the document. The desktop system's version replaces the
   * cached one; conflicts with queued local edits are logged, not resolved.
   */
  private mergeRefresh(
    doc: SnapshotDocument,
    definition: EntityDefinition,
    accumulated: Record<string, EntityRecord>,
    deleteMissing: boolean
  ): Omit<CommitSummary, 'version' | 'total'> {
    const summary: Omit<CommitSummary, 'version' | 'total'> = {
      entityType: definition.tag,
      added: [],
      assigned: [],
      updated: [],
      deleted: [],
      unchanged: 0,
      conflicts: 0,
    };
    const fields = definition.mutation?.fields;

    for (const [id, observed] of Object.entries(accumulated)) {
      const cached = doc.records[id];

      if (!cached) {
        const secondary = getText(observed, definition.secondaryKey);
        const placeholder = secondary ? placeholderKey(secondary) : undefined;
        if (placeholder && doc.records[placeholder]) {
          delete doc.records[placeholder];
          summary.assigned.push(id);
        } else {
          summary.added.push(id);
        }
        doc.records[id] = observed;
        continue;
      }

      if (valuesEqual(cached, observed)) {
        summary.unchanged += 1;
      } else {
        const local = doc.localEdits[id];
        if (local && fields) {
          const conflicts = detectConflicts(cached, local, observed, fields);
          if (conflicts.length > 0) {
            summary.conflicts += conflicts.length;
            this.logger.warn('Local edit conflicts with desktop change; desktop value kept', {
              entityType: definition.tag,
              id,
              conflicts,
            });
          }
        }
        this.logger.debug('Record updated', {
          entityType: definition.tag,
          id,
          fields: findChangedFields(cached, observed),
        });
        doc.records[id] = observed;
        summary.updated.push(id);
      }

      const local = doc.localEdits[id];
      if (local && fields && Object.keys(diff(local, observed, fields)).length === 0) {
        delete doc.localEdits[id];
      }
    }

    if (deleteMissing) {
      for (const id of Object.keys(doc.records)) {
        if (isPlaceholderKey(id) || id in accumulated) continue;
        delete doc.records[id];
        delete doc.localEdits[id];
        summary.deleted.push(id);
      }
    }
    return summary;
  }

  private async reconcileMutations(
    task: SyncTask,
    definition: EntityDefinition,
    messages: ResponseMessage[]
  ): Promise<ReconcileOutcome> {
    const retTag = `${definition.tag}Ret`;
    const applied: Array<{ kind: 'add' | 'mod'; record: EntityRecord }> = [];
    const failures: string[] = [];

    for (const message of messages) {
      const kind = mutationKind(definition, message.tag);
      if (!kind) continue;
      if (!isSuccessStatus(message)) {
        failures.push(statusError(message));
        continue;
      }
      const ret = childOf(message.node, retTag);
      if (isPlainObject(ret)) {
        applied.push({ kind, record: definition.parseRecord(ret) });
      }
    }

    if (applied.length > 0) {
      const { doc, result } = await this.options.snapshots.commit(definition.tag, (current) =>
        this.applyMutationResults(current, definition, applied)
      );
      const summary: CommitSummary = { ...result, version: doc.version, total: Object.keys(doc.records).length };
      this.options.onCommit?.(summary);
    }

    // The query still runs: its refresh brings new edit sequences and assigns placeholders by name
    task.state = 'awaiting_first_page';
    task.pendingRequest = null;

    if (failures.length > 0) {
      const rejected = `${failures.length} change(s) rejected: ${failures.join('; ')}`;
      task.error = rejected;
      this.logger.warn('Local changes rejected; querying anyway', {
        entityType: definition.tag,
        applied: applied.length,
        rejected: failures,
      });
      return { kind: 'more', received: applied.length, rejected };
    }

    this.logger.info('Local changes applied', { entityType: definition.tag, applied: applied.length });
    return { kind: 'more', received: applied.length };
  }

  private applyMutationResults(
    doc: SnapshotDocument,
    definition: EntityDefinition,
    applied: Array<{ kind: 'add' | 'mod'; record: EntityRecord }>
  ): Omit<CommitSummary, 'version' | 'total'> {
    const summary: Omit<CommitSummary, 'version' | 'total'> = {
      entityType: definition.tag,
      added: [],
      assigned: [],
      updated: [],
      deleted: [],
      unchanged: 0,
      conflicts: 0,
    };

    for (const { kind, record } of applied) {
      const id = getText(record, definition.idField);
      if (!id) continue;
      if (kind === 'add') {
        const secondary = getText(record, definition.secondaryKey);
        if (secondary) delete doc.records[placeholderKey(secondary)];
        summary.assigned.push(id);
      } else {
        delete doc.localEdits[id];
        summary.updated.push(id);
      }
      doc.records[id] = record;
    }
    return summary;
  }

  private async propagate(entityType: EntityTag, records: EntityRecord[]): Promise<void> {
    const propagator = this.options.propagator;
    if (!propagator || records.length === 0) return;
    try {
      await propagator.propagate(entityType, records);
    } catch (err) {
      this.logger.error('Cloud propagation failed', {
        entityType,
        records: records.length,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function mutationKind(definition: EntityDefinition, rsTag: string): 'add' | 'mod' | undefined {
  if (rsTag === `${definition.tag}AddRs`) return 'add';
  if (rsTag === `${definition.tag}ModRs`) return 'mod';
  return undefined;
}

function statusError(message: ResponseMessage): string {
  return `${message.tag} returned status ${message.statusCode} (${message.statusSeverity}): ${message.statusMessage}`;
}

/** Short description of a payload for error messages */
function describePayload(xml: string): string {
  const trimmed = xml.trim();
  const head = trimmed.length > 60 ? `${trimmed.slice(0, 60)}...` : trimmed;
  return `${trimmed.length} bytes starting ${JSON.stringify(head)}`;
}
