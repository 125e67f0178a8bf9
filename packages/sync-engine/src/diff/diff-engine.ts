/**
 * Entity Diff Engine
 *
 * Field-level comparison of two versions of the same desktop record over a fixed field list.
 * References compare by display name because the two systems assign their own ids.
 */

import { getText, isEmptyValue, isPlainObject } from '@ledgerlink/core';
import type { ChangeSet, EntityRecord, FieldConflict } from '@ledgerlink/core';
import type { EntityDefinition, FieldSpec } from '@ledgerlink/qbxml';

/**
 * Comparable form of a field value, undefined when empty
 */
export function normalizeField(spec: FieldSpec, value: unknown): string | undefined {
  if (isEmptyValue(value)) return undefined;

  switch (spec.kind) {
    case 'ref': {
      const name = isPlainObject(value) ? getText(value, 'FullName') : scalar(value);
      return name?.toLowerCase();
    }
    case 'amount': {
      const text = scalar(value);
      if (text === undefined) return undefined;
      const amount = Number(text);
      return Number.isFinite(amount) ? amount.toFixed(2) : text;
    }
    case 'boolean': {
      const text = scalar(value);
      return text === undefined ? undefined : String(text.toLowerCase() === 'true');
    }
    case 'text':
      return scalar(value);
  }
}

function scalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Fields of `cached` that differ from `observed`, with the cached value.
 * Fields empty on the cached side are never included: an empty value is not authoritative.
 */
export function diff(cached: EntityRecord, observed: EntityRecord, fields: FieldSpec[]): ChangeSet {
  const changes: ChangeSet = {};
  for (const spec of fields) {
    const cachedValue = normalizeField(spec, cached[spec.name]);
    if (cachedValue === undefined) continue;
    if (cachedValue !== normalizeField(spec, observed[spec.name])) {
      changes[spec.name] = cached[spec.name];
    }
  }
  return changes;
}

/**
 * Fields changed on both sides since `base` to different values.
 * Reported only; the record the desktop system returns still replaces the cached one.
 */
export function detectConflicts(
  base: EntityRecord,
  local: EntityRecord,
  remote: EntityRecord,
  fields: FieldSpec[]
): FieldConflict[] {
  const conflicts: FieldConflict[] = [];
  for (const spec of fields) {
    if (!(spec.name in local)) continue;
    const baseValue = normalizeField(spec, base[spec.name]);
    const localValue = normalizeField(spec, local[spec.name]);
    const remoteValue = normalizeField(spec, remote[spec.name]);
    if (localValue !== baseValue && remoteValue !== baseValue && localValue !== remoteValue) {
      conflicts.push({
        field: spec.name,
        baseValue: base[spec.name],
        localValue: local[spec.name],
        remoteValue: remote[spec.name],
      });
    }
  }
  return conflicts;
}

export type MutationSkipReason = 'no_changes' | 'missing_token' | 'missing_record' | 'not_supported';

export type MutationPlan =
  | { kind: 'add'; key: string; record: EntityRecord }
  | { kind: 'mod'; id: string; token: string; changes: ChangeSet }
  | { kind: 'skip'; key: string; reason: MutationSkipReason };

/**
 * Decide how a queued local change reaches the desktop system.
 *
 * @param key - snapshot key of the local change (placeholder key or id)
 * @param local - the placeholder or local edit
 * @param desktop - the cached desktop record with the same id, if any
 */
export function planMutation(
  definition: Pick<EntityDefinition, 'idField' | 'mutation'>,
  key: string,
  local: EntityRecord,
  desktop: EntityRecord | undefined
): MutationPlan {
  const mutation = definition.mutation;
  if (!mutation) return { kind: 'skip', key, reason: 'not_supported' };

  const id = getText(local, definition.idField);
  if (!id) return { kind: 'add', key, record: local };
  if (!desktop) return { kind: 'skip', key, reason: 'missing_record' };

  const token = getText(desktop, mutation.tokenField) ?? getText(local, mutation.tokenField);
  if (!token) return { kind: 'skip', key, reason: 'missing_token' };

  const changes = diff(local, desktop, mutation.fields);
  if (Object.keys(changes).length === 0) return { kind: 'skip', key, reason: 'no_changes' };
  return { kind: 'mod', id, token, changes };
}
