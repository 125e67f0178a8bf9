/**
 * Utility functions for working with entity records
 */

import type { EntityRecord } from '../types/index.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/** Wrap a single value as an array; absent values become [] */
export function toArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Trimmed string form of a scalar field, undefined when absent or empty */
export function getText(record: EntityRecord | undefined, field: string): string | undefined {
  if (!record) return undefined;
  const value = record[field];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/** Nested record at `field`, when present */
export function getRecord(record: EntityRecord | undefined, field: string): EntityRecord | undefined {
  const value = record?.[field];
  return isPlainObject(value) ? value : undefined;
}

/** `FullName` of a reference field such as `IncomeAccountRef` */
export function getRefName(record: EntityRecord | undefined, field: string): string | undefined {
  return getText(getRecord(record, field), 'FullName');
}

/** Numeric form of a field, `fallback` when absent or not a number */
export function getNumber(record: EntityRecord | undefined, field: string, fallback = 0): number {
  const text = getText(record, field);
  if (text === undefined) return fallback;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Empty for reconciliation purposes: absent, null or blank */
export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (isPlainObject(value)) return Object.values(value).every(isEmptyValue);
  return false;
}

/**
 * Structural equality for record values; dates by time, objects by content
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a == null || b == null) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) {
      if (!valuesEqual(a[key], b[key])) return false;
    }
    return true;
  }

  return false;
}

/**
 * Fields whose values differ between two versions of a record
 */
export function findChangedFields(
  oldRecord: EntityRecord,
  newRecord: EntityRecord,
  trackFields?: string[]
): string[] {
  const fieldsToCheck = trackFields ?? [
    ...new Set([...Object.keys(oldRecord), ...Object.keys(newRecord)]),
  ];

  return fieldsToCheck.filter((field) => !valuesEqual(oldRecord[field], newRecord[field]));
}
