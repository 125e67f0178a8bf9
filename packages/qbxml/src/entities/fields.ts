import { getText, isPlainObject } from '@ledgerlink/core';
import type { ChangeSet, EntityRecord } from '@ledgerlink/core';
import type { XmlElement, XmlNode } from '../document.js';
import type { FieldSpec } from './types.js';

/** Wire form of a field value according to its kind */
export function formatFieldValue(spec: FieldSpec, value: unknown): XmlNode | undefined {
  if (value === undefined || value === null) return undefined;

  switch (spec.kind) {
    case 'ref': {
      const fullName = isPlainObject(value) ? getText(value, 'FullName') : getScalar(value);
      return fullName === undefined ? undefined : { FullName: fullName };
    }
    case 'amount': {
      const text = typeof value === 'number' ? String(value) : getScalar(value);
      if (text === undefined) return undefined;
      const amount = Number(text);
      return Number.isFinite(amount) ? amount.toFixed(2) : text;
    }
    case 'boolean': {
      if (typeof value === 'boolean') return value ? 'true' : 'false';
      const text = getScalar(value);
      return text === undefined ? undefined : text.toLowerCase() === 'true' ? 'true' : 'false';
    }
    case 'text':
      return getScalar(value);
  }
}

function getScalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() === '' ? undefined : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Append the fields of `source` to `element` in `fields` order, skipping absent values
 */
export function appendFields(
  element: XmlElement,
  fields: FieldSpec[],
  source: EntityRecord | ChangeSet
): XmlElement {
  for (const spec of fields) {
    if (!(spec.name in source)) continue;
    const node = formatFieldValue(spec, source[spec.name]);
    if (node !== undefined) element[spec.name] = node;
  }
  return element;
}
