/**
 * Structured XML document helpers.
 *
 * Requests are built as element trees and serialized by xml2js' Builder, so text content is
 * escaped by construction. Responses are parsed with `explicitArray: false`: a child that
 * occurs once is an object or string, a repeated child is an array.
 */

import { Builder, parseStringPromise } from 'xml2js';
import { ConnectorError, isPlainObject, errorMessage } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';

/** Element tree accepted by the serializer. `$` holds attributes. */
export type XmlNode = string | XmlElement | XmlNode[];
export interface XmlElement {
  $?: Record<string, string>;
  [child: string]: XmlNode | Record<string, string> | undefined;
}

const PARSE_OPTIONS = {
  explicitArray: false,
  explicitRoot: true,
  trim: true,
  emptyTag: '',
  attrkey: '$',
  charkey: '_',
};

/**
 * Serialize an element tree without an XML declaration
 */
export function serializeElement(root: Record<string, XmlNode>, source = 'qbxml'): string {
  const builder = new Builder({
    headless: true,
    renderOpts: { pretty: true, indent: '  ', newline: '\n' },
  });
  try {
    return builder.buildObject(root);
  } catch (err) {
    throw new ConnectorError({
      code: 'BUILD_FAILED',
      message: `Failed to serialize request document: ${errorMessage(err)}`,
      source,
      cause: err instanceof Error ? err : undefined,
      suggestion: 'Remove control characters from the record values being sent.',
    });
  }
}

/**
 * Parse an XML document into a plain tree. Throws PARSE_FAILED on malformed input.
 */
export async function parseDocument(xml: string, source = 'qbxml'): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml, PARSE_OPTIONS);
  } catch (err) {
    throw new ConnectorError({
      code: 'PARSE_FAILED',
      message: `XML parse error: ${firstLine(errorMessage(err))}`,
      source,
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConnectorError({
      code: 'PARSE_FAILED',
      message: 'XML parse error: document has no root element',
      source,
    });
  }
  return parsed;
}

/**
 * Parse with SOAP-style namespace prefixes removed from element names (`soap:Body` -> `Body`)
 */
export async function parseDocumentStrippingPrefixes(
  xml: string,
  source = 'soap'
): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml, {
      ...PARSE_OPTIONS,
      tagNameProcessors: [stripPrefix],
      attrNameProcessors: [stripPrefix],
    });
  } catch (err) {
    throw new ConnectorError({
      code: 'PARSE_FAILED',
      message: `XML parse error: ${firstLine(errorMessage(err))}`,
      source,
      cause: err instanceof Error ? err : undefined,
    });
  }
  if (!isPlainObject(parsed)) {
    throw new ConnectorError({
      code: 'PARSE_FAILED',
      message: 'XML parse error: document has no root element',
      source,
    });
  }
  return parsed;
}

function stripPrefix(name: string): string {
  const idx = name.indexOf(':');
  return idx === -1 ? name : name.slice(idx + 1);
}

function firstLine(message: string): string {
  return message.split('\n')[0] ?? message;
}

/** Attributes of a parsed element */
export function attributesOf(node: unknown): Record<string, string> {
  if (!isPlainObject(node)) return {};
  const attrs = node['$'];
  if (!isPlainObject(attrs)) return {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(attrs)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

/** Child element(s) of a parsed element */
export function childOf(node: unknown, name: string): unknown {
  return isPlainObject(node) ? node[name] : undefined;
}

/** Text content of a parsed element, whether or not it carried attributes */
export function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (isPlainObject(node)) {
    const text = node['_'];
    if (typeof text === 'string') return text;
    if (Object.keys(node).every((k) => k === '$')) return '';
  }
  return undefined;
}

/**
 * Convert a parsed element into an entity record: attributes dropped, text-only children
 * become strings, nested elements become records, repeated elements arrays.
 */
export function toEntityRecord(node: unknown): EntityRecord {
  const record: EntityRecord = {};
  if (!isPlainObject(node)) return record;
  for (const [key, value] of Object.entries(node)) {
    if (key === '$' || key === '_') continue;
    record[key] = normalizeValue(value);
  }
  return record;
}

function normalizeValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeValue);
  if (isPlainObject(value)) {
    const childKeys = Object.keys(value).filter((k) => k !== '$' && k !== '_');
    if (childKeys.length === 0) return textOf(value) ?? '';
    return toEntityRecord(value);
  }
  return typeof value === 'string' ? value : String(value);
}

/**
 * Convert an entity record (or change set) back into an element tree, keeping field order
 */
export function toXmlElement(record: EntityRecord): XmlElement {
  const element: XmlElement = {};
  for (const [key, value] of Object.entries(record)) {
    const node = toXmlNode(value);
    if (node !== undefined) element[key] = node;
  }
  return element;
}

function toXmlNode(value: unknown): XmlNode | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) {
    const items: XmlNode[] = [];
    for (const item of value) {
      const node = toXmlNode(item);
      if (node !== undefined) items.push(node);
    }
    return items;
  }
  if (isPlainObject(value)) return toXmlElement(value);
  return String(value);
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
