/**
 * Message envelope of the desktop dialect:
 *
 *   <?xml version="1.0" encoding="utf-8"?>
 *   <?qbxml version="13.0"?>
 *   <QBXML><QBXMLMsgsRq onError="stopOnError">...requests...</QBXMLMsgsRq></QBXML>
 */

import { ConnectorError, isPlainObject, toArray } from '@ledgerlink/core';
import {
  attributesOf,
  childOf,
  parseDocument,
  serializeElement,
  type XmlElement,
  type XmlNode,
} from './document.js';

export const DEFAULT_QBXML_VERSION = '13.0';

export type OnErrorPolicy = 'stopOnError' | 'continueOnError';

/** One request element inside the message set, e.g. `ItemInventoryQueryRq` */
export interface RequestMessage {
  tag: string;
  attributes?: Record<string, string>;
  body: XmlElement;
}

export interface EnvelopeOptions {
  version?: string;
  onError?: OnErrorPolicy;
}

/** One `*Rs` element of a response message set */
export interface ResponseMessage {
  tag: string;
  statusCode: string;
  statusSeverity: string;
  statusMessage: string;
  requestID?: string;
  iteratorID?: string;
  iteratorRemainingCount?: number;
  node: unknown;
}

/**
 * Serialize request messages into a complete request document (not yet validated)
 */
export function renderRequest(messages: RequestMessage[], options: EnvelopeOptions = {}): string {
  const msgsRq: XmlElement = { $: { onError: options.onError ?? 'stopOnError' } };

  for (const message of messages) {
    const element: XmlElement = message.attributes
      ? { $: message.attributes, ...message.body }
      : { ...message.body };
    const existing = msgsRq[message.tag];
    if (existing === undefined) {
      msgsRq[message.tag] = element;
    } else if (Array.isArray(existing)) {
      existing.push(element);
    } else if (isXmlNode(existing)) {
      msgsRq[message.tag] = [existing, element];
    }
  }

  const body = serializeElement({ QBXML: { QBXMLMsgsRq: msgsRq } });
  const version = options.version ?? DEFAULT_QBXML_VERSION;
  return `<?xml version="1.0" encoding="utf-8"?>\n<?qbxml version="${version}"?>\n${body}\n`;
}

function isXmlNode(value: XmlNode | Record<string, string>): value is XmlNode {
  return typeof value === 'string' || Array.isArray(value) || isPlainObject(value);
}

/**
 * Render and then re-parse the request, so a malformed document surfaces as BUILD_FAILED
 * instead of reaching the desktop system.
 */
export async function buildRequest(
  messages: RequestMessage[],
  options: EnvelopeOptions = {}
): Promise<string> {
  if (messages.length === 0) {
    throw new ConnectorError({
      code: 'BUILD_FAILED',
      message: 'Request message set is empty',
      source: 'qbxml',
    });
  }

  const xml = renderRequest(messages, options);
  await validateRequest(xml, messages.map((m) => m.tag));
  return xml;
}

/**
 * Check that a request document parses and contains the expected request elements
 */
export async function validateRequest(xml: string, expectedTags: string[]): Promise<void> {
  let root: Record<string, unknown>;
  try {
    root = await parseDocument(xml);
  } catch (err) {
    throw new ConnectorError({
      code: 'BUILD_FAILED',
      message: `Generated request is not well-formed: ${err instanceof Error ? err.message : String(err)}`,
      source: 'qbxml',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const msgsRq = childOf(childOf(root, 'QBXML'), 'QBXMLMsgsRq');
  if (!isPlainObject(msgsRq)) {
    throw new ConnectorError({
      code: 'BUILD_FAILED',
      message: 'Generated request has no QBXML/QBXMLMsgsRq element',
      source: 'qbxml',
    });
  }

  for (const tag of expectedTags) {
    if (msgsRq[tag] === undefined) {
      throw new ConnectorError({
        code: 'BUILD_FAILED',
        message: `Generated request is missing its ${tag} element`,
        source: 'qbxml',
      });
    }
  }
}

/**
 * Parse a response document into its `*Rs` messages, in document order per tag
 */
export async function parseResponse(xml: string): Promise<ResponseMessage[]> {
  const root = await parseDocument(xml);
  const msgsRs = childOf(childOf(root, 'QBXML'), 'QBXMLMsgsRs');
  if (!isPlainObject(msgsRs)) {
    throw new ConnectorError({
      code: 'PARSE_FAILED',
      message: 'Response has no QBXML/QBXMLMsgsRs element',
      source: 'qbxml',
    });
  }

  const messages: ResponseMessage[] = [];
  for (const [tag, value] of Object.entries(msgsRs)) {
    if (tag === '$' || !tag.endsWith('Rs')) continue;
    for (const node of toArray(value)) {
      const attrs = attributesOf(node);
      const remaining = attrs['iteratorRemainingCount'];
      messages.push({
        tag,
        statusCode: attrs['statusCode'] ?? '',
        statusSeverity: attrs['statusSeverity'] ?? '',
        statusMessage: attrs['statusMessage'] ?? '',
        requestID: attrs['requestID'],
        iteratorID: attrs['iteratorID'] || undefined,
        iteratorRemainingCount: remaining !== undefined ? Number.parseInt(remaining, 10) || 0 : undefined,
        node,
      });
    }
  }
  return messages;
}

/** Status 0 is success; status 1 means a query matched nothing */
export function isSuccessStatus(message: ResponseMessage): boolean {
  return message.statusCode === '0' || message.statusCode === '1';
}
