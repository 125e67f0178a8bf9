/**
 * SOAP codec for the desktop polling connector.
 *
 * The connector calls eight operations in the `http://developer.intuit.com/` namespace. Calls are
 * decoded into a tagged union; results are encoded as `<{op}Response><{op}Result>` documents.
 */

import { Builder } from 'xml2js';
import { ConnectorError, isPlainObject } from '@ledgerlink/core';
import { childOf, parseDocumentStrippingPrefixes, textOf, type XmlElement, type XmlNode } from './document.js';

export const CONNECTOR_NAMESPACE = 'http://developer.intuit.com/';
const SOAP_NAMESPACE = 'http://schemas.xmlsoap.org/soap/envelope/';

export type SoapCall =
  | { method: 'authenticate'; strUserName: string; strPassword: string }
  | {
      method: 'sendRequestXML';
      ticket: string;
      strHCPResponse: string;
      strCompanyFileName: string;
      qbXMLCountry: string;
      qbXMLMajorVers: string;
      qbXMLMinorVers: string;
    }
  | { method: 'receiveResponseXML'; ticket: string; response: string; hresult: string; message: string }
  | { method: 'getLastError'; ticket: string }
  | { method: 'connectionError'; ticket: string; hresult: string; message: string }
  | { method: 'closeConnection'; ticket: string }
  | { method: 'serverVersion' }
  | { method: 'clientVersion'; strVersion: string };

export type SoapMethod = SoapCall['method'];

/** What an operation returns: a string, a string array (authenticate) or an int (progress) */
export type SoapResult = string | string[] | number;

export const SOAP_METHODS: readonly SoapMethod[] = [
  'authenticate',
  'sendRequestXML',
  'receiveResponseXML',
  'getLastError',
  'connectionError',
  'closeConnection',
  'serverVersion',
  'clientVersion',
];

function isSoapMethod(name: string): name is SoapMethod {
  return SOAP_METHODS.some((m) => m === name);
}

/**
 * Decode a SOAP request body into the call it carries
 */
export async function parseSoapCall(xml: string): Promise<SoapCall> {
  const root = await parseDocumentStrippingPrefixes(xml);
  const body = childOf(childOf(root, 'Envelope'), 'Body');
  if (!isPlainObject(body)) {
    throw new ConnectorError({
      code: 'PARSE_FAILED',
      message: 'SOAP request has no Envelope/Body element',
      source: 'soap',
    });
  }

  const operation = Object.keys(body).find((key) => key !== '$');
  if (operation === undefined || !isSoapMethod(operation)) {
    throw new ConnectorError({
      code: 'NOT_FOUND',
      message: `Unknown SOAP operation: ${operation ?? '(none)'}`,
      source: 'soap',
    });
  }

  const args = body[operation];
  const arg = (name: string): string => textOf(childOf(args, name)) ?? '';

  switch (operation) {
    case 'authenticate':
      return { method: operation, strUserName: arg('strUserName'), strPassword: arg('strPassword') };
    case 'sendRequestXML':
      return {
        method: operation,
        ticket: arg('ticket'),
        strHCPResponse: arg('strHCPResponse'),
        strCompanyFileName: arg('strCompanyFileName'),
        qbXMLCountry: arg('qbXMLCountry'),
        qbXMLMajorVers: arg('qbXMLMajorVers'),
        qbXMLMinorVers: arg('qbXMLMinorVers'),
      };
    case 'receiveResponseXML':
      return {
        method: operation,
        ticket: arg('ticket'),
        response: arg('response'),
        hresult: arg('hresult'),
        message: arg('message'),
      };
    case 'connectionError':
      return { method: operation, ticket: arg('ticket'), hresult: arg('hresult'), message: arg('message') };
    case 'getLastError':
    case 'closeConnection':
      return { method: operation, ticket: arg('ticket') };
    case 'serverVersion':
      return { method: operation };
    case 'clientVersion':
      return { method: operation, strVersion: arg('strVersion') };
  }
}

function envelope(body: XmlElement): string {
  const builder = new Builder({
    xmldec: { version: '1.0', encoding: 'utf-8' },
    renderOpts: { pretty: false },
  });
  return builder.buildObject({
    'soap:Envelope': {
      $: { 'xmlns:soap': SOAP_NAMESPACE },
      'soap:Body': body,
    },
  });
}

/**
 * Encode an operation result
 */
export function renderSoapResponse(method: SoapMethod, result: SoapResult): string {
  const value: XmlNode = Array.isArray(result) ? { string: result } : String(result);
  const response: XmlElement = { $: { xmlns: CONNECTOR_NAMESPACE } };
  response[`${method}Result`] = value;
  const body: XmlElement = {};
  body[`${method}Response`] = response;
  return envelope(body);
}

/**
 * Encode a SOAP fault (client-side error: malformed envelope, unknown operation)
 */
export function renderSoapFault(message: string, faultCode = 'soap:Client'): string {
  return envelope({
    'soap:Fault': {
      faultcode: faultCode,
      faultstring: message,
    },
  });
}
