import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { OdooRpc } from '@ledgerlink/connector-odoo';
import { createApp, parseConfig, type App } from '../src/index.js';

export function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** SOAP request body for one connector operation */
export function soapCall(method: string, args: Record<string, string> = {}): string {
  const params = Object.entries(args)
    .map(([name, value]) => `<${name}>${escapeXml(value)}</${name}>`)
    .join('');
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">',
    `<soap:Body><${method} xmlns="http://developer.intuit.com/">${params}</${method}></soap:Body>`,
    '</soap:Envelope>',
  ].join('');
}

export const WIDGET_PAGE = [
  '<?xml version="1.0" ?><QBXML><QBXMLMsgsRs>',
  '<ItemInventoryQueryRs requestID="1" statusCode="0" statusSeverity="Info" statusMessage="Status OK">',
  '<ItemInventoryRet><ListID>80000010-1</ListID><EditSequence>1001</EditSequence><Name>Widget</Name>',
  '<IsActive>true</IsActive><SalesPrice>12.50</SalesPrice></ItemInventoryRet>',
  '</ItemInventoryQueryRs></QBXMLMsgsRs></QBXML>',
].join('');

export function ticketOf(authenticateReply: string): string {
  return /<string>([0-9a-f-]{36})<\/string>/.exec(authenticateReply)?.[1] ?? '';
}

export interface TestApp {
  app: App;
  dir: string;
  cleanup(): void;
}

export async function createTestApp(
  overrides: Record<string, unknown> = {},
  options: { odooRpc?: OdooRpc } = {}
): Promise<TestApp> {
  const dir = mkdtempSync(join(tmpdir(), 'ledgerlink-server-'));
  const config = parseConfig(
    {
      connector: {
        username: 'sync',
        password: 'test-secret',
        companyFile: 'company.qbw',
        serverVersion: '1.0.0',
      },
      sync: { tasks: [{ entityType: 'ItemInventory' }] },
      ...overrides,
    },
    { env: {} }
  );
  const app = await createApp(config, { baseDir: dir, odooRpc: options.odooRpc });
  return { app, dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
