import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDefaultRegistry } from '@ledgerlink/qbxml';
import {
  CursorStore,
  MemorySessionStore,
  RequestBuilder,
  ResponseReconciler,
  SessionOrchestrator,
  SnapshotStore,
  type CloudPropagator,
  type TaskTemplateEntry,
} from '../src/index.js';

export const START = Date.parse('2024-05-01T08:00:00Z');

export interface ItemFixture {
  id: string;
  name: string;
  editSequence?: string;
  salesPrice?: string;
}

export function itemRet(item: ItemFixture): string {
  return [
    '<ItemInventoryRet>',
    `<ListID>${item.id}</ListID>`,
    item.editSequence ? `<EditSequence>${item.editSequence}</EditSequence>` : '',
    `<Name>${item.name}</Name>`,
    '<IsActive>true</IsActive>',
    item.salesPrice ? `<SalesPrice>${item.salesPrice}</SalesPrice>` : '',
    '</ItemInventoryRet>',
  ].join('');
}

export function queryPage(
  tag: string,
  rets: string[],
  options: { iteratorID?: string; remaining?: number; statusCode?: string; statusMessage?: string } = {}
): string {
  const attrs = [
    'requestID="1"',
    `statusCode="${options.statusCode ?? '0'}"`,
    `statusSeverity="${options.statusCode && options.statusCode !== '0' ? 'Error' : 'Info'}"`,
    `statusMessage="${options.statusMessage ?? 'Status OK'}"`,
  ];
  if (options.iteratorID) attrs.push(`iteratorID="${options.iteratorID}"`);
  if (options.remaining !== undefined) attrs.push(`iteratorRemainingCount="${options.remaining}"`);
  return `<?xml version="1.0" ?><QBXML><QBXMLMsgsRs><${tag}QueryRs ${attrs.join(' ')}>${rets.join('')}</${tag}QueryRs></QBXMLMsgsRs></QBXML>`;
}

export function mutationResponse(rsTag: string, ret: string, statusCode = '0', statusMessage = 'Status OK'): string {
  const severity = statusCode === '0' ? 'Info' : 'Error';
  return `<QBXML><QBXMLMsgsRs><${rsTag} requestID="1.1" statusCode="${statusCode}" statusSeverity="${severity}" statusMessage="${statusMessage}">${ret}</${rsTag}></QBXMLMsgsRs></QBXML>`;
}

export interface Harness {
  dir: string;
  now: { value: number };
  registry: ReturnType<typeof createDefaultRegistry>;
  snapshots: SnapshotStore;
  sessions: MemorySessionStore;
  cursors: CursorStore;
  reconciler: ResponseReconciler;
  orchestrator: SessionOrchestrator;
  cleanup: () => void;
}

export function createHarness(
  taskTemplate: TaskTemplateEntry[] = [{ entityType: 'ItemInventory' }],
  propagator?: CloudPropagator
): Harness {
  const dir = mkdtempSync(join(tmpdir(), 'ledgerlink-sync-'));
  const now = { value: START };
  const registry = createDefaultRegistry();
  const snapshots = new SnapshotStore({ baseDir: join(dir, 'snapshots') });
  const sessions = new MemorySessionStore();
  const cursors = new CursorStore(join(dir, 'cursor.json'));
  const builder = new RequestBuilder({ registry, snapshots });
  const reconciler = new ResponseReconciler({ registry, snapshots, cursors, propagator });
  const orchestrator = new SessionOrchestrator({
    credentials: { username: 'sync', password: 'test-secret' },
    registry,
    sessions,
    builder,
    reconciler,
    cursors,
    taskTemplate,
    clock: () => now.value,
  });

  return {
    dir,
    now,
    registry,
    snapshots,
    sessions,
    cursors,
    reconciler,
    orchestrator,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export async function openSession(harness: Harness): Promise<string> {
  const [ticket] = await harness.orchestrator.authenticate('sync', 'test-secret');
  return ticket;
}
