import { resolve } from 'node:path';
import { silentLogger, type Logger } from '@ledgerlink/core';
import { createDefaultRegistry, type EntityRegistry, type EnvelopeOptions } from '@ledgerlink/qbxml';
import {
  CursorStore,
  FileSessionStore,
  MemorySessionStore,
  RequestBuilder,
  ResponseReconciler,
  SessionOrchestrator,
  SnapshotStore,
  type SessionStore,
} from '@ledgerlink/sync-engine';
import { createOdooIntegration, type OdooIntegration, type OdooRpc } from '@ledgerlink/connector-odoo';
import type { ConfigFile } from './config.js';
import { Metrics } from './metrics.js';
import { SoapEndpoint } from './soap-endpoint.js';
import { OperatorTools } from './tools.js';

export interface App {
  config: ConfigFile;
  registry: EntityRegistry;
  snapshots: SnapshotStore;
  sessions: SessionStore;
  cursors: CursorStore;
  builder: RequestBuilder;
  orchestrator: SessionOrchestrator;
  endpoint: SoapEndpoint;
  tools: OperatorTools;
  metrics: Metrics;
  odoo?: OdooIntegration;
}

export interface CreateAppOptions {
  logger?: Logger;
  /** Stands in for the ERP JSON-RPC endpoint */
  odooRpc?: OdooRpc;
  /** Relative storage paths resolve against this directory */
  baseDir?: string;
  clock?: () => number;
}

/**
 * Wire stores, engine and the optional ERP side from a validated config
 */
export async function createApp(config: ConfigFile, options: CreateAppOptions = {}): Promise<App> {
  const logger = options.logger ?? silentLogger();
  const baseDir = options.baseDir ?? process.cwd();
  const at = (path: string) => resolve(baseDir, path);

  const registry = createDefaultRegistry();
  const envelope: EnvelopeOptions = { version: config.connector.qbxmlVersion };
  const metrics = new Metrics(options.clock);

  const snapshots = new SnapshotStore({
    baseDir: at(config.storage.snapshotDir),
    logger: logger.child({ component: 'snapshots' }),
  });
  const sessions: SessionStore = config.storage.sessionDir
    ? new FileSessionStore(at(config.storage.sessionDir))
    : new MemorySessionStore();
  const cursors = new CursorStore(at(config.storage.cursorFile));

  let odoo: OdooIntegration | undefined;
  if (config.odoo) {
    const { crosswalkFile, fieldMappingFile, ...connection } = config.odoo;
    odoo = await createOdooIntegration(
      {
        ...connection,
        crosswalkFile: crosswalkFile ? at(crosswalkFile) : undefined,
        fieldMappingFile: fieldMappingFile ? at(fieldMappingFile) : undefined,
      },
      { logger: logger.child({ component: 'erp' }), rpc: options.odooRpc }
    );
  }

  const builder = new RequestBuilder({
    registry,
    snapshots,
    envelope,
    logger: logger.child({ component: 'request-builder' }),
  });
  const reconciler = new ResponseReconciler({
    registry,
    snapshots,
    cursors,
    propagator: config.sync.propagate ? odoo?.propagator : undefined,
    logger: logger.child({ component: 'reconciler' }),
    onCommit: (summary) => metrics.recordCommit(summary),
  });
  const orchestrator = new SessionOrchestrator({
    credentials: { username: config.connector.username, password: config.connector.password },
    registry,
    sessions,
    builder,
    reconciler,
    cursors,
    companyFile: config.connector.companyFile,
    taskTemplate: config.sync.tasks,
    sessionTtlMs: config.connector.sessionTtlMs,
    serverVersion: config.connector.serverVersion,
    logger: logger.child({ component: 'orchestrator' }),
    clock: options.clock,
  });

  const endpoint = new SoapEndpoint(orchestrator, {
    metrics,
    logger: logger.child({ component: 'soap' }),
    clock: options.clock,
  });
  const tools = new OperatorTools({
    orchestrator,
    snapshots,
    registry,
    builder,
    envelope,
    odoo,
    logger: logger.child({ component: 'tools' }),
  });

  return {
    config,
    registry,
    snapshots,
    sessions,
    cursors,
    builder,
    orchestrator,
    endpoint,
    tools,
    metrics,
    odoo,
  };
}
