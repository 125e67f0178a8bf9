/**
 * Operator tools served over MCP: inspect sessions and snapshots, preview requests, queue item
 * changes and drive the ERP side by hand.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ConnectorError, silentLogger, type EntityRecord, type Logger } from '@ledgerlink/core';
import {
  buildRequest,
  type EntityRegistry,
  type EnvelopeOptions,
  type QueryParams,
} from '@ledgerlink/qbxml';
import {
  createTask,
  isPlaceholderKey,
  SyncError,
  type RequestBuilder,
  type SessionOrchestrator,
  type SessionSummary,
  type SnapshotStore,
  type StageResult,
} from '@ledgerlink/sync-engine';
import {
  ilike,
  pullInventory,
  type InventoryPullSummary,
  type OdooDomain,
  type OdooIntegration,
  type OdooRecord,
} from '@ledgerlink/connector-odoo';

export const PARTNER_FIELDS = ['id', 'name', 'ref', 'email', 'phone', 'customer_rank', 'supplier_rank'];
export const PRODUCT_FIELDS = ['id', 'name', 'default_code', 'list_price', 'standard_price', 'categ_id'];
const DEFAULT_LIMIT = 50;

export interface SnapshotOverview {
  entityType: string;
  version: number;
  committedAt: string | null;
  records: number;
  placeholders: number;
  localEdits: number;
}

export interface OperatorToolsOptions {
  orchestrator: SessionOrchestrator;
  snapshots: SnapshotStore;
  registry: EntityRegistry;
  builder: RequestBuilder;
  envelope?: EnvelopeOptions;
  odoo?: OdooIntegration;
  logger?: Logger;
}

export class OperatorTools {
  private readonly logger: Logger;

  constructor(private readonly options: OperatorToolsOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async syncStatus(): Promise<{ sessions: SessionSummary[]; snapshots: SnapshotOverview[] }> {
    const sessions = await this.options.orchestrator.status();
    const snapshots: SnapshotOverview[] = [];
    for (const entityType of await this.options.snapshots.list()) {
      const doc = await this.options.snapshots.load(entityType);
      const keys = Object.keys(doc.records);
      const placeholders = keys.filter(isPlaceholderKey).length;
      snapshots.push({
        entityType: doc.entityType,
        version: doc.version,
        committedAt: doc.committedAt,
        records: keys.length - placeholders,
        placeholders,
        localEdits: Object.keys(doc.localEdits).length,
      });
    }
    return { sessions, snapshots };
  }

  /**
   * One cached record with its pending edit, or the first `limit` records of the type
   */
  async snapshot(entityType: string, id?: string, limit = DEFAULT_LIMIT): Promise<Record<string, unknown>> {
    const definition = this.options.registry.getOrThrow(entityType);
    const doc = await this.options.snapshots.load(definition.tag);

    if (id !== undefined) {
      const record = doc.records[id];
      if (!record) {
        throw new SyncError({
          code: 'UNKNOWN_ENTITY',
          message: `${definition.tag} ${id} is not in the snapshot`,
          context: { entityType: definition.tag, id },
        });
      }
      return { entityType: definition.tag, id, record, localEdit: doc.localEdits[id] ?? null };
    }

    const entries = Object.entries(doc.records);
    return {
      entityType: definition.tag,
      version: doc.version,
      committedAt: doc.committedAt,
      total: entries.length,
      records: Object.fromEntries(entries.slice(0, limit)),
      localEdits: doc.localEdits,
    };
  }

  /**
   * First-page query document a fresh task for `entityType` would send
   */
  async buildQuery(entityType: string, params: QueryParams = {}): Promise<string> {
    const definition = this.options.registry.getOrThrow(entityType);
    const task = createTask({ entityType: definition.tag, ...params });
    return buildRequest([this.options.builder.queryMessage(definition, task)], this.options.envelope);
  }

  async stageItemChange(fields: EntityRecord): Promise<StageResult> {
    const definition = this.options.registry.getOrThrow('ItemInventory');
    return this.options.snapshots.stageChange(definition, fields);
  }

  async odooPartners(name?: string, limit = DEFAULT_LIMIT): Promise<OdooRecord[]> {
    const odoo = this.requireOdoo();
    const domain: OdooDomain = name ? [ilike('name', name)] : [];
    return odoo.rpc.searchRead('res.partner', domain, { fields: PARTNER_FIELDS, limit, order: 'name' });
  }

  async odooProducts(search: { name?: string; code?: string }, limit = DEFAULT_LIMIT): Promise<OdooRecord[]> {
    const odoo = this.requireOdoo();
    const domain: OdooDomain = [];
    if (search.name) domain.push(ilike('name', search.name));
    if (search.code) domain.push(ilike('default_code', search.code));
    return odoo.rpc.searchRead('product.product', domain, { fields: PRODUCT_FIELDS, limit, order: 'name' });
  }

  async pullInventory(limit?: number): Promise<InventoryPullSummary> {
    const odoo = this.requireOdoo();
    return pullInventory({
      rpc: odoo.rpc,
      snapshots: this.options.snapshots,
      definition: this.options.registry.getOrThrow('ItemInventory'),
      limit,
      logger: this.logger,
    });
  }

  async reloadCrosswalk(): Promise<{ entries: number }> {
    const odoo = this.requireOdoo();
    return { entries: await odoo.reloadCrosswalk() };
  }

  private requireOdoo(): OdooIntegration {
    if (!this.options.odoo) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: 'The ERP connection is not configured',
        source: 'odoo',
        suggestion: 'Add an "odoo" section to the config file and restart.',
      });
    }
    return this.options.odoo;
  }
}

type ToolResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

function textContent(text: string) {
  return { type: 'text' as const, text };
}

function success(data: unknown): ToolResult {
  return { content: [textContent(typeof data === 'string' ? data : JSON.stringify(data, null, 2))] };
}

function formatError(err: unknown): ToolResult {
  const message =
    err instanceof ConnectorError || err instanceof SyncError
      ? err.toActionableMessage()
      : err instanceof Error
        ? err.message
        : String(err);
  return { content: [textContent(message)], isError: true };
}

/**
 * Run a tool body, logging its outcome and turning failures into error results
 */
export async function invokeTool(tool: string, logger: Logger, body: () => Promise<unknown>): Promise<ToolResult> {
  const start = Date.now();
  try {
    const result = await body();
    logger.info('Tool invocation completed', { tool, durationMs: Date.now() - start });
    return success(result);
  } catch (err) {
    logger.error('Tool invocation failed', { tool, durationMs: Date.now() - start, error: err });
    return formatError(err);
  }
}

const limitSchema = z.number().int().positive().max(1000).optional().describe('Maximum number of records');

export function registerOperatorTools(server: McpServer, tools: OperatorTools, logger: Logger = silentLogger()): void {
  server.registerTool(
    'get_sync_status',
    {
      description: 'Live polling sessions with their task queues, and the cached snapshot of every entity type.',
      annotations: { readOnlyHint: true },
    },
    async () => invokeTool('get_sync_status', logger, () => tools.syncStatus())
  );

  server.registerTool(
    'get_snapshot',
    {
      description: 'Cached desktop records of one entity type, or a single record by its ListID/TxnID.',
      inputSchema: {
        entity_type: z.string().describe('Entity type, e.g. Customer or ItemInventory'),
        id: z.string().optional().describe('ListID or TxnID of one record'),
        limit: limitSchema,
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invokeTool('get_snapshot', logger, () => tools.snapshot(args.entity_type, args.id, args.limit))
  );

  server.registerTool(
    'build_qbxml',
    {
      description: 'Render the first-page query request a task for the entity type would send.',
      inputSchema: {
        entity_type: z.string().describe('Entity type to query'),
        max_returned: z.number().int().positive().optional(),
        from_modified_date: z.string().optional(),
        from_txn_date: z.string().optional(),
        to_txn_date: z.string().optional(),
        include_line_items: z.boolean().optional(),
        name_starts_with: z.string().optional(),
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invokeTool('build_qbxml', logger, () =>
        tools.buildQuery(args.entity_type, {
          maxReturned: args.max_returned,
          fromModifiedDate: args.from_modified_date,
          fromTxnDate: args.from_txn_date,
          toTxnDate: args.to_txn_date,
          includeLineItems: args.include_line_items,
          nameStartsWith: args.name_starts_with,
        })
      )
  );

  server.registerTool(
    'stage_item_change',
    {
      description:
        'Queue an inventory item change for the next session. With ListID it edits the cached item; without it a new item is created by Name.',
      inputSchema: {
        fields: z.record(z.string()).describe('Item fields, e.g. {"ListID": "...", "SalesPrice": "12.00"}'),
      },
    },
    async (args) => invokeTool('stage_item_change', logger, () => tools.stageItemChange(args.fields))
  );

  server.registerTool(
    'get_odoo_partners',
    {
      description: 'Search ERP partners by name.',
      inputSchema: { name: z.string().optional(), limit: limitSchema },
      annotations: { readOnlyHint: true },
    },
    async (args) => invokeTool('get_odoo_partners', logger, () => tools.odooPartners(args.name, args.limit))
  );

  server.registerTool(
    'get_odoo_products',
    {
      description: 'Search ERP products by name or internal reference.',
      inputSchema: { name: z.string().optional(), code: z.string().optional(), limit: limitSchema },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invokeTool('get_odoo_products', logger, () =>
        tools.odooProducts({ name: args.name, code: args.code }, args.limit)
      )
  );

  server.registerTool(
    'pull_odoo_inventory',
    {
      description:
        'Read ERP products and queue them against cached inventory items: edits for matched items, new items for the rest.',
      inputSchema: { limit: limitSchema },
    },
    async (args) => invokeTool('pull_odoo_inventory', logger, () => tools.pullInventory(args.limit))
  );

  server.registerTool(
    'reload_crosswalk',
    {
      description: 'Re-read the account crosswalk file and drop cached account ids.',
    },
    async () => invokeTool('reload_crosswalk', logger, () => tools.reloadCrosswalk())
  );
}
