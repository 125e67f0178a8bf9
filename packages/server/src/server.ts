import { createServer as createHttpServer, type Server } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Logger } from '@ledgerlink/core';
import { DEFAULT_TASK_TEMPLATE } from '@ledgerlink/sync-engine';
import { createApp, type App, type CreateAppOptions } from './app.js';
import type { ConfigFile } from './config.js';
import { createHttpListener } from './soap-endpoint.js';
import { registerOperatorTools } from './tools.js';

export interface RunningServer {
  app: App;
  http: Server;
  /** Port actually bound; differs from the config when it asks for port 0 */
  port: number;
  mcp?: McpServer;
  close(): Promise<void>;
}

export function createHttpServerFor(app: App, logger: Logger): Server {
  return createHttpServer(
    createHttpListener({
      endpoint: app.endpoint,
      orchestrator: app.orchestrator,
      http: app.config.server.http,
      name: app.config.server.name,
      version: app.config.server.version,
      metrics: app.metrics,
      logger,
    })
  );
}

/**
 * Start the connector endpoint, and the operator tools over stdio when enabled
 */
export async function startServer(
  config: ConfigFile,
  logger: Logger,
  options: Omit<CreateAppOptions, 'logger'> = {}
): Promise<RunningServer> {
  const app = await createApp(config, { ...options, logger });
  const { host, port, path, healthPath, metricsPath } = config.server.http;

  const http = createHttpServerFor(app, logger.child({ component: 'http' }));
  await new Promise<void>((resolve, reject) => {
    http.once('error', reject);
    http.listen(port, host, () => resolve());
  });
  const address = http.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;

  let mcp: McpServer | undefined;
  if (config.server.mcp) {
    mcp = new McpServer({ name: config.server.name, version: config.server.version });
    registerOperatorTools(mcp, app.tools, logger.child({ component: 'mcp' }));
    await mcp.connect(new StdioServerTransport());
  }

  const base = `http://${host}:${boundPort}`;
  logger.info('Server started', {
    name: config.server.name,
    version: config.server.version,
    endpoint: `${base}${path}`,
    metrics: `${base}${metricsPath}`,
    health: `${base}${healthPath}`,
    mcp: config.server.mcp ? 'stdio' : undefined,
    erp: app.odoo ? config.odoo?.url : undefined,
    tasks: (config.sync.tasks ?? DEFAULT_TASK_TEMPLATE).map((task) => task.entityType),
  });

  return {
    app,
    http,
    port: boundPort,
    mcp,
    async close() {
      const closed = new Promise<void>((resolve, reject) => http.close((err) => (err ? reject(err) : resolve())));
      http.closeAllConnections();
      await closed;
      await mcp?.close();
    },
  };
}

/**
 * Run until SIGINT or SIGTERM
 */
export async function runServer(config: ConfigFile, logger: Logger): Promise<void> {
  const server = await startServer(config, logger);

  const shutdown = async (signal: string) => {
    try {
      await server.close();
      logger.info('Shutdown complete', { signal });
    } catch (err) {
      logger.error('Shutdown failed', { signal, error: err });
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
