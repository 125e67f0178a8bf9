/**
 * Odoo JSON-RPC Client
 *
 * Low-level client for Odoo's JSON-RPC API. Logs in lazily, and logs in again once when a call
 * fails because the session expired or access was denied.
 */

import { z } from 'zod';
import { ConnectorError, errorMessage, silentLogger, type Logger } from '@ledgerlink/core';
import type { OdooDomain } from './domain.js';

export interface OdooClientConfig {
  /** Odoo server URL (e.g., https://erp.example.test) */
  url: string;
  /** Database name */
  database: string;
  /** Username (email) */
  username: string;
  /** Password or API key */
  password: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

export type OdooRecord = Record<string, unknown>;

export interface SearchOptions {
  fields?: string[];
  offset?: number;
  limit?: number;
  order?: string;
}

/**
 * The calls the upsert layer, resolver and propagator make. Tests substitute an in-process fake.
 */
export interface OdooRpc {
  searchRead(model: string, domain: OdooDomain, options?: SearchOptions): Promise<OdooRecord[]>;
  create(model: string, values: OdooRecord): Promise<number>;
  write(model: string, ids: number[], values: OdooRecord): Promise<boolean>;
}

interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: 'call';
  params: {
    service: 'common' | 'object';
    method: string;
    args: unknown[];
  };
  id: number;
}

const jsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z
        .object({
          name: z.string().optional(),
          debug: z.string().optional(),
          message: z.string().optional(),
        })
        .passthrough()
        .optional(),
    })
    .optional(),
});

type JsonRpcError = NonNullable<z.infer<typeof jsonRpcResponseSchema>['error']>;

const recordsSchema = z.array(z.record(z.unknown()));
const idSchema = z.number().int();
const uidSchema = z.union([z.number().int(), z.literal(false)]);

const RELOGIN_CODES = new Set(['SESSION_EXPIRED', 'AUTHENTICATION_FAILED']);

/**
 * Classify a JSON-RPC fault. Expired sessions and denied access are worth one fresh login;
 * anything else is a plain RPC fault.
 */
export function classifyFault(error: JsonRpcError): ConnectorError {
  const detail = error.data?.message || error.message;
  const haystack = `${error.data?.name ?? ''} ${error.message} ${detail}`;

  if (error.code === 100 || /session expired/i.test(haystack)) {
    return new ConnectorError({
      code: 'SESSION_EXPIRED',
      message: `Odoo session expired: ${detail}`,
      source: 'odoo',
      context: { odooError: error },
    });
  }

  if (/AccessDenied|Access Denied/.test(haystack)) {
    return new ConnectorError({
      code: 'AUTHENTICATION_FAILED',
      message: `Odoo denied access: ${detail}`,
      source: 'odoo',
      suggestion: 'Check the Odoo username and password or API key.',
      context: { odooError: error },
    });
  }

  return new ConnectorError({
    code: 'RPC_FAULT',
    message: `Odoo error: ${detail}`,
    source: 'odoo',
    context: { odooError: error },
  });
}

export class OdooClient implements OdooRpc {
  private readonly config: OdooClientConfig;
  private readonly logger: Logger;
  private uid: number | null = null;
  private requestId = 0;

  constructor(config: OdooClientConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger();
  }

  /**
   * Authenticate and get user ID
   */
  async authenticate(): Promise<number> {
    const raw = await this.jsonRpc({
      service: 'common',
      method: 'authenticate',
      args: [this.config.database, this.config.username, this.config.password, {}],
    });

    const response = uidSchema.safeParse(raw);
    if (!response.success || response.data === false) {
      throw new ConnectorError({
        code: 'AUTHENTICATION_FAILED',
        message: 'Odoo authentication failed',
        source: 'odoo',
        suggestion: 'Check database name, username, and password/API key.',
      });
    }

    this.uid = response.data;
    this.logger.debug('Odoo login succeeded', { database: this.config.database, uid: this.uid });
    return response.data;
  }

  /**
   * Execute a method on an Odoo model. A session or access fault drops the cached uid and the
   * call is retried once after a fresh login.
   */
  async execute(
    model: string,
    method: string,
    args: unknown[] = [],
    kwargs: Record<string, unknown> = {}
  ): Promise<unknown> {
    try {
      return await this.executeOnce(model, method, args, kwargs);
    } catch (err) {
      if (!(err instanceof ConnectorError) || !RELOGIN_CODES.has(err.code)) throw err;
      this.logger.warn('Odoo call rejected, logging in again', {
        model,
        method,
        code: err.code,
        error: err.message,
      });
      this.uid = null;
      return this.executeOnce(model, method, args, kwargs);
    }
  }

  /**
   * Search and read in one call (most efficient)
   */
  async searchRead(model: string, domain: OdooDomain = [], options: SearchOptions = {}): Promise<OdooRecord[]> {
    const raw = await this.execute(model, 'search_read', [domain], { ...options });
    return this.parse(recordsSchema, raw, model, 'search_read');
  }

  async create(model: string, values: OdooRecord): Promise<number> {
    return this.parse(idSchema, await this.execute(model, 'create', [values]), model, 'create');
  }

  async write(model: string, ids: number[], values: OdooRecord): Promise<boolean> {
    return this.parse(z.boolean(), await this.execute(model, 'write', [ids, values]), model, 'write');
  }

  private async executeOnce(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown>
  ): Promise<unknown> {
    const uid = this.uid ?? (await this.authenticate());
    return this.jsonRpc({
      service: 'object',
      method: 'execute_kw',
      args: [this.config.database, uid, this.config.password, model, method, args, kwargs],
    });
  }

  private parse<T extends z.ZodTypeAny>(schema: T, raw: unknown, model: string, method: string): z.infer<T> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'RPC_FAULT',
        message: `Unexpected result from ${model}.${method}`,
        source: 'odoo',
        context: { issues: parsed.error.issues },
      });
    }
    return parsed.data;
  }

  /**
   * Make a JSON-RPC request
   */
  private async jsonRpc(params: JsonRpcRequest['params']): Promise<unknown> {
    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      method: 'call',
      params,
      id: ++this.requestId,
    };

    const endpoint = `${this.config.url.replace(/\/+$/, '')}/jsonrpc`;
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `Odoo request timed out after ${timeoutMs}ms`,
          source: 'odoo',
          suggestion: 'Increase timeoutMs or check network connectivity.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to Odoo server: ${errorMessage(err)}`,
        source: 'odoo',
        suggestion: 'Check the Odoo server URL and network connectivity.',
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `HTTP ${response.status}: ${response.statusText}`,
        source: 'odoo',
        suggestion: 'Check the Odoo server URL and network connectivity.',
      });
    }

    const body = jsonRpcResponseSchema.safeParse(await response.json());
    if (!body.success) {
      throw new ConnectorError({
        code: 'RPC_FAULT',
        message: 'Odoo returned a malformed JSON-RPC response',
        source: 'odoo',
      });
    }

    if (body.data.error) {
      throw classifyFault(body.data.error);
    }

    return body.data.result;
  }
}
