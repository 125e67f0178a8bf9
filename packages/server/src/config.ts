import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { errorMessage, isPlainObject } from '@ledgerlink/core';
import { DEFAULT_QBXML_VERSION, isEntityTag, type EntityTag } from '@ledgerlink/qbxml';
import { isNarrowedQuery } from '@ledgerlink/sync-engine';

export const DEFAULT_CONFIG_PATH = './ledgerlink.config.json';

/**
 * Config path from the command line, `--config <path>`
 */
export function configPathFrom(args: string[]): string {
  const index = args.indexOf('--config');
  if (index === -1) return DEFAULT_CONFIG_PATH;
  const value = args[index + 1];
  if (!value || value.startsWith('--')) {
    throw new ConfigError('--config needs a file path');
  }
  return value;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options: EnvExpansionOptions): string {
  const env = options.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options: EnvExpansionOptions = {}): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const entityTagSchema = z.custom<EntityTag>((value) => typeof value === 'string' && isEntityTag(value), {
  message: 'Unknown entity type',
});

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  })
  .strict();

const httpSchema = z
  .object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8080),
    path: z.string().startsWith('/').default('/qbwc'),
    healthPath: z.string().startsWith('/').default('/healthz'),
    metricsPath: z.string().startsWith('/').default('/metrics'),
    maxRequestBytes: z.number().int().positive().default(5_000_000),
  })
  .strict();

const serverSchema = z
  .object({
    name: z.string().min(1).default('ledgerlink'),
    version: z.string().min(1).default('0.1.0'),
    http: httpSchema.default({}),
    logging: loggingSchema.default({}),
    mcp: z.boolean().default(false),
  })
  .strict();

const connectorSchema = z
  .object({
    username: z.string().min(1),
    password: z.string().min(1),
    companyFile: z.string().default(''),
    sessionTtlMs: z.number().int().positive().default(3_600_000),
    serverVersion: z.string().default(''),
    qbxmlVersion: z
      .string()
      .regex(/^\d+\.\d+$/, 'Expected major.minor')
      .default(DEFAULT_QBXML_VERSION),
  })
  .strict();

const storageSchema = z
  .object({
    snapshotDir: z.string().min(1).default('./.snapshots'),
    /** Omitted: sessions live in memory and do not survive a restart */
    sessionDir: z.string().min(1).optional(),
    cursorFile: z.string().min(1).default('./.sessions/cursor.json'),
  })
  .strict();

const taskSchema = z
  .object({
    entityType: entityTagSchema,
    fullRefresh: z.boolean().optional(),
    maxReturned: z.number().int().positive().optional(),
    activeStatus: z.enum(['ActiveOnly', 'InactiveOnly', 'All']).optional(),
    fromModifiedDate: z.string().optional(),
    toModifiedDate: z.string().optional(),
    fromTxnDate: z.string().optional(),
    toTxnDate: z.string().optional(),
    includeLineItems: z.boolean().optional(),
    nameStartsWith: z.string().optional(),
  })
  .strict()
  .refine((task) => !(task.fullRefresh === true && isNarrowedQuery(task)), {
    message: 'A filtered query cannot be a full refresh',
    path: ['fullRefresh'],
  });

const syncSchema = z
  .object({
    /** Omitted: the built-in task list */
    tasks: z.array(taskSchema).optional(),
    propagate: z.boolean().default(true),
  })
  .strict();

const odooSchema = z
  .object({
    url: z.string().url(),
    database: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    timeoutMs: z.number().int().positive().optional(),
    externalRefFields: z
      .object({
        partner: z.string().min(1).optional(),
        product: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    journalName: z.string().min(1).optional(),
    crosswalkFile: z.string().min(1).optional(),
    fieldMappingFile: z.string().min(1).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    server: serverSchema.default({}),
    connector: connectorSchema,
    storage: storageSchema.default({}),
    sync: syncSchema.default({}),
    odoo: odooSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type HttpConfig = z.infer<typeof httpSchema>;
export type OdooConfig = z.infer<typeof odooSchema>;

export function formatZodError(err: z.ZodError, label = 'config'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid ${label}:\n${issues}`;
}

/**
 * Validate an already parsed document, expanding environment placeholders first
 */
export function parseConfig(raw: unknown, options: EnvExpansionOptions = {}, label = 'config'): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, label));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options: EnvExpansionOptions = {}): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(err)}`);
  }

  // Editors on Windows like to prepend a byte order mark
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseConfig(parsed, options, absolutePath);
}
