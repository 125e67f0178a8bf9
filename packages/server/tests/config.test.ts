import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, configPathFrom, expandEnvVars, loadConfig, parseConfig } from '../src/index.js';

const MINIMAL = { connector: { username: 'sync', password: '${LEDGERLINK_TEST_PASSWORD}' } };

describe('expandEnvVars', () => {
  const env = { ODOO_URL: 'https://erp.test', EMPTY: '' };

  it('replaces placeholders in nested strings', () => {
    expect(
      expandEnvVars({ odoo: { url: '${ODOO_URL}/api', tags: ['${ODOO_URL}'] }, port: 8080 }, { env })
    ).toEqual({ odoo: { url: 'https://erp.test/api', tags: ['https://erp.test'] }, port: 8080 });
  });

  it('uses the default when the variable is unset or empty', () => {
    expect(expandEnvVars('${MISSING:-fallback}', { env })).toBe('fallback');
    expect(expandEnvVars('${EMPTY:-fallback}', { env })).toBe('fallback');
  });

  it('fails on a missing variable without a default', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow('Missing required environment variable: MISSING');
  });

  it('can leave missing placeholders in place', () => {
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('parseConfig', () => {
  const env = { LEDGERLINK_TEST_PASSWORD: 'test-secret' };

  it('fills in defaults', () => {
    const config = parseConfig(MINIMAL, { env });

    expect(config.connector).toEqual({
      username: 'sync',
      password: 'test-secret',
      companyFile: '',
      sessionTtlMs: 3_600_000,
      serverVersion: '',
      qbxmlVersion: '13.0',
    });
    expect(config.server.http).toEqual({
      host: '127.0.0.1',
      port: 8080,
      path: '/qbwc',
      healthPath: '/healthz',
      metricsPath: '/metrics',
      maxRequestBytes: 5_000_000,
    });
    expect(config.storage).toEqual({ snapshotDir: './.snapshots', cursorFile: './.sessions/cursor.json' });
    expect(config.sync).toEqual({ propagate: true });
    expect(config.odoo).toBeUndefined();
  });

  it('accepts a task list', () => {
    const config = parseConfig(
      { ...MINIMAL, sync: { tasks: [{ entityType: 'ItemInventory', maxReturned: 25, fullRefresh: false }] } },
      { env }
    );

    expect(config.sync.tasks).toEqual([{ entityType: 'ItemInventory', maxReturned: 25, fullRefresh: false }]);
  });

  it('rejects a full refresh over a filtered query', () => {
    expect(() =>
      parseConfig(
        {
          ...MINIMAL,
          sync: { tasks: [{ entityType: 'ItemInventory', fromModifiedDate: '2024-04-30', fullRefresh: true }] },
        },
        { env }
      )
    ).toThrow('Invalid config:\n- sync.tasks.0.fullRefresh: A filtered query cannot be a full refresh');
  });

  it('lists every issue with its path', () => {
    expect(() =>
      parseConfig(
        {
          connector: { username: 'sync' },
          sync: { tasks: [{ entityType: 'Estimate' }] },
          odoo: { url: 'not a url', database: 'erp', username: 'bot', password: 'test-secret' },
        },
        { env }
      )
    ).toThrow(
      'Invalid config:\n- connector.password: Required\n- sync.tasks.0.entityType: Unknown entity type\n- odoo.url: Invalid url'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ ...MINIMAL, extra: true }, { env })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ledgerlink-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file with a byte order mark', async () => {
    const file = join(dir, 'ledgerlink.config.json');
    writeFileSync(file, `\uFEFF${JSON.stringify(MINIMAL)}`);

    const config = await loadConfig(file, { env: { LEDGERLINK_TEST_PASSWORD: 'test-secret' } });

    expect(config.connector.password).toBe('test-secret');
  });

  it('reports malformed JSON as a config error', async () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ "connector": ');

    await expect(loadConfig(file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('accepts the example config shipped with the repository', async () => {
    const example = fileURLToPath(new URL('../../../ledgerlink.config.example.json', import.meta.url));

    const config = await loadConfig(example, {
      env: {
        LEDGERLINK_CONNECTOR_USER: 'sync',
        LEDGERLINK_CONNECTOR_PASSWORD: 'test-secret',
        ODOO_URL: 'https://erp.test',
        ODOO_DATABASE: 'erp',
        ODOO_USERNAME: 'bot',
        ODOO_PASSWORD: 'test-secret',
      },
    });

    expect(config.server.logging).toEqual({ level: 'info', format: 'json' });
    expect(config.sync.tasks?.map((task) => task.entityType)).toEqual([
      'Customer',
      'Vendor',
      'ItemInventory',
      'Invoice',
      'JournalEntry',
    ]);
    expect(config.odoo?.url).toBe('https://erp.test');
  });

  it('reports a missing file as a config error', async () => {
    await expect(loadConfig(join(dir, 'absent.json'))).rejects.toThrow('Cannot read config file');
  });
});

describe('configPathFrom', () => {
  it('defaults to the file in the working directory', () => {
    expect(configPathFrom([])).toBe('./ledgerlink.config.json');
  });

  it('takes the value after --config', () => {
    expect(configPathFrom(['--config', '/etc/ledgerlink.json'])).toBe('/etc/ledgerlink.json');
  });

  it('rejects --config without a value', () => {
    expect(() => configPathFrom(['--config'])).toThrow('--config needs a file path');
  });
});
