import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgerlink/core': pkg('core'),
      '@ledgerlink/qbxml': pkg('qbxml'),
      '@ledgerlink/sync-engine': pkg('sync-engine'),
      '@ledgerlink/connector-odoo': pkg('connector-odoo'),
      '@ledgerlink/server': pkg('server'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
