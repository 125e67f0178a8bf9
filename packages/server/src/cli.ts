#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   ledgerlink [--config ./ledgerlink.config.json]
 */

import { Logger } from '@ledgerlink/core';
import { configPathFrom, loadConfig } from './config.js';
import { runServer } from './server.js';

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.error('Usage: ledgerlink [--config <ledgerlink.config.json>]');
    console.error('');
    console.error('Secrets may be written as ${ENV_VAR} or ${ENV_VAR:-default} in the config file.');
    return;
  }

  try {
    const config = await loadConfig(configPathFrom(args));
    logger = new Logger({
      level: config.server.logging.level,
      format: config.server.logging.format,
    });
    await runServer(config, logger);
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
