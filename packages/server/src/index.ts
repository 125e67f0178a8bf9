/**
 * @ledgerlink/server
 *
 * Configuration, the polling connector's HTTP endpoint, metrics and operator tools
 */

export * from './config.js';
export * from './metrics.js';
export * from './soap-endpoint.js';
export * from './tools.js';
export * from './app.js';
export * from './server.js';
