/**
 * @ledgerlink/connector-odoo
 *
 * Odoo JSON-RPC client, reference resolver, idempotent upsert layer and cloud propagation
 */

export { OdooClient, classifyFault } from './client.js';
export type { OdooClientConfig, OdooRecord, OdooRpc, SearchOptions } from './client.js';
export * from './domain.js';
export * from './reference-resolver.js';
export * from './upserter.js';
export * from './crosswalk.js';
export * from './field-mapping.js';
export * from './accounts.js';
export * from './propagator.js';
export * from './inventory-pull.js';
export * from './integration.js';
