import { silentLogger, type Logger } from '@ledgerlink/core';
import { AccountResolver } from './accounts.js';
import { OdooClient, type OdooClientConfig, type OdooRpc } from './client.js';
import { AccountCrosswalk } from './crosswalk.js';
import { FieldMapping } from './field-mapping.js';
import { OdooPropagator } from './propagator.js';
import { ReferenceResolver } from './reference-resolver.js';
import { OdooUpserter, type ExternalRefFields } from './upserter.js';

export interface OdooIntegrationConfig extends OdooClientConfig {
  externalRefFields?: Partial<ExternalRefFields>;
  journalName?: string;
  crosswalkFile?: string;
  fieldMappingFile?: string;
}

/** Everything the server wires against one ERP database */
export interface OdooIntegration {
  rpc: OdooRpc;
  crosswalk: AccountCrosswalk;
  mapping: FieldMapping;
  resolver: ReferenceResolver;
  upserter: OdooUpserter;
  accounts: AccountResolver;
  propagator: OdooPropagator;
  /** Re-read the crosswalk and drop cached account ids */
  reloadCrosswalk(): Promise<number>;
}

/**
 * Build the ERP side from configuration. Pass `rpc` to run against something other than the
 * JSON-RPC endpoint.
 */
export async function createOdooIntegration(
  config: OdooIntegrationConfig,
  options: { logger?: Logger; rpc?: OdooRpc } = {}
): Promise<OdooIntegration> {
  const logger = options.logger ?? silentLogger();
  const rpc = options.rpc ?? new OdooClient({ ...config, logger: logger.child({ component: 'odoo' }) });

  const crosswalk = new AccountCrosswalk(config.crosswalkFile, { logger });
  await crosswalk.reload();
  const mapping = await FieldMapping.load(config.fieldMappingFile, logger);

  const resolver = new ReferenceResolver(rpc, { logger });
  const upserter = new OdooUpserter(rpc, { externalRefFields: config.externalRefFields, logger });
  const accounts = new AccountResolver(rpc, crosswalk, { logger });
  const propagator = new OdooPropagator({
    rpc,
    upserter,
    resolver,
    accounts,
    mapping,
    journalName: config.journalName,
    logger,
  });

  return {
    rpc,
    crosswalk,
    mapping,
    resolver,
    upserter,
    accounts,
    propagator,
    async reloadCrosswalk() {
      const count = await crosswalk.reload();
      accounts.reset();
      return count;
    },
  };
}
