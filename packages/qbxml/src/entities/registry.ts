/**
 * Entity Registry
 *
 * Maps an entity tag to its query builder, record parser and mutation support.
 * Adding an entity type is a registration, not a new branch in the engine.
 */

import { ConnectorError } from '@ledgerlink/core';
import { customerEntity, vendorEntity } from './customer.js';
import { itemInventoryEntity } from './item-inventory.js';
import {
  billEntity,
  creditMemoEntity,
  invoiceEntity,
  journalEntryEntity,
  purchaseOrderEntity,
  receivePaymentEntity,
  salesOrderEntity,
} from './transactions.js';
import type { EntityDefinition } from './types.js';

export class EntityRegistry {
  private definitions = new Map<string, EntityDefinition>();

  /**
   * Register an entity definition
   */
  register(definition: EntityDefinition): void {
    if (this.definitions.has(definition.tag)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Entity type '${definition.tag}' is already registered`,
        source: 'qbxml',
      });
    }
    this.definitions.set(definition.tag, definition);
  }

  get(tag: string): EntityDefinition | undefined {
    return this.definitions.get(tag);
  }

  /**
   * Get a definition by tag, throw if not registered
   */
  getOrThrow(tag: string): EntityDefinition {
    const definition = this.definitions.get(tag);
    if (!definition) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Entity type '${tag}' is not registered`,
        source: 'qbxml',
        suggestion: `Registered entity types: ${this.listTags().join(', ') || 'none'}`,
      });
    }
    return definition;
  }

  listTags(): string[] {
    return Array.from(this.definitions.keys());
  }

  get size(): number {
    return this.definitions.size;
  }
}

/**
 * Registry with every entity type the connector synchronizes
 */
export function createDefaultRegistry(): EntityRegistry {
  const registry = new EntityRegistry();
  for (const definition of [
    customerEntity,
    vendorEntity,
    itemInventoryEntity,
    invoiceEntity,
    billEntity,
    receivePaymentEntity,
    creditMemoEntity,
    salesOrderEntity,
    purchaseOrderEntity,
    journalEntryEntity,
  ]) {
    registry.register(definition);
  }
  return registry;
}
