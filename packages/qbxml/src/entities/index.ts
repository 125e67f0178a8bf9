export * from './types.js';
export * from './fields.js';
export * from './query.js';
export * from './customer.js';
export * from './item-inventory.js';
export * from './transactions.js';
export * from './registry.js';
