export * from './types.js';
export * from './party.js';
export * from './item.js';
export * from './transaction.js';
