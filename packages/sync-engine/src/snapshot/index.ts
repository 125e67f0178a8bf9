export * from './snapshot-store.js';
