export * from './response-reconciler.js';
