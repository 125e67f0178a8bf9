/**
 * @ledgerlink/sync-engine
 *
 * Polling session state machine, snapshot cache, diff engine and response reconciler
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Storage primitives
export * from './storage/index.js';

// Stores
export * from './snapshot/index.js';
export * from './session/index.js';

// Diff, build, reconcile
export * from './diff/index.js';
export * from './request/index.js';
export * from './reconcile/index.js';

// Orchestration
export * from './orchestrator/index.js';
