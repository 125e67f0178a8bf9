/**
 * @ledgerlink/core
 *
 * Record types, errors, logging and validation shared by every ledgerlink package
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
