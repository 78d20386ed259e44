/**
 * @opendata-linker/core
 *
 * Record types, handle interfaces and row validation shared by the
 * connectors and the reconciliation core
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
