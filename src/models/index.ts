/**
 * Centralized exports for all models
 */

// Result type
export * from './result.js';

// Outcome tags and constants
export * from './outcomes.js';

// Config file schemas
export * from './schemas.js';

// Domain model
export * from './types.js';

// Errors
export * from './errors.js';
