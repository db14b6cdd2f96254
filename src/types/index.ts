/**
 * Type exports shared across the server
 */

// Core domain types
export * from './core.js';

// Non-fatal result warnings
export * from './warnings.js';

// Operation parameter and result types
export * from './operations.js';

// Storage contracts
export * from './storage.js';

// Change notification
export * from './events.js';

// Workspace registry
export * from './workspace.js';

// Statistics types
export * from './stats.js';
