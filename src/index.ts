/**
 * mediasync - session synchronization for media-server clients
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Session models
export * from './models/index.js';

// Timing and locking helpers
export * from './utils/index.js';

// REST transport
export * from './transport/index.js';

// Push connection
export * from './push/index.js';

// Content cache and cached browsing
export * from './storage/index.js';

// Event dispatch
export * from './events/index.js';

// Coordinator and engine factory
export * from './sync/index.js';

// Config
export * from './config/index.js';

// CLI
export * from './cli/index.js';

export { VERSION } from './version.js';
