/**
 * tidesync SDK
 *
 * An offline-first sync engine: the application reads and writes a local
 * store at all times while changes reach the remote store in the background.
 *
 * @packageDocumentation
 */

// Errors and logging
export * from './errors.js';
export * from './logger.js';

// Storage
export * from './storage/index.js';

// Outbox
export * from './outbox/index.js';

// Remote gateway
export * from './gateway/index.js';

// Conflict resolution
export * from './resolver/index.js';

// Network
export * from './network/index.js';

// Sync
export * from './sync/index.js';

// Repository
export * from './repository/index.js';

// Client
export * from './client/index.js';

// Version
export const VERSION = '0.1.0' as const;
