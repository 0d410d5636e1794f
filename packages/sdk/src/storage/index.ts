/**
 * Storage module - handles all local database operations
 * @module storage
 */

export * from './schema.js';
export * from './init.js';
export * from './lock.js';
export * from './guard.js';
export * from './record-store.js';
export * from './compression.js';
