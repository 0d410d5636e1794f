/**
 * Remote gateway - the boundary to the authoritative remote store
 * @module gateway
 */

export * from './types.js';
export { applyRemoteOperation, type RemoteApplyOutcome } from './rules.js';
export * from './wire.js';
export * from './memory.js';
export * from './http.js';
