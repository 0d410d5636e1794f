/**
 * Data schema definitions for the sync engine
 * @module storage/schema
 */

import type { RxJsonSchema } from 'rxdb';

/**
 * Entity fields of a record
 */
export type RecordData = Record<string, unknown>;

/**
 * A domain record as the engine sees it
 */
export interface SyncRecord {
  id: string;
  /** Last server-confirmed revision; never decreases */
  version: number;
  /** Wall-clock time (ms) of the last write */
  updatedAt: number;
  /** Local tombstone awaiting a confirmed remote delete */
  deleted: boolean;
  data: RecordData;
}

/**
 * Per-record synchronization state
 */
export enum SyncState {
  CLEAN = 'clean',
  PENDING_CREATE = 'pending_create',
  PENDING_UPDATE = 'pending_update',
  PENDING_DELETE = 'pending_delete',
  CONFLICTED = 'conflicted',
}

/**
 * A record together with its sync metadata
 */
export interface StoredRecord extends SyncRecord {
  syncState: SyncState;
  /** Time of the last confirmed push or applied pull, 0 if never */
  lastSyncedAt: number;
}

/**
 * Mutation kinds queued in the operation log
 */
export enum OperationKind {
  CREATE = 'CREATE',
  UPDATE = 'UPDATE',
  DELETE = 'DELETE',
}

/**
 * Operation lifecycle in the log
 */
export enum OperationStatus {
  PENDING = 'pending',
  IN_FLIGHT = 'in_flight',
  DEAD = 'dead',
}

/**
 * A pending mutation awaiting propagation to the remote store
 */
export interface Operation {
  /** Unique id, also the remote idempotency key */
  operationId: string;
  recordId: string;
  kind: OperationKind;
  payload: RecordData;
  /** Remote version the mutation was made against */
  baseVersion: number;
  /** Record timestamp carried to the remote for last-write-wins */
  updatedAt: number;
  enqueuedAt: number;
  attemptCount: number;
  lastError: string | null;
  status: OperationStatus;
}

/**
 * Opaque cursor marking how far remote changes have been pulled
 */
export type SyncCheckpoint = string;

/**
 * Largest timestamp an index accepts
 */
const MAX_TIMESTAMP = 8_640_000_000_000_000;

export interface RecordDocType {
  id: string;
  version: number;
  updatedAt: number;
  /** `SyncRecord.deleted`; RxDocument already owns `deleted` */
  tombstone: boolean;
  data: RecordData;
  syncState: SyncState;
  lastSyncedAt: number;
}

export interface OperationDocType {
  id: string;
  recordId: string;
  kind: OperationKind;
  payload: RecordData;
  baseVersion: number;
  updatedAt: number;
  enqueuedAt: number;
  attemptCount: number;
  lastError: string;
  status: OperationStatus;
}

export interface SyncMetadataDocType {
  id: string;
  checkpoint: string;
  lastSyncAt: number;
}

/**
 * Record schema - domain records plus their sync state
 */
export const recordSchema: RxJsonSchema<RecordDocType> = {
  title: 'record',
  version: 0,
  description: 'A locally stored domain record with sync metadata',
  type: 'object',
  primaryKey: 'id',
  properties: {
    id: {
      type: 'string',
      maxLength: 128,
    },
    version: {
      type: 'integer',
      minimum: 0,
    },
    updatedAt: {
      type: 'number',
      minimum: 0,
    },
    tombstone: {
      type: 'boolean',
    },
    data: {
      type: 'object',
      additionalProperties: true,
    },
    syncState: {
      type: 'string',
      enum: Object.values(SyncState),
      maxLength: 32,
    },
    lastSyncedAt: {
      type: 'number',
      minimum: 0,
    },
  },
  required: ['id', 'version', 'updatedAt', 'tombstone', 'data', 'syncState', 'lastSyncedAt'],
  indexes: ['syncState'],
};

/**
 * Operation schema - the durable outbox
 */
export const operationSchema: RxJsonSchema<OperationDocType> = {
  title: 'outbox_operation',
  version: 0,
  description: 'Pending mutation to be pushed to the remote store',
  type: 'object',
  primaryKey: 'id',
  properties: {
    id: {
      type: 'string',
      maxLength: 128,
    },
    recordId: {
      type: 'string',
      maxLength: 128,
    },
    kind: {
      type: 'string',
      enum: Object.values(OperationKind),
    },
    payload: {
      type: 'object',
      additionalProperties: true,
    },
    baseVersion: {
      type: 'integer',
      minimum: 0,
    },
    updatedAt: {
      type: 'number',
      minimum: 0,
    },
    enqueuedAt: {
      type: 'number',
      minimum: 0,
      maximum: MAX_TIMESTAMP,
      multipleOf: 1,
    },
    attemptCount: {
      type: 'integer',
      minimum: 0,
    },
    lastError: {
      type: 'string',
    },
    status: {
      type: 'string',
      enum: Object.values(OperationStatus),
      maxLength: 16,
    },
  },
  required: [
    'id',
    'recordId',
    'kind',
    'payload',
    'baseVersion',
    'updatedAt',
    'enqueuedAt',
    'attemptCount',
    'lastError',
    'status',
  ],
  indexes: ['recordId', ['status', 'enqueuedAt']],
};

/**
 * Sync metadata schema - the persisted checkpoint
 */
export const syncMetadataSchema: RxJsonSchema<SyncMetadataDocType> = {
  title: 'sync_metadata',
  version: 0,
  description: 'Synchronization checkpoint metadata',
  type: 'object',
  primaryKey: 'id',
  properties: {
    id: {
      type: 'string',
      maxLength: 64,
    },
    checkpoint: {
      type: 'string',
    },
    lastSyncAt: {
      type: 'number',
      minimum: 0,
    },
  },
  required: ['id', 'checkpoint', 'lastSyncAt'],
};

/**
 * Collection definitions for RxDB
 */
export const collections = {
  records: { schema: recordSchema },
  outbox_operations: { schema: operationSchema },
  sync_metadata: { schema: syncMetadataSchema },
};
