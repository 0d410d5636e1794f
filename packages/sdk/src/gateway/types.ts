/**
 * Gateway contract types
 * @module gateway/types
 */

import type { RemoteError } from '../errors.js';
import {
  OperationKind,
  type Operation,
  type RecordData,
  type SyncCheckpoint,
  type SyncRecord,
} from '../storage/schema.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Confirmation of a pushed operation
 */
export interface RemoteAck {
  operationId: string;
  recordId: string;
  /** Version the remote assigned to the record */
  remoteVersion: number;
  remoteUpdatedAt: number;
}

/**
 * A change pulled from the remote
 */
export interface RemoteChange {
  recordId: string;
  kind: OperationKind;
  payload: RecordData;
  remoteVersion: number;
  remoteUpdatedAt: number;
}

export interface PullBatch {
  changes: RemoteChange[];
  checkpoint: SyncCheckpoint;
  /** More changes wait behind this page */
  hasMore: boolean;
}

export interface RemoteCallOptions {
  signal?: AbortSignal;
}

/**
 * Transport to the remote store. `operationId` is the idempotency key:
 * pushing the same operation twice yields the same ack and remote state.
 */
export interface RemoteGateway {
  push(operation: Operation, options?: RemoteCallOptions): Promise<Result<RemoteAck, RemoteError>>;
  pullSince(
    checkpoint: SyncCheckpoint | null,
    options?: RemoteCallOptions
  ): Promise<Result<PullBatch, RemoteError>>;
}

/**
 * The record a remote change describes
 */
export function changeToRecord(change: RemoteChange): SyncRecord {
  return {
    id: change.recordId,
    version: change.remoteVersion,
    updatedAt: change.remoteUpdatedAt,
    deleted: change.kind === OperationKind.DELETE,
    data: change.payload,
  };
}

/**
 * The change that publishes a remote record
 */
export function recordToChange(record: SyncRecord, kind?: OperationKind): RemoteChange {
  return {
    recordId: record.id,
    kind: kind ?? (record.deleted ? OperationKind.DELETE : OperationKind.UPDATE),
    payload: record.data,
    remoteVersion: record.version,
    remoteUpdatedAt: record.updatedAt,
  };
}
