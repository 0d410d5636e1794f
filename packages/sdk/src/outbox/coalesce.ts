/**
 * Net-effect merging of queued mutations for one record
 * @module outbox/coalesce
 */

import {
  OperationKind,
  OperationStatus,
  SyncState,
  type Operation,
  type RecordData,
} from '../storage/schema.js';

/**
 * A mutation as accepted from the repository, before it gets an id
 */
export interface OperationInput {
  recordId: string;
  kind: OperationKind;
  payload: RecordData;
  baseVersion: number;
  updatedAt: number;
}

/**
 * Whether an operation may already have reached the remote store
 */
export function wasAttempted(operation: Operation): boolean {
  return operation.attemptCount > 0 || operation.lastError !== null;
}

/**
 * Kind of the operation left after `newer` follows `older`, or null when the
 * two cancel out.
 */
export function coalesceKinds(older: Operation, newer: OperationKind): OperationKind | null {
  switch (newer) {
    case OperationKind.DELETE:
      if (older.kind === OperationKind.CREATE) {
        // An attempted create may exist remotely, so it still needs a delete
        return wasAttempted(older) ? OperationKind.DELETE : null;
      }
      return OperationKind.DELETE;

    case OperationKind.UPDATE:
      return older.kind === OperationKind.CREATE ? OperationKind.CREATE : OperationKind.UPDATE;

    case OperationKind.CREATE:
      return older.kind === OperationKind.DELETE ? OperationKind.UPDATE : older.kind;
  }
}

/**
 * Merge a newer mutation into an older queued one.
 *
 * The result keeps the older position in the queue, its base version and its
 * attempt history. It keeps the older id only when that id was never sent;
 * otherwise `freshId` is used so the remote does not replay the older ack.
 */
export function coalesce(
  older: Operation,
  newer: OperationInput,
  freshId: string
): Operation | null {
  const kind = coalesceKinds(older, newer.kind);
  if (kind === null) {
    return null;
  }

  return {
    ...older,
    operationId: wasAttempted(older) ? freshId : older.operationId,
    kind,
    payload: newer.payload,
    updatedAt: newer.updatedAt,
    status: OperationStatus.PENDING,
  };
}

/**
 * Sync state of a record whose latest pending operation has the given kind
 */
export function syncStateFor(kind: OperationKind): SyncState {
  switch (kind) {
    case OperationKind.CREATE:
      return SyncState.PENDING_CREATE;
    case OperationKind.UPDATE:
      return SyncState.PENDING_UPDATE;
    case OperationKind.DELETE:
      return SyncState.PENDING_DELETE;
  }
}
