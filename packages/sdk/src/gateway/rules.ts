import { OperationKind, type SyncRecord } from '../storage/schema.js';
import type { PushOperation } from './wire.js';

export type RemoteApplyOutcome =
  | { type: 'applied'; record: SyncRecord; changed: boolean }
  | { type: 'conflict'; remote: SyncRecord };

/**
 * How the authoritative store applies a pushed operation to its current copy
 * of the record. Versions advance by one per applied operation.
 *
 * - Create conflicts with a live record and revives a tombstone.
 * - Update and Delete conflict unless `baseVersion` matches.
 * - Delete of an absent or already deleted record changes nothing.
 */
export function applyRemoteOperation(
  current: SyncRecord | null,
  operation: PushOperation
): RemoteApplyOutcome {
  const currentVersion = current?.version ?? 0;
  const next = (deleted: boolean): SyncRecord => ({
    id: operation.recordId,
    version: currentVersion + 1,
    updatedAt: operation.updatedAt,
    deleted,
    data: deleted ? current?.data ?? {} : operation.payload,
  });

  switch (operation.kind) {
    case OperationKind.CREATE:
      if (current && !current.deleted) {
        return { type: 'conflict', remote: current };
      }
      return { type: 'applied', record: next(false), changed: true };

    case OperationKind.UPDATE:
      if (operation.baseVersion !== currentVersion) {
        return { type: 'conflict', remote: current ?? missing(operation.recordId) };
      }
      return { type: 'applied', record: next(false), changed: true };

    case OperationKind.DELETE:
      if (!current || current.deleted) {
        return { type: 'applied', record: current ?? missing(operation.recordId), changed: false };
      }
      if (operation.baseVersion !== currentVersion) {
        return { type: 'conflict', remote: current };
      }
      return { type: 'applied', record: next(true), changed: true };
  }
}

/**
 * Stand-in for a record the remote has never seen
 */
function missing(id: string): SyncRecord {
  return { id, version: 0, updatedAt: 0, deleted: true, data: {} };
}
