/**
 * Repository module - the application's entry point to the engine
 * @module repository
 */

import { Observable } from 'rxjs';
import { DuplicateRecordError, RecordNotFoundError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { syncStateFor, type OperationInput, type OperationLog } from '../outbox/index.js';
import {
  RecordChangeType,
  type RecordChange,
  type RecordChangeBatch,
  type RecordPredicate,
  type RecordStore,
} from '../storage/record-store.js';
import {
  OperationKind,
  SyncState,
  type Operation,
  type RecordData,
  type StoredRecord,
  type SyncRecord,
} from '../storage/schema.js';
import {
  operationView,
  type SyncOrchestrator,
  type SyncResult,
  type SyncStatus,
} from '../sync/index.js';

/**
 * What the application supplies for a create or an update
 */
export interface RecordInput {
  id: string;
  data: RecordData;
}

export interface RepositoryStatistics {
  /** Stored records, tombstones included */
  records: number;
  bySyncState: Record<SyncState, number>;
  pendingOperations: number;
  deadLetters: number;
  sync: SyncStatus;
}

export interface RepositoryConfig {
  /** Source of `updatedAt` for local writes */
  clock?: () => number;
  logger?: Logger;
}

export interface RepositoryDependencies {
  store: RecordStore;
  outbox: OperationLog;
  sync: SyncOrchestrator;
}

const all: RecordPredicate = () => true;

const byId = (a: StoredRecord, b: StoredRecord): number =>
  a.id < b.id ? -1 : a.id > b.id ? 1 : 0;

/**
 * Offline repository
 *
 * Writes land in the record store and the outbox as one unit and return
 * without touching the network. Reads never wait for sync. Tombstones are
 * hidden from `get`, `query` and `watch`.
 */
export class OfflineRepository {
  private store: RecordStore;
  private outbox: OperationLog;
  private sync: SyncOrchestrator;
  private clock: () => number;
  private logger: Logger;

  constructor(deps: RepositoryDependencies, config: RepositoryConfig = {}) {
    this.store = deps.store;
    this.outbox = deps.outbox;
    this.sync = deps.sync;
    this.clock = config.clock ?? Date.now;
    this.logger = config.logger ?? createLogger({ name: 'tidesync:repository' });
  }

  /**
   * Create a record. A tombstoned id may be created again.
   *
   * @throws DuplicateRecordError when a live record has the id
   */
  async create(input: RecordInput): Promise<StoredRecord> {
    return this.store.transaction(async () => {
      const existing = await this.store.get(input.id);
      if (existing && !existing.deleted) {
        throw new DuplicateRecordError(input.id);
      }

      const record: SyncRecord = {
        id: input.id,
        version: existing?.version ?? 0,
        updatedAt: this.clock(),
        deleted: false,
        data: input.data,
      };
      return this.commit(record, OperationKind.CREATE);
    });
  }

  /**
   * Replace a record's data
   *
   * @throws RecordNotFoundError when there is no live record with the id
   */
  async update(input: RecordInput): Promise<StoredRecord> {
    return this.store.transaction(async () => {
      const existing = await this.requireLive(input.id);
      const record: SyncRecord = {
        ...existing,
        updatedAt: this.clock(),
        data: input.data,
      };
      return this.commit(record, OperationKind.UPDATE);
    });
  }

  /**
   * Delete a record. It stays as a tombstone until the remote confirms, or
   * goes at once when it never reached the remote.
   *
   * @throws RecordNotFoundError when there is no live record with the id
   */
  async delete(id: string): Promise<void> {
    await this.store.transaction(async () => {
      const existing = await this.requireLive(id);
      const tombstone: SyncRecord = { ...existing, updatedAt: this.clock(), deleted: true };
      await this.commit(tombstone, OperationKind.DELETE);
    });
  }

  async get(id: string): Promise<StoredRecord | null> {
    const record = await this.store.get(id);
    return record && !record.deleted ? record : null;
  }

  /**
   * Matching live records in id order
   */
  query(predicate: RecordPredicate = all): Promise<StoredRecord[]> {
    return this.store.list((record) => !record.deleted && predicate(record));
  }

  /**
   * Live result set of a query. Emits the current matches, then once for
   * every store batch that changes them.
   */
  watch(predicate: RecordPredicate = all): Observable<StoredRecord[]> {
    const visible: RecordPredicate = (record) => !record.deleted && predicate(record);

    return new Observable<StoredRecord[]>((subscriber) => {
      const current = new Map<string, StoredRecord>();
      const buffered: RecordChangeBatch[] = [];
      let loaded = false;

      const apply = (batch: RecordChangeBatch): boolean => {
        let touched = false;
        for (const change of batch.changes) {
          const id = change.record.id;
          if (change.type !== RecordChangeType.DELETED && visible(change.record)) {
            current.set(id, change.record);
            touched = true;
          } else if (current.delete(id)) {
            touched = true;
          }
        }
        return touched;
      };
      const emit = () => subscriber.next([...current.values()].sort(byId));

      // Subscribe first so nothing committed during the initial read is missed
      const subscription = this.store.changes$.subscribe({
        next: (batch) => {
          if (!loaded) {
            buffered.push(batch);
          } else if (apply(batch)) {
            emit();
          }
        },
        error: (error: unknown) => subscriber.error(error),
        complete: () => subscriber.complete(),
      });

      this.store.list(visible).then(
        (records) => {
          for (const record of records) {
            current.set(record.id, record);
          }
          for (const batch of buffered.splice(0)) {
            apply(batch);
          }
          loaded = true;
          emit();
        },
        (error: unknown) => subscriber.error(error)
      );

      return () => subscription.unsubscribe();
    });
  }

  /**
   * Individual record changes, tombstoning included
   */
  changes(predicate: RecordPredicate = all): Observable<RecordChange> {
    return this.store.watch(predicate);
  }

  triggerSync(): Promise<SyncResult> {
    return this.sync.triggerSync();
  }

  /**
   * Pull everything again from the start
   */
  fullResync(): Promise<SyncResult> {
    return this.sync.requestFullResync();
  }

  get syncStatus$(): Observable<SyncStatus> {
    return this.sync.state$;
  }

  syncStatus(): SyncStatus {
    return this.sync.getState();
  }

  pendingOperationCount(): Promise<number> {
    return this.outbox.pendingCount();
  }

  deadLetteredOperations(): Promise<Operation[]> {
    return this.outbox.deadLettered();
  }

  /**
   * Give a dead-lettered operation a fresh attempt budget. The local copy
   * goes back to what the operation carries, since a newer remote version
   * may have replaced it in the meantime; the next push settles the two.
   */
  async retryDeadLetter(operationId: string): Promise<Operation | null> {
    return this.store.transaction(async () => {
      const dead = await this.outbox.get(operationId);
      const resubmitted = await this.outbox.resubmit(operationId);
      if (!dead || !resubmitted) {
        return null;
      }

      const local = await this.store.get(dead.recordId);
      const queued = await this.outbox.forRecord(dead.recordId);
      // A conflicted record keeps its flag until the resolution is accepted
      if (local?.syncState !== SyncState.CONFLICTED) {
        if (queued.length === 1) {
          const intended = operationView(resubmitted);
          await this.store.put(
            { ...intended, version: local?.version ?? intended.version },
            syncStateFor(resubmitted.kind)
          );
        } else if (local) {
          await this.store.put(local, syncStateFor(resubmitted.kind));
        }
      }
      this.logger.info({ operationId, recordId: dead.recordId }, 'Dead letter resubmitted');
      return resubmitted;
    });
  }

  /**
   * Drop a dead-lettered operation. When nothing else is queued for the
   * record, its unpushed local copy is dropped: a record the remote never
   * confirmed is gone, anything else comes back from the remote on the next
   * pull, which starts over from the beginning.
   */
  async discardDeadLetter(operationId: string): Promise<Operation | null> {
    const discarded = await this.store.transaction(async () => {
      const operation = await this.outbox.discard(operationId);
      if (!operation) {
        return null;
      }

      const remaining = await this.outbox.forRecord(operation.recordId, true);
      const local = await this.store.get(operation.recordId);
      const stale = remaining.length === 0 && local !== null && local.syncState !== SyncState.CLEAN;
      if (stale) {
        await this.store.delete(operation.recordId);
      }

      this.logger.info(
        { operationId, recordId: operation.recordId, dropped: stale },
        'Dead letter discarded'
      );
      return { operation, refetch: stale && local !== null && local.version > 0 };
    });

    if (!discarded) {
      return null;
    }
    if (discarded.refetch) {
      this.sync.scheduleFullResync();
    }
    return discarded.operation;
  }

  /**
   * Records whose conflict resolution was flagged for the user
   */
  conflictedRecords(): Promise<StoredRecord[]> {
    return this.store.list((record) => record.syncState === SyncState.CONFLICTED);
  }

  /**
   * Clear the Conflicted flag once the user has seen the resolved record
   */
  async acceptResolution(id: string): Promise<StoredRecord> {
    return this.store.transaction(async () => {
      const local = await this.store.get(id);
      if (!local) {
        throw new RecordNotFoundError(id);
      }
      if (local.syncState !== SyncState.CONFLICTED) {
        return local;
      }

      // A dead-lettered resolution keeps the record pending until it is
      // retried or discarded
      const queued = await this.outbox.forRecord(id, true);
      const latest = queued[queued.length - 1];
      return this.store.put(local, latest ? syncStateFor(latest.kind) : SyncState.CLEAN);
    });
  }

  async statistics(): Promise<RepositoryStatistics> {
    const bySyncState = await this.store.countBySyncState();
    const records = Object.values(bySyncState).reduce((sum, count) => sum + count, 0);

    return {
      records,
      bySyncState,
      pendingOperations: await this.outbox.pendingCount(),
      deadLetters: (await this.outbox.deadLettered()).length,
      sync: this.sync.getState(),
    };
  }

  private async requireLive(id: string): Promise<StoredRecord> {
    const existing = await this.store.get(id);
    if (!existing || existing.deleted) {
      throw new RecordNotFoundError(id);
    }
    return existing;
  }

  /**
   * Queue the mutation, then write the record. A failed write takes the
   * queued mutation back out.
   */
  private async commit(record: SyncRecord, kind: OperationKind): Promise<StoredRecord> {
    const input: OperationInput = {
      recordId: record.id,
      kind,
      payload: record.data,
      baseVersion: record.version,
      updatedAt: record.updatedAt,
    };
    const { operation, undo } = await this.outbox.enqueue(input);

    try {
      if (!operation) {
        // Cancelled out before reaching the remote
        await this.store.delete(record.id);
        return { ...record, syncState: SyncState.CLEAN, lastSyncedAt: 0 };
      }
      return await this.store.put(record, syncStateFor(operation.kind));
    } catch (error) {
      await undo().catch((undoError: unknown) =>
        this.logger.error(
          { err: undoError, recordId: record.id },
          'Failed to roll back queued operation'
        )
      );
      throw error;
    }
  }
}
