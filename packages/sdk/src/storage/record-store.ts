/**
 * Record store - durable local storage of records and their sync state
 * @module storage/record-store
 */

import { Observable, Subject, filter, mergeMap } from 'rxjs';
import type { RxCollection } from 'rxdb';
import { StorageError } from '../errors.js';
import { withStorageErrors } from './guard.js';
import { AsyncMutex } from './lock.js';
import {
  SyncState,
  type RecordDocType,
  type StoredRecord,
  type SyncRecord,
} from './schema.js';

export type RecordPredicate = (record: StoredRecord) => boolean;

export enum RecordChangeType {
  CREATED = 'created',
  UPDATED = 'updated',
  DELETED = 'deleted',
}

/**
 * A single change, numbered in the store's global write order
 */
export interface RecordChange {
  seq: number;
  type: RecordChangeType;
  /** New state, or the last state before removal */
  record: StoredRecord;
  previous: StoredRecord | null;
}

/**
 * Changes committed together by one write
 */
export interface RecordChangeBatch {
  changes: RecordChange[];
}

export type RecordWrite =
  | {
      type: 'put';
      record: SyncRecord;
      syncState: SyncState;
      /** Keeps the previous value when omitted */
      lastSyncedAt?: number;
    }
  | { type: 'delete'; id: string };

export interface RecordStoreConfig {
  /** Documents fetched per page by scan() */
  scanPageSize?: number;
}

const SYNC_STATES = new Set<string>(Object.values(SyncState));

/**
 * Convert a stored document into a record, rejecting rows that lost their shape
 */
function toStoredRecord(doc: RecordDocType): StoredRecord {
  if (
    typeof doc.version !== 'number' ||
    typeof doc.updatedAt !== 'number' ||
    typeof doc.data !== 'object' ||
    doc.data === null ||
    !SYNC_STATES.has(doc.syncState)
  ) {
    throw StorageError.corrupt(`Record ${doc.id} is unreadable`);
  }

  return {
    id: doc.id,
    version: doc.version,
    updatedAt: doc.updatedAt,
    deleted: doc.tombstone === true,
    data: doc.data,
    syncState: doc.syncState,
    lastSyncedAt: doc.lastSyncedAt ?? 0,
  };
}

/**
 * Record store
 *
 * Writes are serialized and every committed write is published on `changes$`
 * in commit order. `transaction()` guards multi-step units (record write plus
 * outbox enqueue) shared between the application and the sync orchestrator.
 */
export class RecordStore {
  private readonly collection: RxCollection<RecordDocType>;
  private readonly scanPageSize: number;
  private readonly unitLock = new AsyncMutex();
  private readonly writeLock = new AsyncMutex();
  private readonly changeSubject = new Subject<RecordChangeBatch>();
  private seq = 0;

  /**
   * Every committed batch, in commit order
   */
  readonly changes$: Observable<RecordChangeBatch> = this.changeSubject.asObservable();

  constructor(collection: RxCollection<RecordDocType>, config: RecordStoreConfig = {}) {
    this.collection = collection;
    this.scanPageSize = config.scanPageSize ?? 200;
  }

  async get(id: string): Promise<StoredRecord | null> {
    const doc = await withStorageErrors(`Failed to read record ${id}`, () =>
      this.collection.findOne(id).exec()
    );
    return doc ? toStoredRecord(doc.toMutableJSON()) : null;
  }

  /**
   * Write a record and its sync state in one document write
   */
  async put(
    record: SyncRecord,
    syncState: SyncState,
    lastSyncedAt?: number
  ): Promise<StoredRecord> {
    await this.applyBatch([{ type: 'put', record, syncState, lastSyncedAt }]);
    const stored = await this.get(record.id);
    if (!stored) {
      throw StorageError.io(`Record ${record.id} vanished after write`);
    }
    return stored;
  }

  async delete(id: string): Promise<void> {
    await this.applyBatch([{ type: 'delete', id }]);
  }

  /**
   * Apply several writes and publish them as one batch
   */
  async applyBatch(writes: RecordWrite[]): Promise<RecordChange[]> {
    if (writes.length === 0) {
      return [];
    }

    return this.writeLock.runExclusive(async () => {
      const changes: RecordChange[] = [];

      for (const write of writes) {
        const change =
          write.type === 'put'
            ? await this.writePut(write.record, write.syncState, write.lastSyncedAt)
            : await this.writeDelete(write.id);
        if (change) {
          changes.push(change);
        }
      }

      if (changes.length > 0) {
        this.changeSubject.next({ changes });
      }
      return changes;
    });
  }

  /**
   * Iterate matching records in id order, one page at a time.
   * Each call starts a fresh pass.
   */
  async *scan(predicate: RecordPredicate = () => true): AsyncGenerator<StoredRecord> {
    let after = '';

    for (;;) {
      const docs = await withStorageErrors('Failed to scan records', () =>
        this.collection
          .find({
            selector: { id: { $gt: after } },
            sort: [{ id: 'asc' }],
            limit: this.scanPageSize,
          })
          .exec()
      );

      for (const doc of docs) {
        const record = toStoredRecord(doc.toMutableJSON());
        if (predicate(record)) {
          yield record;
        }
      }

      if (docs.length < this.scanPageSize) {
        return;
      }
      after = docs[docs.length - 1].id;
    }
  }

  /**
   * Collect every matching record
   */
  async list(predicate: RecordPredicate = () => true): Promise<StoredRecord[]> {
    const records: StoredRecord[] = [];
    for await (const record of this.scan(predicate)) {
      records.push(record);
    }
    return records;
  }

  /**
   * Stream changes touching records that match, before or after the change
   */
  watch(predicate: RecordPredicate = () => true): Observable<RecordChange> {
    return this.changes$.pipe(
      mergeMap((batch) => batch.changes),
      filter(
        (change) =>
          predicate(change.record) ||
          (change.previous !== null && predicate(change.previous))
      )
    );
  }

  async countBySyncState(): Promise<Record<SyncState, number>> {
    const counts: Record<SyncState, number> = {
      [SyncState.CLEAN]: 0,
      [SyncState.PENDING_CREATE]: 0,
      [SyncState.PENDING_UPDATE]: 0,
      [SyncState.PENDING_DELETE]: 0,
      [SyncState.CONFLICTED]: 0,
    };

    for await (const record of this.scan()) {
      counts[record.syncState] += 1;
    }
    return counts;
  }

  /**
   * Run a unit of work exclusively against other units on this store
   */
  transaction<T>(work: () => Promise<T>): Promise<T> {
    return this.unitLock.runExclusive(work);
  }

  /**
   * Complete the change stream
   */
  close(): void {
    this.changeSubject.complete();
  }

  private async writePut(
    record: SyncRecord,
    syncState: SyncState,
    lastSyncedAt: number | undefined
  ): Promise<RecordChange> {
    const previous = await this.get(record.id);

    const doc: RecordDocType = {
      id: record.id,
      version: Math.max(record.version, previous?.version ?? 0),
      updatedAt: record.updatedAt,
      tombstone: record.deleted,
      data: record.data,
      syncState,
      lastSyncedAt: lastSyncedAt ?? previous?.lastSyncedAt ?? 0,
    };

    await withStorageErrors(`Failed to write record ${record.id}`, () =>
      this.collection.upsert(doc)
    );

    return {
      seq: ++this.seq,
      type: previous ? RecordChangeType.UPDATED : RecordChangeType.CREATED,
      record: toStoredRecord(doc),
      previous,
    };
  }

  private async writeDelete(id: string): Promise<RecordChange | null> {
    const doc = await withStorageErrors(`Failed to read record ${id}`, () =>
      this.collection.findOne(id).exec()
    );
    if (!doc) {
      return null;
    }

    const previous = toStoredRecord(doc.toMutableJSON());
    await withStorageErrors(`Failed to delete record ${id}`, () => doc.remove());

    return {
      seq: ++this.seq,
      type: RecordChangeType.DELETED,
      record: previous,
      previous,
    };
  }
}
