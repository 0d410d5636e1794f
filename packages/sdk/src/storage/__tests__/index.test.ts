/**
 * Record store unit tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { firstValueFrom, take, toArray } from 'rxjs';
import { createTestDatabase } from '../../testing/index.js';
import { closeDatabase, type SyncDatabase } from '../init.js';
import { AsyncMutex } from '../lock.js';
import { RecordChangeType, RecordStore, type RecordChangeBatch } from '../record-store.js';
import { SyncState, type SyncRecord } from '../schema.js';
import { StorageError, StorageErrorKind } from '../../errors.js';

const record = (id: string, overrides: Partial<SyncRecord> = {}): SyncRecord => ({
  id,
  version: 0,
  updatedAt: 100,
  deleted: false,
  data: { title: id },
  ...overrides,
});

describe('RecordStore', () => {
  let db: SyncDatabase;
  let store: RecordStore;

  beforeEach(async () => {
    db = await createTestDatabase('store');
    store = new RecordStore(db.records, { scanPageSize: 2 });
  });

  afterEach(async () => {
    store.close();
    await closeDatabase(db);
  });

  describe('get/put/delete', () => {
    it('should return null for a missing record', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    it('should store a record with its sync state', async () => {
      const stored = await store.put(record('a'), SyncState.PENDING_CREATE);

      expect(stored).toEqual({
        id: 'a',
        version: 0,
        updatedAt: 100,
        deleted: false,
        data: { title: 'a' },
        syncState: SyncState.PENDING_CREATE,
        lastSyncedAt: 0,
      });
      expect(await store.get('a')).toEqual(stored);
    });

    it('should never lower a version', async () => {
      await store.put(record('a', { version: 5 }), SyncState.CLEAN, 1000);
      const stored = await store.put(record('a', { version: 2 }), SyncState.PENDING_UPDATE);

      expect(stored.version).toBe(5);
      expect(stored.lastSyncedAt).toBe(1000);
    });

    it('should keep a tombstone and rewrite it', async () => {
      await store.put(record('a', { version: 1 }), SyncState.CLEAN);
      const tombstone = await store.put(
        record('a', { version: 1, deleted: true }),
        SyncState.PENDING_DELETE
      );
      await store.applyBatch([
        {
          type: 'put',
          record: record('b', { deleted: true }),
          syncState: SyncState.PENDING_DELETE,
        },
      ]);

      expect(tombstone).toMatchObject({ deleted: true, syncState: SyncState.PENDING_DELETE });
      expect(await store.get('a')).toMatchObject({ deleted: true, version: 1 });
      expect(await store.get('b')).toMatchObject({ deleted: true });

      const doc = await db.records.findOne('a').exec();
      expect(doc?.toJSON()).toMatchObject({ id: 'a', tombstone: true });
    });

    it('should delete a record', async () => {
      await store.put(record('a'), SyncState.CLEAN);
      await store.delete('a');

      expect(await store.get('a')).toBeNull();
    });
  });

  describe('scan', () => {
    it('should page through every matching record in id order', async () => {
      for (const id of ['c', 'a', 'e', 'b', 'd']) {
        await store.put(record(id), id === 'b' ? SyncState.PENDING_UPDATE : SyncState.CLEAN);
      }

      const ids: string[] = [];
      for await (const item of store.scan((r) => r.syncState === SyncState.CLEAN)) {
        ids.push(item.id);
      }

      expect(ids).toEqual(['a', 'c', 'd', 'e']);
    });

    it('should restart from the beginning on each call', async () => {
      await store.put(record('a'), SyncState.CLEAN);
      await store.put(record('b'), SyncState.CLEAN);
      await store.put(record('c'), SyncState.CLEAN);

      expect((await store.list()).map((r) => r.id)).toEqual(['a', 'b', 'c']);
      expect((await store.list()).map((r) => r.id)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('changes', () => {
    it('should number changes in commit order', async () => {
      const events = firstValueFrom(store.watch().pipe(take(3), toArray()));

      await store.put(record('a'), SyncState.PENDING_CREATE);
      await store.put(record('a', { data: { title: 'renamed' } }), SyncState.PENDING_CREATE);
      await store.delete('a');

      const changes = await events;
      expect(changes.map((c) => c.type)).toEqual([
        RecordChangeType.CREATED,
        RecordChangeType.UPDATED,
        RecordChangeType.DELETED,
      ]);
      expect(changes.map((c) => c.seq)).toEqual([1, 2, 3]);
      expect(changes[1].previous?.data).toEqual({ title: 'a' });
      expect(changes[2].record.data).toEqual({ title: 'renamed' });
    });

    it('should report a change that moves a record out of the predicate', async () => {
      await store.put(record('a'), SyncState.PENDING_UPDATE);
      const event = firstValueFrom(store.watch((r) => r.syncState !== SyncState.CLEAN));

      await store.put(record('a'), SyncState.CLEAN);

      const change = await event;
      expect(change.record.syncState).toBe(SyncState.CLEAN);
      expect(change.previous?.syncState).toBe(SyncState.PENDING_UPDATE);
    });

    it('should publish a batch as one notification', async () => {
      await store.put(record('gone'), SyncState.CLEAN);
      const batches: RecordChangeBatch[] = [];
      const subscription = store.changes$.subscribe((batch) => batches.push(batch));

      await store.applyBatch([
        { type: 'put', record: record('a'), syncState: SyncState.CLEAN },
        { type: 'put', record: record('b'), syncState: SyncState.CLEAN },
        { type: 'delete', id: 'gone' },
        { type: 'delete', id: 'never-existed' },
      ]);
      subscription.unsubscribe();

      expect(batches).toHaveLength(1);
      expect(batches[0].changes.map((c) => [c.type, c.record.id])).toEqual([
        [RecordChangeType.CREATED, 'a'],
        [RecordChangeType.CREATED, 'b'],
        [RecordChangeType.DELETED, 'gone'],
      ]);
    });
  });

  describe('countBySyncState', () => {
    it('should count records per state', async () => {
      await store.put(record('a'), SyncState.CLEAN);
      await store.put(record('b'), SyncState.CLEAN);
      await store.put(record('c'), SyncState.CONFLICTED);

      expect(await store.countBySyncState()).toEqual({
        clean: 2,
        pending_create: 0,
        pending_update: 0,
        pending_delete: 0,
        conflicted: 1,
      });
    });
  });

  describe('transaction', () => {
    it('should run units one at a time', async () => {
      const order: string[] = [];
      const slow = store.transaction(async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push('first:end');
      });
      const fast = store.transaction(async () => {
        order.push('second');
      });

      await Promise.all([slow, fast]);
      expect(order).toEqual(['first:start', 'first:end', 'second']);
    });
  });
});

describe('AsyncMutex', () => {
  it('should release the lock when a task throws', async () => {
    const mutex = new AsyncMutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('StorageError', () => {
  it('should treat schema validation failures as corruption', () => {
    const rxError = Object.assign(new Error('document does not match schema'), { code: 'VD2' });

    const error = StorageError.from(rxError, 'Failed to write record a');

    expect(error.isFatal).toBe(true);
    expect(error.message).toBe('Failed to write record a: document does not match schema');
  });

  it('should treat other failures as transient', () => {
    const error = StorageError.from('disk full', 'Failed to write record a');

    expect(error.kind).toBe(StorageErrorKind.IO);
    expect(error.isFatal).toBe(false);
  });
});
