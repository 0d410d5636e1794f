/**
 * Repository unit tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import {
  DuplicateRecordError,
  RecordNotFoundError,
  RemoteErrorKind,
  StorageError,
} from '../../errors.js';
import { InMemoryRemoteGateway } from '../../gateway/memory.js';
import { createLogger } from '../../logger.js';
import { ConnectivityMonitor } from '../../network/index.js';
import { OperationLog } from '../../outbox/index.js';
import { localChangesLost } from '../../resolver/index.js';
import { closeDatabase, type SyncDatabase } from '../../storage/init.js';
import { RecordStore } from '../../storage/record-store.js';
import {
  OperationKind,
  OperationStatus,
  SyncState,
  type StoredRecord,
  type SyncRecord,
} from '../../storage/schema.js';
import { CheckpointStore, SyncOrchestrator, type SyncConfig } from '../../sync/index.js';
import { createTestDatabase, waitFor } from '../../testing/index.js';
import { OfflineRepository } from '../index.js';

const logger = createLogger({ level: 'silent' });

/**
 * Record store whose next put can be made to fail
 */
class FlakyStore extends RecordStore {
  failNextPut = false;

  async put(
    record: SyncRecord,
    syncState: SyncState,
    lastSyncedAt?: number
  ): Promise<StoredRecord> {
    if (this.failNextPut) {
      this.failNextPut = false;
      throw StorageError.io('Disk full');
    }
    return super.put(record, syncState, lastSyncedAt);
  }
}

interface Harness {
  db: SyncDatabase;
  store: FlakyStore;
  outbox: OperationLog;
  gateway: InMemoryRemoteGateway;
  monitor: ConnectivityMonitor;
  sync: SyncOrchestrator;
  repository: OfflineRepository;
}

const harnesses: Harness[] = [];

async function setup(maxAttempts = 5, config: SyncConfig = {}): Promise<Harness> {
  const db = await createTestDatabase('repo');
  let tick = 0;
  let now = 1000;
  const store = new FlakyStore(db.records);
  const outbox = new OperationLog(db.outbox_operations, { maxAttempts, clock: () => ++tick });
  const gateway = new InMemoryRemoteGateway();
  const monitor = new ConnectivityMonitor({
    initiallyConnected: true,
    listenToWindow: false,
    logger,
  });
  const sync = new SyncOrchestrator(
    { store, outbox, gateway, monitor, checkpoints: new CheckpointStore(db.sync_metadata) },
    { interval: 0, backoff: { baseDelay: 1000, maxDelay: 1000, jitter: 0 }, logger, ...config }
  );
  const repository = new OfflineRepository(
    { store, outbox, sync },
    { clock: () => (now += 100), logger }
  );

  const harness = { db, store, outbox, gateway, monitor, sync, repository };
  harnesses.push(harness);
  return harness;
}

afterEach(async () => {
  for (const h of harnesses.splice(0)) {
    await h.sync.stop(0);
    h.monitor.destroy();
    h.store.close();
    await closeDatabase(h.db);
  }
});

describe('OfflineRepository', () => {
  describe('writes', () => {
    it('should create a record pending its first push', async () => {
      const { repository, outbox } = await setup();

      const created = await repository.create({ id: 'a', data: { title: 'A' } });

      expect(created).toEqual({
        id: 'a',
        version: 0,
        updatedAt: 1100,
        deleted: false,
        data: { title: 'A' },
        syncState: SyncState.PENDING_CREATE,
        lastSyncedAt: 0,
      });
      expect(await repository.pendingOperationCount()).toBe(1);
      expect((await outbox.peekBatch())[0]).toMatchObject({
        recordId: 'a',
        kind: OperationKind.CREATE,
        payload: { title: 'A' },
      });
    });

    it('should reject a duplicate create', async () => {
      const { repository } = await setup();
      await repository.create({ id: 'a', data: {} });

      await expect(repository.create({ id: 'a', data: {} })).rejects.toBeInstanceOf(
        DuplicateRecordError
      );
      expect(await repository.pendingOperationCount()).toBe(1);
    });

    it('should fold an update into the queued create', async () => {
      const { repository, outbox } = await setup();
      await repository.create({ id: 'a', data: { title: 'A' } });

      const updated = await repository.update({ id: 'a', data: { title: 'B' } });

      expect(updated).toMatchObject({
        updatedAt: 1200,
        data: { title: 'B' },
        syncState: SyncState.PENDING_CREATE,
      });
      const queued = await outbox.peekBatch();
      expect(queued).toHaveLength(1);
      expect(queued[0]).toMatchObject({
        kind: OperationKind.CREATE,
        payload: { title: 'B' },
        updatedAt: 1200,
      });
    });

    it('should reject updates and deletes of missing records', async () => {
      const { repository } = await setup();

      await expect(repository.update({ id: 'nope', data: {} })).rejects.toBeInstanceOf(
        RecordNotFoundError
      );
      await expect(repository.delete('nope')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should drop a record deleted before it was ever pushed', async () => {
      const { repository, store } = await setup();
      await repository.create({ id: 'a', data: {} });

      await repository.delete('a');

      expect(await store.get('a')).toBeNull();
      expect(await repository.pendingOperationCount()).toBe(0);
    });

    it('should keep a tombstone until the remote confirms the delete', async () => {
      const { repository, store, gateway } = await setup();
      await repository.create({ id: 'a', data: { title: 'A' } });
      await repository.triggerSync();

      await repository.delete('a');

      expect(await repository.get('a')).toBeNull();
      expect(await repository.query()).toEqual([]);
      expect(await store.get('a')).toMatchObject({
        deleted: true,
        version: 1,
        syncState: SyncState.PENDING_DELETE,
      });

      await repository.triggerSync();

      expect(await store.get('a')).toBeNull();
      expect(gateway.getRecord('a')).toMatchObject({ deleted: true, version: 2 });
    });

    it('should roll back the queued operation when the record write fails', async () => {
      const { repository, store, outbox } = await setup();
      store.failNextPut = true;

      await expect(repository.create({ id: 'a', data: {} })).rejects.toThrow('Disk full');

      expect(await repository.pendingOperationCount()).toBe(0);
      expect(await store.get('a')).toBeNull();

      await repository.create({ id: 'a', data: { title: 'A' } });
      store.failNextPut = true;
      await expect(repository.update({ id: 'a', data: { title: 'B' } })).rejects.toBeInstanceOf(
        StorageError
      );

      const queued = await outbox.peekBatch();
      expect(queued).toHaveLength(1);
      expect(queued[0]).toMatchObject({ kind: OperationKind.CREATE, payload: { title: 'A' } });
      expect(await repository.get('a')).toMatchObject({ data: { title: 'A' } });
    });
  });

  describe('reads', () => {
    it('should query live records in id order', async () => {
      const { repository } = await setup();
      await repository.create({ id: 'c', data: { done: true } });
      await repository.create({ id: 'a', data: { done: false } });
      await repository.create({ id: 'b', data: { done: true } });

      const done = await repository.query((record) => record.data.done === true);

      expect(done.map((record) => record.id)).toEqual(['b', 'c']);
    });

    it('should emit the live result set once per change', async () => {
      const { repository } = await setup();
      const emissions: string[][] = [];
      const subscription = repository
        .watch((record) => record.data.done !== true)
        .subscribe((records) => emissions.push(records.map((r) => `${r.id}:${r.data.title}`)));
      await waitFor(() => emissions.length === 1);

      await repository.create({ id: 'a', data: { title: 'A' } });
      await repository.create({ id: 'b', data: { title: 'B' } });
      await repository.update({ id: 'a', data: { title: 'A2', done: true } });
      await repository.delete('b');
      subscription.unsubscribe();

      expect(emissions).toEqual([[], ['a:A'], ['a:A', 'b:B'], ['b:B'], []]);
    });

    it('should stream individual changes', async () => {
      const { repository } = await setup();
      const types: string[] = [];
      const subscription = repository.changes().subscribe((change) => types.push(change.type));

      await repository.create({ id: 'a', data: {} });
      await repository.update({ id: 'a', data: { n: 1 } });
      await repository.delete('a');
      subscription.unsubscribe();

      expect(types).toEqual(['created', 'updated', 'deleted']);
    });
  });

  describe('sync', () => {
    it('should push on demand and mark the record clean', async () => {
      const { repository, gateway } = await setup();
      await repository.create({ id: 'a', data: { title: 'A' } });

      const result = await repository.triggerSync();

      expect(result).toMatchObject({ pushed: 1, completed: true });
      expect(await repository.get('a')).toMatchObject({ version: 1, syncState: SyncState.CLEAN });
      expect(gateway.getRecord('a')).toMatchObject({ data: { title: 'A' } });
      expect(await repository.pendingOperationCount()).toBe(0);
    });

    it('should pull everything again on a full resync', async () => {
      const { repository, gateway } = await setup();
      gateway.applyRemoteEdit('r1', { title: 'one' }, 100);
      await repository.triggerSync();

      const result = await repository.fullResync();

      expect(result).toMatchObject({ pulled: 1, applied: 0, completed: true });
      expect(await repository.get('r1')).toMatchObject({ data: { title: 'one' } });
    });

    it('should report statistics', async () => {
      const { repository } = await setup();
      await repository.create({ id: 'a', data: {} });
      await repository.create({ id: 'b', data: {} });

      const stats = await repository.statistics();

      expect(stats).toMatchObject({
        records: 2,
        pendingOperations: 2,
        deadLetters: 0,
        sync: { phase: 'idle' },
      });
      expect(stats.bySyncState[SyncState.PENDING_CREATE]).toBe(2);
      expect(stats.bySyncState[SyncState.CLEAN]).toBe(0);
    });
  });

  describe('dead letters', () => {
    async function deadLetterCreate(h: Harness): Promise<string> {
      h.gateway.failNextPush(RemoteErrorKind.UNAUTHORIZED, 2);
      await h.repository.create({ id: 'a', data: { title: 'A' } });
      await h.repository.triggerSync();
      await h.repository.triggerSync();

      const dead = await h.repository.deadLetteredOperations();
      expect(dead).toHaveLength(1);
      return dead[0].operationId;
    }

    it('should retry a dead letter with a fresh budget', async () => {
      const h = await setup(1);
      const operationId = await deadLetterCreate(h);

      const retried = await h.repository.retryDeadLetter(operationId);

      expect(retried).toMatchObject({ attemptCount: 0, status: OperationStatus.PENDING });
      expect(await h.repository.pendingOperationCount()).toBe(1);

      await h.repository.triggerSync();

      expect(await h.repository.get('a')).toMatchObject({ version: 1, syncState: SyncState.CLEAN });
      expect(await h.repository.deadLetteredOperations()).toEqual([]);
    });

    it('should remove a never confirmed record when its dead letter is discarded', async () => {
      const h = await setup(1);
      const operationId = await deadLetterCreate(h);

      const discarded = await h.repository.discardDeadLetter(operationId);

      expect(discarded).toMatchObject({ recordId: 'a', kind: OperationKind.CREATE });
      expect(await h.repository.get('a')).toBeNull();
      expect(await h.repository.deadLetteredOperations()).toEqual([]);
    });

    /**
     * Sync `a`, then edit it locally and let the edit die
     */
    async function deadLetterUpdate(h: Harness): Promise<string> {
      await h.repository.create({ id: 'a', data: { title: 'A' } });
      await h.repository.triggerSync();
      await h.repository.update({ id: 'a', data: { title: 'mine' } });
      h.gateway.failNextPush(RemoteErrorKind.UNAUTHORIZED, 2);
      await h.repository.triggerSync();
      await h.repository.triggerSync();

      const dead = await h.repository.deadLetteredOperations();
      expect(dead).toHaveLength(1);
      return dead[0].operationId;
    }

    it('should take newer remote versions of a record whose edit died', async () => {
      const h = await setup(1);
      const operationId = await deadLetterUpdate(h);
      h.gateway.applyRemoteEdit('a', { title: 'theirs' }, 5000);

      const result = await h.repository.triggerSync();

      expect(result).toMatchObject({ pulled: 1, applied: 1, deferred: 0 });
      expect(await h.repository.get('a')).toMatchObject({
        version: 2,
        data: { title: 'theirs' },
        syncState: SyncState.CLEAN,
      });

      await h.repository.discardDeadLetter(operationId);
      await h.repository.triggerSync();

      expect(await h.repository.get('a')).toMatchObject({
        version: 2,
        data: { title: 'theirs' },
        syncState: SyncState.CLEAN,
      });
      expect(await h.repository.deadLetteredOperations()).toEqual([]);
    });

    it('should restore the remote copy when an unpushed edit is discarded', async () => {
      const h = await setup(1);
      const operationId = await deadLetterUpdate(h);
      expect(await h.repository.get('a')).toMatchObject({ data: { title: 'mine' } });

      await h.repository.discardDeadLetter(operationId);
      expect(await h.repository.get('a')).toBeNull();

      const result = await h.repository.triggerSync();

      expect(result).toMatchObject({ pulled: 1, applied: 1, completed: true });
      expect(await h.repository.get('a')).toMatchObject({
        version: 1,
        data: { title: 'A' },
        syncState: SyncState.CLEAN,
      });
    });

    it('should settle a retried edit against the newer remote version', async () => {
      const h = await setup(1);
      const operationId = await deadLetterUpdate(h);
      h.gateway.applyRemoteEdit('a', { title: 'theirs' }, 50);
      await h.repository.triggerSync();

      await h.repository.retryDeadLetter(operationId);
      expect(await h.repository.get('a')).toMatchObject({
        version: 2,
        data: { title: 'mine' },
        syncState: SyncState.PENDING_UPDATE,
      });

      const result = await h.repository.triggerSync();

      expect(result).toMatchObject({ conflicts: 1, completed: true });
      expect(await h.repository.get('a')).toMatchObject({
        version: 3,
        data: { title: 'mine' },
        syncState: SyncState.CLEAN,
      });
      expect(h.gateway.getRecord('a')).toMatchObject({ version: 3, data: { title: 'mine' } });
    });

    it('should ignore unknown operation ids', async () => {
      const { repository } = await setup();

      expect(await repository.retryDeadLetter('op_missing')).toBeNull();
      expect(await repository.discardDeadLetter('op_missing')).toBeNull();
    });
  });

  describe('conflicts', () => {
    it('should list flagged records until the resolution is accepted', async () => {
      const { repository, store } = await setup();
      const flagged: SyncRecord = {
        id: 'x',
        version: 2,
        updatedAt: 200,
        deleted: false,
        data: { title: 'remote' },
      };
      await store.put(flagged, SyncState.CONFLICTED);

      expect((await repository.conflictedRecords()).map((r) => r.id)).toEqual(['x']);

      const accepted = await repository.acceptResolution('x');

      expect(accepted.syncState).toBe(SyncState.CLEAN);
      expect(await repository.conflictedRecords()).toEqual([]);
      await expect(repository.acceptResolution('nope')).rejects.toBeInstanceOf(
        RecordNotFoundError
      );
    });

    it('should follow remote edits made after a flagged resolution', async () => {
      const h = await setup(5, { requiresAttention: localChangesLost });
      await h.repository.create({ id: 'a', data: { title: 'A' } });
      await h.repository.triggerSync();
      await h.repository.update({ id: 'a', data: { title: 'mine' } });
      h.gateway.applyRemoteEdit('a', { title: 'theirs' }, 5000);

      expect(await h.repository.triggerSync()).toMatchObject({ conflicts: 1 });
      expect(await h.repository.get('a')).toMatchObject({
        version: 2,
        data: { title: 'theirs' },
        syncState: SyncState.CONFLICTED,
      });

      h.gateway.applyRemoteEdit('a', { title: 'later' }, 6000);
      await h.repository.acceptResolution('a');
      await h.repository.triggerSync();

      expect(await h.repository.get('a')).toMatchObject({
        version: 3,
        data: { title: 'later' },
        syncState: SyncState.CLEAN,
      });
    });

    it('should keep the flag while newer remote versions arrive', async () => {
      const h = await setup(5, { requiresAttention: localChangesLost });
      await h.repository.create({ id: 'a', data: { title: 'A' } });
      await h.repository.triggerSync();
      await h.repository.update({ id: 'a', data: { title: 'mine' } });
      h.gateway.applyRemoteEdit('a', { title: 'theirs' }, 5000);
      await h.repository.triggerSync();

      h.gateway.applyRemoteEdit('a', { title: 'later' }, 6000);
      const result = await h.repository.triggerSync();

      expect(result).toMatchObject({ pulled: 1, applied: 1, deferred: 0 });
      expect(await h.repository.get('a')).toMatchObject({
        version: 3,
        data: { title: 'later' },
        syncState: SyncState.CONFLICTED,
      });
      expect((await h.repository.acceptResolution('a')).syncState).toBe(SyncState.CLEAN);
    });
  });
});
