/**
 * Applier module unit tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { OperationKind, createLogger, type PushOperation } from '@tidesync/sdk';
import { InvalidCheckpointError, MemoryRemoteStore } from '../../database/index.js';
import { Applier } from '../index.js';

const operation = (overrides: Partial<PushOperation> = {}): PushOperation => ({
  operationId: 'op-1',
  recordId: 'doc-1',
  kind: OperationKind.CREATE,
  payload: { text: 'Test todo' },
  baseVersion: 0,
  updatedAt: 100,
  ...overrides,
});

describe('Applier', () => {
  let store: MemoryRemoteStore;
  let applier: Applier;

  beforeEach(() => {
    store = new MemoryRemoteStore();
    applier = new Applier(store, createLogger({ level: 'silent' }));
  });

  describe('apply', () => {
    it('should create a record at version 1', async () => {
      const result = await applier.apply(operation());

      expect(result).toEqual({
        type: 'ack',
        replayed: false,
        ack: { operationId: 'op-1', recordId: 'doc-1', remoteVersion: 1, remoteUpdatedAt: 100 },
      });
      expect(await applier.getRecord('doc-1')).toEqual({
        id: 'doc-1',
        version: 1,
        updatedAt: 100,
        deleted: false,
        data: { text: 'Test todo' },
      });
    });

    it('should return the stored ack for a replayed operation', async () => {
      await applier.apply(operation());
      await applier.apply(
        operation({ operationId: 'op-2', kind: OperationKind.UPDATE, baseVersion: 1 })
      );

      const replay = await applier.apply(operation());

      expect(replay).toMatchObject({ type: 'ack', replayed: true, ack: { remoteVersion: 1 } });
      expect((await applier.getRecord('doc-1'))?.version).toBe(2);
    });

    it('should reject an update against a stale version', async () => {
      await applier.apply(operation());
      await applier.apply(
        operation({ operationId: 'op-2', kind: OperationKind.UPDATE, baseVersion: 1 })
      );

      const result = await applier.apply(
        operation({
          operationId: 'op-3',
          kind: OperationKind.UPDATE,
          baseVersion: 1,
          payload: { text: 'stale' },
        })
      );

      expect(result).toMatchObject({ type: 'conflict', remote: { version: 2 } });
      expect(await store.getAck('op-3')).toBeNull();
    });

    it('should acknowledge deleting an absent record without a change', async () => {
      const result = await applier.apply(operation({ kind: OperationKind.DELETE }));

      expect(result).toMatchObject({ type: 'ack', ack: { remoteVersion: 0 } });
      expect((await applier.pull(null, 10)).changes).toEqual([]);
    });

    it('should apply concurrent pushes one at a time', async () => {
      await applier.apply(operation());

      const results = await Promise.all([
        applier.apply(operation({ operationId: 'a', kind: OperationKind.UPDATE, baseVersion: 1 })),
        applier.apply(operation({ operationId: 'b', kind: OperationKind.UPDATE, baseVersion: 1 })),
      ]);

      expect(results.map((result) => result.type)).toEqual(['ack', 'conflict']);
    });
  });

  describe('pull', () => {
    it('should page through changes in order', async () => {
      await applier.apply(operation());
      await applier.apply(operation({ operationId: 'op-2', recordId: 'doc-2' }));
      await applier.apply(
        operation({ operationId: 'op-3', kind: OperationKind.DELETE, baseVersion: 1 })
      );

      const first = await applier.pull(null, 2);
      const second = await applier.pull(first.checkpoint, 2);

      expect(first).toMatchObject({ checkpoint: '2', hasMore: true });
      expect(first.changes.map((change) => change.recordId)).toEqual(['doc-1', 'doc-2']);
      expect(second).toEqual({
        changes: [
          {
            recordId: 'doc-1',
            kind: OperationKind.DELETE,
            payload: { text: 'Test todo' },
            remoteVersion: 2,
            remoteUpdatedAt: 100,
          },
        ],
        checkpoint: '3',
        hasMore: false,
      });
    });

    it('should reject a checkpoint it did not issue', async () => {
      await expect(applier.pull('abc', 10)).rejects.toBeInstanceOf(InvalidCheckpointError);
    });
  });
});
