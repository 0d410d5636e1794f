/**
 * Persisted pull cursor
 * @module sync/checkpoint
 */

import type { RxCollection } from 'rxdb';
import { withStorageErrors } from '../storage/guard.js';
import type { SyncCheckpoint, SyncMetadataDocType } from '../storage/schema.js';

const METADATA_ID = 'default';

export interface CheckpointState {
  checkpoint: SyncCheckpoint | null;
  lastSyncAt: number;
}

/**
 * Checkpoint store over the sync_metadata collection. An empty string
 * stands for "never pulled".
 */
export class CheckpointStore {
  constructor(private readonly collection: RxCollection<SyncMetadataDocType>) {}

  async load(): Promise<CheckpointState> {
    const doc = await withStorageErrors('Failed to read sync checkpoint', () =>
      this.collection.findOne(METADATA_ID).exec()
    );
    return {
      checkpoint: doc && doc.checkpoint !== '' ? doc.checkpoint : null,
      lastSyncAt: doc?.lastSyncAt ?? 0,
    };
  }

  /**
   * Record a fully applied pull batch
   */
  async save(checkpoint: SyncCheckpoint, lastSyncAt: number): Promise<void> {
    await withStorageErrors('Failed to save sync checkpoint', () =>
      this.collection.upsert({ id: METADATA_ID, checkpoint, lastSyncAt })
    );
  }

  /**
   * Forget the checkpoint so the next pull starts from the beginning
   */
  async reset(): Promise<void> {
    const { lastSyncAt } = await this.load();
    await withStorageErrors('Failed to reset sync checkpoint', () =>
      this.collection.upsert({ id: METADATA_ID, checkpoint: '', lastSyncAt })
    );
  }
}
