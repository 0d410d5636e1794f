/**
 * Database initialization and configuration
 * @module storage/init
 */

import { createRxDatabase } from 'rxdb';
import type { RxCollection, RxDatabase, RxStorage } from 'rxdb';
import { getRxStorageDexie } from 'rxdb/plugins/storage-dexie';
import { StorageError } from '../errors.js';
import {
  collections,
  type OperationDocType,
  type RecordDocType,
  type SyncMetadataDocType,
} from './schema.js';

export type SyncCollections = {
  records: RxCollection<RecordDocType>;
  outbox_operations: RxCollection<OperationDocType>;
  sync_metadata: RxCollection<SyncMetadataDocType>;
};

export type SyncDatabase = RxDatabase<SyncCollections>;

/**
 * Database configuration options
 */
export interface DatabaseConfig {
  name?: string;
  /**
   * RxDB storage backend. Defaults to Dexie (IndexedDB), which is durable in
   * browsers and webviews; Node hosts pass their own.
   */
  storage?: RxStorage<unknown, unknown>;
  /**
   * Share change events between browser tabs using the same database
   * @default false
   */
  multiInstance?: boolean;
}

/**
 * Creates and initializes the RxDB database
 *
 * @param config - Database configuration options
 * @returns Promise resolving to the initialized database instance
 */
export async function createDatabase(
  config: DatabaseConfig = {}
): Promise<SyncDatabase> {
  const {
    name = 'tidesync',
    storage = getRxStorageDexie(),
    multiInstance = false,
  } = config;

  try {
    const db = await createRxDatabase<SyncCollections>({
      name,
      storage,
      multiInstance,
    });

    await db.addCollections(collections);

    return db;
  } catch (error) {
    throw StorageError.from(error, `Failed to open database "${name}"`);
  }
}

/**
 * Close a database, keeping its persisted data
 */
export async function closeDatabase(db: SyncDatabase): Promise<void> {
  if (!db.destroyed) {
    await db.destroy();
  }
}
