/**
 * Applier module - applies pushed operations to the remote store
 * @module applier
 */

import {
  AsyncMutex,
  applyRemoteOperation,
  createLogger,
  type Logger,
  type PushOperation,
  type RemoteAck,
  type SyncRecord,
} from '@tidesync/sdk';
import type { ChangePage, RemoteStore } from '../database/index.js';

/**
 * Apply result
 */
export type ApplyResult =
  | { type: 'ack'; ack: RemoteAck; replayed: boolean }
  | { type: 'conflict'; remote: SyncRecord };

/**
 * Applier
 *
 * Operations are applied one at a time. An operation id seen before gets
 * its stored ack back without touching the record again.
 */
export class Applier {
  private mutex = new AsyncMutex();
  private logger: Logger;

  constructor(
    private store: RemoteStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ name: 'tidesync:applier' });
  }

  apply(operation: PushOperation): Promise<ApplyResult> {
    return this.mutex.runExclusive(async () => {
      const replayed = await this.store.getAck(operation.operationId);
      if (replayed) {
        this.logger.debug({ operationId: operation.operationId }, 'Replayed operation');
        return { type: 'ack', ack: replayed, replayed: true };
      }

      const current = await this.store.getRecord(operation.recordId);
      const outcome = applyRemoteOperation(current, operation);
      if (outcome.type === 'conflict') {
        this.logger.info(
          {
            operationId: operation.operationId,
            recordId: operation.recordId,
            baseVersion: operation.baseVersion,
            remoteVersion: outcome.remote.version,
          },
          'Rejected conflicting operation'
        );
        return { type: 'conflict', remote: outcome.remote };
      }

      if (outcome.changed) {
        await this.store.putRecord(outcome.record, operation.kind);
      }

      const ack: RemoteAck = {
        operationId: operation.operationId,
        recordId: operation.recordId,
        remoteVersion: outcome.record.version,
        remoteUpdatedAt: outcome.record.updatedAt,
      };
      await this.store.saveAck(ack);
      return { type: 'ack', ack, replayed: false };
    });
  }

  pull(since: string | null, limit: number): Promise<ChangePage> {
    return this.store.changesSince(since, limit);
  }

  getRecord(id: string): Promise<SyncRecord | null> {
    return this.store.getRecord(id);
  }
}
