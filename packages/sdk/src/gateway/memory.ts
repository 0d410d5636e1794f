/**
 * In-memory remote - an authoritative store living in the same process.
 * Used by tests, demos and hosts that sync between local replicas.
 * @module gateway/memory
 */

import { RemoteError, RemoteErrorKind } from '../errors.js';
import {
  OperationKind,
  type Operation,
  type RecordData,
  type SyncCheckpoint,
  type SyncRecord,
} from '../storage/schema.js';
import {
  err,
  ok,
  recordToChange,
  type PullBatch,
  type RemoteAck,
  type RemoteCallOptions,
  type RemoteChange,
  type RemoteGateway,
  type Result,
} from './types.js';
import { applyRemoteOperation } from './rules.js';

export interface InMemoryRemoteGatewayConfig {
  /**
   * Changes returned per pull
   * @default 100
   */
  pageSize?: number;
  /** Delay before each call completes; aborting the call cuts it short */
  latencyMs?: number;
  clock?: () => number;
}

type InjectedFault = Exclude<RemoteErrorKind, RemoteErrorKind.CONFLICT>;

interface LoggedChange {
  seq: number;
  change: RemoteChange;
}

/**
 * In-memory remote gateway
 *
 * Push is idempotent per operationId and version-checked; every applied
 * change lands in an ordered log that pulls page through.
 */
export class InMemoryRemoteGateway implements RemoteGateway {
  private config: Required<InMemoryRemoteGatewayConfig>;
  private records = new Map<string, SyncRecord>();
  private acks = new Map<string, RemoteAck>();
  private changeLog: LoggedChange[] = [];
  private seq = 0;
  private pushFaults: InjectedFault[] = [];
  private pullFaults: InjectedFault[] = [];
  private reachable = true;

  /** Push calls received, including failed ones */
  pushCount = 0;
  /** Pull calls received, including failed ones */
  pullCount = 0;

  private defaultConfig: Required<InMemoryRemoteGatewayConfig> = {
    pageSize: 100,
    latencyMs: 0,
    clock: Date.now,
  };

  constructor(config: InMemoryRemoteGatewayConfig = {}) {
    this.config = { ...this.defaultConfig, ...config };
  }

  async push(
    operation: Operation,
    options: RemoteCallOptions = {}
  ): Promise<Result<RemoteAck, RemoteError>> {
    this.pushCount += 1;

    const failure = (await this.settle(options.signal)) ?? this.takeFault(this.pushFaults);
    if (failure) {
      return err(failure);
    }

    const replayed = this.acks.get(operation.operationId);
    if (replayed) {
      return ok(replayed);
    }

    const outcome = applyRemoteOperation(this.records.get(operation.recordId) ?? null, operation);
    if (outcome.type === 'conflict') {
      return err(RemoteError.conflict(outcome.remote));
    }

    if (outcome.changed) {
      this.publish(outcome.record, operation.kind);
    }

    const ack: RemoteAck = {
      operationId: operation.operationId,
      recordId: operation.recordId,
      remoteVersion: outcome.record.version,
      remoteUpdatedAt: outcome.record.updatedAt,
    };
    this.acks.set(operation.operationId, ack);
    return ok(ack);
  }

  async pullSince(
    checkpoint: SyncCheckpoint | null,
    options: RemoteCallOptions = {}
  ): Promise<Result<PullBatch, RemoteError>> {
    this.pullCount += 1;

    const failure = (await this.settle(options.signal)) ?? this.takeFault(this.pullFaults);
    if (failure) {
      return err(failure);
    }

    const since = checkpoint === null ? 0 : Number(checkpoint);
    if (!Number.isInteger(since) || since < 0) {
      return err(RemoteError.invalidCheckpoint(`Invalid checkpoint: ${checkpoint}`));
    }

    const pending = this.changeLog.filter((entry) => entry.seq > since);
    const page = pending.slice(0, this.config.pageSize);
    const last = page[page.length - 1];

    return ok({
      changes: page.map((entry) => entry.change),
      checkpoint: String(last ? last.seq : since),
      hasMore: pending.length > page.length,
    });
  }

  /**
   * Edit a record as another device would
   */
  applyRemoteEdit(id: string, data: RecordData, updatedAt = this.config.clock()): SyncRecord {
    const current = this.records.get(id);
    const record: SyncRecord = {
      id,
      version: (current?.version ?? 0) + 1,
      updatedAt,
      deleted: false,
      data,
    };
    this.publish(record, current && !current.deleted ? OperationKind.UPDATE : OperationKind.CREATE);
    return record;
  }

  /**
   * Delete a record as another device would
   */
  deleteRemote(id: string, updatedAt = this.config.clock()): SyncRecord | null {
    const current = this.records.get(id);
    if (!current || current.deleted) {
      return null;
    }
    const record: SyncRecord = {
      ...current,
      version: current.version + 1,
      updatedAt,
      deleted: true,
    };
    this.publish(record, OperationKind.DELETE);
    return record;
  }

  getRecord(id: string): SyncRecord | null {
    return this.records.get(id) ?? null;
  }

  /**
   * Live records, in id order
   */
  liveRecords(): SyncRecord[] {
    return [...this.records.values()]
      .filter((record) => !record.deleted)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  /**
   * Fail the next pushes with the given error kind
   */
  failNextPush(kind: InjectedFault, times = 1): void {
    this.pushFaults.push(...Array<InjectedFault>(times).fill(kind));
  }

  /**
   * Fail the next pulls with the given error kind
   */
  failNextPull(kind: InjectedFault, times = 1): void {
    this.pullFaults.push(...Array<InjectedFault>(times).fill(kind));
  }

  /**
   * Simulate the remote dropping off the network
   */
  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  private publish(record: SyncRecord, kind: OperationKind): void {
    this.records.set(record.id, record);
    this.seq += 1;
    this.changeLog.push({ seq: this.seq, change: recordToChange(record, kind) });
  }

  private takeFault(queue: InjectedFault[]): RemoteError | null {
    const kind = queue.shift();
    switch (kind) {
      case undefined:
        return null;
      case RemoteErrorKind.NETWORK:
        return RemoteError.network('Injected network failure');
      case RemoteErrorKind.UNAUTHORIZED:
        return RemoteError.unauthorized('Injected unauthorized response');
      case RemoteErrorKind.SERVER_FAULT:
        return RemoteError.serverFault('Injected server fault');
    }
  }

  /**
   * Wait out the configured latency. Returns the network error the call ends
   * with, if any.
   */
  private async settle(signal: AbortSignal | undefined): Promise<RemoteError | null> {
    if (this.config.latencyMs > 0 && !signal?.aborted) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(done, this.config.latencyMs);
        function done() {
          clearTimeout(timer);
          signal?.removeEventListener('abort', done);
          resolve();
        }
        signal?.addEventListener('abort', done);
      });
    }

    if (signal?.aborted) {
      return RemoteError.network('Request aborted');
    }
    if (!this.reachable) {
      return RemoteError.network('Remote unreachable');
    }
    return null;
  }
}
