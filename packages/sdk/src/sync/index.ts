/**
 * Sync module - drains the outbox, pulls remote changes and reconciles them
 * @module sync
 */

import { BehaviorSubject, Observable, Subscription } from 'rxjs';
import { RemoteError, RemoteErrorKind, StorageError, errorMessage } from '../errors.js';
import {
  changeToRecord,
  err,
  type PullBatch,
  type RemoteAck,
  type RemoteGateway,
  type Result,
} from '../gateway/types.js';
import { createLogger, type Logger } from '../logger.js';
import { ConnectivityEvent, type ConnectivityMonitor } from '../network/index.js';
import { syncStateFor, type OperationLog } from '../outbox/index.js';
import {
  lastWriteWins,
  neverRequiresAttention,
  sameContent,
  type AttentionPolicy,
  type ConflictResolver,
} from '../resolver/index.js';
import type { RecordStore, RecordWrite } from '../storage/record-store.js';
import {
  OperationKind,
  OperationStatus,
  SyncState,
  type Operation,
  type StoredRecord,
  type SyncRecord,
} from '../storage/schema.js';
import { BackoffPolicy, type BackoffOptions } from './backoff.js';
import type { CheckpointStore } from './checkpoint.js';

export { BackoffPolicy, type BackoffOptions } from './backoff.js';
export { CheckpointStore, type CheckpointState } from './checkpoint.js';

/**
 * Orchestrator phases
 */
export enum SyncPhase {
  IDLE = 'idle',
  DRAINING = 'draining',
  PULLING = 'pulling',
  RECONCILING = 'reconciling',
  ERROR_BACKOFF = 'error_backoff',
  STOPPED = 'stopped',
}

/**
 * Sync status
 */
export interface SyncStatus {
  phase: SyncPhase;
  /** End of the last cycle that drained and pulled everything, 0 if never */
  lastSyncAt: number;
  /** Operations still headed for the remote */
  pendingCount: number;
  deadLetterCount: number;
  consecutiveFailures: number;
  /** When the backoff timer fires, null outside backoff */
  nextRetryAt: number | null;
  error: string | null;
}

/**
 * Result of a sync cycle
 */
export interface SyncResult {
  /** Operations the remote acknowledged */
  pushed: number;
  conflicts: number;
  deadLettered: number;
  /** Remote changes received */
  pulled: number;
  /** Record writes made from pulled changes */
  applied: number;
  /** Pulled changes left for a later drain to resolve */
  deferred: number;
  /** Drained and pulled everything */
  completed: boolean;
  error: string | null;
}

/**
 * Sync configuration
 */
export interface SyncConfig {
  /**
   * Interval between background cycles (ms); 0 disables the timer
   * @default 60000
   */
  interval?: number;
  /**
   * Operations read from the outbox at a time
   * @default 50
   */
  batchSize?: number;
  /** @default 30000 */
  pushTimeout?: number;
  /** @default 30000 */
  pullTimeout?: number;
  backoff?: BackoffOptions;
  resolver?: ConflictResolver;
  /** Decides which resolved conflicts are flagged Conflicted */
  requiresAttention?: AttentionPolicy;
  /**
   * How long stop() lets a running cycle finish before aborting its calls
   * @default 5000
   */
  stopTimeout?: number;
  clock?: () => number;
  logger?: Logger;
}

export interface SyncDependencies {
  store: RecordStore;
  outbox: OperationLog;
  gateway: RemoteGateway;
  monitor: ConnectivityMonitor;
  checkpoints: CheckpointStore;
}

type StepOutcome = 'done' | 'backoff' | 'interrupted';

type OperationOutcome = 'continue' | 'backoff' | 'interrupted';

interface PendingEnqueue {
  record: SyncRecord;
  baseVersion: number;
}

const emptyResult = (): SyncResult => ({
  pushed: 0,
  conflicts: 0,
  deadLettered: 0,
  pulled: 0,
  applied: 0,
  deferred: 0,
  completed: false,
  error: null,
});

/**
 * Sync orchestrator - coordinates background synchronization
 *
 * Runs one cycle at a time: drain the outbox, then pull and reconcile page by
 * page. Triggers arriving during a cycle fold into a single follow-up cycle.
 * Record and outbox units run inside `store.transaction()` so they never
 * interleave with the application's writes.
 */
export class SyncOrchestrator {
  private store: RecordStore;
  private outbox: OperationLog;
  private gateway: RemoteGateway;
  private monitor: ConnectivityMonitor;
  private checkpoints: CheckpointStore;
  private config: Required<Omit<SyncConfig, 'logger' | 'backoff'>>;
  private backoff: BackoffPolicy;
  private logger: Logger;

  private stateSubject: BehaviorSubject<SyncStatus>;
  private subscriptions: Subscription[] = [];
  private syncTimer?: ReturnType<typeof setInterval>;
  private backoffTimer?: ReturnType<typeof setTimeout>;
  private activeCalls = new Map<AbortController, (reason: string) => void>();

  private cycle: Promise<SyncResult> | null = null;
  private followUp: Promise<SyncResult> | null = null;
  private started = false;
  private stopping = false;
  private resyncRequested = false;

  private defaultConfig: Required<Omit<SyncConfig, 'logger' | 'backoff'>> = {
    interval: 60000,
    batchSize: 50,
    pushTimeout: 30000,
    pullTimeout: 30000,
    resolver: lastWriteWins,
    requiresAttention: neverRequiresAttention,
    stopTimeout: 5000,
    clock: Date.now,
  };

  constructor(deps: SyncDependencies, config: SyncConfig = {}) {
    this.store = deps.store;
    this.outbox = deps.outbox;
    this.gateway = deps.gateway;
    this.monitor = deps.monitor;
    this.checkpoints = deps.checkpoints;
    this.config = { ...this.defaultConfig, ...config };
    this.backoff = new BackoffPolicy(config.backoff);
    this.logger = config.logger ?? createLogger({ name: 'tidesync:sync' });
    this.stateSubject = new BehaviorSubject<SyncStatus>({
      phase: SyncPhase.IDLE,
      lastSyncAt: 0,
      pendingCount: 0,
      deadLetterCount: 0,
      consecutiveFailures: 0,
      nextRetryAt: null,
      error: null,
    });
  }

  /**
   * Status changes, starting with the current status
   */
  get state$(): Observable<SyncStatus> {
    return this.stateSubject.asObservable();
  }

  /**
   * Recover interrupted pushes, start listening for triggers and run a first
   * cycle when connected.
   */
  async start(): Promise<void> {
    if (this.started || this.stopping) {
      return;
    }
    this.started = true;

    const recovered = await this.store.transaction(() => this.outbox.recoverInFlight());
    if (recovered.length > 0) {
      this.logger.info({ count: recovered.length }, 'Recovered unconfirmed pushes');
    }

    const { lastSyncAt } = await this.checkpoints.load();
    this.updateState({ lastSyncAt });

    this.subscriptions.push(
      this.outbox.observe$().subscribe({
        next: (operations) => this.updateCounts(operations),
        error: (error: unknown) => this.logger.error({ err: error }, 'Outbox stream failed'),
      }),
      this.monitor.onChange().subscribe((event) => {
        if (event === ConnectivityEvent.ONLINE) {
          this.logger.info('Back online, syncing');
          this.kick('online');
        } else {
          this.goOffline();
        }
      })
    );

    if (this.config.interval > 0) {
      this.syncTimer = setInterval(() => {
        if (this.stateSubject.value.phase === SyncPhase.IDLE && this.monitor.isConnected()) {
          this.kick('timer');
        }
      }, this.config.interval);
    }

    if (this.monitor.isConnected()) {
      this.kick('start');
    }
  }

  /**
   * Run a cycle now, or once the running one ends
   */
  triggerSync(): Promise<SyncResult> {
    if (this.stopping) {
      return Promise.resolve({ ...emptyResult(), error: 'Sync stopped' });
    }
    if (this.followUp) {
      return this.followUp;
    }
    const running = this.cycle;
    if (running) {
      const followUp = running.then(() => {
        this.followUp = null;
        return this.launch();
      });
      this.followUp = followUp;
      return followUp;
    }
    return this.launch();
  }

  /**
   * Forget the pull checkpoint and pull everything again
   */
  requestFullResync(): Promise<SyncResult> {
    this.scheduleFullResync();
    return this.triggerSync();
  }

  /**
   * Pull from the beginning on the next cycle, without starting one
   */
  scheduleFullResync(): void {
    this.resyncRequested = true;
  }

  /**
   * Stop syncing. A running cycle gets `timeout` ms to finish before its
   * remote calls are aborted; operations left in flight are retried on the
   * next start.
   */
  async stop(timeout = this.config.stopTimeout): Promise<void> {
    if (this.stopping) {
      await this.cycle;
      return;
    }
    this.stopping = true;
    this.teardown();

    const running = this.cycle;
    if (running) {
      const timer = setTimeout(() => this.abortCalls('Sync stopped'), timeout);
      await running;
      clearTimeout(timer);
    }

    this.updateState({ phase: SyncPhase.STOPPED, nextRetryAt: null });
    this.stateSubject.complete();
  }

  /**
   * Subscribe to sync state changes
   */
  onStateChange(callback: (state: SyncStatus) => void): () => void {
    const subscription = this.stateSubject.subscribe(callback);
    return () => subscription.unsubscribe();
  }

  /**
   * Get current sync state
   */
  getState(): SyncStatus {
    return { ...this.stateSubject.value };
  }

  private launch(): Promise<SyncResult> {
    const cycle = this.runCycle().finally(() => {
      if (this.cycle === cycle) {
        this.cycle = null;
      }
    });
    this.cycle = cycle;
    return cycle;
  }

  private kick(reason: string): void {
    this.triggerSync().then(
      (result) => this.logger.debug({ reason, result }, 'Sync cycle finished'),
      (error: unknown) => this.logger.error({ err: error, reason }, 'Sync cycle failed')
    );
  }

  private async runCycle(): Promise<SyncResult> {
    const result = emptyResult();
    if (this.stopping) {
      return { ...result, error: 'Sync stopped' };
    }

    this.clearBackoffTimer();
    if (!this.monitor.isConnected()) {
      this.updateState({ phase: SyncPhase.IDLE, nextRetryAt: null });
      return { ...result, error: 'Offline' };
    }

    try {
      this.updateState({ phase: SyncPhase.DRAINING, nextRetryAt: null });
      const drained = await this.drain(result);
      if (drained !== 'done') {
        return this.endCycle(result, drained);
      }

      this.updateState({ phase: SyncPhase.PULLING });
      const pulled = await this.pull(result);
      if (pulled !== 'done') {
        return this.endCycle(result, pulled);
      }

      result.completed = true;
      this.updateState({
        phase: SyncPhase.IDLE,
        lastSyncAt: this.config.clock(),
        consecutiveFailures: 0,
        error: result.error,
      });
      return result;
    } catch (error) {
      result.error = errorMessage(error);

      if (error instanceof StorageError && error.isFatal) {
        this.logger.error({ err: error }, 'Local storage is corrupt, stopping sync');
        this.stopping = true;
        this.teardown();
        this.updateState({ phase: SyncPhase.STOPPED, nextRetryAt: null, error: result.error });
        return result;
      }

      this.logger.warn({ err: error }, 'Sync cycle failed');
      this.enterBackoff(result.error);
      return result;
    }
  }

  private endCycle(result: SyncResult, outcome: 'backoff' | 'interrupted'): SyncResult {
    if (outcome === 'backoff') {
      this.enterBackoff(result.error ?? 'Sync failed');
    } else if (!this.stopping) {
      this.updateState({ phase: SyncPhase.IDLE, nextRetryAt: null });
    }
    return result;
  }

  // --- Draining ---

  private async drain(result: SyncResult): Promise<StepOutcome> {
    for (;;) {
      const batch = await this.outbox.peekBatch(this.config.batchSize);
      if (batch.length === 0) {
        return 'done';
      }

      for (const queued of batch) {
        if (this.stopping || !this.monitor.isConnected()) {
          return 'interrupted';
        }
        const outcome = await this.pushOperation(queued, result);
        if (outcome !== 'continue') {
          return outcome;
        }
      }
    }
  }

  private async pushOperation(queued: Operation, result: SyncResult): Promise<OperationOutcome> {
    const operation = await this.store.transaction(() =>
      this.outbox.markInFlight(queued.operationId)
    );
    if (!operation) {
      return 'continue';
    }

    const response = await this.callRemote(
      (signal) => this.gateway.push(operation, { signal }),
      this.config.pushTimeout,
      'Push'
    );

    if (response.ok) {
      await this.store.transaction(() => this.applyAck(operation, response.value));
      result.pushed += 1;
      return 'continue';
    }

    const error = response.error;
    switch (error.kind) {
      case RemoteErrorKind.CONFLICT:
        if (!error.remote) {
          return this.failOperation(operation, error, result);
        }
        await this.resolveConflict(operation, error.remote);
        result.conflicts += 1;
        return 'continue';

      case RemoteErrorKind.NETWORK:
        this.revalidateConnectivity();
        return this.failOperation(operation, error, result);

      case RemoteErrorKind.UNAUTHORIZED:
      case RemoteErrorKind.SERVER_FAULT:
        return this.failOperation(operation, error, result);
    }
  }

  private async failOperation(
    operation: Operation,
    error: RemoteError,
    result: SyncResult
  ): Promise<OperationOutcome> {
    result.error = error.message;

    if (this.stopping) {
      // Left in flight; recovered on the next start
      return 'interrupted';
    }

    const failed = await this.store.transaction(() =>
      this.outbox.fail(operation.operationId, error.message)
    );
    this.logger.warn(
      {
        operationId: operation.operationId,
        recordId: operation.recordId,
        kind: error.kind,
        attempt: failed?.operation.attemptCount,
      },
      `Push failed: ${error.message}`
    );

    if (failed?.deadLettered) {
      this.logger.error(
        { operationId: operation.operationId, recordId: operation.recordId },
        'Operation dead-lettered'
      );
      result.deadLettered += 1;
    }
    if (error.kind === RemoteErrorKind.NETWORK || !failed?.deadLettered) {
      return 'backoff';
    }
    return 'continue';
  }

  private async applyAck(operation: Operation, ack: RemoteAck): Promise<void> {
    await this.outbox.ack(operation.operationId);

    const local = await this.store.get(operation.recordId);
    const followUps = await this.outbox.forRecord(operation.recordId);
    const now = this.config.clock();

    if (followUps.length > 0) {
      await this.outbox.rebase(operation.recordId, ack.remoteVersion);
      if (local) {
        const latest = followUps[followUps.length - 1];
        const syncState = unlessConflicted(local, syncStateFor(latest.kind));
        await this.store.put({ ...local, version: ack.remoteVersion }, syncState, now);
      }
      return;
    }

    if (!local) {
      return;
    }
    if (local.deleted) {
      await this.store.delete(local.id);
      return;
    }
    const syncState = unlessConflicted(local, SyncState.CLEAN);
    await this.store.put({ ...local, version: ack.remoteVersion }, syncState, now);
  }

  /**
   * Settle a rejected push against the remote record it carried
   */
  private async resolveConflict(operation: Operation, remote: SyncRecord): Promise<void> {
    await this.store.transaction(async () => {
      const local = await this.store.get(operation.recordId);
      const mine = local ?? operationView(operation);
      const resolved = this.config.resolver.resolve(mine, remote);
      const attention = this.config.requiresAttention(mine, remote, resolved);

      for (const pending of await this.outbox.forRecord(operation.recordId)) {
        await this.outbox.discard(pending.operationId);
      }

      this.logger.info(
        {
          recordId: operation.recordId,
          resolver: this.config.resolver.name,
          remoteVersion: remote.version,
          keptRemote: sameContent(resolved, remote),
        },
        'Resolved push conflict'
      );

      const writes: RecordWrite[] = [];
      const enqueues: PendingEnqueue[] = [];
      this.planResolution(resolved, remote, attention, writes, enqueues);
      await this.commit(writes, enqueues);
    });
  }

  // --- Pulling ---

  private async pull(result: SyncResult): Promise<StepOutcome> {
    if (this.resyncRequested) {
      this.resyncRequested = false;
      await this.store.transaction(() => this.checkpoints.reset());
      this.logger.info('Checkpoint reset for a full resync');
    }

    let { checkpoint } = await this.checkpoints.load();

    for (;;) {
      if (this.stopping || !this.monitor.isConnected()) {
        return 'interrupted';
      }

      const since = checkpoint;
      const response = await this.callRemote(
        (signal) => this.gateway.pullSince(since, { signal }),
        this.config.pullTimeout,
        'Pull'
      );

      if (!response.ok && response.error.checkpointRejected && since !== null) {
        this.logger.warn({ checkpoint: since }, 'Checkpoint rejected, pulling from the start');
        await this.store.transaction(() => this.checkpoints.reset());
        checkpoint = null;
        continue;
      }

      if (!response.ok) {
        result.error = response.error.message;
        this.logger.warn({ kind: response.error.kind }, `Pull failed: ${response.error.message}`);
        if (response.error.kind === RemoteErrorKind.NETWORK) {
          this.revalidateConnectivity();
        }
        return this.stopping ? 'interrupted' : 'backoff';
      }

      const batch = response.value;
      result.pulled += batch.changes.length;

      this.updateState({ phase: SyncPhase.RECONCILING });
      await this.store.transaction(() => this.reconcile(batch, result));
      checkpoint = batch.checkpoint;

      if (!batch.hasMore) {
        return 'done';
      }
      this.updateState({ phase: SyncPhase.PULLING });
    }
  }

  /**
   * Apply one pulled page as a single batch, then advance the checkpoint
   */
  private async reconcile(batch: PullBatch, result: SyncResult): Promise<void> {
    const view = new Map<string, StoredRecord | null>();
    const queued = new Map<string, boolean>();
    const writes: RecordWrite[] = [];
    const enqueues: PendingEnqueue[] = [];

    for (const change of batch.changes) {
      const remote = changeToRecord(change);
      if (!view.has(remote.id)) {
        view.set(remote.id, await this.store.get(remote.id));
      }
      const local = view.get(remote.id) ?? null;
      const before = writes.length;

      if (local && local.syncState !== SyncState.CLEAN) {
        if (!queued.has(remote.id)) {
          queued.set(remote.id, (await this.outbox.forRecord(remote.id)).length > 0);
        }
        if (queued.get(remote.id)) {
          // Settled by the conflict handling of a later drain
          result.deferred += 1;
          continue;
        }
        // Nothing left to push, only dead letters or a conflict flag
        if (remote.version > local.version) {
          writes.push(this.remoteWrite(remote, local));
        }
      } else if (!local) {
        if (!remote.deleted) {
          writes.push(this.cleanWrite(remote));
        }
      } else if (remote.version > local.version) {
        writes.push(this.remoteWrite(remote, local));
      } else if (remote.version === local.version && !sameContent(local, remote)) {
        const resolved = this.config.resolver.resolve(local, remote);
        const attention = this.config.requiresAttention(local, remote, resolved);
        this.planResolution(resolved, remote, attention, writes, enqueues);
        queued.set(remote.id, enqueues.some((pending) => pending.record.id === remote.id));
      }

      const write = writes.length > before ? writes[writes.length - 1] : undefined;
      if (write) {
        view.set(remote.id, write.type === 'put' ? viewAfter(write, local) : null);
      }
    }

    result.applied += writes.length;
    await this.commit(writes, enqueues);
    await this.checkpoints.save(batch.checkpoint, this.config.clock());
  }

  /**
   * Writes (and the operation, when the resolved record must still reach the
   * remote) that settle a record on `resolved`
   */
  private planResolution(
    resolved: SyncRecord,
    remote: SyncRecord,
    attention: boolean,
    writes: RecordWrite[],
    enqueues: PendingEnqueue[]
  ): void {
    const now = this.config.clock();

    if (sameContent(resolved, remote)) {
      if (remote.deleted) {
        writes.push({ type: 'delete', id: remote.id });
      } else {
        writes.push({
          type: 'put',
          record: remote,
          syncState: attention ? SyncState.CONFLICTED : SyncState.CLEAN,
          lastSyncedAt: now,
        });
      }
      return;
    }

    const record: SyncRecord = { ...resolved, version: remote.version };
    const kind = resolved.deleted ? OperationKind.DELETE : OperationKind.UPDATE;
    writes.push({
      type: 'put',
      record,
      syncState: attention ? SyncState.CONFLICTED : syncStateFor(kind),
    });
    enqueues.push({ record, baseVersion: remote.version });
  }

  private async commit(writes: RecordWrite[], enqueues: PendingEnqueue[]): Promise<void> {
    for (const { record, baseVersion } of enqueues) {
      await this.outbox.enqueue({
        recordId: record.id,
        kind: record.deleted ? OperationKind.DELETE : OperationKind.UPDATE,
        payload: record.data,
        baseVersion,
        updatedAt: record.updatedAt,
      });
    }
    await this.store.applyBatch(writes);
  }

  private cleanWrite(remote: SyncRecord): RecordWrite {
    return {
      type: 'put',
      record: remote,
      syncState: SyncState.CLEAN,
      lastSyncedAt: this.config.clock(),
    };
  }

  /**
   * Take a newer remote version. A conflicted record keeps its flag until
   * the application accepts it.
   */
  private remoteWrite(remote: SyncRecord, local: StoredRecord): RecordWrite {
    if (remote.deleted) {
      return { type: 'delete', id: remote.id };
    }
    return {
      type: 'put',
      record: remote,
      syncState:
        local.syncState === SyncState.CONFLICTED ? SyncState.CONFLICTED : SyncState.CLEAN,
      lastSyncedAt: this.config.clock(),
    };
  }

  // --- Remote calls ---

  /**
   * Call the remote with a timeout. Timeouts and aborts come back as network
   * errors even when the gateway ignores the signal.
   */
  private async callRemote<T>(
    call: (signal: AbortSignal) => Promise<Result<T, RemoteError>>,
    timeoutMs: number,
    label: string
  ): Promise<Result<T, RemoteError>> {
    const controller = new AbortController();
    const aborted = new Promise<Result<T, RemoteError>>((resolve) => {
      this.activeCalls.set(controller, (reason) => {
        controller.abort();
        resolve(err(RemoteError.network(reason)));
      });
    });
    const timer = setTimeout(
      () => this.activeCalls.get(controller)?.(`${label} timed out after ${timeoutMs}ms`),
      timeoutMs
    );

    try {
      return await Promise.race([
        call(controller.signal).catch((error: unknown) => err(RemoteError.from(error))),
        aborted,
      ]);
    } finally {
      clearTimeout(timer);
      this.activeCalls.delete(controller);
    }
  }

  private abortCalls(reason: string): void {
    for (const abort of [...this.activeCalls.values()]) {
      abort(reason);
    }
  }

  private revalidateConnectivity(): void {
    this.monitor.revalidate().catch((error: unknown) =>
      this.logger.warn({ err: error }, 'Connectivity check failed')
    );
  }

  // --- Scheduling ---

  private enterBackoff(error: string): void {
    const consecutiveFailures = this.stateSubject.value.consecutiveFailures + 1;

    if (this.stopping) {
      return;
    }
    if (!this.monitor.isConnected()) {
      this.updateState({ phase: SyncPhase.IDLE, consecutiveFailures, nextRetryAt: null, error });
      return;
    }

    const delay = this.backoff.delay(consecutiveFailures);
    this.clearBackoffTimer();
    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = undefined;
      this.kick('backoff');
    }, delay);

    this.logger.info({ delay, consecutiveFailures }, 'Backing off');
    this.updateState({
      phase: SyncPhase.ERROR_BACKOFF,
      consecutiveFailures,
      nextRetryAt: this.config.clock() + delay,
      error,
    });
  }

  private goOffline(): void {
    this.logger.info('Offline, sync paused');
    this.clearBackoffTimer();
    if (this.stateSubject.value.phase === SyncPhase.ERROR_BACKOFF) {
      this.updateState({ phase: SyncPhase.IDLE, nextRetryAt: null });
    }
  }

  private clearBackoffTimer(): void {
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = undefined;
    }
  }

  private teardown(): void {
    this.clearBackoffTimer();
    if (this.syncTimer) {
      clearInterval(this.syncTimer);
      this.syncTimer = undefined;
    }
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
  }

  private updateCounts(operations: Operation[]): void {
    const deadLetterCount = operations.filter((op) => op.status === OperationStatus.DEAD).length;
    this.updateState({
      pendingCount: operations.length - deadLetterCount,
      deadLetterCount,
    });
  }

  /**
   * Update sync state
   */
  private updateState(updates: Partial<SyncStatus>): void {
    if (this.stateSubject.closed || this.stateSubject.isStopped) {
      return;
    }
    this.stateSubject.next({ ...this.stateSubject.value, ...updates });
  }
}

/**
 * A Conflicted flag stays until the application accepts the record
 */
function unlessConflicted(local: StoredRecord, next: SyncState): SyncState {
  return local.syncState === SyncState.CONFLICTED ? SyncState.CONFLICTED : next;
}

function viewAfter(
  write: Extract<RecordWrite, { type: 'put' }>,
  local: StoredRecord | null
): StoredRecord {
  return {
    ...write.record,
    syncState: write.syncState,
    lastSyncedAt: write.lastSyncedAt ?? local?.lastSyncedAt ?? 0,
  };
}

/**
 * What the local side looked like when an operation was made, for records
 * that no longer exist locally
 */
export function operationView(operation: Operation): SyncRecord {
  return {
    id: operation.recordId,
    version: operation.baseVersion,
    updatedAt: operation.updatedAt,
    deleted: operation.kind === OperationKind.DELETE,
    data: operation.payload,
  };
}
