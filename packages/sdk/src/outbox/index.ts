/**
 * Outbox module - the durable, ordered log of pending mutations
 * @module outbox
 */

import { Observable, map } from 'rxjs';
import type { MangoQuerySortPart, RxCollection } from 'rxdb';
import { withStorageErrors } from '../storage/guard.js';
import {
  OperationStatus,
  type Operation,
  type OperationDocType,
} from '../storage/schema.js';
import { coalesce, type OperationInput } from './coalesce.js';

export {
  coalesce,
  coalesceKinds,
  syncStateFor,
  wasAttempted,
  type OperationInput,
} from './coalesce.js';

/**
 * Configuration for the operation log
 */
export interface OutboxConfig {
  /**
   * Attempts allowed before an operation is dead-lettered
   * @default 5
   */
  maxAttempts?: number;
  clock?: () => number;
}

/**
 * Result of an enqueue
 */
export interface EnqueueResult {
  /** The record's pending operation after coalescing, null if it cancelled out */
  operation: Operation | null;
  coalesced: boolean;
  /** Restore the log to its state before this enqueue */
  undo: () => Promise<void>;
}

/**
 * Result of recording a failed push
 */
export interface FailResult {
  operation: Operation;
  deadLettered: boolean;
}

const QUEUE_ORDER: MangoQuerySortPart<OperationDocType>[] = [{ enqueuedAt: 'asc' }, { id: 'asc' }];

function toOperation(doc: OperationDocType): Operation {
  return {
    operationId: doc.id,
    recordId: doc.recordId,
    kind: doc.kind,
    payload: doc.payload,
    baseVersion: doc.baseVersion,
    updatedAt: doc.updatedAt,
    enqueuedAt: doc.enqueuedAt,
    attemptCount: doc.attemptCount,
    lastError: doc.lastError === '' ? null : doc.lastError,
    status: doc.status,
  };
}

function toDoc(operation: Operation): OperationDocType {
  return {
    id: operation.operationId,
    recordId: operation.recordId,
    kind: operation.kind,
    payload: operation.payload,
    baseVersion: operation.baseVersion,
    updatedAt: operation.updatedAt,
    enqueuedAt: operation.enqueuedAt,
    attemptCount: operation.attemptCount,
    lastError: operation.lastError ?? '',
    status: operation.status,
  };
}

/**
 * Operation log - queues mutations, coalesces them per record and tracks
 * push attempts.
 *
 * It does not lock on its own; callers run multi-step units inside
 * `RecordStore.transaction()`.
 */
export class OperationLog {
  private collection: RxCollection<OperationDocType>;
  private config: Required<OutboxConfig>;

  private defaultConfig: Required<OutboxConfig> = {
    maxAttempts: 5,
    clock: Date.now,
  };

  constructor(collection: RxCollection<OperationDocType>, config: OutboxConfig = {}) {
    this.collection = collection;
    this.config = { ...this.defaultConfig, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Enqueue a mutation, merging it into the record's latest pending operation
   * when there is one. An in-flight or dead-lettered operation is never merged
   * into; the mutation queues behind it instead.
   */
  async enqueue(input: OperationInput): Promise<EnqueueResult> {
    const latest = await this.latestFor(input.recordId);

    if (!latest || latest.status !== OperationStatus.PENDING) {
      const operation: Operation = {
        operationId: this.generateOperationId(),
        recordId: input.recordId,
        kind: input.kind,
        payload: input.payload,
        baseVersion: input.baseVersion,
        updatedAt: input.updatedAt,
        enqueuedAt: this.config.clock(),
        attemptCount: 0,
        lastError: null,
        status: OperationStatus.PENDING,
      };
      await this.insert(operation);

      return {
        operation,
        coalesced: false,
        undo: () => this.remove(operation.operationId),
      };
    }

    const merged = coalesce(latest, input, this.generateOperationId());
    await this.replace([latest], merged);

    return {
      operation: merged,
      coalesced: true,
      undo: () => this.replace(merged ? [merged] : [], latest).then(() => undefined),
    };
  }

  /**
   * Pending operations in queue order (enqueuedAt, then operationId)
   */
  async peekBatch(limit = 50): Promise<Operation[]> {
    const docs = await withStorageErrors('Failed to read outbox', () =>
      this.collection
        .find({
          selector: { status: OperationStatus.PENDING },
          sort: QUEUE_ORDER,
          limit,
        })
        .exec()
    );
    return docs.map((doc) => toOperation(doc.toMutableJSON()));
  }

  async get(operationId: string): Promise<Operation | null> {
    const doc = await this.findDoc(operationId);
    return doc ? toOperation(doc.toMutableJSON()) : null;
  }

  /**
   * Claim a pending operation for a push. Returns its current contents, or
   * null when it was coalesced away or is no longer pending.
   */
  async markInFlight(operationId: string): Promise<Operation | null> {
    const operation = await this.get(operationId);
    if (!operation || operation.status !== OperationStatus.PENDING) {
      return null;
    }

    const inFlight = { ...operation, status: OperationStatus.IN_FLIGHT };
    await this.upsert(inFlight);
    return inFlight;
  }

  /**
   * Remove an operation the remote confirmed
   */
  async ack(operationId: string): Promise<void> {
    await this.remove(operationId);
  }

  /**
   * Record a failed push. The operation returns to the queue, or moves to the
   * dead-letter view once its attempts exceed the ceiling.
   */
  async fail(operationId: string, error: string): Promise<FailResult | null> {
    const operation = await this.get(operationId);
    if (!operation) {
      return null;
    }

    const attemptCount = operation.attemptCount + 1;
    const deadLettered = attemptCount > this.config.maxAttempts;
    const failed: Operation = {
      ...operation,
      attemptCount,
      lastError: error,
      status: deadLettered ? OperationStatus.DEAD : OperationStatus.PENDING,
    };
    await this.upsert(failed);

    if (deadLettered) {
      return { operation: failed, deadLettered };
    }

    // Mutations queued while this one was in flight fold back into it
    const collapsed = await this.collapse(operation.recordId);
    return { operation: collapsed ?? failed, deadLettered };
  }

  /**
   * Operations for one record in queue order
   */
  async forRecord(recordId: string, includeDead = false): Promise<Operation[]> {
    const docs = await withStorageErrors(`Failed to read outbox for ${recordId}`, () =>
      this.collection.find({ selector: { recordId }, sort: QUEUE_ORDER }).exec()
    );
    return docs
      .map((doc) => toOperation(doc.toMutableJSON()))
      .filter((operation) => includeDead || operation.status !== OperationStatus.DEAD);
  }

  /**
   * Point queued operations for a record at a newly confirmed remote version
   */
  async rebase(recordId: string, baseVersion: number): Promise<Operation[]> {
    const rebased: Operation[] = [];
    for (const operation of await this.forRecord(recordId)) {
      if (operation.status === OperationStatus.PENDING) {
        const next = { ...operation, baseVersion };
        await this.upsert(next);
        rebased.push(next);
      }
    }
    return rebased;
  }

  /**
   * Return operations left in flight by an interrupted run to the queue.
   * Their pushes were never confirmed, so they are retried.
   */
  async recoverInFlight(): Promise<Operation[]> {
    const docs = await withStorageErrors('Failed to read outbox', () =>
      this.collection.find({ selector: { status: OperationStatus.IN_FLIGHT } }).exec()
    );

    const recovered: Operation[] = [];
    for (const doc of docs) {
      const operation = toOperation(doc.toMutableJSON());
      await this.upsert({ ...operation, status: OperationStatus.PENDING });
      const collapsed = await this.collapse(operation.recordId);
      if (collapsed) {
        recovered.push(collapsed);
      }
    }
    return recovered;
  }

  async deadLettered(): Promise<Operation[]> {
    const docs = await withStorageErrors('Failed to read dead letters', () =>
      this.collection
        .find({ selector: { status: OperationStatus.DEAD }, sort: QUEUE_ORDER })
        .exec()
    );
    return docs.map((doc) => toOperation(doc.toMutableJSON()));
  }

  /**
   * Drop an operation for good
   */
  async discard(operationId: string): Promise<Operation | null> {
    const operation = await this.get(operationId);
    if (operation) {
      await this.remove(operationId);
    }
    return operation;
  }

  /**
   * Put a dead-lettered operation back in the queue with a fresh attempt budget
   */
  async resubmit(operationId: string): Promise<Operation | null> {
    const operation = await this.get(operationId);
    if (!operation || operation.status !== OperationStatus.DEAD) {
      return null;
    }

    await this.upsert({ ...operation, attemptCount: 0, status: OperationStatus.PENDING });
    return this.collapse(operation.recordId);
  }

  /**
   * Operations still headed for the remote (pending or in flight)
   */
  async pendingCount(): Promise<number> {
    const docs = await withStorageErrors('Failed to count outbox', () =>
      this.collection.find({ selector: { status: { $ne: OperationStatus.DEAD } } }).exec()
    );
    return docs.length;
  }

  /**
   * Observe the whole log in queue order
   */
  observe$(): Observable<Operation[]> {
    return this.collection
      .find({ sort: QUEUE_ORDER })
      .$.pipe(map((docs) => docs.map((doc) => toOperation(doc.toMutableJSON()))));
  }

  /**
   * Clear all operations from the log
   */
  async clear(): Promise<void> {
    await withStorageErrors('Failed to clear outbox', () =>
      this.collection.find().remove()
    );
  }

  /**
   * Fold a record's pending operations into one, in queue order.
   * Returns the surviving operation, or null when they cancelled out.
   */
  private async collapse(recordId: string): Promise<Operation | null> {
    const pending = (await this.forRecord(recordId)).filter(
      (operation) => operation.status === OperationStatus.PENDING
    );
    if (pending.length <= 1) {
      return pending[0] ?? null;
    }

    let result: Operation | null = null;
    for (const operation of pending) {
      result = result ? coalesce(result, operation, operation.operationId) : operation;
    }

    await this.replace(pending, result);
    return result;
  }

  /**
   * The newest operation for a record that has not been dead-lettered
   */
  private async latestFor(recordId: string): Promise<Operation | null> {
    const operations = await this.forRecord(recordId);
    return operations[operations.length - 1] ?? null;
  }

  private async replace(previous: Operation[], next: Operation | null): Promise<Operation | null> {
    for (const operation of previous) {
      if (operation.operationId !== next?.operationId) {
        await this.remove(operation.operationId);
      }
    }
    if (next) {
      await this.upsert(next);
    }
    return next;
  }

  private async findDoc(operationId: string) {
    return withStorageErrors(`Failed to read operation ${operationId}`, () =>
      this.collection.findOne(operationId).exec()
    );
  }

  private async insert(operation: Operation): Promise<void> {
    await withStorageErrors(`Failed to enqueue operation for ${operation.recordId}`, () =>
      this.collection.insert(toDoc(operation))
    );
  }

  private async upsert(operation: Operation): Promise<void> {
    await withStorageErrors(`Failed to write operation ${operation.operationId}`, () =>
      this.collection.upsert(toDoc(operation))
    );
  }

  private async remove(operationId: string): Promise<void> {
    const doc = await this.findDoc(operationId);
    if (doc) {
      await withStorageErrors(`Failed to remove operation ${operationId}`, () => doc.remove());
    }
  }

  /**
   * Generate a unique operation ID
   */
  private generateOperationId(): string {
    return `op_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
  }
}
