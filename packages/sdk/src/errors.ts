/**
 * Error taxonomy shared by every engine component
 * @module errors
 */

import type { SyncRecord } from './storage/schema.js';

/**
 * Base class for engine errors.
 */
export class SyncEngineError extends Error {
  /**
   * @param code - Stable machine-readable code
   * @param cause - The underlying error, if any
   */
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'SyncEngineError';
  }
}

/**
 * Local persistence failure kinds
 */
export enum StorageErrorKind {
  /** Transient I/O failure; callers retry through their normal path */
  IO = 'io',
  /** Persisted data cannot be read back; fatal */
  CORRUPT = 'corrupt',
}

/**
 * RxDB error codes that mean stored data no longer matches its schema
 */
const CORRUPTION_CODES = new Set(['VD2']);

export class StorageError extends SyncEngineError {
  constructor(
    public readonly kind: StorageErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, `STORAGE_${kind.toUpperCase()}`, cause);
    this.name = 'StorageError';
  }

  get isFatal(): boolean {
    return this.kind === StorageErrorKind.CORRUPT;
  }

  static io(message: string, cause?: unknown): StorageError {
    return new StorageError(StorageErrorKind.IO, message, cause);
  }

  static corrupt(message: string, cause?: unknown): StorageError {
    return new StorageError(StorageErrorKind.CORRUPT, message, cause);
  }

  /**
   * Wrap an arbitrary error thrown by the storage layer
   */
  static from(error: unknown, context: string): StorageError {
    if (error instanceof StorageError) {
      return error;
    }

    const detail = error instanceof Error ? error.message : String(error);
    const code =
      error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : undefined;

    if (code && CORRUPTION_CODES.has(code)) {
      return StorageError.corrupt(`${context}: ${detail}`, error);
    }
    return StorageError.io(`${context}: ${detail}`, error);
  }
}

/**
 * Remote interaction failure kinds
 */
export enum RemoteErrorKind {
  NETWORK = 'network',
  CONFLICT = 'conflict',
  UNAUTHORIZED = 'unauthorized',
  SERVER_FAULT = 'server_fault',
}

const INVALID_CHECKPOINT_CODE = 'REMOTE_INVALID_CHECKPOINT';

export class RemoteError extends SyncEngineError {
  /**
   * @param remote - Current remote state, carried by conflicts
   */
  constructor(
    public readonly kind: RemoteErrorKind,
    message: string,
    public readonly remote?: SyncRecord,
    cause?: unknown,
    code = `REMOTE_${kind.toUpperCase()}`
  ) {
    super(message, code, cause);
    this.name = 'RemoteError';
  }

  /**
   * The remote no longer recognises the pull checkpoint; pulling again from
   * the beginning recovers
   */
  get checkpointRejected(): boolean {
    return this.code === INVALID_CHECKPOINT_CODE;
  }

  static network(message: string, cause?: unknown): RemoteError {
    return new RemoteError(RemoteErrorKind.NETWORK, message, undefined, cause);
  }

  static conflict(remote: SyncRecord): RemoteError {
    return new RemoteError(
      RemoteErrorKind.CONFLICT,
      `Remote record ${remote.id} is at version ${remote.version}`,
      remote
    );
  }

  static unauthorized(message = 'Unauthorized'): RemoteError {
    return new RemoteError(RemoteErrorKind.UNAUTHORIZED, message);
  }

  static serverFault(message: string, cause?: unknown): RemoteError {
    return new RemoteError(RemoteErrorKind.SERVER_FAULT, message, undefined, cause);
  }

  static invalidCheckpoint(message: string): RemoteError {
    return new RemoteError(
      RemoteErrorKind.SERVER_FAULT,
      message,
      undefined,
      undefined,
      INVALID_CHECKPOINT_CODE
    );
  }

  /**
   * Anything a transport throws is treated as a network failure
   */
  static from(error: unknown): RemoteError {
    if (error instanceof RemoteError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return RemoteError.network(message, error);
  }
}

export class RecordNotFoundError extends SyncEngineError {
  constructor(public readonly recordId: string) {
    super(`Record not found: ${recordId}`, 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
  }
}

export class DuplicateRecordError extends SyncEngineError {
  constructor(public readonly recordId: string) {
    super(`Record already exists: ${recordId}`, 'RECORD_EXISTS');
    this.name = 'DuplicateRecordError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
