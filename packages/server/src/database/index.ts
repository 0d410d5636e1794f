/**
 * Remote store - where the server keeps the authoritative records
 * @module database
 */

import nano, { type DocumentScope, type MaybeDocument, type ServerScope } from 'nano';
import { z } from 'zod';
import {
  OperationKind,
  recordDataSchema,
  recordToChange,
  type Logger,
  type RecordData,
  type RemoteAck,
  type RemoteChange,
  type SyncRecord,
} from '@tidesync/sdk';

/**
 * One page of the change feed
 */
export interface ChangePage {
  changes: RemoteChange[];
  /** Opaque position after the last change in the page */
  checkpoint: string;
  hasMore: boolean;
}

/**
 * Checkpoint the store cannot interpret
 */
export class InvalidCheckpointError extends Error {
  constructor(checkpoint: string) {
    super(`Invalid checkpoint: ${checkpoint}`);
    this.name = 'InvalidCheckpointError';
  }
}

/**
 * Storage behind the sync server. Writes are serialized by the caller.
 */
export interface RemoteStore {
  getRecord(id: string): Promise<SyncRecord | null>;
  /** Publish a new version of a record on the change feed */
  putRecord(record: SyncRecord, kind: OperationKind): Promise<void>;
  getAck(operationId: string): Promise<RemoteAck | null>;
  saveAck(ack: RemoteAck): Promise<void>;
  /**
   * Changes after `since`, oldest first
   * @throws InvalidCheckpointError
   */
  changesSince(since: string | null, limit: number): Promise<ChangePage>;
  close(): Promise<void>;
}

/**
 * Process-local store
 */
export class MemoryRemoteStore implements RemoteStore {
  private records = new Map<string, SyncRecord>();
  private acks = new Map<string, RemoteAck>();
  private changeLog: Array<{ seq: number; change: RemoteChange }> = [];
  private seq = 0;

  async getRecord(id: string): Promise<SyncRecord | null> {
    return this.records.get(id) ?? null;
  }

  async putRecord(record: SyncRecord, kind: OperationKind): Promise<void> {
    this.records.set(record.id, record);
    this.seq += 1;
    this.changeLog.push({ seq: this.seq, change: recordToChange(record, kind) });
  }

  async getAck(operationId: string): Promise<RemoteAck | null> {
    return this.acks.get(operationId) ?? null;
  }

  async saveAck(ack: RemoteAck): Promise<void> {
    this.acks.set(ack.operationId, ack);
  }

  async changesSince(since: string | null, limit: number): Promise<ChangePage> {
    const after = since === null ? 0 : Number(since);
    if (!Number.isInteger(after) || after < 0) {
      throw new InvalidCheckpointError(String(since));
    }

    const pending = this.changeLog.filter((entry) => entry.seq > after);
    const page = pending.slice(0, limit);
    const last = page[page.length - 1];

    return {
      changes: page.map((entry) => entry.change),
      checkpoint: String(last ? last.seq : after),
      hasMore: pending.length > page.length,
    };
  }

  async close(): Promise<void> {
    this.records.clear();
    this.acks.clear();
    this.changeLog = [];
  }
}

/**
 * CouchDB configuration
 */
export interface CouchDBConfig {
  url?: string;
  username?: string;
  password?: string;
  databasePrefix?: string;
  logger?: Logger;
}

interface RecordDoc extends MaybeDocument {
  version: number;
  updatedAt: number;
  deleted: boolean;
  data: RecordData;
  kind: OperationKind;
}

const recordDocSchema = z.object({
  version: z.number().int().nonnegative(),
  updatedAt: z.number().nonnegative(),
  deleted: z.boolean(),
  data: recordDataSchema,
  kind: z.nativeEnum(OperationKind),
});

interface AckDoc extends MaybeDocument {
  recordId: string;
  remoteVersion: number;
  remoteUpdatedAt: number;
}

function statusCode(error: unknown): number | undefined {
  return typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
    ? error.statusCode
    : undefined;
}

/**
 * CouchDB-backed store
 *
 * Records and acks live in two databases. The records database's _changes
 * feed is the pull feed, so a record edited several times between pulls
 * shows up once, at its latest version.
 */
export class CouchRemoteStore implements RemoteStore {
  private constructor(
    private records: DocumentScope<RecordDoc>,
    private acks: DocumentScope<AckDoc>
  ) {}

  /**
   * Connect and create the databases when missing
   */
  static async connect(config: CouchDBConfig = {}): Promise<CouchRemoteStore> {
    const {
      url = process.env.COUCHDB_URL ?? 'http://localhost:5984',
      username = process.env.COUCHDB_USERNAME,
      password = process.env.COUCHDB_PASSWORD,
      databasePrefix = process.env.COUCHDB_DB_PREFIX ?? 'tidesync',
      logger,
    } = config;

    // Build connection URL with auth if provided
    const urlObj = new URL(url);
    if (username && password) {
      urlObj.username = username;
      urlObj.password = password;
    }
    const server: ServerScope = nano(urlObj.toString());

    const recordsName = `${databasePrefix}-records`;
    const acksName = `${databasePrefix}-acks`;
    for (const name of [recordsName, acksName]) {
      try {
        await server.db.create(name);
        logger?.info({ database: name }, 'Created database');
      } catch (error) {
        // 412 means database already exists
        if (statusCode(error) !== 412) {
          throw error;
        }
      }
    }

    return new CouchRemoteStore(
      server.db.use<RecordDoc>(recordsName),
      server.db.use<AckDoc>(acksName)
    );
  }

  async getRecord(id: string): Promise<SyncRecord | null> {
    const doc = await this.fetch(this.records, id);
    return doc
      ? {
          id: doc._id,
          version: doc.version,
          updatedAt: doc.updatedAt,
          deleted: doc.deleted,
          data: doc.data,
        }
      : null;
  }

  async putRecord(record: SyncRecord, kind: OperationKind): Promise<void> {
    const existing = await this.fetch(this.records, record.id);
    await this.records.insert({
      _id: record.id,
      _rev: existing?._rev,
      version: record.version,
      updatedAt: record.updatedAt,
      deleted: record.deleted,
      data: record.data,
      kind,
    });
  }

  async getAck(operationId: string): Promise<RemoteAck | null> {
    const doc = await this.fetch(this.acks, operationId);
    return doc
      ? {
          operationId: doc._id,
          recordId: doc.recordId,
          remoteVersion: doc.remoteVersion,
          remoteUpdatedAt: doc.remoteUpdatedAt,
        }
      : null;
  }

  async saveAck(ack: RemoteAck): Promise<void> {
    await this.acks.insert({
      _id: ack.operationId,
      recordId: ack.recordId,
      remoteVersion: ack.remoteVersion,
      remoteUpdatedAt: ack.remoteUpdatedAt,
    });
  }

  async changesSince(since: string | null, limit: number): Promise<ChangePage> {
    const feed = await this.records
      .changes({ since: since ?? '0', limit, include_docs: true })
      .catch((error: unknown) => {
        if (statusCode(error) === 400 && since !== null) {
          throw new InvalidCheckpointError(since);
        }
        throw error;
      });

    const changes: RemoteChange[] = [];
    for (const row of feed.results) {
      if (row.id.startsWith('_design/') || !('doc' in row)) {
        continue;
      }
      const parsed = recordDocSchema.safeParse(row.doc);
      if (!parsed.success) {
        continue;
      }
      const doc = parsed.data;
      changes.push(
        recordToChange(
          {
            id: row.id,
            version: doc.version,
            updatedAt: doc.updatedAt,
            deleted: doc.deleted,
            data: doc.data,
          },
          doc.kind
        )
      );
    }

    return {
      changes,
      checkpoint: String(feed.last_seq),
      hasMore: feed.results.length === limit,
    };
  }

  async close(): Promise<void> {
    // nano keeps no open connections beyond the HTTP agent
  }

  private async fetch<D extends MaybeDocument>(
    db: DocumentScope<D>,
    id: string
  ): Promise<(D & { _id: string; _rev: string }) | null> {
    try {
      return await db.get(id);
    } catch (error) {
      if (statusCode(error) === 404) {
        return null;
      }
      throw error;
    }
  }
}
