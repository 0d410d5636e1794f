/**
 * Client module - wires the engine together from one configuration object
 * @module client
 */

import type { RxStorage } from 'rxdb';
import { SyncEngineError } from '../errors.js';
import { HttpRemoteGateway, type HttpRemoteGatewayConfig } from '../gateway/http.js';
import type { RemoteGateway } from '../gateway/types.js';
import { createLogger, type Logger } from '../logger.js';
import { ConnectivityMonitor, type ConnectivityMonitorConfig } from '../network/index.js';
import { OperationLog, type OutboxConfig } from '../outbox/index.js';
import { OfflineRepository } from '../repository/index.js';
import { closeDatabase, createDatabase, type SyncDatabase } from '../storage/init.js';
import { RecordStore } from '../storage/record-store.js';
import { CheckpointStore, SyncOrchestrator, type SyncConfig } from '../sync/index.js';

/**
 * SDK client configuration
 */
export interface ClientConfig {
  database?: {
    name?: string;
    storage?: RxStorage<unknown, unknown>;
    multiInstance?: boolean;
  };
  /** HTTP sync server; ignored when `gateway` is given */
  remote?: Omit<HttpRemoteGatewayConfig, 'logger'>;
  /** Any other transport to the remote store */
  gateway?: RemoteGateway;
  network?: Omit<ConnectivityMonitorConfig, 'logger'>;
  sync?: Omit<SyncConfig, 'logger'> & {
    /**
     * Start background sync during init()
     * @default true
     */
    autoStart?: boolean;
  };
  outbox?: OutboxConfig;
  /** Local write timestamps */
  clock?: () => number;
  logger?: Logger;
}

interface ClientParts {
  db: SyncDatabase;
  store: RecordStore;
  outbox: OperationLog;
  sync: SyncOrchestrator;
  repository: OfflineRepository;
}

/**
 * SDK client - main entry point for the offline sync engine
 */
export class SyncClient {
  private config: ClientConfig;
  private logger: Logger;
  private network: ConnectivityMonitor;
  private parts: ClientParts | null = null;
  private initializing: Promise<void> | null = null;

  constructor(config: ClientConfig = {}) {
    this.config = config;
    this.logger = config.logger ?? createLogger();
    this.network = new ConnectivityMonitor({
      ...config.network,
      logger: this.logger.child({ component: 'network' }),
    });
  }

  /**
   * Open the database, wire the components and start syncing
   */
  init(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.open().catch((error: unknown) => {
        this.initializing = null;
        throw error;
      });
    }
    return this.initializing;
  }

  /**
   * The application-facing repository
   */
  get repository(): OfflineRepository {
    return this.require().repository;
  }

  /**
   * Get the database instance
   */
  getDatabase(): SyncDatabase {
    return this.require().db;
  }

  /**
   * Get the connectivity monitor
   */
  getNetworkMonitor(): ConnectivityMonitor {
    return this.network;
  }

  /**
   * Get the sync orchestrator
   */
  getSyncOrchestrator(): SyncOrchestrator {
    return this.require().sync;
  }

  /**
   * Check if currently online
   */
  isOnline(): boolean {
    return this.network.isConnected();
  }

  /**
   * Stop syncing and close the database. Local data is kept.
   */
  async destroy(): Promise<void> {
    await this.initializing?.catch((error: unknown) =>
      this.logger.debug({ err: error }, 'Destroying a client whose init failed')
    );
    const parts = this.parts;
    this.parts = null;
    this.initializing = null;

    if (parts) {
      await parts.sync.stop();
      parts.store.close();
      await closeDatabase(parts.db);
    }
    this.network.destroy();
  }

  private async open(): Promise<void> {
    const gateway = this.createGateway();
    const db = await createDatabase(this.config.database);

    const store = new RecordStore(db.records);
    const outbox = new OperationLog(db.outbox_operations, this.config.outbox);
    const { autoStart = true, ...syncConfig } = this.config.sync ?? {};
    const sync = new SyncOrchestrator(
      {
        store,
        outbox,
        gateway,
        monitor: this.network,
        checkpoints: new CheckpointStore(db.sync_metadata),
      },
      { ...syncConfig, logger: this.logger.child({ component: 'sync' }) }
    );
    const repository = new OfflineRepository(
      { store, outbox, sync },
      { clock: this.config.clock, logger: this.logger.child({ component: 'repository' }) }
    );

    this.parts = { db, store, outbox, sync, repository };

    if (autoStart) {
      await sync.start();
    }
    this.logger.info({ database: db.name }, 'Sync client ready');
  }

  private createGateway(): RemoteGateway {
    if (this.config.gateway) {
      return this.config.gateway;
    }
    if (this.config.remote) {
      return new HttpRemoteGateway({
        ...this.config.remote,
        logger: this.logger.child({ component: 'gateway' }),
      });
    }
    throw new SyncEngineError('No remote configured: pass `remote` or `gateway`', 'CONFIG');
  }

  private require(): ClientParts {
    if (!this.parts) {
      throw new SyncEngineError('Client not initialized. Call init() first.', 'NOT_INITIALIZED');
    }
    return this.parts;
  }
}
