/**
 * tidesync server
 * Reference sync server: the authoritative remote store behind the HTTP gateway
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createLogger } from '@tidesync/sdk';
import { Applier } from './applier/index.js';
import {
  CouchRemoteStore,
  MemoryRemoteStore,
  type CouchDBConfig,
  type RemoteStore,
} from './database/index.js';
import { registerGatewayRoutes } from './gateway/index.js';

export * from './applier/index.js';
export * from './database/index.js';
export * from './gateway/index.js';

export interface ServerConfig {
  port?: number;
  host?: string;
  corsOrigin?: string | string[] | boolean;
  corsCredentials?: boolean;
  /** Bearer token clients must send */
  authToken?: string;
  logLevel?: string;
  /** Explicit store; otherwise CouchDB when configured, else memory */
  store?: RemoteStore;
  couchdb?: CouchDBConfig;
}

async function openStore(config: ServerConfig, logLevel: string): Promise<RemoteStore> {
  if (config.store) {
    return config.store;
  }
  if (config.couchdb ?? process.env.COUCHDB_URL) {
    return CouchRemoteStore.connect({
      ...config.couchdb,
      logger: createLogger({ name: 'tidesync:database', level: logLevel }),
    });
  }
  return new MemoryRemoteStore();
}

export async function createServer(config: ServerConfig = {}): Promise<FastifyInstance> {
  const {
    corsOrigin = process.env.CORS_ORIGIN ?? '*',
    corsCredentials = process.env.CORS_CREDENTIALS === 'true',
    authToken = process.env.SYNC_AUTH_TOKEN,
    logLevel = process.env.LOG_LEVEL ?? 'info',
  } = config;

  // Parse CORS origin from environment (comma-separated for multiple origins)
  const parsedOrigin =
    typeof corsOrigin === 'string' && corsOrigin.includes(',')
      ? corsOrigin.split(',').map((o) => o.trim())
      : corsOrigin;

  const store = await openStore(config, logLevel);
  const storeKind = store instanceof CouchRemoteStore ? 'couchdb' : 'memory';

  const server = Fastify({
    logger: {
      level: logLevel,
    },
  });

  if (storeKind === 'memory' && !config.store) {
    server.log.warn('No CouchDB configured, records are kept in memory');
  }

  await server.register(cors, {
    origin: parsedOrigin,
    credentials: corsCredentials,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'X-Compression'],
    exposedHeaders: ['X-Compression'],
  });

  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: Date.now(),
      store: storeKind,
    };
  });

  const applier = new Applier(store, createLogger({ name: 'tidesync:applier', level: logLevel }));
  await server.register(registerGatewayRoutes, { prefix: '/api/sync', applier, authToken });

  server.addHook('onClose', async () => {
    await store.close();
  });

  return server;
}

export async function startServer(config: ServerConfig = {}): Promise<FastifyInstance> {
  const { port = 3000, host = '0.0.0.0' } = config;

  const server = await createServer(config);

  try {
    await server.listen({ port, host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  return server;
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer({
    port: Number(process.env.PORT ?? 3000),
    host: process.env.HOST ?? '0.0.0.0',
  }).catch((error: unknown) => {
    createLogger({ name: 'tidesync:server' }).error({ err: error }, 'Failed to start server');
    process.exit(1);
  });
}
