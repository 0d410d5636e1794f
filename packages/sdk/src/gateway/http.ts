/**
 * HTTP remote gateway - talks to a sync server over fetch
 * @module gateway/http
 */

import type { z } from 'zod';
import { RemoteError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  COMPRESSED_CONTENT_TYPE,
  compressToBase64,
  decompressFromBase64,
} from '../storage/compression.js';
import type { Operation, SyncCheckpoint } from '../storage/schema.js';
import {
  err,
  ok,
  type PullBatch,
  type RemoteAck,
  type RemoteCallOptions,
  type RemoteGateway,
  type Result,
} from './types.js';
import {
  conflictResponseSchema,
  pullResponseSchema,
  pushResponseSchema,
  type PushRequest,
} from './wire.js';

/**
 * The subset of fetch the gateway needs
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRemoteGatewayConfig {
  /** Server base URL, e.g. http://localhost:3000/api/sync */
  url: string;
  headers?: Record<string, string>;
  /** Bearer token sent with every call; read per call so it can be refreshed */
  getAuthToken?: () => string | null;
  /**
   * Send MessagePack + DEFLATE bodies and ask for them back
   * @default true
   */
  enableCompression?: boolean;
  /**
   * Changes requested per pull
   * @default 100
   */
  pullLimit?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * HTTP remote gateway
 *
 * Maps responses onto RemoteError kinds: 409 is a conflict carrying the
 * remote record, 401/403 unauthorized, anything else unexpected a server
 * fault (a rejected pull checkpoint is marked as such). A thrown fetch (offline, DNS, abort) is a network error.
 */
export class HttpRemoteGateway implements RemoteGateway {
  private config: Required<Omit<HttpRemoteGatewayConfig, 'logger'>>;
  private logger: Logger;

  constructor(config: HttpRemoteGatewayConfig) {
    this.config = {
      headers: {},
      getAuthToken: () => null,
      enableCompression: true,
      pullLimit: 100,
      fetch: (input, init) => fetch(input, init),
      ...config,
      url: config.url.replace(/\/+$/, ''),
    };
    this.logger = config.logger ?? createLogger({ name: 'tidesync:gateway' });
  }

  async push(
    operation: Operation,
    options: RemoteCallOptions = {}
  ): Promise<Result<RemoteAck, RemoteError>> {
    const requestData: PushRequest = {
      operation: {
        operationId: operation.operationId,
        recordId: operation.recordId,
        kind: operation.kind,
        payload: operation.payload,
        baseVersion: operation.baseVersion,
        updatedAt: operation.updatedAt,
      },
    };

    const headers = this.headers();
    let body: string;
    if (this.config.enableCompression) {
      headers['Content-Type'] = COMPRESSED_CONTENT_TYPE;
      headers['X-Compression'] = 'msgpack-deflate';
      body = compressToBase64(requestData);
    } else {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(requestData);
    }

    const response = await this.send(`${this.config.url}/push`, {
      method: 'POST',
      headers,
      body,
      signal: options.signal,
    });
    if (!response.ok) {
      return response;
    }

    const { status, payload } = response.value;
    if (status === 200) {
      const parsed = this.parse(pushResponseSchema, payload, 'push');
      return parsed.ok
        ? ok(parsed.value.ack)
        : err(RemoteError.serverFault('Malformed push response'));
    }
    if (status === 409) {
      const conflict = this.parse(conflictResponseSchema, payload, 'conflict');
      return conflict.ok
        ? err(RemoteError.conflict(conflict.value.remote))
        : err(RemoteError.serverFault('Malformed conflict response'));
    }
    return err(this.statusError(status, payload));
  }

  async pullSince(
    checkpoint: SyncCheckpoint | null,
    options: RemoteCallOptions = {}
  ): Promise<Result<PullBatch, RemoteError>> {
    const query = new URLSearchParams({ limit: String(this.config.pullLimit) });
    if (checkpoint !== null) {
      query.set('since', checkpoint);
    }

    const response = await this.send(`${this.config.url}/pull?${query.toString()}`, {
      method: 'GET',
      headers: this.headers(),
      signal: options.signal,
    });
    if (!response.ok) {
      return response;
    }

    const { status, payload } = response.value;
    if (status !== 200) {
      return err(this.statusError(status, payload));
    }

    const parsed = this.parse(pullResponseSchema, payload, 'pull');
    return parsed.ok ? ok(parsed.value) : err(RemoteError.serverFault('Malformed pull response'));
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.config.headers,
      Accept: this.config.enableCompression
        ? `${COMPRESSED_CONTENT_TYPE}, application/json`
        : 'application/json',
    };
    const token = this.config.getAuthToken();
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }
    return headers;
  }

  /**
   * Perform the request and decode its body
   */
  private async send(
    url: string,
    init: RequestInit
  ): Promise<Result<{ status: number; payload: unknown }, RemoteError>> {
    let response: Response;
    try {
      response = await this.config.fetch(url, init);
    } catch (error) {
      this.logger.debug({ err: error, url }, 'Request failed');
      return err(RemoteError.from(error));
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return err(RemoteError.from(error));
    }

    try {
      return ok({ status: response.status, payload: this.decode(response, text) });
    } catch (error) {
      this.logger.warn({ err: error, url, status: response.status }, 'Undecodable response body');
      return err(RemoteError.serverFault(`Undecodable response (HTTP ${response.status})`, error));
    }
  }

  private decode(response: Response, text: string): unknown {
    if (text.length === 0) {
      return null;
    }
    const contentType = response.headers.get('Content-Type') ?? '';
    if (
      contentType.includes('msgpack') ||
      response.headers.get('X-Compression') === 'msgpack-deflate'
    ) {
      return decompressFromBase64(text);
    }
    return JSON.parse(text);
  }

  private parse<T>(
    schema: z.ZodType<T>,
    payload: unknown,
    context: string
  ): Result<T, z.ZodError> {
    const parsed = schema.safeParse(payload);
    if (parsed.success) {
      return ok(parsed.data);
    }
    this.logger.warn({ issues: parsed.error.issues }, `Invalid ${context} response`);
    return err(parsed.error);
  }

  private statusError(status: number, payload: unknown): RemoteError {
    const detail =
      typeof payload === 'object' && payload !== null && 'message' in payload
        ? String(payload.message)
        : `HTTP ${status}`;

    if (status === 401 || status === 403) {
      return RemoteError.unauthorized(detail);
    }
    if (
      status === 400 &&
      typeof payload === 'object' &&
      payload !== null &&
      'error' in payload &&
      payload.error === 'invalid_checkpoint'
    ) {
      return RemoteError.invalidCheckpoint(detail);
    }
    return RemoteError.serverFault(detail);
  }
}
