/**
 * Gateway module - the push/pull HTTP protocol the SDK's HTTP gateway speaks
 * @module gateway
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  COMPRESSED_CONTENT_TYPE,
  compressToBase64,
  decompressFromBase64,
  pullQuerySchema,
  pushRequestSchema,
} from '@tidesync/sdk';
import type { ZodError } from 'zod';
import type { Applier } from '../applier/index.js';
import { InvalidCheckpointError } from '../database/index.js';

export interface GatewayOptions {
  applier: Applier;
  /** Bearer token every request must carry; unset disables auth */
  authToken?: string;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

/**
 * Reply in MessagePack + DEFLATE when the client accepts it
 */
function send(
  request: FastifyRequest,
  reply: FastifyReply,
  status: number,
  body: unknown
): FastifyReply {
  reply.code(status);
  if (request.headers.accept?.includes('msgpack')) {
    reply.header('Content-Type', COMPRESSED_CONTENT_TYPE);
    reply.header('X-Compression', 'msgpack-deflate');
    return reply.send(compressToBase64(body));
  }
  return reply.send(body);
}

/**
 * Register gateway routes
 */
export async function registerGatewayRoutes(
  fastify: FastifyInstance,
  options: GatewayOptions
): Promise<void> {
  const { applier, authToken } = options;

  fastify.addContentTypeParser(
    COMPRESSED_CONTENT_TYPE,
    { parseAs: 'string' },
    async (_request: FastifyRequest, body: string) => {
      try {
        return decompressFromBase64(body);
      } catch (error) {
        throw Object.assign(new Error('Undecodable compressed body', { cause: error }), {
          statusCode: 400,
        });
      }
    }
  );

  if (authToken) {
    fastify.addHook('onRequest', async (request, reply) => {
      if (request.headers.authorization !== `Bearer ${authToken}`) {
        return send(request, reply, 401, {
          error: 'unauthorized',
          message: 'Missing or invalid bearer token',
        });
      }
    });
  }

  fastify.setErrorHandler((error, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, 'Sync request failed');
    }
    return send(request, reply, status, {
      error: status >= 500 ? 'server_error' : 'bad_request',
      message: error.message,
    });
  });

  /**
   * POST /api/sync/push - Apply one operation
   */
  fastify.post('/push', async (request, reply) => {
    const parsed = pushRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return send(request, reply, 400, {
        error: 'invalid_request',
        message: describeIssues(parsed.error),
      });
    }

    const result = await applier.apply(parsed.data.operation);
    if (result.type === 'conflict') {
      return send(request, reply, 409, { error: 'conflict', remote: result.remote });
    }
    return send(request, reply, 200, { ack: result.ack });
  });

  /**
   * GET /api/sync/pull - Changes after a checkpoint
   */
  fastify.get('/pull', async (request, reply) => {
    const parsed = pullQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return send(request, reply, 400, {
        error: 'invalid_request',
        message: describeIssues(parsed.error),
      });
    }

    try {
      const page = await applier.pull(parsed.data.since ?? null, parsed.data.limit);
      return send(request, reply, 200, page);
    } catch (error) {
      if (error instanceof InvalidCheckpointError) {
        return send(request, reply, 400, { error: 'invalid_checkpoint', message: error.message });
      }
      throw error;
    }
  });

  /**
   * GET /api/sync/records/:id - Current remote copy of a record
   */
  fastify.get<{ Params: { id: string } }>('/records/:id', async (request, reply) => {
    const record = await applier.getRecord(request.params.id);
    if (!record || record.deleted) {
      return send(request, reply, 404, {
        error: 'not_found',
        message: `Record not found: ${request.params.id}`,
      });
    }
    return send(request, reply, 200, record);
  });
}
