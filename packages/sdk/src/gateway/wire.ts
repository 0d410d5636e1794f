import { z } from 'zod';
import { OperationKind } from '../storage/schema.js';

// --- Shared between the HTTP gateway and the sync server ---

export const recordDataSchema = z.record(z.string(), z.unknown());

export const syncRecordSchema = z.object({
  id: z.string().min(1).max(128),
  version: z.number().int().nonnegative(),
  updatedAt: z.number().nonnegative(),
  deleted: z.boolean(),
  data: recordDataSchema,
});

export const pushOperationSchema = z.object({
  operationId: z.string().min(1).max(128),
  recordId: z.string().min(1).max(128),
  kind: z.nativeEnum(OperationKind),
  payload: recordDataSchema,
  baseVersion: z.number().int().nonnegative(),
  updatedAt: z.number().nonnegative(),
});

export const pushRequestSchema = z.object({
  operation: pushOperationSchema,
});

export const remoteAckSchema = z.object({
  operationId: z.string(),
  recordId: z.string(),
  remoteVersion: z.number().int().nonnegative(),
  remoteUpdatedAt: z.number().nonnegative(),
});

export const pushResponseSchema = z.object({
  ack: remoteAckSchema,
});

export const conflictResponseSchema = z.object({
  error: z.literal('conflict'),
  remote: syncRecordSchema,
});

export const remoteChangeSchema = z.object({
  recordId: z.string(),
  kind: z.nativeEnum(OperationKind),
  payload: recordDataSchema,
  remoteVersion: z.number().int().nonnegative(),
  remoteUpdatedAt: z.number().nonnegative(),
});

export const pullResponseSchema = z.object({
  changes: z.array(remoteChangeSchema),
  checkpoint: z.string(),
  hasMore: z.boolean(),
});

export const pullQuerySchema = z.object({
  since: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const errorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
});

export type PushOperation = z.infer<typeof pushOperationSchema>;
export type PushRequest = z.infer<typeof pushRequestSchema>;
export type PullQuery = z.infer<typeof pullQuerySchema>;
export type PullResponse = z.infer<typeof pullResponseSchema>;
