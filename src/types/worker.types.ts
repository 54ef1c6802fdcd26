import { z } from 'zod';

import { sharedTaskContextSchema, taskResultSchema } from './batch.types.js';

/**
 * Coordinator → worker messages
 */
export const workerRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('init'),
    context: sharedTaskContextSchema,
  }),
  z.object({
    type: z.literal('task'),
    taskId: z.number().int().nonnegative(),
    relativePath: z.string().min(1),
  }),
  z.object({
    type: z.literal('shutdown'),
  }),
]);

export type WorkerRequest = z.infer<typeof workerRequestSchema>;

/**
 * Worker → coordinator messages. An error without a taskId means the worker
 * could not initialize and is unusable.
 */
export const workerResponseSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ready'),
  }),
  z.object({
    type: z.literal('result'),
    taskId: z.number().int().nonnegative(),
    result: taskResultSchema,
  }),
  z.object({
    type: z.literal('error'),
    taskId: z.number().int().nonnegative().optional(),
    error: z.string(),
  }),
]);

export type WorkerResponse = z.infer<typeof workerResponseSchema>;

export interface WorkerExitInfo {
  code: number | null;
  signal: string | null;
  error?: Error;
}

/**
 * Transport-neutral view of one worker. Implemented over a forked child process
 * and over an in-process handler.
 */
export interface WorkerHandle {
  readonly id: number;
  /** Deliver a request. Delivery failures surface as an exit. */
  send(message: WorkerRequest): void;
  /** Raw, unvalidated responses */
  onMessage(listener: (message: unknown) => void): void;
  /** Fires exactly once, however the worker ends */
  onExit(listener: (info: WorkerExitInfo) => void): void;
  /** Stop the worker without waiting for in-flight work */
  terminate(): void;
}

export type WorkerFactory = (id: number) => WorkerHandle;
