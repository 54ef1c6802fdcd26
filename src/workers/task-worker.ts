/**
 * Worker-side message handling, shared by forked and in-process workers.
 *
 * The compositor (and with it the extraction provider) is created once at init
 * and reused for every task the worker runs.
 */

import { runTask } from '../services/task.service.js';
import type { RandomSource } from '../services/background-pool.service.js';
import type { CompositorService } from '../services/compositor.service.js';
import { toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { SharedTaskContext } from '../types/batch.types.js';
import { workerRequestSchema, type WorkerResponse } from '../types/worker.types.js';

const logger = createChildLogger({ service: 'task-worker' });

export interface TaskWorkerDependencies {
  createCompositor: () => Pick<CompositorService, 'composite'>;
  /** Called when the coordinator asks the worker to stop */
  onShutdown: () => void;
  random?: RandomSource;
}

export type RequestHandler = (message: unknown) => Promise<void>;

export function createTaskWorker(
  send: (response: WorkerResponse) => void,
  deps: TaskWorkerDependencies
): RequestHandler {
  let context: SharedTaskContext | null = null;
  let compositor: Pick<CompositorService, 'composite'> | null = null;

  return async (raw: unknown): Promise<void> => {
    const parsed = workerRequestSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Malformed request from coordinator');
      send({ type: 'error', error: `Malformed request: ${parsed.error.message}` });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'init': {
        try {
          compositor ??= deps.createCompositor();
          context = message.context;
        } catch (error) {
          const cause = toError(error);
          logger.error({ error: cause.message }, 'Worker initialization failed');
          send({ type: 'error', error: cause.message });
          return;
        }
        logger.debug({ backgrounds: message.context.backgrounds.length }, 'Worker ready');
        send({ type: 'ready' });
        return;
      }

      case 'task': {
        if (!context || !compositor) {
          send({ type: 'error', taskId: message.taskId, error: 'Task received before init' });
          return;
        }
        const result = await runTask(message.relativePath, context, { compositor, random: deps.random });
        send({ type: 'result', taskId: message.taskId, result });
        return;
      }

      case 'shutdown':
        deps.onShutdown();
        return;
    }
  };
}
