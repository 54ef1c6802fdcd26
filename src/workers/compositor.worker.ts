/**
 * Child process entry for pooled workers. Talks to the coordinator over the
 * IPC channel only and exits when the channel closes.
 */

import 'dotenv/config';

import { parseEnv } from '../config/env.js';
import { createChildLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import { createConfiguredCompositor } from './index.js';
import { createTaskWorker } from './task-worker.js';

parseEnv();

const logger = createChildLogger({
  service: 'compositor-worker',
  workerId: process.env.WORKER_ID,
  workerPid: process.pid,
});

if (!process.send) {
  logger.fatal('Worker must be started with an IPC channel');
  process.exit(1);
}

const handleMessage = createTaskWorker(
  (response) => {
    process.send?.(response);
  },
  {
    createCompositor: () => createConfiguredCompositor(),
    onShutdown: () => {
      logger.debug('Shutdown requested');
      process.disconnect();
    },
  }
);

process.on('message', (message: unknown) => {
  handleMessage(message).catch((error: unknown) => {
    logger.error({ error: toError(error).message }, 'Unhandled error in worker');
    process.exitCode = 1;
    process.disconnect();
  });
});

process.on('disconnect', () => {
  logger.debug('IPC channel closed, exiting');
  process.exit();
});

logger.debug('Worker started');
