/**
 * Worker handles backed by `child_process.fork`
 */

import { fork, type ChildProcess } from 'child_process';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';

import { createChildLogger } from '../utils/logger.js';
import type { WorkerExitInfo, WorkerFactory, WorkerHandle, WorkerRequest } from '../types/worker.types.js';

const logger = createChildLogger({ service: 'fork-worker' });

const WORKER_MODULE = 'compositor.worker';

export interface WorkerEntry {
  modulePath: string;
  execArgv: string[];
}

/**
 * Locate the worker entry next to this module: the compiled `.js` after a
 * build, otherwise the `.ts` source loaded through tsx.
 */
export function resolveWorkerEntry(baseUrl: string = import.meta.url): WorkerEntry {
  const compiled = fileURLToPath(new URL(`./${WORKER_MODULE}.js`, baseUrl));
  if (existsSync(compiled)) {
    return { modulePath: compiled, execArgv: [] };
  }
  return {
    modulePath: fileURLToPath(new URL(`./${WORKER_MODULE}.ts`, baseUrl)),
    execArgv: ['--import', 'tsx'],
  };
}

class ForkWorkerHandle implements WorkerHandle {
  private exitListener: ((info: WorkerExitInfo) => void) | null = null;
  private exitInfo: WorkerExitInfo | null = null;

  constructor(
    readonly id: number,
    private readonly child: ChildProcess
  ) {
    child.on('exit', (code, signal) => {
      this.finish({ code, signal });
    });
    child.on('error', (error) => {
      logger.warn({ workerId: id, pid: child.pid, error: error.message }, 'Worker process error');
      // A process that never spawned emits no exit event
      if (child.pid === undefined) {
        this.finish({ code: null, signal: null, error });
      }
    });
  }

  send(message: WorkerRequest): void {
    if (!this.child.connected) {
      this.child.kill();
      return;
    }
    this.child.send(message, (error) => {
      if (error) {
        logger.warn({ workerId: this.id, error: error.message }, 'Failed to deliver message, stopping worker');
        this.child.kill();
      }
    });
  }

  onMessage(listener: (message: unknown) => void): void {
    this.child.on('message', listener);
  }

  onExit(listener: (info: WorkerExitInfo) => void): void {
    this.exitListener = listener;
    if (this.exitInfo) {
      listener(this.exitInfo);
    }
  }

  terminate(): void {
    if (this.exitInfo) return;
    this.child.kill();
  }

  private finish(info: WorkerExitInfo): void {
    if (this.exitInfo) return;
    this.exitInfo = info;
    this.exitListener?.(info);
  }
}

/**
 * Factory forking one child process per worker. Each child loads its own
 * extraction provider and compositor.
 */
export function createForkWorkerFactory(entry: WorkerEntry = resolveWorkerEntry()): WorkerFactory {
  return (id) => {
    const child = fork(entry.modulePath, [], {
      execArgv: entry.execArgv,
      serialization: 'json',
      env: { ...process.env, WORKER_ID: String(id) },
    });
    logger.debug({ workerId: id, pid: child.pid, entry: entry.modulePath }, 'Worker process forked');
    return new ForkWorkerHandle(id, child);
  };
}
