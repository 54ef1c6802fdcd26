/**
 * Worker handles that run the task handler inside the coordinator process.
 * Used by WORKER_MODE=inline for debugging, and by tests.
 */

import { setImmediate } from 'timers';

import { toError } from '../utils/errors.js';
import { createTaskWorker, type RequestHandler, type TaskWorkerDependencies } from './task-worker.js';
import type {
  WorkerExitInfo,
  WorkerFactory,
  WorkerHandle,
  WorkerRequest,
  WorkerResponse,
} from '../types/worker.types.js';

export type InlineWorkerDependencies = Omit<TaskWorkerDependencies, 'onShutdown'>;

export class InlineWorkerHandle implements WorkerHandle {
  private messageListener: ((message: unknown) => void) | null = null;
  private exitListener: ((info: WorkerExitInfo) => void) | null = null;
  private exited = false;
  private readonly handleRequest: RequestHandler;

  constructor(
    readonly id: number,
    deps: InlineWorkerDependencies
  ) {
    this.handleRequest = createTaskWorker((response) => this.deliver(response), {
      ...deps,
      onShutdown: () => this.exit({ code: 0, signal: null }),
    });
  }

  send(message: WorkerRequest): void {
    if (this.exited) return;

    // Round-trip through structured data, as IPC would
    const copy: unknown = JSON.parse(JSON.stringify(message));
    setImmediate(() => {
      if (this.exited) return;
      this.handleRequest(copy).catch((error: unknown) => {
        this.exit({ code: 1, signal: null, error: toError(error) });
      });
    });
  }

  onMessage(listener: (message: unknown) => void): void {
    this.messageListener = listener;
  }

  onExit(listener: (info: WorkerExitInfo) => void): void {
    this.exitListener = listener;
  }

  terminate(): void {
    this.exit({ code: null, signal: 'SIGTERM' });
  }

  private deliver(response: WorkerResponse): void {
    if (this.exited) return;
    const copy: unknown = JSON.parse(JSON.stringify(response));
    setImmediate(() => {
      if (!this.exited) {
        this.messageListener?.(copy);
      }
    });
  }

  private exit(info: WorkerExitInfo): void {
    if (this.exited) return;
    this.exited = true;
    setImmediate(() => this.exitListener?.(info));
  }
}

export function createInlineWorkerFactory(deps: InlineWorkerDependencies): WorkerFactory {
  return (id) => new InlineWorkerHandle(id, deps);
}
