/**
 * Worker Pool
 *
 * Fans task paths out to a fixed set of workers, one task per worker at a time,
 * and yields every result in completion order. Each submitted path yields
 * exactly one result: a crashed worker fails the task it held and is replaced
 * while work remains.
 */

import { AsyncQueue } from '../utils/async-queue.js';
import { WorkerCrashError, toError, type AppError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { startTimer } from '../utils/timer.js';
import {
  TaskStatus,
  type RelativePath,
  type SharedTaskContext,
  type TaskResult,
  type WorkerPoolConfig,
} from '../types/batch.types.js';
import {
  workerResponseSchema,
  type WorkerExitInfo,
  type WorkerFactory,
  type WorkerHandle,
  type WorkerRequest,
} from '../types/worker.types.js';

const logger = createChildLogger({ service: 'worker-pool' });

/** Workers in a row that may die before becoming ready before the pool gives up on replacing them */
export const DEFAULT_MAX_START_FAILURES = 3;

export interface WorkerPoolOptions extends WorkerPoolConfig {
  factory: WorkerFactory;
  context: SharedTaskContext;
  maxStartFailures?: number;
}

interface QueuedTask {
  taskId: number;
  relativePath: RelativePath;
  elapsed?: () => number;
}

interface WorkerSlot {
  handle: WorkerHandle;
  ready: boolean;
  current?: QueuedTask;
  retired: boolean;
  /** Error the worker reported while initializing */
  initError?: string;
}

function failureResult(task: QueuedTask, error: AppError): TaskResult {
  return {
    relativePath: task.relativePath,
    outcome: { status: TaskStatus.FAILURE, code: error.code, message: error.message },
    durationMs: task.elapsed?.() ?? 0,
  };
}

function describeExit(info: WorkerExitInfo): string {
  if (info.error) {
    return info.error.message;
  }
  return info.signal ? `signal ${info.signal}` : `exit code ${info.code ?? 'unknown'}`;
}

export class WorkerPool {
  constructor(private readonly options: WorkerPoolOptions) {}

  /**
   * Run every path through the pool. Workers are started on the first
   * iteration and shut down once the last result has been yielded, or when the
   * consumer stops early.
   */
  async *run(paths: readonly RelativePath[]): AsyncGenerator<TaskResult, void, undefined> {
    if (paths.length === 0) {
      return;
    }

    const poolRun = new PoolRun(this.options, paths);
    poolRun.start();
    try {
      yield* poolRun.results;
    } finally {
      await poolRun.stop();
    }
  }
}

/**
 * State of a single `run` call
 */
class PoolRun {
  readonly results = new AsyncQueue<TaskResult>();

  private readonly queue: QueuedTask[];
  private readonly slots = new Map<number, WorkerSlot>();
  private readonly exitWaiters: Array<() => void> = [];
  private readonly maxStartFailures: number;
  private remaining: number;
  private nextWorkerId = 1;
  private startFailures = 0;
  private lastStartError = 'unknown error';
  private stopping = false;

  constructor(
    private readonly options: WorkerPoolOptions,
    paths: readonly RelativePath[]
  ) {
    this.queue = paths.map((relativePath, taskId) => ({ taskId, relativePath }));
    this.remaining = paths.length;
    this.maxStartFailures = options.maxStartFailures ?? DEFAULT_MAX_START_FAILURES;
  }

  start(): void {
    const size = Math.min(Math.max(1, this.options.maxWorkers), this.queue.length);
    logger.debug({ workers: size, tasks: this.queue.length }, 'Starting worker pool');

    for (let i = 0; i < size && this.queue.length > 0; i++) {
      this.spawn();
    }
  }

  /**
   * Stop all workers and wait until every one has exited
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.queue.length = 0;

    for (const slot of this.slots.values()) {
      if (slot.current || !slot.ready) {
        slot.handle.terminate();
      } else if (!slot.retired) {
        this.retire(slot);
      }
    }

    if (this.slots.size === 0) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.exitWaiters.push(resolve);
    });
  }

  private spawn(): void {
    const id = this.nextWorkerId++;

    let handle: WorkerHandle;
    try {
      handle = this.options.factory(id);
    } catch (error) {
      const message = toError(error).message;
      logger.error({ workerId: id, error: message }, 'Failed to start worker');
      this.handleStartFailure(message);
      return;
    }

    const slot: WorkerSlot = { handle, ready: false, retired: false };
    this.slots.set(id, slot);

    handle.onMessage((message) => this.handleMessage(slot, message));
    handle.onExit((info) => this.handleExit(slot, info));
    this.send(slot, { type: 'init', context: this.options.context });
  }

  private handleMessage(slot: WorkerSlot, raw: unknown): void {
    const parsed = workerResponseSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error({ workerId: slot.handle.id, issues: parsed.error.issues }, 'Malformed worker message');
      slot.handle.terminate();
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'ready':
        slot.ready = true;
        this.startFailures = 0;
        this.dispatch(slot);
        return;

      case 'result': {
        const task = this.takeCurrent(slot, message.taskId);
        if (!task) return;
        this.emit(message.result);
        this.dispatch(slot);
        return;
      }

      case 'error': {
        if (message.taskId === undefined) {
          logger.error({ workerId: slot.handle.id, error: message.error }, 'Worker failed to initialize');
          if (!slot.ready) {
            slot.initError = message.error;
          }
          slot.handle.terminate();
          return;
        }
        const task = this.takeCurrent(slot, message.taskId);
        if (!task) return;
        this.emit(failureResult(task, new WorkerCrashError(`Worker ${slot.handle.id}: ${message.error}`)));
        this.dispatch(slot);
        return;
      }
    }
  }

  private handleExit(slot: WorkerSlot, info: WorkerExitInfo): void {
    const id = slot.handle.id;
    this.slots.delete(id);

    const task = slot.current;
    slot.current = undefined;

    if (task) {
      logger.warn({ workerId: id, relativePath: task.relativePath, exit: describeExit(info) }, 'Worker died mid-task');
      this.emit(
        failureResult(
          task,
          new WorkerCrashError(
            `Worker ${id} exited (${describeExit(info)}) while processing ${task.relativePath}`,
            info.code,
            info.signal
          )
        )
      );
    } else if (!slot.retired && !this.stopping) {
      logger.warn({ workerId: id, exit: describeExit(info) }, 'Worker exited unexpectedly');
    }

    if (!slot.ready && !this.stopping) {
      this.handleStartFailure(slot.initError ?? describeExit(info));
    } else if (this.queue.length > 0 && !this.stopping) {
      this.spawn();
    }

    if (this.slots.size === 0) {
      for (const resolve of this.exitWaiters.splice(0)) {
        resolve();
      }
    }
  }

  /**
   * Count a worker that never became ready. Replace it while the limit allows,
   * counting workers still starting against it; once it is reached and no
   * worker is left, fail everything still queued with the last cause seen.
   */
  private handleStartFailure(cause: string): void {
    this.startFailures++;
    this.lastStartError = cause;

    if (this.queue.length === 0) {
      return;
    }
    if (this.startFailures + this.startingCount() < this.maxStartFailures) {
      this.spawn();
      return;
    }
    if (this.slots.size > 0) {
      return;
    }

    logger.error(
      { attempts: this.startFailures, queued: this.queue.length },
      'No worker could be kept alive, failing queued tasks'
    );
    const error = new WorkerCrashError(
      `No worker could be started (${this.startFailures} failed attempts): ${this.lastStartError}`
    );
    for (const task of this.queue.splice(0)) {
      this.emit(failureResult(task, error));
    }
  }

  private startingCount(): number {
    let starting = 0;
    for (const slot of this.slots.values()) {
      if (!slot.ready) starting++;
    }
    return starting;
  }

  private dispatch(slot: WorkerSlot): void {
    if (slot.current || slot.retired) return;

    const task = this.queue.shift();
    if (!task) {
      this.retire(slot);
      return;
    }

    task.elapsed = startTimer();
    slot.current = task;
    this.send(slot, { type: 'task', taskId: task.taskId, relativePath: task.relativePath });
  }

  private retire(slot: WorkerSlot): void {
    slot.retired = true;
    this.send(slot, { type: 'shutdown' });
  }

  private takeCurrent(slot: WorkerSlot, taskId: number): QueuedTask | undefined {
    const task = slot.current;
    if (!task || task.taskId !== taskId) {
      logger.warn({ workerId: slot.handle.id, taskId }, 'Ignoring result for a task the worker does not hold');
      return undefined;
    }
    slot.current = undefined;
    return task;
  }

  private send(slot: WorkerSlot, message: WorkerRequest): void {
    try {
      slot.handle.send(message);
    } catch (error) {
      logger.error({ workerId: slot.handle.id, error: toError(error).message }, 'Failed to message worker');
      slot.handle.terminate();
    }
  }

  private emit(result: TaskResult): void {
    if (this.results.isClosed) return;

    this.results.push(result);
    this.remaining--;
    if (this.remaining === 0) {
      this.results.close();
    }
  }
}
