/**
 * Batch Runner
 *
 * Checks preconditions, discovers inputs, drives the worker pool and reports
 * each result as it arrives. Individual task failures never fail the batch;
 * only precondition failures throw.
 */

import { constants, type Stats } from 'fs';
import { access, stat } from 'fs/promises';
import path from 'path';

import { discoverImages, findOutputCollisions } from './catalog.service.js';
import { loadBackgroundSet } from './background-pool.service.js';
import { toOutputRelativePath } from './task.service.js';
import { WorkerPool } from '../workers/pool.js';
import { PreconditionError, getErrorCode } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { startTimer } from '../utils/timer.js';
import type { BatchReporter } from '../cli/reporter.js';
import { TaskStatus, type BatchSummary, type SharedTaskContext } from '../types/batch.types.js';
import type { WorkerFactory } from '../types/worker.types.js';

const logger = createChildLogger({ service: 'batch-runner' });

export interface BatchOptions {
  inputRoot: string;
  backgroundRoot: string;
  outputRoot: string;
  maxWorkers: number;
}

export interface BatchDependencies {
  factory: WorkerFactory;
  reporter: BatchReporter;
  maxStartFailures?: number;
  /**
   * Checked after the directories and before any work is submitted, e.g. that
   * the extraction provider is configured. A throw aborts the batch.
   */
  preflight?: () => void | Promise<void>;
}

/**
 * @throws PreconditionError when the directory is missing, not a directory, or unreadable
 */
export async function assertReadableDirectory(dirPath: string, label: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(dirPath);
  } catch (error) {
    throw new PreconditionError(
      `${label} directory does not exist: ${dirPath} (${getErrorCode(error)})`,
      dirPath,
      'DIRECTORY_NOT_FOUND'
    );
  }

  if (!stats.isDirectory()) {
    throw new PreconditionError(`${label} path is not a directory: ${dirPath}`, dirPath, 'NOT_A_DIRECTORY');
  }

  try {
    await access(dirPath, constants.R_OK | constants.X_OK);
  } catch (error) {
    throw new PreconditionError(
      `${label} directory is not readable: ${dirPath} (${getErrorCode(error)})`,
      dirPath,
      'DIRECTORY_NOT_READABLE'
    );
  }
}

/**
 * Run one batch to completion
 */
export async function runBatch(options: BatchOptions, deps: BatchDependencies): Promise<BatchSummary> {
  const elapsed = startTimer();
  const inputRoot = path.resolve(options.inputRoot);
  const backgroundRoot = path.resolve(options.backgroundRoot);
  const outputRoot = path.resolve(options.outputRoot);
  const { reporter } = deps;

  await assertReadableDirectory(inputRoot, 'Input');
  await assertReadableDirectory(backgroundRoot, 'Background');
  await deps.preflight?.();

  const backgrounds = await loadBackgroundSet(backgroundRoot);
  const paths = await discoverImages(inputRoot, { exclude: [outputRoot] });
  if (paths.length === 0) {
    throw new PreconditionError(`No input images found in ${inputRoot}`, inputRoot, 'NO_INPUT_IMAGES');
  }

  for (const [output, inputs] of findOutputCollisions(paths, toOutputRelativePath)) {
    reporter.warn(`${inputs.join(', ')} all write ${output}; the last one to finish wins`);
  }

  const workers = Math.min(options.maxWorkers, paths.length);
  logger.info({ inputRoot, backgroundRoot, outputRoot, tasks: paths.length, workers }, 'Batch started');
  reporter.batchStarted({
    inputRoot,
    outputRoot,
    total: paths.length,
    backgrounds: backgrounds.length,
    workers,
  });

  const context: SharedTaskContext = { inputRoot, backgroundRoot, outputRoot, backgrounds: [...backgrounds] };
  const pool = new WorkerPool({
    maxWorkers: options.maxWorkers,
    factory: deps.factory,
    context,
    maxStartFailures: deps.maxStartFailures,
  });

  let succeeded = 0;
  let failed = 0;
  for await (const result of pool.run(paths)) {
    if (result.createdDirectory !== undefined) {
      reporter.directoryCreated(path.resolve(outputRoot, result.createdDirectory));
    }
    reporter.taskCompleted(result);

    if (result.outcome.status === TaskStatus.SUCCESS) {
      succeeded++;
    } else {
      failed++;
      logger.warn(
        { relativePath: result.relativePath, code: result.outcome.code, error: result.outcome.message },
        'Task failed'
      );
    }
  }

  const summary: BatchSummary = { total: paths.length, succeeded, failed, durationMs: elapsed() };
  logger.info(summary, 'Batch finished');
  reporter.batchFinished(summary);
  return summary;
}
