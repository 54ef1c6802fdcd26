/**
 * Task Service
 *
 * Turns one discovered input path into one composited output. Every failure is
 * captured on the returned TaskResult; nothing thrown escapes `runTask`.
 */

import path from 'path';

import { pickBackground, resolveBackgroundPath, type RandomSource } from './background-pool.service.js';
import type { CompositorService } from './compositor.service.js';
import { getErrorCode, toError } from '../utils/errors.js';
import { ensureDirectory, resolveWithinRoot } from '../utils/fs.js';
import { toOutputFileName } from '../utils/image-utils.js';
import { createChildLogger } from '../utils/logger.js';
import { startTimer } from '../utils/timer.js';
import {
  TaskStatus,
  type RelativePath,
  type SharedTaskContext,
  type TaskResult,
} from '../types/batch.types.js';

const logger = createChildLogger({ service: 'task' });

export interface TaskDependencies {
  compositor: Pick<CompositorService, 'composite'>;
  random?: RandomSource;
}

/**
 * Output path for an input, relative to the output root. The directory
 * structure is kept and the extension is always `.png`.
 *
 * @example
 * toOutputRelativePath('sub/b.JPG') // 'sub/b.png'
 */
export function toOutputRelativePath(relativePath: RelativePath): RelativePath {
  return path.join(path.dirname(relativePath), toOutputFileName(path.basename(relativePath)));
}

/**
 * Process a single input image
 */
export async function runTask(
  relativePath: RelativePath,
  context: SharedTaskContext,
  deps: TaskDependencies
): Promise<TaskResult> {
  const elapsed = startTimer();
  let createdDirectory: string | undefined;

  try {
    const inputPath = resolveWithinRoot(context.inputRoot, relativePath);
    const outputRelativePath = toOutputRelativePath(relativePath);
    const outputPath = resolveWithinRoot(context.outputRoot, outputRelativePath);

    const created = await ensureDirectory(path.dirname(outputPath));
    if (created) {
      createdDirectory = path.relative(context.outputRoot, created) || '.';
    }

    const background = pickBackground(context.backgrounds, deps.random);
    await deps.compositor.composite(
      inputPath,
      resolveBackgroundPath(context.backgroundRoot, background),
      outputPath
    );

    return {
      relativePath,
      outcome: { status: TaskStatus.SUCCESS, outputRelativePath, background },
      ...(createdDirectory !== undefined && { createdDirectory }),
      durationMs: elapsed(),
    };
  } catch (error) {
    const cause = toError(error);
    logger.debug({ relativePath, error: cause.message }, 'Task failed');

    return {
      relativePath,
      outcome: { status: TaskStatus.FAILURE, code: getErrorCode(error), message: cause.message },
      ...(createdDirectory !== undefined && { createdDirectory }),
      durationMs: elapsed(),
    };
  }
}
