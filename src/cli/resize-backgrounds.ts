#!/usr/bin/env node

/**
 * Resize background images so their smallest side is at most RESIZE_MIN_DIMENSION.
 *
 * Usage: resize-backgrounds [directory]   (defaults to BACKGROUND_DIR)
 */

import 'dotenv/config';
import path from 'path';

import { parseEnv } from '../config/env.js';
import { getConfig } from '../config/index.js';
import { resizeBackgrounds, ResizeStatus, type ResizeResult } from '../services/resize.service.js';
import { assertReadableDirectory } from '../services/batch-runner.service.js';
import { AppError, toError } from '../utils/errors.js';
import { styles } from './styles.js';

function formatResult(result: ResizeResult): string {
  switch (result.status) {
    case ResizeStatus.RESIZED:
      return styles.success(
        `Resized: ${result.fileName} from ${result.original.width}x${result.original.height} ` +
          `to ${result.resized.width}x${result.resized.height}`
      );
    case ResizeStatus.TOO_SMALL:
      return styles.warn(`Copied (too small): ${result.fileName} (${result.original.width}x${result.original.height})`);
    case ResizeStatus.EXACT_FIT:
      return styles.info(`Copied (exact fit): ${result.fileName} (${result.original.width}x${result.original.height})`);
    case ResizeStatus.FAILED:
      return styles.error(`Failed to process ${result.fileName}: ${result.error}`);
  }
}

async function main(): Promise<void> {
  parseEnv();
  const config = getConfig();
  const directory = path.resolve(process.argv[2] ?? config.batch.backgroundDir);

  await assertReadableDirectory(directory, 'Background');

  console.log(
    styles.info(`Scanning ${directory} for images to resize (min dimension: ${config.resize.minDimension}px)`)
  );

  const summary = await resizeBackgrounds(directory, {
    minDimension: config.resize.minDimension,
    folderName: config.resize.folderName,
    onDirectoryCreated: (dir) => console.log(styles.info(`Created output directory ${dir}`)),
    onResult: (result) => console.log(formatResult(result)),
  });

  const failed = summary.results.filter((r) => r.status === ResizeStatus.FAILED).length;
  console.log(styles.divider());
  console.log(styles.label('Processed', String(summary.results.length)));
  console.log(styles.label('Failed', String(failed)));
  console.log(styles.label('Output', summary.outputDirectory));
}

main().catch((error: unknown) => {
  const err = toError(error);
  process.stderr.write(`${styles.error(err.message)}\n`);
  if (!(err instanceof AppError) && err.stack) {
    process.stderr.write(`${err.stack}\n`);
  }
  process.exitCode = 1;
});
