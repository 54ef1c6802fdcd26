/**
 * Background Resize Service
 *
 * Scales oversized backgrounds down so their smallest side matches a target,
 * keeping memory use low when the batch stretches them onto foregrounds.
 * Smaller images are copied re-encoded, never upscaled.
 */

import { readdir } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';

import { toError } from '../utils/errors.js';
import { ensureDirectory, writeAtomically } from '../utils/fs.js';
import { isEligibleImage } from '../utils/image-utils.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'resize' });

export const RESIZE_CONSTANTS = {
  DEFAULT_MIN_DIMENSION: 350,
  DEFAULT_FOLDER_NAME: 'resized_backgrounds',
  JPEG_QUALITY: 90,
} as const;

export const ResizeStatus = {
  RESIZED: 'resized',
  TOO_SMALL: 'too-small',
  EXACT_FIT: 'exact-fit',
  FAILED: 'failed',
} as const;

export type ResizeStatus = (typeof ResizeStatus)[keyof typeof ResizeStatus];

export interface Dimensions {
  width: number;
  height: number;
}

export type ResizeResult =
  | {
      fileName: string;
      status: typeof ResizeStatus.RESIZED;
      original: Dimensions;
      resized: Dimensions;
    }
  | {
      fileName: string;
      status: typeof ResizeStatus.TOO_SMALL | typeof ResizeStatus.EXACT_FIT;
      original: Dimensions;
    }
  | {
      fileName: string;
      status: typeof ResizeStatus.FAILED;
      error: string;
    };

export interface ResizeOptions {
  minDimension?: number;
  folderName?: string;
  /** Called as each file finishes */
  onResult?: (result: ResizeResult) => void;
  onDirectoryCreated?: (directory: string) => void;
}

export interface ResizeSummary {
  outputDirectory: string;
  /** True when the output directory did not exist before the run */
  createdOutputDirectory: boolean;
  results: ResizeResult[];
}

/**
 * Size that brings the smallest side down to `minDimension`, or null when the
 * image is already at or below it.
 *
 * @example
 * computeScaledSize({ width: 1400, height: 700 }, 350) // { width: 700, height: 350 }
 */
export function computeScaledSize(original: Dimensions, minDimension: number): Dimensions | null {
  const smallest = Math.min(original.width, original.height);
  if (smallest <= minDimension) {
    return null;
  }

  const scale = minDimension / smallest;
  return {
    width: Math.max(1, Math.floor(original.width * scale)),
    height: Math.max(1, Math.floor(original.height * scale)),
  };
}

/**
 * Displayed dimensions, with EXIF orientations 5-8 swapping width and height
 */
async function readOrientedSize(inputPath: string): Promise<Dimensions> {
  const metadata = await sharp(inputPath).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error('Image dimensions could not be read');
  }
  const swapped = (metadata.orientation ?? 1) >= 5;
  return swapped
    ? { width: metadata.height, height: metadata.width }
    : { width: metadata.width, height: metadata.height };
}

function encodeFor(image: sharp.Sharp, outputPath: string): sharp.Sharp {
  const ext = path.extname(outputPath).toLowerCase();
  return ext === '.png' ? image.png() : image.jpeg({ quality: RESIZE_CONSTANTS.JPEG_QUALITY });
}

/**
 * Resize or copy a single image. Failures are returned, not thrown.
 */
export async function resizeImage(
  inputPath: string,
  outputPath: string,
  minDimension: number = RESIZE_CONSTANTS.DEFAULT_MIN_DIMENSION
): Promise<ResizeResult> {
  const fileName = path.basename(inputPath);

  try {
    const original = await readOrientedSize(inputPath);
    const target = computeScaledSize(original, minDimension);

    if (target) {
      await writeAtomically(outputPath, (tempPath) =>
        encodeFor(
          sharp(inputPath)
            .rotate()
            .resize(target.width, target.height, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
            .removeAlpha(),
          outputPath
        ).toFile(tempPath)
      );
      return { fileName, status: ResizeStatus.RESIZED, original, resized: target };
    }

    await writeAtomically(outputPath, (tempPath) => encodeFor(sharp(inputPath).rotate(), outputPath).toFile(tempPath));
    const smallest = Math.min(original.width, original.height);
    return {
      fileName,
      status: smallest < minDimension ? ResizeStatus.TOO_SMALL : ResizeStatus.EXACT_FIT,
      original,
    };
  } catch (error) {
    const message = toError(error).message;
    logger.warn({ inputPath, error: message }, 'Failed to resize image');
    return { fileName, status: ResizeStatus.FAILED, error: message };
  }
}

/**
 * Resize every eligible image directly inside `directory` into
 * `<directory>/<folderName>`. One bad file does not stop the others.
 */
export async function resizeBackgrounds(directory: string, options: ResizeOptions = {}): Promise<ResizeSummary> {
  const minDimension = options.minDimension ?? RESIZE_CONSTANTS.DEFAULT_MIN_DIMENSION;
  const folderName = options.folderName ?? RESIZE_CONSTANTS.DEFAULT_FOLDER_NAME;
  const outputDirectory = path.join(directory, folderName);

  const entries = await readdir(directory, { withFileTypes: true });
  const createdOutputDirectory = (await ensureDirectory(outputDirectory)) !== undefined;
  if (createdOutputDirectory) {
    options.onDirectoryCreated?.(outputDirectory);
  }

  const results: ResizeResult[] = [];
  for (const entry of entries) {
    if (entry.name === folderName || !entry.isFile() || !isEligibleImage(entry.name)) {
      continue;
    }

    const result = await resizeImage(
      path.join(directory, entry.name),
      path.join(outputDirectory, entry.name),
      minDimension
    );
    results.push(result);
    options.onResult?.(result);
  }

  logger.info({ directory, outputDirectory, count: results.length }, 'Background resize complete');
  return { outputDirectory, createdOutputDirectory, results };
}
