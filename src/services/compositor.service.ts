/**
 * Compositor Service
 *
 * Places the subject of a foreground image onto a new background:
 * orient → extract subject → stretch background to fit → composite → flatten → save.
 */

import path from 'path';
import sharp from 'sharp';

import { CompositingError, toError, type CompositingStage } from '../utils/errors.js';
import { writeAtomically } from '../utils/fs.js';
import { createChildLogger } from '../utils/logger.js';
import type { SubjectExtractionProvider } from '../providers/interfaces/subject-extraction.provider.js';

const logger = createChildLogger({ service: 'compositor' });

/** Default colour under any residual transparency */
export const DEFAULT_FLATTEN_COLOR = '#ffffff';

const OUTPUT_FORMATS: Record<string, keyof sharp.FormatEnum> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
};

export interface CompositorOptions {
  /** Colour used when flattening to an opaque image */
  flattenColor?: string;
}

export interface CompositeResult {
  outputPath: string;
  width: number;
  height: number;
}

/**
 * Output codec for a destination path, chosen by its extension
 *
 * @throws Error for extensions without a known codec
 */
export function getOutputFormat(destinationPath: string): keyof sharp.FormatEnum {
  const format = OUTPUT_FORMATS[path.extname(destinationPath).toLowerCase()];
  if (!format) {
    throw new Error(`Unsupported output extension: ${path.extname(destinationPath) || '(none)'}`);
  }
  return format;
}

export class CompositorService {
  private readonly flattenColor: string;

  constructor(
    private readonly extractor: SubjectExtractionProvider,
    options: CompositorOptions = {}
  ) {
    this.flattenColor = options.flattenColor ?? DEFAULT_FLATTEN_COLOR;
  }

  /**
   * Composite the subject of `foregroundPath` over `backgroundPath` and write
   * the result to `destinationPath`. The destination is either written in full
   * or left untouched.
   *
   * @throws CompositingError naming the failing stage
   */
  async composite(
    foregroundPath: string,
    backgroundPath: string,
    destinationPath: string
  ): Promise<CompositeResult> {
    const foreground = await this.runStage('read-foreground', foregroundPath, () =>
      sharp(foregroundPath).rotate().ensureAlpha().png().toBuffer({ resolveWithObject: true })
    );
    const { width, height } = foreground.info;

    const background = await this.runStage('read-background', backgroundPath, () =>
      sharp(backgroundPath).rotate().ensureAlpha().resize(width, height, { fit: 'fill' }).png().toBuffer()
    );

    const subject = await this.runStage('extract-subject', foregroundPath, async () => {
      const cutout = await this.extractor.extractSubject(foreground.data, path.basename(foregroundPath));
      return this.matchDimensions(cutout, width, height, foregroundPath);
    });

    const composited = await this.runStage('composite', foregroundPath, () =>
      sharp(background).composite([{ input: subject, blend: 'over' }]).png().toBuffer()
    );

    await this.runStage('save', destinationPath, () => {
      const format = getOutputFormat(destinationPath);
      return writeAtomically(destinationPath, (tempPath) =>
        sharp(composited).flatten({ background: this.flattenColor }).toFormat(format).toFile(tempPath)
      );
    });

    logger.debug(
      { foreground: foregroundPath, background: backgroundPath, output: destinationPath, width, height },
      'Composite written'
    );

    return { outputPath: destinationPath, width, height };
  }

  /**
   * Stretch a cut-out back to the foreground size when the provider returned
   * a different one
   */
  private async matchDimensions(cutout: Buffer, width: number, height: number, source: string): Promise<Buffer> {
    const metadata = await sharp(cutout).metadata();
    if (metadata.width === width && metadata.height === height && metadata.hasAlpha) {
      return cutout;
    }

    logger.warn(
      { source, expected: { width, height }, received: { width: metadata.width, height: metadata.height } },
      'Cut-out size differs from foreground, stretching to match'
    );
    return sharp(cutout).ensureAlpha().resize(width, height, { fit: 'fill' }).png().toBuffer();
  }

  private async runStage<T>(stage: CompositingStage, filePath: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CompositingError) {
        throw error;
      }
      const cause = toError(error);
      throw new CompositingError(stage, filePath, cause.message || cause.name, cause);
    }
  }
}
