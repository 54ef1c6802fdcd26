/**
 * Stability AI Subject Extraction Provider
 *
 * Uses Stability AI's v2beta remove-background API, which returns the subject
 * on a transparent PNG.
 */

import sharp from 'sharp';

import { getConfig } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { toOutputFileName } from '../../utils/image-utils.js';
import { postImageRequest } from '../utils/image-api.js';
import type { SubjectExtractionProvider } from '../interfaces/subject-extraction.provider.js';

const logger = createChildLogger({ service: 'stability-subject-extraction' });

/**
 * Stability AI API constants
 */
export const STABILITY_CONSTANTS = {
  /** v2beta remove-background endpoint */
  REMOVE_BG_ENDPOINT: '/v2beta/stable-image/edit/remove-background',
  /** Maximum payload size (10MB limit, minus room for multipart overhead) */
  MAX_PAYLOAD_BYTES: 9 * 1024 * 1024,
  /** Target width for resizing large images */
  RESIZE_TARGET_WIDTH: 2048,
  /** Smallest width tried while shrinking */
  MIN_RESIZE_WIDTH: 512,
} as const;

export class StabilitySubjectExtractionProvider implements SubjectExtractionProvider {
  readonly providerId = 'stability';

  async extractSubject(image: Buffer, fileName: string): Promise<Buffer> {
    const config = getConfig();
    const apiKey = config.apis.stability;

    if (!apiKey) {
      throw new ConfigurationError('Stability API key not configured (STABILITY_API_KEY)');
    }

    let payload = image;
    if (payload.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES) {
      logger.info(
        { fileName, originalSize: payload.length, maxSize: STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES },
        'Image too large, resizing before upload'
      );
      payload = await this.shrinkForUpload(payload);
    }

    const result = await postImageRequest({
      service: 'Stability',
      endpoint: `${config.apis.stabilityBase}${STABILITY_CONSTANTS.REMOVE_BG_ENDPOINT}`,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        Accept: 'image/*',
      },
      buildForm: () => {
        const formData = new FormData();
        formData.append('image', new Blob([new Uint8Array(payload)], { type: 'image/png' }), toOutputFileName(fileName));
        formData.append('output_format', 'png');
        return formData;
      },
      maxRetries: config.extraction.maxRetries,
      retryDelayMs: config.extraction.retryDelayMs,
    });

    logger.debug({ fileName, size: result.length }, 'Subject extracted with Stability AI');
    return result;
  }

  /**
   * Progressively shrink the image until it fits the payload limit. Alpha is
   * kept, so the output stays PNG.
   */
  private async shrinkForUpload(image: Buffer): Promise<Buffer> {
    let current = image;
    let width: number = STABILITY_CONSTANTS.RESIZE_TARGET_WIDTH;

    while (current.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES && width >= STABILITY_CONSTANTS.MIN_RESIZE_WIDTH) {
      current = await sharp(image)
        .resize(width, null, { fit: 'inside', withoutEnlargement: true })
        .png({ compressionLevel: 9 })
        .toBuffer();
      width = Math.floor(width * 0.75);
    }

    return current;
  }

  isAvailable(): boolean {
    try {
      return !!getConfig().apis.stability;
    } catch {
      return false;
    }
  }
}

export const stabilitySubjectExtractionProvider = new StabilitySubjectExtractionProvider();
