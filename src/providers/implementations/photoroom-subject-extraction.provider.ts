import { getConfig } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { toOutputFileName } from '../../utils/image-utils.js';
import { postImageRequest } from '../utils/image-api.js';
import type { SubjectExtractionProvider } from '../interfaces/subject-extraction.provider.js';

const logger = createChildLogger({ service: 'photoroom-subject-extraction' });

const PHOTOROOM_SEGMENT_ENDPOINT = '/v1/segment';

/**
 * Photoroom Subject Extraction Provider
 *
 * Uses the Photoroom segment API, which returns a PNG cut-out at the input size.
 */
export class PhotoroomSubjectExtractionProvider implements SubjectExtractionProvider {
  readonly providerId = 'photoroom';

  async extractSubject(image: Buffer, fileName: string): Promise<Buffer> {
    const config = getConfig();
    const apiKey = config.apis.photoroom;

    if (!apiKey) {
      throw new ConfigurationError('Photoroom API key not configured (PHOTOROOM_API_KEY)');
    }

    const result = await postImageRequest({
      service: 'Photoroom',
      endpoint: `${config.apis.photoroomBase}${PHOTOROOM_SEGMENT_ENDPOINT}`,
      headers: {
        'x-api-key': apiKey,
        Accept: 'image/png',
      },
      buildForm: () => {
        const formData = new FormData();
        formData.append('image_file', new Blob([new Uint8Array(image)], { type: 'image/png' }), toOutputFileName(fileName));
        formData.append('format', 'png');
        return formData;
      },
      maxRetries: config.extraction.maxRetries,
      retryDelayMs: config.extraction.retryDelayMs,
    });

    logger.debug({ fileName, size: result.length }, 'Subject extracted with Photoroom');
    return result;
  }

  isAvailable(): boolean {
    try {
      return !!getConfig().apis.photoroom;
    } catch {
      return false;
    }
  }
}

export const photoroomSubjectExtractionProvider = new PhotoroomSubjectExtractionProvider();
