/**
 * Image API Utilities
 *
 * Shared request helper for the HTTP subject-extraction providers.
 */

import { ExternalApiError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger({ service: 'image-api' });

/**
 * Image API request constants
 */
export const IMAGE_API_CONSTANTS = {
  /** Maximum attempts per request */
  MAX_RETRIES: 3,
  /** Base delay between retries in ms, multiplied by the attempt number */
  RETRY_DELAY_MS: 2000,
  /** Longest error body kept in logs */
  MAX_LOGGED_ERROR_LENGTH: 500,
} as const;

/**
 * Options for posting an image to an API
 */
export interface ImageRequestOptions {
  /** Service name used in errors and logs */
  service: string;
  /** Full endpoint URL */
  endpoint: string;
  /** Request headers (auth, accept) */
  headers: Record<string, string>;
  /** Builds the multipart body; called once per attempt */
  buildForm: () => FormData;
  /** Current attempt number (for retries) */
  attempt?: number;
  /** Maximum attempts (default: 3) */
  maxRetries?: number;
  /** Base delay between retries in ms (default: 2000) */
  retryDelayMs?: number;
}

/**
 * Delay helper
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether an HTTP status is worth retrying
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * POST a multipart form and return the binary image response.
 *
 * Handles:
 * - Rate limiting (429) and server errors (5xx) with linear backoff
 * - Network errors with retry
 * - Non-image responses as errors
 */
export async function postImageRequest(options: ImageRequestOptions): Promise<Buffer> {
  const {
    service,
    endpoint,
    headers,
    buildForm,
    attempt = 1,
    maxRetries = IMAGE_API_CONSTANTS.MAX_RETRIES,
    retryDelayMs = IMAGE_API_CONSTANTS.RETRY_DELAY_MS,
  } = options;

  let response: Response;
  try {
    logger.debug({ service, endpoint, attempt }, 'Calling image API');
    response = await fetch(endpoint, {
      method: 'POST',
      headers,
      body: buildForm(),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (attempt < maxRetries) {
      logger.warn({ service, error: message, attempt }, 'Image API request failed, retrying');
      await delay(retryDelayMs * attempt);
      return postImageRequest({ ...options, attempt: attempt + 1 });
    }
    throw new ExternalApiError(service, `Request failed: ${message}`, {
      originalError: error instanceof Error ? error : undefined,
    });
  }

  if (!response.ok) {
    let errorDetails: string;
    try {
      errorDetails = await response.text();
    } catch {
      errorDetails = `HTTP ${response.status}`;
    }

    logger.error(
      {
        service,
        status: response.status,
        error: errorDetails.slice(0, IMAGE_API_CONSTANTS.MAX_LOGGED_ERROR_LENGTH),
        attempt,
      },
      'Image API error'
    );

    if (isRetryableStatus(response.status) && attempt < maxRetries) {
      await delay(retryDelayMs * attempt);
      return postImageRequest({ ...options, attempt: attempt + 1 });
    }

    throw new ExternalApiError(service, `API error (HTTP ${response.status}): ${errorDetails}`, {
      status: response.status,
    });
  }

  const contentType = response.headers.get('content-type') ?? '';
  if (!contentType.startsWith('image/')) {
    throw new ExternalApiError(service, `Unexpected response content type: ${contentType || 'none'}`, {
      status: response.status,
    });
  }

  return Buffer.from(await response.arrayBuffer());
}
