/**
 * SubjectExtractionProvider Interface
 *
 * Implementations: StabilitySubjectExtractionProvider, PhotoroomSubjectExtractionProvider
 *
 * Takes an encoded image and returns an encoded PNG of the same subject whose
 * alpha channel separates the subject (opaque) from its former background
 * (transparent). Callers should not rely on the returned dimensions matching
 * the input; the compositor stretches mismatches back.
 */
export interface SubjectExtractionProvider {
  /** Provider identifier for logging */
  readonly providerId: string;

  /**
   * Extract the foreground subject
   * @param image - Encoded input image (PNG with alpha from the compositor)
   * @param fileName - Source file name, for logs and multipart uploads
   * @throws ExternalApiError when the provider rejects the image or is unreachable
   */
  extractSubject(image: Buffer, fileName: string): Promise<Buffer>;

  /**
   * Check if provider is available/configured
   */
  isAvailable(): boolean;
}
