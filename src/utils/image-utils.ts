/**
 * Shared Image Utilities
 *
 * Extension filtering and naming rules shared by discovery, the background
 * pool and the resize command.
 */

import path from 'path';

/**
 * Extensions accepted as input and background images (lower-case, with dot)
 */
export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'] as const;

/** Extension every composite is written with */
export const OUTPUT_EXTENSION = '.png';

/**
 * Check whether a file name carries one of the accepted image extensions
 * (case-insensitive)
 */
export function isEligibleImage(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return IMAGE_EXTENSIONS.some((allowed) => allowed === ext);
}

/**
 * Replace a file name's extension with the output extension
 *
 * @example
 * toOutputFileName('photo.JPG') // 'photo.png'
 * toOutputFileName('archive.tar.jpeg') // 'archive.tar.png'
 */
export function toOutputFileName(fileName: string): string {
  const parsed = path.parse(fileName);
  return `${parsed.name}${OUTPUT_EXTENSION}`;
}
