import { readdir } from 'fs/promises';
import path from 'path';

import { EmptyPoolError } from '../utils/errors.js';
import { isFileTarget } from '../utils/fs.js';
import { isEligibleImage } from '../utils/image-utils.js';
import { createChildLogger } from '../utils/logger.js';
import type { BackgroundSet } from '../types/batch.types.js';

const logger = createChildLogger({ service: 'background-pool' });

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Load background file names from the direct entries of `backgroundRoot`.
 * Subdirectories are not searched; symbolic links to files count as entries.
 *
 * @throws EmptyPoolError when no eligible image is present
 */
export async function loadBackgroundSet(backgroundRoot: string): Promise<BackgroundSet> {
  const entries = await readdir(backgroundRoot, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!isEligibleImage(entry.name)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isFileTarget(path.join(backgroundRoot, entry.name))))) {
      names.push(entry.name);
    }
  }

  if (names.length === 0) {
    throw new EmptyPoolError(backgroundRoot);
  }

  logger.debug({ backgroundRoot, count: names.length }, 'Background set loaded');
  return Object.freeze(names);
}

/**
 * Pick one background uniformly at random, with replacement.
 */
export function pickBackground(set: BackgroundSet, random: RandomSource = Math.random): string {
  if (set.length === 0) {
    throw new EmptyPoolError('(empty background set)');
  }

  // Guard against sources returning exactly 1
  const index = Math.min(Math.floor(random() * set.length), set.length - 1);
  return set[index];
}

/**
 * Absolute path of a background picked from the set
 */
export function resolveBackgroundPath(backgroundRoot: string, fileName: string): string {
  return path.join(backgroundRoot, fileName);
}
