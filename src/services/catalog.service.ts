import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';

import { PreconditionError, getErrorCode } from '../utils/errors.js';
import { isFileTarget } from '../utils/fs.js';
import { isEligibleImage } from '../utils/image-utils.js';
import { createChildLogger } from '../utils/logger.js';
import type { RelativePath } from '../types/batch.types.js';

const logger = createChildLogger({ service: 'catalog' });

export interface DiscoverOptions {
  /** Absolute directories not to descend into (e.g. an output root nested in the input root) */
  exclude?: string[];
}

/**
 * Recursively list eligible images under `inputRoot`, relative to it.
 *
 * Order follows the directory walk and is not sorted. An empty list means
 * nothing matched; deciding whether that is fatal is up to the caller.
 * Symbolic links to directories are not followed, links to files are kept.
 *
 * @throws PreconditionError when a directory in the tree cannot be listed
 */
export async function discoverImages(inputRoot: string, options: DiscoverOptions = {}): Promise<RelativePath[]> {
  const root = path.resolve(inputRoot);
  const excluded = new Set((options.exclude ?? []).map((dir) => path.resolve(dir)));
  const found: RelativePath[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new PreconditionError(
        `Input directory is not readable: ${dir} (${getErrorCode(error)})`,
        dir,
        'DIRECTORY_NOT_READABLE'
      );
    }

    for (const entry of entries) {
      const absolute = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (excluded.has(absolute)) {
          logger.debug({ dir: absolute }, 'Skipping excluded directory');
          continue;
        }
        await walk(absolute);
        continue;
      }

      if (!isEligibleImage(entry.name)) continue;

      if (entry.isFile() || (entry.isSymbolicLink() && (await isFileTarget(absolute)))) {
        found.push(path.relative(root, absolute));
      }
    }
  }

  await walk(root);

  logger.debug({ inputRoot: root, count: found.length }, 'Image discovery complete');
  return found;
}

/**
 * Group relative paths that would be written to the same output file.
 *
 * @param mapToOutput - Maps an input relative path to its output relative path
 * @returns Output path → every input mapped onto it, only where there is more than one
 */
export function findOutputCollisions(
  paths: readonly RelativePath[],
  mapToOutput: (relativePath: RelativePath) => RelativePath
): Map<RelativePath, RelativePath[]> {
  const byOutput = new Map<RelativePath, RelativePath[]>();

  for (const relativePath of paths) {
    const output = mapToOutput(relativePath);
    const existing = byOutput.get(output);
    if (existing) {
      existing.push(relativePath);
    } else {
      byOutput.set(output, [relativePath]);
    }
  }

  for (const [output, inputs] of byOutput) {
    if (inputs.length < 2) {
      byOutput.delete(output);
    }
  }

  return byOutput;
}
