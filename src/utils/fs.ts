/**
 * File system utilities
 */

import { randomUUID } from 'crypto';
import { mkdir, rename, stat, unlink } from 'fs/promises';
import path from 'path';

import { PathTraversalError } from './errors.js';

/**
 * Safely delete a file, ignoring errors if it doesn't exist
 *
 * @param filePath - Path to the file to delete
 */
export async function safeUnlink(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch {
    // Ignore errors (file may not exist)
  }
}

/**
 * Whether a path (typically a symbolic link) resolves to a regular file.
 * Dangling links resolve to nothing and give false.
 */
export async function isFileTarget(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a root-relative path, refusing anything that lands outside the root
 *
 * @throws PathTraversalError when the path is absolute or climbs out of the root
 *
 * @example
 * resolveWithinRoot('/data/in', 'sub/a.jpg') // '/data/in/sub/a.jpg'
 * resolveWithinRoot('/data/in', '../a.jpg')  // throws
 */
export function resolveWithinRoot(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    throw new PathTraversalError(root, relativePath);
  }

  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, relativePath);
  const relative = path.relative(resolvedRoot, resolved);

  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new PathTraversalError(root, relativePath);
  }

  return resolved;
}

/**
 * Create a directory and any missing ancestors. An existing directory counts as
 * success, so sibling tasks may race on the same path.
 *
 * @returns The first directory actually created, or undefined if it already existed
 */
export async function ensureDirectory(dirPath: string): Promise<string | undefined> {
  return mkdir(dirPath, { recursive: true });
}

/**
 * Temporary sibling path used while a file is being written
 *
 * @example
 * getTempPath('/out/a.png') // '/out/.a.png.1234.5f0c....tmp'
 */
export function getTempPath(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${process.pid}.${randomUUID()}.tmp`);
}

/**
 * Write a file through a temporary sibling and rename it into place, so the
 * destination either holds the complete file or is left untouched.
 *
 * @param filePath - Final destination
 * @param write - Writes the content to the path it is given
 */
export async function writeAtomically(
  filePath: string,
  write: (tempPath: string) => Promise<unknown>
): Promise<void> {
  const tempPath = getTempPath(filePath);
  try {
    await write(tempPath);
    await rename(tempPath, filePath);
  } catch (error) {
    await safeUnlink(tempPath);
    throw error;
  }
}
