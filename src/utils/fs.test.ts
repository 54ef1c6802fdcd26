import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, stat } from 'fs/promises';
import os from 'os';
import path from 'path';

import { ensureDirectory, getTempPath, resolveWithinRoot, safeUnlink, writeAtomically } from './fs.js';
import { PathTraversalError } from './errors.js';

describe('fs utils', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'backdrop-fs-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('resolveWithinRoot', () => {
    it('should join nested relative paths onto the root', () => {
      expect(resolveWithinRoot('/data/in', 'sub/deeper/a.jpg')).toBe('/data/in/sub/deeper/a.jpg');
    });

    it('should allow inner .. segments that stay inside the root', () => {
      expect(resolveWithinRoot('/data/in', 'sub/../a.jpg')).toBe('/data/in/a.jpg');
    });

    it('should reject paths climbing out of the root', () => {
      expect(() => resolveWithinRoot('/data/in', '../secret.jpg')).toThrow(PathTraversalError);
      expect(() => resolveWithinRoot('/data/in', 'sub/../../secret.jpg')).toThrow(PathTraversalError);
    });

    it('should reject sibling directories sharing a prefix', () => {
      expect(() => resolveWithinRoot('/data/in', '../input-other/a.jpg')).toThrow(PathTraversalError);
    });

    it('should reject absolute paths', () => {
      expect(() => resolveWithinRoot('/data/in', '/etc/passwd')).toThrow(PathTraversalError);
    });

    it('should accept file names that merely start with two dots', () => {
      expect(resolveWithinRoot('/data/in', '..cover.jpg')).toBe('/data/in/..cover.jpg');
    });

    it('should reject the root itself', () => {
      expect(() => resolveWithinRoot('/data/in', '.')).toThrow(PathTraversalError);
    });
  });

  describe('ensureDirectory', () => {
    it('should create missing ancestors and report the first one created', async () => {
      const target = path.join(tmpDir, 'a', 'b', 'c');

      const created = await ensureDirectory(target);

      expect(created).toBe(path.join(tmpDir, 'a'));
      expect((await stat(target)).isDirectory()).toBe(true);
    });

    it('should succeed when the directory already exists', async () => {
      await ensureDirectory(path.join(tmpDir, 'x'));

      await expect(ensureDirectory(path.join(tmpDir, 'x'))).resolves.toBeUndefined();
    });

    it('should tolerate concurrent creation of the same directory', async () => {
      const target = path.join(tmpDir, 'shared', 'sub');

      await Promise.all([ensureDirectory(target), ensureDirectory(target), ensureDirectory(target)]);

      expect((await stat(target)).isDirectory()).toBe(true);
    });
  });

  describe('getTempPath', () => {
    it('should stay beside the destination as a hidden file', () => {
      const temp = getTempPath('/out/sub/a.png');

      expect(path.dirname(temp)).toBe('/out/sub');
      expect(path.basename(temp).startsWith('.a.png.')).toBe(true);
      expect(temp.endsWith('.tmp')).toBe(true);
    });

    it('should differ between calls', () => {
      expect(getTempPath('/out/a.png')).not.toBe(getTempPath('/out/a.png'));
    });
  });

  describe('writeAtomically', () => {
    it('should move the written file into place', async () => {
      const dest = path.join(tmpDir, 'out.txt');

      await writeAtomically(dest, (tempPath) => writeFile(tempPath, 'done'));

      expect(await readFile(dest, 'utf-8')).toBe('done');
      expect(await readdir(tmpDir)).toEqual(['out.txt']);
    });

    it('should leave no destination or temp file when the write fails', async () => {
      const dest = path.join(tmpDir, 'out.txt');

      await expect(
        writeAtomically(dest, async (tempPath) => {
          await writeFile(tempPath, 'partial');
          throw new Error('encoder crashed');
        })
      ).rejects.toThrow('encoder crashed');

      expect(await readdir(tmpDir)).toEqual([]);
    });

    it('should keep the previous destination when a rewrite fails', async () => {
      const dest = path.join(tmpDir, 'out.txt');
      await writeFile(dest, 'original');

      await expect(
        writeAtomically(dest, async () => {
          throw new Error('encoder crashed');
        })
      ).rejects.toThrow('encoder crashed');

      expect(await readFile(dest, 'utf-8')).toBe('original');
    });
  });

  describe('safeUnlink', () => {
    it('should ignore missing files', async () => {
      await expect(safeUnlink(path.join(tmpDir, 'missing'))).resolves.toBeUndefined();
    });
  });
});
