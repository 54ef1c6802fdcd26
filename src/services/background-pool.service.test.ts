import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import { loadBackgroundSet, pickBackground, resolveBackgroundPath } from './background-pool.service.js';
import { EmptyPoolError } from '../utils/errors.js';

/**
 * Deterministic linear congruential generator for repeatable sampling
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

describe('loadBackgroundSet', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'backdrop-bg-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should return the names of direct image entries', async () => {
    await writeFile(path.join(root, 'bg1.jpg'), 'x');
    await writeFile(path.join(root, 'bg2.PNG'), 'x');
    await writeFile(path.join(root, 'notes.txt'), 'x');

    const set = await loadBackgroundSet(root);

    expect([...set].sort()).toEqual(['bg1.jpg', 'bg2.PNG']);
  });

  it('should not search subdirectories', async () => {
    await writeFile(path.join(root, 'top.jpeg'), 'x');
    await mkdir(path.join(root, 'nested'));
    await writeFile(path.join(root, 'nested', 'deep.jpg'), 'x');

    expect(await loadBackgroundSet(root)).toEqual(['top.jpeg']);
  });

  it('should accept symbolic links to image files', async () => {
    const outside = await mkdtemp(path.join(os.tmpdir(), 'backdrop-bg-source-'));
    try {
      await writeFile(path.join(outside, 'x.jpg'), 'x');
      await mkdir(path.join(outside, 'dir.png'));
      await symlink(path.join(outside, 'x.jpg'), path.join(root, 'linked.jpg'));
      await symlink(path.join(outside, 'dir.png'), path.join(root, 'linked-dir.png'));
      await symlink(path.join(outside, 'gone.png'), path.join(root, 'dangling.png'));

      expect(await loadBackgroundSet(root)).toEqual(['linked.jpg']);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it('should return a frozen set', async () => {
    await writeFile(path.join(root, 'bg.png'), 'x');

    const set = await loadBackgroundSet(root);

    expect(Object.isFrozen(set)).toBe(true);
  });

  it('should throw EmptyPoolError when no backgrounds exist', async () => {
    await writeFile(path.join(root, 'readme.md'), 'x');

    await expect(loadBackgroundSet(root)).rejects.toBeInstanceOf(EmptyPoolError);
  });
});

describe('pickBackground', () => {
  const set = ['bg1.jpg', 'bg2.png', 'bg3.jpeg'];

  it('should map the random value onto an index', () => {
    expect(pickBackground(set, () => 0)).toBe('bg1.jpg');
    expect(pickBackground(set, () => 0.5)).toBe('bg2.png');
    expect(pickBackground(set, () => 0.99)).toBe('bg3.jpeg');
  });

  it('should clamp a random source returning 1', () => {
    expect(pickBackground(set, () => 1)).toBe('bg3.jpeg');
  });

  it('should always return a member of the set', () => {
    const random = seededRandom(42);
    for (let i = 0; i < 200; i++) {
      expect(set).toContain(pickBackground(set, random));
    }
  });

  it('should select more than one distinct background over many picks', () => {
    const random = seededRandom(7);
    const picked = new Set<string>();
    for (let i = 0; i < 50; i++) {
      picked.add(pickBackground(set, random));
    }

    expect(picked.size).toBeGreaterThan(1);
  });

  it('should allow the same background to be picked repeatedly', () => {
    expect(pickBackground(['only.png'], () => 0.3)).toBe('only.png');
    expect(pickBackground(['only.png'], () => 0.8)).toBe('only.png');
  });

  it('should throw on an empty set', () => {
    expect(() => pickBackground([])).toThrow(EmptyPoolError);
  });
});

describe('resolveBackgroundPath', () => {
  it('should join the file name onto the background root', () => {
    expect(resolveBackgroundPath('/data/bg', 'bg1.jpg')).toBe('/data/bg/bg1.jpg');
  });
});
