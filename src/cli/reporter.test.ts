import { describe, it, expect, beforeEach } from 'vitest';
import { Chalk } from 'chalk';

import { ConsoleBatchReporter } from './reporter.js';
import { TaskStatus } from '../types/batch.types.js';

describe('ConsoleBatchReporter', () => {
  let lines: string[];
  let reporter: ConsoleBatchReporter;

  beforeEach(() => {
    lines = [];
    reporter = new ConsoleBatchReporter({ write: (line) => lines.push(line), chalk: new Chalk({ level: 0 }) });
  });

  it('should announce the batch', () => {
    reporter.batchStarted({ inputRoot: '/in', outputRoot: '/out', total: 3, backgrounds: 2, workers: 3 });

    expect(lines).toEqual(['ℹ Compositing 3 image(s) from /in into /out (2 background(s), 3 worker(s))']);
  });

  it('should print created directories', () => {
    reporter.directoryCreated('/out/sub');

    expect(lines).toEqual(['ℹ Created directory /out/sub']);
  });

  it('should print successes with source, destination and background', () => {
    reporter.taskCompleted({
      relativePath: 'sub/b.jpg',
      outcome: { status: TaskStatus.SUCCESS, outputRelativePath: 'sub/b.png', background: 'beach.jpg' },
      durationMs: 1500,
    });

    expect(lines).toEqual(['✓ sub/b.jpg → sub/b.png (beach.jpg, 1.50s)']);
  });

  it('should print failures with their message', () => {
    reporter.taskCompleted({
      relativePath: 'broken.png',
      outcome: { status: TaskStatus.FAILURE, code: 'COMPOSITING_READ_FOREGROUND', message: 'bad header' },
      durationMs: 3,
    });

    expect(lines).toEqual(['✗ broken.png: bad header']);
  });

  it('should print warnings', () => {
    reporter.warn('a.jpg, a.png all write a.png');

    expect(lines).toEqual(['⚠ a.jpg, a.png all write a.png']);
  });

  it('should summarize the batch', () => {
    reporter.batchFinished({ total: 2, succeeded: 2, failed: 0, durationMs: 250 });
    reporter.batchFinished({ total: 2, succeeded: 1, failed: 1, durationMs: 61000 });

    expect(lines).toEqual([
      '✓ Done: 2 succeeded, 0 failed of 2 in 250ms',
      '⚠ Done: 1 succeeded, 1 failed of 2 in 1m 1.0s',
    ]);
  });
});
