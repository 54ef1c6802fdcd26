/**
 * Timing helpers for tasks and batches
 */

import { performance } from 'perf_hooks';

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Start a stopwatch. The returned function gives the elapsed milliseconds,
 * rounded, each time it is called.
 *
 * @example
 * const elapsed = startTimer();
 * await work();
 * logger.info({ durationMs: elapsed() }, 'Done');
 */
export function startTimer(now: () => number = () => performance.now()): () => number {
  const start = now();
  return () => Math.max(0, Math.round(now() - start));
}
