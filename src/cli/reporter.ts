/**
 * Console reporting for batch runs. The runner and pool never print; they
 * hand events to a BatchReporter.
 */

import chalk, { type ChalkInstance } from 'chalk';

import { createStyles, type Styles } from './styles.js';
import { formatDuration } from '../utils/timer.js';
import { TaskStatus, type BatchSummary, type TaskResult } from '../types/batch.types.js';

export interface BatchStartInfo {
  inputRoot: string;
  outputRoot: string;
  total: number;
  backgrounds: number;
  workers: number;
}

export interface BatchReporter {
  batchStarted(info: BatchStartInfo): void;
  directoryCreated(absolutePath: string): void;
  taskCompleted(result: TaskResult): void;
  warn(message: string): void;
  batchFinished(summary: BatchSummary): void;
}

export interface ConsoleReporterOptions {
  /** Line sink, defaults to stdout */
  write?: (line: string) => void;
  chalk?: ChalkInstance;
}

export class ConsoleBatchReporter implements BatchReporter {
  private readonly write: (line: string) => void;
  private readonly styles: Styles;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.styles = createStyles(options.chalk ?? chalk);
  }

  batchStarted(info: BatchStartInfo): void {
    this.write(
      this.styles.info(
        `Compositing ${info.total} image(s) from ${info.inputRoot} into ${info.outputRoot} ` +
          `(${info.backgrounds} background(s), ${info.workers} worker(s))`
      )
    );
  }

  directoryCreated(absolutePath: string): void {
    this.write(this.styles.info(`Created directory ${absolutePath}`));
  }

  taskCompleted(result: TaskResult): void {
    const { outcome } = result;
    if (outcome.status === TaskStatus.SUCCESS) {
      this.write(
        this.styles.success(
          `${result.relativePath} → ${outcome.outputRelativePath} ` +
            this.styles.dim(`(${outcome.background}, ${formatDuration(result.durationMs)})`)
        )
      );
      return;
    }
    this.write(this.styles.error(`${result.relativePath}: ${outcome.message}`));
  }

  warn(message: string): void {
    this.write(this.styles.warn(message));
  }

  batchFinished(summary: BatchSummary): void {
    const line =
      `Done: ${summary.succeeded} succeeded, ${summary.failed} failed of ${summary.total} ` +
      `in ${formatDuration(summary.durationMs)}`;
    this.write(summary.failed > 0 ? this.styles.warn(line) : this.styles.success(line));
  }
}
