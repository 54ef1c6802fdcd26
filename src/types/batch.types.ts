import { z } from 'zod';

/**
 * Path relative to a batch root (input or output). Never absolute.
 */
export type RelativePath = string;

/**
 * Background file names (not paths) available to every task in a run
 */
export type BackgroundSet = readonly string[];

/**
 * Task outcome status enum
 */
export const TaskStatus = {
  SUCCESS: 'success',
  FAILURE: 'failure',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/**
 * Task outcome schema. Results cross the worker process boundary, so they are
 * validated on receipt.
 */
export const taskOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal(TaskStatus.SUCCESS),
    outputRelativePath: z.string(),
    background: z.string(),
  }),
  z.object({
    status: z.literal(TaskStatus.FAILURE),
    code: z.string(),
    message: z.string(),
  }),
]);

export type TaskOutcome = z.infer<typeof taskOutcomeSchema>;

/**
 * Task result schema
 */
export const taskResultSchema = z.object({
  relativePath: z.string(),
  outcome: taskOutcomeSchema,
  /** Output directory created by this task, relative to the output root */
  createdDirectory: z.string().optional(),
  durationMs: z.number().nonnegative(),
});

export type TaskResult = z.infer<typeof taskResultSchema>;

/**
 * Read-only context shared with every worker once, at startup
 */
export const sharedTaskContextSchema = z.object({
  inputRoot: z.string(),
  backgroundRoot: z.string(),
  outputRoot: z.string(),
  backgrounds: z.array(z.string()).min(1),
});

export type SharedTaskContext = z.infer<typeof sharedTaskContextSchema>;

/**
 * Worker pool sizing
 */
export interface WorkerPoolConfig {
  maxWorkers: number;
}

/**
 * Totals reported when a batch finishes
 */
export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  durationMs: number;
}
