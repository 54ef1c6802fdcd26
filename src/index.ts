#!/usr/bin/env node
import 'dotenv/config';

import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { AppError, toError } from './utils/errors.js';
import { runBatch } from './services/batch-runner.service.js';
import { ConsoleBatchReporter } from './cli/reporter.js';
import { styles } from './cli/styles.js';
import { createWorkerFactory } from './workers/index.js';
import { getSubjectExtractionProvider } from './providers/setup.js';

/**
 * Batch entry point. Exits 0 once the batch has run, whatever the per-task
 * outcomes; exits 1 when it could not start.
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info(
    { env: config.runtime.env, workers: config.workers.maxWorkers, mode: config.workers.mode },
    'Starting backdrop batch'
  );

  await runBatch(
    {
      inputRoot: config.batch.inputDir,
      backgroundRoot: config.batch.backgroundDir,
      outputRoot: config.batch.outputDir,
      maxWorkers: config.workers.maxWorkers,
    },
    {
      factory: createWorkerFactory(config),
      reporter: new ConsoleBatchReporter(),
      // Workers resolve the provider themselves; fail here first on missing credentials
      preflight: () => {
        getSubjectExtractionProvider();
      },
    }
  );
}

main().catch((error: unknown) => {
  const err = toError(error);
  if (err instanceof AppError && err.isOperational) {
    process.stderr.write(`${styles.error(err.message)}\n`);
  } else {
    // Use stderr for fatal errors before/after logger availability
    process.stderr.write(`Fatal error: ${err.message}\n`);
    if (err.stack) {
      process.stderr.write(`${err.stack}\n`);
    }
  }
  process.exitCode = 1;
});
