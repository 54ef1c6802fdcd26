import { availableParallelism } from 'os';
import path from 'path';

import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/** Upper bound on workers per available CPU */
export const WORKERS_PER_CPU = 2;

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  runtime: {
    env: 'development' | 'production' | 'test';
  };
  logging: {
    level: string;
  };
  batch: {
    inputDir: string;
    backgroundDir: string;
    outputDir: string;
  };
  workers: {
    maxWorkers: number;
    mode: 'process' | 'inline';
  };
  extraction: {
    provider: 'stability' | 'photoroom';
    maxRetries: number;
    retryDelayMs: number;
  };
  apis: {
    stability?: string;
    stabilityBase: string;
    photoroom?: string;
    photoroomBase: string;
  };
  compositing: {
    flattenColor: string;
  };
  resize: {
    minDimension: number;
    folderName: string;
  };
}

/**
 * Clamp a requested worker count to what the host can reasonably run.
 *
 * @param requested - Worker count from configuration
 * @param cpus - Available execution units (defaults to the host's)
 */
export function clampWorkerCount(requested: number, cpus: number = availableParallelism()): number {
  const ceiling = Math.max(1, cpus * WORKERS_PER_CPU);
  return Math.min(Math.max(1, Math.floor(requested)), ceiling);
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    runtime: {
      env: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    batch: {
      inputDir: path.resolve(env.INPUT_DIR),
      backgroundDir: path.resolve(env.BACKGROUND_DIR),
      outputDir: path.resolve(env.OUTPUT_DIR),
    },
    workers: {
      maxWorkers: clampWorkerCount(env.MAX_WORKERS),
      mode: env.WORKER_MODE,
    },
    extraction: {
      provider: env.SUBJECT_EXTRACTION_PROVIDER,
      maxRetries: env.EXTRACTION_MAX_RETRIES,
      retryDelayMs: env.EXTRACTION_RETRY_DELAY_MS,
    },
    apis: {
      stability: env.STABILITY_API_KEY || undefined,
      stabilityBase: env.STABILITY_API_BASE,
      photoroom: env.PHOTOROOM_API_KEY || undefined,
      photoroomBase: env.PHOTOROOM_API_BASE,
    },
    compositing: {
      flattenColor: env.FLATTEN_COLOR,
    },
    resize: {
      minDimension: env.RESIZE_MIN_DIMENSION,
      folderName: env.RESIZED_FOLDER_NAME,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
