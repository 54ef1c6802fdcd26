import { getConfig, type AppConfig } from '../config/index.js';
import { CompositorService } from '../services/compositor.service.js';
import { getSubjectExtractionProvider } from '../providers/setup.js';
import { createForkWorkerFactory } from './fork-worker.js';
import { createInlineWorkerFactory } from './inline-worker.js';
import type { WorkerFactory } from '../types/worker.types.js';

/**
 * Compositor wired to the configured extraction provider and flatten colour
 */
export function createConfiguredCompositor(config: AppConfig = getConfig()): CompositorService {
  return new CompositorService(getSubjectExtractionProvider(), {
    flattenColor: config.compositing.flattenColor,
  });
}

/**
 * Worker factory for the configured WORKER_MODE
 */
export function createWorkerFactory(config: AppConfig = getConfig()): WorkerFactory {
  if (config.workers.mode === 'inline') {
    return createInlineWorkerFactory({ createCompositor: () => createConfiguredCompositor(config) });
  }
  return createForkWorkerFactory();
}
