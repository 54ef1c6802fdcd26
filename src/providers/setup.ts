/**
 * Provider Setup
 *
 * Registers the subject-extraction implementations and selects the configured
 * default. Each worker process calls this once at startup.
 */

import { getConfig } from '../config/index.js';
import { providerRegistry } from './provider-registry.js';
import { stabilitySubjectExtractionProvider } from './implementations/stability-subject-extraction.provider.js';
import { photoroomSubjectExtractionProvider } from './implementations/photoroom-subject-extraction.provider.js';
import type { SubjectExtractionProvider } from './interfaces/subject-extraction.provider.js';

/**
 * Register all default providers
 */
export function setupDefaultProviders(): void {
  providerRegistry.register(stabilitySubjectExtractionProvider);
  providerRegistry.register(photoroomSubjectExtractionProvider);
  providerRegistry.setDefault(getConfig().extraction.provider);
}

/**
 * Resolve the configured provider, checking that its credentials are present
 *
 * @throws ConfigurationError when the provider is unknown or unconfigured
 */
export function getSubjectExtractionProvider(): SubjectExtractionProvider {
  if (providerRegistry.list().length === 0) {
    setupDefaultProviders();
  }
  return providerRegistry.getAvailable().provider;
}

export { providerRegistry } from './provider-registry.js';
