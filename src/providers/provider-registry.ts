import { createChildLogger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import type { SubjectExtractionProvider } from './interfaces/subject-extraction.provider.js';

const logger = createChildLogger({ service: 'provider-registry' });

/**
 * Provider selection result
 */
export interface ProviderSelection {
  provider: SubjectExtractionProvider;
  providerId: string;
}

/**
 * ProviderRegistry
 *
 * Holds the subject-extraction implementations a worker can use and which one
 * is the default.
 */
export class ProviderRegistry {
  private providers: Map<string, SubjectExtractionProvider> = new Map();
  private defaultId: string | null = null;

  /**
   * Register a provider
   * @param provider - Provider instance
   * @param setAsDefault - Whether to make it the default
   */
  register(provider: SubjectExtractionProvider, setAsDefault = false): void {
    this.providers.set(provider.providerId, provider);

    if (setAsDefault || this.defaultId === null) {
      this.defaultId = provider.providerId;
    }

    logger.debug({ providerId: provider.providerId, isDefault: this.defaultId === provider.providerId }, 'Provider registered');
  }

  /**
   * Set the default provider
   */
  setDefault(providerId: string): void {
    if (!this.providers.has(providerId)) {
      throw new ConfigurationError(`Subject extraction provider not found: ${providerId}`, 'PROVIDER_NOT_FOUND');
    }
    this.defaultId = providerId;
  }

  /**
   * Get a provider by id, or the default one
   */
  get(providerId?: string): ProviderSelection {
    const id = providerId ?? this.defaultId;
    if (id === null) {
      throw new ConfigurationError('No subject extraction provider registered', 'PROVIDER_NOT_FOUND');
    }

    const provider = this.providers.get(id);
    if (!provider) {
      throw new ConfigurationError(`Subject extraction provider not found: ${id}`, 'PROVIDER_NOT_FOUND');
    }

    return { provider, providerId: id };
  }

  /**
   * Get a provider and verify it is configured
   */
  getAvailable(providerId?: string): ProviderSelection {
    const selection = this.get(providerId);
    if (!selection.provider.isAvailable()) {
      throw new ConfigurationError(
        `Subject extraction provider "${selection.providerId}" is not configured`,
        'PROVIDER_UNAVAILABLE'
      );
    }
    return selection;
  }

  /**
   * Registered provider ids
   */
  list(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Remove every provider (for tests)
   */
  clear(): void {
    this.providers.clear();
    this.defaultId = null;
  }
}

export const providerRegistry = new ProviderRegistry();
