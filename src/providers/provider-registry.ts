import { createChildLogger } from '../utils/logger.js';
import type { BackgroundRemovalProvider, ImageTransformProvider } from './interfaces/index.js';

const logger = createChildLogger({ service: 'provider-registry' });

/**
 * Provider map type
 */
type ProviderMap = {
  backgroundRemoval: BackgroundRemovalProvider;
  imageTransform: ImageTransformProvider;
};

/**
 * Provider types supported by the registry
 */
export type ProviderType = keyof ProviderMap;

type ProviderStore = { [K in ProviderType]: Map<string, ProviderMap[K]> };

/**
 * Provider selection result
 */
export interface ProviderSelection<T> {
  provider: T;
  providerId: string;
}

/**
 * ProviderRegistry
 *
 * Central registry for all provider implementations.
 * Supports:
 * - Multiple implementations per provider type
 * - Default provider selection
 * - Provider availability checking
 */
export class ProviderRegistry {
  private providers: ProviderStore = {
    backgroundRemoval: new Map(),
    imageTransform: new Map(),
  };
  private defaults: Map<ProviderType, string> = new Map();

  /**
   * Register a provider
   * @param setAsDefault - Whether to set as default for this type
   */
  register<T extends ProviderType>(type: T, provider: ProviderMap[T], setAsDefault = false): void {
    const typeProviders: ProviderStore[T] | undefined = this.providers[type];
    if (!typeProviders) {
      throw new Error(`Unknown provider type: ${type}`);
    }

    const providerId = provider.providerId;
    typeProviders.set(providerId, provider);

    if (setAsDefault || !this.defaults.has(type)) {
      this.defaults.set(type, providerId);
    }

    logger.info({ type, providerId, isDefault: setAsDefault }, 'Provider registered');
  }

  /**
   * Set the default provider for a type
   */
  setDefault(type: ProviderType, providerId: string): void {
    if (!this.providers[type].has(providerId)) {
      throw new Error(`Provider not found: ${type}/${providerId}`);
    }
    this.defaults.set(type, providerId);
    logger.info({ type, providerId }, 'Default provider set');
  }

  /**
   * Get a provider by type and optional ID
   */
  get<T extends ProviderType>(type: T, providerId?: string): ProviderSelection<ProviderMap[T]> {
    const typeProviders: ProviderStore[T] = this.providers[type];
    if (typeProviders.size === 0) {
      throw new Error(`No providers registered for type: ${type}`);
    }

    const selectedId = providerId ?? this.defaults.get(type);
    if (!selectedId) {
      throw new Error(`No default provider for type: ${type}`);
    }

    const provider = typeProviders.get(selectedId);
    if (!provider) {
      throw new Error(`Provider not found: ${type}/${selectedId}`);
    }
    return { provider, providerId: selectedId };
  }

  /**
   * Get all registered providers for a type
   */
  getAll<T extends ProviderType>(type: T): Map<string, ProviderMap[T]> {
    return new Map(this.providers[type]);
  }

  /**
   * Check if a provider type has any registered providers
   */
  hasProviders(type: ProviderType): boolean {
    return this.providers[type].size > 0;
  }

  /**
   * Get available (properly configured) providers for a type
   */
  getAvailable<T extends ProviderType>(type: T): ProviderMap[T][] {
    const typeProviders: ProviderStore[T] = this.providers[type];
    return [...typeProviders.values()].filter((p) => p.isAvailable());
  }

  /**
   * Forget every registration (tests and re-initialisation)
   */
  clear(): void {
    this.providers.backgroundRemoval.clear();
    this.providers.imageTransform.clear();
    this.defaults.clear();
  }
}

// Global singleton instance
export const providerRegistry = new ProviderRegistry();
