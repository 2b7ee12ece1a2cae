/**
 * Provider Setup
 *
 * Registers all default provider implementations with the provider registry.
 * Call this during application initialization.
 */

import { providerRegistry } from './provider-registry.js';
import {
  replicateBackgroundRemovalProvider,
  stabilityBackgroundRemovalProvider,
  sharpImageTransformProvider,
} from './implementations/index.js';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'provider-setup' });

/**
 * Register all default providers
 */
export function setupDefaultProviders(): void {
  logger.info('Registering default providers');
  const config = getConfig();

  // Register background removal providers
  providerRegistry.register('backgroundRemoval', replicateBackgroundRemovalProvider);
  providerRegistry.register('backgroundRemoval', stabilityBackgroundRemovalProvider);
  providerRegistry.setDefault('backgroundRemoval', config.backgroundRemoval.provider);

  const { provider } = providerRegistry.get('backgroundRemoval');
  if (!provider.isAvailable()) {
    logger.warn(
      { providerId: provider.providerId },
      'Default background removal provider has no credentials; processing will fail'
    );
  }

  // Register image transform providers
  providerRegistry.register('imageTransform', sharpImageTransformProvider, true);

  logger.info('Default providers registered');
}

export { providerRegistry } from './provider-registry.js';
