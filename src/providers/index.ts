/**
 * Providers Module
 *
 * Swappable implementations behind small interfaces, looked up through the registry.
 *
 * Usage:
 *
 * 1. Initialize providers (call once at app startup):
 *    ```ts
 *    import { setupDefaultProviders } from './providers/index.js';
 *    setupDefaultProviders();
 *    ```
 *
 * 2. Get a provider:
 *    ```ts
 *    import { providerRegistry } from './providers/index.js';
 *    const { provider } = providerRegistry.get('backgroundRemoval');
 *    const cutout = await provider.removeBackground(image, { requestId: sessionId });
 *    ```
 */

// Export interfaces
export * from './interfaces/index.js';

// Export registry
export { providerRegistry, type ProviderType, type ProviderSelection } from './provider-registry.js';

// Export setup
export { setupDefaultProviders } from './setup.js';

// Export implementations for direct use or custom composition
export * from './implementations/index.js';
