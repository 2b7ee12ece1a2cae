/**
 * Provider Implementations
 *
 * Export all provider implementations for registration.
 */

export { ReplicateBackgroundRemovalProvider, replicateBackgroundRemovalProvider } from './replicate-background-removal.provider.js';
export { StabilityBackgroundRemovalProvider, stabilityBackgroundRemovalProvider } from './stability-background-removal.provider.js';
export { SharpImageTransformProvider, sharpImageTransformProvider } from './sharp-image-transform.provider.js';
