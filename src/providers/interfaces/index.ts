/**
 * Provider Interfaces
 *
 * Contracts for the swappable collaborators of the collage pipeline.
 */

export * from './background-removal.provider.js';
export * from './image-transform.provider.js';
