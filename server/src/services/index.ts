/**
 * Catalog services
 */

export * from './catalogStore.js';
export * from './variantGenerationService.js';
export * from './bomResolutionService.js';
export * from './producibilityService.js';
export * from './productionConsumptionService.js';
