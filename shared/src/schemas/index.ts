/**
 * Shared Zod schemas
 */

export * from './catalog.js';
export * from './production.js';
