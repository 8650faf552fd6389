/**
 * Kysely Queries
 */

export * from './catalogKysely.js';
export * from './variantsKysely.js';
export * from './stockKysely.js';
