/**
 * Domain Layer
 *
 * Pure catalog logic: variant generation, price/weight resolution, BOM
 * resolution and producibility. No I/O; every function takes a snapshot.
 */

export * from './decimal.js';
export * from './catalog/index.js';
export * from './variants/index.js';
export * from './pricing/index.js';
export * from './bom/index.js';
export * from './stock/index.js';
