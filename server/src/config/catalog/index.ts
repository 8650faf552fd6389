/**
 * Catalog Configuration
 *
 * Variant generation and transactional write settings.
 */

export * from './variantGeneration.js';
export * from './transactions.js';
