export * from './optionSet.js';
export * from './sku.js';
export * from './generator.js';
