export * from './resolver.js';
export * from './producibility.js';
export * from './consumption.js';
