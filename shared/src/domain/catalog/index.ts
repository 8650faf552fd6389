export * from './types.js';
export * from './catalogIndex.js';
