export * from './movements.js';
