/**
 * @tessera/shared - Catalog engine shared between server and CLI
 *
 * Domain logic from ./domain, Zod schemas from ./schemas, error codes from ./errors.
 */

export * from './domain/index.js';
export * from './schemas/index.js';
export * from './errors/index.js';
