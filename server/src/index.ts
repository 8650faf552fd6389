/**
 * @tessera/server - persistence and transactional catalog services
 *
 * Services take a CatalogStore; getCatalogStore() returns the Kysely-backed
 * one over DATABASE_URL.
 */

export * from './services/index.js';
export { KyselyCatalogStore, getCatalogStore } from './db/catalogStore.js';
export { createDb, getDb, closeDb, type KyselyDB, type DB } from './db/index.js';
export { migrations, migrationProvider } from './db/migrations/index.js';
export {
    ValidationError,
    NotFoundError,
    ConflictError,
    BusinessLogicError,
    InsufficientMaterialStockError,
    DatabaseError,
    isCustomError,
    type CustomError,
    type MaterialShortage,
} from './utils/errors.js';
export { AnomalyBuffer, type AnomalyEntry } from './utils/anomalyBuffer.js';
export { withProductLock, getProductLockStatus } from './utils/productLock.js';
export { withTransactionRetry, isRetryableDbError } from './utils/retry.js';
