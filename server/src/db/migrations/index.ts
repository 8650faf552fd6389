/**
 * Migration registry
 *
 * Listed explicitly so the Migrator does not depend on how the files are
 * loaded (tsx in development, compiled JS in dist/).
 */

import type { Migration, MigrationProvider } from 'kysely';
import * as catalog from './001_catalog.js';
import * as stockMovements from './002_stock_movements.js';

export const migrations: Record<string, Migration> = {
    '001_catalog': catalog,
    '002_stock_movements': stockMovements,
};

export const migrationProvider: MigrationProvider = {
    getMigrations: async () => migrations,
};
