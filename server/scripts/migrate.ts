/**
 * Apply (or roll back) the Kysely schema migrations.
 *
 * Run with: npx tsx scripts/migrate.ts          # migrate to latest
 *           npx tsx scripts/migrate.ts --down   # undo the last migration
 */

import { Migrator, type MigrationResultSet } from 'kysely';
import { closeDb, getDb } from '../src/db/index.js';
import { migrationProvider } from '../src/db/migrations/index.js';
import logger from '../src/utils/logger.js';

const log = logger.child({ module: 'migrate' });

async function main(): Promise<void> {
    const direction = process.argv.includes('--down') ? 'down' : 'latest';
    const migrator = new Migrator({ db: getDb(), provider: migrationProvider });

    const { error, results }: MigrationResultSet = direction === 'down'
        ? await migrator.migrateDown()
        : await migrator.migrateToLatest();

    for (const result of results ?? []) {
        if (result.status === 'Success') {
            log.info({ migration: result.migrationName, direction: result.direction }, 'Migration applied');
        } else if (result.status === 'Error') {
            log.error({ migration: result.migrationName }, 'Migration failed');
        }
    }

    if (error) {
        throw error;
    }
    if (!results || results.length === 0) {
        log.info('Nothing to migrate');
    }
}

main()
    .catch((error: unknown) => {
        log.error({ err: error }, 'Migration run failed');
        process.exitCode = 1;
    })
    .finally(() => closeDb());
