/**
 * Kysely database access
 *
 * Usage:
 *   import { getDb } from './db/index.js';
 *
 *   const variants = await getDb()
 *     .selectFrom('ProductVariant')
 *     .select(['id', 'sku'])
 *     .where('productId', '=', productId)
 *     .execute();
 *
 * The pool is created on first use so that importing this module never
 * needs DATABASE_URL.
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import { env } from '../config/env.js';
import type { DB } from './schema.js';

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create a Kysely instance over a new pg pool
 */
export function createDb(connectionString: string, max: number = env.DB_POOL_MAX): Kysely<DB> {
    return new Kysely<DB>({
        dialect: new PostgresDialect({
            pool: new pg.Pool({ connectionString, max }),
        }),
    });
}

/**
 * Create or return the singleton Kysely instance
 *
 * @throws Error when DATABASE_URL is not configured
 */
export function getDb(): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL is not set');
    }
    kyselyInstance = createDb(env.DATABASE_URL);
    return kyselyInstance;
}

/**
 * Close the singleton pool (scripts and graceful shutdown)
 */
export async function closeDb(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

export type { DB } from './schema.js';
