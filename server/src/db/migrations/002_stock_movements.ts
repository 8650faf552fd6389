/**
 * Migration 002: Stock movements
 *
 * Append-only audit trail for every raw-material and variant stock change.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
    await db.schema
        .createTable('StockMovement')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('entityType', 'text', col => col.notNull()
            .check(sql`"entityType" IN ('raw_material', 'product_variant')`))
        .addColumn('entityId', 'uuid', col => col.notNull())
        .addColumn('movementType', 'text', col => col.notNull()
            .check(sql`"movementType" IN ('purchase', 'sale', 'adjustment', 'production_consume', 'production_output', 'return', 'damage')`))
        .addColumn('quantityChange', 'numeric(12, 4)', col => col.notNull())
        .addColumn('quantityBefore', 'numeric(12, 4)', col => col.notNull())
        .addColumn('quantityAfter', 'numeric(12, 4)', col => col.notNull())
        .addColumn('referenceType', 'text')
        .addColumn('referenceId', 'uuid')
        .addColumn('unitCost', 'numeric(12, 4)')
        .addColumn('notes', 'text')
        .addColumn('createdBy', 'uuid')
        .addColumn('createdAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createIndex('StockMovement_entity_idx')
        .on('StockMovement')
        .columns(['entityType', 'entityId'])
        .execute();
    await db.schema.createIndex('StockMovement_movementType_idx').on('StockMovement').column('movementType').execute();
    await db.schema.createIndex('StockMovement_createdAt_idx').on('StockMovement').column('createdAt').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('StockMovement').ifExists().execute();
}
