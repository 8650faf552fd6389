/**
 * Kysely Stock Ledger Queries
 *
 * Row locks and stock writes for production consumption. Every stock change
 * is paired with an append-only StockMovement row.
 */

import { sql } from 'kysely';
import {
    Decimal,
    type MaterialStockLevel,
    type NewStockMovement,
} from '@tessera/shared';
import type { KyselyDB } from '../index.js';

/**
 * SET LOCAL lock_timeout for the current transaction
 */
export async function setLockTimeoutKysely(trx: KyselyDB, timeoutMs: number): Promise<void> {
    await sql`SELECT set_config('lock_timeout', ${`${Math.trunc(timeoutMs)}ms`}, true)`.execute(trx);
}

/**
 * SELECT ... FOR UPDATE on raw materials, ascending id so concurrent
 * producers always lock in the same order
 */
export async function lockRawMaterialsKysely(
    trx: KyselyDB,
    rawMaterialIds: readonly string[]
): Promise<Map<string, MaterialStockLevel>> {
    const levels = new Map<string, MaterialStockLevel>();
    if (rawMaterialIds.length === 0) return levels;

    const rows = await trx
        .selectFrom('RawMaterial')
        .select(['id', 'stockQuantity', 'costPerUnit'])
        .where('id', 'in', [...rawMaterialIds])
        .orderBy('id', 'asc')
        .forUpdate()
        .execute();

    for (const row of rows) {
        levels.set(row.id, {
            rawMaterialId: row.id,
            stockQuantity: new Decimal(row.stockQuantity),
            costPerUnit: new Decimal(row.costPerUnit),
        });
    }
    return levels;
}

/**
 * Lock a variant row and return its stock, or null when it does not exist
 */
export async function lockVariantStockKysely(trx: KyselyDB, variantId: string): Promise<number | null> {
    const row = await trx
        .selectFrom('ProductVariant')
        .select(['stockQuantity'])
        .where('id', '=', variantId)
        .forUpdate()
        .executeTakeFirst();

    return row ? row.stockQuantity : null;
}

/**
 * Write each movement's quantityAfter to its entity and append the movement
 */
export async function applyStockMovementsKysely(
    trx: KyselyDB,
    movements: readonly NewStockMovement[]
): Promise<string[]> {
    const ids: string[] = [];

    for (const movement of movements) {
        if (movement.entityType === 'raw_material') {
            await trx
                .updateTable('RawMaterial')
                .set({ stockQuantity: movement.quantityAfter.toString(), updatedAt: sql<Date>`now()` })
                .where('id', '=', movement.entityId)
                .execute();
        } else {
            await trx
                .updateTable('ProductVariant')
                .set({ stockQuantity: movement.quantityAfter.toNumber(), updatedAt: sql<Date>`now()` })
                .where('id', '=', movement.entityId)
                .execute();
        }

        const row = await trx
            .insertInto('StockMovement')
            .values({
                entityType: movement.entityType,
                entityId: movement.entityId,
                movementType: movement.movementType,
                quantityChange: movement.quantityChange.toString(),
                quantityBefore: movement.quantityBefore.toString(),
                quantityAfter: movement.quantityAfter.toString(),
                referenceType: movement.referenceType,
                referenceId: movement.referenceId,
                unitCost: movement.unitCost?.toString() ?? null,
                notes: movement.notes,
                createdBy: movement.createdBy,
            })
            .returning('id')
            .executeTakeFirstOrThrow();

        ids.push(row.id);
    }

    return ids;
}
