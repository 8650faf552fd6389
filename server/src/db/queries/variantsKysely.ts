/**
 * Kysely Variant Writes
 *
 * Applies a variant generation plan. Variants are never deleted here:
 * stale combinations are deactivated so their stock and history survive.
 */

import { sql } from 'kysely';
import type { PlannedVariant } from '@tessera/shared';
import type { KyselyDB } from '../index.js';

export interface CreatedVariantRow {
    id: string;
    sku: string;
    key: string;
}

/**
 * Serialize regeneration of one product across instances.
 * Held until the enclosing transaction ends.
 */
export async function lockProductForRegenerationKysely(trx: KyselyDB, productId: string): Promise<void> {
    await sql`SELECT pg_advisory_xact_lock(hashtext(${`variants:${productId}`}))`.execute(trx);
}

/**
 * Insert new variants (stock 0, no price or weight override) with their option values
 */
export async function insertVariantsKysely(
    trx: KyselyDB,
    productId: string,
    planned: readonly PlannedVariant[]
): Promise<CreatedVariantRow[]> {
    const created: CreatedVariantRow[] = [];

    for (const variant of planned) {
        const row = await trx
            .insertInto('ProductVariant')
            .values({
                productId,
                sku: variant.sku,
                price: null,
                weightGrams: null,
                stockQuantity: 0,
                isActive: true,
                position: variant.position,
            })
            .returning(['id', 'sku'])
            .executeTakeFirstOrThrow();

        if (variant.selections.length > 0) {
            await trx
                .insertInto('VariantOptionValue')
                .values(variant.selections.map((s) => ({
                    variantId: row.id,
                    attributeId: s.attributeId,
                    optionId: s.optionId,
                })))
                .execute();
        }

        created.push({ id: row.id, sku: row.sku, key: variant.key });
    }

    return created;
}

export async function setVariantsActiveKysely(
    trx: KyselyDB,
    variantIds: readonly string[],
    isActive: boolean
): Promise<number> {
    if (variantIds.length === 0) return 0;

    const result = await trx
        .updateTable('ProductVariant')
        .set({ isActive, updatedAt: sql<Date>`now()` })
        .where('id', 'in', [...variantIds])
        .executeTakeFirst();

    return Number(result.numUpdatedRows);
}
