/**
 * Catalog persistence seam
 *
 * Services depend on these interfaces, not on Kysely, so they can run
 * against the database store (db/catalogStore.ts) or an in-memory store.
 */

import type {
    CatalogSnapshot,
    CatalogVariant,
    MaterialStockLevel,
    NewStockMovement,
    PlannedVariant,
} from '@tessera/shared';

export interface CreatedVariant {
    id: string;
    sku: string;
    /** Option-set key of the plan entry it came from */
    key: string;
}

export interface CatalogReader {
    loadSnapshot(productId: string): Promise<CatalogSnapshot | null>;
    /** Active and inactive variants of a product */
    listVariants(productId: string): Promise<CatalogVariant[]>;
    findVariant(variantId: string): Promise<CatalogVariant | null>;
}

/**
 * Operations that only make sense inside a transaction
 */
export interface CatalogTransaction extends CatalogReader {
    /** Cross-instance lock held until the transaction ends */
    lockProductForRegeneration(productId: string): Promise<void>;
    insertVariants(productId: string, planned: readonly PlannedVariant[]): Promise<CreatedVariant[]>;
    setVariantsActive(variantIds: readonly string[], isActive: boolean): Promise<void>;
    /** Row-lock raw materials in ascending id order; missing ids are absent from the map */
    lockRawMaterials(rawMaterialIds: readonly string[]): Promise<Map<string, MaterialStockLevel>>;
    /** Row-lock a variant; null when it does not exist */
    lockVariantStock(variantId: string): Promise<number | null>;
    /** Persist quantityAfter on each entity and append the movements; returns movement ids */
    applyStockMovements(movements: readonly NewStockMovement[]): Promise<string[]>;
}

export interface CatalogStore extends CatalogReader {
    /** Commit when `fn` resolves, roll back when it throws */
    transaction<T>(fn: (tx: CatalogTransaction) => Promise<T>): Promise<T>;
}
