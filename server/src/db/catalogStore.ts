/**
 * Kysely-backed CatalogStore
 */

import type {
    CatalogSnapshot,
    CatalogVariant,
    MaterialStockLevel,
    NewStockMovement,
    PlannedVariant,
} from '@tessera/shared';
import { TRANSACTION_CONFIG } from '../config/index.js';
import type {
    CatalogReader,
    CatalogStore,
    CatalogTransaction,
    CreatedVariant,
} from '../services/catalogStore.js';
import { getDb, type KyselyDB } from './index.js';
import {
    applyStockMovementsKysely,
    findVariantKysely,
    insertVariantsKysely,
    listProductVariantsKysely,
    loadCatalogSnapshotKysely,
    lockProductForRegenerationKysely,
    lockRawMaterialsKysely,
    lockVariantStockKysely,
    setLockTimeoutKysely,
    setVariantsActiveKysely,
} from './queries/index.js';

class KyselyCatalogReader implements CatalogReader {
    constructor(protected readonly db: KyselyDB) {}

    loadSnapshot(productId: string): Promise<CatalogSnapshot | null> {
        return loadCatalogSnapshotKysely(this.db, productId);
    }

    listVariants(productId: string): Promise<CatalogVariant[]> {
        return listProductVariantsKysely(this.db, productId);
    }

    findVariant(variantId: string): Promise<CatalogVariant | null> {
        return findVariantKysely(this.db, variantId);
    }
}

class KyselyCatalogTransaction extends KyselyCatalogReader implements CatalogTransaction {
    lockProductForRegeneration(productId: string): Promise<void> {
        return lockProductForRegenerationKysely(this.db, productId);
    }

    insertVariants(productId: string, planned: readonly PlannedVariant[]): Promise<CreatedVariant[]> {
        return insertVariantsKysely(this.db, productId, planned);
    }

    async setVariantsActive(variantIds: readonly string[], isActive: boolean): Promise<void> {
        await setVariantsActiveKysely(this.db, variantIds, isActive);
    }

    lockRawMaterials(rawMaterialIds: readonly string[]): Promise<Map<string, MaterialStockLevel>> {
        return lockRawMaterialsKysely(this.db, rawMaterialIds);
    }

    lockVariantStock(variantId: string): Promise<number | null> {
        return lockVariantStockKysely(this.db, variantId);
    }

    applyStockMovements(movements: readonly NewStockMovement[]): Promise<string[]> {
        return applyStockMovementsKysely(this.db, movements);
    }
}

export class KyselyCatalogStore extends KyselyCatalogReader implements CatalogStore {
    constructor(db: KyselyDB, private readonly lockTimeoutMs: number = TRANSACTION_CONFIG.lockTimeoutMs) {
        super(db);
    }

    transaction<T>(fn: (tx: CatalogTransaction) => Promise<T>): Promise<T> {
        return this.db.transaction().execute(async (trx) => {
            await setLockTimeoutKysely(trx, this.lockTimeoutMs);
            return fn(new KyselyCatalogTransaction(trx));
        });
    }
}

let defaultStore: KyselyCatalogStore | null = null;

/**
 * Store over the singleton pool
 */
export function getCatalogStore(): KyselyCatalogStore {
    defaultStore ??= new KyselyCatalogStore(getDb());
    return defaultStore;
}
