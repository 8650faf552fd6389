/**
 * Regenerate the variants of one product (or every product) from its
 * active attribute options.
 *
 * Run with: npx tsx scripts/regenerate-variants.ts <productId> [--dry-run]
 *           npx tsx scripts/regenerate-variants.ts --all [--dry-run]
 */

import { closeDb, getDb } from '../src/db/index.js';
import { getCatalogStore } from '../src/db/catalogStore.js';
import { isCatalogError } from '@tessera/shared';
import { regenerateVariants, type RegenerateVariantsResult } from '../src/services/variantGenerationService.js';
import { isCustomError } from '../src/utils/errors.js';
import logger from '../src/utils/logger.js';

const log = logger.child({ module: 'regenerate-variants' });

async function productIds(args: string[]): Promise<string[]> {
    if (!args.includes('--all')) {
        const id = args.find((arg) => !arg.startsWith('--'));
        if (!id) throw new Error('Usage: regenerate-variants.ts <productId> | --all [--dry-run]');
        return [id];
    }
    const rows = await getDb()
        .selectFrom('Product')
        .select('id')
        .where('isActive', '=', true)
        .orderBy('id', 'asc')
        .execute();
    return rows.map((row) => row.id);
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const dryRun = args.includes('--dry-run');
    const store = getCatalogStore();

    let failed = 0;

    for (const productId of await productIds(args)) {
        let result: RegenerateVariantsResult;
        try {
            result = await regenerateVariants(store, { productId, dryRun });
        } catch (error: unknown) {
            // Known catalog problems are reported per product; anything else aborts the run
            if (!isCatalogError(error) && !isCustomError(error)) throw error;
            failed++;
            log.error({ productId, err: error }, 'Product skipped');
            continue;
        }
        log.info({
            productId,
            dryRun,
            created: result.created.map((v) => v.sku),
            reactivated: result.reactivated.map((v) => v.sku),
            deactivated: result.deactivated.map((v) => v.sku),
            failures: result.failures.map((f) => f.baseSku),
        }, result.changed ? 'Regenerated' : 'No changes');
    }

    if (failed > 0) {
        process.exitCode = 1;
    }
}

main()
    .catch((error: unknown) => {
        log.error({ err: error }, 'Regeneration failed');
        process.exitCode = 1;
    })
    .finally(() => closeDb());
