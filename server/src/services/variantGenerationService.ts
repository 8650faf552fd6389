/**
 * Variant Generation Service
 *
 * Loads a product's catalog, plans the variant set with the shared
 * generator, and applies the plan in one transaction:
 *
 *   lock product → load snapshot + variants → generateVariants → write
 *
 * Regeneration of one product is serialized twice: an in-process queue
 * (withProductLock) and pg_advisory_xact_lock inside the transaction. A
 * second run on an unchanged catalog writes nothing.
 */

import type { Logger } from 'pino';
import {
    RegenerateVariantsSchema,
    generateVariants,
    planHasChanges,
    type GenerateVariantsOptions,
    type RegenerateVariantsInput,
    type VariantGenerationFailure,
    type VariantRef,
} from '@tessera/shared';
import { VARIANT_GENERATION_CONFIG } from '../config/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { variantLogger } from '../utils/logger.js';
import { withProductLock } from '../utils/productLock.js';
import { withTransactionRetry, type RetryOptions } from '../utils/retry.js';
import type { CatalogStore, CreatedVariant } from './catalogStore.js';

// ============================================
// TYPES
// ============================================

export interface RegenerateVariantsResult {
    productId: string;
    dryRun: boolean;
    /** Size of the target set (active variants after the run) */
    targetCount: number;
    /** Ids are empty strings in a dry run */
    created: CreatedVariant[];
    reactivated: VariantRef[];
    deactivated: VariantRef[];
    unchangedCount: number;
    failures: VariantGenerationFailure[];
    /** False when the run wrote nothing */
    changed: boolean;
}

export interface RegenerateVariantsOptions {
    generation?: GenerateVariantsOptions;
    retry?: RetryOptions;
    logger?: Logger;
}

// ============================================
// MAIN FUNCTION
// ============================================

/**
 * Regenerate the variants of a product from its active attribute options
 *
 * @throws ValidationError on malformed input
 * @throws NotFoundError when the product does not exist
 * @throws CatalogError NO_ACTIVE_OPTIONS / DUPLICATE_ATTRIBUTE_POSITION (nothing written)
 */
export async function regenerateVariants(
    store: CatalogStore,
    input: RegenerateVariantsInput,
    options: RegenerateVariantsOptions = {}
): Promise<RegenerateVariantsResult> {
    const parsed = RegenerateVariantsSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid variant regeneration request', parsed.error.issues);
    }
    const { productId, dryRun } = parsed.data;
    const generation = { ...VARIANT_GENERATION_CONFIG, ...options.generation };
    const log = options.logger ?? variantLogger;

    return withProductLock(productId, 'regenerate', () =>
        withTransactionRetry(
            () => store.transaction(async (tx) => {
                await tx.lockProductForRegeneration(productId);

                const snapshot = await tx.loadSnapshot(productId);
                if (!snapshot) {
                    throw new NotFoundError('Product not found', 'Product', productId);
                }
                const existing = await tx.listVariants(productId);

                const plan = generateVariants(snapshot, existing, generation);

                for (const failure of plan.failures) {
                    log.warn({ productId, key: failure.key, baseSku: failure.baseSku }, failure.message);
                }

                const changed = !dryRun && planHasChanges(plan);
                let created: CreatedVariant[] = plan.created.map((v) => ({ id: '', sku: v.sku, key: v.key }));

                if (changed) {
                    created = await tx.insertVariants(productId, plan.created);
                    await tx.setVariantsActive(plan.reactivated.map((v) => v.id), true);
                    await tx.setVariantsActive(plan.deactivated.map((v) => v.id), false);
                }

                log.info({
                    productId,
                    dryRun,
                    target: plan.target.length,
                    created: plan.created.length,
                    reactivated: plan.reactivated.length,
                    deactivated: plan.deactivated.length,
                    failures: plan.failures.length,
                }, changed ? 'Variants regenerated' : 'Variants unchanged');

                return {
                    productId,
                    dryRun,
                    targetCount: plan.target.length - plan.failures.length,
                    created,
                    reactivated: plan.reactivated,
                    deactivated: plan.deactivated,
                    unchangedCount: plan.unchanged.length,
                    failures: plan.failures,
                    changed,
                };
            }),
            { ...options.retry, context: `regenerate variants ${productId}` }
        )
    );
}
