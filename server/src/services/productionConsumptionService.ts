/**
 * Production Consumption Service
 *
 * Records a production run against raw-material stock. One transaction:
 *
 *   1. Load the variant and its product's catalog, resolve the BOM
 *   2. resolved quantity × units per material
 *   3. SELECT ... FOR UPDATE every affected raw material (ascending id)
 *   4. Refuse to overdraw; otherwise decrement stock and append one
 *      production_consume movement per material
 *   5. Optionally add the produced units to the variant (production_output)
 *
 * Serialization failures, deadlocks and lock timeouts re-run the whole
 * transaction with exponential backoff.
 */

import type { Logger } from 'pino';
import {
    ConsumeProductionMaterialsSchema,
    planConsumptionMovements,
    planMaterialConsumption,
    planOutputMovement,
    type ConsumeProductionMaterialsInput,
    type ConsumptionLine,
    type MovementReference,
} from '@tessera/shared';
import {
    ConflictError,
    InsufficientMaterialStockError,
    NotFoundError,
    ValidationError,
} from '../utils/errors.js';
import { productionLogger } from '../utils/logger.js';
import { withTransactionRetry, type RetryOptions } from '../utils/retry.js';
import type { AnomalyBuffer } from '../utils/anomalyBuffer.js';
import { resolveAndRecord } from './bomResolutionService.js';
import type { CatalogStore } from './catalogStore.js';

// ============================================
// TYPES
// ============================================

export interface ProductionOutput {
    stockBefore: number;
    stockAfter: number;
}

export interface ConsumeProductionMaterialsResult {
    variantId: string;
    sku: string;
    units: number;
    batchId: string | null;
    consumed: ConsumptionLine[];
    /** Ids of the appended stock movements, consumption first */
    movementIds: string[];
    output: ProductionOutput | null;
}

export interface ConsumeProductionMaterialsOptions {
    retry?: RetryOptions;
    anomalies?: AnomalyBuffer;
    logger?: Logger;
}

// ============================================
// MAIN FUNCTION
// ============================================

/**
 * Consume the raw materials of `units` finished units of a variant
 *
 * @throws ValidationError on malformed input
 * @throws NotFoundError when the variant or product is missing
 * @throws ConflictError when the variant is inactive
 * @throws InsufficientMaterialStockError when any material would go negative (nothing written)
 */
export async function consumeProductionMaterials(
    store: CatalogStore,
    input: ConsumeProductionMaterialsInput,
    options: ConsumeProductionMaterialsOptions = {}
): Promise<ConsumeProductionMaterialsResult> {
    const parsed = ConsumeProductionMaterialsSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid production request', parsed.error.issues);
    }
    const { variantId, units, batchId, recordOutput, createdBy, notes } = parsed.data;
    const log = options.logger ?? productionLogger;

    const reference: MovementReference = {
        referenceType: batchId ? 'production_batch' : 'production_run',
        referenceId: batchId ?? null,
        createdBy: createdBy ?? null,
        notes: notes ?? null,
    };

    const result = await withTransactionRetry(
        () => store.transaction(async (tx) => {
            const variant = await tx.findVariant(variantId);
            if (!variant) {
                throw new NotFoundError('Variant not found', 'ProductVariant', variantId);
            }
            if (!variant.isActive) {
                throw new ConflictError(`Variant ${variant.sku} is inactive`, 'inactive_variant');
            }

            const snapshot = await tx.loadSnapshot(variant.productId);
            if (!snapshot) {
                throw new NotFoundError('Product not found', 'Product', variant.productId);
            }

            const resolution = resolveAndRecord(snapshot, variant, options);
            const consumed = planMaterialConsumption(resolution.quantities, units);

            const levels = await tx.lockRawMaterials(consumed.map((line) => line.rawMaterialId));
            const plan = planConsumptionMovements(consumed, levels, reference);
            if (!plan.ok) {
                throw new InsufficientMaterialStockError(plan.shortages);
            }

            const movements = [...plan.movements];
            let output: ProductionOutput | null = null;

            if (recordOutput) {
                const stockBefore = await tx.lockVariantStock(variant.id);
                if (stockBefore === null) {
                    throw new NotFoundError('Variant not found', 'ProductVariant', variant.id);
                }
                movements.push(planOutputMovement(variant.id, units, stockBefore, reference));
                output = { stockBefore, stockAfter: stockBefore + units };
            }

            const movementIds = await tx.applyStockMovements(movements);

            return {
                variantId: variant.id,
                sku: variant.sku,
                units,
                batchId: batchId ?? null,
                consumed,
                movementIds,
                output,
            };
        }),
        { ...options.retry, context: `consume production materials ${variantId}` }
    );

    log.info({
        variantId,
        sku: result.sku,
        units,
        batchId: result.batchId,
        materials: result.consumed.length,
        output: result.output,
    }, 'Production materials consumed');

    return result;
}
