/**
 * BOM Resolution Service
 *
 * Resolves the effective Bill of Materials of a variant from persisted
 * catalog data through the four shared layers:
 *
 *   Product entries → Option additions → Option modifiers → Variant overrides
 *
 * Negative results are clamped by the resolver; each clamp is logged and
 * kept in the anomaly review buffer.
 */

import type { Logger } from 'pino';
import {
    computeBomCost,
    resolveVariantBom,
    type BomCost,
    type BomResolution,
    type CatalogIndex,
    type CatalogSnapshot,
    type CatalogVariant,
    type RawMaterial,
} from '@tessera/shared';
import anomalyBuffer, {
    type AnomalyBuffer,
    type GetAnomaliesOptions,
    type GetAnomaliesResponse,
} from '../utils/anomalyBuffer.js';
import { NotFoundError } from '../utils/errors.js';
import { bomLogger } from '../utils/logger.js';
import type { CatalogReader } from './catalogStore.js';

// ============================================
// TYPES
// ============================================

export interface VariantBom {
    variant: CatalogVariant;
    snapshot: CatalogSnapshot;
    resolution: BomResolution;
    /** Material cost of one unit */
    cost: BomCost;
}

export interface BomResolutionOptions {
    anomalies?: AnomalyBuffer;
    logger?: Logger;
}

// ============================================
// HELPERS
// ============================================

/**
 * Resolve against an already-loaded catalog and report clamped quantities
 */
export function resolveAndRecord(
    catalog: CatalogSnapshot | CatalogIndex,
    variant: CatalogVariant,
    options: BomResolutionOptions = {}
): BomResolution {
    const resolution = resolveVariantBom(catalog, variant);
    const buffer = options.anomalies ?? anomalyBuffer;
    const log = options.logger ?? bomLogger;

    for (const anomaly of resolution.anomalies) {
        buffer.record({ productId: variant.productId, variantId: variant.id, anomaly });
        log.warn({
            code: anomaly.code,
            productId: variant.productId,
            variantId: variant.id,
            rawMaterialId: anomaly.rawMaterialId,
            computedQuantity: anomaly.computedQuantity.toString(),
        }, 'Negative BOM quantity clamped to zero');
    }

    return resolution;
}

export function materialsById(snapshot: CatalogSnapshot): Map<string, RawMaterial> {
    return new Map(snapshot.materials.map((m) => [m.id, m]));
}

// ============================================
// MAIN RESOLUTION FUNCTION
// ============================================

/**
 * Resolve the effective BOM of one variant
 *
 * @throws NotFoundError when the variant or its product is missing
 * @throws CatalogError MISSING_MATERIAL_REFERENCE when a layer points at a deleted material
 */
export async function resolveBomForVariant(
    store: CatalogReader,
    variantId: string,
    options: BomResolutionOptions = {}
): Promise<VariantBom> {
    const variant = await store.findVariant(variantId);
    if (!variant) {
        throw new NotFoundError('Variant not found', 'ProductVariant', variantId);
    }

    const snapshot = await store.loadSnapshot(variant.productId);
    if (!snapshot) {
        throw new NotFoundError('Product not found', 'Product', variant.productId);
    }

    const resolution = resolveAndRecord(snapshot, variant, options);
    const cost = computeBomCost(resolution.quantities, materialsById(snapshot));

    (options.logger ?? bomLogger).debug({
        variantId,
        materials: resolution.lines.length,
        cost: cost.rounded.toFixed(2),
    }, 'BOM resolved');

    return { variant, snapshot, resolution, cost };
}

/**
 * Clamped quantities awaiting review, newest first
 */
export function listBomAnomalies(
    query: GetAnomaliesOptions = {},
    buffer: AnomalyBuffer = anomalyBuffer
): GetAnomaliesResponse {
    return buffer.getAnomalies(query);
}
