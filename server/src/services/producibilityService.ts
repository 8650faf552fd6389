/**
 * Producibility Service
 *
 * How many units of a variant current raw-material stock allows, per
 * variant or as a product-wide report, plus batch material planning.
 *
 * Stock levels come from the same snapshot as the BOM, so a report is
 * consistent with itself but may be stale by the time production runs.
 * Production consumption re-checks stock under row locks.
 */

import type { Logger } from 'pino';
import {
    CatalogError,
    PlanProductionBatchSchema,
    computeBomCost,
    computeProducibility,
    indexCatalog,
    planBatchMaterials,
    resolveVariantPricing,
    type BatchMaterialPlan,
    type BomCost,
    type CatalogErrorCode,
    type CatalogSnapshot,
    type Decimal,
    type PlanProductionBatchInput,
    type Producibility,
    type RawMaterial,
    type ResolvedBomLine,
    type VariantPricing,
} from '@tessera/shared';
import { isBelowLowStockThreshold } from '../config/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { inventoryLogger } from '../utils/logger.js';
import type { AnomalyBuffer } from '../utils/anomalyBuffer.js';
import { materialsById, resolveAndRecord, resolveBomForVariant } from './bomResolutionService.js';
import type { CatalogReader } from './catalogStore.js';

// ============================================
// TYPES
// ============================================

export interface ProducibilityOptions {
    anomalies?: AnomalyBuffer;
    logger?: Logger;
}

export interface VariantProducibility {
    variantId: string;
    sku: string;
    producibility: Producibility;
}

export interface ProducibilityReportRow {
    variantId: string;
    sku: string;
    position: number;
    pricing: VariantPricing;
    bom: ResolvedBomLine[];
    cost: BomCost;
    producibility: Producibility;
}

export interface ProducibilityReportError {
    variantId: string;
    sku: string;
    code: CatalogErrorCode;
    message: string;
}

export interface LowStockMaterial {
    rawMaterialId: string;
    sku: string;
    name: string;
    stockQuantity: Decimal;
    lowStockThreshold: Decimal;
}

export interface ProducibilityReport {
    productId: string;
    productName: string;
    rows: ProducibilityReportRow[];
    /** Variants whose BOM could not be resolved; the report still covers the rest */
    errors: ProducibilityReportError[];
    /** Referenced materials at or below their alert level, by sku */
    lowStockMaterials: LowStockMaterial[];
}

// ============================================
// HELPERS
// ============================================

export function stockLevels(materials: readonly RawMaterial[]): Map<string, Decimal> {
    return new Map(materials.map((m) => [m.id, m.stockQuantity]));
}

function lowStockMaterials(snapshot: CatalogSnapshot): LowStockMaterial[] {
    return snapshot.materials
        .filter(isBelowLowStockThreshold)
        .map((m) => ({
            rawMaterialId: m.id,
            sku: m.sku,
            name: m.name,
            stockQuantity: m.stockQuantity,
            lowStockThreshold: m.lowStockThreshold,
        }))
        .sort((a, b) => (a.sku < b.sku ? -1 : a.sku > b.sku ? 1 : 0));
}

// ============================================
// QUERIES
// ============================================

/**
 * Producible units of one variant from current stock
 */
export async function getVariantProducibility(
    store: CatalogReader,
    variantId: string,
    options: ProducibilityOptions = {}
): Promise<VariantProducibility> {
    const { variant, snapshot, resolution } = await resolveBomForVariant(store, variantId, options);
    return {
        variantId: variant.id,
        sku: variant.sku,
        producibility: computeProducibility(resolution.quantities, stockLevels(snapshot.materials)),
    };
}

/**
 * Price, BOM, cost and producibility of every active variant of a product
 */
export async function getProductProducibilityReport(
    store: CatalogReader,
    productId: string,
    options: ProducibilityOptions = {}
): Promise<ProducibilityReport> {
    const snapshot = await store.loadSnapshot(productId);
    if (!snapshot) {
        throw new NotFoundError('Product not found', 'Product', productId);
    }
    const variants = (await store.listVariants(productId)).filter((v) => v.isActive);

    const index = indexCatalog(snapshot);
    const stock = stockLevels(snapshot.materials);
    const materials = materialsById(snapshot);
    const rows: ProducibilityReportRow[] = [];
    const errors: ProducibilityReportError[] = [];

    for (const variant of variants) {
        try {
            const resolution = resolveAndRecord(index, variant, options);
            rows.push({
                variantId: variant.id,
                sku: variant.sku,
                position: variant.position,
                pricing: resolveVariantPricing(variant, index),
                bom: resolution.lines,
                cost: computeBomCost(resolution.quantities, materials),
                producibility: computeProducibility(resolution.quantities, stock),
            });
        } catch (error: unknown) {
            if (!(error instanceof CatalogError)) throw error;
            errors.push({ variantId: variant.id, sku: variant.sku, code: error.code, message: error.message });
        }
    }

    const report: ProducibilityReport = {
        productId,
        productName: snapshot.product.name,
        rows,
        errors,
        lowStockMaterials: lowStockMaterials(snapshot),
    };

    (options.logger ?? inventoryLogger).info({
        productId,
        variants: rows.length,
        errors: errors.length,
        lowStock: report.lowStockMaterials.length,
    }, 'Producibility report built');

    return report;
}

/**
 * Materials, shortfalls and cost of a planned production batch
 */
export async function planProductionBatch(
    store: CatalogReader,
    input: PlanProductionBatchInput,
    options: ProducibilityOptions = {}
): Promise<BatchMaterialPlan> {
    const parsed = PlanProductionBatchSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid batch plan request', parsed.error.issues);
    }

    const { snapshot, resolution } = await resolveBomForVariant(store, parsed.data.variantId, options);
    return planBatchMaterials(resolution.quantities, parsed.data.plannedUnits, materialsById(snapshot));
}
