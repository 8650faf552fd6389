/**
 * Tests for producibility queries, the product report and batch planning
 */

import { CATALOG_ERROR_CODES } from '@tessera/shared';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import {
    getProductProducibilityReport,
    getVariantProducibility,
    planProductionBatch,
} from '../producibilityService.js';
import { InMemoryCatalogStore } from './fakes/inMemoryCatalogStore.js';
import {
    BLACK_VARIANT_ID,
    MISSING_ID,
    PRODUCT_ID,
    TAN_VARIANT_ID,
    wallet,
    walletVariants,
} from './fixtures/wallet.js';

function seededStore(): InMemoryCatalogStore {
    return new InMemoryCatalogStore({ snapshot: wallet(), variants: walletVariants() });
}

describe('getVariantProducibility', () => {
    it('is limited by the scarcest material', async () => {
        const result = await getVariantProducibility(seededStore(), BLACK_VARIANT_ID);

        expect(result.sku).toBe('WAL-BLA');
        expect(result.producibility).toMatchObject({ kind: 'limited', units: 3, limitingMaterials: ['dye_black'] });
    });

    it('throws NotFoundError for an unknown variant', async () => {
        await expect(getVariantProducibility(seededStore(), MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('getProductProducibilityReport', () => {
    it('prices, costs and sizes every active variant', async () => {
        const report = await getProductProducibilityReport(seededStore(), PRODUCT_ID);

        expect(report.productName).toBe('Card Wallet');
        expect(report.errors).toEqual([]);
        expect(
            report.rows.map((row) => [
                row.sku,
                row.pricing.price.display,
                row.cost.rounded.toFixed(2),
                row.producibility.kind === 'limited' ? row.producibility.units : 'unlimited',
            ])
        ).toEqual([
            ['WAL-BLA', '45.00', '4.10', 3],
            ['WAL-TAN', '47.00', '4.10', 0],
        ]);
    });

    it('lists active materials at or below their alert level', async () => {
        const report = await getProductProducibilityReport(seededStore(), PRODUCT_ID);

        expect(report.lowStockMaterials.map((m) => [m.sku, m.stockQuantity.toString()])).toEqual([
            ['MAT-DYE-BLK', '3'],
        ]);
    });

    it('skips inactive variants', async () => {
        const store = new InMemoryCatalogStore({
            snapshot: wallet(),
            variants: walletVariants().map((v) => (v.id === TAN_VARIANT_ID ? { ...v, isActive: false } : v)),
        });

        const report = await getProductProducibilityReport(store, PRODUCT_ID);

        expect(report.rows.map((row) => row.variantId)).toEqual([BLACK_VARIANT_ID]);
    });

    it('reports variants with a broken BOM and still covers the rest', async () => {
        const store = new InMemoryCatalogStore({
            snapshot: wallet((input) => {
                input.optionBom?.push({ id: 'ob-9', optionId: 'opt-tan', rawMaterialId: 'ghost', quantity: '1' });
            }),
            variants: walletVariants(),
        });

        const report = await getProductProducibilityReport(store, PRODUCT_ID);

        expect(report.rows.map((row) => row.sku)).toEqual(['WAL-BLA']);
        expect(report.errors).toEqual([
            {
                variantId: TAN_VARIANT_ID,
                sku: 'WAL-TAN',
                code: CATALOG_ERROR_CODES.MISSING_MATERIAL_REFERENCE,
                message: `Variant ${TAN_VARIANT_ID} references missing raw materials: ghost`,
            },
        ]);
    });

    it('throws NotFoundError for an unknown product', async () => {
        await expect(getProductProducibilityReport(seededStore(), MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('planProductionBatch', () => {
    it('computes shortfalls and cost for the planned units', async () => {
        const plan = await planProductionBatch(seededStore(), { variantId: BLACK_VARIANT_ID, plannedUnits: 5 });

        expect(plan.canProduce).toBe(false);
        expect(plan.totalCost.toString()).toBe('20.5');
        expect(plan.lines.map((l) => [l.rawMaterialId, l.requiredQuantity.toString(), l.shortfall.toString()])).toEqual([
            ['dye_black', '5', '2'],
            ['leather', '1.25', '0'],
            ['thread', '10', '0'],
        ]);
    });

    it('validates the request', async () => {
        await expect(
            planProductionBatch(seededStore(), { variantId: BLACK_VARIANT_ID, plannedUnits: -1 })
        ).rejects.toBeInstanceOf(ValidationError);
    });
});
