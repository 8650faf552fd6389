/**
 * Tests for CLI row builders
 */

import { fileURLToPath } from 'node:url';
import { computeProducibility, generateVariants, planBatchMaterials, resolveVariantBom } from '@tessera/shared';
import { findVariant, loadCatalogFile, loadStockFile, stockFor } from '../catalogFile.js';
import { columnWidths } from '../format.js';
import { batchRows, bomView, capacityRows, reportView, variantPlanRows } from '../views.js';

const file = loadCatalogFile(fileURLToPath(new URL('../../fixtures/leather-bag.json', import.meta.url)));
const restock = loadStockFile(fileURLToPath(new URL('../../fixtures/stock-restock.json', import.meta.url)));

describe('variantPlanRows', () => {
    it('keeps existing variants and creates the missing combination', () => {
        const plan = generateVariants(file.snapshot, file.variants);

        expect(variantPlanRows(file, plan)).toEqual([
            { Action: 'keep', SKU: 'BAG-BLA-MED', Options: 'Black / Medium' },
            { Action: 'keep', SKU: 'BAG-BLA-LAR', Options: 'Black / Large' },
            { Action: 'keep', SKU: 'BAG-BRO-MED', Options: 'Brown / Medium' },
            { Action: 'create', SKU: 'BAG-BRO-LAR', Options: 'Brown / Large' },
        ]);
    });
});

describe('bomView', () => {
    it('lists resolved materials with their cost', () => {
        const view = bomView(file, findVariant(file, 'BAG-BLA-LAR'));

        expect(view.rows.map((row) => row.Material)).toEqual([
            'Brass buckle',
            'Waxed thread',
            'Magnetic clasp',
            'Black leather',
            'Black dye',
            'Wide strap',
        ]);
        expect(view.rows[1]).toEqual({
            Material: 'Waxed thread',
            SKU: 'MAT-THREAD',
            Quantity: '3.9',
            Unit: 'm',
            'Unit cost': '0.10',
            'Line cost': '0.39',
            Layers: 'product → option_modifier',
        });
        expect(view.total).toBe('33.09');
        expect(view.anomalies).toEqual([]);
    });
});

describe('reportView', () => {
    it('prices, costs and sizes each active variant', () => {
        const view = reportView(file, stockFor(file));

        expect(view.errors).toEqual([]);
        expect(view.rows).toEqual([
            {
                SKU: 'BAG-BLA-MED',
                Price: '120.00',
                Weight: '800 g',
                'Unit cost': '27.00',
                Producible: '15',
                Limiting: 'black_dye',
            },
            {
                SKU: 'BAG-BLA-LAR',
                Price: '135.50',
                Weight: '950 g',
                'Unit cost': '33.09',
                Producible: '8',
                Limiting: 'wide_strap',
            },
            {
                SKU: 'BAG-BRO-MED',
                Price: '125.00',
                Weight: '820 g',
                'Unit cost': '23.00',
                Producible: '8',
                Limiting: 'brown_leather',
            },
        ]);
    });

    it('uses stock overrides', () => {
        const view = reportView(file, stockFor(file, restock));

        expect(view.rows[1]).toMatchObject({ SKU: 'BAG-BLA-LAR', Producible: '12', Limiting: 'black_dye' });
    });
});

describe('capacityRows', () => {
    it('lists each material capacity, scarcest first', () => {
        const bom = resolveVariantBom(file.snapshot, findVariant(file, 'BAG-BLA-LAR')).quantities;

        const rows = capacityRows(file, computeProducibility(bom, stockFor(file)));

        expect(rows[0]).toEqual({ Material: 'Wide strap', Required: '1', Available: '8', Units: 8 });
        expect(rows.map((row) => row.Units)).toEqual([8, 15, 20, 25, 30, 50]);
    });
});

describe('batchRows', () => {
    it('shows requirements and the shortfall', () => {
        const bom = resolveVariantBom(file.snapshot, findVariant(file, 'BAG-BLA-LAR')).quantities;
        const materials = new Map(file.snapshot.materials.map((m) => [m.id, m]));

        expect(batchRows(file, planBatchMaterials(bom, 10, materials))).toEqual([
            { Material: 'Black dye', Required: '10', Available: '15', Shortfall: '—', Cost: '30.00' },
            { Material: 'Black leather', Required: '5', Available: '10', Shortfall: '—', Cost: '200.00' },
            { Material: 'Brass buckle', Required: '10', Available: '50', Shortfall: '—', Cost: '25.00' },
            { Material: 'Magnetic clasp', Required: '10', Available: '30', Shortfall: '—', Cost: '12.00' },
            { Material: 'Waxed thread', Required: '39', Available: '100', Shortfall: '—', Cost: '3.90' },
            { Material: 'Wide strap', Required: '10', Available: '8', Shortfall: '2', Cost: '60.00' },
        ]);
    });
});

describe('columnWidths', () => {
    it('fits the header and the widest cell', () => {
        expect(columnWidths([{ SKU: 'BAG-BLA-LAR', Units: 8 }], ['SKU', 'Units'])).toEqual([11, 5]);
    });
});
