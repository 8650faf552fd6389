/**
 * Unit tests for consumption planning, BOM costing and batch planning
 */

import { CATALOG_ERROR_CODES } from '../../errors/catalog.js';
import { computeBomCost, planBatchMaterials, planMaterialConsumption } from '../bom/consumption.js';
import { resolveVariantBom } from '../bom/resolver.js';
import { Decimal } from '../decimal.js';
import { bagVariant, catchError, leatherBag } from './fixtures/leatherBag.js';

const snapshot = leatherBag();
const bom = resolveVariantBom(snapshot, bagVariant('v-bl', 'opt-black', 'opt-large')).quantities;
const materials = new Map(snapshot.materials.map((m) => [m.id, m]));

describe('planMaterialConsumption', () => {
    it('multiplies each per-unit quantity by the units produced, sorted by material id', () => {
        const lines = planMaterialConsumption(bom, 3);

        expect(lines.map((l) => [l.rawMaterialId, l.total.toString()])).toEqual([
            ['black_dye', '3'],
            ['black_leather', '1.5'],
            ['brass_buckle', '3'],
            ['magnetic_clasp', '3'],
            ['thread', '11.7'],
            ['wide_strap', '3'],
        ]);
    });

    it('leaves out materials with a zero requirement', () => {
        const lines = planMaterialConsumption(new Map([['zip', new Decimal(0)], ['cord', new Decimal('0.5')]]), 2);

        expect(lines.map((l) => l.rawMaterialId)).toEqual(['cord']);
    });

    it('rounds each total half-up to four decimal places', () => {
        const precise = resolveVariantBom(
            leatherBag((input) => {
                input.optionModifiers = [
                    { id: 'om-1', optionId: 'opt-large', rawMaterialId: 'thread', kind: 'multiply', factor: '1.33335' },
                ];
            }),
            bagVariant('v-bl', 'opt-black', 'opt-large')
        ).quantities;

        const thread = (units: number) => planMaterialConsumption(precise, units).find((l) => l.rawMaterialId === 'thread');

        expect(thread(1)?.perUnit.toString()).toBe('4.00005');
        expect(thread(1)?.total.toString()).toBe('4.0001');
        expect(thread(3)?.total.toString()).toBe('12.0002');
    });

    it('drops a requirement that rounds to zero', () => {
        const tiny = new Map([['glue', new Decimal('0.00002')]]);

        expect(planMaterialConsumption(tiny, 1)).toEqual([]);
        expect(planMaterialConsumption(tiny, 3).map((l) => l.total.toString())).toEqual(['0.0001']);
    });

    it.each([0, -1, 1.5])('rejects %s units', (units) => {
        expect(catchError(() => planMaterialConsumption(bom, units))).toMatchObject({
            code: CATALOG_ERROR_CODES.INVALID_UNITS,
        });
    });
});

describe('computeBomCost', () => {
    it('sums quantity times cost per unit', () => {
        const cost = computeBomCost(bom, materials);

        expect(cost.total.toString()).toBe('33.09');
        expect(cost.rounded.toFixed(2)).toBe('33.09');
        expect(cost.uncostedMaterialIds).toEqual([]);
        expect(cost.lines.find((l) => l.rawMaterialId === 'thread')?.lineCost?.toString()).toBe('0.39');
    });

    it('reports materials without a known cost', () => {
        const partial = new Map([...materials].filter(([id]) => id !== 'wide_strap' && id !== 'black_dye'));

        const cost = computeBomCost(bom, partial);

        expect(cost.total.toString()).toBe('24.09');
        expect(cost.uncostedMaterialIds).toEqual(['black_dye', 'wide_strap']);
    });
});

describe('planBatchMaterials', () => {
    it('computes requirements, shortfalls and batch cost', () => {
        const plan = planBatchMaterials(bom, 10, materials);
        const strap = plan.lines.find((l) => l.rawMaterialId === 'wide_strap');

        expect(plan.canProduce).toBe(false);
        expect(plan.totalCost.toString()).toBe('330.9');
        expect(strap?.requiredQuantity.toString()).toBe('10');
        expect(strap?.availableQuantity.toString()).toBe('8');
        expect(strap?.shortfall.toString()).toBe('2');
        expect(plan.lines.filter((l) => !l.shortfall.isZero()).map((l) => l.rawMaterialId)).toEqual(['wide_strap']);
    });

    it('can produce a batch that stock covers exactly', () => {
        const plan = planBatchMaterials(bom, 8, materials);

        expect(plan.canProduce).toBe(true);
        expect(plan.plannedUnits).toBe(8);
    });
});
