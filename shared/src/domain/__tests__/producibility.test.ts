/**
 * Unit tests for the producibility calculator
 */

import { Decimal } from '../decimal.js';
import { resolveVariantBom } from '../bom/resolver.js';
import { computeProducibility, formatProducibility, isUnlimited, UNLIMITED } from '../bom/producibility.js';
import { bagVariant, leatherBag } from './fixtures/leatherBag.js';

function quantities(record: Record<string, string>): Map<string, Decimal> {
    return new Map(Object.entries(record).map(([id, value]) => [id, new Decimal(value)]));
}

describe('computeProducibility', () => {
    it('is limited by the wide strap for the black / large bag', () => {
        const snapshot = leatherBag();
        const bom = resolveVariantBom(snapshot, bagVariant('v-bl', 'opt-black', 'opt-large')).quantities;
        const stock = new Map(snapshot.materials.map((m) => [m.id, m.stockQuantity]));

        const result = computeProducibility(bom, stock);

        expect(result.kind).toBe('limited');
        if (result.kind !== 'limited') return;
        expect(result.units).toBe(8);
        expect(result.limitingMaterials).toEqual(['wide_strap']);
        expect(result.capacities.map((c) => [c.rawMaterialId, c.possibleUnits])).toEqual([
            ['wide_strap', 8],
            ['black_dye', 15],
            ['black_leather', 20],
            ['thread', 25],
            ['magnetic_clasp', 30],
            ['brass_buckle', 50],
        ]);
    });

    it('reports every material tied at the minimum, sorted by id', () => {
        const result = computeProducibility(quantities({ zip: '1', cord: '2', bead: '1' }), quantities({ zip: '3', cord: '6', bead: '9' }));

        expect(result).toMatchObject({ kind: 'limited', units: 3, limitingMaterials: ['cord', 'zip'] });
    });

    it('floors fractional capacities', () => {
        expect(computeProducibility(quantities({ thread: '3.9' }), quantities({ thread: '7.8' }))).toMatchObject({ units: 2 });
        expect(computeProducibility(quantities({ thread: '3.9' }), quantities({ thread: '7.79' }))).toMatchObject({ units: 1 });
    });

    it('ignores materials with a zero requirement', () => {
        const result = computeProducibility(quantities({ cord: '0', zip: '1' }), quantities({ zip: '4' }));

        expect(result).toMatchObject({ kind: 'limited', units: 4, limitingMaterials: ['zip'] });
    });

    it('treats missing and negative stock as zero', () => {
        expect(computeProducibility(quantities({ zip: '1' }), new Map())).toMatchObject({ units: 0 });
        expect(computeProducibility(quantities({ zip: '1' }), quantities({ zip: '-3' }))).toMatchObject({ units: 0 });
    });

    it('is unlimited when nothing constrains production', () => {
        expect(computeProducibility(new Map(), new Map())).toEqual(UNLIMITED);
        expect(computeProducibility(quantities({ zip: '0' }), new Map())).toEqual(UNLIMITED);
        expect(isUnlimited(computeProducibility(new Map(), new Map()))).toBe(true);
    });

    it('never decreases when stock increases', () => {
        const bom = quantities({ zip: '2', cord: '0.5' });
        let previous = -1;

        for (const zipStock of ['0', '1', '2', '5', '9', '40']) {
            const result = computeProducibility(bom, quantities({ zip: zipStock, cord: '10' }));
            if (result.kind !== 'limited') throw new Error('expected a limited result');
            expect(result.units).toBeGreaterThanOrEqual(previous);
            previous = result.units;
        }

        expect(previous).toBe(20);
    });
});

describe('formatProducibility', () => {
    it('renders unlimited as a word and limits as a number', () => {
        expect(formatProducibility(UNLIMITED)).toBe('unlimited');
        expect(formatProducibility(computeProducibility(quantities({ zip: '1' }), quantities({ zip: '12' })))).toBe('12');
    });
});
