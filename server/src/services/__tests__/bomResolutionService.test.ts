/**
 * Tests for BOM resolution from the store and anomaly review
 */

import { AnomalyBuffer } from '../../utils/anomalyBuffer.js';
import { NotFoundError } from '../../utils/errors.js';
import { listBomAnomalies, resolveBomForVariant } from '../bomResolutionService.js';
import { InMemoryCatalogStore } from './fakes/inMemoryCatalogStore.js';
import { BLACK_VARIANT_ID, MISSING_ID, TAN_VARIANT_ID, wallet, walletVariants } from './fixtures/wallet.js';

describe('resolveBomForVariant', () => {
    it('resolves the BOM and its unit cost', async () => {
        const store = new InMemoryCatalogStore({ snapshot: wallet(), variants: walletVariants() });

        const { variant, resolution, cost } = await resolveBomForVariant(store, BLACK_VARIANT_ID);

        expect(variant.sku).toBe('WAL-BLA');
        expect(resolution.lines.map((l) => [l.rawMaterialId, l.quantity.toString()])).toEqual([
            ['leather', '0.25'],
            ['thread', '2'],
            ['dye_black', '1'],
        ]);
        expect(cost.total.toString()).toBe('4.1');
    });

    it('throws NotFoundError for an unknown variant', async () => {
        const store = new InMemoryCatalogStore({ snapshot: wallet(), variants: walletVariants() });

        await expect(resolveBomForVariant(store, MISSING_ID)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps clamped quantities for review', async () => {
        const store = new InMemoryCatalogStore({
            snapshot: wallet((input) => {
                input.optionModifiers = [
                    { id: 'om-1', optionId: 'opt-tan', rawMaterialId: 'thread', kind: 'multiply', factor: '-1' },
                ];
            }),
            variants: walletVariants(),
        });
        const anomalies = new AnomalyBuffer();

        await resolveBomForVariant(store, TAN_VARIANT_ID, { anomalies });
        await resolveBomForVariant(store, BLACK_VARIANT_ID, { anomalies });

        const listed = listBomAnomalies({ variantId: TAN_VARIANT_ID }, anomalies);
        expect(listed.total).toBe(1);
        expect(listed.anomalies[0]).toMatchObject({
            code: 'CATALOG_NEGATIVE_QUANTITY_CLAMPED',
            variantId: TAN_VARIANT_ID,
            rawMaterialId: 'thread',
            computedQuantity: '-2',
        });
        expect(listBomAnomalies({}, anomalies).total).toBe(1);
    });
});
