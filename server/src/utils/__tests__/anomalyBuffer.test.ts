/**
 * Unit tests for the BOM anomaly review buffer
 */

import { CATALOG_ANOMALY_CODES, Decimal } from '@tessera/shared';
import { AnomalyBuffer } from '../anomalyBuffer.js';

const HOUR = 60 * 60 * 1000;
const T0 = Date.UTC(2026, 0, 1);

function clamp(rawMaterialId: string, quantity: string) {
    return {
        code: CATALOG_ANOMALY_CODES.NEGATIVE_QUANTITY_CLAMPED,
        rawMaterialId,
        computedQuantity: new Decimal(quantity),
    };
}

describe('AnomalyBuffer', () => {
    it('returns entries newest first', () => {
        const buffer = new AnomalyBuffer();
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('thread', '-1') }, T0);
        buffer.record({ productId: 'p1', variantId: 'v2', anomaly: clamp('strap', '-0.5') }, T0 + 1000);

        const { anomalies, total } = buffer.getAnomalies({}, T0 + 2000);

        expect(total).toBe(2);
        expect(anomalies.map((a) => [a.variantId, a.rawMaterialId, a.computedQuantity])).toEqual([
            ['v2', 'strap', '-0.5'],
            ['v1', 'thread', '-1'],
        ]);
        expect(anomalies[1]?.timestamp).toBe('2026-01-01T00:00:00.000Z');
    });

    it('filters by product and variant and paginates', () => {
        const buffer = new AnomalyBuffer();
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('a', '-1') }, T0);
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('b', '-1') }, T0 + 1);
        buffer.record({ productId: 'p2', variantId: 'v9', anomaly: clamp('c', '-1') }, T0 + 2);

        expect(buffer.getAnomalies({ productId: 'p2' }, T0 + 10).anomalies.map((a) => a.rawMaterialId)).toEqual(['c']);

        const page = buffer.getAnomalies({ variantId: 'v1', limit: 1, offset: 1 }, T0 + 10);
        expect(page.total).toBe(2);
        expect(page.anomalies.map((a) => a.rawMaterialId)).toEqual(['a']);
    });

    it('drops the oldest entry beyond maxSize', () => {
        const buffer = new AnomalyBuffer(2);
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('a', '-1') }, T0);
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('b', '-1') }, T0 + 1);
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('c', '-1') }, T0 + 2);

        expect(buffer.getAnomalies({}, T0 + 10).anomalies.map((a) => a.rawMaterialId)).toEqual(['c', 'b']);
    });

    it('hides entries older than the retention window', () => {
        const buffer = new AnomalyBuffer(100, HOUR);
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('old', '-1') }, T0);
        buffer.record({ productId: 'p1', variantId: 'v2', anomaly: clamp('new', '-1') }, T0 + HOUR);

        const stats = buffer.getStats(T0 + HOUR + 1);

        expect(buffer.getAnomalies({}, T0 + HOUR + 1).anomalies.map((a) => a.rawMaterialId)).toEqual(['new']);
        expect(stats).toEqual({
            total: 1,
            maxSize: 100,
            retentionHours: 1,
            variants: 1,
            oldest: new Date(T0 + HOUR).toISOString(),
            newest: new Date(T0 + HOUR).toISOString(),
        });
    });

    it('empties on clear', () => {
        const buffer = new AnomalyBuffer();
        buffer.record({ productId: 'p1', variantId: 'v1', anomaly: clamp('a', '-1') }, T0);

        buffer.clear();

        expect(buffer.getStats(T0).total).toBe(0);
    });
});
