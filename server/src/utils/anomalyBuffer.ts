import { randomUUID } from 'node:crypto';
import type { BomAnomaly } from '@tessera/shared';

/** A clamped BOM quantity, as kept for admin review */
export interface AnomalyEntry {
    id: string;
    timestamp: string;
    timestampMs: number;
    code: BomAnomaly['code'];
    productId: string;
    variantId: string;
    rawMaterialId: string;
    /** Quantity the BOM layers produced before clamping, as a decimal string */
    computedQuantity: string;
}

export interface RecordAnomalyInput {
    productId: string;
    variantId: string;
    anomaly: BomAnomaly;
}

/** Options for getAnomalies */
export interface GetAnomaliesOptions {
    productId?: string | null;
    variantId?: string | null;
    limit?: number;
    offset?: number;
}

export interface GetAnomaliesResponse {
    anomalies: AnomalyEntry[];
    total: number;
    limit: number;
    offset: number;
}

export interface AnomalyStats {
    total: number;
    maxSize: number;
    retentionHours: number;
    /** Distinct variants with at least one retained anomaly */
    variants: number;
    oldest: string | undefined;
    newest: string | undefined;
}

/**
 * In-memory review buffer for BOM anomalies
 *
 * Bounded ring: the oldest entry is dropped once maxSize is reached, and
 * entries older than the retention window are dropped on read.
 */
export class AnomalyBuffer {
    private readonly maxSize: number;
    private readonly retentionMs: number;
    private entries: AnomalyEntry[] = [];

    constructor(maxSize: number = 5000, retentionMs: number = 24 * 60 * 60 * 1000) {
        this.maxSize = maxSize;
        this.retentionMs = retentionMs;
    }

    record({ productId, variantId, anomaly }: RecordAnomalyInput, now: number = Date.now()): AnomalyEntry {
        const entry: AnomalyEntry = {
            id: randomUUID(),
            timestamp: new Date(now).toISOString(),
            timestampMs: now,
            code: anomaly.code,
            productId,
            variantId,
            rawMaterialId: anomaly.rawMaterialId,
            computedQuantity: anomaly.computedQuantity.toString(),
        };

        this.entries.push(entry);
        if (this.entries.length > this.maxSize) {
            this.entries.shift();
        }
        return entry;
    }

    /**
     * Newest first, optionally narrowed to one product or variant
     */
    getAnomalies(
        { productId = null, variantId = null, limit = 100, offset = 0 }: GetAnomaliesOptions = {},
        now: number = Date.now()
    ): GetAnomaliesResponse {
        const cutoffTime = now - this.retentionMs;
        let filtered = this.entries.filter(entry => entry.timestampMs > cutoffTime);

        if (productId) {
            filtered = filtered.filter(entry => entry.productId === productId);
        }
        if (variantId) {
            filtered = filtered.filter(entry => entry.variantId === variantId);
        }

        filtered.reverse();

        return {
            anomalies: filtered.slice(offset, offset + limit),
            total: filtered.length,
            limit,
            offset,
        };
    }

    getStats(now: number = Date.now()): AnomalyStats {
        const cutoffTime = now - this.retentionMs;
        const retained = this.entries.filter(entry => entry.timestampMs > cutoffTime);

        return {
            total: retained.length,
            maxSize: this.maxSize,
            retentionHours: this.retentionMs / (60 * 60 * 1000),
            variants: new Set(retained.map(entry => entry.variantId)).size,
            oldest: retained[0]?.timestamp,
            newest: retained[retained.length - 1]?.timestamp,
        };
    }

    clear(): void {
        this.entries = [];
    }
}

const anomalyBuffer = new AnomalyBuffer();

export default anomalyBuffer;
