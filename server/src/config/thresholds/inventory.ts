/**
 * Inventory Thresholds Configuration
 *
 * Raw-material alert levels used by the producibility report. Each material
 * carries its own lowStockThreshold; this module decides how it is applied.
 */

import type { RawMaterial } from '@tessera/shared';

// ============================================
// STOCK ALERT THRESHOLDS
// ============================================

/**
 * Inactive materials are never flagged for reorder
 */
export const LOW_STOCK_ALERT_ACTIVE_ONLY = true;

// ============================================
// HELPER FUNCTIONS
// ============================================

/**
 * Stock at or below the material's alert level (a threshold of 0 flags
 * only an empty or negative stock)
 */
export function isBelowLowStockThreshold(
    material: Pick<RawMaterial, 'stockQuantity' | 'lowStockThreshold' | 'isActive'>
): boolean {
    if (LOW_STOCK_ALERT_ACTIVE_ONLY && !material.isActive) return false;
    return material.stockQuantity.lessThanOrEqualTo(material.lowStockThreshold);
}
