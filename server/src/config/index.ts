/**
 * Centralized Configuration System
 *
 * Single source of truth for runtime configuration.
 *
 * STRUCTURE:
 * - /env.ts     - Validated environment variables
 * - /catalog    - Variant generation and transaction settings
 * - /thresholds - Inventory alert levels
 */

export { env, isTest, type Env } from './env.js';

// ============================================
// CATALOG
// ============================================

export {
    VARIANT_GENERATION_CONFIG,
    TRANSACTION_CONFIG,
    RETRYABLE_PG_CODES,
    type TransactionConfig,
} from './catalog/index.js';

// ============================================
// THRESHOLDS
// ============================================

export {
    LOW_STOCK_ALERT_ACTIVE_ONLY,
    isBelowLowStockThreshold,
} from './thresholds/index.js';
