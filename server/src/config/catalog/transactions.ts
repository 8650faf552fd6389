/**
 * Transaction Configuration
 *
 * Retry and lock settings shared by every transactional catalog write
 * (variant regeneration, production consumption).
 */

import { env } from '../env.js';

export interface TransactionConfig {
    /** Attempts after the first one */
    maxRetries: number;
    /** Backoff is baseDelayMs × 2^(attempt - 1) */
    baseDelayMs: number;
    /** Applied with SET LOCAL lock_timeout */
    lockTimeoutMs: number;
}

export const TRANSACTION_CONFIG: TransactionConfig = {
    maxRetries: env.DB_TX_MAX_RETRIES,
    baseDelayMs: env.DB_TX_RETRY_BASE_DELAY_MS,
    lockTimeoutMs: env.DB_LOCK_TIMEOUT_MS,
};

/**
 * PostgreSQL error codes that mean "try the whole transaction again":
 * serialization_failure, deadlock_detected, lock_not_available
 */
export const RETRYABLE_PG_CODES: ReadonlySet<string> = new Set(['40001', '40P01', '55P03']);
