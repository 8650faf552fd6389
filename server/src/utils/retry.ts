/**
 * Transaction retry with exponential backoff
 *
 * Only persistence conflicts are retried (serialization failure, deadlock,
 * lock timeout). Domain errors are deterministic and rethrown at once; a
 * conflict that outlasts the retries surfaces as a DatabaseError.
 */

import type { Logger } from 'pino';
import { RETRYABLE_PG_CODES, TRANSACTION_CONFIG } from '../config/index.js';
import { DatabaseError, getPgErrorCode } from './errors.js';
import { dbLogger } from './logger.js';

export interface RetryOptions {
    maxRetries?: number;
    baseDelayMs?: number;
    /** Label for log lines */
    context?: string;
    logger?: Logger;
    /** Injected in tests */
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));

export function isRetryableDbError(error: unknown): boolean {
    const code = getPgErrorCode(error);
    return code !== null && RETRYABLE_PG_CODES.has(code);
}

/**
 * Run `fn`, re-running it after a retryable database error.
 * `fn` must open its own transaction so each attempt starts clean.
 */
export async function withTransactionRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const {
        maxRetries = TRANSACTION_CONFIG.maxRetries,
        baseDelayMs = TRANSACTION_CONFIG.baseDelayMs,
        context = 'transaction',
        logger = dbLogger,
        sleep = defaultSleep,
    } = options;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error: unknown) {
            if (!isRetryableDbError(error)) {
                throw error;
            }
            if (attempt > maxRetries) {
                throw new DatabaseError(
                    `${context} failed after ${attempt} attempts`,
                    error instanceof Error ? error : null
                );
            }

            const delay = baseDelayMs * Math.pow(2, attempt - 1);
            logger.warn(
                { context, attempt, maxRetries, delay, pgCode: getPgErrorCode(error) },
                'Retryable database error, retrying transaction'
            );
            await sleep(delay);
        }
    }
}
