/**
 * Centralized Environment Variable Validation
 *
 * Validates environment variables at startup using Zod and fails fast with
 * a readable list of issues.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 * - Read `env.DATABASE_URL` instead of `process.env.DATABASE_URL`
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Surface it through a typed config object in config/
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // DATABASE
    // ----------------------------------------

    /** PostgreSQL connection string (required by anything that opens a pool) */
    DATABASE_URL: z.string().min(1).optional(),

    /** Max connections in the Kysely pg pool */
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),

    // ----------------------------------------
    // RUNTIME
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Pino log level; defaults depend on NODE_ENV */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // ----------------------------------------
    // VARIANT GENERATION
    // ----------------------------------------

    /** Characters kept when an option value is abbreviated into a SKU segment */
    SKU_ABBREVIATION_LENGTH: z.coerce.number().int().min(1).max(10).default(3),

    /** Highest numeric suffix tried when a generated SKU collides */
    SKU_MAX_SUFFIX: z.coerce.number().int().min(2).default(99),

    // ----------------------------------------
    // TRANSACTIONS
    // ----------------------------------------

    /** Retries after a serialization failure, deadlock or lock timeout */
    DB_TX_MAX_RETRIES: z.coerce.number().int().min(0).default(3),

    /** Base delay of the exponential retry backoff */
    DB_TX_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(100),

    /** SET LOCAL lock_timeout for stock and variant transactions */
    DB_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parsed and validated environment variables.
 *
 * Exits the process at startup if any variable fails validation.
 */
function parseEnv(): Env {
    try {
        return envSchema.parse(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map(issue => {
                const path = issue.path.join('.');
                return `  - ${path}: ${issue.message}`;
            }).join('\n');

            console.error('Environment validation failed:\n' + issues);
            process.exit(1);
        }
        throw error;
    }
}

export const env = parseEnv();

export const isTest = env.NODE_ENV === 'test';
