/**
 * Custom error classes for server-side catalog operations
 * Use these instead of generic Error for specific error types
 */

import type { Decimal } from '@tessera/shared';

/**
 * Base interface for custom errors with HTTP-style status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when input validation fails
 *
 * @example
 * throw new ValidationError('Invalid production request', zodError.issues);
 */
export class ValidationError extends Error implements CustomError {
    override readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a product, variant or material is missing
 *
 * @example
 * throw new NotFoundError('Variant not found', 'ProductVariant', variantId);
 */
export class NotFoundError extends Error implements CustomError {
    override readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | number | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | number | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Conflict error - thrown when an operation conflicts with current state
 *
 * @example
 * throw new ConflictError('Variant is inactive', 'inactive_variant');
 */
export class ConflictError extends Error implements CustomError {
    override readonly name = 'ConflictError' as const;
    readonly statusCode = 409 as const;
    readonly conflictType: string | null;

    constructor(message: string = 'Conflict', conflictType: string | null = null) {
        super(message);
        this.conflictType = conflictType;
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}

/**
 * Business logic error - thrown when catalog rules are violated
 *
 * @example
 * throw new BusinessLogicError('Attribute has no active options', 'CATALOG_NO_ACTIVE_OPTIONS');
 */
export class BusinessLogicError extends Error implements CustomError {
    override readonly name: string = 'BusinessLogicError';
    readonly statusCode = 422 as const;
    readonly rule: string | null;

    constructor(message: string, rule: string | null = null) {
        super(message);
        this.rule = rule;
        Object.setPrototypeOf(this, BusinessLogicError.prototype);
    }
}

export interface MaterialShortage {
    rawMaterialId: string;
    required: Decimal;
    available: Decimal;
}

/**
 * Production would drive one or more raw materials below zero
 */
export class InsufficientMaterialStockError extends BusinessLogicError {
    override readonly name = 'InsufficientMaterialStockError';
    readonly shortages: MaterialShortage[];

    constructor(shortages: MaterialShortage[]) {
        const ids = shortages.map(s => s.rawMaterialId).join(', ');
        super(`Insufficient raw material stock: ${ids}`, 'INSUFFICIENT_MATERIAL_STOCK');
        this.shortages = shortages;
        Object.setPrototypeOf(this, InsufficientMaterialStockError.prototype);
    }
}

/**
 * Database error - thrown when database operations fail
 * Use for transaction failures after retries are exhausted
 *
 * @example
 * throw new DatabaseError('Transaction failed', originalError);
 */
export class DatabaseError extends Error implements CustomError {
    override readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/**
 * PostgreSQL SQLSTATE of a driver error, if any
 */
export function getPgErrorCode(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}
