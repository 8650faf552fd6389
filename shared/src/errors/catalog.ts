/**
 * Catalog Error Utilities
 *
 * Error codes, user-friendly messages, and CatalogError class for variant
 * generation and BOM resolution. Anomalies are non-fatal and travel with a
 * successful result instead.
 */

// ============================================
// ERROR CODES
// ============================================

export const CATALOG_ERROR_CODES = {
  // Variant generation
  NO_ACTIVE_OPTIONS: 'CATALOG_NO_ACTIVE_OPTIONS',
  DUPLICATE_ATTRIBUTE_POSITION: 'CATALOG_DUPLICATE_ATTRIBUTE_POSITION',
  SKU_EXHAUSTED: 'CATALOG_SKU_EXHAUSTED',

  // BOM resolution
  MISSING_MATERIAL_REFERENCE: 'CATALOG_MISSING_MATERIAL_REFERENCE',
  VARIANT_NOT_IN_PRODUCT: 'CATALOG_VARIANT_NOT_IN_PRODUCT',

  // Production planning
  INVALID_UNITS: 'CATALOG_INVALID_UNITS',

  // General
  UNKNOWN: 'CATALOG_UNKNOWN_ERROR',
} as const;

export type CatalogErrorCode = (typeof CATALOG_ERROR_CODES)[keyof typeof CATALOG_ERROR_CODES];

/**
 * Non-fatal findings reported alongside a successful resolution
 */
export const CATALOG_ANOMALY_CODES = {
  NEGATIVE_QUANTITY_CLAMPED: 'CATALOG_NEGATIVE_QUANTITY_CLAMPED',
} as const;

export type CatalogAnomalyCode = (typeof CATALOG_ANOMALY_CODES)[keyof typeof CATALOG_ANOMALY_CODES];

// ============================================
// USER-FRIENDLY MESSAGES
// ============================================

export const CATALOG_ERROR_MESSAGES: Record<CatalogErrorCode, string> = {
  [CATALOG_ERROR_CODES.NO_ACTIVE_OPTIONS]:
    'An attribute has no active options, so no complete variant can be formed',
  [CATALOG_ERROR_CODES.DUPLICATE_ATTRIBUTE_POSITION]:
    'Two attributes of this product share the same position',
  [CATALOG_ERROR_CODES.SKU_EXHAUSTED]: 'No free SKU suffix is left for this variant',
  [CATALOG_ERROR_CODES.MISSING_MATERIAL_REFERENCE]:
    'The bill of materials references a raw material that no longer exists',
  [CATALOG_ERROR_CODES.VARIANT_NOT_IN_PRODUCT]: 'The variant does not belong to this product',
  [CATALOG_ERROR_CODES.INVALID_UNITS]: 'Units to produce must be a positive whole number',
  [CATALOG_ERROR_CODES.UNKNOWN]: 'An unexpected catalog error occurred',
};

// ============================================
// HELPER FUNCTIONS
// ============================================

export function getCatalogErrorMessage(code: string, fallback?: string): string {
  return isCatalogErrorCode(code) ? CATALOG_ERROR_MESSAGES[code] : fallback || 'An error occurred';
}

export function isCatalogErrorCode(code: unknown): code is CatalogErrorCode {
  return (
    typeof code === 'string' &&
    Object.values<string>(CATALOG_ERROR_CODES).includes(code)
  );
}

// ============================================
// CATALOG ERROR CLASS
// ============================================

/**
 * Structured error for the catalog engine.
 * Carries a technical message for logs and a user message for admin screens.
 */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: CatalogErrorCode,
    options?: {
      technicalMessage?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const userMessage = getCatalogErrorMessage(code);
    super(options?.technicalMessage || userMessage);
    this.name = 'CatalogError';
    this.code = code;
    this.userMessage = userMessage;
    this.context = options?.context;
    Object.setPrototypeOf(this, CatalogError.prototype);
  }
}

// ============================================
// TYPE GUARDS
// ============================================

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}
