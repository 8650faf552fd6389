/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
  // Error codes
  CATALOG_ERROR_CODES,
  CATALOG_ANOMALY_CODES,
  type CatalogErrorCode,
  type CatalogAnomalyCode,
  // Messages
  CATALOG_ERROR_MESSAGES,
  getCatalogErrorMessage,
  isCatalogErrorCode,
  // Error class
  CatalogError,
  // Type guards
  isCatalogError,
} from './catalog.js';
