/**
 * SKU Builder - Pure Functions
 *
 * Generated SKUs follow {PREFIX}-{SEG1}-{SEG2}-... with one segment per
 * attribute in position order. A segment is the option's explicit code, or
 * the option value uppercased, stripped to A-Z0-9 and truncated.
 *
 * Collisions get a numeric suffix: BAG-BLA-LAR, BAG-BLA-LAR-2, BAG-BLA-LAR-3...
 * The lowest unused suffix wins, so the outcome depends only on the set of
 * SKUs already taken.
 */

import type { AttributeOption, CatalogProduct } from '../catalog/types.js';

export const DEFAULT_ABBREVIATION_LENGTH = 3;
export const DEFAULT_MAX_SKU_SUFFIX = 99;

const SEPARATOR = '-';

export function normalizeSkuSegment(raw: string): string {
  return raw.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * @example
 * abbreviateOptionValue('Black') // "BLA"
 * abbreviateOptionValue('x-large', 2) // "XL"
 */
export function abbreviateOptionValue(value: string, length = DEFAULT_ABBREVIATION_LENGTH): string {
  return normalizeSkuSegment(value).slice(0, length);
}

export function skuSegmentForOption(
  option: Pick<AttributeOption, 'code' | 'value' | 'position'>,
  abbreviationLength = DEFAULT_ABBREVIATION_LENGTH
): string {
  const explicit = option.code ? normalizeSkuSegment(option.code) : '';
  if (explicit) return explicit;

  const abbreviated = abbreviateOptionValue(option.value, abbreviationLength);
  // Values made only of symbols ("—", "½") still need a stable segment
  return abbreviated || `O${option.position}`;
}

export function skuPrefixForProduct(product: Pick<CatalogProduct, 'skuPrefix' | 'slug'>): string {
  const prefix = product.skuPrefix?.trim();
  if (prefix) return prefix;
  return normalizeSkuSegment(product.slug) || 'SKU';
}

export function buildBaseSku(prefix: string, segments: readonly string[]): string {
  return [prefix, ...segments].filter((part) => part.length > 0).join(SEPARATOR);
}

/**
 * Pick the first free SKU for a base: the base itself, then base-2, base-3, ...
 *
 * @returns the SKU, or null when every suffix up to maxSuffix is taken
 */
export function allocateSku(
  base: string,
  taken: ReadonlySet<string>,
  maxSuffix = DEFAULT_MAX_SKU_SUFFIX
): string | null {
  if (!taken.has(base)) return base;

  for (let suffix = 2; suffix <= maxSuffix; suffix++) {
    const candidate = `${base}${SEPARATOR}${suffix}`;
    if (!taken.has(candidate)) return candidate;
  }
  return null;
}
