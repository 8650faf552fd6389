/**
 * Variant Generator - Pure Domain Logic
 *
 * Derives the target variant set (Cartesian product of active options) and
 * reconciles it against the product's existing variants:
 *
 *   existing key in target      → preserved (reactivated if inactive)
 *   existing key not in target  → deactivated, never deleted
 *   target key with no variant  → created (stock 0, no price override)
 *
 * NO DATABASE DEPENDENCIES. The caller applies the returned plan inside a
 * per-product lock; re-running on an unchanged catalog yields an empty plan.
 */

import { CATALOG_ERROR_CODES, CatalogError, getCatalogErrorMessage } from '../../errors/catalog.js';
import { activeOptions, indexCatalog } from '../catalog/catalogIndex.js';
import type {
  AttributeOption,
  CatalogSnapshot,
  CatalogVariant,
  OptionSelection,
  ProductAttribute,
} from '../catalog/types.js';
import { optionSetKey } from './optionSet.js';
import {
  DEFAULT_ABBREVIATION_LENGTH,
  DEFAULT_MAX_SKU_SUFFIX,
  allocateSku,
  buildBaseSku,
  skuPrefixForProduct,
  skuSegmentForOption,
} from './sku.js';

// ============================================
// TYPES
// ============================================

export type ExistingVariant = Pick<CatalogVariant, 'id' | 'sku' | 'selections' | 'isActive' | 'position'>;

export interface GenerateVariantsOptions {
  /** Characters kept from an option value when it has no explicit code */
  abbreviationLength?: number;
  /** Highest numeric suffix tried on SKU collision */
  maxSkuSuffix?: number;
}

export interface TargetVariant {
  key: string;
  /** One selection per attribute, in attribute position order */
  selections: OptionSelection[];
  /** Matched existing variant, or null for a new combination */
  variantId: string | null;
  /** null only when SKU allocation failed for a new combination */
  sku: string | null;
}

export interface PlannedVariant {
  key: string;
  selections: OptionSelection[];
  sku: string;
  position: number;
}

export interface VariantRef {
  id: string;
  sku: string;
  key: string;
}

export interface VariantGenerationFailure {
  key: string;
  selections: OptionSelection[];
  code: typeof CATALOG_ERROR_CODES.SKU_EXHAUSTED;
  message: string;
  baseSku: string;
}

export interface VariantGenerationPlan {
  productId: string;
  target: TargetVariant[];
  created: PlannedVariant[];
  reactivated: VariantRef[];
  deactivated: VariantRef[];
  unchanged: VariantRef[];
  failures: VariantGenerationFailure[];
}

interface Axis {
  attribute: ProductAttribute;
  options: AttributeOption[];
}

type Combination = { attribute: ProductAttribute; option: AttributeOption }[];

// ============================================
// TARGET SET
// ============================================

function variantAxes(snapshot: CatalogSnapshot): Axis[] {
  const index = indexCatalog(snapshot);
  const axes = index.attributes.map((attribute) => ({ attribute, options: activeOptions(attribute) }));

  const empty = axes.filter((axis) => axis.options.length === 0);
  if (empty.length === 0) return axes;

  // Every attribute empty: the product behaves as a simple product
  if (empty.length === axes.length) return [];

  throw new CatalogError(CATALOG_ERROR_CODES.NO_ACTIVE_OPTIONS, {
    technicalMessage: `Attributes without active options: ${empty.map((a) => a.attribute.name).join(', ')}`,
    context: {
      productId: snapshot.product.id,
      attributeIds: empty.map((a) => a.attribute.id),
    },
  });
}

function cartesianProduct(axes: readonly Axis[]): Combination[] {
  let result: Combination[] = [[]];
  for (const axis of axes) {
    const expanded: Combination[] = [];
    for (const combination of result) {
      for (const option of axis.options) {
        expanded.push([...combination, { attribute: axis.attribute, option }]);
      }
    }
    result = expanded;
  }
  return result;
}

/**
 * Number of variants the catalog should have: c1 × c2 × ... × cn, or 1 for a
 * simple product.
 */
export function countTargetCombinations(snapshot: CatalogSnapshot): number {
  return variantAxes(snapshot).reduce((count, axis) => count * axis.options.length, 1);
}

// ============================================
// RECONCILIATION
// ============================================

function compareExisting(a: ExistingVariant, b: ExistingVariant): number {
  if (a.isActive !== b.isActive) return a.isActive ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function toRef(variant: ExistingVariant, key: string): VariantRef {
  return { id: variant.id, sku: variant.sku, key };
}

/**
 * Plan variant generation for one product.
 *
 * @throws CatalogError NO_ACTIVE_OPTIONS when some attributes have no active option
 * @throws CatalogError DUPLICATE_ATTRIBUTE_POSITION when attribute order is ambiguous
 */
export function generateVariants(
  snapshot: CatalogSnapshot,
  existingVariants: readonly ExistingVariant[],
  options: GenerateVariantsOptions = {}
): VariantGenerationPlan {
  const abbreviationLength = options.abbreviationLength ?? DEFAULT_ABBREVIATION_LENGTH;
  const maxSkuSuffix = options.maxSkuSuffix ?? DEFAULT_MAX_SKU_SUFFIX;

  const combinations = cartesianProduct(variantAxes(snapshot));

  // Keyed map of existing variants; active wins over inactive, then lowest id
  const existingByKey = new Map<string, ExistingVariant>();
  const duplicates: { variant: ExistingVariant; key: string }[] = [];
  for (const variant of [...existingVariants].sort(compareExisting)) {
    const key = optionSetKey(variant.selections);
    if (existingByKey.has(key)) {
      duplicates.push({ variant, key });
    } else {
      existingByKey.set(key, variant);
    }
  }

  const takenSkus = new Set(existingVariants.map((v) => v.sku));
  let nextPosition = existingVariants.reduce((max, v) => Math.max(max, v.position + 1), 0);
  const prefix = skuPrefixForProduct(snapshot.product);

  const plan: VariantGenerationPlan = {
    productId: snapshot.product.id,
    target: [],
    created: [],
    reactivated: [],
    deactivated: [],
    unchanged: [],
    failures: [],
  };
  const targetKeys = new Set<string>();

  for (const combination of combinations) {
    const selections = combination.map(({ attribute, option }) => ({
      attributeId: attribute.id,
      optionId: option.id,
    }));
    const key = optionSetKey(selections);
    targetKeys.add(key);

    const match = existingByKey.get(key);
    if (match) {
      plan.target.push({ key, selections, variantId: match.id, sku: match.sku });
      (match.isActive ? plan.unchanged : plan.reactivated).push(toRef(match, key));
      continue;
    }

    const baseSku = buildBaseSku(
      prefix,
      combination.map(({ option }) => skuSegmentForOption(option, abbreviationLength))
    );
    const sku = allocateSku(baseSku, takenSkus, maxSkuSuffix);
    plan.target.push({ key, selections, variantId: null, sku });

    if (sku === null) {
      plan.failures.push({
        key,
        selections,
        code: CATALOG_ERROR_CODES.SKU_EXHAUSTED,
        message: getCatalogErrorMessage(CATALOG_ERROR_CODES.SKU_EXHAUSTED),
        baseSku,
      });
      continue;
    }

    takenSkus.add(sku);
    plan.created.push({ key, selections, sku, position: nextPosition++ });
  }

  const stale = [...existingByKey.entries()]
    .filter(([key, variant]) => variant.isActive && !targetKeys.has(key))
    .map(([key, variant]) => ({ variant, key }));
  const activeDuplicates = duplicates.filter(({ variant }) => variant.isActive);

  plan.deactivated = [...stale, ...activeDuplicates]
    .sort((a, b) => a.variant.position - b.variant.position || (a.variant.id < b.variant.id ? -1 : 1))
    .map(({ variant, key }) => toRef(variant, key));

  return plan;
}

/**
 * True when applying the plan would write anything
 */
export function planHasChanges(plan: VariantGenerationPlan): boolean {
  return plan.created.length > 0 || plan.reactivated.length > 0 || plan.deactivated.length > 0;
}
