/**
 * Pricing Resolver - Pure Functions
 *
 * Effective price  = variant.price  ?? base_price        + Σ option.price_modifier
 * Effective weight = variant.weight ?? base_weight_grams + Σ option.weight_modifier_grams
 *
 * An explicit override ignores the base and every modifier. Sums keep full
 * decimal precision; `display` is the only rounded value (half-up, 2 places).
 */

import { indexCatalog, selectedOptionsInOrder, unresolvedSelections } from '../catalog/catalogIndex.js';
import type { CatalogIndex } from '../catalog/catalogIndex.js';
import type { CatalogSnapshot, CatalogVariant } from '../catalog/types.js';
import { Decimal, ZERO, formatCurrencyAmount, roundCurrency } from '../decimal.js';

// ============================================
// TYPES
// ============================================

export type PricedVariant = Pick<CatalogVariant, 'selections' | 'price' | 'weightGrams'>;

export type ResolutionSource = 'override' | 'computed';

export interface AppliedPriceModifier {
  optionId: string;
  attributeId: string;
  amount: Decimal;
}

export interface AppliedWeightModifier {
  optionId: string;
  attributeId: string;
  grams: number;
}

export interface PriceResolution {
  /** Unrounded amount */
  amount: Decimal;
  /** Amount rounded half-up to 2 places */
  rounded: Decimal;
  /** rounded, as a fixed 2-decimal string */
  display: string;
  source: ResolutionSource;
  base: Decimal;
  modifiers: AppliedPriceModifier[];
  /** Selected options no longer present in the catalog */
  unresolvedOptionIds: string[];
}

export interface WeightResolution {
  grams: number;
  source: ResolutionSource;
  baseGrams: number;
  modifiers: AppliedWeightModifier[];
  unresolvedOptionIds: string[];
}

export interface VariantPricing {
  price: PriceResolution;
  weight: WeightResolution;
}

type CatalogInput = CatalogSnapshot | CatalogIndex;

function asIndex(catalog: CatalogInput): CatalogIndex {
  return 'optionsById' in catalog ? catalog : indexCatalog(catalog);
}

// ============================================
// RESOLVERS
// ============================================

export function resolveEffectivePrice(variant: PricedVariant, catalog: CatalogInput): PriceResolution {
  const index = asIndex(catalog);
  const base = index.snapshot.product.basePrice;
  const unresolvedOptionIds = unresolvedSelections(index, variant.selections);

  if (variant.price !== null) {
    return {
      amount: variant.price,
      rounded: roundCurrency(variant.price),
      display: formatCurrencyAmount(variant.price),
      source: 'override',
      base,
      modifiers: [],
      unresolvedOptionIds,
    };
  }

  const modifiers: AppliedPriceModifier[] = selectedOptionsInOrder(index, variant.selections)
    .filter((option) => option.priceModifier !== null)
    .map((option) => ({
      optionId: option.id,
      attributeId: option.attributeId,
      amount: option.priceModifier ?? ZERO,
    }));

  const amount = modifiers.reduce((sum, modifier) => sum.plus(modifier.amount), new Decimal(base));

  return {
    amount,
    rounded: roundCurrency(amount),
    display: formatCurrencyAmount(amount),
    source: 'computed',
    base,
    modifiers,
    unresolvedOptionIds,
  };
}

export function resolveEffectiveWeight(variant: PricedVariant, catalog: CatalogInput): WeightResolution {
  const index = asIndex(catalog);
  const baseGrams = index.snapshot.product.baseWeightGrams;
  const unresolvedOptionIds = unresolvedSelections(index, variant.selections);

  if (variant.weightGrams !== null) {
    return { grams: variant.weightGrams, source: 'override', baseGrams, modifiers: [], unresolvedOptionIds };
  }

  const modifiers: AppliedWeightModifier[] = [];
  for (const option of selectedOptionsInOrder(index, variant.selections)) {
    if (option.weightModifierGrams !== null) {
      modifiers.push({ optionId: option.id, attributeId: option.attributeId, grams: option.weightModifierGrams });
    }
  }

  return {
    grams: modifiers.reduce((sum, modifier) => sum + modifier.grams, baseGrams),
    source: 'computed',
    baseGrams,
    modifiers,
    unresolvedOptionIds,
  };
}

/**
 * Price and weight together, indexing the catalog once
 */
export function resolveVariantPricing(variant: PricedVariant, catalog: CatalogInput): VariantPricing {
  const index = asIndex(catalog);
  return {
    price: resolveEffectivePrice(variant, index),
    weight: resolveEffectiveWeight(variant, index),
  };
}
