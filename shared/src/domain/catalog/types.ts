/**
 * Catalog Snapshot Types
 *
 * Read-only view of one product as of a single point in time: attributes,
 * options, the layered BOM, and the raw materials it references. Every engine
 * function takes a snapshot explicitly, never ambient state.
 *
 * BOM layers:
 *   Layer 1  - product entries (common to every variant)
 *   Layer 2a - option entries (additive materials for a selected option)
 *   Layer 2b - option modifiers (multiply/add/set on the running quantities)
 *   Layer 3  - variant overrides (replace/add/remove/set_quantity, applied last)
 */

import type { Decimal } from '../decimal.js';

// ============================================
// PRODUCT / ATTRIBUTES
// ============================================

export const ATTRIBUTE_TYPES = ['select', 'color_swatch', 'button_group', 'image_swatch'] as const;

export type AttributeType = (typeof ATTRIBUTE_TYPES)[number];

export interface CatalogProduct {
  id: string;
  name: string;
  slug: string;
  /** Prefix for generated SKUs; the uppercased slug is used when null */
  skuPrefix: string | null;
  basePrice: Decimal;
  baseWeightGrams: number;
}

export interface AttributeOption {
  id: string;
  attributeId: string;
  value: string;
  displayValue: string;
  /** Explicit SKU segment; wins over the abbreviated value */
  code: string | null;
  priceModifier: Decimal | null;
  weightModifierGrams: number | null;
  position: number;
  isActive: boolean;
}

export interface ProductAttribute {
  id: string;
  productId: string;
  name: string;
  displayName: string;
  type: AttributeType;
  /** Resolution order, unique per product */
  position: number;
  /** All options, active and inactive */
  options: AttributeOption[];
}

// ============================================
// VARIANTS
// ============================================

export interface OptionSelection {
  attributeId: string;
  optionId: string;
}

export interface CatalogVariant {
  id: string;
  productId: string;
  sku: string;
  selections: OptionSelection[];
  /** Explicit price; null = base price + option modifiers */
  price: Decimal | null;
  /** Explicit weight; null = base weight + option modifiers */
  weightGrams: number | null;
  stockQuantity: number;
  isActive: boolean;
  position: number;
}

// ============================================
// RAW MATERIALS
// ============================================

export const UNITS_OF_MEASURE = ['unit', 'kg', 'g', 'm', 'm2', 'm3', 'l', 'ml'] as const;

export type UnitOfMeasure = (typeof UNITS_OF_MEASURE)[number];

export interface RawMaterial {
  id: string;
  sku: string;
  name: string;
  unitOfMeasure: UnitOfMeasure;
  costPerUnit: Decimal;
  stockQuantity: Decimal;
  lowStockThreshold: Decimal;
  isActive: boolean;
}

// ============================================
// BOM LAYERS
// ============================================

/** Layer 1 */
export interface ProductBomEntry {
  id: string;
  productId: string;
  rawMaterialId: string;
  quantity: Decimal;
  unitOfMeasure: UnitOfMeasure;
}

/** Layer 2a */
export interface OptionBomEntry {
  id: string;
  optionId: string;
  rawMaterialId: string;
  quantity: Decimal;
}

interface OptionBomModifierBase {
  id: string;
  optionId: string;
  rawMaterialId: string;
  /** Order among the modifiers of one option */
  position: number;
}

/** Layer 2b */
export type OptionBomModifier =
  | (OptionBomModifierBase & { kind: 'multiply'; factor: Decimal })
  | (OptionBomModifierBase & { kind: 'add'; delta: Decimal })
  | (OptionBomModifierBase & { kind: 'set'; quantity: Decimal });

export type OptionBomModifierKind = OptionBomModifier['kind'];

interface VariantBomOverrideBase {
  id: string;
  variantId: string;
  /** Order within the variant's override list */
  position: number;
}

/** Layer 3 */
export type VariantBomOverride =
  | (VariantBomOverrideBase & {
      kind: 'replace';
      sourceMaterialId: string;
      targetMaterialId: string;
      /** null = carry over the replaced quantity */
      quantity: Decimal | null;
    })
  | (VariantBomOverrideBase & { kind: 'add'; rawMaterialId: string; quantity: Decimal })
  | (VariantBomOverrideBase & { kind: 'remove'; rawMaterialId: string })
  | (VariantBomOverrideBase & { kind: 'set_quantity'; rawMaterialId: string; quantity: Decimal });

export type VariantBomOverrideKind = VariantBomOverride['kind'];

// ============================================
// SNAPSHOT
// ============================================

export interface CatalogSnapshot {
  product: CatalogProduct;
  attributes: ProductAttribute[];
  productBom: ProductBomEntry[];
  optionBom: OptionBomEntry[];
  optionModifiers: OptionBomModifier[];
  variantOverrides: VariantBomOverride[];
  materials: RawMaterial[];
}

/** Raw material id → quantity (per unit, or stock on hand) */
export type MaterialQuantities = ReadonlyMap<string, Decimal>;
