/**
 * Catalog Snapshot Zod Schemas
 *
 * Validates catalog snapshots coming from JSON files or database rows and
 * turns them into domain value objects. NUMERIC columns arrive as strings
 * from pg; JSON files may use numbers. Both become decimal.js values.
 */

import { z } from 'zod';
import {
  ATTRIBUTE_TYPES,
  UNITS_OF_MEASURE,
  type CatalogSnapshot,
  type CatalogVariant,
} from '../domain/catalog/types.js';
import { Decimal } from '../domain/decimal.js';

// ============================================
// PRIMITIVES
// ============================================

function parseDecimal(value: string | number): Decimal | null {
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
}

export const decimalSchema = z
  .union([z.string().trim().min(1), z.number().finite()])
  .transform((value, ctx) => {
    const parsed = parseDecimal(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal: ${String(value)}` });
      return z.NEVER;
    }
    return parsed;
  });

export const nonNegativeDecimalSchema = decimalSchema.refine((value) => !value.isNegative(), {
  message: 'Must not be negative',
});

export const attributeTypeSchema = z.enum(ATTRIBUTE_TYPES);

export const unitOfMeasureSchema = z.enum(UNITS_OF_MEASURE);

const idSchema = z.string().min(1);

// ============================================
// PRODUCT / ATTRIBUTES
// ============================================

export const catalogProductSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  slug: z.string().min(1),
  skuPrefix: z.string().nullable().default(null),
  basePrice: decimalSchema,
  baseWeightGrams: z.number().int().default(0),
});

export const attributeOptionSchema = z.object({
  id: idSchema,
  attributeId: idSchema,
  value: z.string().min(1),
  displayValue: z.string().min(1),
  code: z.string().nullable().default(null),
  priceModifier: decimalSchema.nullable().default(null),
  weightModifierGrams: z.number().int().nullable().default(null),
  position: z.number().int().default(0),
  isActive: z.boolean().default(true),
});

export const productAttributeSchema = z.object({
  id: idSchema,
  productId: idSchema,
  name: z.string().min(1),
  displayName: z.string().min(1),
  type: attributeTypeSchema.default('select'),
  position: z.number().int(),
  options: z.array(attributeOptionSchema).default([]),
});

// ============================================
// RAW MATERIALS
// ============================================

export const rawMaterialSchema = z.object({
  id: idSchema,
  sku: z.string().min(1),
  name: z.string().min(1),
  unitOfMeasure: unitOfMeasureSchema.default('unit'),
  costPerUnit: nonNegativeDecimalSchema.default(0),
  stockQuantity: decimalSchema.default(0),
  lowStockThreshold: nonNegativeDecimalSchema.default(0),
  isActive: z.boolean().default(true),
});

// ============================================
// BOM LAYERS
// ============================================

export const productBomEntrySchema = z.object({
  id: idSchema,
  productId: idSchema,
  rawMaterialId: idSchema,
  quantity: nonNegativeDecimalSchema,
  unitOfMeasure: unitOfMeasureSchema.default('unit'),
});

export const optionBomEntrySchema = z.object({
  id: idSchema,
  optionId: idSchema,
  rawMaterialId: idSchema,
  quantity: decimalSchema,
});

const modifierBase = {
  id: idSchema,
  optionId: idSchema,
  rawMaterialId: idSchema,
  position: z.number().int().default(0),
};

export const optionBomModifierSchema = z.discriminatedUnion('kind', [
  z.object({ ...modifierBase, kind: z.literal('multiply'), factor: decimalSchema }),
  z.object({ ...modifierBase, kind: z.literal('add'), delta: decimalSchema }),
  z.object({ ...modifierBase, kind: z.literal('set'), quantity: decimalSchema }),
]);

const overrideBase = {
  id: idSchema,
  variantId: idSchema,
  position: z.number().int().default(0),
};

export const variantBomOverrideSchema = z.discriminatedUnion('kind', [
  z.object({
    ...overrideBase,
    kind: z.literal('replace'),
    sourceMaterialId: idSchema,
    targetMaterialId: idSchema,
    quantity: decimalSchema.nullable().default(null),
  }),
  z.object({ ...overrideBase, kind: z.literal('add'), rawMaterialId: idSchema, quantity: decimalSchema }),
  z.object({ ...overrideBase, kind: z.literal('remove'), rawMaterialId: idSchema }),
  z.object({ ...overrideBase, kind: z.literal('set_quantity'), rawMaterialId: idSchema, quantity: decimalSchema }),
]);

// ============================================
// SNAPSHOT
// ============================================

export const catalogSnapshotSchema = z.object({
  product: catalogProductSchema,
  attributes: z.array(productAttributeSchema).default([]),
  productBom: z.array(productBomEntrySchema).default([]),
  optionBom: z.array(optionBomEntrySchema).default([]),
  optionModifiers: z.array(optionBomModifierSchema).default([]),
  variantOverrides: z.array(variantBomOverrideSchema).default([]),
  materials: z.array(rawMaterialSchema).default([]),
});

export const optionSelectionSchema = z.object({
  attributeId: idSchema,
  optionId: idSchema,
});

export const catalogVariantSchema = z.object({
  id: idSchema,
  productId: idSchema,
  sku: z.string().min(1),
  selections: z.array(optionSelectionSchema).default([]),
  price: decimalSchema.nullable().default(null),
  weightGrams: z.number().int().nullable().default(null),
  stockQuantity: z.number().int().nonnegative().default(0),
  isActive: z.boolean().default(true),
  position: z.number().int().default(0),
});

/** Raw material id → stock on hand */
export const stockMapSchema = z.record(idSchema, decimalSchema);

/** Snapshot file as read by the CLI: catalog plus the product's variants */
export const catalogFileSchema = catalogSnapshotSchema.extend({
  variants: z.array(catalogVariantSchema).default([]),
});

export interface CatalogFile {
  snapshot: CatalogSnapshot;
  variants: CatalogVariant[];
}

export function parseCatalogSnapshot(input: unknown): CatalogSnapshot {
  return catalogSnapshotSchema.parse(input);
}

export function parseCatalogVariants(input: unknown): CatalogVariant[] {
  return z.array(catalogVariantSchema).parse(input);
}

/**
 * Parse a snapshot file ({ ...snapshot, variants: [...] })
 */
export function parseCatalogFile(input: unknown): CatalogFile {
  const { variants, ...snapshot } = catalogFileSchema.parse(input);
  return { snapshot, variants };
}

export function parseStockMap(input: unknown): Map<string, Decimal> {
  return new Map(Object.entries(stockMapSchema.parse(input)));
}

export type CatalogSnapshotInput = z.input<typeof catalogSnapshotSchema>;
export type CatalogVariantInput = z.input<typeof catalogVariantSchema>;
