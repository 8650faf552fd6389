/**
 * BOM Resolver - Pure Domain Logic
 *
 * Resolves the raw materials one unit of a variant needs by applying four
 * layers in strict order:
 *
 *   1.  Product entries           material → base quantity (duplicates summed)
 *   2a. Option additions          per attribute in position order, summed in
 *   2b. Option modifiers          per attribute in position order, then modifier
 *                                 position: multiply | add | set
 *   3.  Variant overrides         in list order: replace | add | remove | set_quantity
 *
 * Modifiers are not commutative (add-then-multiply ≠ multiply-then-add), so
 * the order above is part of the result. Negative results are clamped to zero
 * and reported as anomalies.
 *
 * Fails closed: if any applicable row references a raw material missing from
 * the snapshot, no BOM is returned.
 */

import {
  CATALOG_ANOMALY_CODES,
  CATALOG_ERROR_CODES,
  CatalogError,
} from '../../errors/catalog.js';
import { indexCatalog, selectedOptionsInOrder } from '../catalog/catalogIndex.js';
import type { CatalogIndex } from '../catalog/catalogIndex.js';
import type {
  AttributeOption,
  CatalogSnapshot,
  CatalogVariant,
  OptionBomModifier,
  VariantBomOverride,
} from '../catalog/types.js';
import { Decimal, ZERO } from '../decimal.js';

// ============================================
// TYPES
// ============================================

export type BomLayer = 'product' | 'option_addition' | 'option_modifier' | 'variant_override';

export type BomVariant = Pick<CatalogVariant, 'id' | 'productId' | 'selections'>;

export interface ResolvedBomLine {
  rawMaterialId: string;
  /** Per-unit quantity after all layers and clamping */
  quantity: Decimal;
  /** Layers that touched this material, in application order */
  layers: BomLayer[];
}

export interface BomAnomaly {
  code: typeof CATALOG_ANOMALY_CODES.NEGATIVE_QUANTITY_CLAMPED;
  rawMaterialId: string;
  /** The negative quantity the layers produced before clamping */
  computedQuantity: Decimal;
}

export interface BomResolution {
  variantId: string;
  productId: string;
  /** Material → per-unit quantity, in first-touched order */
  quantities: ReadonlyMap<string, Decimal>;
  lines: ResolvedBomLine[];
  anomalies: BomAnomaly[];
}

type CatalogInput = CatalogSnapshot | CatalogIndex;

// ============================================
// WORKING STATE
// ============================================

class BomAccumulator {
  readonly quantities = new Map<string, Decimal>();
  private readonly layers = new Map<string, BomLayer[]>();

  private touch(materialId: string, layer: BomLayer): void {
    const layers = this.layers.get(materialId);
    if (!layers) {
      this.layers.set(materialId, [layer]);
    } else if (layers[layers.length - 1] !== layer) {
      layers.push(layer);
    }
  }

  has(materialId: string): boolean {
    return this.quantities.has(materialId);
  }

  get(materialId: string): Decimal | undefined {
    return this.quantities.get(materialId);
  }

  add(materialId: string, quantity: Decimal, layer: BomLayer): void {
    const current = this.quantities.get(materialId);
    this.quantities.set(materialId, current ? current.plus(quantity) : quantity);
    this.touch(materialId, layer);
  }

  set(materialId: string, quantity: Decimal, layer: BomLayer): void {
    this.quantities.set(materialId, quantity);
    this.touch(materialId, layer);
  }

  remove(materialId: string): void {
    this.quantities.delete(materialId);
    this.layers.delete(materialId);
  }

  layersOf(materialId: string): BomLayer[] {
    return [...(this.layers.get(materialId) ?? [])];
  }
}

// ============================================
// LAYER APPLICATION
// ============================================

function applyModifier(bom: BomAccumulator, modifier: OptionBomModifier): void {
  const current = bom.get(modifier.rawMaterialId);

  switch (modifier.kind) {
    case 'multiply':
      if (current !== undefined) {
        bom.set(modifier.rawMaterialId, current.times(modifier.factor), 'option_modifier');
      }
      return;
    case 'add':
      if (current !== undefined) {
        bom.set(modifier.rawMaterialId, current.plus(modifier.delta), 'option_modifier');
      }
      return;
    case 'set':
      bom.set(modifier.rawMaterialId, modifier.quantity, 'option_modifier');
      return;
    default: {
      const exhaustive: never = modifier;
      throw new Error(`Unhandled BOM modifier: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function applyOverride(bom: BomAccumulator, override: VariantBomOverride): void {
  switch (override.kind) {
    case 'replace': {
      const replaced = bom.get(override.sourceMaterialId);
      const quantity = override.quantity ?? replaced;
      if (quantity === undefined) return;
      bom.remove(override.sourceMaterialId);
      // Several replaces into one target accumulate
      bom.add(override.targetMaterialId, quantity, 'variant_override');
      return;
    }
    case 'add':
      bom.add(override.rawMaterialId, override.quantity, 'variant_override');
      return;
    case 'remove':
      bom.remove(override.rawMaterialId);
      return;
    case 'set_quantity':
      bom.set(override.rawMaterialId, override.quantity, 'variant_override');
      return;
    default: {
      const exhaustive: never = override;
      throw new Error(`Unhandled BOM override: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function overrideMaterialIds(override: VariantBomOverride): string[] {
  switch (override.kind) {
    case 'replace':
      return [override.sourceMaterialId, override.targetMaterialId];
    case 'add':
    case 'remove':
    case 'set_quantity':
      return [override.rawMaterialId];
    default: {
      const exhaustive: never = override;
      throw new Error(`Unhandled BOM override: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function assertMaterialsExist(
  index: CatalogIndex,
  variant: BomVariant,
  selected: readonly AttributeOption[],
  overrides: readonly VariantBomOverride[]
): void {
  const referenced = new Set<string>();
  for (const entry of index.snapshot.productBom) referenced.add(entry.rawMaterialId);
  for (const option of selected) {
    for (const entry of index.optionEntriesByOption.get(option.id) ?? []) referenced.add(entry.rawMaterialId);
    for (const modifier of index.modifiersByOption.get(option.id) ?? []) referenced.add(modifier.rawMaterialId);
  }
  for (const override of overrides) {
    for (const id of overrideMaterialIds(override)) referenced.add(id);
  }

  const missing = [...referenced].filter((id) => !index.materialsById.has(id)).sort();
  if (missing.length > 0) {
    throw new CatalogError(CATALOG_ERROR_CODES.MISSING_MATERIAL_REFERENCE, {
      technicalMessage: `Variant ${variant.id} references missing raw materials: ${missing.join(', ')}`,
      context: { variantId: variant.id, productId: variant.productId, missingMaterialIds: missing },
    });
  }
}

// ============================================
// MAIN RESOLUTION FUNCTION
// ============================================

/**
 * Resolve the per-unit BOM of a variant.
 *
 * @throws CatalogError VARIANT_NOT_IN_PRODUCT when the variant belongs to another product
 * @throws CatalogError MISSING_MATERIAL_REFERENCE when a referenced material is gone
 */
export function resolveVariantBom(catalog: CatalogInput, variant: BomVariant): BomResolution {
  const index = 'optionsById' in catalog ? catalog : indexCatalog(catalog);
  const { product, productBom } = index.snapshot;

  if (variant.productId !== product.id) {
    throw new CatalogError(CATALOG_ERROR_CODES.VARIANT_NOT_IN_PRODUCT, {
      technicalMessage: `Variant ${variant.id} belongs to product ${variant.productId}, not ${product.id}`,
      context: { variantId: variant.id, productId: product.id },
    });
  }

  const selected = selectedOptionsInOrder(index, variant.selections);
  const overrides = index.overridesByVariant.get(variant.id) ?? [];
  assertMaterialsExist(index, variant, selected, overrides);

  const bom = new BomAccumulator();

  // Layer 1
  for (const entry of productBom) {
    bom.add(entry.rawMaterialId, entry.quantity, 'product');
  }

  // Layer 2a
  for (const option of selected) {
    for (const entry of index.optionEntriesByOption.get(option.id) ?? []) {
      bom.add(entry.rawMaterialId, entry.quantity, 'option_addition');
    }
  }

  // Layer 2b
  for (const option of selected) {
    for (const modifier of index.modifiersByOption.get(option.id) ?? []) {
      applyModifier(bom, modifier);
    }
  }

  // Layer 3
  for (const override of overrides) {
    applyOverride(bom, override);
  }

  const anomalies: BomAnomaly[] = [];
  const quantities = new Map<string, Decimal>();
  const lines: ResolvedBomLine[] = [];

  for (const [rawMaterialId, computed] of bom.quantities) {
    let quantity = computed;
    if (computed.isNegative() && !computed.isZero()) {
      anomalies.push({
        code: CATALOG_ANOMALY_CODES.NEGATIVE_QUANTITY_CLAMPED,
        rawMaterialId,
        computedQuantity: computed,
      });
      quantity = ZERO;
    }
    quantities.set(rawMaterialId, quantity);
    lines.push({ rawMaterialId, quantity, layers: bom.layersOf(rawMaterialId) });
  }

  return { variantId: variant.id, productId: product.id, quantities, lines, anomalies };
}

/**
 * Plain-object view of a resolved BOM (quantities as strings), for logs and JSON output
 */
export function bomToRecord(quantities: ReadonlyMap<string, Decimal>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [id, quantity] of quantities) {
    record[id] = quantity.toString();
  }
  return record;
}
