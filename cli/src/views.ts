/**
 * Plain row builders for CLI tables and --json output.
 * Decimal values are rendered here; colour is applied by the commands.
 */

import {
  computeBomCost,
  computeProducibility,
  formatCurrencyAmount,
  formatProducibility,
  formatQuantity,
  indexCatalog,
  isCatalogError,
  resolveVariantBom,
  resolveVariantPricing,
  type BatchMaterialPlan,
  type CatalogFile,
  type CatalogIndex,
  type CatalogVariant,
  type Decimal,
  type Producibility,
  type VariantGenerationPlan,
} from '@tessera/shared';

// ============================================
// VARIANTS
// ============================================

export type VariantPlanRow = {
  Action: 'create' | 'reactivate' | 'deactivate' | 'keep' | 'failed';
  SKU: string;
  Options: string;
};

function optionLabels(index: CatalogIndex, selections: readonly { optionId: string }[]): string {
  if (selections.length === 0) return '(default)';
  return selections.map((s) => index.optionsById.get(s.optionId)?.displayValue ?? s.optionId).join(' / ');
}

export function variantPlanRows(file: CatalogFile, plan: VariantGenerationPlan): VariantPlanRow[] {
  const index = indexCatalog(file.snapshot);
  const selectionsById = new Map(file.variants.map((v) => [v.id, v.selections]));
  const label = (id: string) => optionLabels(index, selectionsById.get(id) ?? []);

  return [
    ...plan.unchanged.map((v): VariantPlanRow => ({ Action: 'keep', SKU: v.sku, Options: label(v.id) })),
    ...plan.reactivated.map((v): VariantPlanRow => ({ Action: 'reactivate', SKU: v.sku, Options: label(v.id) })),
    ...plan.created.map((v): VariantPlanRow => ({
      Action: 'create',
      SKU: v.sku,
      Options: optionLabels(index, v.selections),
    })),
    ...plan.deactivated.map((v): VariantPlanRow => ({ Action: 'deactivate', SKU: v.sku, Options: label(v.id) })),
    ...plan.failures.map((f): VariantPlanRow => ({
      Action: 'failed',
      SKU: `${f.baseSku}-?`,
      Options: optionLabels(index, f.selections),
    })),
  ];
}

// ============================================
// BOM
// ============================================

export type BomRow = {
  Material: string;
  SKU: string;
  Quantity: string;
  Unit: string;
  'Unit cost': string;
  'Line cost': string;
  Layers: string;
};

export interface BomView {
  rows: BomRow[];
  total: string;
  anomalies: string[];
}

export function bomView(file: CatalogFile, variant: CatalogVariant): BomView {
  const index = indexCatalog(file.snapshot);
  const resolution = resolveVariantBom(index, variant);
  const cost = computeBomCost(resolution.quantities, index.materialsById);
  const costById = new Map(cost.lines.map((line) => [line.rawMaterialId, line]));

  const rows = resolution.lines.map((line): BomRow => {
    const material = index.materialsById.get(line.rawMaterialId);
    const costLine = costById.get(line.rawMaterialId);
    return {
      Material: material?.name ?? line.rawMaterialId,
      SKU: material?.sku ?? '—',
      Quantity: formatQuantity(line.quantity),
      Unit: material?.unitOfMeasure ?? '—',
      'Unit cost': costLine?.unitCost ? formatCurrencyAmount(costLine.unitCost) : '—',
      'Line cost': costLine?.lineCost ? formatCurrencyAmount(costLine.lineCost) : '—',
      Layers: line.layers.join(' → '),
    };
  });

  return {
    rows,
    total: formatCurrencyAmount(cost.total),
    anomalies: resolution.anomalies.map(
      (a) => `${a.rawMaterialId} resolved to ${a.computedQuantity.toString()}, clamped to 0`
    ),
  };
}

// ============================================
// PRODUCIBILITY
// ============================================

export type CapacityRow = {
  Material: string;
  Required: string;
  Available: string;
  Units: number;
};

export function capacityRows(file: CatalogFile, producibility: Producibility): CapacityRow[] {
  if (producibility.kind === 'unlimited') return [];
  const names = new Map(file.snapshot.materials.map((m) => [m.id, m.name]));
  return producibility.capacities.map((c) => ({
    Material: names.get(c.rawMaterialId) ?? c.rawMaterialId,
    Required: formatQuantity(c.required),
    Available: formatQuantity(c.available),
    Units: c.possibleUnits,
  }));
}

export type ReportRow = {
  SKU: string;
  Price: string;
  Weight: string;
  'Unit cost': string;
  Producible: string;
  Limiting: string;
};

export interface ReportView {
  rows: ReportRow[];
  /** Variants whose BOM could not be resolved */
  errors: { sku: string; code: string; message: string }[];
}

/**
 * Price, cost and producibility of every active variant in the file
 */
export function reportView(file: CatalogFile, stock: ReadonlyMap<string, Decimal>): ReportView {
  const index = indexCatalog(file.snapshot);
  const view: ReportView = { rows: [], errors: [] };

  const variants = file.variants.filter((v) => v.isActive).sort((a, b) => a.position - b.position);
  for (const variant of variants) {
    try {
      const pricing = resolveVariantPricing(variant, index);
      const resolution = resolveVariantBom(index, variant);
      const cost = computeBomCost(resolution.quantities, index.materialsById);
      const producibility = computeProducibility(resolution.quantities, stock);
      view.rows.push({
        SKU: variant.sku,
        Price: pricing.price.display,
        Weight: `${pricing.weight.grams} g`,
        'Unit cost': formatCurrencyAmount(cost.total),
        Producible: formatProducibility(producibility),
        Limiting: producibility.kind === 'limited' ? producibility.limitingMaterials.join(', ') : '—',
      });
    } catch (err: unknown) {
      if (!isCatalogError(err)) throw err;
      view.errors.push({ sku: variant.sku, code: err.code, message: err.message });
    }
  }

  return view;
}

// ============================================
// BATCH PLANNING
// ============================================

export type BatchRow = {
  Material: string;
  Required: string;
  Available: string;
  Shortfall: string;
  Cost: string;
};

export function batchRows(file: CatalogFile, plan: BatchMaterialPlan): BatchRow[] {
  const names = new Map(file.snapshot.materials.map((m) => [m.id, m.name]));
  return plan.lines.map((line) => ({
    Material: names.get(line.rawMaterialId) ?? line.rawMaterialId,
    Required: formatQuantity(line.requiredQuantity),
    Available: formatQuantity(line.availableQuantity),
    Shortfall: line.shortfall.isZero() ? '—' : formatQuantity(line.shortfall),
    Cost: formatCurrencyAmount(line.lineCost),
  }));
}
