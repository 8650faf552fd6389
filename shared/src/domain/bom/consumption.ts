/**
 * Material consumption, costing and batch planning from a resolved BOM.
 * Pure functions; the transactional stock write lives in the server package.
 */

import { CATALOG_ERROR_CODES, CatalogError } from '../../errors/catalog.js';
import type { MaterialQuantities, RawMaterial } from '../catalog/types.js';
import { Decimal, ZERO, roundCurrency, roundQuantity, sumDecimals } from '../decimal.js';

// ============================================
// CONSUMPTION
// ============================================

export interface ConsumptionLine {
  rawMaterialId: string;
  perUnit: Decimal;
  /** perUnit × units, rounded half-up to the stored quantity scale */
  total: Decimal;
}

function assertPositiveUnits(units: number): void {
  if (!Number.isSafeInteger(units) || units <= 0) {
    throw new CatalogError(CATALOG_ERROR_CODES.INVALID_UNITS, {
      technicalMessage: `Units must be a positive integer, got ${units}`,
      context: { units },
    });
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Material quantities consumed by producing `units` of a variant:
 * resolved_quantity × units, rounded once to QUANTITY_DECIMALS so that the
 * ledger's before + change = after holds at the stored scale. Materials whose
 * total rounds to zero are left out. Sorted by material id, the order rows
 * are locked in.
 */
export function planMaterialConsumption(bom: MaterialQuantities, units: number): ConsumptionLine[] {
  assertPositiveUnits(units);

  return [...bom.entries()]
    .filter(([, perUnit]) => perUnit.greaterThan(ZERO))
    .sort(([a], [b]) => compareIds(a, b))
    .map(([rawMaterialId, perUnit]) => ({ rawMaterialId, perUnit, total: roundQuantity(perUnit.times(units)) }))
    .filter((line) => line.total.greaterThan(ZERO));
}

// ============================================
// COSTING
// ============================================

export interface BomCostLine {
  rawMaterialId: string;
  quantity: Decimal;
  unitCost: Decimal | null;
  lineCost: Decimal | null;
}

export interface BomCost {
  lines: BomCostLine[];
  /** Sum of known line costs, unrounded */
  total: Decimal;
  /** Total rounded half-up to currency precision */
  rounded: Decimal;
  /** Materials without a cost (unknown to the material list) */
  uncostedMaterialIds: string[];
}

/**
 * Material cost of one unit: Σ quantity × cost_per_unit
 */
export function computeBomCost(
  bom: MaterialQuantities,
  materials: ReadonlyMap<string, Pick<RawMaterial, 'costPerUnit'>>
): BomCost {
  const lines: BomCostLine[] = [];
  const uncostedMaterialIds: string[] = [];
  let total = ZERO;

  for (const [rawMaterialId, quantity] of bom) {
    const material = materials.get(rawMaterialId);
    if (!material) {
      uncostedMaterialIds.push(rawMaterialId);
      lines.push({ rawMaterialId, quantity, unitCost: null, lineCost: null });
      continue;
    }
    const lineCost = quantity.times(material.costPerUnit);
    total = total.plus(lineCost);
    lines.push({ rawMaterialId, quantity, unitCost: material.costPerUnit, lineCost });
  }

  return { lines, total, rounded: roundCurrency(total), uncostedMaterialIds: uncostedMaterialIds.sort() };
}

// ============================================
// BATCH PLANNING
// ============================================

export interface BatchMaterialLine {
  rawMaterialId: string;
  requiredQuantity: Decimal;
  availableQuantity: Decimal;
  /** requiredQuantity - availableQuantity, never below zero */
  shortfall: Decimal;
  unitCost: Decimal;
  lineCost: Decimal;
}

export interface BatchMaterialPlan {
  plannedUnits: number;
  lines: BatchMaterialLine[];
  totalCost: Decimal;
  /** True when every material is covered by current stock */
  canProduce: boolean;
}

/**
 * Material requirements of a planned production batch, with shortfalls
 * against current stock and the material cost of the batch.
 */
export function planBatchMaterials(
  bom: MaterialQuantities,
  plannedUnits: number,
  materials: ReadonlyMap<string, Pick<RawMaterial, 'costPerUnit' | 'stockQuantity'>>
): BatchMaterialPlan {
  const lines = planMaterialConsumption(bom, plannedUnits).map((line): BatchMaterialLine => {
    const material = materials.get(line.rawMaterialId);
    const availableQuantity = material?.stockQuantity ?? ZERO;
    const unitCost = material?.costPerUnit ?? ZERO;
    return {
      rawMaterialId: line.rawMaterialId,
      requiredQuantity: line.total,
      availableQuantity,
      shortfall: Decimal.max(line.total.minus(availableQuantity), ZERO),
      unitCost,
      lineCost: line.total.times(unitCost),
    };
  });

  return {
    plannedUnits,
    lines,
    totalCost: sumDecimals(lines.map((line) => line.lineCost)),
    canProduce: lines.every((line) => line.shortfall.isZero()),
  };
}
