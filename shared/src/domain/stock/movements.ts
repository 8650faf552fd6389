/**
 * Stock Ledger - movement types and pure planning
 *
 * The ledger is append-only: every stock change is one movement row with
 * the quantity before and after. Rows are never updated or deleted.
 */

import type { ConsumptionLine } from '../bom/consumption.js';
import { Decimal } from '../decimal.js';

// ============================================
// TYPES
// ============================================

export const STOCK_ENTITY_TYPES = ['raw_material', 'product_variant'] as const;

export type StockEntityType = (typeof STOCK_ENTITY_TYPES)[number];

export const STOCK_MOVEMENT_TYPES = [
  'purchase',
  'sale',
  'adjustment',
  'production_consume',
  'production_output',
  'return',
  'damage',
] as const;

export type StockMovementType = (typeof STOCK_MOVEMENT_TYPES)[number];

export interface StockMovement {
  id: string;
  entityType: StockEntityType;
  entityId: string;
  movementType: StockMovementType;
  /** Signed: negative for consumption */
  quantityChange: Decimal;
  quantityBefore: Decimal;
  quantityAfter: Decimal;
  referenceType: string | null;
  referenceId: string | null;
  unitCost: Decimal | null;
  notes: string | null;
  createdBy: string | null;
  createdAt: Date;
}

export type NewStockMovement = Omit<StockMovement, 'id' | 'createdAt'>;

export interface MovementReference {
  referenceType: string;
  referenceId: string | null;
  createdBy?: string | null;
  notes?: string | null;
}

/** Locked stock row of one raw material */
export interface MaterialStockLevel {
  rawMaterialId: string;
  stockQuantity: Decimal;
  costPerUnit: Decimal;
}

export interface StockShortage {
  rawMaterialId: string;
  required: Decimal;
  available: Decimal;
}

export type ConsumptionMovementPlan =
  | { ok: true; movements: NewStockMovement[] }
  | { ok: false; shortages: StockShortage[] };

// ============================================
// PLANNING
// ============================================

/**
 * Turn consumption lines into production_consume movements against the
 * locked stock levels. Refuses to overdraw: any line whose total exceeds
 * stock (a material without a level has zero) makes the whole plan fail.
 */
export function planConsumptionMovements(
  lines: readonly ConsumptionLine[],
  levels: ReadonlyMap<string, MaterialStockLevel>,
  reference: MovementReference
): ConsumptionMovementPlan {
  const shortages: StockShortage[] = [];
  const movements: NewStockMovement[] = [];

  for (const line of lines) {
    const level = levels.get(line.rawMaterialId);
    const available = level?.stockQuantity ?? new Decimal(0);

    if (line.total.greaterThan(available)) {
      shortages.push({ rawMaterialId: line.rawMaterialId, required: line.total, available });
      continue;
    }

    movements.push({
      entityType: 'raw_material',
      entityId: line.rawMaterialId,
      movementType: 'production_consume',
      quantityChange: line.total.negated(),
      quantityBefore: available,
      quantityAfter: available.minus(line.total),
      referenceType: reference.referenceType,
      referenceId: reference.referenceId,
      unitCost: level?.costPerUnit ?? null,
      notes: reference.notes ?? null,
      createdBy: reference.createdBy ?? null,
    });
  }

  return shortages.length > 0 ? { ok: false, shortages } : { ok: true, movements };
}

/**
 * production_output movement adding finished units to a variant's stock
 */
export function planOutputMovement(
  variantId: string,
  units: number,
  stockBefore: number,
  reference: MovementReference
): NewStockMovement {
  return {
    entityType: 'product_variant',
    entityId: variantId,
    movementType: 'production_output',
    quantityChange: new Decimal(units),
    quantityBefore: new Decimal(stockBefore),
    quantityAfter: new Decimal(stockBefore + units),
    referenceType: reference.referenceType,
    referenceId: reference.referenceId,
    unitCost: null,
    notes: reference.notes ?? null,
    createdBy: reference.createdBy ?? null,
  };
}
