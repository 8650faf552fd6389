/**
 * Producibility Calculator - Pure Functions
 *
 * units = min over constrained materials of floor(stock / required)
 *
 * Materials with a zero requirement do not constrain. A BOM with no
 * constrained material is `unlimited`, a distinct outcome that is never
 * encoded as a number.
 */

import type { MaterialQuantities } from '../catalog/types.js';
import { Decimal, ZERO } from '../decimal.js';

export interface MaterialCapacity {
  rawMaterialId: string;
  required: Decimal;
  available: Decimal;
  /** Whole units this material alone allows */
  possibleUnits: number;
}

export interface UnlimitedProducibility {
  kind: 'unlimited';
}

export interface LimitedProducibility {
  kind: 'limited';
  units: number;
  /** Every material whose capacity equals `units`, sorted by id */
  limitingMaterials: string[];
  capacities: MaterialCapacity[];
}

export type Producibility = UnlimitedProducibility | LimitedProducibility;

export const UNLIMITED: UnlimitedProducibility = { kind: 'unlimited' };

/**
 * Compute how many units the current stock allows.
 * Stock missing from the map counts as zero; negative stock as zero.
 */
export function computeProducibility(bom: MaterialQuantities, stock: MaterialQuantities): Producibility {
  const capacities: MaterialCapacity[] = [];

  for (const [rawMaterialId, required] of bom) {
    if (!required.greaterThan(ZERO)) continue;

    const onHand = stock.get(rawMaterialId) ?? ZERO;
    const available = Decimal.max(onHand, ZERO);
    capacities.push({
      rawMaterialId,
      required,
      available,
      possibleUnits: available.dividedToIntegerBy(required).toNumber(),
    });
  }

  if (capacities.length === 0) return UNLIMITED;

  const units = Math.min(...capacities.map((c) => c.possibleUnits));
  const limitingMaterials = capacities
    .filter((c) => c.possibleUnits === units)
    .map((c) => c.rawMaterialId)
    .sort();

  capacities.sort((a, b) => a.possibleUnits - b.possibleUnits || (a.rawMaterialId < b.rawMaterialId ? -1 : 1));

  return { kind: 'limited', units, limitingMaterials, capacities };
}

export function isUnlimited(producibility: Producibility): producibility is UnlimitedProducibility {
  return producibility.kind === 'unlimited';
}

export function formatProducibility(producibility: Producibility): string {
  return producibility.kind === 'unlimited' ? 'unlimited' : String(producibility.units);
}
