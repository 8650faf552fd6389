/**
 * Catalog Index - ordered, keyed view over a CatalogSnapshot
 *
 * Resolution order is load-bearing: attributes by position, options by
 * position (id breaks ties), modifiers and overrides by position (id breaks
 * ties). Everything that iterates the catalog goes through this index so the
 * ordering rule lives in one place.
 */

import { CATALOG_ERROR_CODES, CatalogError } from '../../errors/catalog.js';
import type {
  AttributeOption,
  CatalogSnapshot,
  OptionBomEntry,
  OptionBomModifier,
  ProductAttribute,
  RawMaterial,
  VariantBomOverride,
} from './types.js';

export interface CatalogIndex {
  snapshot: CatalogSnapshot;
  /** Attributes sorted by position, each with options sorted by position */
  attributes: ProductAttribute[];
  optionsById: ReadonlyMap<string, AttributeOption>;
  materialsById: ReadonlyMap<string, RawMaterial>;
  optionEntriesByOption: ReadonlyMap<string, OptionBomEntry[]>;
  modifiersByOption: ReadonlyMap<string, OptionBomModifier[]>;
  overridesByVariant: ReadonlyMap<string, VariantBomOverride[]>;
}

function byPositionThenId<T extends { position: number; id: string }>(a: T, b: T): number {
  if (a.position !== b.position) return a.position - b.position;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Build the ordered index for a snapshot.
 *
 * @throws CatalogError DUPLICATE_ATTRIBUTE_POSITION when two attributes share a position
 */
export function indexCatalog(snapshot: CatalogSnapshot): CatalogIndex {
  const seenPositions = new Map<number, string>();
  for (const attribute of snapshot.attributes) {
    const other = seenPositions.get(attribute.position);
    if (other !== undefined) {
      throw new CatalogError(CATALOG_ERROR_CODES.DUPLICATE_ATTRIBUTE_POSITION, {
        technicalMessage: `Attributes ${other} and ${attribute.id} both have position ${attribute.position}`,
        context: { productId: snapshot.product.id, position: attribute.position },
      });
    }
    seenPositions.set(attribute.position, attribute.id);
  }

  const attributes = [...snapshot.attributes]
    .sort(byPositionThenId)
    .map((attribute) => ({ ...attribute, options: [...attribute.options].sort(byPositionThenId) }));

  const optionsById = new Map<string, AttributeOption>();
  for (const attribute of attributes) {
    for (const option of attribute.options) {
      optionsById.set(option.id, option);
    }
  }

  const modifiersByOption = groupBy(snapshot.optionModifiers, (m) => m.optionId);
  for (const group of modifiersByOption.values()) group.sort(byPositionThenId);

  const overridesByVariant = groupBy(snapshot.variantOverrides, (o) => o.variantId);
  for (const group of overridesByVariant.values()) group.sort(byPositionThenId);

  return {
    snapshot,
    attributes,
    optionsById,
    materialsById: new Map(snapshot.materials.map((m) => [m.id, m])),
    optionEntriesByOption: groupBy(snapshot.optionBom, (e) => e.optionId),
    modifiersByOption,
    overridesByVariant,
  };
}

/**
 * Active options of an attribute, in position order
 */
export function activeOptions(attribute: ProductAttribute): AttributeOption[] {
  return attribute.options.filter((option) => option.isActive);
}

/**
 * The options a variant selects, in attribute position order.
 * Attributes the variant has no selection for are skipped, as are selections
 * whose option is missing from the snapshot (reported separately by callers).
 */
export function selectedOptionsInOrder(
  index: CatalogIndex,
  selections: readonly { attributeId: string; optionId: string }[]
): AttributeOption[] {
  const optionIdByAttribute = new Map(selections.map((s) => [s.attributeId, s.optionId]));
  const selected: AttributeOption[] = [];
  for (const attribute of index.attributes) {
    const optionId = optionIdByAttribute.get(attribute.id);
    if (optionId === undefined) continue;
    const option = index.optionsById.get(optionId);
    if (option && option.attributeId === attribute.id) {
      selected.push(option);
    }
  }
  return selected;
}

/**
 * Selections whose option (or attribute) no longer exists in the snapshot
 */
export function unresolvedSelections(
  index: CatalogIndex,
  selections: readonly { attributeId: string; optionId: string }[]
): string[] {
  return selections
    .filter((s) => index.optionsById.get(s.optionId)?.attributeId !== s.attributeId)
    .map((s) => s.optionId);
}
