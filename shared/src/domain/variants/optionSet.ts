/**
 * Option-set keys
 *
 * A variant's identity across regenerations is its set of (attribute, option)
 * pairs. The key sorts the pairs so it does not depend on selection order.
 * The default variant of a simple product has the empty key.
 */

import type { OptionSelection } from '../catalog/types.js';

export const DEFAULT_VARIANT_KEY = '';

export function optionSetKey(selections: readonly OptionSelection[]): string {
  return selections
    .map((s) => `${s.attributeId}:${s.optionId}`)
    .sort()
    .join('|');
}

export function isSameOptionSet(a: readonly OptionSelection[], b: readonly OptionSelection[]): boolean {
  return optionSetKey(a) === optionSetKey(b);
}
