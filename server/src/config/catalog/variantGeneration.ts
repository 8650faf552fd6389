/**
 * Variant Generation Configuration
 *
 * SKU construction settings. Values come from the environment so that a
 * deployment can widen the suffix range without a code change.
 *
 * TO CHANGE SKU SHAPE:
 * Set SKU_ABBREVIATION_LENGTH / SKU_MAX_SUFFIX. Existing SKUs are never
 * renamed; only newly created variants pick up the new shape.
 */

import type { GenerateVariantsOptions } from '@tessera/shared';
import { env } from '../env.js';

export const VARIANT_GENERATION_CONFIG: Required<GenerateVariantsOptions> = {
    abbreviationLength: env.SKU_ABBREVIATION_LENGTH,
    maxSkuSuffix: env.SKU_MAX_SUFFIX,
};
