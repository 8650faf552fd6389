/**
 * Kysely Catalog Queries
 *
 * Loads a product's catalog snapshot (attributes, options, the three BOM
 * layers and referenced raw materials) and its variants.
 *
 * All public exports are validated against Zod schemas to catch schema drift.
 */

import {
    parseCatalogSnapshot,
    parseCatalogVariants,
    type CatalogSnapshot,
    type CatalogVariant,
} from '@tessera/shared';
import type { KyselyDB } from '../index.js';
import type { Selectable } from 'kysely';
import type {
    AttributeOptionTable,
    OptionBomEntryTable,
    OptionBomModifierTable,
    RawMaterialTable,
    VariantBomOverrideTable,
} from '../schema.js';

// ============================================
// ROW MAPPERS
// ============================================

type OptionRow = Selectable<AttributeOptionTable>;
type OptionBomRow = Selectable<OptionBomEntryTable>;
type ModifierRow = Selectable<OptionBomModifierTable>;
type OverrideRow = Selectable<VariantBomOverrideTable>;
type MaterialRow = Selectable<RawMaterialTable>;

/**
 * modifierType/modifierValue columns → tagged modifier object
 */
export function modifierRowToInput(row: ModifierRow): Record<string, unknown> {
    const base = {
        id: row.id,
        optionId: row.optionId,
        rawMaterialId: row.rawMaterialId,
        position: row.position,
        kind: row.modifierType,
    };
    switch (row.modifierType) {
        case 'multiply':
            return { ...base, factor: row.modifierValue };
        case 'add':
            return { ...base, delta: row.modifierValue };
        case 'set':
            return { ...base, quantity: row.modifierValue };
        default: {
            const exhaustive: never = row.modifierType;
            throw new Error(`Unhandled modifierType: ${JSON.stringify(exhaustive)}`);
        }
    }
}

/**
 * overrideType/rawMaterialId/replacesMaterialId columns → tagged override object
 */
export function overrideRowToInput(row: OverrideRow): Record<string, unknown> {
    const base = {
        id: row.id,
        variantId: row.variantId,
        position: row.position,
        kind: row.overrideType,
    };
    switch (row.overrideType) {
        case 'replace':
            return {
                ...base,
                sourceMaterialId: row.replacesMaterialId,
                targetMaterialId: row.rawMaterialId,
                quantity: row.quantity,
            };
        case 'remove':
            return { ...base, rawMaterialId: row.rawMaterialId };
        case 'add':
        case 'set_quantity':
            return { ...base, rawMaterialId: row.rawMaterialId, quantity: row.quantity };
        default: {
            const exhaustive: never = row.overrideType;
            throw new Error(`Unhandled overrideType: ${JSON.stringify(exhaustive)}`);
        }
    }
}

function referencedMaterialIds(
    productBom: { rawMaterialId: string }[],
    optionBom: { rawMaterialId: string }[],
    modifiers: ModifierRow[],
    overrides: OverrideRow[]
): string[] {
    const ids = new Set<string>();
    for (const row of [...productBom, ...optionBom, ...modifiers]) ids.add(row.rawMaterialId);
    for (const row of overrides) {
        ids.add(row.rawMaterialId);
        if (row.replacesMaterialId) ids.add(row.replacesMaterialId);
    }
    return [...ids];
}

// ============================================
// QUERIES
// ============================================

/**
 * Load the catalog snapshot of one product, or null when it does not exist
 */
export async function loadCatalogSnapshotKysely(
    db: KyselyDB,
    productId: string
): Promise<CatalogSnapshot | null> {
    const product = await db
        .selectFrom('Product')
        .select(['id', 'name', 'slug', 'skuPrefix', 'basePrice', 'baseWeightGrams'])
        .where('id', '=', productId)
        .executeTakeFirst();

    if (!product) return null;

    const [attributes, productBom, overrides] = await Promise.all([
        db
            .selectFrom('ProductAttribute')
            .select(['id', 'productId', 'name', 'displayName', 'attributeType', 'position'])
            .where('productId', '=', productId)
            .orderBy('position', 'asc')
            .execute(),
        db
            .selectFrom('ProductBomEntry')
            .select(['id', 'productId', 'rawMaterialId', 'quantity', 'unitOfMeasure'])
            .where('productId', '=', productId)
            .orderBy('id', 'asc')
            .execute(),
        db
            .selectFrom('VariantBomOverride')
            .innerJoin('ProductVariant', 'ProductVariant.id', 'VariantBomOverride.variantId')
            .selectAll('VariantBomOverride')
            .where('ProductVariant.productId', '=', productId)
            .orderBy('VariantBomOverride.variantId', 'asc')
            .orderBy('VariantBomOverride.position', 'asc')
            .execute(),
    ]);

    const attributeIds = attributes.map((a) => a.id);
    let options: OptionRow[] = [];
    if (attributeIds.length > 0) {
        options = await db
            .selectFrom('AttributeOption')
            .selectAll()
            .where('attributeId', 'in', attributeIds)
            .orderBy('position', 'asc')
            .execute();
    }

    const optionIds = options.map((o) => o.id);
    let optionBom: OptionBomRow[] = [];
    let modifiers: ModifierRow[] = [];
    if (optionIds.length > 0) {
        [optionBom, modifiers] = await Promise.all([
            db
                .selectFrom('OptionBomEntry')
                .selectAll()
                .where('optionId', 'in', optionIds)
                .orderBy('id', 'asc')
                .execute(),
            db
                .selectFrom('OptionBomModifier')
                .selectAll()
                .where('optionId', 'in', optionIds)
                .orderBy('position', 'asc')
                .execute(),
        ]);
    }

    const materialIds = referencedMaterialIds(productBom, optionBom, modifiers, overrides);
    let materials: MaterialRow[] = [];
    if (materialIds.length > 0) {
        materials = await db
            .selectFrom('RawMaterial')
            .selectAll()
            .where('id', 'in', materialIds)
            .execute();
    }

    // Validate output against Zod schema
    return parseCatalogSnapshot({
        product,
        attributes: attributes.map((a) => ({
            id: a.id,
            productId: a.productId,
            name: a.name,
            displayName: a.displayName,
            type: a.attributeType,
            position: a.position,
            options: options.filter((o) => o.attributeId === a.id),
        })),
        productBom,
        optionBom,
        optionModifiers: modifiers.map(modifierRowToInput),
        variantOverrides: overrides.map(overrideRowToInput),
        materials,
    });
}

async function loadVariants(
    db: KyselyDB,
    filter: { productId: string } | { variantId: string }
): Promise<CatalogVariant[]> {
    let query = db
        .selectFrom('ProductVariant')
        .select(['id', 'productId', 'sku', 'price', 'weightGrams', 'stockQuantity', 'isActive', 'position']);

    query = 'productId' in filter
        ? query.where('productId', '=', filter.productId)
        : query.where('id', '=', filter.variantId);

    const variants = await query.orderBy('position', 'asc').orderBy('id', 'asc').execute();
    if (variants.length === 0) return [];

    const selections = await db
        .selectFrom('VariantOptionValue')
        .innerJoin('ProductAttribute', 'ProductAttribute.id', 'VariantOptionValue.attributeId')
        .select([
            'VariantOptionValue.variantId',
            'VariantOptionValue.attributeId',
            'VariantOptionValue.optionId',
        ])
        .where('VariantOptionValue.variantId', 'in', variants.map((v) => v.id))
        .orderBy('ProductAttribute.position', 'asc')
        .execute();

    // Validate output against Zod schema
    return parseCatalogVariants(
        variants.map((v) => ({
            ...v,
            selections: selections
                .filter((s) => s.variantId === v.id)
                .map((s) => ({ attributeId: s.attributeId, optionId: s.optionId })),
        }))
    );
}

/**
 * All variants of a product, active and inactive, in position order
 */
export async function listProductVariantsKysely(db: KyselyDB, productId: string): Promise<CatalogVariant[]> {
    return loadVariants(db, { productId });
}

export async function findVariantKysely(db: KyselyDB, variantId: string): Promise<CatalogVariant | null> {
    const [variant] = await loadVariants(db, { variantId });
    return variant ?? null;
}
