/**
 * Kysely table types
 *
 * Mirrors the tables created by db/migrations. NUMERIC columns are read as
 * strings (pg default) and written as strings or numbers; the zod schemas in
 * @tessera/shared turn them into decimal.js values.
 */

import type { ColumnType, Generated, Insertable, Selectable, Updateable } from 'kysely';

export type Numeric = ColumnType<string, string | number, string | number>;
export type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;
export type GeneratedNumeric = ColumnType<string, string | number | undefined, string | number>;

export interface ProductTable {
    id: Generated<string>;
    name: string;
    slug: string;
    skuPrefix: string | null;
    basePrice: Numeric;
    baseWeightGrams: Generated<number>;
    isActive: Generated<boolean>;
    createdAt: Timestamp;
    updatedAt: Timestamp;
}

export interface ProductAttributeTable {
    id: Generated<string>;
    productId: string;
    name: string;
    displayName: string;
    attributeType: Generated<string>;
    position: number;
    createdAt: Timestamp;
}

export interface AttributeOptionTable {
    id: Generated<string>;
    attributeId: string;
    value: string;
    displayValue: string;
    code: string | null;
    priceModifier: Numeric | null;
    weightModifierGrams: number | null;
    position: Generated<number>;
    isActive: Generated<boolean>;
    createdAt: Timestamp;
}

export interface ProductVariantTable {
    id: Generated<string>;
    productId: string;
    sku: string;
    price: Numeric | null;
    weightGrams: number | null;
    stockQuantity: Generated<number>;
    isActive: Generated<boolean>;
    position: Generated<number>;
    createdAt: Timestamp;
    updatedAt: Timestamp;
}

export interface VariantOptionValueTable {
    variantId: string;
    attributeId: string;
    optionId: string;
}

export interface RawMaterialTable {
    id: Generated<string>;
    sku: string;
    name: string;
    unitOfMeasure: Generated<string>;
    costPerUnit: GeneratedNumeric;
    stockQuantity: GeneratedNumeric;
    lowStockThreshold: GeneratedNumeric;
    isActive: Generated<boolean>;
    createdAt: Timestamp;
    updatedAt: Timestamp;
}

export interface ProductBomEntryTable {
    id: Generated<string>;
    productId: string;
    rawMaterialId: string;
    quantity: Numeric;
    unitOfMeasure: Generated<string>;
}

export interface OptionBomEntryTable {
    id: Generated<string>;
    optionId: string;
    rawMaterialId: string;
    quantity: Numeric;
}

export interface OptionBomModifierTable {
    id: Generated<string>;
    optionId: string;
    rawMaterialId: string;
    modifierType: 'multiply' | 'add' | 'set';
    modifierValue: Numeric;
    position: Generated<number>;
}

export interface VariantBomOverrideTable {
    id: Generated<string>;
    variantId: string;
    overrideType: 'replace' | 'add' | 'remove' | 'set_quantity';
    /** Target material (replace), or the material acted on (add/remove/set_quantity) */
    rawMaterialId: string;
    /** Source material of a replace */
    replacesMaterialId: string | null;
    quantity: Numeric | null;
    position: Generated<number>;
}

export interface StockMovementTable {
    id: Generated<string>;
    entityType: string;
    entityId: string;
    movementType: string;
    quantityChange: Numeric;
    quantityBefore: Numeric;
    quantityAfter: Numeric;
    referenceType: string | null;
    referenceId: string | null;
    unitCost: Numeric | null;
    notes: string | null;
    createdBy: string | null;
    createdAt: Timestamp;
}

export interface DB {
    Product: ProductTable;
    ProductAttribute: ProductAttributeTable;
    AttributeOption: AttributeOptionTable;
    ProductVariant: ProductVariantTable;
    VariantOptionValue: VariantOptionValueTable;
    RawMaterial: RawMaterialTable;
    ProductBomEntry: ProductBomEntryTable;
    OptionBomEntry: OptionBomEntryTable;
    OptionBomModifier: OptionBomModifierTable;
    VariantBomOverride: VariantBomOverrideTable;
    StockMovement: StockMovementTable;
}

export type StockMovementRow = Selectable<StockMovementTable>;
export type NewStockMovementRow = Insertable<StockMovementTable>;
export type NewProductVariantRow = Insertable<ProductVariantTable>;
export type ProductVariantUpdate = Updateable<ProductVariantTable>;
