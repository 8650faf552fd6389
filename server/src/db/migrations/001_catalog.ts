/**
 * Migration 001: Catalog and layered BOM
 *
 * Products, attributes and options, variants with their option values,
 * raw materials, and the three BOM layers (product entries, option entries
 * and modifiers, variant overrides).
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
    await db.schema
        .createTable('Product')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('name', 'text', col => col.notNull())
        .addColumn('slug', 'text', col => col.notNull().unique())
        .addColumn('skuPrefix', 'text')
        .addColumn('basePrice', 'numeric(12, 2)', col => col.notNull())
        .addColumn('baseWeightGrams', 'integer', col => col.notNull().defaultTo(0))
        .addColumn('isActive', 'boolean', col => col.notNull().defaultTo(true))
        .addColumn('createdAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addColumn('updatedAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('ProductAttribute')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('productId', 'uuid', col => col.notNull().references('Product.id').onDelete('cascade'))
        .addColumn('name', 'text', col => col.notNull())
        .addColumn('displayName', 'text', col => col.notNull())
        .addColumn('attributeType', 'text', col => col.notNull().defaultTo('select')
            .check(sql`"attributeType" IN ('select', 'color_swatch', 'button_group', 'image_swatch')`))
        .addColumn('position', 'integer', col => col.notNull())
        .addColumn('createdAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addUniqueConstraint('ProductAttribute_productId_name_key', ['productId', 'name'])
        .addUniqueConstraint('ProductAttribute_productId_position_key', ['productId', 'position'])
        .execute();

    await db.schema
        .createTable('AttributeOption')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('attributeId', 'uuid', col => col.notNull().references('ProductAttribute.id').onDelete('cascade'))
        .addColumn('value', 'text', col => col.notNull())
        .addColumn('displayValue', 'text', col => col.notNull())
        .addColumn('code', 'text')
        .addColumn('priceModifier', 'numeric(12, 2)')
        .addColumn('weightModifierGrams', 'integer')
        .addColumn('position', 'integer', col => col.notNull().defaultTo(0))
        .addColumn('isActive', 'boolean', col => col.notNull().defaultTo(true))
        .addColumn('createdAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addUniqueConstraint('AttributeOption_attributeId_value_key', ['attributeId', 'value'])
        .execute();

    await db.schema
        .createTable('ProductVariant')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('productId', 'uuid', col => col.notNull().references('Product.id').onDelete('cascade'))
        .addColumn('sku', 'text', col => col.notNull())
        .addColumn('price', 'numeric(12, 2)')
        .addColumn('weightGrams', 'integer')
        .addColumn('stockQuantity', 'integer', col => col.notNull().defaultTo(0).check(sql`"stockQuantity" >= 0`))
        .addColumn('isActive', 'boolean', col => col.notNull().defaultTo(true))
        .addColumn('position', 'integer', col => col.notNull().defaultTo(0))
        .addColumn('createdAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addColumn('updatedAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        // SKUs are unique within a product; two products may share a prefix
        .addUniqueConstraint('ProductVariant_productId_sku_key', ['productId', 'sku'])
        .execute();

    await db.schema
        .createTable('VariantOptionValue')
        .addColumn('variantId', 'uuid', col => col.notNull().references('ProductVariant.id').onDelete('cascade'))
        .addColumn('attributeId', 'uuid', col => col.notNull().references('ProductAttribute.id').onDelete('cascade'))
        .addColumn('optionId', 'uuid', col => col.notNull().references('AttributeOption.id').onDelete('cascade'))
        .addPrimaryKeyConstraint('VariantOptionValue_pkey', ['variantId', 'attributeId'])
        .execute();

    await db.schema
        .createTable('RawMaterial')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('sku', 'text', col => col.notNull().unique())
        .addColumn('name', 'text', col => col.notNull())
        .addColumn('unitOfMeasure', 'text', col => col.notNull().defaultTo('unit')
            .check(sql`"unitOfMeasure" IN ('unit', 'kg', 'g', 'm', 'm2', 'm3', 'l', 'ml')`))
        .addColumn('costPerUnit', 'numeric(12, 4)', col => col.notNull().defaultTo(0))
        .addColumn('stockQuantity', 'numeric(12, 4)', col => col.notNull().defaultTo(0))
        .addColumn('lowStockThreshold', 'numeric(12, 4)', col => col.notNull().defaultTo(0))
        .addColumn('isActive', 'boolean', col => col.notNull().defaultTo(true))
        .addColumn('createdAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .addColumn('updatedAt', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
        .execute();

    // Layer 1
    await db.schema
        .createTable('ProductBomEntry')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('productId', 'uuid', col => col.notNull().references('Product.id').onDelete('cascade'))
        .addColumn('rawMaterialId', 'uuid', col => col.notNull().references('RawMaterial.id').onDelete('restrict'))
        .addColumn('quantity', 'numeric(12, 4)', col => col.notNull().check(sql`quantity >= 0`))
        .addColumn('unitOfMeasure', 'text', col => col.notNull().defaultTo('unit'))
        .execute();

    // Layer 2a
    await db.schema
        .createTable('OptionBomEntry')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('optionId', 'uuid', col => col.notNull().references('AttributeOption.id').onDelete('cascade'))
        .addColumn('rawMaterialId', 'uuid', col => col.notNull().references('RawMaterial.id').onDelete('restrict'))
        .addColumn('quantity', 'numeric(12, 4)', col => col.notNull())
        .execute();

    // Layer 2b
    await db.schema
        .createTable('OptionBomModifier')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('optionId', 'uuid', col => col.notNull().references('AttributeOption.id').onDelete('cascade'))
        .addColumn('rawMaterialId', 'uuid', col => col.notNull().references('RawMaterial.id').onDelete('restrict'))
        .addColumn('modifierType', 'text', col => col.notNull()
            .check(sql`"modifierType" IN ('multiply', 'add', 'set')`))
        .addColumn('modifierValue', 'numeric(12, 4)', col => col.notNull())
        .addColumn('position', 'integer', col => col.notNull().defaultTo(0))
        .execute();

    // Layer 3
    await db.schema
        .createTable('VariantBomOverride')
        .addColumn('id', 'uuid', col => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
        .addColumn('variantId', 'uuid', col => col.notNull().references('ProductVariant.id').onDelete('cascade'))
        .addColumn('overrideType', 'text', col => col.notNull()
            .check(sql`"overrideType" IN ('replace', 'add', 'remove', 'set_quantity')`))
        .addColumn('rawMaterialId', 'uuid', col => col.notNull().references('RawMaterial.id').onDelete('restrict'))
        .addColumn('replacesMaterialId', 'uuid', col => col.references('RawMaterial.id').onDelete('restrict'))
        .addColumn('quantity', 'numeric(12, 4)')
        .addColumn('position', 'integer', col => col.notNull().defaultTo(0))
        // Only a replace may leave quantity empty (it then inherits the source's)
        .addCheckConstraint(
            'VariantBomOverride_quantity_check',
            sql`"overrideType" NOT IN ('add', 'set_quantity') OR "quantity" IS NOT NULL`
        )
        .addCheckConstraint(
            'VariantBomOverride_replacesMaterialId_check',
            sql`"overrideType" <> 'replace' OR "replacesMaterialId" IS NOT NULL`
        )
        .execute();

    await db.schema.createIndex('ProductAttribute_productId_idx').on('ProductAttribute').column('productId').execute();
    await db.schema.createIndex('AttributeOption_attributeId_idx').on('AttributeOption').column('attributeId').execute();
    await db.schema.createIndex('ProductVariant_productId_idx').on('ProductVariant').column('productId').execute();
    await db.schema.createIndex('VariantOptionValue_optionId_idx').on('VariantOptionValue').column('optionId').execute();
    await db.schema.createIndex('ProductBomEntry_productId_idx').on('ProductBomEntry').column('productId').execute();
    await db.schema.createIndex('OptionBomEntry_optionId_idx').on('OptionBomEntry').column('optionId').execute();
    await db.schema.createIndex('OptionBomModifier_optionId_idx').on('OptionBomModifier').column('optionId').execute();
    await db.schema.createIndex('VariantBomOverride_variantId_idx').on('VariantBomOverride').column('variantId').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    for (const table of [
        'VariantBomOverride',
        'OptionBomModifier',
        'OptionBomEntry',
        'ProductBomEntry',
        'RawMaterial',
        'VariantOptionValue',
        'ProductVariant',
        'AttributeOption',
        'ProductAttribute',
        'Product',
    ]) {
        await db.schema.dropTable(table).ifExists().execute();
    }
}
