/**
 * Leather bag catalog used across the domain tests.
 *
 *   Color (position 0): Black, Brown, Tan (inactive)
 *   Size  (position 1): Medium, Large
 *
 * Base BOM {brass_buckle: 1, thread: 3, magnetic_clasp: 1}; Black adds
 * leather and dye, Large adds a wide strap and multiplies thread by 1.3.
 */

import type { CatalogSnapshot, CatalogVariant, OptionSelection, UnitOfMeasure } from '../../catalog/types.js';
import { parseCatalogSnapshot, type CatalogSnapshotInput } from '../../../schemas/catalog.js';

export const OPTION_ATTRIBUTE: Record<string, string> = {
    'opt-black': 'attr-color',
    'opt-brown': 'attr-color',
    'opt-tan': 'attr-color',
    'opt-navy': 'attr-color',
    'opt-medium': 'attr-size',
    'opt-large': 'attr-size',
};

export function leatherBagInput(): CatalogSnapshotInput {
    return {
        product: {
            id: 'bag',
            name: 'Leather Bag',
            slug: 'leather-bag',
            skuPrefix: 'BAG',
            basePrice: '120.00',
            baseWeightGrams: 800,
        },
        attributes: [
            {
                id: 'attr-color',
                productId: 'bag',
                name: 'color',
                displayName: 'Color',
                type: 'color_swatch',
                position: 0,
                options: [
                    { id: 'opt-black', attributeId: 'attr-color', value: 'Black', displayValue: 'Black', position: 0 },
                    {
                        id: 'opt-brown',
                        attributeId: 'attr-color',
                        value: 'Brown',
                        displayValue: 'Brown',
                        priceModifier: '5.00',
                        weightModifierGrams: 20,
                        position: 1,
                    },
                    {
                        id: 'opt-tan',
                        attributeId: 'attr-color',
                        value: 'Tan',
                        displayValue: 'Tan',
                        position: 2,
                        isActive: false,
                    },
                ],
            },
            {
                id: 'attr-size',
                productId: 'bag',
                name: 'size',
                displayName: 'Size',
                type: 'button_group',
                position: 1,
                options: [
                    { id: 'opt-medium', attributeId: 'attr-size', value: 'Medium', displayValue: 'Medium', position: 0 },
                    {
                        id: 'opt-large',
                        attributeId: 'attr-size',
                        value: 'Large',
                        displayValue: 'Large',
                        priceModifier: '15.50',
                        weightModifierGrams: 150,
                        position: 1,
                    },
                ],
            },
        ],
        productBom: [
            { id: 'pb-1', productId: 'bag', rawMaterialId: 'brass_buckle', quantity: '1' },
            { id: 'pb-2', productId: 'bag', rawMaterialId: 'thread', quantity: '3', unitOfMeasure: 'm' },
            { id: 'pb-3', productId: 'bag', rawMaterialId: 'magnetic_clasp', quantity: '1' },
        ],
        optionBom: [
            { id: 'ob-1', optionId: 'opt-black', rawMaterialId: 'black_leather', quantity: '0.5' },
            { id: 'ob-2', optionId: 'opt-black', rawMaterialId: 'black_dye', quantity: '1' },
            { id: 'ob-3', optionId: 'opt-brown', rawMaterialId: 'brown_leather', quantity: '0.5' },
            { id: 'ob-4', optionId: 'opt-large', rawMaterialId: 'wide_strap', quantity: '1' },
        ],
        optionModifiers: [
            { id: 'om-1', optionId: 'opt-large', rawMaterialId: 'thread', kind: 'multiply', factor: '1.3', position: 0 },
        ],
        variantOverrides: [],
        materials: [
            material('brass_buckle', 'MAT-BUCKLE', '2.50', '50'),
            material('thread', 'MAT-THREAD', '0.10', '100', 'm'),
            material('magnetic_clasp', 'MAT-CLASP', '1.20', '30'),
            material('black_leather', 'MAT-LEA-BLK', '40.00', '10', 'm2'),
            material('black_dye', 'MAT-DYE-BLK', '3.00', '15'),
            material('wide_strap', 'MAT-STRAP-W', '6.00', '8'),
            material('brown_leather', 'MAT-LEA-BRN', '38.00', '4', 'm2'),
        ],
    };
}

function material(id: string, sku: string, costPerUnit: string, stockQuantity: string, unitOfMeasure: UnitOfMeasure = 'unit') {
    return {
        id,
        sku,
        name: id.replace('_', ' '),
        unitOfMeasure,
        costPerUnit,
        stockQuantity,
        lowStockThreshold: '5',
    };
}

export function leatherBag(edit?: (input: CatalogSnapshotInput) => void): CatalogSnapshot {
    const input = leatherBagInput();
    edit?.(input);
    return parseCatalogSnapshot(input);
}

export function selectionsFor(...optionIds: string[]): OptionSelection[] {
    return optionIds.map((optionId) => ({ attributeId: OPTION_ATTRIBUTE[optionId] ?? 'attr-unknown', optionId }));
}

export function bagVariant(id: string, ...optionIds: string[]): CatalogVariant {
    return {
        id,
        productId: 'bag',
        sku: `SKU-${id}`,
        selections: selectionsFor(...optionIds),
        price: null,
        weightGrams: null,
        stockQuantity: 0,
        isActive: true,
        position: 0,
    };
}

export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}
