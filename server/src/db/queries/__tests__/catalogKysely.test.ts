/**
 * Tests for the catalog row mappers
 */

import { modifierRowToInput, overrideRowToInput } from '../catalogKysely.js';

describe('modifierRowToInput', () => {
    const row = {
        id: 'om-1',
        optionId: 'opt-black',
        rawMaterialId: 'thread',
        modifierValue: '1.5',
        position: 0,
    };

    it.each([
        ['multiply' as const, 'factor'],
        ['add' as const, 'delta'],
        ['set' as const, 'quantity'],
    ])('maps a %s modifier value onto %s', (modifierType, field) => {
        expect(modifierRowToInput({ ...row, modifierType })).toEqual({
            id: 'om-1',
            optionId: 'opt-black',
            rawMaterialId: 'thread',
            position: 0,
            kind: modifierType,
            [field]: '1.5',
        });
    });
});

describe('overrideRowToInput', () => {
    const row = {
        id: 'vo-1',
        variantId: 'v-1',
        rawMaterialId: 'brass_buckle',
        replacesMaterialId: null,
        quantity: '2',
        position: 1,
    };
    const base = { id: 'vo-1', variantId: 'v-1', position: 1 };

    it('maps a replace onto source and target materials', () => {
        expect(
            overrideRowToInput({ ...row, overrideType: 'replace', replacesMaterialId: 'steel_buckle', quantity: null })
        ).toEqual({
            ...base,
            kind: 'replace',
            sourceMaterialId: 'steel_buckle',
            targetMaterialId: 'brass_buckle',
            quantity: null,
        });
    });

    it('drops the quantity of a remove', () => {
        expect(overrideRowToInput({ ...row, overrideType: 'remove' })).toEqual({
            ...base,
            kind: 'remove',
            rawMaterialId: 'brass_buckle',
        });
    });

    it.each(['add' as const, 'set_quantity' as const])('keeps the quantity of a %s', (overrideType) => {
        expect(overrideRowToInput({ ...row, overrideType })).toEqual({
            ...base,
            kind: overrideType,
            rawMaterialId: 'brass_buckle',
            quantity: '2',
        });
    });
});
