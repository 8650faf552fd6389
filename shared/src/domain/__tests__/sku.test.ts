/**
 * Unit tests for SKU building and collision handling
 */

import {
    abbreviateOptionValue,
    allocateSku,
    buildBaseSku,
    normalizeSkuSegment,
    skuPrefixForProduct,
    skuSegmentForOption,
} from '../variants/sku.js';
import { isSameOptionSet, optionSetKey } from '../variants/optionSet.js';

describe('normalizeSkuSegment', () => {
    it('uppercases and strips everything but letters and digits', () => {
        expect(normalizeSkuSegment('x-large')).toBe('XLARGE');
        expect(normalizeSkuSegment(' 3/4 sleeve ')).toBe('34SLEEVE');
    });
});

describe('abbreviateOptionValue', () => {
    it('keeps the first three characters by default', () => {
        expect(abbreviateOptionValue('Black')).toBe('BLA');
        expect(abbreviateOptionValue('XL')).toBe('XL');
    });

    it('accepts a custom length', () => {
        expect(abbreviateOptionValue('x-large', 2)).toBe('XL');
    });
});

describe('skuSegmentForOption', () => {
    it('uses the explicit code when present', () => {
        expect(skuSegmentForOption({ code: 'nvy', value: 'Navy Blue', position: 0 })).toBe('NVY');
    });

    it('abbreviates the value when the code is empty', () => {
        expect(skuSegmentForOption({ code: '', value: 'Navy Blue', position: 0 })).toBe('NAV');
        expect(skuSegmentForOption({ code: null, value: 'Navy Blue', position: 0 })).toBe('NAV');
    });

    it('falls back to the option position for symbol-only values', () => {
        expect(skuSegmentForOption({ code: null, value: '½', position: 4 })).toBe('O4');
    });
});

describe('skuPrefixForProduct', () => {
    it('prefers the configured prefix', () => {
        expect(skuPrefixForProduct({ skuPrefix: 'TOTE', slug: 'canvas-tote' })).toBe('TOTE');
    });

    it('derives a prefix from the slug', () => {
        expect(skuPrefixForProduct({ skuPrefix: null, slug: 'canvas-tote' })).toBe('CANVASTOTE');
        expect(skuPrefixForProduct({ skuPrefix: '  ', slug: 'canvas-tote' })).toBe('CANVASTOTE');
    });
});

describe('buildBaseSku', () => {
    it('joins the prefix and segments with dashes', () => {
        expect(buildBaseSku('BAG', ['BLA', 'LAR'])).toBe('BAG-BLA-LAR');
        expect(buildBaseSku('BAG', [])).toBe('BAG');
    });
});

describe('allocateSku', () => {
    it('returns the base when it is free', () => {
        expect(allocateSku('BAG-BLA', new Set())).toBe('BAG-BLA');
    });

    it('picks the lowest unused suffix', () => {
        expect(allocateSku('BAG-BLA', new Set(['BAG-BLA', 'BAG-BLA-3']))).toBe('BAG-BLA-2');
        expect(allocateSku('BAG-BLA', new Set(['BAG-BLA', 'BAG-BLA-2']))).toBe('BAG-BLA-3');
    });

    it('returns null when the suffix range is exhausted', () => {
        expect(allocateSku('BAG-BLA', new Set(['BAG-BLA', 'BAG-BLA-2', 'BAG-BLA-3']), 3)).toBeNull();
    });
});

describe('optionSetKey', () => {
    it('does not depend on selection order', () => {
        const a = [
            { attributeId: 'attr-size', optionId: 'opt-large' },
            { attributeId: 'attr-color', optionId: 'opt-black' },
        ];
        const b = [...a].reverse();

        expect(optionSetKey(a)).toBe('attr-color:opt-black|attr-size:opt-large');
        expect(isSameOptionSet(a, b)).toBe(true);
    });

    it('is empty for the default variant', () => {
        expect(optionSetKey([])).toBe('');
    });
});
