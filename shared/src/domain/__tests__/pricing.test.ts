/**
 * Unit tests for effective price and weight resolution
 */

import { Decimal } from '../decimal.js';
import {
    resolveEffectivePrice,
    resolveEffectiveWeight,
    resolveVariantPricing,
} from '../pricing/resolver.js';
import { bagVariant, leatherBag } from './fixtures/leatherBag.js';

describe('resolveEffectivePrice', () => {
    it('adds option modifiers to the base price', () => {
        const price = resolveEffectivePrice(bagVariant('v1', 'opt-brown', 'opt-large'), leatherBag());

        expect(price.source).toBe('computed');
        expect(price.amount.toString()).toBe('140.5');
        expect(price.display).toBe('140.50');
        expect(price.modifiers.map((m) => [m.optionId, m.amount.toString()])).toEqual([
            ['opt-brown', '5'],
            ['opt-large', '15.5'],
        ]);
    });

    it('skips options without a price modifier', () => {
        const price = resolveEffectivePrice(bagVariant('v1', 'opt-black', 'opt-medium'), leatherBag());

        expect(price.display).toBe('120.00');
        expect(price.modifiers).toEqual([]);
    });

    it('uses the variant price and ignores every modifier', () => {
        const variant = { ...bagVariant('v1', 'opt-brown', 'opt-large'), price: new Decimal('99.5') };

        const price = resolveEffectivePrice(variant, leatherBag());

        expect(price.source).toBe('override');
        expect(price.display).toBe('99.50');
        expect(price.modifiers).toEqual([]);
    });

    it('rounds half-up only for display', () => {
        const snapshot = leatherBag((input) => {
            input.product.basePrice = '10.00';
            const large = input.attributes?.[1]?.options?.[1];
            if (large) large.priceModifier = '0.005';
        });

        const price = resolveEffectivePrice(bagVariant('v1', 'opt-black', 'opt-large'), snapshot);

        expect(price.amount.toString()).toBe('10.005');
        expect(price.rounded.toString()).toBe('10.01');
        expect(price.display).toBe('10.01');
    });

    it('does not lose precision over many small modifiers', () => {
        const snapshot = leatherBag((input) => {
            input.product.basePrice = '0.1';
            const black = input.attributes?.[0]?.options?.[0];
            if (black) black.priceModifier = '0.2';
            const medium = input.attributes?.[1]?.options?.[0];
            if (medium) medium.priceModifier = '0.0001';
        });

        const price = resolveEffectivePrice(bagVariant('v1', 'opt-black', 'opt-medium'), snapshot);

        expect(price.amount.toString()).toBe('0.3001');
        expect(price.display).toBe('0.30');
    });

    it('reports selections that no longer exist and prices without them', () => {
        const variant = bagVariant('v1', 'opt-large');
        variant.selections.push({ attributeId: 'attr-color', optionId: 'opt-gone' });

        const price = resolveEffectivePrice(variant, leatherBag());

        expect(price.unresolvedOptionIds).toEqual(['opt-gone']);
        expect(price.display).toBe('135.50');
    });
});

describe('resolveEffectiveWeight', () => {
    it('adds option weight modifiers to the base weight', () => {
        const weight = resolveEffectiveWeight(bagVariant('v1', 'opt-brown', 'opt-large'), leatherBag());

        expect(weight.grams).toBe(970);
        expect(weight.source).toBe('computed');
        expect(weight.modifiers.map((m) => m.grams)).toEqual([20, 150]);
    });

    it('uses the variant weight when set', () => {
        const variant = { ...bagVariant('v1', 'opt-brown', 'opt-large'), weightGrams: 500 };

        expect(resolveEffectiveWeight(variant, leatherBag())).toEqual({
            grams: 500,
            source: 'override',
            baseGrams: 800,
            modifiers: [],
            unresolvedOptionIds: [],
        });
    });
});

describe('resolveVariantPricing', () => {
    it('resolves price and weight together', () => {
        const pricing = resolveVariantPricing(bagVariant('v1', 'opt-black', 'opt-large'), leatherBag());

        expect(pricing.price.display).toBe('135.50');
        expect(pricing.weight.grams).toBe(950);
    });
});
