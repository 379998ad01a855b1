/**
 * Elastic pricing
 */

import { describe, it, expect } from 'vitest';
import {
    computeUnitPrice,
    DEFAULT_PRICE_CONFIG,
    formatAmount,
    PricingEngine,
    type PriceCatalog,
    type PriceConfig,
} from '../src/services/PricingEngine.js';

const config: PriceConfig = { maxStock: 1000, minPrice: 1, elasticity: 1.2, currencySymbol: '$' };

describe('computeUnitPrice', () => {
    it('returns the base price at zero stock', () => {
        expect(computeUnitPrice(100, 0, config)).toBe(100);
    });

    it('prices a full vault at base / (1 + elasticity)', () => {
        // 100 / 2.2 = 45.45...
        expect(computeUnitPrice(100, 1000, config)).toBe(45);
    });

    it('truncates fractional prices', () => {
        // 100 / 1.6 = 62.5
        expect(computeUnitPrice(100, 500, config)).toBe(62);
    });

    it('never drops below minPrice', () => {
        expect(computeUnitPrice(2, 100_000, config)).toBe(1);
        expect(computeUnitPrice(50, 100_000, { ...config, minPrice: 5 })).toBe(5);
    });

    it('is weakly decreasing in stock', () => {
        let previous = Number.POSITIVE_INFINITY;
        for (let stock = 0; stock <= 3000; stock += 37) {
            const price = computeUnitPrice(250, stock, config);
            expect(price).not.toBeNull();
            if (price === null) continue;
            expect(price).toBeLessThanOrEqual(previous);
            previous = price;
        }
    });

    it('returns null for unpriced items', () => {
        expect(computeUnitPrice(null, 0, config)).toBeNull();
        expect(computeUnitPrice(undefined, 0, config)).toBeNull();
        expect(computeUnitPrice(0, 0, config)).toBeNull();
        expect(computeUnitPrice(-5, 0, config)).toBeNull();
    });

    it('treats negative or non-finite stock as empty', () => {
        expect(computeUnitPrice(100, -20, config)).toBe(100);
        expect(computeUnitPrice(100, Number.NaN, config)).toBe(100);
    });

    it('falls back to defaults for a broken config', () => {
        const broken: PriceConfig = { maxStock: 0, minPrice: -1, elasticity: -3, currencySymbol: '$' };
        expect(computeUnitPrice(100, 1000, broken)).toBe(computeUnitPrice(100, 1000, DEFAULT_PRICE_CONFIG));
    });

    it('ignores stock when elasticity is zero', () => {
        expect(computeUnitPrice(80, 900, { ...config, elasticity: 0 })).toBe(80);
    });
});

describe('PricingEngine', () => {
    const catalog: PriceCatalog = {
        basePriceOf: (item) => (item === 'widget' ? 100 : null),
        priceConfig: () => config,
    };
    const engine = new PricingEngine(catalog);

    it('quotes from the catalog base price', () => {
        expect(engine.price('widget', 1000)).toBe(45);
    });

    it('returns null for an item without a base price', () => {
        expect(engine.price('gadget', 0)).toBeNull();
    });
});

describe('formatAmount', () => {
    it('prefixes the currency symbol', () => {
        expect(formatAmount(30, { currencySymbol: '$' })).toBe('$30');
        expect(formatAmount(7, { currencySymbol: 'cr ' })).toBe('cr 7');
    });
});
