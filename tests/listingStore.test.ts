import { describe, it, expect, beforeEach } from 'vitest';
import type { MemoryContainer } from '../src/inventory/MemoryContainer.js';
import { createTradeState, ListingStore, SequenceGenerator } from '../src/services/trade/ListingStore.js';
import { createTradeFixture, fill, fixedClock, type TradeFixture } from './test-utils.js';

describe('ListingStore', () => {
    let fx: TradeFixture;
    let bobChest: MemoryContainer;

    beforeEach(async () => {
        fx = await createTradeFixture();
        bobChest = fill(fx.directory.create('bob-chest'), [
            [1, 'widget', 10],
            [2, 'bolt', 8],
        ]);
    });

    it('creates empty listings with increasing ids', async () => {
        const first = await fx.listings.create('bob', 'widget', 10);
        const second = await fx.listings.create('bob', 'bolt', 2);
        expect(first.success && first.data).toMatchObject({ id: 1, seller: 'bob', item: 'widget', unitPrice: 10, quantity: 0 });
        expect(second.success && second.data.id).toBe(2);
    });

    it.each([0, -1, 2.5])('refuses price %s', async (price) => {
        const result = await fx.listings.create('bob', 'widget', price);
        expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
    });

    describe('addStock', () => {
        beforeEach(async () => {
            await fx.listings.create('bob', 'widget', 10);
        });

        it('raises quantity by the units moved into the vault', async () => {
            const result = await fx.listings.addStock(1, 'bob', 'widget', 6, 'bob-chest');
            expect(result).toEqual({
                success: true,
                data: { listingId: 1, moved: 6, quantity: 6, shortfall: null, message: 'Deposited 6 (new qty 6)' },
            });
            expect(fx.vault.countOf('widget')).toBe(6);
            expect(bobChest.countOf('widget')).toBe(4);
        });

        it('counts a partial move', async () => {
            await fx.listings.addStock(1, 'bob', 'widget', 6, 'bob-chest');
            const result = await fx.listings.addStock(1, 'bob', 'widget', 10, 'bob-chest');
            expect(result.success && result.data).toMatchObject({ moved: 4, quantity: 10, shortfall: 'insufficient_stock' });
        });

        it('leaves quantity alone when nothing moves', async () => {
            fx.directory.create('empty-chest');
            const result = await fx.listings.addStock(1, 'bob', 'widget', 3, 'empty-chest');
            expect(!result.success && result.error.code).toBe('DELIVERY_FAILED');
            expect(fx.listings.get(1)?.quantity).toBe(0);
        });

        it('only lets the seller stock their own listing with its item', async () => {
            const stranger = await fx.listings.addStock(1, 'eve', 'widget', 1, 'bob-chest');
            const wrongItem = await fx.listings.addStock(1, 'bob', 'bolt', 1, 'bob-chest');
            const missing = await fx.listings.addStock(9, 'bob', 'widget', 1, 'bob-chest');
            expect(!stranger.success && stranger.error.code).toBe('NOT_LISTING_OWNER');
            expect(!wrongItem.success && wrongItem.error.code).toBe('ITEM_MISMATCH');
            expect(!missing.success && missing.error.code).toBe('NOT_FOUND');
            expect(bobChest.countOf('widget')).toBe(10);
        });

        it('refuses the vault itself as the source', async () => {
            fill(fx.vault, [[1, 'widget', 5]]);
            const result = await fx.listings.addStock(1, 'bob', 'widget', 5, 'trade-vault');
            expect(result).toEqual({
                success: false,
                error: {
                    code: 'VALIDATION_ERROR',
                    message: 'Source cannot be the vault',
                    details: { listingId: 1, source: 'trade-vault' },
                },
            });
            expect(fx.listings.get(1)?.quantity).toBe(0);
            expect(fx.vault.countOf('widget')).toBe(5);
        });

        it('needs a vault', async () => {
            const bare = new ListingStore(createTradeState(), { mover: fx.mover, audit: fx.audit, clock: fixedClock });
            await bare.create('bob', 'widget', 10);
            const result = await bare.addStock(1, 'bob', 'widget', 1, 'bob-chest');
            expect(!result.success && result.error.code).toBe('VAULT_NOT_CONFIGURED');
        });
    });

    it('lists available stock by item, then cheapest first', async () => {
        await fx.listings.create('bob', 'widget', 10);
        await fx.listings.create('bob', 'bolt', 3);
        await fx.listings.create('bob', 'widget', 7);
        await fx.listings.create('bob', 'widget', 1);
        await fx.listings.addStock(1, 'bob', 'widget', 2, 'bob-chest');
        await fx.listings.addStock(2, 'bob', 'bolt', 2, 'bob-chest');
        await fx.listings.addStock(3, 'bob', 'widget', 2, 'bob-chest');

        expect(fx.listings.listAvailable().map((l) => l.id)).toEqual([2, 3, 1]);
        expect(fx.listings.list().map((l) => l.id)).toEqual([1, 2, 3, 4]);
    });

    it('never decrements below zero', async () => {
        await fx.listings.create('bob', 'widget', 10);
        await fx.listings.addStock(1, 'bob', 'widget', 2, 'bob-chest');
        expect(fx.listings.recordDelivery(1, 5)?.quantity).toBe(0);
        expect(fx.listings.recordDelivery(42, 1)).toBeNull();
    });
});

describe('SequenceGenerator', () => {
    it('hands out ids from the persisted counter', () => {
        const state = { nextListingId: 7 };
        const sequence = new SequenceGenerator(state);
        expect(sequence.peek()).toBe(7);
        expect(sequence.next()).toBe(7);
        expect(sequence.next()).toBe(8);
        expect(state.nextListingId).toBe(9);
    });
});
