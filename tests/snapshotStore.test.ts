import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PersistenceError } from '../src/lib/errors/index.js';
import { LedgerStateSchema, TradeStateSchema } from '../src/persistence/schemas.js';
import { MemorySnapshotStore, SnapshotStore } from '../src/persistence/SnapshotStore.js';
import { createLedgerState } from '../src/services/ledger/LedgerStore.js';
import { createTradeState } from '../src/services/trade/ListingStore.js';

describe('SnapshotStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'exchange-snapshot-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('starts from the initial state when no file exists', async () => {
        const store = new SnapshotStore(path.join(dir, 'ledger.json'), LedgerStateSchema, createLedgerState);
        expect(await store.load()).toEqual(createLedgerState());
    });

    it('round-trips a saved state, creating the directory', async () => {
        const file = path.join(dir, 'nested', 'ledger.json');
        const store = new SnapshotStore(file, LedgerStateSchema, createLedgerState);
        const state = createLedgerState();
        state.accounts.alice = {
            user: 'alice',
            pinHash: 'hashed:1234',
            approved: true,
            balance: 42,
            createdAt: '2026-01-01T00:00:00.000Z',
        };
        await store.save(state);
        expect(await store.load()).toEqual(state);
    });

    it('fills defaults for fields an older snapshot lacks', async () => {
        const file = path.join(dir, 'ledger.json');
        await writeFile(file, JSON.stringify({ accounts: { bob: { user: 'bob', pinHash: 'h' } } }));
        const state = await new SnapshotStore(file, LedgerStateSchema, createLedgerState).load();

        expect(state.accounts.bob).toEqual({
            user: 'bob',
            pinHash: 'h',
            approved: false,
            balance: 0,
            createdAt: '1970-01-01T00:00:00.000Z',
        });
        expect(state.config).toEqual({
            vaultContainer: null,
            price: { maxStock: 1000, minPrice: 1, elasticity: 1.2, currencySymbol: '$' },
        });
        expect(state.transfers).toEqual({});
    });

    it('raises the listing counter past every stored id', async () => {
        const file = path.join(dir, 'trade.json');
        await writeFile(
            file,
            JSON.stringify({
                nextListingId: 2,
                listings: [{ id: 5, seller: 'bob', item: 'widget', unitPrice: 3, quantity: 1 }],
            })
        );
        const state = await new SnapshotStore(file, TradeStateSchema, createTradeState).load();
        expect(state.nextListingId).toBe(6);
    });

    it('treats unreadable or invalid snapshots as fatal', async () => {
        const file = path.join(dir, 'ledger.json');
        const store = new SnapshotStore(file, LedgerStateSchema, createLedgerState);

        await writeFile(file, '{ not json');
        await expect(store.load()).rejects.toBeInstanceOf(PersistenceError);

        await writeFile(file, JSON.stringify({ accounts: { bob: { user: 'bob', pinHash: 'h', balance: -3 } } }));
        await expect(store.load()).rejects.toThrow('failed validation');
    });

    it('leaves no temporary file behind', async () => {
        const file = path.join(dir, 'trade.json');
        await new SnapshotStore(file, TradeStateSchema, createTradeState).save(createTradeState());
        const text = await readFile(file, 'utf8');
        expect(JSON.parse(text)).toEqual(createTradeState());
    });
});

describe('MemorySnapshotStore', () => {
    it('keeps a detached copy and can fail on demand', async () => {
        const store = new MemorySnapshotStore(TradeStateSchema, createTradeState);
        const state = createTradeState();
        await store.save(state);
        state.nextListingId = 99;
        expect((await store.load()).nextListingId).toBe(1);

        store.failNextSave = true;
        await expect(store.save(state)).rejects.toBeInstanceOf(PersistenceError);
        expect(store.saveCount).toBe(1);
    });
});
