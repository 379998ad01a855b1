/**
 * LEDGER STORE TESTS
 *
 * - balances stay non-negative integers
 * - transfers conserve the total and are all-or-nothing
 * - a transactionId applies at most once; a voided id never applies
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { AuditLog } from '../src/services/AuditLog.js';
import type { LedgerStore } from '../src/services/ledger/LedgerStore.js';
import { createTestLedger, memoryAudit, seedAccounts } from './test-utils.js';

describe('LedgerStore', () => {
    let audit: AuditLog;
    let store: LedgerStore;

    beforeEach(async () => {
        audit = memoryAudit();
        store = createTestLedger(audit);
        await seedAccounts(store, [
            { user: 'alice', balance: 100 },
            { user: 'bob', balance: 0 },
        ]);
    });

    describe('accounts', () => {
        it('creates unapproved accounts with zero balance', async () => {
            const result = await store.register('carol', '9999');
            expect(result).toEqual({ success: true, data: { user: 'carol', approved: false, balance: 0 } });
        });

        it('refuses a duplicate user', async () => {
            const result = await store.register('alice', '0000');
            expect(!result.success && result.error.code).toBe('ALREADY_EXISTS');
        });

        it('refuses blank user or pin', async () => {
            const noUser = await store.register('  ', '1234');
            const noPin = await store.register('dave', '');
            expect(!noUser.success && noUser.error.code).toBe('VALIDATION_ERROR');
            expect(!noPin.success && noPin.error.code).toBe('VALIDATION_ERROR');
        });

        it('never stores the plain pin', () => {
            const state = store.snapshot();
            expect(state.accounts.alice.pinHash).toBe('hashed:1234');
        });

        it('authenticates approved accounts only', async () => {
            await store.register('carol', '9999');

            const good = await store.authenticate('alice', '1234');
            expect(good).toEqual({ success: true, data: { user: 'alice', approved: true, balance: 100 } });

            const wrongPin = await store.authenticate('alice', '0000');
            const pending = await store.authenticate('carol', '9999');
            const missing = await store.authenticate('nobody', '1234');
            expect(!wrongPin.success && wrongPin.error.code).toBe('BAD_CREDENTIAL');
            expect(!pending.success && pending.error.code).toBe('NOT_APPROVED');
            expect(!missing.success && missing.error.code).toBe('NOT_FOUND');
        });

        it('treats built-in property names as ordinary users', async () => {
            expect(store.getAccount('toString')).toEqual({
                success: false,
                error: { code: 'NOT_FOUND', message: 'No account', details: { user: 'toString' } },
            });

            const created = await store.register('constructor', '4321');
            expect(created).toEqual({ success: true, data: { user: 'constructor', approved: false, balance: 0 } });
            await store.approve('constructor');
            const login = await store.authenticate('constructor', '4321');
            expect(login.success && login.data.user).toBe('constructor');
            expect(store.getTransfer('hasOwnProperty')).toBeNull();
        });

        it('reserves __proto__ as a user name', async () => {
            const result = await store.register('__proto__', '1234');
            expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
            expect(Object.hasOwn(store.snapshot().accounts, '__proto__')).toBe(false);
        });

        it('approves idempotently and audits once', async () => {
            await store.register('carol', '9999');
            await store.approve('carol');
            await store.approve('carol');
            const approvals = audit.recent().filter((r) => r.event === 'account_approved' && r.user === 'carol');
            expect(approvals).toHaveLength(1);
        });

        it('clamps an adjustment at zero', async () => {
            const result = await store.adjust('alice', -250);
            expect(result.success && result.data.balance).toBe(0);
            expect(audit.recent(1)[0]).toMatchObject({ event: 'account_adjusted', before: 100, balance: 0 });
        });

        it('refuses fractional adjustments', async () => {
            const result = await store.adjust('alice', 1.5);
            expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
            expect(store.getAccount('alice')).toEqual({
                success: true,
                data: { user: 'alice', approved: true, balance: 100 },
            });
        });

        it('lists accounts sorted by user', async () => {
            await store.register('aaron', '1');
            expect(store.listAccounts().map((a) => a.user)).toEqual(['aaron', 'alice', 'bob']);
        });
    });

    describe('transfer', () => {
        it('moves funds between approved accounts', async () => {
            const result = await store.transfer({ from: 'alice', to: 'bob', amount: 40 });
            expect(result).toEqual({
                success: true,
                data: {
                    transactionId: null,
                    from: 'alice',
                    to: 'bob',
                    amount: 40,
                    fromBalance: 60,
                    toBalance: 40,
                    replayed: false,
                },
            });
            expect(store.totalBalance()).toBe(100);
        });

        it('refuses an overdraft without touching balances', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 40 });
            const result = await store.transfer({ from: 'alice', to: 'bob', amount: 1000 });
            expect(!result.success && result.error.code).toBe('INSUFFICIENT_FUNDS');
            expect(store.snapshot().accounts.alice.balance).toBe(60);
            expect(store.snapshot().accounts.bob.balance).toBe(40);
        });

        it.each([0, -5, 2.5, Number.NaN])('refuses amount %s', async (amount) => {
            const result = await store.transfer({ from: 'alice', to: 'bob', amount });
            expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
        });

        it('refuses unknown and unapproved parties', async () => {
            await store.register('carol', '9999');
            const unknown = await store.transfer({ from: 'alice', to: 'nobody', amount: 1 });
            const pending = await store.transfer({ from: 'alice', to: 'carol', amount: 1 });
            expect(!unknown.success && unknown.error.code).toBe('UNKNOWN_ACCOUNT');
            expect(!pending.success && pending.error.code).toBe('NOT_APPROVED');
            expect(store.totalBalance()).toBe(100);
        });

        it('allows paying yourself without changing the balance', async () => {
            const result = await store.transfer({ from: 'alice', to: 'alice', amount: 30 });
            expect(result.success && result.data.fromBalance).toBe(100);
        });

        it('applies a transactionId once and replays the receipt', async () => {
            const first = await store.transfer({ from: 'alice', to: 'bob', amount: 25, transactionId: 'tx-1' });
            const again = await store.transfer({ from: 'alice', to: 'bob', amount: 25, transactionId: 'tx-1' });

            expect(first.success && first.data.replayed).toBe(false);
            expect(again).toEqual({
                success: true,
                data: {
                    transactionId: 'tx-1',
                    from: 'alice',
                    to: 'bob',
                    amount: 25,
                    fromBalance: 75,
                    toBalance: 25,
                    replayed: true,
                },
            });
            expect(audit.recent().filter((r) => r.event === 'transfer_applied')).toHaveLength(1);
        });

        it('refuses a transactionId reused with different parameters', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 25, transactionId: 'tx-1' });
            const result = await store.transfer({ from: 'alice', to: 'bob', amount: 26, transactionId: 'tx-1' });
            expect(!result.success && result.error.code).toBe('IDEMPOTENCY_CONFLICT');
            expect(store.snapshot().accounts.alice.balance).toBe(75);
        });

        it('does not record a transactionId for a refused transfer', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 500, transactionId: 'tx-big' });
            expect(store.getTransfer('tx-big')).toBeNull();
        });

        it('refuses an empty transactionId', async () => {
            const result = await store.transfer({ from: 'alice', to: 'bob', amount: 1, transactionId: ' ' });
            expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
        });
    });

    describe('voidTransfer', () => {
        it('refunds an applied transfer', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 30, transactionId: 'tx-2' });
            const result = await store.voidTransfer('tx-2');

            expect(result).toEqual({ success: true, data: { transactionId: 'tx-2', outcome: 'refunded', amount: 30 } });
            expect(store.snapshot().accounts.alice.balance).toBe(100);
            expect(store.snapshot().accounts.bob.balance).toBe(0);
            expect(store.getTransfer('tx-2')?.status).toBe('refunded');
        });

        it('tombstones an unseen id so a late transfer cannot land', async () => {
            const voided = await store.voidTransfer('tx-late');
            expect(voided.success && voided.data.outcome).toBe('tombstoned');

            const late = await store.transfer({ from: 'alice', to: 'bob', amount: 30, transactionId: 'tx-late' });
            expect(!late.success && late.error.code).toBe('TRANSFER_VOIDED');
            expect(store.snapshot().accounts.alice.balance).toBe(100);
        });

        it('is idempotent', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 30, transactionId: 'tx-3' });
            await store.voidTransfer('tx-3');
            await store.voidTransfer('tx-4');

            const refundedAgain = await store.voidTransfer('tx-3');
            const voidedAgain = await store.voidTransfer('tx-4');
            expect(refundedAgain.success && refundedAgain.data).toEqual({
                transactionId: 'tx-3',
                outcome: 'already_refunded',
                amount: 30,
            });
            expect(voidedAgain.success && voidedAgain.data.outcome).toBe('already_voided');
            expect(store.snapshot().accounts.alice.balance).toBe(100);
        });

        it('refuses a replay of a refunded id', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 30, transactionId: 'tx-5' });
            await store.voidTransfer('tx-5');
            const replay = await store.transfer({ from: 'alice', to: 'bob', amount: 30, transactionId: 'tx-5' });
            expect(!replay.success && replay.error.code).toBe('TRANSFER_VOIDED');
        });

        it('refuses a refund the recipient cannot cover', async () => {
            await store.transfer({ from: 'alice', to: 'bob', amount: 30, transactionId: 'tx-6' });
            await store.adjust('bob', -20);
            const result = await store.voidTransfer('tx-6');
            expect(!result.success && result.error.code).toBe('INSUFFICIENT_FUNDS');
            expect(store.getTransfer('tx-6')?.status).toBe('applied');
        });
    });

    describe('vault credit and debit', () => {
        it('credits and debits whole units', () => {
            expect(store.credit('bob', 15).success).toBe(true);
            const debit = store.debit('bob', 10);
            expect(debit.success && debit.data.balance).toBe(5);
        });

        it('refuses a debit past zero', () => {
            const result = store.debit('bob', 1);
            expect(!result.success && result.error.code).toBe('INSUFFICIENT_FUNDS');
        });
    });

    describe('catalog', () => {
        it('prices, lists and removes items', async () => {
            await store.setItemPrice('widget', 100);
            await store.setItemPrice('bolt', 5);
            expect(store.listItems()).toEqual([
                { item: 'bolt', basePrice: 5 },
                { item: 'widget', basePrice: 100 },
            ]);
            expect(store.basePriceOf('widget')).toBe(100);

            await store.removeItem('widget');
            expect(store.basePriceOf('widget')).toBeNull();
            const missing = await store.removeItem('widget');
            expect(!missing.success && missing.error.code).toBe('NOT_FOUND');
        });

        it('prices items named like built-in properties', async () => {
            expect(store.basePriceOf('constructor')).toBeNull();
            await store.setItemPrice('constructor', 5);
            expect(store.basePriceOf('constructor')).toBe(5);
            const reserved = await store.setItemPrice('__proto__', 5);
            expect(!reserved.success && reserved.error.code).toBe('VALIDATION_ERROR');
        });

        it('refuses a non-positive base price', async () => {
            const result = await store.setItemPrice('widget', 0);
            expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
        });

        it('patches the price config and validates the result', async () => {
            const patched = await store.configurePrice({ elasticity: 2 });
            expect(patched.success && patched.data).toEqual({
                maxStock: 1000,
                minPrice: 1,
                elasticity: 2,
                currencySymbol: '$',
            });

            const bad = await store.configurePrice({ maxStock: 0 });
            expect(!bad.success && bad.error.code).toBe('VALIDATION_ERROR');
            expect(store.priceConfig().maxStock).toBe(1000);
        });
    });

    it('snapshots a detached copy', async () => {
        const snap = store.snapshot();
        snap.accounts.alice.balance = 1;
        expect(store.snapshot().accounts.alice.balance).toBe(100);
    });
});
