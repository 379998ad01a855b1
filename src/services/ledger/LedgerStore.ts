/**
 * LEDGER STORE
 *
 * Source of truth for accounts, balances and the item price catalog.
 *
 * Invariants:
 * - balances are integers >= 0 after every operation
 * - transfer conserves the sum of balances and is all-or-nothing
 * - a transactionId is applied at most once; a voided id never applies
 *
 * Every mutation runs synchronously against in-memory state and is audited
 * before the call returns. Persisting the snapshot is the dispatcher's job.
 */

import { fail, ok, ErrorCodes, type ServiceResult } from '../../types/index.js';
import { ledgerLogger } from '../../utils/logger.js';
import type { CredentialHasher } from '../../utils/credentials.js';
import type { AuditLog } from '../AuditLog.js';
import { DEFAULT_PRICE_CONFIG, type ItemPrice, type PriceCatalog, type PriceConfig } from '../PricingEngine.js';
import type {
    Account,
    AccountView,
    LedgerState,
    PriceConfigPatch,
    TransferReceipt,
    TransferRecord,
    TransferRequest,
    VoidReceipt,
} from './types.js';

const logger = ledgerLogger;

export const LEDGER_STATE_VERSION = 1;

export function createLedgerState(): LedgerState {
    return {
        version: LEDGER_STATE_VERSION,
        accounts: {},
        items: {},
        config: { vaultContainer: null, price: { ...DEFAULT_PRICE_CONFIG } },
        transfers: {},
    };
}

export interface LedgerStoreDeps {
    audit: AuditLog;
    hasher: CredentialHasher;
    clock?: () => Date;
}

function view(account: Account): AccountView {
    return { user: account.user, approved: account.approved, balance: account.balance };
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

function isBlank(value: string): boolean {
    return value.trim().length === 0;
}

// Names and ids key plain records: only own keys count, and `__proto__` cannot be one
function own<T>(record: Record<string, T>, key: string): T | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
}

function isReservedKey(key: string): boolean {
    return key === '__proto__';
}

export class LedgerStore implements PriceCatalog {
    private readonly audit: AuditLog;
    private readonly hasher: CredentialHasher;
    private readonly clock: () => Date;

    constructor(private readonly state: LedgerState, deps: LedgerStoreDeps) {
        this.audit = deps.audit;
        this.hasher = deps.hasher;
        this.clock = deps.clock ?? (() => new Date());
    }

    // ============================================
    // Accounts
    // ============================================

    async register(user: string, pin: string): Promise<ServiceResult<AccountView>> {
        if (isBlank(user)) return fail(ErrorCodes.VALIDATION_ERROR, 'User name required');
        if (isReservedKey(user)) return fail(ErrorCodes.VALIDATION_ERROR, 'Reserved user name', { user });
        if (isBlank(pin)) return fail(ErrorCodes.VALIDATION_ERROR, 'PIN required');
        if (own(this.state.accounts, user)) {
            return fail(ErrorCodes.ALREADY_EXISTS, 'Account exists', { user });
        }

        const pinHash = await this.hasher.hash(pin);
        // hashing yields; re-check so two registrations cannot both land
        if (own(this.state.accounts, user)) {
            return fail(ErrorCodes.ALREADY_EXISTS, 'Account exists', { user });
        }

        const account: Account = {
            user,
            pinHash,
            approved: false,
            balance: 0,
            createdAt: this.now(),
        };
        this.state.accounts[user] = account;
        await this.audit.append('account_created', { user });
        return ok(view(account));
    }

    async authenticate(user: string, pin: string): Promise<ServiceResult<AccountView>> {
        const account = own(this.state.accounts, user);
        if (!account) return fail(ErrorCodes.NOT_FOUND, 'No account', { user });
        if (!(await this.hasher.verify(pin, account.pinHash))) {
            logger.warn({ user }, 'Rejected credential');
            return fail(ErrorCodes.BAD_CREDENTIAL, 'Invalid PIN');
        }
        if (!account.approved) return fail(ErrorCodes.NOT_APPROVED, 'Not approved', { user });
        return ok(view(account));
    }

    getAccount(user: string): ServiceResult<AccountView> {
        const account = own(this.state.accounts, user);
        return account ? ok(view(account)) : fail(ErrorCodes.NOT_FOUND, 'No account', { user });
    }

    listAccounts(): AccountView[] {
        return Object.values(this.state.accounts)
            .map(view)
            .sort((a, b) => a.user.localeCompare(b.user));
    }

    async approve(user: string): Promise<ServiceResult<AccountView>> {
        const account = own(this.state.accounts, user);
        if (!account) return fail(ErrorCodes.NOT_FOUND, 'No account', { user });
        if (!account.approved) {
            account.approved = true;
            await this.audit.append('account_approved', { user });
        }
        return ok(view(account));
    }

    /**
     * Admin balance correction. The result is clamped at zero.
     */
    async adjust(user: string, delta: number): Promise<ServiceResult<AccountView>> {
        if (!Number.isInteger(delta)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Adjustment must be an integer', { delta });
        }
        const account = own(this.state.accounts, user);
        if (!account) return fail(ErrorCodes.NOT_FOUND, 'No account', { user });

        const before = account.balance;
        account.balance = Math.max(0, before + delta);
        await this.audit.append('account_adjusted', { user, delta, before, balance: account.balance });
        return ok(view(account));
    }

    totalBalance(): number {
        return Object.values(this.state.accounts).reduce((sum, account) => sum + account.balance, 0);
    }

    // ============================================
    // Transfers
    // ============================================

    async transfer(request: TransferRequest): Promise<ServiceResult<TransferReceipt>> {
        const { from, to, amount } = request;
        const transactionId = request.transactionId ?? null;

        if (!isPositiveInteger(amount)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Amount must be a positive integer', { amount });
        }
        if (transactionId !== null && isBlank(transactionId)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'transactionId must not be empty');
        }
        if (transactionId !== null && isReservedKey(transactionId)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Reserved transactionId', { transactionId });
        }

        const source = own(this.state.accounts, from);
        const target = own(this.state.accounts, to);

        if (transactionId !== null) {
            const seen = own(this.state.transfers, transactionId);
            if (seen) return this.replay(seen, request, source, target);
        }

        if (!source || !target) {
            return fail(ErrorCodes.UNKNOWN_ACCOUNT, 'Unknown account', { from, to });
        }
        if (!source.approved || !target.approved) {
            return fail(ErrorCodes.NOT_APPROVED, 'Not approved', { from, to });
        }
        if (source.balance < amount) {
            return fail(ErrorCodes.INSUFFICIENT_FUNDS, 'Insufficient funds', {
                balance: source.balance,
                amount,
            });
        }

        source.balance -= amount;
        target.balance += amount;

        if (transactionId !== null) {
            const at = this.now();
            this.state.transfers[transactionId] = {
                transactionId,
                from,
                to,
                amount,
                status: 'applied',
                createdAt: at,
                updatedAt: at,
            };
        }

        await this.audit.append('transfer_applied', { transactionId, from, to, amount });
        logger.info({ transactionId, from, to, amount }, 'Transfer applied');

        return ok({
            transactionId,
            from,
            to,
            amount,
            fromBalance: source.balance,
            toBalance: target.balance,
            replayed: false,
        });
    }

    private replay(
        seen: TransferRecord,
        request: TransferRequest,
        source: Account | undefined,
        target: Account | undefined
    ): ServiceResult<TransferReceipt> {
        if (seen.status !== 'applied') {
            return fail(ErrorCodes.TRANSFER_VOIDED, 'Transaction was voided', {
                transactionId: seen.transactionId,
                status: seen.status,
            });
        }
        if (seen.from !== request.from || seen.to !== request.to || seen.amount !== request.amount) {
            return fail(ErrorCodes.IDEMPOTENCY_CONFLICT, 'transactionId reused with different parameters', {
                transactionId: seen.transactionId,
            });
        }
        logger.info({ transactionId: seen.transactionId }, 'Transfer replayed');
        return ok({
            transactionId: seen.transactionId,
            from: seen.from,
            to: seen.to,
            amount: seen.amount,
            fromBalance: source?.balance ?? 0,
            toBalance: target?.balance ?? 0,
            replayed: true,
        });
    }

    /**
     * Settle an ambiguous charge: refund it if it landed, or tombstone the id
     * so it can never land later.
     */
    async voidTransfer(transactionId: string): Promise<ServiceResult<VoidReceipt>> {
        if (isBlank(transactionId)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'transactionId required');
        }
        if (isReservedKey(transactionId)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Reserved transactionId', { transactionId });
        }
        const at = this.now();
        const seen = own(this.state.transfers, transactionId);

        if (!seen) {
            this.state.transfers[transactionId] = {
                transactionId,
                from: '',
                to: '',
                amount: 0,
                status: 'voided',
                createdAt: at,
                updatedAt: at,
            };
            await this.audit.append('transfer_tombstoned', { transactionId });
            return ok({ transactionId, outcome: 'tombstoned', amount: 0 });
        }

        if (seen.status === 'voided') return ok({ transactionId, outcome: 'already_voided', amount: 0 });
        if (seen.status === 'refunded') {
            return ok({ transactionId, outcome: 'already_refunded', amount: seen.amount });
        }

        const payer = own(this.state.accounts, seen.from);
        const payee = own(this.state.accounts, seen.to);
        if (!payer || !payee) {
            return fail(ErrorCodes.UNKNOWN_ACCOUNT, 'Unknown account', { from: seen.from, to: seen.to });
        }
        if (payee.balance < seen.amount) {
            logger.error({ transactionId, payee: seen.to, amount: seen.amount }, 'Refund needs manual reconciliation');
            return fail(ErrorCodes.INSUFFICIENT_FUNDS, 'Recipient cannot cover the refund', {
                transactionId,
                balance: payee.balance,
                amount: seen.amount,
            });
        }

        payee.balance -= seen.amount;
        payer.balance += seen.amount;
        seen.status = 'refunded';
        seen.updatedAt = at;

        await this.audit.append('transfer_refunded', {
            transactionId,
            from: seen.from,
            to: seen.to,
            amount: seen.amount,
        });
        return ok({ transactionId, outcome: 'refunded', amount: seen.amount });
    }

    getTransfer(transactionId: string): TransferRecord | null {
        const record = own(this.state.transfers, transactionId);
        return record ? { ...record } : null;
    }

    // ============================================
    // Vault credit / debit
    // ============================================

    credit(user: string, amount: number): ServiceResult<AccountView> {
        const account = own(this.state.accounts, user);
        if (!account) return fail(ErrorCodes.NOT_FOUND, 'No account', { user });
        if (!Number.isInteger(amount) || amount < 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Credit must be a non-negative integer', { amount });
        }
        account.balance += amount;
        return ok(view(account));
    }

    debit(user: string, amount: number): ServiceResult<AccountView> {
        const account = own(this.state.accounts, user);
        if (!account) return fail(ErrorCodes.NOT_FOUND, 'No account', { user });
        if (!Number.isInteger(amount) || amount < 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Debit must be a non-negative integer', { amount });
        }
        if (account.balance < amount) {
            return fail(ErrorCodes.INSUFFICIENT_FUNDS, 'Insufficient funds', { balance: account.balance, amount });
        }
        account.balance -= amount;
        return ok(view(account));
    }

    // ============================================
    // Catalog
    // ============================================

    basePriceOf(item: string): number | null {
        return own(this.state.items, item)?.basePrice ?? null;
    }

    priceConfig(): PriceConfig {
        return { ...this.state.config.price };
    }

    vaultContainer(): string | null {
        return this.state.config.vaultContainer;
    }

    listItems(): ItemPrice[] {
        return Object.entries(this.state.items)
            .map(([item, record]) => ({ item, basePrice: record.basePrice }))
            .sort((a, b) => a.item.localeCompare(b.item));
    }

    async setItemPrice(item: string, basePrice: number): Promise<ServiceResult<ItemPrice>> {
        if (isBlank(item)) return fail(ErrorCodes.VALIDATION_ERROR, 'Item id required');
        if (isReservedKey(item)) return fail(ErrorCodes.VALIDATION_ERROR, 'Reserved item id', { item });
        if (!Number.isFinite(basePrice) || basePrice <= 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Base price must be > 0', { basePrice });
        }
        this.state.items[item] = { basePrice };
        await this.audit.append('item_priced', { item, basePrice });
        return ok({ item, basePrice });
    }

    async removeItem(item: string): Promise<ServiceResult<{ item: string }>> {
        if (!own(this.state.items, item)) return fail(ErrorCodes.NOT_FOUND, 'Item not priced', { item });
        delete this.state.items[item];
        await this.audit.append('item_removed', { item });
        return ok({ item });
    }

    async configurePrice(patch: PriceConfigPatch): Promise<ServiceResult<PriceConfig>> {
        const next: PriceConfig = { ...this.state.config.price, ...patch };
        if (!Number.isFinite(next.maxStock) || next.maxStock <= 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'maxStock must be > 0');
        }
        if (!Number.isFinite(next.minPrice) || next.minPrice < 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'minPrice must be >= 0');
        }
        if (!Number.isFinite(next.elasticity) || next.elasticity < 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'elasticity must be >= 0');
        }
        if (isBlank(next.currencySymbol)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Currency symbol required');
        }
        this.state.config.price = next;
        await this.audit.append('price_configured', { ...next });
        return ok({ ...next });
    }

    async configureVault(containerName: string): Promise<ServiceResult<{ vaultContainer: string }>> {
        if (isBlank(containerName)) return fail(ErrorCodes.VALIDATION_ERROR, 'Container name required');
        this.state.config.vaultContainer = containerName;
        await this.audit.append('vault_configured', { container: containerName });
        return ok({ vaultContainer: containerName });
    }

    // ============================================
    // Persistence
    // ============================================

    snapshot(): LedgerState {
        return structuredClone(this.state);
    }

    private now(): string {
        return this.clock().toISOString();
    }
}
