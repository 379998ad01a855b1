/**
 * VAULT SERVICE (ledger process)
 *
 * Quotes elastic prices against live vault stock and converts goods to funds
 * and back. Stock is re-scanned on every call; nothing here is cached.
 *
 * Deposit prices each slot at the running stock, so a large deposit of one
 * item is credited at a falling price. Withdraw checks stock and funds for the
 * full count, then charges only for the units that actually moved.
 */

import { fail, ok, ErrorCodes, type ServiceResult } from '../types/index.js';
import { ledgerLogger } from '../utils/logger.js';
import type { InventoryMover } from '../inventory/InventoryMover.js';
import type { ContainerDirectory, MoveShortfall, SlotListing, StockSnapshot } from '../inventory/types.js';
import type { AuditLog } from './AuditLog.js';
import type { LedgerStore } from './ledger/LedgerStore.js';
import { formatAmount, type PricingEngine } from './PricingEngine.js';

const logger = ledgerLogger.child({ component: 'vault' });

export interface PriceQuote {
    price: number;
    stock: number;
    base: number;
}

export interface VaultStockEntry {
    count: number;
    price: number;
}

export interface DepositReceipt {
    moved: number;
    credited: number;
    balance: number;
    items: Record<string, number>;
    message: string;
}

export interface WithdrawalReceipt {
    item: string;
    requested: number;
    moved: number;
    unitPrice: number;
    charged: number;
    balance: number;
    shortfall: MoveShortfall | null;
    message: string;
}

export interface VaultServiceDeps {
    store: LedgerStore;
    pricing: PricingEngine;
    mover: InventoryMover;
    directory: ContainerDirectory;
    audit: AuditLog;
}

export class VaultService {
    constructor(private readonly deps: VaultServiceDeps) { }

    private async liveStock(): Promise<StockSnapshot> {
        const vault = this.deps.store.vaultContainer();
        if (!vault) return new Map();
        return (await this.deps.mover.scanStock(vault)) ?? new Map();
    }

    async getPrices(): Promise<Record<string, PriceQuote>> {
        const stock = await this.liveStock();
        const quotes: Record<string, PriceQuote> = {};
        for (const { item, basePrice } of this.deps.store.listItems()) {
            const count = stock.get(item) ?? 0;
            const price = this.deps.pricing.price(item, count);
            if (price !== null) quotes[item] = { price, stock: count, base: basePrice };
        }
        return quotes;
    }

    async getVaultStock(): Promise<Record<string, VaultStockEntry>> {
        const stock = await this.liveStock();
        const out: Record<string, VaultStockEntry> = {};
        for (const [item, count] of [...stock.entries()].sort(([a], [b]) => a.localeCompare(b))) {
            const price = this.deps.pricing.price(item, count);
            if (price !== null) out[item] = { count, price };
        }
        return out;
    }

    private approvedAccount(user: string): ServiceResult<{ balance: number }> {
        const account = this.deps.store.getAccount(user);
        if (!account.success) return account;
        if (!account.data.approved) return fail(ErrorCodes.NOT_APPROVED, 'Not approved', { user });
        return ok({ balance: account.data.balance });
    }

    private vaultName(): ServiceResult<string> {
        const name = this.deps.store.vaultContainer();
        if (!name || !this.deps.directory.resolve(name)) {
            return fail(ErrorCodes.VAULT_NOT_CONFIGURED, name ? 'Vault missing' : 'Vault not configured');
        }
        return ok(name);
    }

    async depositFromClientChest(user: string, chestName: string): Promise<ServiceResult<DepositReceipt>> {
        const account = this.approvedAccount(user);
        if (!account.success) return account;
        const vault = this.vaultName();
        if (!vault.success) return vault;
        if (chestName === vault.data) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Chest cannot be the vault', { chest: chestName });
        }

        const chest = this.deps.directory.resolve(chestName);
        if (!chest) {
            return fail(ErrorCodes.DELIVERY_FAILED, 'Client chest missing', { shortfall: 'source_missing' });
        }

        const running = await this.deps.mover.scanStock(vault.data);
        if (!running) return fail(ErrorCodes.VAULT_NOT_CONFIGURED, 'Vault unreadable');

        let listing: SlotListing;
        try {
            listing = await chest.list();
        } catch (error) {
            logger.error({ err: error, chest: chestName }, 'Client chest scan failed');
            return fail(ErrorCodes.DELIVERY_FAILED, 'Client chest unreadable', { shortfall: 'device_error' });
        }

        let moved = 0;
        let credited = 0;
        const items = new Map<string, number>();

        for (const [slot, stack] of [...listing.entries()].sort(([a], [b]) => a - b)) {
            if (stack.count <= 0) continue;
            const current = running.get(stack.item) ?? 0;
            const unitPrice = this.deps.pricing.price(stack.item, current);
            if (unitPrice === null) continue;

            const push = await this.deps.mover.moveSlot(chestName, vault.data, slot, stack.item, stack.count);
            if (push.accepted > 0) {
                moved += push.accepted;
                credited += push.accepted * unitPrice;
                items.set(stack.item, (items.get(stack.item) ?? 0) + push.accepted);
                running.set(stack.item, current + push.accepted);
            }
            if (push.failed) break;
        }

        if (moved === 0) {
            return fail(ErrorCodes.DELIVERY_FAILED, 'No priced items or nothing moved');
        }

        const after = this.deps.store.credit(user, credited);
        if (!after.success) return after;
        const received = Object.fromEntries(items);

        await this.deps.audit.append('vault_deposit', { user, chest: chestName, moved, credited, items: received });
        const message = `Deposited ${moved} items worth ${formatAmount(credited, this.deps.store.priceConfig())}`;
        logger.info({ user, moved, credited }, message);
        return ok({ moved, credited, balance: after.data.balance, items: received, message });
    }

    async withdrawToClientChest(
        user: string,
        chestName: string,
        item: string,
        count: number
    ): Promise<ServiceResult<WithdrawalReceipt>> {
        if (!item || !Number.isInteger(count) || count <= 0) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Invalid request', { item, count });
        }
        const account = this.approvedAccount(user);
        if (!account.success) return account;
        const vault = this.vaultName();
        if (!vault.success) return vault;
        if (chestName === vault.data) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Chest cannot be the vault', { chest: chestName });
        }
        if (!this.deps.directory.resolve(chestName)) {
            return fail(ErrorCodes.DELIVERY_FAILED, 'Client chest missing', { shortfall: 'destination_missing' });
        }

        const stock = await this.deps.mover.scanStock(vault.data);
        if (!stock) return fail(ErrorCodes.VAULT_NOT_CONFIGURED, 'Vault unreadable');
        const available = stock.get(item) ?? 0;
        if (available < count) {
            return fail(ErrorCodes.INSUFFICIENT_STOCK, 'Not enough stock', { item, available, count });
        }

        const unitPrice = this.deps.pricing.price(item, available);
        if (unitPrice === null) return fail(ErrorCodes.NOT_PRICED, 'Item not priced', { item });

        const cost = unitPrice * count;
        if (account.data.balance < cost) {
            return fail(ErrorCodes.INSUFFICIENT_FUNDS, 'Insufficient funds', { balance: account.data.balance, cost });
        }

        const report = await this.deps.mover.move(vault.data, chestName, item, count);
        if (report.moved === 0) {
            return fail(ErrorCodes.DELIVERY_FAILED, 'Nothing moved', { shortfall: report.shortfall });
        }

        const charged = report.moved * unitPrice;
        const after = this.deps.store.debit(user, charged);
        if (!after.success) return after;

        await this.deps.audit.append('vault_withdrawal', {
            user,
            chest: chestName,
            item,
            requested: count,
            moved: report.moved,
            unitPrice,
            charged,
        });
        const message = `Withdrew ${report.moved} x ${item} for ${formatAmount(charged, this.deps.store.priceConfig())}`;
        logger.info({ user, item, moved: report.moved, charged }, message);

        return ok({
            item,
            requested: count,
            moved: report.moved,
            unitPrice,
            charged,
            balance: after.data.balance,
            shortfall: report.shortfall,
            message,
        });
    }
}
