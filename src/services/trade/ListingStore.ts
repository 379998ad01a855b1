/**
 * LISTING STORE
 *
 * Seller listings backed by the trade vault. A listing's quantity grows only
 * by units the mover actually delivered into the vault and shrinks only by
 * units actually delivered to a buyer, so the sum of quantities per item never
 * exceeds what the vault physically holds (short of outside interference).
 */

import { fail, ok, ErrorCodes, type ServiceResult } from '../../types/index.js';
import { tradeLogger } from '../../utils/logger.js';
import type { InventoryMover } from '../../inventory/InventoryMover.js';
import type { AuditLog } from '../AuditLog.js';
import type { Listing, StockReceipt, TradeState } from './types.js';

const logger = tradeLogger;

export const TRADE_STATE_VERSION = 1;

export function createTradeState(): TradeState {
    return {
        version: TRADE_STATE_VERSION,
        listings: [],
        nextListingId: 1,
        config: { vaultContainer: null },
    };
}

/**
 * Monotonic id source persisted with the trade state; ids are never reused,
 * even after a listing sells out.
 */
export class SequenceGenerator {
    constructor(private readonly state: { nextListingId: number }) { }

    next(): number {
        const id = this.state.nextListingId;
        this.state.nextListingId = id + 1;
        return id;
    }

    peek(): number {
        return this.state.nextListingId;
    }
}

export interface ListingStoreDeps {
    mover: InventoryMover;
    audit: AuditLog;
    clock?: () => Date;
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

export class ListingStore {
    private readonly sequence: SequenceGenerator;
    private readonly mover: InventoryMover;
    private readonly audit: AuditLog;
    private readonly clock: () => Date;

    constructor(private readonly state: TradeState, deps: ListingStoreDeps) {
        this.sequence = new SequenceGenerator(state);
        this.mover = deps.mover;
        this.audit = deps.audit;
        this.clock = deps.clock ?? (() => new Date());
    }

    async create(seller: string, item: string, unitPrice: number): Promise<ServiceResult<Listing>> {
        if (!seller.trim()) return fail(ErrorCodes.VALIDATION_ERROR, 'Seller required');
        if (!item.trim()) return fail(ErrorCodes.VALIDATION_ERROR, 'Item id required');
        if (!isPositiveInteger(unitPrice)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Price must be a positive integer', { unitPrice });
        }

        const at = this.clock().toISOString();
        const listing: Listing = {
            id: this.sequence.next(),
            seller,
            item,
            unitPrice,
            quantity: 0,
            createdAt: at,
            updatedAt: at,
        };
        this.state.listings.push(listing);

        await this.audit.append('listing_created', { listingId: listing.id, seller, item, unitPrice });
        return ok({ ...listing });
    }

    async addStock(
        listingId: number,
        seller: string,
        item: string,
        count: number,
        sourceContainer: string
    ): Promise<ServiceResult<StockReceipt>> {
        if (!isPositiveInteger(listingId) || !isPositiveInteger(count)) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Bad stock params', { listingId, count });
        }
        const listing = this.find(listingId);
        if (!listing) return fail(ErrorCodes.NOT_FOUND, 'Listing not found', { listingId });
        if (listing.seller !== seller) return fail(ErrorCodes.NOT_LISTING_OWNER, 'Not your listing', { listingId });
        if (listing.item !== item) {
            return fail(ErrorCodes.ITEM_MISMATCH, 'Item mismatch', { listingId, expected: listing.item, item });
        }
        const vault = this.state.config.vaultContainer;
        if (!vault) return fail(ErrorCodes.VAULT_NOT_CONFIGURED, 'Vault not configured');
        if (sourceContainer === vault) {
            return fail(ErrorCodes.VALIDATION_ERROR, 'Source cannot be the vault', { listingId, source: sourceContainer });
        }

        const report = await this.mover.move(sourceContainer, vault, listing.item, count);
        if (report.moved <= 0) {
            return fail(ErrorCodes.DELIVERY_FAILED, 'No items moved', { listingId, shortfall: report.shortfall });
        }

        listing.quantity += report.moved;
        listing.updatedAt = this.clock().toISOString();

        await this.audit.append('listing_stocked', {
            listingId,
            seller,
            item: listing.item,
            requested: count,
            moved: report.moved,
            quantity: listing.quantity,
        });
        logger.info({ listingId, moved: report.moved, quantity: listing.quantity }, 'Listing stocked');

        return ok({
            listingId,
            moved: report.moved,
            quantity: listing.quantity,
            shortfall: report.shortfall,
            message: `Deposited ${report.moved} (new qty ${listing.quantity})`,
        });
    }

    /**
     * Decrement by units already delivered to a buyer. Never below zero.
     */
    recordDelivery(listingId: number, units: number): Listing | null {
        const listing = this.find(listingId);
        if (!listing) return null;
        const delivered = Math.max(0, Math.floor(units));
        if (delivered > listing.quantity) {
            logger.warn({ listingId, delivered, quantity: listing.quantity }, 'Delivered more than listed');
        }
        listing.quantity = Math.max(0, listing.quantity - delivered);
        listing.updatedAt = this.clock().toISOString();
        return { ...listing };
    }

    get(listingId: number): Listing | null {
        const listing = this.find(listingId);
        return listing ? { ...listing } : null;
    }

    list(): Listing[] {
        return this.state.listings.map((listing) => ({ ...listing })).sort((a, b) => a.id - b.id);
    }

    /**
     * Listings with stock, ordered for display: by item, then cheapest first.
     */
    listAvailable(): Listing[] {
        return this.list()
            .filter((listing) => listing.quantity > 0)
            .sort((a, b) => (a.item === b.item ? a.unitPrice - b.unitPrice : a.item < b.item ? -1 : 1));
    }

    vaultContainer(): string | null {
        return this.state.config.vaultContainer;
    }

    async configureVault(containerName: string): Promise<ServiceResult<{ vaultContainer: string }>> {
        if (!containerName.trim()) return fail(ErrorCodes.VALIDATION_ERROR, 'Container name required');
        this.state.config.vaultContainer = containerName;
        await this.audit.append('vault_configured', { container: containerName });
        return ok({ vaultContainer: containerName });
    }

    snapshot(): TradeState {
        return structuredClone(this.state);
    }

    private find(listingId: number): Listing | undefined {
        return this.state.listings.find((listing) => listing.id === listingId);
    }
}
