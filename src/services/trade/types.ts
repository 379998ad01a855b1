/**
 * TRADE TYPES
 *
 * Listings are claims on units held in the shared trade vault. The quantity
 * of a listing only ever changes by what a move actually reported.
 */

import type { MoveShortfall } from '../../inventory/types.js';

export interface Listing {
    id: number;
    seller: string;
    item: string;
    unitPrice: number; // positive integer
    quantity: number; // non-negative integer
    createdAt: string;
    updatedAt: string;
}

export interface TradeConfig {
    vaultContainer: string | null;
}

export interface TradeState {
    version: number;
    listings: Listing[];
    nextListingId: number;
    config: TradeConfig;
}

export interface StockReceipt {
    listingId: number;
    moved: number;
    quantity: number;
    shortfall: MoveShortfall | null;
    message: string;
}

export interface PurchaseRequest {
    listingId: number;
    buyer: string;
    count: number;
    destination: string;
}

export interface PurchaseReceipt {
    listingId: number;
    moved: number;
    total: number;
    transactionId: string;
    message: string;
}
