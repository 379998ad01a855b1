/**
 * LEDGER TYPES
 *
 * Accounts, item prices and transfer records owned by the ledger process.
 * Balances are non-negative integers in the smallest currency unit.
 */

import type { PriceConfig } from '../PricingEngine.js';

export type TransferStatus = 'applied' | 'voided' | 'refunded';

export interface Account {
    user: string;
    pinHash: string;
    approved: boolean;
    balance: number;
    createdAt: string;
}

export interface ItemRecord {
    basePrice: number;
}

export interface TransferRecord {
    transactionId: string; // ULID from the caller
    from: string;
    to: string;
    amount: number;
    status: TransferStatus;
    createdAt: string;
    updatedAt: string;
}

export interface LedgerConfig {
    vaultContainer: string | null;
    price: PriceConfig;
}

export interface LedgerState {
    version: number;
    accounts: Record<string, Account>;
    items: Record<string, ItemRecord>;
    config: LedgerConfig;
    transfers: Record<string, TransferRecord>;
}

// Public view of an account: the hash never leaves the store
export interface AccountView {
    user: string;
    approved: boolean;
    balance: number;
}

export interface TransferRequest {
    from: string;
    to: string;
    amount: number;
    transactionId?: string;
}

export interface TransferReceipt {
    transactionId: string | null;
    from: string;
    to: string;
    amount: number;
    fromBalance: number;
    toBalance: number;
    replayed: boolean;
}

export type VoidOutcome = 'refunded' | 'tombstoned' | 'already_refunded' | 'already_voided';

export interface VoidReceipt {
    transactionId: string;
    outcome: VoidOutcome;
    amount: number;
}

export interface PriceConfigPatch {
    maxStock?: number;
    minPrice?: number;
    elasticity?: number;
    currencySymbol?: string;
}
