import { z } from 'zod';
import { DEFAULT_PRICE_CONFIG } from '../services/PricingEngine.js';
import type { LedgerState } from '../services/ledger/types.js';
import type { TradeState } from '../services/trade/types.js';

// Snapshots written by older builds lack newer fields; defaults fill them in.

const timestamp = z.string().default(() => new Date(0).toISOString());

export const PriceConfigSchema = z.object({
    maxStock: z.number().positive().default(DEFAULT_PRICE_CONFIG.maxStock),
    minPrice: z.number().min(0).default(DEFAULT_PRICE_CONFIG.minPrice),
    elasticity: z.number().min(0).default(DEFAULT_PRICE_CONFIG.elasticity),
    currencySymbol: z.string().min(1).default(DEFAULT_PRICE_CONFIG.currencySymbol),
});

export const AccountSchema = z.object({
    user: z.string().min(1),
    pinHash: z.string().min(1),
    approved: z.boolean().default(false),
    balance: z.number().int().min(0).default(0),
    createdAt: timestamp,
});

export const TransferRecordSchema = z.object({
    transactionId: z.string().min(1),
    from: z.string(),
    to: z.string(),
    amount: z.number().int().min(0),
    status: z.enum(['applied', 'voided', 'refunded']),
    createdAt: timestamp,
    updatedAt: timestamp,
});

export const LedgerStateSchema: z.ZodType<LedgerState, z.ZodTypeDef, unknown> = z.object({
    version: z.number().int().default(1),
    accounts: z.record(z.string(), AccountSchema).default({}),
    items: z.record(z.string(), z.object({ basePrice: z.number().positive() })).default({}),
    config: z
        .object({
            vaultContainer: z.string().min(1).nullable().default(null),
            price: PriceConfigSchema.default({}),
        })
        .default({}),
    transfers: z.record(z.string(), TransferRecordSchema).default({}),
});

export const ListingSchema = z.object({
    id: z.number().int().positive(),
    seller: z.string().min(1),
    item: z.string().min(1),
    unitPrice: z.number().int().positive(),
    quantity: z.number().int().min(0).default(0),
    createdAt: timestamp,
    updatedAt: timestamp,
});

export const TradeStateSchema: z.ZodType<TradeState, z.ZodTypeDef, unknown> = z
    .object({
        version: z.number().int().default(1),
        listings: z.array(ListingSchema).default([]),
        nextListingId: z.number().int().positive().default(1),
        config: z.object({ vaultContainer: z.string().min(1).nullable().default(null) }).default({}),
    })
    .transform((state) => ({
        ...state,
        // never hand out an id that is already taken
        nextListingId: Math.max(state.nextListingId, ...state.listings.map((listing) => listing.id + 1)),
    }));
