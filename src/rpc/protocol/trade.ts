import { z } from 'zod';

// ============================================
// Trade RPC requests
// ============================================

const user = z.string().min(1);
const listingId = z.number().int().positive();

export const TradeRequestSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('login'), user, pin: z.string().min(1) }),
    z.object({ type: z.literal('getBalance'), user }),
    z.object({ type: z.literal('getListings') }),
    z.object({
        type: z.literal('createListing'),
        user,
        item: z.string().min(1),
        price: z.number().int().positive(),
    }),
    z.object({
        type: z.literal('addStock'),
        user,
        listingId,
        item: z.string().min(1),
        count: z.number().int().positive(),
        chestName: z.string().min(1),
    }),
    z.object({
        type: z.literal('buy'),
        user,
        listingId,
        count: z.number().int().positive(),
        chestName: z.string().min(1),
    }),
]);

export type TradeRequest = z.infer<typeof TradeRequestSchema>;
export type TradeRequestType = TradeRequest['type'];

export const TRADE_REQUEST_TYPES: ReadonlySet<string> = new Set<TradeRequestType>([
    'login',
    'getBalance',
    'getListings',
    'createListing',
    'addStock',
    'buy',
]);

export function isMutatingTradeRequest(request: TradeRequest): boolean {
    return request.type === 'createListing' || request.type === 'addStock' || request.type === 'buy';
}

// ============================================
// Trade RPC reply payloads
// ============================================

export const ListingReplySchema = z.object({
    id: z.number().int(),
    seller: z.string(),
    item: z.string(),
    unitPrice: z.number().int(),
    quantity: z.number().int(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

export const LoginReplySchema = z.object({ approved: z.boolean(), balance: z.number().int() });
export const BalanceReplySchema = z.object({ balance: z.number().int() });
export const ListingsReplySchema = z.object({ listings: z.array(ListingReplySchema) });
export const CreateListingReplySchema = z.object({ id: z.number().int(), message: z.string() });
export const AddStockReplySchema = z.object({
    moved: z.number().int(),
    quantity: z.number().int(),
    message: z.string(),
});
export const BuyReplySchema = z.object({
    moved: z.number().int(),
    total: z.number().int(),
    transactionId: z.string(),
    message: z.string(),
});
