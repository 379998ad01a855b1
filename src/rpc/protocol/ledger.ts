import { z } from 'zod';

// ============================================
// Ledger RPC requests
// ============================================

const user = z.string().min(1);
const pin = z.string().min(1);
const chestName = z.string().min(1);

export const LedgerRequestSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('login'), user, pin }),
    z.object({ type: z.literal('createAccount'), user, pin }),
    z.object({ type: z.literal('getAccount'), user }),
    z.object({ type: z.literal('getPrices') }),
    z.object({ type: z.literal('getVaultStock') }),
    z.object({ type: z.literal('depositFromClientChest'), user, chestName }),
    z.object({
        type: z.literal('withdrawToClientChest'),
        user,
        chestName,
        item: z.string().min(1),
        count: z.number().int().positive(),
    }),
    z.object({
        type: z.literal('transfer'),
        from: user,
        to: user,
        amount: z.number().int().positive(),
        transactionId: z.string().min(1).optional(),
    }),
    z.object({ type: z.literal('voidTransfer'), transactionId: z.string().min(1) }),
]);

export type LedgerRequest = z.infer<typeof LedgerRequestSchema>;
export type LedgerRequestType = LedgerRequest['type'];

export const LEDGER_REQUEST_TYPES: ReadonlySet<string> = new Set<LedgerRequestType>([
    'login',
    'createAccount',
    'getAccount',
    'getPrices',
    'getVaultStock',
    'depositFromClientChest',
    'withdrawToClientChest',
    'transfer',
    'voidTransfer',
]);

const MUTATING: ReadonlySet<LedgerRequestType> = new Set<LedgerRequestType>([
    'createAccount',
    'depositFromClientChest',
    'withdrawToClientChest',
    'transfer',
    'voidTransfer',
]);

export function isMutatingLedgerRequest(request: LedgerRequest): boolean {
    return MUTATING.has(request.type);
}

// ============================================
// Ledger RPC reply payloads
// ============================================

export const AccountReplySchema = z.object({
    user: z.string(),
    approved: z.boolean(),
    balance: z.number().int(),
});

export const TransferReplySchema = z.object({
    transactionId: z.string().nullable(),
    from: z.string(),
    to: z.string(),
    amount: z.number().int(),
    fromBalance: z.number().int(),
    toBalance: z.number().int(),
    replayed: z.boolean(),
});

export const VoidReplySchema = z.object({
    transactionId: z.string(),
    outcome: z.enum(['refunded', 'tombstoned', 'already_refunded', 'already_voided']),
    amount: z.number().int(),
});

export const PricesReplySchema = z.object({
    prices: z.record(z.string(), z.object({ price: z.number(), stock: z.number(), base: z.number() })),
});

export const VaultStockReplySchema = z.object({
    stock: z.record(z.string(), z.object({ count: z.number(), price: z.number() })),
});

export const MessageReplySchema = z.object({ message: z.string() }).passthrough();
