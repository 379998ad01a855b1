import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// ===================================
// 1. AUTO-DETECT ENVIRONMENT
// ===================================

export enum EnvMode {
    TEST = 'test',
    LOCAL = 'local',
    PRODUCTION = 'production'
}

function detectMode(): EnvMode {
    if (process.env.NODE_ENV === 'test') {
        return EnvMode.TEST;
    }
    if (process.env.NODE_ENV === 'production') {
        return EnvMode.PRODUCTION;
    }
    return EnvMode.LOCAL;
}

const CURRENT_MODE = detectMode();

// ===================================
// 2. LOAD CORRECT ENV FILE
// ===================================

if (CURRENT_MODE === EnvMode.LOCAL) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
    // Fallback to .env if .env.local missing
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
} else if (CURRENT_MODE === EnvMode.TEST) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env.test') });
}
// Production uses injected variables (no file loading needed)

// ===================================
// 3. SCHEMA
// ===================================

const port = z.coerce.number().int().min(1).max(65535);
const channel = z.coerce.number().int().min(0).max(65535);
const flag = z.enum(['true', 'false']).default('false').transform((value) => value === 'true');

const EnvSchema = z.object({
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // ledger process
    LEDGER_RPC_CHANNEL: channel.default(1337),
    LEDGER_RPC_PORT: port.default(7337),
    LEDGER_ADMIN_PORT: port.default(8337),
    LEDGER_DATA_FILE: z.string().min(1).default('data/ledger.json'),
    LEDGER_AUDIT_FILE: z.string().min(1).default('data/ledger-audit.jsonl'),
    LEDGER_VAULT: z.string().min(1).optional(),

    // trade process
    TRADE_RPC_CHANNEL: channel.default(1444),
    TRADE_RPC_PORT: port.default(7444),
    TRADE_ADMIN_PORT: port.default(8444),
    TRADE_DATA_FILE: z.string().min(1).default('data/trade.json'),
    TRADE_AUDIT_FILE: z.string().min(1).default('data/trade-audit.jsonl'),
    TRADE_VAULT: z.string().min(1).optional(),
    LEDGER_RPC_URL: z.string().url().default('ws://127.0.0.1:7337'),

    // rpc + settlement
    RPC_TIMEOUT_MS: z.coerce.number().int().min(50).default(6000),
    RPC_BROADCAST_FALLBACK: flag,
    SETTLEMENT_CHARGE_RETRIES: z.coerce.number().int().min(0).max(10).default(1),

    // inventory: in-memory containers created at boot, comma separated
    MEMORY_CONTAINERS: z.string().default(''),

    // misc
    AUDIT_RING_SIZE: z.coerce.number().int().min(1).default(800),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
    ADMIN_TOKEN: z.string().min(8).optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

// ===================================
// 4. LOAD & VALIDATE
// ===================================

export function parseEnv(source: NodeJS.ProcessEnv, mode: EnvMode = CURRENT_MODE) {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`[CRITICAL] Invalid environment: ${issues}`);
    }
    const raw = parsed.data;

    if (mode === EnvMode.PRODUCTION && !raw.ADMIN_TOKEN) {
        throw new Error('[SECURITY] ADMIN_TOKEN is required in PRODUCTION');
    }

    return {
        // metadata
        mode,
        isLocal: mode === EnvMode.LOCAL,
        isProduction: mode === EnvMode.PRODUCTION,
        isTest: mode === EnvMode.TEST,
        logLevel: raw.LOG_LEVEL ?? (mode === EnvMode.LOCAL ? 'debug' : 'info'),

        ledger: {
            channel: raw.LEDGER_RPC_CHANNEL,
            rpcPort: raw.LEDGER_RPC_PORT,
            adminPort: raw.LEDGER_ADMIN_PORT,
            dataFile: raw.LEDGER_DATA_FILE,
            auditFile: raw.LEDGER_AUDIT_FILE,
            vault: raw.LEDGER_VAULT ?? null,
        },

        trade: {
            channel: raw.TRADE_RPC_CHANNEL,
            rpcPort: raw.TRADE_RPC_PORT,
            adminPort: raw.TRADE_ADMIN_PORT,
            dataFile: raw.TRADE_DATA_FILE,
            auditFile: raw.TRADE_AUDIT_FILE,
            vault: raw.TRADE_VAULT ?? null,
            ledgerUrl: raw.LEDGER_RPC_URL,
        },

        rpc: {
            timeoutMs: raw.RPC_TIMEOUT_MS,
            broadcastFallback: raw.RPC_BROADCAST_FALLBACK,
        },

        settlement: {
            chargeRetries: raw.SETTLEMENT_CHARGE_RETRIES,
        },

        inventory: {
            containers: raw.MEMORY_CONTAINERS.split(',').map((name) => name.trim()).filter(Boolean),
        },

        audit: {
            ringSize: raw.AUDIT_RING_SIZE,
        },

        auth: {
            bcryptRounds: raw.BCRYPT_ROUNDS,
        },

        admin: {
            token: raw.ADMIN_TOKEN ?? null,
        },
    };
}

export type Env = ReturnType<typeof parseEnv>;

// ===================================
// 5. EXPORT THE SAFE ENV OBJECT
// ===================================

export const env: Env = parseEnv(process.env);
