/**
 * TEST UTILITIES
 *
 * Factories for in-process ledgers, listing stores and containers.
 */

import { EnvMode, parseEnv, type Env } from '../src/config/env.js';
import { InventoryMover } from '../src/inventory/InventoryMover.js';
import { MemoryContainerDirectory, type MemoryContainer } from '../src/inventory/MemoryContainer.js';
import { AuditLog } from '../src/services/AuditLog.js';
import { createLedgerState, LedgerStore } from '../src/services/ledger/LedgerStore.js';
import { createTradeState, ListingStore } from '../src/services/trade/ListingStore.js';
import type { CredentialHasher } from '../src/utils/credentials.js';

export const FIXED_NOW = '2026-01-01T00:00:00.000Z';
export const fixedClock = () => new Date(FIXED_NOW);

/** Reversible stand-in for bcrypt; keeps unit tests fast. */
export const plainHasher: CredentialHasher = {
    hash: async (secret) => `hashed:${secret}`,
    verify: async (secret, hash) => hash === `hashed:${secret}`,
};

export function memoryAudit(): AuditLog {
    return new AuditLog({ file: null, clock: fixedClock });
}

export function testConfig(overrides: Record<string, string> = {}): Env {
    return parseEnv({ BCRYPT_ROUNDS: '4', ...overrides }, EnvMode.TEST);
}

export interface SeedAccount {
    user: string;
    balance: number;
    approved?: boolean;
    pin?: string;
}

export async function seedAccounts(store: LedgerStore, accounts: SeedAccount[]): Promise<void> {
    for (const account of accounts) {
        const created = await store.register(account.user, account.pin ?? '1234');
        if (!created.success) throw new Error(`seed failed: ${created.error.message}`);
        if (account.approved ?? true) await store.approve(account.user);
        if (account.balance > 0) await store.adjust(account.user, account.balance);
    }
}

export function createTestLedger(audit: AuditLog = memoryAudit()): LedgerStore {
    return new LedgerStore(createLedgerState(), { audit, hasher: plainHasher, clock: fixedClock });
}

/** Fill a container slot by slot: [slot, item, count]. */
export function fill(container: MemoryContainer, stacks: Array<[number, string, number]>): MemoryContainer {
    for (const [slot, item, count] of stacks) container.setSlot(slot, { item, count });
    return container;
}

export interface TradeFixture {
    directory: MemoryContainerDirectory;
    vault: MemoryContainer;
    mover: InventoryMover;
    audit: AuditLog;
    listings: ListingStore;
}

export async function createTradeFixture(vaultName = 'trade-vault'): Promise<TradeFixture> {
    const directory = new MemoryContainerDirectory();
    const vault = directory.create(vaultName);
    const mover = new InventoryMover(directory);
    const audit = memoryAudit();
    const listings = new ListingStore(createTradeState(), { mover, audit, clock: fixedClock });
    await listings.configureVault(vaultName);
    return { directory, vault, mover, audit, listings };
}
