/**
 * Ledger process wiring, free of sockets and signals so tests can build one
 * in process. Entry point: ledger-server.ts.
 */

import type { Hono } from 'hono';
import type { Env } from '../config/env.js';
import { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import { InventoryMover } from '../inventory/InventoryMover.js';
import type { ContainerDirectory } from '../inventory/types.js';
import { Dispatcher } from '../lib/Dispatcher.js';
import { LedgerStateSchema } from '../persistence/schemas.js';
import { SnapshotStore, type StateSnapshotter } from '../persistence/SnapshotStore.js';
import { createLedgerAdminRoutes } from '../routes/ledgerAdmin.js';
import type { AdminEnv } from '../routes/admin.js';
import { createLedgerRpcService } from '../rpc/handlers/ledger.js';
import type { LedgerRequest } from '../rpc/protocol/ledger.js';
import { RpcServer } from '../rpc/RpcServer.js';
import type { ServerTransport } from '../rpc/transport.js';
import { AuditLog } from '../services/AuditLog.js';
import { createLedgerState, LedgerStore } from '../services/ledger/LedgerStore.js';
import type { LedgerState } from '../services/ledger/types.js';
import { PricingEngine } from '../services/PricingEngine.js';
import { VaultService } from '../services/VaultService.js';
import { createBcryptHasher, type CredentialHasher } from '../utils/credentials.js';
import { ledgerLogger } from '../utils/logger.js';

export interface LedgerAppOptions {
    config: Env;
    directory: ContainerDirectory;
    snapshots?: StateSnapshotter<LedgerState>;
    audit?: AuditLog;
    hasher?: CredentialHasher;
    metrics?: ExchangeMetrics;
    onFatal?: (error: unknown) => void;
    clock?: () => Date;
}

export interface LedgerApp {
    store: LedgerStore;
    vault: VaultService;
    pricing: PricingEngine;
    audit: AuditLog;
    dispatcher: Dispatcher;
    metrics: ExchangeMetrics;
    admin: Hono<AdminEnv>;
    attach(transport: ServerTransport): RpcServer<LedgerRequest>;
}

export async function createLedgerApp(options: LedgerAppOptions): Promise<LedgerApp> {
    const { config, directory } = options;
    const snapshots = options.snapshots
        ?? new SnapshotStore(config.ledger.dataFile, LedgerStateSchema, createLedgerState);
    const audit = options.audit
        ?? new AuditLog({ file: config.ledger.auditFile, ringSize: config.audit.ringSize, clock: options.clock });
    const metrics = options.metrics ?? new ExchangeMetrics();

    const state = await snapshots.load();
    await audit.load();

    const store = new LedgerStore(state, {
        audit,
        hasher: options.hasher ?? createBcryptHasher(config.auth.bcryptRounds),
        clock: options.clock,
    });
    const pricing = new PricingEngine(store);
    const mover = new InventoryMover(directory);
    const vault = new VaultService({ store, pricing, mover, directory, audit });

    const dispatcher = new Dispatcher({
        persist: () => snapshots.save(store.snapshot()),
        onFatal: options.onFatal,
    });

    if (config.ledger.vault && !store.vaultContainer()) {
        const vaultName = config.ledger.vault;
        await dispatcher.mutate(() => store.configureVault(vaultName));
    }

    const admin = createLedgerAdminRoutes({
        store,
        vault,
        audit,
        dispatcher,
        metrics,
        token: config.admin.token,
    });

    const service = createLedgerRpcService({ store, vault, metrics });

    ledgerLogger.info(
        { accounts: store.listAccounts().length, vault: store.vaultContainer() },
        'Ledger state loaded'
    );

    return {
        store,
        vault,
        pricing,
        audit,
        dispatcher,
        metrics,
        admin,
        attach(transport) {
            const server = new RpcServer({
                channel: config.ledger.channel,
                transport,
                service,
                dispatcher,
                metrics,
                broadcastFallback: config.rpc.broadcastFallback,
            });
            server.start();
            return server;
        },
    };
}
