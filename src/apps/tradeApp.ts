/**
 * Trade process wiring. The ledger is reached through a LedgerGateway:
 * a LedgerClient over RPC in deployment, or a local gateway in tests.
 */

import type { Hono } from 'hono';
import type { Env } from '../config/env.js';
import { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import { InventoryMover } from '../inventory/InventoryMover.js';
import type { ContainerDirectory } from '../inventory/types.js';
import { Dispatcher } from '../lib/Dispatcher.js';
import { TradeStateSchema } from '../persistence/schemas.js';
import { SnapshotStore, type StateSnapshotter } from '../persistence/SnapshotStore.js';
import type { AdminEnv } from '../routes/admin.js';
import { createTradeAdminRoutes } from '../routes/tradeAdmin.js';
import { createTradeRpcService } from '../rpc/handlers/trade.js';
import type { TradeRequest } from '../rpc/protocol/trade.js';
import { RpcServer } from '../rpc/RpcServer.js';
import type { ServerTransport } from '../rpc/transport.js';
import { AuditLog } from '../services/AuditLog.js';
import type { LedgerGateway } from '../services/ledger/LedgerGateway.js';
import type { PricingEngine } from '../services/PricingEngine.js';
import { createTradeState, ListingStore } from '../services/trade/ListingStore.js';
import { SettlementProtocol } from '../services/trade/SettlementProtocol.js';
import type { TradeState } from '../services/trade/types.js';
import { tradeLogger } from '../utils/logger.js';

export interface TradeAppOptions {
    config: Env;
    directory: ContainerDirectory;
    ledger: LedgerGateway;
    snapshots?: StateSnapshotter<TradeState>;
    audit?: AuditLog;
    metrics?: ExchangeMetrics;
    /** reference quotes when a price catalog is reachable in process */
    pricing?: PricingEngine;
    onFatal?: (error: unknown) => void;
    clock?: () => Date;
    newTransactionId?: () => string;
}

export interface TradeApp {
    listings: ListingStore;
    settlement: SettlementProtocol;
    audit: AuditLog;
    dispatcher: Dispatcher;
    metrics: ExchangeMetrics;
    admin: Hono<AdminEnv>;
    attach(transport: ServerTransport): RpcServer<TradeRequest>;
}

export async function createTradeApp(options: TradeAppOptions): Promise<TradeApp> {
    const { config, directory, ledger } = options;
    const snapshots = options.snapshots
        ?? new SnapshotStore(config.trade.dataFile, TradeStateSchema, createTradeState);
    const audit = options.audit
        ?? new AuditLog({ file: config.trade.auditFile, ringSize: config.audit.ringSize, clock: options.clock });
    const metrics = options.metrics ?? new ExchangeMetrics();

    const state = await snapshots.load();
    await audit.load();

    const mover = new InventoryMover(directory);
    const listings = new ListingStore(state, { mover, audit, clock: options.clock });
    const settlement = new SettlementProtocol({
        listings,
        ledger,
        mover,
        audit,
        metrics,
        pricing: options.pricing,
        chargeRetries: config.settlement.chargeRetries,
        newTransactionId: options.newTransactionId,
    });

    const dispatcher = new Dispatcher({
        persist: () => snapshots.save(listings.snapshot()),
        onFatal: options.onFatal,
    });

    if (config.trade.vault && !listings.vaultContainer()) {
        const vaultName = config.trade.vault;
        await dispatcher.mutate(() => listings.configureVault(vaultName));
    }

    const admin = createTradeAdminRoutes({ listings, audit, dispatcher, metrics, token: config.admin.token });
    const service = createTradeRpcService({ ledger, listings, settlement });

    tradeLogger.info(
        { listings: listings.list().length, vault: listings.vaultContainer() },
        'Trade state loaded'
    );

    return {
        listings,
        settlement,
        audit,
        dispatcher,
        metrics,
        admin,
        attach(transport) {
            const server = new RpcServer({
                channel: config.trade.channel,
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
