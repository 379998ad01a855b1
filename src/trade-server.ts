/**
 * Trade process entry point.
 *
 * Reaches the ledger as an RPC client (LEDGER_RPC_URL, ledger channel) and
 * serves the trade channel plus its own admin API.
 */

import { serve } from '@hono/node-server';
import { createTradeApp } from './apps/tradeApp.js';
import { LedgerClient } from './clients/LedgerClient.js';
import { env } from './config/env.js';
import { ExchangeMetrics } from './infra/metrics/Prometheus.js';
import { MemoryContainerDirectory } from './inventory/MemoryContainer.js';
import { GracefulShutdown } from './lib/shutdown.js';
import { RpcClient } from './rpc/RpcClient.js';
import { WsClientTransport, WsServerTransport } from './rpc/websocket.js';
import { logger } from './utils/logger.js';

async function start() {
    const shutdown = new GracefulShutdown();
    try {
        const directory = new MemoryContainerDirectory();
        for (const name of [env.trade.vault, ...env.inventory.containers]) {
            if (name && !directory.get(name)) directory.create(name);
        }

        const metrics = new ExchangeMetrics({ collectDefaults: true });
        const ledgerLink = new WsClientTransport({ url: env.trade.ledgerUrl });
        const ledgerRpc = new RpcClient(ledgerLink, {
            channel: env.ledger.channel,
            timeoutMs: env.rpc.timeoutMs,
            metrics,
        });

        const app = await createTradeApp({
            config: env,
            directory,
            ledger: new LedgerClient(ledgerRpc),
            metrics,
            onFatal: (error) => shutdown.fatal(error),
        });

        const transport = new WsServerTransport({ port: env.trade.rpcPort });
        app.attach(transport);

        const http = serve({ fetch: app.admin.fetch, port: env.trade.adminPort });

        shutdown.register('rpc-transport', 10, () => transport.close());
        shutdown.register('admin-http', 20, () => new Promise<void>((resolve, reject) => {
            http.close((error) => (error ? reject(error) : resolve()));
        }));
        // a purchase mid-settlement still needs the ledger link
        shutdown.register('dispatcher', 30, () => app.dispatcher.executor.idle());
        shutdown.register('ledger-link', 40, async () => {
            await ledgerRpc.close();
            await ledgerLink.close();
        });
        shutdown.setup();

        logger.info(
            {
                channel: env.trade.channel,
                rpcPort: env.trade.rpcPort,
                adminPort: env.trade.adminPort,
                ledgerUrl: env.trade.ledgerUrl,
                containers: directory.names(),
            },
            'Trade server started'
        );
    } catch (err) {
        logger.error({ err }, 'Trade server failed to start');
        process.exit(1);
    }
}

void start();
