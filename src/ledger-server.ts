/**
 * Ledger process entry point.
 *
 * Serves the ledger RPC channel over WebSocket and the admin API over HTTP.
 * Containers are in-process stand-ins created at boot (the vault plus
 * MEMORY_CONTAINERS).
 */

import { serve } from '@hono/node-server';
import { createLedgerApp } from './apps/ledgerApp.js';
import { env } from './config/env.js';
import { ExchangeMetrics } from './infra/metrics/Prometheus.js';
import { MemoryContainerDirectory } from './inventory/MemoryContainer.js';
import { GracefulShutdown } from './lib/shutdown.js';
import { WsServerTransport } from './rpc/websocket.js';
import { logger } from './utils/logger.js';

async function start() {
    const shutdown = new GracefulShutdown();
    try {
        const directory = new MemoryContainerDirectory();
        for (const name of [env.ledger.vault, ...env.inventory.containers]) {
            if (name && !directory.get(name)) directory.create(name);
        }
        const app = await createLedgerApp({
            config: env,
            directory,
            metrics: new ExchangeMetrics({ collectDefaults: true }),
            onFatal: (error) => shutdown.fatal(error),
        });

        const transport = new WsServerTransport({ port: env.ledger.rpcPort });
        app.attach(transport);

        const http = serve({ fetch: app.admin.fetch, port: env.ledger.adminPort });

        // stop taking requests first, then drain the serial queue
        shutdown.register('rpc-transport', 10, () => transport.close());
        shutdown.register('admin-http', 20, () => new Promise<void>((resolve, reject) => {
            http.close((error) => (error ? reject(error) : resolve()));
        }));
        shutdown.register('dispatcher', 30, () => app.dispatcher.executor.idle());
        shutdown.setup();

        logger.info(
            {
                channel: env.ledger.channel,
                rpcPort: env.ledger.rpcPort,
                adminPort: env.ledger.adminPort,
                containers: directory.names(),
            },
            'Ledger server started'
        );
    } catch (err) {
        logger.error({ err }, 'Ledger server failed to start');
        process.exit(1);
    }
}

void start();
