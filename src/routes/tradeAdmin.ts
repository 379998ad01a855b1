/**
 * Trade admin API: listings, vault configuration and the audit trail.
 */

import type { Hono } from 'hono';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../lib/errors/index.js';
import type { Dispatcher } from '../lib/Dispatcher.js';
import type { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import type { AuditLog } from '../services/AuditLog.js';
import type { ListingStore } from '../services/trade/ListingStore.js';
import { createAdminApp, limitParam, readJson, unwrap, type AdminEnv } from './admin.js';

export interface TradeAdminDeps {
    listings: ListingStore;
    audit: AuditLog;
    dispatcher: Dispatcher;
    metrics: ExchangeMetrics;
    token: string | null;
}

const VaultBody = z.object({ container: z.string().min(1) });

export function createTradeAdminRoutes(deps: TradeAdminDeps): Hono<AdminEnv> {
    const { listings, audit, dispatcher } = deps;
    const app = createAdminApp({ service: 'trade', token: deps.token, metrics: deps.metrics });

    app.get('/admin/listings', async (c) => {
        const all = c.req.query('all') === 'true';
        const rows = await dispatcher.read(async () => (all ? listings.list() : listings.listAvailable()));
        return c.json({ listings: rows });
    });

    app.get('/admin/listings/:id', async (c) => {
        const id = Number(c.req.param('id'));
        if (!Number.isInteger(id) || id <= 0) throw new ValidationError('Listing id must be a positive integer');
        const listing = await dispatcher.read(async () => listings.get(id));
        if (!listing) throw new NotFoundError(`Listing '${id}' not found`);
        return c.json(listing);
    });

    app.put('/admin/config/vault', async (c) => {
        const { container } = await readJson(c, VaultBody);
        return c.json(unwrap(await dispatcher.mutate(() => listings.configureVault(container))));
    });

    app.get('/admin/config', async (c) => {
        return c.json({ vaultContainer: await dispatcher.read(async () => listings.vaultContainer()) });
    });

    app.get('/admin/audit', (c) => c.json({ records: audit.recent(limitParam(c, 100)) }));

    return app;
}
