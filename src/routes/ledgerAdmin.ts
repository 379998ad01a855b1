/**
 * Ledger admin API: account approval and correction, the price catalog,
 * price configuration, the vault, transfer records and the audit trail.
 * Every handler runs in the ledger's serial dispatcher.
 */

import type { Hono } from 'hono';
import { z } from 'zod';
import { NotFoundError } from '../lib/errors/index.js';
import type { Dispatcher } from '../lib/Dispatcher.js';
import type { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import type { AuditLog } from '../services/AuditLog.js';
import type { LedgerStore } from '../services/ledger/LedgerStore.js';
import type { VaultService } from '../services/VaultService.js';
import { createAdminApp, limitParam, readJson, unwrap, type AdminEnv } from './admin.js';

export interface LedgerAdminDeps {
    store: LedgerStore;
    vault: VaultService;
    audit: AuditLog;
    dispatcher: Dispatcher;
    metrics: ExchangeMetrics;
    token: string | null;
}

const CreateAccountBody = z.object({ user: z.string().min(1), pin: z.string().min(1) });
const AdjustBody = z.object({ delta: z.number().int() });
const ItemPriceBody = z.object({ basePrice: z.number().positive() });
const PriceConfigBody = z
    .object({
        maxStock: z.number().positive(),
        minPrice: z.number().min(0),
        elasticity: z.number().min(0),
        currencySymbol: z.string().min(1),
    })
    .partial();
const VaultBody = z.object({ container: z.string().min(1) });

export function createLedgerAdminRoutes(deps: LedgerAdminDeps): Hono<AdminEnv> {
    const { store, vault, audit, dispatcher } = deps;
    const app = createAdminApp({ service: 'ledger', token: deps.token, metrics: deps.metrics });

    // ---- accounts -----------------------------------------------------------

    app.get('/admin/accounts', async (c) => {
        const body = await dispatcher.read(async () => ({
            accounts: store.listAccounts(),
            totalBalance: store.totalBalance(),
        }));
        return c.json(body);
    });

    app.post('/admin/accounts', async (c) => {
        const { user, pin } = await readJson(c, CreateAccountBody);
        const account = unwrap(await dispatcher.mutate(() => store.register(user, pin)));
        return c.json(account, 201);
    });

    app.post('/admin/accounts/:user/approve', async (c) => {
        const user = c.req.param('user');
        return c.json(unwrap(await dispatcher.mutate(() => store.approve(user))));
    });

    app.post('/admin/accounts/:user/adjust', async (c) => {
        const user = c.req.param('user');
        const { delta } = await readJson(c, AdjustBody);
        return c.json(unwrap(await dispatcher.mutate(() => store.adjust(user, delta))));
    });

    // ---- catalog ------------------------------------------------------------

    app.get('/admin/items', async (c) => {
        return c.json({ items: await dispatcher.read(async () => store.listItems()) });
    });

    app.put('/admin/items/:item', async (c) => {
        const item = c.req.param('item');
        const { basePrice } = await readJson(c, ItemPriceBody);
        return c.json(unwrap(await dispatcher.mutate(() => store.setItemPrice(item, basePrice))));
    });

    app.delete('/admin/items/:item', async (c) => {
        const item = c.req.param('item');
        return c.json(unwrap(await dispatcher.mutate(() => store.removeItem(item))));
    });

    app.get('/admin/prices', async (c) => {
        return c.json({ prices: await dispatcher.read(() => vault.getPrices()) });
    });

    // ---- configuration ------------------------------------------------------

    app.get('/admin/config/price', async (c) => {
        return c.json(await dispatcher.read(async () => store.priceConfig()));
    });

    app.put('/admin/config/price', async (c) => {
        const patch = await readJson(c, PriceConfigBody);
        return c.json(unwrap(await dispatcher.mutate(() => store.configurePrice(patch))));
    });

    app.put('/admin/config/vault', async (c) => {
        const { container } = await readJson(c, VaultBody);
        return c.json(unwrap(await dispatcher.mutate(() => store.configureVault(container))));
    });

    app.get('/admin/vault/stock', async (c) => {
        return c.json({ stock: await dispatcher.read(() => vault.getVaultStock()) });
    });

    // ---- transfers ----------------------------------------------------------

    app.get('/admin/transfers/:transactionId', async (c) => {
        const transactionId = c.req.param('transactionId');
        const record = await dispatcher.read(async () => store.getTransfer(transactionId));
        if (!record) throw new NotFoundError(`Transfer '${transactionId}' not found`);
        return c.json(record);
    });

    app.post('/admin/transfers/:transactionId/void', async (c) => {
        const transactionId = c.req.param('transactionId');
        return c.json(unwrap(await dispatcher.mutate(() => store.voidTransfer(transactionId))));
    });

    // ---- audit --------------------------------------------------------------

    app.get('/admin/audit', (c) => c.json({ records: audit.recent(limitParam(c, 100)) }));

    return app;
}
