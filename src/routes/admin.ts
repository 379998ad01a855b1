/**
 * Shared wiring for the per-process admin API: request ids, access log,
 * body limit, error mapping, /health and /metrics, and bearer auth on
 * everything under /admin.
 */

import { Hono, type Context } from 'hono';
import { bearerAuth } from 'hono/bearer-auth';
import { bodyLimit } from 'hono/body-limit';
import type { z } from 'zod';
import { AppError, ValidationError } from '../lib/errors/index.js';
import { createHonoErrorHandler } from '../lib/errors/error-handler.js';
import type { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import { requestIdMiddleware, type RequestIdVariables } from '../middleware/request-id.js';
import type { ServiceResult } from '../types/index.js';
import { adminLogger } from '../utils/logger.js';

export type AdminEnv = { Variables: RequestIdVariables };

export interface AdminAppOptions {
    service: string;
    token: string | null;
    metrics: ExchangeMetrics;
}

export function createAdminApp(options: AdminAppOptions): Hono<AdminEnv> {
    const app = new Hono<AdminEnv>();

    app.use('*', bodyLimit({
        maxSize: 64 * 1024,
        onError: (c) => c.json({ error: { code: 'VALIDATION_ERROR', message: 'Request body too large' } }, 413),
    }));
    app.use('*', requestIdMiddleware);
    app.use('*', async (c, next) => {
        const start = Date.now();
        await next();
        const status = c.res.status;
        options.metrics.adminRequests.inc({ method: c.req.method, status_code: String(status) });
        adminLogger.info(
            {
                requestId: c.get('requestId'),
                method: c.req.method,
                path: c.req.path,
                status,
                durationMs: Date.now() - start,
            },
            'admin request'
        );
    });

    app.onError(createHonoErrorHandler());

    app.get('/health', (c) => c.json({ status: 'ok', service: options.service }));

    app.get('/metrics', async (c) => {
        const metrics = await options.metrics.render();
        return c.text(metrics, 200, { 'Content-Type': options.metrics.contentType });
    });

    if (options.token) {
        app.use('/admin/*', bearerAuth({ token: options.token }));
    } else {
        adminLogger.warn({ service: options.service }, 'ADMIN_TOKEN not set; admin API is unauthenticated');
    }

    return app;
}

export async function readJson<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let raw: unknown;
    try {
        raw = await c.req.json();
    } catch {
        throw new ValidationError('Body must be JSON');
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
        throw new ValidationError(`Invalid body: ${fields}`);
    }
    return parsed.data;
}

export function unwrap<T>(result: ServiceResult<T>): T {
    if (!result.success) throw AppError.fromServiceError(result.error);
    return result.data;
}

export function limitParam(c: Context, fallback: number): number {
    const value = Number(c.req.query('limit'));
    return Number.isInteger(value) && value > 0 ? value : fallback;
}
