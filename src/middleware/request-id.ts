/**
 * Request ID Middleware
 *
 * Reuses a client-sent `X-Request-Id` or mints `req_<ULID>`, exposes it as
 * `c.get('requestId')` and echoes it on the response.
 */

import type { Context, Next } from 'hono';
import { ulid } from 'ulidx';

export type RequestIdVariables = {
    requestId: string;
};

export async function requestIdMiddleware(
    c: Context<{ Variables: RequestIdVariables }>,
    next: Next
): Promise<void> {
    const requestId = c.req.header('x-request-id') || `req_${ulid()}`;
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);
    await next();
}
