import { z } from 'zod';
import { ErrorCodes, fail, isErrorCode, ok, type ServiceResult } from '../../types/index.js';

/**
 * Reply body on the wire: `{ ok: true, ...fields }` or
 * `{ ok: false, error, code }`.
 */
export type WireReply =
    | ({ ok: true } & Record<string, unknown>)
    | { ok: false; error: string; code: string; details?: Record<string, unknown> };

const WireReplySchema = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true) }).passthrough(),
    z.object({
        ok: z.literal(false),
        error: z.string(),
        code: z.string(),
        details: z.record(z.unknown()).optional(),
    }),
]);

export type ReplyFields = Record<string, unknown>;

export function toWireReply(result: ServiceResult<ReplyFields>): WireReply {
    if (result.success) return { ...result.data, ok: true as const };
    const { code, message, details } = result.error;
    return details ? { ok: false, error: message, code, details } : { ok: false, error: message, code };
}

export function fromWireReply(raw: unknown): ServiceResult<ReplyFields> {
    const parsed = WireReplySchema.safeParse(raw);
    if (!parsed.success) return fail(ErrorCodes.INTERNAL_ERROR, 'Malformed reply');
    const reply = parsed.data;
    if (reply.ok) {
        const { ok: _ok, ...fields } = reply;
        return ok(fields);
    }
    const code = isErrorCode(reply.code) ? reply.code : ErrorCodes.INTERNAL_ERROR;
    return fail(code, reply.error, reply.details);
}
