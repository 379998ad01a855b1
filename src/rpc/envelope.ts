import { z } from 'zod';

/**
 * Wire frame shared by every transport. `id` correlates a reply with its
 * request; replies travel on the request's channel.
 */
export const RpcEnvelopeSchema = z.object({
    channel: z.number().int().min(0),
    replyChannel: z.number().int().min(0),
    id: z.string().min(1),
    body: z.unknown(),
});

export type RpcEnvelope = z.infer<typeof RpcEnvelopeSchema>;

export function parseEnvelope(raw: unknown): RpcEnvelope | null {
    const parsed = RpcEnvelopeSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}
