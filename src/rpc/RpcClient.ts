/**
 * RPC CLIENT
 *
 * Request/reply over an unreliable transport. Each request carries a fresh
 * ULID; the client waits for a reply on the same channel with the same id and
 * ignores everything else. No reply within the timeout yields TIMEOUT, which
 * means "outcome unknown", not "failed": the far side may have acted.
 */

import { ulid } from 'ulidx';
import type { z } from 'zod';
import { ErrorCodes, fail, ok, type ServiceResult } from '../types/index.js';
import { rpcLogger } from '../utils/logger.js';
import type { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import { parseEnvelope } from './envelope.js';
import { fromWireReply, type ReplyFields } from './protocol/wire.js';
import type { ClientTransport } from './transport.js';

const logger = rpcLogger;

export const DEFAULT_RPC_TIMEOUT_MS = 6000;

export interface RpcClientOptions {
    channel: number;
    replyChannel?: number;
    timeoutMs?: number;
    metrics?: ExchangeMetrics;
    newId?: () => string;
}

export interface RequestBody {
    type: string;
    [field: string]: unknown;
}

interface PendingCall {
    type: string;
    timer: NodeJS.Timeout;
    resolve: (result: ServiceResult<ReplyFields>) => void;
}

export class RpcClient {
    private readonly pending = new Map<string, PendingCall>();
    private readonly unsubscribe: () => void;
    private readonly timeoutMs: number;
    private readonly newId: () => string;
    private closed = false;

    constructor(private readonly transport: ClientTransport, private readonly options: RpcClientOptions) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
        this.newId = options.newId ?? (() => ulid());
        this.unsubscribe = transport.onFrame((frame) => this.onFrame(frame));
    }

    get inFlight(): number {
        return this.pending.size;
    }

    request(body: RequestBody, timeoutMs: number = this.timeoutMs): Promise<ServiceResult<ReplyFields>> {
        if (this.closed) {
            return Promise.resolve(fail(ErrorCodes.TIMEOUT, 'RPC client closed'));
        }
        const id = this.newId();
        const channel = this.options.channel;

        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.pending.delete(id);
                this.options.metrics?.rpcTimeouts.inc({ channel: String(channel), type: body.type });
                logger.warn({ id, channel, type: body.type, timeoutMs }, 'RPC timed out; outcome unknown');
                resolve(fail(ErrorCodes.TIMEOUT, 'Timed out waiting for reply', { type: body.type, id }));
            }, timeoutMs);

            this.pending.set(id, { type: body.type, timer, resolve });
            this.transport.send({
                channel,
                replyChannel: this.options.replyChannel ?? channel,
                id,
                body,
            });
        });
    }

    /**
     * Request and validate the success payload.
     */
    async call<T>(body: RequestBody, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ServiceResult<T>> {
        const result = await this.request(body);
        if (!result.success) return result;
        const parsed = schema.safeParse(result.data);
        if (!parsed.success) {
            logger.error({ type: body.type, issues: parsed.error.issues }, 'Malformed reply payload');
            return fail(ErrorCodes.INTERNAL_ERROR, 'Malformed reply', { type: body.type });
        }
        return ok(parsed.data);
    }

    async close(): Promise<void> {
        this.closed = true;
        this.unsubscribe();
        for (const [id, call] of this.pending) {
            clearTimeout(call.timer);
            call.resolve(fail(ErrorCodes.TIMEOUT, 'RPC client closed', { type: call.type, id }));
        }
        this.pending.clear();
    }

    private onFrame(raw: unknown): void {
        const frame = parseEnvelope(raw);
        if (!frame || frame.channel !== this.options.channel) return;
        const call = this.pending.get(frame.id);
        if (!call) {
            logger.debug({ id: frame.id }, 'Ignoring reply with unknown id');
            return;
        }
        this.pending.delete(frame.id);
        clearTimeout(call.timer);
        call.resolve(fromWireReply(frame.body));
    }
}
