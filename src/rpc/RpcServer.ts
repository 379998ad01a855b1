/**
 * RPC SERVER
 *
 * Accepts frames for one channel, validates the body, runs the handler in the
 * process's serial dispatcher and answers over the return path the request
 * came in on. Frames for other channels are ignored.
 */

import { ErrorCodes, fail, type ServiceResult } from '../types/index.js';
import { rpcLogger } from '../utils/logger.js';
import type { ExchangeMetrics } from '../infra/metrics/Prometheus.js';
import type { Dispatcher } from '../lib/Dispatcher.js';
import { parseEnvelope, type RpcEnvelope } from './envelope.js';
import { toWireReply, type ReplyFields, type WireReply } from './protocol/wire.js';
import type { ReturnPath, ServerTransport } from './transport.js';

const logger = rpcLogger;

export interface RpcService<TRequest extends { type: string }> {
    readonly name: string;
    parse(body: unknown): ServiceResult<TRequest>;
    mutates(request: TRequest): boolean;
    handle(request: TRequest): Promise<ServiceResult<ReplyFields>>;
}

export interface RpcServerOptions<TRequest extends { type: string }> {
    channel: number;
    transport: ServerTransport;
    service: RpcService<TRequest>;
    dispatcher: Dispatcher;
    metrics?: ExchangeMetrics;
    /** also broadcast a reply whose return path is gone */
    broadcastFallback?: boolean;
}

export class RpcServer<TRequest extends { type: string }> {
    private started = false;

    constructor(private readonly options: RpcServerOptions<TRequest>) { }

    start(): void {
        if (this.started) return;
        this.started = true;
        this.options.transport.onFrame((frame, returnPath) => {
            this.handleFrame(frame, returnPath).catch((error: unknown) => {
                logger.error({ err: error, service: this.options.service.name }, 'Reply could not be sent');
            });
        });
        logger.info({ service: this.options.service.name, channel: this.options.channel }, 'RPC server started');
    }

    async handleFrame(raw: unknown, returnPath: ReturnPath): Promise<void> {
        const frame = parseEnvelope(raw);
        if (!frame) {
            logger.debug('Dropping malformed frame');
            return;
        }
        if (frame.channel !== this.options.channel) return;

        const body = await this.dispatch(frame.body);
        const reply: RpcEnvelope = {
            channel: frame.channel,
            replyChannel: frame.replyChannel,
            id: frame.id,
            body,
        };
        if (returnPath.reply(reply)) return;

        if (this.options.broadcastFallback) {
            logger.warn({ id: frame.id }, 'Return path gone; broadcasting reply');
            this.options.transport.broadcast(reply);
        } else {
            logger.warn({ id: frame.id }, 'Return path gone; reply dropped');
        }
    }

    /**
     * Validate and execute one request body. Never rejects: faults become
     * INTERNAL_ERROR replies (fatal ones also reach the dispatcher's handler).
     */
    async dispatch(body: unknown): Promise<WireReply> {
        const { service, dispatcher, metrics } = this.options;
        const channel = String(this.options.channel);

        const parsed = service.parse(body);
        if (!parsed.success) {
            metrics?.rpcRequests.inc({ channel, type: 'invalid', outcome: 'error' });
            return toWireReply(parsed);
        }
        const request = parsed.data;

        let result: ServiceResult<ReplyFields>;
        try {
            result = service.mutates(request)
                ? await dispatcher.mutate(() => service.handle(request))
                : await dispatcher.read(() => service.handle(request));
        } catch (error) {
            logger.error({ err: error, service: service.name, type: request.type }, 'Handler failed');
            result = fail(ErrorCodes.INTERNAL_ERROR, 'Internal error');
        }

        metrics?.rpcRequests.inc({ channel, type: request.type, outcome: result.success ? 'ok' : 'error' });
        if (!result.success) {
            logger.info({ service: service.name, type: request.type, code: result.error.code }, 'Request refused');
        }
        return toWireReply(result);
    }
}
