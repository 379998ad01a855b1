/**
 * RPC over the loopback network: correlation, timeouts, lost frames and
 * channel filtering.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { Dispatcher } from '../src/lib/Dispatcher.js';
import { LoopbackNetwork, type LoopbackServerTransport } from '../src/rpc/loopback.js';
import { RpcClient } from '../src/rpc/RpcClient.js';
import { RpcServer, type RpcService } from '../src/rpc/RpcServer.js';
import type { RpcEnvelope } from '../src/rpc/envelope.js';
import { ErrorCodes, fail, ok } from '../src/types/index.js';

type EchoRequest = { type: 'echo'; value: number } | { type: 'bump' } | { type: 'explode' };

const EchoSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('echo'), value: z.number() }),
    z.object({ type: z.literal('bump') }),
    z.object({ type: z.literal('explode') }),
]);

const tick = (ms = 5) => new Promise((resolve) => setTimeout(resolve, ms));

function echoService(label: string, counter: { handled: number }): RpcService<EchoRequest> {
    return {
        name: label,
        parse: (body) => {
            const parsed = EchoSchema.safeParse(body);
            return parsed.success ? ok(parsed.data) : fail(ErrorCodes.UNKNOWN_REQUEST, 'Unknown request');
        },
        mutates: (request) => request.type === 'bump',
        handle: async (request) => {
            counter.handled++;
            if (request.type === 'explode') throw new Error('boom');
            if (request.type === 'bump') return ok({ handled: counter.handled });
            return ok({ value: request.value, from: label });
        },
    };
}

describe('RpcClient and RpcServer over loopback', () => {
    let network: LoopbackNetwork;
    let serverTransport: LoopbackServerTransport;
    let counter: { handled: number };
    let persisted: number;
    let client: RpcClient;
    let ids: number;

    beforeEach(() => {
        network = new LoopbackNetwork();
        serverTransport = network.createServer();
        counter = { handled: 0 };
        persisted = 0;
        const dispatcher = new Dispatcher({ persist: async () => { persisted++; } });
        new RpcServer({ channel: 1, transport: serverTransport, service: echoService('one', counter), dispatcher }).start();

        ids = 0;
        client = new RpcClient(network.createClient(), { channel: 1, timeoutMs: 30, newId: () => `id-${++ids}` });
    });

    afterEach(async () => {
        await client.close();
        network.close();
    });

    it('correlates a reply with its request', async () => {
        const [a, b] = await Promise.all([
            client.request({ type: 'echo', value: 1 }),
            client.request({ type: 'echo', value: 2 }),
        ]);
        expect(a).toEqual({ success: true, data: { value: 1, from: 'one' } });
        expect(b).toEqual({ success: true, data: { value: 2, from: 'one' } });
        expect(client.inFlight).toBe(0);
    });

    it('times out when the request is lost', async () => {
        network.failNext('request');
        const result = await client.request({ type: 'echo', value: 1 });
        expect(result).toEqual({
            success: false,
            error: { code: 'TIMEOUT', message: 'Timed out waiting for reply', details: { type: 'echo', id: 'id-1' } },
        });
        expect(counter.handled).toBe(0);
    });

    it('times out when the reply is lost even though the server acted', async () => {
        network.failNext('reply');
        const result = await client.request({ type: 'bump' });
        expect(!result.success && result.error.code).toBe('TIMEOUT');
        expect(counter.handled).toBe(1);
        expect(persisted).toBe(1);
        expect(network.dropped).toEqual({ request: 0, reply: 1 });
    });

    it('answers only on its own channel', async () => {
        const other = { handled: 0 };
        const dispatcher = new Dispatcher({ persist: async () => undefined });
        new RpcServer({ channel: 2, transport: network.createServer(), service: echoService('two', other), dispatcher }).start();

        const result = await client.request({ type: 'echo', value: 5 });
        expect(result.success && result.data.from).toBe('one');
        expect(other.handled).toBe(0);
    });

    it('ignores replies with unknown ids', async () => {
        const pending = client.request({ type: 'echo', value: 9 }, 200);
        serverTransport.broadcast({ channel: 1, replyChannel: 1, id: 'stray', body: { ok: true, value: 0 } });
        expect(await pending).toEqual({ success: true, data: { value: 9, from: 'one' } });
    });

    it('turns a handler exception into INTERNAL_ERROR', async () => {
        const result = await client.request({ type: 'explode' });
        expect(result).toEqual({ success: false, error: { code: 'INTERNAL_ERROR', message: 'Internal error' } });
    });

    it('refuses unknown request types', async () => {
        const result = await client.request({ type: 'teleport' });
        expect(!result.success && result.error.code).toBe('UNKNOWN_REQUEST');
    });

    it('validates the reply payload', async () => {
        const result = await client.call({ type: 'echo', value: 1 }, z.object({ value: z.string() }));
        expect(result).toEqual({
            success: false,
            error: { code: 'INTERNAL_ERROR', message: 'Malformed reply', details: { type: 'echo' } },
        });
    });

    it('fails pending calls on close', async () => {
        network.partition();
        const pending = client.request({ type: 'echo', value: 1 }, 10_000);
        await client.close();
        const result = await pending;
        expect(!result.success && result.error.message).toBe('RPC client closed');
    });

    it('drops everything while partitioned and recovers on heal', async () => {
        network.partition();
        expect((await client.request({ type: 'echo', value: 1 })).success).toBe(false);
        network.heal();
        expect((await client.request({ type: 'echo', value: 2 })).success).toBe(true);
        expect(network.dropped.request).toBe(1);
    });

    it('drops frames at the configured rate', async () => {
        network.setDropRate(1, () => 0.5);
        const result = await client.request({ type: 'echo', value: 1 });
        expect(!result.success && result.error.code).toBe('TIMEOUT');
        expect(network.sent.request).toBe(1);
        expect(network.dropped.request).toBe(1);
    });
});

describe('RpcServer reply fallback', () => {
    it('broadcasts a reply whose return path is gone', async () => {
        const network = new LoopbackNetwork();
        const transport = network.createServer();
        const listener = network.createClient();
        const seen: unknown[] = [];
        listener.onFrame((frame) => seen.push(frame));

        const server = new RpcServer({
            channel: 1,
            transport,
            service: echoService('one', { handled: 0 }),
            dispatcher: new Dispatcher({ persist: async () => undefined }),
            broadcastFallback: true,
        });
        const request: RpcEnvelope = { channel: 1, replyChannel: 1, id: 'req-1', body: { type: 'echo', value: 4 } };
        await server.handleFrame(request, { reply: () => false });
        await tick();

        expect(seen).toEqual([{ channel: 1, replyChannel: 1, id: 'req-1', body: { value: 4, from: 'one', ok: true } }]);
        network.close();
    });

    it('ignores malformed frames', async () => {
        const network = new LoopbackNetwork();
        const counter = { handled: 0 };
        const server = new RpcServer({
            channel: 1,
            transport: network.createServer(),
            service: echoService('one', counter),
            dispatcher: new Dispatcher({ persist: async () => undefined }),
        });
        let replied = false;
        await server.handleFrame({ nonsense: true }, { reply: () => { replied = true; return true; } });
        expect(replied).toBe(false);
        expect(counter.handled).toBe(0);
        network.close();
    });
});
