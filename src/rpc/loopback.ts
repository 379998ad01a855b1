/**
 * LOOPBACK NETWORK
 *
 * In-process stand-in for the wireless link. Frames are copied through JSON
 * (as on a real wire) and delivered on a later tick, never synchronously.
 *
 * Fault injection, deterministic unless a drop rate is set:
 *   network.failNext('request' | 'reply', count)   drop the next N frames
 *   network.setDropRate(0.2, rng)                   random loss
 *   network.setDelay(50)                            latency per frame
 *   network.partition() / network.heal()            drop everything
 */

import type { RpcEnvelope } from './envelope.js';
import type { ClientTransport, InboundListener, ServerTransport } from './transport.js';

export type FrameDirection = 'request' | 'reply';

function toWire(frame: RpcEnvelope): unknown {
    return JSON.parse(JSON.stringify(frame));
}

export class LoopbackNetwork {
    private readonly servers = new Set<LoopbackServerTransport>();
    private readonly clients = new Set<LoopbackClientTransport>();
    private readonly pendingDrops: Record<FrameDirection, number> = { request: 0, reply: 0 };
    private dropRate = 0;
    private random: () => number = Math.random;
    private delayMs = 0;
    private partitioned = false;
    private readonly timers = new Set<NodeJS.Timeout>();

    /** frames handed to the network, delivered or not */
    readonly sent: Record<FrameDirection, number> = { request: 0, reply: 0 };
    readonly dropped: Record<FrameDirection, number> = { request: 0, reply: 0 };

    createServer(): LoopbackServerTransport {
        const server = new LoopbackServerTransport(this);
        this.servers.add(server);
        return server;
    }

    createClient(): LoopbackClientTransport {
        const client = new LoopbackClientTransport(this);
        this.clients.add(client);
        return client;
    }

    failNext(direction: FrameDirection, count = 1): void {
        this.pendingDrops[direction] += count;
    }

    setDropRate(rate: number, random: () => number = Math.random): void {
        this.dropRate = Math.min(1, Math.max(0, rate));
        this.random = random;
    }

    setDelay(ms: number): void {
        this.delayMs = Math.max(0, ms);
    }

    partition(): void {
        this.partitioned = true;
    }

    heal(): void {
        this.partitioned = false;
    }

    /** @internal */
    detach(endpoint: LoopbackServerTransport | LoopbackClientTransport): void {
        if (endpoint instanceof LoopbackServerTransport) {
            this.servers.delete(endpoint);
        } else {
            this.clients.delete(endpoint);
        }
    }

    /** @internal client -> every server */
    sendRequest(frame: RpcEnvelope, from: LoopbackClientTransport): void {
        if (this.shouldDrop('request')) return;
        const wire = toWire(frame);
        for (const server of this.servers) {
            this.deliver(() => server.receive(wire, from));
        }
    }

    /** @internal server -> the one client that asked */
    sendReply(frame: RpcEnvelope, to: LoopbackClientTransport): boolean {
        if (!this.clients.has(to)) return false;
        if (this.shouldDrop('reply')) return true;
        const wire = toWire(frame);
        this.deliver(() => to.receive(wire));
        return true;
    }

    /** @internal server -> every client */
    broadcastReply(frame: RpcEnvelope): void {
        if (this.shouldDrop('reply')) return;
        const wire = toWire(frame);
        for (const client of this.clients) {
            this.deliver(() => client.receive(wire));
        }
    }

    close(): void {
        for (const timer of this.timers) clearTimeout(timer);
        this.timers.clear();
        this.servers.clear();
        this.clients.clear();
    }

    private shouldDrop(direction: FrameDirection): boolean {
        this.sent[direction]++;
        let drop = this.partitioned;
        if (!drop && this.pendingDrops[direction] > 0) {
            this.pendingDrops[direction]--;
            drop = true;
        }
        if (!drop && this.dropRate > 0 && this.random() < this.dropRate) {
            drop = true;
        }
        if (drop) this.dropped[direction]++;
        return drop;
    }

    private deliver(fn: () => void): void {
        const timer = setTimeout(() => {
            this.timers.delete(timer);
            fn();
        }, this.delayMs);
        this.timers.add(timer);
    }
}

export class LoopbackServerTransport implements ServerTransport {
    private readonly listeners: InboundListener[] = [];

    constructor(private readonly network: LoopbackNetwork) { }

    onFrame(listener: InboundListener): void {
        this.listeners.push(listener);
    }

    broadcast(frame: RpcEnvelope): void {
        this.network.broadcastReply(frame);
    }

    async close(): Promise<void> {
        this.network.detach(this);
        this.listeners.length = 0;
    }

    /** @internal */
    receive(frame: unknown, from: LoopbackClientTransport): void {
        const returnPath = { reply: (reply: RpcEnvelope) => this.network.sendReply(reply, from) };
        for (const listener of this.listeners) listener(frame, returnPath);
    }
}

export class LoopbackClientTransport implements ClientTransport {
    private readonly listeners = new Set<(frame: unknown) => void>();

    constructor(private readonly network: LoopbackNetwork) { }

    send(frame: RpcEnvelope): void {
        this.network.sendRequest(frame, this);
    }

    onFrame(listener: (frame: unknown) => void): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    async close(): Promise<void> {
        this.network.detach(this);
        this.listeners.clear();
    }

    /** @internal */
    receive(frame: unknown): void {
        for (const listener of this.listeners) listener(frame);
    }
}
