/**
 * WebSocket transports (ws). One JSON frame per message.
 *
 * The client reconnects on its own; frames sent while disconnected are lost,
 * which callers already treat as a timeout.
 */

import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { rpcLogger } from '../utils/logger.js';
import type { RpcEnvelope } from './envelope.js';
import type { ClientTransport, InboundListener, ServerTransport } from './transport.js';

const logger = rpcLogger;

function decode(data: RawData): unknown {
    try {
        return JSON.parse(data.toString());
    } catch {
        logger.warn('Discarding non-JSON frame');
        return undefined;
    }
}

export interface WsServerOptions {
    port: number;
    host?: string;
}

export class WsServerTransport implements ServerTransport {
    private readonly server: WebSocketServer;
    private readonly listeners: InboundListener[] = [];

    constructor(options: WsServerOptions) {
        this.server = new WebSocketServer({ port: options.port, host: options.host });
        this.server.on('connection', (socket) => {
            socket.on('message', (data) => {
                const frame = decode(data);
                if (frame === undefined) return;
                const returnPath = {
                    reply: (reply: RpcEnvelope): boolean => {
                        if (socket.readyState !== WebSocket.OPEN) return false;
                        socket.send(JSON.stringify(reply));
                        return true;
                    },
                };
                for (const listener of this.listeners) listener(frame, returnPath);
            });
            socket.on('error', (error) => logger.warn({ err: error }, 'Peer socket error'));
        });
        this.server.on('error', (error) => logger.error({ err: error }, 'RPC server socket error'));
        logger.info({ port: options.port }, 'RPC transport listening');
    }

    onFrame(listener: InboundListener): void {
        this.listeners.push(listener);
    }

    broadcast(frame: RpcEnvelope): void {
        const text = JSON.stringify(frame);
        for (const socket of this.server.clients) {
            if (socket.readyState === WebSocket.OPEN) socket.send(text);
        }
    }

    close(): Promise<void> {
        for (const socket of this.server.clients) socket.terminate();
        return new Promise((resolve, reject) => {
            this.server.close((error) => (error ? reject(error) : resolve()));
        });
    }
}

export interface WsClientOptions {
    url: string;
    reconnectDelayMs?: number;
}

export class WsClientTransport implements ClientTransport {
    private socket: WebSocket | null = null;
    private readonly listeners = new Set<(frame: unknown) => void>();
    private closed = false;
    private reconnectTimer: NodeJS.Timeout | null = null;

    constructor(private readonly options: WsClientOptions) {
        this.connect();
    }

    private connect(): void {
        const socket = new WebSocket(this.options.url);
        this.socket = socket;
        socket.on('open', () => logger.info({ url: this.options.url }, 'Connected to RPC peer'));
        socket.on('message', (data) => {
            const frame = decode(data);
            if (frame === undefined) return;
            for (const listener of this.listeners) listener(frame);
        });
        socket.on('error', (error) => logger.warn({ err: error, url: this.options.url }, 'RPC link error'));
        socket.on('close', () => {
            if (this.closed) return;
            this.reconnectTimer = setTimeout(() => {
                this.reconnectTimer = null;
                this.connect();
            }, this.options.reconnectDelayMs ?? 1000);
        });
    }

    send(frame: RpcEnvelope): void {
        if (!this.socket || this.socket.readyState !== WebSocket.OPEN) {
            logger.warn({ id: frame.id }, 'RPC link down; frame lost');
            return;
        }
        this.socket.send(JSON.stringify(frame));
    }

    onFrame(listener: (frame: unknown) => void): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    async close(): Promise<void> {
        this.closed = true;
        if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
        this.socket?.close();
        this.listeners.clear();
    }
}
