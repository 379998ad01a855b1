/**
 * Transport contracts. Transports move opaque frames and promise nothing:
 * frames may be lost, delayed or duplicated. Correlation and timeouts live in
 * RpcClient; validation lives in RpcServer.
 */

import type { RpcEnvelope } from './envelope.js';

/** Where the reply to one inbound frame goes. False when the path is gone. */
export interface ReturnPath {
    reply(frame: RpcEnvelope): boolean;
}

export type InboundListener = (frame: unknown, returnPath: ReturnPath) => void;

export interface ServerTransport {
    onFrame(listener: InboundListener): void;
    /** deliver to every connected peer; only used under the broadcast fallback policy */
    broadcast(frame: RpcEnvelope): void;
    close(): Promise<void>;
}

export interface ClientTransport {
    send(frame: RpcEnvelope): void;
    onFrame(listener: (frame: unknown) => void): () => void;
    close(): Promise<void>;
}
