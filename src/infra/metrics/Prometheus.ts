import { Counter, Registry, collectDefaultMetrics } from 'prom-client';

export interface MetricsOptions {
    /** process-level default metrics (heap, event loop); off in tests */
    collectDefaults?: boolean;
    prefix?: string;
}

/**
 * One registry per process. Kept as an instance rather than module state so
 * several in-process apps (tests) do not collide on metric names.
 */
export class ExchangeMetrics {
    readonly registry = new Registry();

    readonly settlements: Counter<'outcome'>;
    readonly rpcRequests: Counter<'channel' | 'type' | 'outcome'>;
    readonly rpcTimeouts: Counter<'channel' | 'type'>;
    readonly transfers: Counter<'outcome'>;
    readonly adminRequests: Counter<'method' | 'status_code'>;

    constructor(options: MetricsOptions = {}) {
        const prefix = options.prefix ?? 'exchange_';
        if (options.collectDefaults) {
            collectDefaultMetrics({ register: this.registry, prefix });
        }

        this.settlements = new Counter({
            name: `${prefix}settlements_total`,
            help: 'Purchase settlements by terminal state',
            labelNames: ['outcome'],
            registers: [this.registry],
        });

        this.rpcRequests = new Counter({
            name: `${prefix}rpc_requests_total`,
            help: 'RPC requests handled, by channel, type and outcome',
            labelNames: ['channel', 'type', 'outcome'],
            registers: [this.registry],
        });

        this.rpcTimeouts = new Counter({
            name: `${prefix}rpc_timeouts_total`,
            help: 'Outbound RPC calls that timed out without a reply',
            labelNames: ['channel', 'type'],
            registers: [this.registry],
        });

        this.transfers = new Counter({
            name: `${prefix}ledger_transfers_total`,
            help: 'Ledger transfer attempts by outcome',
            labelNames: ['outcome'],
            registers: [this.registry],
        });

        this.adminRequests = new Counter({
            name: `${prefix}admin_requests_total`,
            help: 'Admin API requests',
            labelNames: ['method', 'status_code'],
            registers: [this.registry],
        });
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    render(): Promise<string> {
        return this.registry.metrics();
    }
}
