import { logger } from '../utils/logger.js';

export interface ShutdownHandler {
    name: string;
    priority: number;
    handler: () => Promise<void>;
}

export interface GracefulShutdownOptions {
    forceExitTimeoutMs?: number;
    exit?: (code: number) => void;
}

export class GracefulShutdown {
    private handlers: ShutdownHandler[] = [];
    private isShuttingDown = false;
    private readonly forceExitTimeoutMs: number;
    private readonly exit: (code: number) => void;

    constructor(options: GracefulShutdownOptions = {}) {
        this.forceExitTimeoutMs = options.forceExitTimeoutMs ?? 45000;
        this.exit = options.exit ?? ((code) => process.exit(code));
    }

    register(name: string, priority: number, handler: () => Promise<void>): void {
        this.handlers.push({ name, priority, handler });
    }

    /**
     * Run handlers lowest priority first, then exit. A non-zero exit code
     * marks a fatal stop (lost durability).
     */
    async shutdown(exitCode = 0): Promise<void> {
        if (this.isShuttingDown) {
            return;
        }

        this.isShuttingDown = true;
        logger.info({ exitCode }, 'Graceful shutdown initiated');

        const timeout = setTimeout(() => {
            logger.error('Force exit timeout reached, exiting with error');
            this.exit(1);
        }, this.forceExitTimeoutMs);

        const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);

        for (const { name, handler } of sortedHandlers) {
            try {
                logger.info(`Running shutdown handler: ${name}`);
                await handler();
                logger.info(`Shutdown handler completed: ${name}`);
            } catch (error) {
                logger.error({ err: error }, `Shutdown handler failed: ${name}`);
            }
        }

        clearTimeout(timeout);
        logger.info('Graceful shutdown completed');
        this.exit(exitCode);
    }

    /** Handler for Dispatcher.onFatal: log and stop with a failure code. */
    fatal(error: unknown): void {
        logger.fatal({ err: error }, 'Fatal error; shutting down');
        void this.shutdown(1);
    }

    setup(): void {
        process.on('SIGTERM', () => {
            logger.info('SIGTERM received');
            void this.shutdown();
        });

        process.on('SIGINT', () => {
            logger.info('SIGINT received');
            void this.shutdown();
        });
    }
}
