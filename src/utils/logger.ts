/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Local: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 *
 * Usage:
 *   import { ledgerLogger } from '../utils/logger.js';
 *   ledgerLogger.info({ from, to, amount }, 'Transfer applied');
 *
 * Child loggers for ad-hoc subsystems:
 *   const log = createLogger('vault-scan');
 */

import { pino } from 'pino';
import { env } from '../config/env.js';

export const logger = pino({
    level: env.logLevel,

    // Redact credentials from log output
    redact: {
        paths: ['pin', 'pinHash', 'token', '*.pin', '*.pinHash', 'body.pin', 'req.headers.authorization'],
        censor: '[REDACTED]',
    },

    base: {
        service: 'vault-exchange',
        env: env.mode,
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    transport: env.isLocal
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss.l',
                ignore: 'pid,hostname,service,env',
            },
        }
        : undefined,
});

/**
 * Pre-built child loggers for major subsystems.
 */
export const serviceLogger = logger.child({ module: 'service' });
export const ledgerLogger = logger.child({ module: 'ledger' });
export const tradeLogger = logger.child({ module: 'trade' });
export const settlementLogger = logger.child({ module: 'settlement' });
export const inventoryLogger = logger.child({ module: 'inventory' });
export const rpcLogger = logger.child({ module: 'rpc' });
export const auditLogger = logger.child({ module: 'audit' });
export const adminLogger = logger.child({ module: 'admin' });

export function createLogger(moduleName: string) {
    return logger.child({ module: moduleName });
}
