import { errorClassOf, type ServiceResult } from '../types/index.js';
import { serviceLogger } from './logger.js';

/**
 * FINANCIAL RETRY UTILITY
 *
 * Re-sends an operation whose outcome is unknown (transport ambiguity, i.e.
 * TIMEOUT). Only safe for operations the far side deduplicates, such as a
 * transfer carrying a transactionId. Definite failures are returned at once.
 */

export interface RetryOptions {
    maxRetries?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
}

export interface RetryOutcome<T> {
    result: ServiceResult<T>;
    attempts: number;
}

export async function withFinancialRetry<T>(
    operationName: string,
    operation: () => Promise<ServiceResult<T>>,
    options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
    const maxRetries = Math.max(0, options.maxRetries ?? 1);
    const baseDelay = options.baseDelayMs ?? 0;
    const maxDelay = options.maxDelayMs ?? 2000;

    let attempt = 0;

    while (true) {
        const result = await operation();
        attempt++;

        if (result.success || errorClassOf(result.error.code) !== 'transport_ambiguity') {
            return { result, attempts: attempt };
        }

        if (attempt > maxRetries) {
            serviceLogger.error(
                { operation: operationName, attempts: attempt, error: result.error.code },
                'Outcome still unknown after retries'
            );
            return { result, attempts: attempt };
        }

        const delay = Math.min(maxDelay, baseDelay * Math.pow(2, attempt - 1));
        serviceLogger.warn(
            { operation: operationName, attempt, error: result.error.code, delay },
            'Ambiguous outcome. Retrying with the same key...'
        );
        if (delay > 0) {
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
    }
}
