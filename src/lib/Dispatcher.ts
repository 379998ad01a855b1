/**
 * DISPATCHER
 *
 * Every inbound request of a process (RPC and admin API alike) runs through
 * one serial executor. Mutations persist the state snapshot inside the same
 * slot, before the next request starts. A persistence failure is handed to
 * `onFatal` and rethrown; the process is expected to stop.
 */

import { isFatal } from './errors/index.js';
import { SerialExecutor } from './SerialExecutor.js';
import { serviceLogger } from '../utils/logger.js';

export interface DispatcherOptions {
    persist: () => Promise<void>;
    onFatal?: (error: unknown) => void;
    executor?: SerialExecutor;
}

export class Dispatcher {
    readonly executor: SerialExecutor;
    private readonly persist: () => Promise<void>;
    private readonly onFatal: (error: unknown) => void;

    constructor(options: DispatcherOptions) {
        this.executor = options.executor ?? new SerialExecutor();
        this.persist = options.persist;
        this.onFatal = options.onFatal ?? ((error) => serviceLogger.fatal({ err: error }, 'Fatal error with no handler'));
    }

    read<T>(task: () => Promise<T>): Promise<T> {
        return this.executor.run(() => this.guard(task));
    }

    mutate<T>(task: () => Promise<T>): Promise<T> {
        return this.executor.run(() =>
            this.guard(async () => {
                const result = await task();
                await this.persist();
                return result;
            })
        );
    }

    private async guard<T>(task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            if (isFatal(error)) this.onFatal(error);
            throw error;
        }
    }
}
