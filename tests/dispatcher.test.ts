import { describe, it, expect, vi } from 'vitest';
import { Dispatcher } from '../src/lib/Dispatcher.js';
import { PersistenceError, ValidationError } from '../src/lib/errors/index.js';
import { SerialExecutor } from '../src/lib/SerialExecutor.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SerialExecutor', () => {
    it('runs tasks one at a time in submission order', async () => {
        const executor = new SerialExecutor();
        const events: string[] = [];
        const task = (name: string, ms: number) => async () => {
            events.push(`${name}:start`);
            await sleep(ms);
            events.push(`${name}:end`);
            return name;
        };

        const results = await Promise.all([executor.run(task('a', 15)), executor.run(task('b', 1))]);

        expect(results).toEqual(['a', 'b']);
        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('keeps going after a failed task', async () => {
        const executor = new SerialExecutor();
        const failed = executor.run(async () => {
            throw new Error('nope');
        });
        const next = executor.run(async () => 'fine');

        await expect(failed).rejects.toThrow('nope');
        await expect(next).resolves.toBe('fine');
        await executor.idle();
        expect(executor.pending).toBe(0);
    });
});

describe('Dispatcher', () => {
    it('persists after a mutation, inside the same slot', async () => {
        const events: string[] = [];
        const dispatcher = new Dispatcher({
            persist: async () => {
                await sleep(5);
                events.push('persist');
            },
        });

        await Promise.all([
            dispatcher.mutate(async () => { events.push('mutate'); }),
            dispatcher.read(async () => { events.push('read'); }),
        ]);

        expect(events).toEqual(['mutate', 'persist', 'read']);
    });

    it('does not persist after a read', async () => {
        const persist = vi.fn(async () => undefined);
        await new Dispatcher({ persist }).read(async () => 1);
        expect(persist).not.toHaveBeenCalled();
    });

    it('hands persistence failures to onFatal and rethrows', async () => {
        const onFatal = vi.fn();
        const dispatcher = new Dispatcher({
            persist: async () => {
                throw new PersistenceError('disk gone', 'ledger.json');
            },
            onFatal,
        });

        await expect(dispatcher.mutate(async () => 'ok')).rejects.toBeInstanceOf(PersistenceError);
        expect(onFatal).toHaveBeenCalledTimes(1);
    });

    it('rethrows ordinary errors without calling onFatal', async () => {
        const onFatal = vi.fn();
        const dispatcher = new Dispatcher({ persist: async () => undefined, onFatal });
        await expect(dispatcher.read(async () => {
            throw new ValidationError('bad');
        })).rejects.toThrow('bad');
        expect(onFatal).not.toHaveBeenCalled();
    });
});
