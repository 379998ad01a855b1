/**
 * SNAPSHOT STORE
 *
 * Whole-state JSON persistence. Every save rewrites the file through a
 * temporary sibling and a rename, so a crash mid-write leaves the previous
 * snapshot intact. Load runs the schema, which merges defaults for fields an
 * older snapshot does not carry.
 *
 * Any I/O or parse failure is a PersistenceError (fatal).
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import { isMissingFile, PersistenceError } from '../lib/errors/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('snapshot');

export interface StateSnapshotter<T> {
    load(): Promise<T>;
    save(state: T): Promise<void>;
}

export class SnapshotStore<T> implements StateSnapshotter<T> {
    private saves = 0;

    constructor(
        readonly file: string,
        private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        private readonly initial: () => T
    ) { }

    async load(): Promise<T> {
        let text: string;
        try {
            text = await readFile(this.file, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                logger.info({ file: this.file }, 'No snapshot yet; starting empty');
                return this.initial();
            }
            throw new PersistenceError(`Cannot read snapshot ${this.file}`, this.file, { cause: error });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            throw new PersistenceError(`Snapshot ${this.file} is not valid JSON`, this.file, { cause: error });
        }

        const parsed = this.schema.safeParse(raw);
        if (!parsed.success) {
            throw new PersistenceError(`Snapshot ${this.file} failed validation`, this.file, {
                cause: parsed.error,
            });
        }
        logger.info({ file: this.file }, 'Snapshot loaded');
        return parsed.data;
    }

    async save(state: T): Promise<void> {
        const temp = `${this.file}.${process.pid}.${this.saves++}.tmp`;
        try {
            await mkdir(path.dirname(this.file), { recursive: true });
            await writeFile(temp, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
            await rename(temp, this.file);
        } catch (error) {
            throw new PersistenceError(`Cannot write snapshot ${this.file}`, this.file, { cause: error });
        }
        logger.debug({ file: this.file }, 'Snapshot saved');
    }
}

/** In-process stand-in that keeps the last saved state as a JSON string. */
export class MemorySnapshotStore<T> implements StateSnapshotter<T> {
    private saved: string | null = null;
    saveCount = 0;
    failNextSave = false;

    constructor(
        private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        private readonly initial: () => T
    ) { }

    async load(): Promise<T> {
        if (this.saved === null) return this.initial();
        return this.schema.parse(JSON.parse(this.saved));
    }

    async save(state: T): Promise<void> {
        if (this.failNextSave) {
            this.failNextSave = false;
            throw new PersistenceError('Simulated snapshot write failure', 'memory');
        }
        this.saved = JSON.stringify(state);
        this.saveCount++;
    }
}
