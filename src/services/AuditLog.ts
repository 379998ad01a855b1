/**
 * AUDIT LOG
 *
 * Append-only record of every mutation a process makes: one JSON object per
 * line in the audit file, plus a bounded ring of the latest records for the
 * admin view. Records are never edited or removed from the file.
 *
 * A failed append is a PersistenceError: the caller's serial slot fails and
 * the process shuts down rather than run with a hole in its trail.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { isMissingFile, PersistenceError } from '../lib/errors/index.js';
import { auditLogger } from '../utils/logger.js';

export type AuditEventType =
    // ledger
    | 'account_created'
    | 'account_approved'
    | 'account_adjusted'
    | 'transfer_applied'
    | 'transfer_refunded'
    | 'transfer_tombstoned'
    | 'item_priced'
    | 'item_removed'
    | 'price_configured'
    | 'vault_configured'
    | 'vault_deposit'
    | 'vault_withdrawal'
    // trade
    | 'listing_created'
    | 'listing_stocked'
    | 'purchase_settled'
    | 'purchase_reverted'
    | 'purchase_unrecovered'
    | 'charge_voided';

export interface AuditRecord {
    at: string;
    event: AuditEventType;
    [field: string]: unknown;
}

export interface AuditLogOptions {
    /** JSON-lines file; null keeps the trail in memory only */
    file: string | null;
    ringSize?: number;
    clock?: () => Date;
}

const DEFAULT_RING_SIZE = 800;

export class AuditLog {
    private readonly ring: AuditRecord[] = [];
    private readonly ringSize: number;
    private readonly clock: () => Date;
    private writes: Promise<void> = Promise.resolve();
    private dirReady = false;

    constructor(private readonly options: AuditLogOptions) {
        this.ringSize = options.ringSize && options.ringSize > 0 ? options.ringSize : DEFAULT_RING_SIZE;
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Prime the ring from the tail of an existing audit file.
     */
    async load(): Promise<number> {
        const file = this.options.file;
        if (!file) return 0;

        let text: string;
        try {
            text = await readFile(file, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return 0;
            throw new PersistenceError(`Cannot read audit file ${file}`, file, { cause: error });
        }

        const lines = text.split('\n').filter((line) => line.trim().length > 0);
        for (const line of lines.slice(-this.ringSize)) {
            const record = parseRecord(line);
            if (record) {
                this.remember(record);
            } else {
                auditLogger.warn({ file }, 'Skipping malformed audit line');
            }
        }
        return this.ring.length;
    }

    async append(event: AuditEventType, fields: Record<string, unknown> = {}): Promise<AuditRecord> {
        const record: AuditRecord = { ...fields, at: this.clock().toISOString(), event };
        this.remember(record);
        auditLogger.info(record, event);

        const file = this.options.file;
        if (file) {
            const line = `${JSON.stringify(record)}\n`;
            const write = this.writes.then(() => this.write(file, line));
            // keep the chain alive for later appends; this caller still sees the failure
            this.writes = write.catch(() => undefined);
            await write;
        }
        return record;
    }

    /**
     * Latest records, oldest first.
     */
    recent(limit?: number): AuditRecord[] {
        if (limit === undefined || limit >= this.ring.length) return [...this.ring];
        if (limit <= 0) return [];
        return this.ring.slice(-limit);
    }

    private remember(record: AuditRecord): void {
        this.ring.push(record);
        if (this.ring.length > this.ringSize) {
            this.ring.splice(0, this.ring.length - this.ringSize);
        }
    }

    private async write(file: string, line: string): Promise<void> {
        try {
            if (!this.dirReady) {
                await mkdir(path.dirname(file), { recursive: true });
                this.dirReady = true;
            }
            await appendFile(file, line, 'utf8');
        } catch (error) {
            throw new PersistenceError(`Cannot append to audit file ${file}`, file, { cause: error });
        }
    }
}

function parseRecord(line: string): AuditRecord | null {
    let value: unknown;
    try {
        value = JSON.parse(line);
    } catch {
        return null;
    }
    if (typeof value !== 'object' || value === null) return null;
    const at: unknown = Reflect.get(value, 'at');
    const event: unknown = Reflect.get(value, 'event');
    if (typeof at !== 'string' || typeof event !== 'string' || !isAuditEventType(event)) return null;
    return { ...Object.fromEntries(Object.entries(value)), at, event };
}

const AUDIT_EVENTS: ReadonlySet<string> = new Set<AuditEventType>([
    'account_created', 'account_approved', 'account_adjusted',
    'transfer_applied', 'transfer_refunded', 'transfer_tombstoned',
    'item_priced', 'item_removed', 'price_configured', 'vault_configured',
    'vault_deposit', 'vault_withdrawal',
    'listing_created', 'listing_stocked',
    'purchase_settled', 'purchase_reverted', 'purchase_unrecovered', 'charge_voided',
]);

function isAuditEventType(value: string): value is AuditEventType {
    return AUDIT_EVENTS.has(value);
}
