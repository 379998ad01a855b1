/**
 * INVENTORY MOVER
 *
 * Slot-granular, best-effort transfer of up to N units of one item between
 * two containers. The returned `moved` count is the truth; a short count is
 * the only failure signal and deciding what "enough" means is the caller's job.
 *
 * Guarantees:
 * - moved <= requested, always (device over-reports are clamped)
 * - only slots holding `item` are touched
 * - requested <= 0 is a no-op
 * - a container never moves into itself: 0 moved, shortfall 'same_container'
 * - no rollback: reversing a move is another, equally partial, move
 */

import { inventoryLogger } from '../utils/logger.js';
import type {
    Container,
    ContainerDirectory,
    ItemStack,
    MoveReport,
    MoveShortfall,
    SlotListing,
    StockSnapshot,
} from './types.js';

const logger = inventoryLogger;

export interface SlotPush {
    accepted: number;
    failed: boolean;
}

export function tallyStock(listing: SlotListing): StockSnapshot {
    const stock: StockSnapshot = new Map();
    for (const stack of listing.values()) {
        if (!stack.item || stack.count <= 0) continue;
        stock.set(stack.item, (stock.get(stack.item) ?? 0) + stack.count);
    }
    return stock;
}

function sortedSlots(listing: SlotListing): Array<[number, ItemStack]> {
    return [...listing.entries()].sort(([a], [b]) => a - b);
}

export class InventoryMover {
    constructor(private readonly directory: ContainerDirectory) { }

    /**
     * Live item counts for a container, or null when it cannot be reached.
     */
    async scanStock(containerName: string): Promise<StockSnapshot | null> {
        const container = this.directory.resolve(containerName);
        if (!container) return null;
        try {
            return tallyStock(await container.list());
        } catch (error) {
            logger.error({ err: error, container: containerName }, 'Container scan failed');
            return null;
        }
    }

    async move(
        sourceName: string,
        destinationName: string,
        item: string,
        requested: number
    ): Promise<MoveReport> {
        const report = (moved: number, shortfall: MoveShortfall | null, asked: number): MoveReport => ({
            item,
            requested: asked,
            moved,
            shortfall,
        });

        if (!Number.isFinite(requested) || requested <= 0) {
            return report(0, null, 0);
        }
        const wanted = Math.floor(requested);
        if (wanted <= 0) return report(0, null, 0);
        if (sourceName === destinationName) return report(0, 'same_container', wanted);

        const source = this.directory.resolve(sourceName);
        if (!source) return report(0, 'source_missing', wanted);
        if (!this.directory.resolve(destinationName)) return report(0, 'destination_missing', wanted);

        let listing: SlotListing;
        try {
            listing = await source.list();
        } catch (error) {
            logger.error({ err: error, source: sourceName }, 'Source scan failed before move');
            return report(0, 'device_error', wanted);
        }

        let moved = 0;
        let refused = false;

        for (const [slot, stack] of sortedSlots(listing)) {
            const remaining = wanted - moved;
            if (remaining <= 0) break;
            if (stack.item !== item || stack.count <= 0) continue;

            const ask = Math.min(remaining, stack.count);
            const push = await this.pushSlot(source, destinationName, slot, item, ask);
            if (push.failed) {
                logger.error(
                    { source: sourceName, destination: destinationName, slot, item, movedSoFar: moved },
                    'Device error during move; stopping with partial count'
                );
                return report(moved, 'device_error', wanted);
            }
            const accepted = push.accepted;
            if (accepted < ask) refused = true;
            moved += accepted;
        }

        let shortfall: MoveShortfall | null = null;
        if (moved < wanted) {
            shortfall = refused ? 'destination_full' : 'insufficient_stock';
            logger.warn(
                { source: sourceName, destination: destinationName, item, requested: wanted, moved, shortfall },
                'Short move'
            );
        } else {
            logger.debug({ source: sourceName, destination: destinationName, item, moved }, 'Move complete');
        }

        return report(moved, shortfall, wanted);
    }

    /**
     * Push up to `ask` units out of one slot. Used where each slot is priced
     * on its own; the count is clamped exactly as in `move`.
     */
    async moveSlot(sourceName: string, destinationName: string, slot: number, item: string, ask: number): Promise<SlotPush> {
        if (sourceName === destinationName) return { accepted: 0, failed: true };
        const source = this.directory.resolve(sourceName);
        if (!source || !this.directory.resolve(destinationName)) return { accepted: 0, failed: true };
        return this.pushSlot(source, destinationName, slot, item, ask);
    }

    private async pushSlot(
        source: Container,
        destinationName: string,
        slot: number,
        item: string,
        ask: number
    ): Promise<SlotPush> {
        if (!Number.isFinite(ask) || ask <= 0) return { accepted: 0, failed: false };
        let reported: number;
        try {
            reported = await source.moveUnits(destinationName, slot, ask);
        } catch (error) {
            logger.error({ err: error, source: source.name, destination: destinationName, slot, item }, 'Device error');
            return { accepted: 0, failed: true };
        }
        const accepted = Number.isFinite(reported) ? Math.min(Math.max(0, Math.floor(reported)), ask) : 0;
        if (accepted !== reported) {
            logger.warn({ slot, item, ask, reported, accepted }, 'Device reported an impossible count; clamped');
        }
        return { accepted, failed: false };
    }
}
