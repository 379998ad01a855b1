import type { Container, ContainerDirectory, ItemStack, SlotListing } from './types.js';

export interface MemoryContainerOptions {
    slots?: number;
    stackLimit?: number;
}

const DEFAULT_SLOTS = 27;
const DEFAULT_STACK_LIMIT = 64;

/**
 * In-process slot container: a chest with a fixed number of slots, each
 * holding one item kind up to `stackLimit` units. Slots are numbered from 1.
 */
export class MemoryContainer implements Container {
    readonly name: string;
    readonly size: number;
    readonly stackLimit: number;
    private readonly slots = new Map<number, ItemStack>();

    constructor(
        name: string,
        private readonly directory: MemoryContainerDirectory,
        options: MemoryContainerOptions = {}
    ) {
        this.name = name;
        this.size = options.slots ?? DEFAULT_SLOTS;
        this.stackLimit = options.stackLimit ?? DEFAULT_STACK_LIMIT;
    }

    async list(): Promise<SlotListing> {
        return new Map(this.slots);
    }

    async moveUnits(destination: string, slot: number, count: number): Promise<number> {
        const target = this.directory.get(destination);
        if (!target) {
            throw new Error(`Target '${destination}' does not exist`);
        }
        const stack = this.slots.get(slot);
        if (!stack || count <= 0) return 0;

        const accepted = target.insert(stack.item, Math.min(count, stack.count));
        this.take(slot, accepted);
        return accepted;
    }

    /**
     * Place units, topping up existing stacks first, then empty slots.
     * Returns how many fit.
     */
    insert(item: string, count: number): number {
        let remaining = Math.max(0, Math.floor(count));

        for (const [slot, stack] of [...this.slots.entries()].sort(([a], [b]) => a - b)) {
            if (remaining === 0) break;
            if (stack.item !== item) continue;
            const room = this.stackLimit - stack.count;
            const put = Math.min(room, remaining);
            if (put > 0) {
                this.slots.set(slot, { item, count: stack.count + put });
                remaining -= put;
            }
        }

        for (let slot = 1; slot <= this.size && remaining > 0; slot++) {
            if (this.slots.has(slot)) continue;
            const put = Math.min(this.stackLimit, remaining);
            this.slots.set(slot, { item, count: put });
            remaining -= put;
        }

        return Math.floor(count) - remaining;
    }

    /** Overwrite one slot; `null` empties it. */
    setSlot(slot: number, stack: ItemStack | null): void {
        if (slot < 1 || slot > this.size) {
            throw new RangeError(`Slot ${slot} out of range 1..${this.size}`);
        }
        if (stack === null || stack.count <= 0) {
            this.slots.delete(slot);
        } else {
            this.slots.set(slot, { item: stack.item, count: stack.count });
        }
    }

    countOf(item: string): number {
        let total = 0;
        for (const stack of this.slots.values()) {
            if (stack.item === item) total += stack.count;
        }
        return total;
    }

    private take(slot: number, count: number): void {
        const stack = this.slots.get(slot);
        if (!stack) return;
        const left = stack.count - count;
        if (left > 0) {
            this.slots.set(slot, { item: stack.item, count: left });
        } else {
            this.slots.delete(slot);
        }
    }
}

export class MemoryContainerDirectory implements ContainerDirectory {
    private readonly containers = new Map<string, MemoryContainer>();

    create(name: string, options?: MemoryContainerOptions): MemoryContainer {
        const container = new MemoryContainer(name, this, options);
        this.containers.set(name, container);
        return container;
    }

    remove(name: string): boolean {
        return this.containers.delete(name);
    }

    get(name: string): MemoryContainer | null {
        return this.containers.get(name) ?? null;
    }

    resolve(name: string): Container | null {
        return this.get(name);
    }

    names(): string[] {
        return [...this.containers.keys()].sort();
    }
}
