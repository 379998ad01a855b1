/**
 * Inventory collaborator contracts.
 *
 * Containers are external devices: the core never assumes a move succeeded,
 * it only trusts the count a device reports back (clamped to what was asked).
 */

export interface ItemStack {
    readonly item: string;
    readonly count: number;
}

/** slot number -> stack; empty slots are absent */
export type SlotListing = ReadonlyMap<number, ItemStack>;

export interface Container {
    readonly name: string;
    list(): Promise<SlotListing>;
    /** Push up to `count` units from `slot` into `destination`; resolves to units actually moved. */
    moveUnits(destination: string, slot: number, count: number): Promise<number>;
}

export interface ContainerDirectory {
    resolve(name: string): Container | null;
}

/** item -> units, always derived from a live scan */
export type StockSnapshot = Map<string, number>;

export type MoveShortfall =
    | 'source_missing'
    | 'destination_missing'
    | 'insufficient_stock'
    | 'destination_full'
    | 'same_container'
    | 'device_error';

export interface MoveReport {
    item: string;
    requested: number;
    moved: number;
    shortfall: MoveShortfall | null;
}
