import { ok, type ServiceResult } from '../types/index.js';
import type { Listing } from '../services/trade/types.js';
import {
    AddStockReplySchema,
    BalanceReplySchema,
    BuyReplySchema,
    CreateListingReplySchema,
    ListingsReplySchema,
    LoginReplySchema,
} from '../rpc/protocol/trade.js';
import type { RpcClient } from '../rpc/RpcClient.js';

/** Typed client for the trade RPC, as used by a market terminal. */
export class TradeClient {
    constructor(private readonly rpc: RpcClient, private readonly user: string) { }

    login(pin: string) {
        return this.rpc.call({ type: 'login', user: this.user, pin }, LoginReplySchema);
    }

    async getBalance(): Promise<ServiceResult<number>> {
        const result = await this.rpc.call({ type: 'getBalance', user: this.user }, BalanceReplySchema);
        return result.success ? ok(result.data.balance) : result;
    }

    async getListings(): Promise<ServiceResult<Listing[]>> {
        const result = await this.rpc.call({ type: 'getListings' }, ListingsReplySchema);
        return result.success ? ok(result.data.listings) : result;
    }

    createListing(item: string, price: number) {
        return this.rpc.call({ type: 'createListing', user: this.user, item, price }, CreateListingReplySchema);
    }

    addStock(listingId: number, item: string, count: number, chestName: string) {
        return this.rpc.call(
            { type: 'addStock', user: this.user, listingId, item, count, chestName },
            AddStockReplySchema
        );
    }

    buy(listingId: number, count: number, chestName: string) {
        return this.rpc.call({ type: 'buy', user: this.user, listingId, count, chestName }, BuyReplySchema);
    }
}
