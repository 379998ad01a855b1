/**
 * Trade RPC handlers. Identity is the `user` the request names; credentials
 * are only checked by `login`.
 */

import { ok, type ServiceResult } from '../../types/index.js';
import type { LedgerGateway } from '../../services/ledger/LedgerGateway.js';
import type { ListingStore } from '../../services/trade/ListingStore.js';
import type { SettlementProtocol } from '../../services/trade/SettlementProtocol.js';
import { parseRequest } from '../protocol/parse.js';
import {
    isMutatingTradeRequest,
    TRADE_REQUEST_TYPES,
    TradeRequestSchema,
    type TradeRequest,
} from '../protocol/trade.js';
import type { ReplyFields } from '../protocol/wire.js';
import type { RpcService } from '../RpcServer.js';

export interface TradeHandlerDeps {
    ledger: LedgerGateway;
    listings: ListingStore;
    settlement: SettlementProtocol;
}

export function createTradeRpcService(deps: TradeHandlerDeps): RpcService<TradeRequest> {
    return {
        name: 'trade',
        parse: (body) => parseRequest(TradeRequestSchema, TRADE_REQUEST_TYPES, body),
        mutates: isMutatingTradeRequest,
        handle: (request) => handleTradeRequest(deps, request),
    };
}

export async function handleTradeRequest(
    deps: TradeHandlerDeps,
    request: TradeRequest
): Promise<ServiceResult<ReplyFields>> {
    switch (request.type) {
        case 'login': {
            const result = await deps.ledger.authenticate(request.user, request.pin);
            if (!result.success) return result;
            return ok({ approved: result.data.approved, balance: result.data.balance });
        }

        case 'getBalance': {
            const result = await deps.ledger.getAccount(request.user);
            return result.success ? ok({ balance: result.data.balance }) : result;
        }

        case 'getListings':
            return ok({ listings: deps.listings.listAvailable() });

        case 'createListing': {
            const result = await deps.listings.create(request.user, request.item, request.price);
            if (!result.success) return result;
            return ok({ id: result.data.id, message: `Created listing #${result.data.id}` });
        }

        case 'addStock': {
            const result = await deps.listings.addStock(
                request.listingId,
                request.user,
                request.item,
                request.count,
                request.chestName
            );
            return result.success ? ok({ ...result.data }) : result;
        }

        case 'buy': {
            const result = await deps.settlement.purchase({
                listingId: request.listingId,
                buyer: request.user,
                count: request.count,
                destination: request.chestName,
            });
            return result.success ? ok({ ...result.data }) : result;
        }
    }
}
