/**
 * Ledger RPC handlers: thin translation between wire requests and the
 * ledger store / vault service. No business rules live here.
 */

import { ok, type ServiceResult } from '../../types/index.js';
import type { ExchangeMetrics } from '../../infra/metrics/Prometheus.js';
import type { LedgerStore } from '../../services/ledger/LedgerStore.js';
import type { VaultService } from '../../services/VaultService.js';
import { parseRequest } from '../protocol/parse.js';
import {
    isMutatingLedgerRequest,
    LEDGER_REQUEST_TYPES,
    LedgerRequestSchema,
    type LedgerRequest,
} from '../protocol/ledger.js';
import type { ReplyFields } from '../protocol/wire.js';
import type { RpcService } from '../RpcServer.js';

export interface LedgerHandlerDeps {
    store: LedgerStore;
    vault: VaultService;
    metrics?: ExchangeMetrics;
}

export function createLedgerRpcService(deps: LedgerHandlerDeps): RpcService<LedgerRequest> {
    return {
        name: 'ledger',
        parse: (body) => parseRequest(LedgerRequestSchema, LEDGER_REQUEST_TYPES, body),
        mutates: isMutatingLedgerRequest,
        handle: (request) => handleLedgerRequest(deps, request),
    };
}

export async function handleLedgerRequest(
    deps: LedgerHandlerDeps,
    request: LedgerRequest
): Promise<ServiceResult<ReplyFields>> {
    const { store, vault } = deps;

    switch (request.type) {
        case 'createAccount': {
            const result = await store.register(request.user, request.pin);
            if (!result.success) return result;
            return ok({ ...result.data, message: 'Account created. Awaiting approval.' });
        }

        case 'login': {
            const result = await store.authenticate(request.user, request.pin);
            return result.success ? ok({ ...result.data }) : result;
        }

        case 'getAccount': {
            const result = store.getAccount(request.user);
            return result.success ? ok({ ...result.data }) : result;
        }

        case 'getPrices':
            return ok({ prices: await vault.getPrices() });

        case 'getVaultStock':
            return ok({ stock: await vault.getVaultStock() });

        case 'depositFromClientChest': {
            const result = await vault.depositFromClientChest(request.user, request.chestName);
            return result.success ? ok({ ...result.data }) : result;
        }

        case 'withdrawToClientChest': {
            const result = await vault.withdrawToClientChest(
                request.user,
                request.chestName,
                request.item,
                request.count
            );
            return result.success ? ok({ ...result.data }) : result;
        }

        case 'transfer': {
            const result = await store.transfer({
                from: request.from,
                to: request.to,
                amount: request.amount,
                transactionId: request.transactionId,
            });
            const outcome = result.success ? (result.data.replayed ? 'replayed' : 'applied') : result.error.code;
            deps.metrics?.transfers.inc({ outcome });
            if (!result.success) return result;
            return ok({ ...result.data, message: 'Transfer complete' });
        }

        case 'voidTransfer': {
            const result = await store.voidTransfer(request.transactionId);
            deps.metrics?.transfers.inc({ outcome: result.success ? `void_${result.data.outcome}` : 'void_failed' });
            return result.success ? ok({ ...result.data }) : result;
        }
    }
}
