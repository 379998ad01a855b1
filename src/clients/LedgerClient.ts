/**
 * Typed client for the ledger RPC. Doubles as the remote LedgerGateway the
 * trade process charges through. Any call may come back TIMEOUT.
 */

import { ok, type ServiceResult } from '../types/index.js';
import type { LedgerGateway } from '../services/ledger/LedgerGateway.js';
import type { AccountView, TransferReceipt, TransferRequest, VoidReceipt } from '../services/ledger/types.js';
import type { PriceQuote, VaultStockEntry } from '../services/VaultService.js';
import {
    AccountReplySchema,
    MessageReplySchema,
    PricesReplySchema,
    TransferReplySchema,
    VaultStockReplySchema,
    VoidReplySchema,
} from '../rpc/protocol/ledger.js';
import type { RpcClient } from '../rpc/RpcClient.js';

export class LedgerClient implements LedgerGateway {
    constructor(private readonly rpc: RpcClient) { }

    createAccount(user: string, pin: string): Promise<ServiceResult<AccountView>> {
        return this.rpc.call({ type: 'createAccount', user, pin }, AccountReplySchema);
    }

    authenticate(user: string, pin: string): Promise<ServiceResult<AccountView>> {
        return this.rpc.call({ type: 'login', user, pin }, AccountReplySchema);
    }

    getAccount(user: string): Promise<ServiceResult<AccountView>> {
        return this.rpc.call({ type: 'getAccount', user }, AccountReplySchema);
    }

    async getPrices(): Promise<ServiceResult<Record<string, PriceQuote>>> {
        const result = await this.rpc.call({ type: 'getPrices' }, PricesReplySchema);
        return result.success ? ok(result.data.prices) : result;
    }

    async getVaultStock(): Promise<ServiceResult<Record<string, VaultStockEntry>>> {
        const result = await this.rpc.call({ type: 'getVaultStock' }, VaultStockReplySchema);
        return result.success ? ok(result.data.stock) : result;
    }

    depositFromClientChest(user: string, chestName: string) {
        return this.rpc.call({ type: 'depositFromClientChest', user, chestName }, MessageReplySchema);
    }

    withdrawToClientChest(user: string, chestName: string, item: string, count: number) {
        return this.rpc.call({ type: 'withdrawToClientChest', user, chestName, item, count }, MessageReplySchema);
    }

    transfer(request: TransferRequest): Promise<ServiceResult<TransferReceipt>> {
        return this.rpc.call(
            {
                type: 'transfer',
                from: request.from,
                to: request.to,
                amount: request.amount,
                ...(request.transactionId ? { transactionId: request.transactionId } : {}),
            },
            TransferReplySchema
        );
    }

    voidTransfer(transactionId: string): Promise<ServiceResult<VoidReceipt>> {
        return this.rpc.call({ type: 'voidTransfer', transactionId }, VoidReplySchema);
    }
}
