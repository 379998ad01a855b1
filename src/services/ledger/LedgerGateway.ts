import type { ServiceResult } from '../../types/index.js';
import type { LedgerStore } from './LedgerStore.js';
import type { AccountView, TransferReceipt, TransferRequest, VoidReceipt } from './types.js';

/**
 * What the trade side needs from the ledger. A remote gateway may answer any
 * call with TIMEOUT, meaning the outcome is unknown.
 */
export interface LedgerGateway {
    authenticate(user: string, pin: string): Promise<ServiceResult<AccountView>>;
    getAccount(user: string): Promise<ServiceResult<AccountView>>;
    transfer(request: TransferRequest): Promise<ServiceResult<TransferReceipt>>;
    voidTransfer(transactionId: string): Promise<ServiceResult<VoidReceipt>>;
}

/** Same-process gateway straight onto a store. */
export class LocalLedgerGateway implements LedgerGateway {
    constructor(private readonly store: LedgerStore) { }

    authenticate(user: string, pin: string): Promise<ServiceResult<AccountView>> {
        return this.store.authenticate(user, pin);
    }

    async getAccount(user: string): Promise<ServiceResult<AccountView>> {
        return this.store.getAccount(user);
    }

    transfer(request: TransferRequest): Promise<ServiceResult<TransferReceipt>> {
        return this.store.transfer(request);
    }

    voidTransfer(transactionId: string): Promise<ServiceResult<VoidReceipt>> {
        return this.store.voidTransfer(transactionId);
    }
}
