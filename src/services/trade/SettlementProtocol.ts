/**
 * SETTLEMENT PROTOCOL
 *
 * Buys units from a listing across two stores of truth that share no
 * transaction coordinator: goods in the trade vault, funds in the remote
 * ledger. Goods move first, then the charge; a failed charge is compensated
 * by moving the goods back.
 *
 * STATES:
 * - quoted: listing, live vault stock and take computed
 * - delivering: vault -> buyer container
 * - charging: buyer -> seller transfer under a fresh transactionId
 * - settled: charged, listing decremented (terminal)
 * - delivery_failed: nothing moved, nothing charged (terminal)
 * - charge_failed_compensating: moving delivered units back
 * - reverted: all units back in the vault, listing unchanged (terminal)
 * - charge_failed_unrecovered: units stranded with the buyer, or a charge that
 *   may have landed could not be voided (terminal)
 *
 * A charge that timed out may still land. It is retried under the same id,
 * and after compensation the id is voided so a landed charge is refunded and
 * a late one is refused. An internal failure reported by the ledger is voided
 * the same way.
 */

import { ulid } from 'ulidx';
import { InternalError } from '../../lib/errors/index.js';
import {
    errorClassOf,
    fail,
    ok,
    ErrorCodes,
    type ErrorCode,
    type ServiceError,
    type ServiceResult,
} from '../../types/index.js';
import { withFinancialRetry } from '../../utils/financialRetry.js';
import { settlementLogger } from '../../utils/logger.js';
import type { ExchangeMetrics } from '../../infra/metrics/Prometheus.js';
import type { InventoryMover } from '../../inventory/InventoryMover.js';
import type { AuditLog } from '../AuditLog.js';
import type { LedgerGateway } from '../ledger/LedgerGateway.js';
import type { VoidReceipt } from '../ledger/types.js';
import type { PricingEngine } from '../PricingEngine.js';
import type { ListingStore } from './ListingStore.js';
import type { PurchaseReceipt, PurchaseRequest } from './types.js';

const logger = settlementLogger;

// ============================================================================
// STATES
// ============================================================================

export type SettlementState =
    | 'quoted'
    | 'delivering'
    | 'charging'
    | 'settled'
    | 'delivery_failed'
    | 'charge_failed_compensating'
    | 'reverted'
    | 'charge_failed_unrecovered';

export const TERMINAL_SETTLEMENT_STATES: SettlementState[] = [
    'settled',
    'delivery_failed',
    'reverted',
    'charge_failed_unrecovered',
];

export const SETTLEMENT_TRANSITIONS: Record<SettlementState, SettlementState[]> = {
    quoted: ['delivering', 'delivery_failed'],
    delivering: ['charging', 'delivery_failed'],
    charging: ['settled', 'charge_failed_compensating'],
    charge_failed_compensating: ['reverted', 'charge_failed_unrecovered'],
    settled: [],                    // Terminal
    delivery_failed: [],            // Terminal
    reverted: [],                   // Terminal
    charge_failed_unrecovered: [],  // Terminal
};

export function canTransition(from: SettlementState, to: SettlementState): boolean {
    return SETTLEMENT_TRANSITIONS[from].includes(to);
}

/**
 * A charge that failed this way may have been applied on the ledger anyway.
 */
export function isAmbiguousChargeError(code: ErrorCode): boolean {
    const errorClass = errorClassOf(code);
    return errorClass === 'transport_ambiguity' || errorClass === 'internal';
}

export interface SettlementOutcome {
    state: SettlementState;
    trace: SettlementState[];
    listingId: number;
    buyer: string;
    seller: string | null;
    item: string | null;
    unitPrice: number | null;
    /** reference price at live vault stock; informational only */
    marketPrice: number | null;
    take: number;
    moved: number;
    total: number;
    recovered: number;
    unrecovered: number;
    transactionId: string | null;
    chargeAttempts: number;
    error: ServiceError | null;
    voidResult: ServiceResult<VoidReceipt> | null;
}

export interface SettlementDeps {
    listings: ListingStore;
    ledger: LedgerGateway;
    mover: InventoryMover;
    audit: AuditLog;
    pricing?: PricingEngine;
    metrics?: ExchangeMetrics;
    chargeRetries?: number;
    retryDelayMs?: number;
    newTransactionId?: () => string;
}

// ============================================================================
// RUN
// ============================================================================

class SettlementRun {
    readonly outcome: SettlementOutcome;

    constructor(request: PurchaseRequest) {
        this.outcome = {
            state: 'quoted',
            trace: ['quoted'],
            listingId: request.listingId,
            buyer: request.buyer,
            seller: null,
            item: null,
            unitPrice: null,
            marketPrice: null,
            take: 0,
            moved: 0,
            total: 0,
            recovered: 0,
            unrecovered: 0,
            transactionId: null,
            chargeAttempts: 0,
            error: null,
            voidResult: null,
        };
    }

    to(next: SettlementState): void {
        const from = this.outcome.state;
        if (!canTransition(from, next)) {
            throw new InternalError(`Illegal settlement transition ${from} -> ${next}`);
        }
        this.outcome.state = next;
        this.outcome.trace.push(next);
        logger.debug({ listingId: this.outcome.listingId, from, to: next }, 'Settlement transition');
    }

    reject(error: ServiceError): SettlementOutcome {
        this.outcome.error = error;
        this.to('delivery_failed');
        return this.outcome;
    }
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

export class SettlementProtocol {
    private readonly chargeRetries: number;
    private readonly newTransactionId: () => string;

    constructor(private readonly deps: SettlementDeps) {
        this.chargeRetries = deps.chargeRetries ?? 1;
        this.newTransactionId = deps.newTransactionId ?? (() => ulid());
    }

    async purchase(request: PurchaseRequest): Promise<ServiceResult<PurchaseReceipt>> {
        const outcome = await this.settle(request);
        if (outcome.state === 'settled' && outcome.transactionId !== null) {
            return ok({
                listingId: outcome.listingId,
                moved: outcome.moved,
                total: outcome.total,
                transactionId: outcome.transactionId,
                message: `Purchased ${outcome.moved} for ${outcome.total}`,
            });
        }
        const error: ServiceError = outcome.error ?? { code: ErrorCodes.INTERNAL_ERROR, message: 'Settlement ended without a result' };
        // the terminal state tells a reverted buy apart from a reply that never came
        return fail(error.code, error.message, {
            ...error.details,
            state: outcome.state,
            recovered: outcome.recovered,
            unrecovered: outcome.unrecovered,
        });
    }

    async settle(request: PurchaseRequest): Promise<SettlementOutcome> {
        const run = new SettlementRun(request);
        const outcome = run.outcome;
        const { listings, mover } = this.deps;

        // ---- quoted ---------------------------------------------------------
        if (!isPositiveInteger(request.listingId) || !isPositiveInteger(request.count)) {
            return this.finish(run.reject({ code: ErrorCodes.VALIDATION_ERROR, message: 'Bad purchase params' }));
        }
        if (!request.buyer.trim() || !request.destination.trim()) {
            return this.finish(run.reject({ code: ErrorCodes.VALIDATION_ERROR, message: 'Buyer and destination required' }));
        }

        const listing = listings.get(request.listingId);
        if (!listing) {
            return this.finish(run.reject({ code: ErrorCodes.NOT_FOUND, message: 'Listing not found' }));
        }
        outcome.seller = listing.seller;
        outcome.item = listing.item;
        outcome.unitPrice = listing.unitPrice;

        if (listing.quantity <= 0) {
            return this.finish(run.reject({ code: ErrorCodes.INSUFFICIENT_STOCK, message: 'Not available' }));
        }
        const vault = listings.vaultContainer();
        if (!vault) {
            return this.finish(run.reject({ code: ErrorCodes.VAULT_NOT_CONFIGURED, message: 'Vault not configured' }));
        }
        if (request.destination === vault) {
            return this.finish(run.reject({
                code: ErrorCodes.VALIDATION_ERROR,
                message: 'Destination cannot be the vault',
                details: { destination: request.destination },
            }));
        }
        const stock = await mover.scanStock(vault);
        if (!stock) {
            return this.finish(run.reject({ code: ErrorCodes.VAULT_NOT_CONFIGURED, message: 'Vault unreadable' }));
        }
        const have = stock.get(listing.item) ?? 0;
        if (have <= 0) {
            return this.finish(run.reject({ code: ErrorCodes.INSUFFICIENT_STOCK, message: 'Out of stock' }));
        }

        outcome.take = Math.min(request.count, listing.quantity, have);
        outcome.marketPrice = this.deps.pricing?.price(listing.item, have) ?? null;

        // ---- delivering -----------------------------------------------------
        run.to('delivering');
        const delivery = await mover.move(vault, request.destination, listing.item, outcome.take);
        if (delivery.moved <= 0) {
            outcome.error = {
                code: ErrorCodes.DELIVERY_FAILED,
                message: 'Delivery failed',
                details: { shortfall: delivery.shortfall },
            };
            run.to('delivery_failed');
            return this.finish(outcome);
        }
        outcome.moved = delivery.moved;

        // ---- charging -------------------------------------------------------
        run.to('charging');
        const transactionId = this.newTransactionId();
        outcome.transactionId = transactionId;
        outcome.total = delivery.moved * listing.unitPrice;

        const charge = await withFinancialRetry(
            'settlement.charge',
            () => this.deps.ledger.transfer({
                from: request.buyer,
                to: listing.seller,
                amount: outcome.total,
                transactionId,
            }),
            { maxRetries: this.chargeRetries, baseDelayMs: this.deps.retryDelayMs ?? 0 }
        );
        outcome.chargeAttempts = charge.attempts;

        if (charge.result.success) {
            listings.recordDelivery(listing.id, delivery.moved);
            run.to('settled');
            await this.deps.audit.append('purchase_settled', {
                listingId: listing.id,
                buyer: request.buyer,
                seller: listing.seller,
                item: listing.item,
                moved: delivery.moved,
                total: outcome.total,
                transactionId,
                replayed: charge.result.data.replayed,
            });
            logger.info(
                { listingId: listing.id, buyer: request.buyer, moved: delivery.moved, total: outcome.total, transactionId },
                'Purchase settled'
            );
            return this.finish(outcome);
        }

        // ---- charge_failed_compensating ------------------------------------
        const chargeError = charge.result.error;
        run.to('charge_failed_compensating');
        logger.warn({ listingId: listing.id, transactionId, error: chargeError }, 'Charge failed; returning goods');

        const back = await mover.move(request.destination, vault, listing.item, delivery.moved);
        outcome.recovered = back.moved;
        outcome.unrecovered = delivery.moved - back.moved;

        // a timeout or an internal failure on the ledger side may still have applied the charge
        let chargeUnresolved = false;
        if (isAmbiguousChargeError(chargeError.code)) {
            // voids are idempotent per id, so a lost void reply is safe to resend
            const voiding = await withFinancialRetry(
                'settlement.void',
                () => this.deps.ledger.voidTransfer(transactionId),
                { maxRetries: this.chargeRetries, baseDelayMs: this.deps.retryDelayMs ?? 0 }
            );
            const voided = voiding.result;
            outcome.voidResult = voided;
            chargeUnresolved = !voided.success;
            await this.deps.audit.append('charge_voided', {
                listingId: listing.id,
                transactionId,
                ...(voided.success
                    ? { outcome: voided.data.outcome, amount: voided.data.amount }
                    : { error: voided.error.code }),
            });
        }

        if (outcome.unrecovered === 0 && !chargeUnresolved) {
            outcome.error = chargeError;
            run.to('reverted');
            await this.deps.audit.append('purchase_reverted', {
                listingId: listing.id,
                buyer: request.buyer,
                item: listing.item,
                moved: delivery.moved,
                transactionId,
                cause: chargeError.code,
            });
            return this.finish(outcome);
        }

        // units that left the vault for good no longer back the listing
        if (outcome.unrecovered > 0) listings.recordDelivery(listing.id, outcome.unrecovered);
        const details = {
            listingId: listing.id,
            delivered: delivery.moved,
            recovered: outcome.recovered,
            unrecovered: outcome.unrecovered,
            transactionId,
            cause: chargeError.code,
            chargeUnresolved,
        };
        outcome.error = {
            code: ErrorCodes.UNRECOVERED_INCONSISTENCY,
            message: outcome.unrecovered > 0
                ? `Charge failed and ${outcome.unrecovered} units could not be recovered`
                : 'Charge outcome unknown and the void did not go through',
            details,
        };
        run.to('charge_failed_unrecovered');
        logger.fatal(
            { buyer: request.buyer, item: listing.item, ...details },
            outcome.unrecovered > 0
                ? 'Unrecovered settlement: goods stranded with buyer'
                : 'Unrecovered settlement: buyer may stay charged for returned goods'
        );
        await this.deps.audit.append('purchase_unrecovered', {
            buyer: request.buyer,
            seller: listing.seller,
            item: listing.item,
            ...details,
        });
        return this.finish(outcome);
    }

    private finish(outcome: SettlementOutcome): SettlementOutcome {
        this.deps.metrics?.settlements.inc({ outcome: outcome.state });
        return outcome;
    }
}
