/**
 * vault-exchange library surface: the ledger and trade services, their RPC
 * protocol and clients, and the in-process transports used for testing.
 */

export { createLedgerApp, type LedgerApp, type LedgerAppOptions } from './apps/ledgerApp.js';
export { createTradeApp, type TradeApp, type TradeAppOptions } from './apps/tradeApp.js';

export { LedgerStore, createLedgerState } from './services/ledger/LedgerStore.js';
export { LocalLedgerGateway, type LedgerGateway } from './services/ledger/LedgerGateway.js';
export type * from './services/ledger/types.js';
export { ListingStore, SequenceGenerator, createTradeState } from './services/trade/ListingStore.js';
export type * from './services/trade/types.js';
export {
    SettlementProtocol,
    SETTLEMENT_TRANSITIONS,
    TERMINAL_SETTLEMENT_STATES,
    canTransition,
    type SettlementOutcome,
    type SettlementState,
} from './services/trade/SettlementProtocol.js';
export { PricingEngine, computeUnitPrice, formatAmount, DEFAULT_PRICE_CONFIG } from './services/PricingEngine.js';
export { VaultService } from './services/VaultService.js';
export { AuditLog, type AuditEventType, type AuditRecord } from './services/AuditLog.js';

export { InventoryMover } from './inventory/InventoryMover.js';
export { MemoryContainer, MemoryContainerDirectory } from './inventory/MemoryContainer.js';
export type * from './inventory/types.js';

export { RpcClient } from './rpc/RpcClient.js';
export { RpcServer, type RpcService } from './rpc/RpcServer.js';
export { LoopbackNetwork } from './rpc/loopback.js';
export { WsClientTransport, WsServerTransport } from './rpc/websocket.js';
export { LedgerClient } from './clients/LedgerClient.js';
export { TradeClient } from './clients/TradeClient.js';

export { SnapshotStore, MemorySnapshotStore, type StateSnapshotter } from './persistence/SnapshotStore.js';
export { Dispatcher } from './lib/Dispatcher.js';
export { SerialExecutor } from './lib/SerialExecutor.js';
export { ExchangeMetrics } from './infra/metrics/Prometheus.js';
export { ErrorCodes, ok, fail, type ServiceResult, type ServiceError } from './types/index.js';
