export { OrderLedger } from "./order-ledger";
export type { LedgerEvents, OrderFilter, HistoryType, StrategyEntry } from "./order-ledger";
