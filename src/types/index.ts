/**
 * TYPE DEFINITIONS FOR THE FUTURES ORDER ENGINE
 * =============================================
 */

// ============================================
// ORDER TYPES
// ============================================

export type Side = "BUY" | "SELL";

export type TimeInForce = "GTC" | "IOC" | "FOK";

/**
 * Price reference used to evaluate a stop trigger
 */
export type WorkingType = "CONTRACT_PRICE" | "MARK_PRICE";

export type OrderKind = "MARKET" | "LIMIT" | "STOP_LIMIT";

/**
 * Order status as reported by the exchange (or the simulator)
 */
export type OrderStatus =
  | "NEW"
  | "PARTIALLY_FILLED"
  | "FILLED"
  | "CANCELED"
  | "REJECTED"
  | "EXPIRED";

export const TERMINAL_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>([
  "FILLED",
  "CANCELED",
  "REJECTED",
  "EXPIRED",
]);

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.has(status);
}

export interface MarketParams {
  kind: "MARKET";
}

export interface LimitParams {
  kind: "LIMIT";
  price: number;
  timeInForce: TimeInForce;
  /** Maker only (rejected by the exchange if it would take liquidity) */
  postOnly?: boolean;
  /** Only reduces an existing position */
  reduceOnly?: boolean;
}

export interface StopLimitParams {
  kind: "STOP_LIMIT";
  /** Trigger price */
  stopPrice: number;
  /** Limit price used once triggered */
  price: number;
  timeInForce: TimeInForce;
  workingType: WorkingType;
}

/**
 * Kind-specific fields, tagged by `kind`
 */
export type OrderParams = MarketParams | LimitParams | StopLimitParams;

/**
 * A validated, normalized order ready for the gateway
 */
export interface OrderSpec {
  symbol: string;
  side: Side;
  quantity: number;
  params: OrderParams;
  /** Strategy (TWAP/Grid/OCO) that emitted this order */
  strategyId?: string;
}

/**
 * An order tracked by the ledger
 */
export interface Order extends OrderSpec {
  orderId: string;
  status: OrderStatus;
  filledQty: number;
  /** 0 until something fills */
  avgPrice: number;
  createdAt: Date;
  updatedAt: Date;
  /** Gateway message for rejected orders */
  error?: string;
}

/**
 * Status/fill data coming back from the gateway
 */
export interface OrderUpdate {
  status: OrderStatus;
  filledQty: number;
  avgPrice: number;
}

// ============================================
// GATEWAY TYPES
// ============================================

/**
 * Gateway mode
 * - sim: deterministic in-process simulator (no network, no money)
 * - live: real exchange REST API
 */
export type TradingMode = "sim" | "live";

export interface SubmitResult extends OrderUpdate {
  orderId: string;
}

export interface CancelResult {
  status: OrderStatus;
}

/**
 * Interface every exchange gateway implements.
 * Failures are thrown as GatewayTransientError or GatewayRejectedError.
 */
export interface ExchangeGateway {
  readonly mode: TradingMode;

  submitOrder(spec: OrderSpec): Promise<SubmitResult>;

  cancelOrder(symbol: string, orderId: string): Promise<CancelResult>;

  queryOrder(symbol: string, orderId: string): Promise<OrderUpdate>;

  getPrice(symbol: string): Promise<number>;

  /** Check the gateway can take orders */
  isReady(): Promise<boolean>;
}

// ============================================
// STRATEGY TYPES
// ============================================

export type StrategyStatus = "RUNNING" | "COMPLETED" | "CANCELLED" | "FAILED";

/**
 * Validated OCO request
 */
export interface OcoSpec {
  symbol: string;
  side: Side;
  quantity: number;
  takeProfitPrice: number;
  stopLossPrice: number;
  stopLossLimitPrice: number;
}

export type OcoStatus = "CREATED" | "ACTIVE" | "COMPLETED" | "CANCELLED";

export type OcoLeg = "TAKE_PROFIT" | "STOP_LOSS";

export interface OcoPair {
  id: string;
  symbol: string;
  /** Direction of the position being protected; legs sit on the opposite side */
  side: Side;
  quantity: number;
  takeProfitPrice: number;
  stopLossPrice: number;
  stopLossLimitPrice: number;
  takeProfitOrderId: string | null;
  stopLossOrderId: string | null;
  status: OcoStatus;
  /** Leg that filled first (set once COMPLETED) */
  filledLeg?: OcoLeg;
  createdAt: Date;
  updatedAt: Date;
}

export type TwapOrderKind = "MARKET" | "LIMIT";

/**
 * Validated TWAP request with its slice plan
 */
export interface TwapSpec {
  symbol: string;
  side: Side;
  totalQuantity: number;
  splits: number;
  interval: number;
  orderKind: TwapOrderKind;
  /** Only for LIMIT slices */
  price?: number;
  sliceQuantities: number[];
}

export interface TwapStrategy {
  id: string;
  symbol: string;
  side: Side;
  totalQuantity: number;
  splits: number;
  /** Time units between slices */
  interval: number;
  orderKind: TwapOrderKind;
  price?: number;
  /** Planned slice quantities, last one absorbs the rounding remainder */
  sliceQuantities: number[];
  status: StrategyStatus;
  /** Append-only, in emission order */
  childOrderIds: string[];
  slicesRemaining: number;
  failedSlices: number;
  consecutiveFailures: number;
  startedAt: Date;
  updatedAt: Date;
  finishedAt?: Date;
  error?: string;
}

export type GridDirection = "LONG" | "SHORT";

export interface GridSpec {
  symbol: string;
  direction: GridDirection;
  lowerPrice: number;
  upperPrice: number;
  gridCount: number;
  totalQuantity: number;
  quantityPerLevel: number;
  /** Taken from the gateway when not given */
  referencePrice?: number;
}

export interface GridLevel {
  index: number;
  price: number;
  openOrderId: string | null;
  openSide: Side | null;
  /** Side waiting for the price to move off the level (its post-only order would have matched) */
  pendingSide: Side | null;
  /** Fill price of the last opening order at this level */
  entryPrice: number | null;
  realizedPnl: number;
  /** Fills handled at this level (each one places the opposite side) */
  rebalanceCount: number;
  /** Opening + closing round trips */
  cyclesCompleted: number;
}

export interface GridStrategy {
  id: string;
  symbol: string;
  direction: GridDirection;
  lowerPrice: number;
  upperPrice: number;
  gridCount: number;
  step: number;
  totalQuantity: number;
  quantityPerLevel: number;
  referencePrice: number;
  status: StrategyStatus;
  levels: GridLevel[];
  startedAt: Date;
  updatedAt: Date;
  finishedAt?: Date;
}

/**
 * Everything recorded in one session, in creation order
 */
export type HistoryEntry =
  | { type: "order"; record: Order }
  | { type: "oco"; record: OcoPair }
  | { type: "twap"; record: TwapStrategy }
  | { type: "grid"; record: GridStrategy };
