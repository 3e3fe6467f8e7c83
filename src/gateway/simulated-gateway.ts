/**
 * SIMULATED GATEWAY
 * =================
 * Deterministic in-process exchange. No network, no money.
 *
 * - MARKET orders fill at the symbol's simulated price (± slippage)
 * - LIMIT orders fill right away when marketable, otherwise rest as NEW
 *   (IOC/FOK that cannot fill immediately expire, post-only that would take is rejected)
 * - STOP_LIMIT orders rest until the simulated price crosses the stop,
 *   then fill at their limit price
 *
 * Prices only move when a caller says so: setPrice() fills every resting
 * order it crosses, fillOrder() forces a (partial) fill.
 * rejectNext() / failNext() inject one gateway error for tests.
 */

import Decimal from "decimal.js";
import { EventEmitter } from "eventemitter3";
import { DEFAULT_SIMULATED_PRICE, SIMULATED_PRICES } from "../config";
import { GatewayRejectedError, GatewayTransientError, POST_ONLY_REJECTED_CODE } from "../errors";
import {
  CancelResult,
  ExchangeGateway,
  OrderSpec,
  OrderUpdate,
  SubmitResult,
  TradingMode,
  isTerminalStatus,
} from "../types";
import { logger } from "../utils/logger";

export interface SimulatedGatewayConfig {
  /** Simulate slippage on market orders (basis points, 0 = perfect fills) */
  slippageBps: number;
  /** Starting prices per symbol */
  prices: Record<string, number>;
  /** Price for symbols missing from `prices` */
  defaultPrice: number;
}

const DEFAULT_CONFIG: SimulatedGatewayConfig = {
  slippageBps: 0,
  prices: { ...SIMULATED_PRICES },
  defaultPrice: DEFAULT_SIMULATED_PRICE,
};

export interface SimulatedGatewayEvents {
  /** A resting order changed without the caller asking (fill or trigger) */
  orderUpdate: (orderId: string, update: OrderUpdate) => void;
}

type FaultTarget = "submit" | "cancel";

interface Fault {
  target: FaultTarget;
  kind: "reject" | "fail";
  reason: string;
}

interface SimOrder extends OrderUpdate {
  orderId: string;
  spec: OrderSpec;
}

// Binance error codes the simulator mirrors
const CODE_UNKNOWN_ORDER = -2011;
const CODE_NO_SUCH_ORDER = -2013;
const CODE_WOULD_TRIGGER = -2021;
const CODE_SIMULATED = -1000;

export class SimulatedGateway extends EventEmitter<SimulatedGatewayEvents> implements ExchangeGateway {
  readonly mode: TradingMode = "sim";

  private config: SimulatedGatewayConfig;
  private prices: Map<string, number>;
  private orders: Map<string, SimOrder> = new Map();
  private faults: Fault[] = [];
  private orderCounter = 0;

  constructor(config: Partial<SimulatedGatewayConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.prices = new Map(Object.entries(this.config.prices));
  }

  // ============================================
  // ExchangeGateway
  // ============================================

  async submitOrder(spec: OrderSpec): Promise<SubmitResult> {
    this.takeFault("submit");

    const market = this.priceOf(spec.symbol);
    const order: SimOrder = {
      orderId: this.generateOrderId(),
      spec,
      status: "NEW",
      filledQty: 0,
      avgPrice: 0,
    };

    const params = spec.params;
    switch (params.kind) {
      case "MARKET":
        this.fill(order, this.applySlippage(market, spec.side), spec.quantity);
        break;

      case "LIMIT": {
        const marketable = spec.side === "BUY" ? market <= params.price : market >= params.price;
        if (marketable && params.postOnly) {
          throw new GatewayRejectedError("Post-only order would immediately match", POST_ONLY_REJECTED_CODE);
        }
        if (marketable) {
          this.fill(order, market, spec.quantity);
        } else if (params.timeInForce !== "GTC") {
          order.status = "EXPIRED";
        }
        break;
      }

      case "STOP_LIMIT":
        if (this.stopCrossed(spec, params.stopPrice, market)) {
          throw new GatewayRejectedError("Order would immediately trigger", CODE_WOULD_TRIGGER);
        }
        break;
    }

    this.orders.set(order.orderId, order);
    logger.debug(`[SIM] ${order.orderId} ${spec.side} ${spec.quantity} ${spec.symbol} ${params.kind} -> ${order.status}`);

    return this.snapshot(order);
  }

  async cancelOrder(symbol: string, orderId: string): Promise<CancelResult> {
    this.takeFault("cancel");

    const order = this.orders.get(orderId);
    if (!order || order.spec.symbol !== symbol || isTerminalStatus(order.status)) {
      throw new GatewayRejectedError("Unknown order sent.", CODE_UNKNOWN_ORDER);
    }

    order.status = "CANCELED";
    logger.debug(`[SIM] ${orderId} cancelled`);
    return { status: order.status };
  }

  async queryOrder(symbol: string, orderId: string): Promise<OrderUpdate> {
    const order = this.orders.get(orderId);
    if (!order || order.spec.symbol !== symbol) {
      throw new GatewayRejectedError("Order does not exist.", CODE_NO_SUCH_ORDER);
    }
    return { status: order.status, filledQty: order.filledQty, avgPrice: order.avgPrice };
  }

  async getPrice(symbol: string): Promise<number> {
    return this.priceOf(symbol);
  }

  async isReady(): Promise<boolean> {
    return true;
  }

  // ============================================
  // SIMULATION CONTROLS
  // ============================================

  /**
   * Move the simulated price and fill every resting order it crosses,
   * oldest first.
   */
  setPrice(symbol: string, price: number): void {
    this.prices.set(symbol, price);

    // Orders placed by listeners during this sweep wait for the next price move
    for (const order of [...this.orders.values()]) {
      if (order.spec.symbol !== symbol || isTerminalStatus(order.status)) continue;

      const params = order.spec.params;
      const remaining = new Decimal(order.spec.quantity).minus(order.filledQty).toNumber();

      if (params.kind === "LIMIT") {
        const crossed = order.spec.side === "BUY" ? price <= params.price : price >= params.price;
        if (crossed) this.fillAndNotify(order, params.price, remaining);
      } else if (params.kind === "STOP_LIMIT") {
        if (this.stopCrossed(order.spec, params.stopPrice, price)) {
          this.fillAndNotify(order, params.price, remaining);
        }
      }
    }
  }

  /**
   * Force a fill. Without `quantity` the whole remainder fills;
   * without `price` the order's limit price (or the market price) is used.
   */
  fillOrder(orderId: string, price?: number, quantity?: number): OrderUpdate {
    const order = this.orders.get(orderId);
    if (!order || isTerminalStatus(order.status)) {
      throw new GatewayRejectedError(`Cannot fill ${orderId}: unknown or already final`, CODE_UNKNOWN_ORDER);
    }

    const params = order.spec.params;
    const fillPrice = price ?? (params.kind === "MARKET" ? this.priceOf(order.spec.symbol) : params.price);
    const remaining = new Decimal(order.spec.quantity).minus(order.filledQty).toNumber();
    this.fillAndNotify(order, fillPrice, Math.min(quantity ?? remaining, remaining));
    return this.snapshot(order);
  }

  /** Expire or cancel an order as if the exchange did it */
  closeOrder(orderId: string, status: "CANCELED" | "EXPIRED" = "CANCELED"): void {
    const order = this.orders.get(orderId);
    if (!order || isTerminalStatus(order.status)) return;
    order.status = status;
    this.emit("orderUpdate", orderId, this.snapshot(order));
  }

  /** Next call of `target` fails with GatewayRejectedError */
  rejectNext(reason = "Simulated rejection", target: FaultTarget = "submit"): void {
    this.faults.push({ target, kind: "reject", reason });
  }

  /** Next call of `target` fails with GatewayTransientError */
  failNext(reason = "Simulated network failure", target: FaultTarget = "submit"): void {
    this.faults.push({ target, kind: "fail", reason });
  }

  /** Everything ever submitted, in submission order */
  submittedOrders(): SubmitResult[] {
    return [...this.orders.values()].map((order) => this.snapshot(order));
  }

  // ============================================
  // INTERNALS
  // ============================================

  private takeFault(target: FaultTarget): void {
    const index = this.faults.findIndex((fault) => fault.target === target);
    if (index === -1) return;

    const [fault] = this.faults.splice(index, 1);
    if (fault.kind === "reject") {
      throw new GatewayRejectedError(fault.reason, CODE_SIMULATED);
    }
    throw new GatewayTransientError(fault.reason);
  }

  /** BUY stops trigger at or above the stop, SELL stops at or below */
  private stopCrossed(spec: OrderSpec, stopPrice: number, price: number): boolean {
    return spec.side === "BUY" ? price >= stopPrice : price <= stopPrice;
  }

  private fill(order: SimOrder, price: number, quantity: number): void {
    const filled = new Decimal(order.filledQty).plus(quantity);
    const notional = new Decimal(order.avgPrice).times(order.filledQty).plus(new Decimal(price).times(quantity));

    order.avgPrice = notional.div(filled).toNumber();
    order.filledQty = filled.toNumber();
    order.status = filled.gte(order.spec.quantity) ? "FILLED" : "PARTIALLY_FILLED";
  }

  private fillAndNotify(order: SimOrder, price: number, quantity: number): void {
    this.fill(order, price, quantity);
    logger.debug(`[SIM] ${order.orderId} ${order.status} ${order.filledQty} @ ${order.avgPrice}`);
    this.emit("orderUpdate", order.orderId, this.snapshot(order));
  }

  private applySlippage(price: number, side: OrderSpec["side"]): number {
    const bps = this.config.slippageBps;
    if (!bps) return price;
    const factor = new Decimal(bps).div(10_000);
    const adjusted = side === "BUY" ? new Decimal(price).times(factor.plus(1)) : new Decimal(price).times(new Decimal(1).minus(factor));
    return adjusted.toNumber();
  }

  private priceOf(symbol: string): number {
    return this.prices.get(symbol) ?? this.config.defaultPrice;
  }

  private snapshot(order: SimOrder): SubmitResult {
    return {
      orderId: order.orderId,
      status: order.status,
      filledQty: order.filledQty,
      avgPrice: order.avgPrice,
    };
  }

  private generateOrderId(): string {
    this.orderCounter++;
    return `SIM-${this.orderCounter}`;
  }
}
