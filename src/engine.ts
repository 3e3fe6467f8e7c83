/**
 * TRADING ENGINE
 * ==============
 * Wires one session together: gateway, Ledger, validator, order types,
 * OCO / TWAP / Grid and the status poller.
 *
 * The CLI and the interactive session both go through this class.
 */

import { EngineConfig, loadConfig } from "./config";
import { StateError } from "./errors";
import { SimulatedGateway, createGateway } from "./gateway";
import { HistoryType, OrderLedger } from "./ledger";
import { OrderService } from "./orders";
import { StatusPoller } from "./polling";
import {
  GridEngine,
  GridHandle,
  GridHooks,
  GridStatus,
  GridStopResult,
  GridUpdateResult,
  OcoCoordinator,
  TwapHandle,
  TwapHooks,
  TwapScheduler,
  TwapStatus,
} from "./strategy";
import { ExchangeGateway, HistoryEntry, OcoPair, Order, OrderUpdate, TwapStrategy } from "./types";
import { logger } from "./utils/logger";
import {
  AmendInput,
  GridInput,
  GridRangeInput,
  LimitOrderInput,
  MarketOrderInput,
  OcoInput,
  OrderValidator,
  StopLimitOrderInput,
  TwapInput,
} from "./validation";

export interface EngineOptions {
  config?: EngineConfig;
  /** Use this gateway instead of the one the config asks for */
  gateway?: ExchangeGateway;
}

export type StatusReport =
  | { type: "order"; record: Order }
  | { type: "oco"; record: OcoPair }
  | { type: "twap"; record: TwapStatus }
  | { type: "grid"; record: GridStatus }
  /** Not in this session's Ledger, answered by the gateway */
  | { type: "remote"; orderId: string; symbol: string; record: OrderUpdate };

export class TradingEngine {
  readonly config: EngineConfig;
  readonly gateway: ExchangeGateway;
  readonly ledger: OrderLedger;
  readonly validator: OrderValidator;
  readonly orders: OrderService;
  readonly oco: OcoCoordinator;
  readonly twap: TwapScheduler;
  readonly grid: GridEngine;
  readonly poller: StatusPoller;

  private readonly onSimulatedUpdate = (orderId: string, update: OrderUpdate): void => {
    this.ledger.applyUpdate(orderId, update);
  };

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.gateway = options.gateway ?? createGateway(this.config);
    this.ledger = new OrderLedger();
    this.validator = new OrderValidator(this.config.limits);
    this.orders = new OrderService(this.gateway, this.ledger, this.validator);
    this.oco = new OcoCoordinator(this.ledger, this.orders);
    this.twap = new TwapScheduler(this.ledger, this.orders, {
      intervalUnitMs: this.config.intervalUnitMs,
      maxConsecutiveSliceFailures: this.config.maxConsecutiveSliceFailures,
    });
    this.grid = new GridEngine(this.ledger, this.orders, this.gateway, {
      retryIntervalMs: this.config.statusPollIntervalMs,
    });
    this.poller = new StatusPoller(this.gateway, this.ledger, {
      intervalMs: this.config.statusPollIntervalMs,
    });

    // The simulator pushes fills directly; the live exchange is polled
    if (this.gateway instanceof SimulatedGateway) {
      this.gateway.on("orderUpdate", this.onSimulatedUpdate);
    }
  }

  get mode() {
    return this.gateway.mode;
  }

  // ============================================
  // ORDERS
  // ============================================

  placeMarket(input: MarketOrderInput): Promise<Order> {
    return this.orders.market.place(input);
  }

  placeLimit(input: LimitOrderInput): Promise<Order> {
    return this.orders.limit.place(input);
  }

  placeStopLimit(input: StopLimitOrderInput): Promise<Order> {
    return this.orders.stopLimit.place(input);
  }

  cancelOrder(orderId: string): Promise<Order> {
    return this.orders.cancel(orderId);
  }

  amendOrder(orderId: string, changes: AmendInput): Promise<Order> {
    return this.orders.amend(orderId, changes);
  }

  // ============================================
  // STRATEGIES
  // ============================================

  async createOco(input: OcoInput): Promise<OcoPair> {
    const pair = await this.oco.create(input);
    this.trackFills();
    return pair;
  }

  cancelOco(pairId: string): Promise<OcoPair> {
    return this.oco.cancel(pairId);
  }

  startTwap(input: TwapInput, hooks?: TwapHooks): TwapHandle {
    const handle = this.twap.start(input, hooks);
    this.trackFills();
    return handle;
  }

  cancelTwap(id: string): TwapStrategy {
    return this.twap.cancel(id);
  }

  startGrid(input: GridInput, hooks?: GridHooks): GridHandle {
    const handle = this.grid.start(input, hooks);
    this.trackFills();
    return handle;
  }

  stopGrid(id: string): Promise<GridStopResult> {
    return this.grid.stop(id);
  }

  updateGridRange(id: string, changes: GridRangeInput): Promise<GridUpdateResult> {
    return this.grid.updateRange(id, changes);
  }

  // ============================================
  // QUERIES
  // ============================================

  /**
   * Look up any id from this session. Order ids not in the Ledger are
   * asked of the gateway when a symbol is given.
   */
  async status(id: string, symbol?: string): Promise<StatusReport> {
    const order = this.ledger.getOrder(id);
    if (order) return { type: "order", record: order };

    if (this.ledger.getOco(id)) return { type: "oco", record: this.oco.status(id) };
    if (this.ledger.getTwap(id)) return { type: "twap", record: this.twap.status(id) };
    if (this.ledger.getGrid(id)) return { type: "grid", record: this.grid.status(id) };

    if (symbol) {
      const normalized = this.validator.validateSymbol(symbol);
      const record = await this.gateway.queryOrder(normalized, id);
      return { type: "remote", orderId: id, symbol: normalized, record };
    }

    throw new StateError(`Unknown id ${id}`);
  }

  history(type?: HistoryType): HistoryEntry[] {
    return this.ledger.history(type);
  }

  /**
   * Stop every running strategy and the poller. Open orders stay on the exchange.
   */
  async shutdown(): Promise<void> {
    await this.twap.shutdown();
    const stopped = await this.grid.shutdown();
    for (const result of stopped) {
      if (result.failures.length > 0) {
        logger.warn(`[ENGINE] Grid ${result.grid.id} left ${result.failures.length} order(s) open`);
      }
    }
    this.poller.stop();

    this.oco.dispose();
    this.twap.dispose();
    this.grid.dispose();
    if (this.gateway instanceof SimulatedGateway) {
      this.gateway.off("orderUpdate", this.onSimulatedUpdate);
    }
  }

  /** Live fills only reach the Ledger through the poller */
  private trackFills(): void {
    if (this.gateway.mode === "live" && !this.poller.isRunning()) {
      this.poller.start();
    }
  }
}
