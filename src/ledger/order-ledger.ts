/**
 * ORDER LEDGER
 * ============
 * In-memory record of every order and strategy in the session.
 *
 * One instance is created per engine and passed to every component.
 * All writes are synchronous and go through a single write boundary that
 * refuses re-entrant writes, so each mutation commits as a whole before
 * any other task on the event loop can observe it.
 * Events fire after the write commits; listeners may write again.
 * Every read returns a copy.
 *
 * @example
 * const ledger = new OrderLedger();
 * ledger.on("order:updated", (order, previous) => { ... });
 * ledger.recordOrder(order);
 * ledger.applyUpdate(order.orderId, { status: "FILLED", filledQty: 1, avgPrice: 100 });
 */

import { EventEmitter } from "eventemitter3";
import { StateError } from "../errors";
import {
  GridStrategy,
  HistoryEntry,
  OcoPair,
  OcoStatus,
  Order,
  OrderStatus,
  OrderUpdate,
  StrategyStatus,
  TwapStrategy,
  isTerminalStatus,
} from "../types";
import { logEvent, logger } from "../utils/logger";

export type StrategyEntry = Exclude<HistoryEntry, { type: "order" }>;

export type HistoryType = HistoryEntry["type"];

export interface LedgerEvents {
  "order:created": (order: Order) => void;
  "order:updated": (order: Order, previous: Order) => void;
  "strategy:updated": (entry: StrategyEntry) => void;
}

export interface OrderFilter {
  symbol?: string;
  status?: OrderStatus;
  strategyId?: string;
}

const STATUS_RANK: Record<OrderStatus, number> = {
  NEW: 0,
  PARTIALLY_FILLED: 1,
  FILLED: 2,
  CANCELED: 2,
  REJECTED: 2,
  EXPIRED: 2,
};

const FINAL_OCO: ReadonlySet<OcoStatus> = new Set<OcoStatus>(["COMPLETED", "CANCELLED"]);
const FINAL_STRATEGY: ReadonlySet<StrategyStatus> = new Set<StrategyStatus>(["COMPLETED", "CANCELLED", "FAILED"]);

export class OrderLedger extends EventEmitter<LedgerEvents> {
  private orders: Map<string, Order> = new Map();
  private ocos: Map<string, OcoPair> = new Map();
  private twaps: Map<string, TwapStrategy> = new Map();
  private grids: Map<string, GridStrategy> = new Map();
  /** Creation order across all record types */
  private timeline: { type: HistoryType; id: string }[] = [];

  private writing = false;
  private pending: (() => void)[] = [];

  // ============================================
  // ORDERS
  // ============================================

  recordOrder(order: Order): Order {
    return this.write("recordOrder", () => {
      if (this.orders.has(order.orderId)) {
        throw new StateError(`Order ${order.orderId} already recorded`);
      }
      const stored = clone(order);
      this.orders.set(stored.orderId, stored);
      this.timeline.push({ type: "order", id: stored.orderId });

      const copy = clone(stored);
      this.afterCommit(() => this.emit("order:created", copy));
      return clone(stored);
    });
  }

  /**
   * Apply gateway status/fill data. Terminal orders never change again,
   * status never moves backwards, filled quantity never shrinks.
   * Returns the order after the update, undefined for unknown ids.
   */
  applyUpdate(orderId: string, update: OrderUpdate): Order | undefined {
    return this.write("applyUpdate", () => {
      const current = this.orders.get(orderId);
      if (!current) return undefined;

      if (isTerminalStatus(current.status)) {
        if (update.status !== current.status) {
          logger.debug(`[LEDGER] Ignoring ${update.status} for ${orderId}, already ${current.status}`);
        }
        return clone(current);
      }

      const status = STATUS_RANK[update.status] >= STATUS_RANK[current.status] ? update.status : current.status;
      const filledQty = Math.max(current.filledQty, update.filledQty);
      const avgPrice = update.filledQty >= current.filledQty && update.avgPrice > 0 ? update.avgPrice : current.avgPrice;

      if (status === current.status && filledQty === current.filledQty && avgPrice === current.avgPrice) {
        return clone(current);
      }

      const previous = clone(current);
      current.status = status;
      current.filledQty = filledQty;
      current.avgPrice = avgPrice;
      current.updatedAt = new Date();

      if (status !== previous.status) {
        logEvent("order_status_changed", `[LEDGER] ${orderId} ${previous.status} -> ${status}`, {
          orderId,
          symbol: current.symbol,
          from: previous.status,
          to: status,
          filledQty,
          avgPrice,
          ...(current.strategyId ? { strategyId: current.strategyId } : {}),
        });
      }

      const copy = clone(current);
      this.afterCommit(() => this.emit("order:updated", copy, previous));
      return clone(current);
    });
  }

  getOrder(orderId: string): Order | undefined {
    const order = this.orders.get(orderId);
    return order ? clone(order) : undefined;
  }

  listOrders(filter: OrderFilter = {}): Order[] {
    return [...this.orders.values()]
      .filter((order) =>
        (filter.symbol === undefined || order.symbol === filter.symbol) &&
        (filter.status === undefined || order.status === filter.status) &&
        (filter.strategyId === undefined || order.strategyId === filter.strategyId))
      .map(clone);
  }

  /** Orders not yet in a terminal status */
  openOrders(): Order[] {
    return [...this.orders.values()].filter((order) => !isTerminalStatus(order.status)).map(clone);
  }

  // ============================================
  // OCO PAIRS
  // ============================================

  saveOco(pair: OcoPair): OcoPair {
    return this.write("saveOco", () => {
      const existing = this.ocos.get(pair.id);
      if (existing && FINAL_OCO.has(existing.status) && existing.status !== pair.status) {
        throw new StateError(`OCO ${pair.id} is already ${existing.status}`);
      }
      if (!existing) this.timeline.push({ type: "oco", id: pair.id });

      const stored = clone(pair);
      this.ocos.set(stored.id, stored);
      this.notifyStrategy({ type: "oco", record: stored });
      return clone(stored);
    });
  }

  /**
   * Read-modify-write of one pair inside the write boundary
   */
  updateOco(id: string, change: (pair: OcoPair) => void): OcoPair {
    const current = this.ocos.get(id);
    if (!current) throw new StateError(`Unknown OCO ${id}`);
    const next = clone(current);
    change(next);
    next.updatedAt = new Date();
    return this.saveOco(next);
  }

  getOco(id: string): OcoPair | undefined {
    const pair = this.ocos.get(id);
    return pair ? clone(pair) : undefined;
  }

  listOcos(): OcoPair[] {
    return [...this.ocos.values()].map(clone);
  }

  // ============================================
  // TWAP
  // ============================================

  saveTwap(twap: TwapStrategy): TwapStrategy {
    return this.write("saveTwap", () => {
      const existing = this.twaps.get(twap.id);
      if (existing) {
        this.assertStrategyTransition("TWAP", twap.id, existing.status, twap.status);
        assertAppendOnly(twap.id, existing.childOrderIds, twap.childOrderIds);
      } else {
        this.timeline.push({ type: "twap", id: twap.id });
      }

      const stored = clone(twap);
      this.twaps.set(stored.id, stored);
      this.notifyStrategy({ type: "twap", record: stored });
      return clone(stored);
    });
  }

  updateTwap(id: string, change: (twap: TwapStrategy) => void): TwapStrategy {
    const current = this.twaps.get(id);
    if (!current) throw new StateError(`Unknown TWAP ${id}`);
    const next = clone(current);
    change(next);
    next.updatedAt = new Date();
    return this.saveTwap(next);
  }

  /** Link a child order to a TWAP (append-only) */
  appendChild(twapId: string, orderId: string): TwapStrategy {
    return this.updateTwap(twapId, (twap) => {
      twap.childOrderIds.push(orderId);
    });
  }

  getTwap(id: string): TwapStrategy | undefined {
    const twap = this.twaps.get(id);
    return twap ? clone(twap) : undefined;
  }

  listTwaps(): TwapStrategy[] {
    return [...this.twaps.values()].map(clone);
  }

  // ============================================
  // GRID
  // ============================================

  saveGrid(grid: GridStrategy): GridStrategy {
    return this.write("saveGrid", () => {
      const existing = this.grids.get(grid.id);
      if (existing) {
        this.assertStrategyTransition("Grid", grid.id, existing.status, grid.status);
      } else {
        this.timeline.push({ type: "grid", id: grid.id });
      }

      const stored = clone(grid);
      this.grids.set(stored.id, stored);
      this.notifyStrategy({ type: "grid", record: stored });
      return clone(stored);
    });
  }

  updateGrid(id: string, change: (grid: GridStrategy) => void): GridStrategy {
    const current = this.grids.get(id);
    if (!current) throw new StateError(`Unknown grid ${id}`);
    const next = clone(current);
    change(next);
    next.updatedAt = new Date();
    return this.saveGrid(next);
  }

  getGrid(id: string): GridStrategy | undefined {
    const grid = this.grids.get(id);
    return grid ? clone(grid) : undefined;
  }

  listGrids(): GridStrategy[] {
    return [...this.grids.values()].map(clone);
  }

  // ============================================
  // HISTORY
  // ============================================

  /**
   * Every order and strategy in creation order, optionally one type only
   */
  history(type?: HistoryType): HistoryEntry[] {
    const entries: HistoryEntry[] = [];
    for (const item of this.timeline) {
      if (type && item.type !== type) continue;
      const entry = this.lookup(item.type, item.id);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private lookup(type: HistoryType, id: string): HistoryEntry | undefined {
    switch (type) {
      case "order": {
        const record = this.getOrder(id);
        return record && { type, record };
      }
      case "oco": {
        const record = this.getOco(id);
        return record && { type, record };
      }
      case "twap": {
        const record = this.getTwap(id);
        return record && { type, record };
      }
      case "grid": {
        const record = this.getGrid(id);
        return record && { type, record };
      }
    }
  }

  // ============================================
  // WRITE BOUNDARY
  // ============================================

  private write<T>(operation: string, mutate: () => T): T {
    if (this.writing) {
      throw new StateError(`Re-entrant ledger write (${operation})`);
    }

    this.writing = true;
    let result: T;
    try {
      result = mutate();
    } catch (error) {
      this.pending = [];
      throw error;
    } finally {
      this.writing = false;
    }

    const events = this.pending;
    this.pending = [];
    for (const emit of events) emit();
    return result;
  }

  private afterCommit(emit: () => void): void {
    this.pending.push(emit);
  }

  private notifyStrategy(entry: StrategyEntry): void {
    const copy = cloneEntry(entry);
    this.afterCommit(() => this.emit("strategy:updated", copy));
  }

  private assertStrategyTransition(
    label: string,
    id: string,
    from: StrategyStatus,
    to: StrategyStatus,
  ): void {
    if (FINAL_STRATEGY.has(from) && from !== to) {
      throw new StateError(`${label} ${id} is already ${from}`);
    }
  }
}

function assertAppendOnly(id: string, before: readonly string[], after: readonly string[]): void {
  const intact = after.length >= before.length && before.every((orderId, i) => after[i] === orderId);
  if (!intact) {
    throw new StateError(`TWAP ${id} child orders are append-only`);
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

function cloneEntry(entry: StrategyEntry): StrategyEntry {
  switch (entry.type) {
    case "oco":
      return { type: "oco", record: clone(entry.record) };
    case "twap":
      return { type: "twap", record: clone(entry.record) };
    case "grid":
      return { type: "grid", record: clone(entry.record) };
  }
}
