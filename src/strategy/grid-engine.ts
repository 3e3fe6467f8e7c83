/**
 * GRID ENGINE
 * ===========
 * Places limit orders at evenly spaced price levels and flips each level
 * to the opposite side whenever its order fills.
 *
 * Levels: gridCount + 1 prices from lower to upper (both ends exact).
 * Placement follows the reference price: BUY below it, SELL above it,
 * nothing at a level equal to it.
 *
 * Level orders are post-only. One the exchange turns away (it would have
 * matched on arrival) leaves its level pending; pending levels are
 * retried on a timer once the price has moved off them.
 *
 * LONG grids open with BUY and close with SELL; SHORT grids open with
 * SELL and close with BUY. A closing fill realizes
 * (fill - entry) × qty for LONG and (entry - fill) × qty for SHORT, where entry is the level's
 * last opening fill (or the level price when there was none).
 *
 * The engine reacts to Ledger order updates; it never polls by itself.
 */

import { StateError, errorMessage, isPostOnlyRejection } from "../errors";
import { OrderLedger } from "../ledger";
import { OrderService } from "../orders";
import {
  ExchangeGateway,
  GridLevel,
  GridSpec,
  GridStrategy,
  Order,
  Side,
  isTerminalStatus,
} from "../types";
import { addDecimal, decimalSum, gridPrices, gridStep, pnl } from "../utils/decimal-math";
import { logEvent, logger } from "../utils/logger";
import { GridInput, GridRangeInput } from "../validation";
import { runHook } from "./hooks";
import { oppositeSide } from "./oco-coordinator";

export interface GridHooks {
  /** Called after a level's fill has been booked */
  onRebalance?: (level: GridLevel) => void | Promise<void>;
}

export interface GridEngineConfig {
  /** How often pending levels are retried */
  retryIntervalMs: number;
}

const DEFAULT_CONFIG: GridEngineConfig = {
  retryIntervalMs: 2000,
};

export interface GridStatus extends GridStrategy {
  totalRealizedPnl: number;
  openOrderCount: number;
  pendingLevelCount: number;
  totalRebalances: number;
  totalCycles: number;
}

export interface GridStopFailure {
  levelIndex: number;
  orderId: string;
  error: string;
}

export interface GridStopResult {
  grid: GridStrategy;
  /** Level orders the gateway would not cancel */
  failures: GridStopFailure[];
}

export interface GridUpdateResult {
  grid: GridStrategy;
  /** Old level orders the gateway would not cancel */
  failures: GridStopFailure[];
}

export interface GridHandle {
  id: string;
  /** Settles (never rejects) once the initial levels are placed */
  ready: Promise<GridStrategy>;
  stop(): Promise<GridStopResult>;
  status(): GridStatus;
}

interface LevelRef {
  gridId: string;
  levelIndex: number;
}

export class GridEngine {
  /** Open level orders: orderId → level */
  private levelOrders: Map<string, LevelRef> = new Map();
  private hooks: Map<string, GridHooks> = new Map();
  /** `${gridId}:${levelIndex}` with a placement in flight */
  private placing: Set<string> = new Set();
  /** Grids whose range is being moved */
  private updating: Set<string> = new Set();
  private retryTimer: NodeJS.Timeout | null = null;
  private config: GridEngineConfig;
  private gridCounter = 0;

  private readonly onOrderUpdated = (order: Order): void => {
    this.handleLevelUpdate(order);
  };

  constructor(
    private readonly ledger: OrderLedger,
    private readonly orders: OrderService,
    private readonly gateway: ExchangeGateway,
    config: Partial<GridEngineConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.ledger.on("order:updated", this.onOrderUpdated);
  }

  /**
   * Validate and launch. The id comes back at once; `ready` settles once
   * every level has been tried. Throws ValidationError before anything is sent.
   */
  start(input: GridInput, hooks: GridHooks = {}): GridHandle {
    const spec = this.orders.validator.validateGrid(input);
    const id = this.generateId();
    const now = new Date();

    const levels: GridLevel[] = gridPrices(spec.lowerPrice, spec.upperPrice, spec.gridCount).map((price, index) => ({
      index,
      price,
      openOrderId: null,
      openSide: null,
      pendingSide: null,
      entryPrice: null,
      realizedPnl: 0,
      rebalanceCount: 0,
      cyclesCompleted: 0,
    }));

    this.ledger.saveGrid({
      id,
      symbol: spec.symbol,
      direction: spec.direction,
      lowerPrice: spec.lowerPrice,
      upperPrice: spec.upperPrice,
      gridCount: spec.gridCount,
      step: gridStep(spec.lowerPrice, spec.upperPrice, spec.gridCount),
      totalQuantity: spec.totalQuantity,
      quantityPerLevel: spec.quantityPerLevel,
      referencePrice: spec.referencePrice ?? 0,
      status: "RUNNING",
      levels,
      startedAt: now,
      updatedAt: now,
    });
    this.hooks.set(id, hooks);

    logEvent("strategy_started", `[GRID] ${id} ${spec.direction} ${spec.symbol} ${spec.lowerPrice}-${spec.upperPrice} x${spec.gridCount}`, {
      strategyId: id,
      symbol: spec.symbol,
      quantityPerLevel: spec.quantityPerLevel,
    });

    const ready = this.placeInitialLevels(id, spec).catch((error) => {
      logger.error(`[GRID] ${id} failed to start: ${errorMessage(error)}`, { strategyId: id });
      return this.finish(id, "FAILED");
    });

    return {
      id,
      ready,
      stop: () => this.stop(id),
      status: () => this.status(id),
    };
  }

  /**
   * Cancel every open level order (best-effort) and mark the grid CANCELLED.
   */
  async stop(id: string): Promise<GridStopResult> {
    const grid = this.current(id);
    if (grid.status !== "RUNNING") {
      throw new StateError(`Grid ${id} is ${grid.status}, only RUNNING grids can be stopped`);
    }

    this.finish(id, "CANCELLED");
    const failures = await this.cancelLevelOrders(id, grid.levels);

    if (failures.length > 0) {
      logger.warn(`[GRID] ${id} stopped with ${failures.length} order(s) still open`, { strategyId: id });
    }
    return { grid: this.current(id), failures };
  }

  /**
   * Move a running grid to new bounds. Open level orders are cancelled,
   * level prices recomputed in place (P&L and counters stay with their
   * level) and orders placed again around the current price.
   */
  async updateRange(id: string, changes: GridRangeInput): Promise<GridUpdateResult> {
    const grid = this.current(id);
    if (grid.status !== "RUNNING") {
      throw new StateError(`Grid ${id} is ${grid.status}, only RUNNING grids can be updated`);
    }
    const spec = this.orders.validator.validateGridRange(grid, changes);

    this.updating.add(id);
    const failures = await this.moveLevels(grid, spec).finally(() => this.updating.delete(id));
    logEvent("grid_range_updated", `[GRID] ${id} range ${grid.lowerPrice}-${grid.upperPrice} -> ${spec.lowerPrice}-${spec.upperPrice}`, {
      strategyId: id,
      lowerPrice: spec.lowerPrice,
      upperPrice: spec.upperPrice,
      cancelFailures: failures.length,
    });

    if (this.current(id).status === "RUNNING") {
      const referencePrice = await this.gateway.getPrice(grid.symbol);
      this.ledger.updateGrid(id, (g) => {
        g.referencePrice = referencePrice;
      });
      await this.placeLevels(id, referencePrice);
    }
    return { grid: this.current(id), failures };
  }

  /** Reprice every level in place; the old orders are detached before they are cancelled */
  private async moveLevels(grid: GridStrategy, spec: GridSpec): Promise<GridStopFailure[]> {
    const prices = gridPrices(spec.lowerPrice, spec.upperPrice, spec.gridCount);
    for (const level of grid.levels) {
      if (level.openOrderId) this.levelOrders.delete(level.openOrderId);
    }
    this.ledger.updateGrid(grid.id, (g) => {
      g.lowerPrice = spec.lowerPrice;
      g.upperPrice = spec.upperPrice;
      g.step = gridStep(spec.lowerPrice, spec.upperPrice, spec.gridCount);
      g.quantityPerLevel = spec.quantityPerLevel;
      for (const level of g.levels) {
        level.price = prices[level.index];
        level.openOrderId = null;
        level.openSide = null;
        level.pendingSide = null;
        level.entryPrice = null;
      }
    });
    return this.cancelLevelOrders(grid.id, grid.levels);
  }

  /**
   * Place pending levels the price has moved off: BUY once the price is
   * above the level, SELL once it is below. Returns how many were placed.
   */
  async retryPendingLevels(id?: string): Promise<number> {
    const grids = (id ? [this.current(id)] : this.list()).filter(
      (grid) => grid.status === "RUNNING" && grid.levels.some((level) => level.pendingSide !== null),
    );

    let placed = 0;
    for (const grid of grids) {
      const price = await this.gateway.getPrice(grid.symbol);
      for (const level of grid.levels) {
        const side = level.pendingSide;
        if (!side) continue;
        const rests = side === "BUY" ? price > level.price : price < level.price;
        if (rests && (await this.placeLevel(grid.id, level.index, side))) placed++;
      }
    }

    if (!this.hasPendingLevels()) this.clearRetryTimer();
    return placed;
  }

  status(id: string): GridStatus {
    const grid = this.current(id);
    return {
      ...grid,
      totalRealizedPnl: decimalSum(grid.levels.map((level) => level.realizedPnl)),
      openOrderCount: grid.levels.filter((level) => level.openOrderId !== null).length,
      pendingLevelCount: grid.levels.filter((level) => level.pendingSide !== null).length,
      totalRebalances: grid.levels.reduce((sum, level) => sum + level.rebalanceCount, 0),
      totalCycles: grid.levels.reduce((sum, level) => sum + level.cyclesCompleted, 0),
    };
  }

  list(): GridStrategy[] {
    return this.ledger.listGrids();
  }

  /** Stop every running grid */
  async shutdown(): Promise<GridStopResult[]> {
    const running = this.list().filter((grid) => grid.status === "RUNNING");
    const results: GridStopResult[] = [];
    for (const grid of running) {
      results.push(await this.stop(grid.id));
    }
    return results;
  }

  dispose(): void {
    this.ledger.off("order:updated", this.onOrderUpdated);
    this.clearRetryTimer();
    this.levelOrders.clear();
    this.placing.clear();
    this.updating.clear();
    this.hooks.clear();
  }

  // ============================================
  // PLACEMENT
  // ============================================

  private async placeInitialLevels(id: string, spec: GridSpec): Promise<GridStrategy> {
    const referencePrice = spec.referencePrice ?? (await this.gateway.getPrice(spec.symbol));
    this.ledger.updateGrid(id, (g) => {
      g.referencePrice = referencePrice;
    });

    const placed = await this.placeLevels(id, referencePrice);

    const current = this.current(id);
    if (current.status !== "RUNNING") return current;

    if (placed === 0) {
      logger.error(`[GRID] ${id} no level could be placed`, { strategyId: id });
      return this.finish(id, "FAILED");
    }

    logger.info(`[GRID] ${id} running with ${placed} level order(s), reference ${referencePrice}`);
    return current;
  }

  /** BUY below the reference price, SELL above it. Returns the number placed. */
  private async placeLevels(id: string, referencePrice: number): Promise<number> {
    let placed = 0;
    for (const level of this.current(id).levels) {
      const side: Side | null =
        level.price < referencePrice ? "BUY" : level.price > referencePrice ? "SELL" : null;
      if (!side) continue;
      if (await this.placeLevel(id, level.index, side)) placed++;
    }
    return placed;
  }

  /**
   * Place one post-only limit order at a level. A post-only rejection
   * leaves the level pending; other failures leave it as it was.
   * Returns whether an order now sits at the level.
   */
  private async placeLevel(id: string, levelIndex: number, side: Side): Promise<boolean> {
    const key = `${id}:${levelIndex}`;
    const grid = this.current(id);
    if (grid.status !== "RUNNING" || grid.levels[levelIndex].openOrderId) return false;
    if (this.placing.has(key) || this.updating.has(id)) return false;

    this.placing.add(key);
    try {
      return await this.submitLevel(grid, levelIndex, side);
    } finally {
      this.placing.delete(key);
    }
  }

  private async submitLevel(grid: GridStrategy, levelIndex: number, side: Side): Promise<boolean> {
    const id = grid.id;
    const price = grid.levels[levelIndex].price;

    let order: Order;
    try {
      order = await this.orders.limit.place({
        symbol: grid.symbol,
        side,
        quantity: grid.quantityPerLevel,
        price,
        timeInForce: "GTC",
        postOnly: true,
        strategyId: id,
      });
    } catch (error) {
      if (isPostOnlyRejection(error)) {
        this.markPending(id, levelIndex, side);
      } else {
        logger.warn(`[GRID] ${id} level ${levelIndex} ${side} @ ${price} not placed: ${errorMessage(error)}`, {
          strategyId: id,
          levelIndex,
        });
      }
      return false;
    }

    // Stopped or moved while the order was in flight: take it back down
    const latestGrid = this.current(id);
    if (latestGrid.status !== "RUNNING" || latestGrid.levels[levelIndex].price !== price) {
      await this.cancelOrphan(id, order);
      return false;
    }

    this.ledger.updateGrid(id, (g) => {
      g.levels[levelIndex].openOrderId = order.orderId;
      g.levels[levelIndex].openSide = side;
      g.levels[levelIndex].pendingSide = null;
    });
    this.levelOrders.set(order.orderId, { gridId: id, levelIndex });
    logEvent("grid_level_placed", `[GRID] ${id} level ${levelIndex}: ${side} ${grid.quantityPerLevel} @ ${price} (${order.orderId})`, {
      strategyId: id,
      levelIndex,
      orderId: order.orderId,
      side,
    });

    // The exchange may already have expired it
    const latest = this.ledger.getOrder(order.orderId);
    if (latest && isTerminalStatus(latest.status)) this.handleLevelUpdate(latest);
    return true;
  }

  private markPending(id: string, levelIndex: number, side: Side): void {
    const grid = this.ledger.updateGrid(id, (g) => {
      g.levels[levelIndex].pendingSide = side;
    });
    logEvent("grid_level_pending", `[GRID] ${id} level ${levelIndex} ${side} @ ${grid.levels[levelIndex].price} would match, waiting for the price to move`, {
      strategyId: id,
      levelIndex,
      side,
    });
    if (grid.status === "RUNNING") this.scheduleRetry();
  }

  /** Cancel the open orders of `levels` (best-effort) */
  private async cancelLevelOrders(id: string, levels: readonly GridLevel[]): Promise<GridStopFailure[]> {
    const failures: GridStopFailure[] = [];
    for (const level of levels) {
      if (!level.openOrderId) continue;
      const orderId = level.openOrderId;
      try {
        await this.orders.cancel(orderId);
      } catch (error) {
        failures.push({ levelIndex: level.index, orderId, error: errorMessage(error) });
        logEvent("cancel_failed", `[GRID] ${id} level ${level.index} cancel of ${orderId} failed: ${errorMessage(error)}`, {
          strategyId: id,
          orderId,
        }, "warn");
      }
    }
    return failures;
  }

  private async cancelOrphan(id: string, order: Order): Promise<void> {
    if (isTerminalStatus(order.status)) return;
    try {
      await this.orders.cancel(order.orderId);
    } catch (error) {
      logEvent("cancel_failed", `[GRID] ${id} could not cancel late order ${order.orderId}: ${errorMessage(error)}`, {
        strategyId: id,
        orderId: order.orderId,
      }, "warn");
    }
  }

  // ============================================
  // FILLS
  // ============================================

  private handleLevelUpdate(order: Order): void {
    const ref = this.levelOrders.get(order.orderId);
    if (!ref || !isTerminalStatus(order.status)) return;
    this.levelOrders.delete(order.orderId);

    const grid = this.ledger.getGrid(ref.gridId);
    if (!grid || grid.levels[ref.levelIndex].openOrderId !== order.orderId) return;

    if (order.status === "FILLED") {
      this.bookFill(grid, ref.levelIndex, order);
      return;
    }

    this.ledger.updateGrid(grid.id, (g) => {
      g.levels[ref.levelIndex].openOrderId = null;
      g.levels[ref.levelIndex].openSide = null;
    });

    // A post-only order the exchange expired instead of rejecting
    if (order.status === "EXPIRED") {
      this.markPending(grid.id, ref.levelIndex, order.side);
      return;
    }
    logger.info(`[GRID] ${grid.id} level ${ref.levelIndex} order ${order.orderId} ${order.status}, level cleared`);
  }

  private bookFill(grid: GridStrategy, levelIndex: number, order: Order): void {
    const openingSide: Side = grid.direction === "LONG" ? "BUY" : "SELL";
    const opening = order.side === openingSide;
    const fillPrice = order.avgPrice > 0 ? order.avgPrice : grid.levels[levelIndex].price;

    let realized = 0;
    const updated = this.ledger.updateGrid(grid.id, (g) => {
      const level = g.levels[levelIndex];
      level.openOrderId = null;
      level.openSide = null;
      level.rebalanceCount++;

      if (opening) {
        level.entryPrice = fillPrice;
        return;
      }

      const entry = level.entryPrice ?? level.price;
      realized = g.direction === "LONG" ? pnl(entry, fillPrice, order.filledQty) : pnl(fillPrice, entry, order.filledQty);
      level.realizedPnl = addDecimal(level.realizedPnl, realized);
      level.entryPrice = null;
      level.cyclesCompleted++;
    });

    const level = updated.levels[levelIndex];
    logEvent("grid_level_rebalanced", `[GRID] ${grid.id} level ${levelIndex} ${order.side} filled @ ${fillPrice}${opening ? "" : `, realized ${realized}`}`, {
      strategyId: grid.id,
      levelIndex,
      orderId: order.orderId,
      side: order.side,
      fillPrice,
      realizedPnl: level.realizedPnl,
      rebalanceCount: level.rebalanceCount,
    });
    runHook(`[GRID] ${grid.id} onRebalance`, this.hooks.get(grid.id)?.onRebalance, level);

    if (updated.status !== "RUNNING") return;

    this.placeLevel(grid.id, levelIndex, oppositeSide(order.side)).catch((error) => {
      logger.error(`[GRID] ${grid.id} level ${levelIndex} re-placement failed: ${errorMessage(error)}`);
    });
  }

  private finish(id: string, status: "CANCELLED" | "FAILED"): GridStrategy {
    const grid = this.current(id);
    if (grid.status !== "RUNNING") return grid;

    const finished = this.ledger.updateGrid(id, (g) => {
      g.status = status;
      g.finishedAt = new Date();
    });
    logEvent("strategy_finished", `[GRID] ${id} ${status}`, {
      strategyId: id,
      status,
      totalRealizedPnl: decimalSum(finished.levels.map((level) => level.realizedPnl)),
    }, status === "FAILED" ? "error" : "info");
    if (!this.hasPendingLevels()) this.clearRetryTimer();
    return finished;
  }

  // ============================================
  // PENDING RETRY
  // ============================================

  private hasPendingLevels(): boolean {
    return this.list().some(
      (grid) => grid.status === "RUNNING" && grid.levels.some((level) => level.pendingSide !== null),
    );
  }

  private scheduleRetry(): void {
    if (this.retryTimer) return;
    this.retryTimer = setInterval(() => {
      this.retryPendingLevels().catch((error) => {
        logger.warn(`[GRID] pending level retry failed: ${errorMessage(error)}`);
      });
    }, this.config.retryIntervalMs);
  }

  private clearRetryTimer(): void {
    if (!this.retryTimer) return;
    clearInterval(this.retryTimer);
    this.retryTimer = null;
  }

  private current(id: string): GridStrategy {
    const grid = this.ledger.getGrid(id);
    if (!grid) {
      throw new StateError(`Unknown grid ${id}`);
    }
    return grid;
  }

  private generateId(): string {
    this.gridCounter++;
    return `GRID-${Date.now()}-${this.gridCounter}`;
  }
}
