/**
 * TWAP SCHEDULER
 * ==============
 * Splits a large order into equal slices sent one interval apart.
 *
 * - start() returns a handle at once; the slices go out in the background
 * - slice = total / splits rounded down, the last slice takes the rest
 * - first slice immediately, then one every `interval × intervalUnitMs`
 * - the cancel flag is checked right before each slice and after each wait
 * - every slice goes through the normal order path (validation included)
 * - gateway errors fail the slice; too many failures in a row fail the TWAP
 *
 * @example
 * const handle = scheduler.start({ symbol: "BTCUSDT", side: "BUY", quantity: 1, splits: 5, interval: 10 });
 * handle.status();           // slices emitted so far
 * handle.cancel();           // stops before the next slice
 * const final = await handle.done;
 */

import { StateError, errorMessage, isGatewayError } from "../errors";
import { OrderLedger } from "../ledger";
import { OrderService } from "../orders";
import { Order, TwapSpec, TwapStrategy, isTerminalStatus } from "../types";
import { logEvent, logger } from "../utils/logger";
import { TwapInput } from "../validation";
import { runHook } from "./hooks";

export interface TwapSchedulerConfig {
  /** Milliseconds in one interval unit (1000 = seconds) */
  intervalUnitMs: number;
  /** Consecutive failed slices before the TWAP is FAILED */
  maxConsecutiveSliceFailures: number;
}

const MAX_TIMER_MS = 2_147_483_647;

const DEFAULT_CONFIG: TwapSchedulerConfig = {
  intervalUnitMs: 1000,
  maxConsecutiveSliceFailures: 3,
};

export interface TwapHooks {
  /** Called once a child order's final status is known */
  onSliceComplete?: (order: Order) => void | Promise<void>;
}

export interface TwapStatus extends TwapStrategy {
  slicesEmitted: number;
}

/**
 * Handle for a running background task
 */
export interface TaskHandle<TState, TFinal> {
  id: string;
  cancel(): TFinal;
  status(): TState;
  /** Settles (never rejects) once the task has stopped */
  done: Promise<TFinal>;
}

export type TwapHandle = TaskHandle<TwapStatus, TwapStrategy>;

interface TwapTask {
  cancelled: boolean;
  /** Cuts the current wait short */
  wake: (() => void) | null;
  done: Promise<TwapStrategy>;
}

type SliceOutcome = "emitted" | "failed" | "fatal";

export class TwapScheduler {
  private config: TwapSchedulerConfig;
  private tasks: Map<string, TwapTask> = new Map();
  /** Kept after the task ends: resting children can still complete */
  private hooks: Map<string, TwapHooks> = new Map();
  /** Resting child orders whose hook has not fired yet: orderId → twapId */
  private awaitingFinal: Map<string, string> = new Map();
  private twapCounter = 0;

  private readonly onOrderUpdated = (order: Order): void => {
    const twapId = this.awaitingFinal.get(order.orderId);
    if (!twapId || !isTerminalStatus(order.status)) return;
    this.awaitingFinal.delete(order.orderId);
    this.fireSliceHook(twapId, order);
  };

  constructor(
    private readonly ledger: OrderLedger,
    private readonly orders: OrderService,
    config: Partial<TwapSchedulerConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.ledger.on("order:updated", this.onOrderUpdated);
  }

  /**
   * Validate and launch. Throws ValidationError before anything is sent.
   */
  start(input: TwapInput, hooks: TwapHooks = {}): TwapHandle {
    const spec = this.orders.validator.validateTwap(input);
    const id = this.generateId();
    const now = new Date();

    this.ledger.saveTwap({
      id,
      symbol: spec.symbol,
      side: spec.side,
      totalQuantity: spec.totalQuantity,
      splits: spec.splits,
      interval: spec.interval,
      orderKind: spec.orderKind,
      ...(spec.price !== undefined ? { price: spec.price } : {}),
      sliceQuantities: spec.sliceQuantities,
      status: "RUNNING",
      childOrderIds: [],
      slicesRemaining: spec.splits,
      failedSlices: 0,
      consecutiveFailures: 0,
      startedAt: now,
      updatedAt: now,
    });

    logEvent("strategy_started", `[TWAP] ${id} ${spec.side} ${spec.totalQuantity} ${spec.symbol} in ${spec.splits} slices every ${spec.interval}`, {
      strategyId: id,
      symbol: spec.symbol,
      sliceQuantities: spec.sliceQuantities,
    });

    const task: TwapTask = { cancelled: false, wake: null, done: Promise.resolve(this.current(id)) };
    this.tasks.set(id, task);
    this.hooks.set(id, hooks);
    task.done = this.run(id, spec, task).catch((error) => {
      logger.error(`[TWAP] ${id} crashed: ${errorMessage(error)}`, { strategyId: id });
      return this.finish(id, "FAILED", errorMessage(error));
    });

    return {
      id,
      cancel: () => this.cancel(id),
      status: () => this.status(id),
      done: task.done,
    };
  }

  /**
   * Stop before the next slice. Slices already sent stay.
   */
  cancel(id: string): TwapStrategy {
    const twap = this.current(id);
    if (twap.status !== "RUNNING") {
      throw new StateError(`TWAP ${id} is ${twap.status}, only RUNNING TWAPs can be cancelled`);
    }

    const task = this.tasks.get(id);
    if (task) {
      task.cancelled = true;
      task.wake?.();
    }

    const cancelled = this.finish(id, "CANCELLED");
    logger.info(`[TWAP] ${id} cancelled after ${cancelled.childOrderIds.length}/${cancelled.splits} slices`);
    return cancelled;
  }

  status(id: string): TwapStatus {
    const twap = this.current(id);
    return { ...twap, slicesEmitted: twap.childOrderIds.length };
  }

  list(): TwapStrategy[] {
    return this.ledger.listTwaps();
  }

  /** Cancel every running TWAP and wait for the tasks to stop */
  async shutdown(): Promise<void> {
    const running = [...this.tasks.entries()].filter(([id]) => this.current(id).status === "RUNNING");
    for (const [id] of running) this.cancel(id);
    await Promise.all(running.map(([, task]) => task.done));
  }

  dispose(): void {
    this.ledger.off("order:updated", this.onOrderUpdated);
    this.hooks.clear();
    this.awaitingFinal.clear();
  }

  // ============================================
  // BACKGROUND TASK
  // ============================================

  private async run(id: string, spec: TwapSpec, task: TwapTask): Promise<TwapStrategy> {
    const intervalMs = spec.interval * this.config.intervalUnitMs;

    for (let index = 0; index < spec.splits; index++) {
      if (task.cancelled) break;
      if (index > 0) {
        await this.wait(task, intervalMs);
        if (task.cancelled) break;
      }

      const outcome = await this.emitSlice(id, spec, index);
      if (outcome === "fatal") break;
    }

    this.tasks.delete(id);
    const twap = this.current(id);
    if (twap.status !== "RUNNING") return twap;
    return this.finish(id, "COMPLETED");
  }

  private async emitSlice(id: string, spec: TwapSpec, index: number): Promise<SliceOutcome> {
    const quantity = spec.sliceQuantities[index];
    const base = { symbol: spec.symbol, side: spec.side, quantity, strategyId: id };

    let order: Order;
    try {
      if (spec.orderKind === "MARKET") {
        order = await this.orders.market.place(base);
      } else if (spec.price !== undefined) {
        order = await this.orders.limit.place({ ...base, price: spec.price, timeInForce: "GTC" });
      } else {
        throw new StateError(`TWAP ${id} has LIMIT slices but no price`);
      }
    } catch (error) {
      return this.sliceFailed(id, index, error);
    }

    const twap = this.ledger.updateTwap(id, (t) => {
      t.childOrderIds.push(order.orderId);
      t.slicesRemaining = spec.splits - index - 1;
      t.consecutiveFailures = 0;
    });

    logEvent("strategy_slice_emitted", `[TWAP] ${id} slice ${index + 1}/${spec.splits}: ${order.orderId} ${quantity} ${order.status}`, {
      strategyId: id,
      orderId: order.orderId,
      slice: index + 1,
      quantity,
      slicesRemaining: twap.slicesRemaining,
    });

    if (isTerminalStatus(order.status)) {
      this.fireSliceHook(id, order);
    } else {
      this.awaitingFinal.set(order.orderId, id);
    }
    return "emitted";
  }

  private sliceFailed(id: string, index: number, error: unknown): SliceOutcome {
    const message = errorMessage(error);

    if (!isGatewayError(error)) {
      logEvent("strategy_slice_failed", `[TWAP] ${id} slice ${index + 1} hit an unrecoverable error: ${message}`, {
        strategyId: id,
        slice: index + 1,
      }, "error");
      this.finish(id, "FAILED", message);
      return "fatal";
    }

    const twap = this.ledger.updateTwap(id, (t) => {
      t.failedSlices++;
      t.consecutiveFailures++;
      t.slicesRemaining = t.splits - index - 1;
    });

    logEvent("strategy_slice_failed", `[TWAP] ${id} slice ${index + 1} failed: ${message}`, {
      strategyId: id,
      slice: index + 1,
      consecutiveFailures: twap.consecutiveFailures,
      errorCode: error.code,
    }, "warn");

    if (twap.consecutiveFailures >= this.config.maxConsecutiveSliceFailures) {
      this.finish(id, "FAILED", `${twap.consecutiveFailures} consecutive slice failures, last: ${message}`);
      return "fatal";
    }
    return "failed";
  }

  /**
   * Move a RUNNING TWAP to a final status. A TWAP that already stopped
   * keeps its status.
   */
  private finish(id: string, status: "COMPLETED" | "CANCELLED" | "FAILED", error?: string): TwapStrategy {
    const twap = this.current(id);
    if (twap.status !== "RUNNING") return twap;

    const finished = this.ledger.updateTwap(id, (t) => {
      t.status = status;
      t.finishedAt = new Date();
      if (error) t.error = error;
    });

    logEvent("strategy_finished", `[TWAP] ${id} ${status}`, {
      strategyId: id,
      status,
      slicesEmitted: finished.childOrderIds.length,
      failedSlices: finished.failedSlices,
      ...(error ? { error } : {}),
    }, status === "FAILED" ? "error" : "info");
    return finished;
  }

  private fireSliceHook(id: string, order: Order): void {
    runHook(`[TWAP] ${id} onSliceComplete`, this.hooks.get(id)?.onSliceComplete, order);
  }

  /** Timers take at most a signed 32-bit delay; longer waits run in chunks */
  private wait(task: TwapTask, ms: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout;
      const deadline = Date.now() + ms;
      const arm = (): void => {
        const left = deadline - Date.now();
        if (left <= 0) {
          task.wake = null;
          resolve();
          return;
        }
        timer = setTimeout(arm, Math.min(left, MAX_TIMER_MS));
      };
      task.wake = () => {
        clearTimeout(timer);
        task.wake = null;
        resolve();
      };
      arm();
    });
  }


  private current(id: string): TwapStrategy {
    const twap = this.ledger.getTwap(id);
    if (!twap) {
      throw new StateError(`Unknown TWAP ${id}`);
    }
    return twap;
  }

  private generateId(): string {
    this.twapCounter++;
    return `TWAP-${Date.now()}-${this.twapCounter}`;
  }
}
