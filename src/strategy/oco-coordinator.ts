/**
 * OCO COORDINATOR
 * ===============
 * One-cancels-the-other: a take-profit and a stop-loss protecting the
 * same position. When one leg fills, the other is cancelled.
 *
 * Lifecycle: CREATED → ACTIVE → COMPLETED | CANCELLED
 *
 * - `side` is the position being protected; both legs close it, so they
 *   trade on the opposite side
 * - Take-profit: LIMIT GTC at takeProfitPrice
 * - Stop-loss: STOP_LIMIT at stopLossPrice, limit stopLossLimitPrice
 * - The first leg seen FILLED in the Ledger wins; the sibling gets
 *   exactly one cancel. A later fill of the sibling is logged as a race.
 */

import { StateError, errorMessage } from "../errors";
import { OrderLedger } from "../ledger";
import { OrderService } from "../orders";
import { OcoLeg, OcoPair, OcoSpec, Order, OrderSpec, Side, isTerminalStatus } from "../types";
import { logEvent, logger } from "../utils/logger";
import { OcoInput } from "../validation";

interface LegRef {
  pairId: string;
  leg: OcoLeg;
}

export function oppositeSide(side: Side): Side {
  return side === "BUY" ? "SELL" : "BUY";
}

export class OcoCoordinator {
  private legs: Map<string, LegRef> = new Map();
  private pairCounter = 0;

  private readonly onOrderUpdated = (order: Order): void => {
    this.handleLegUpdate(order);
  };

  constructor(
    private readonly ledger: OrderLedger,
    private readonly orders: OrderService,
  ) {
    this.ledger.on("order:updated", this.onOrderUpdated);
  }

  /**
   * Validate, place both legs and activate the pair.
   * If either leg is rejected the other is cancelled, the pair is stored
   * CANCELLED and the gateway error is rethrown.
   */
  async create(input: OcoInput): Promise<OcoPair> {
    const spec = this.orders.validator.validateOco(input);
    const id = this.generateId();
    const now = new Date();

    this.ledger.saveOco({
      id,
      symbol: spec.symbol,
      side: spec.side,
      quantity: spec.quantity,
      takeProfitPrice: spec.takeProfitPrice,
      stopLossPrice: spec.stopLossPrice,
      stopLossLimitPrice: spec.stopLossLimitPrice,
      takeProfitOrderId: null,
      stopLossOrderId: null,
      status: "CREATED",
      createdAt: now,
      updatedAt: now,
    });

    let takeProfit: Order;
    try {
      takeProfit = await this.orders.submit(this.takeProfitSpec(id, spec));
    } catch (error) {
      this.abort(id, `take-profit leg failed: ${errorMessage(error)}`);
      throw error;
    }
    this.legs.set(takeProfit.orderId, { pairId: id, leg: "TAKE_PROFIT" });
    this.ledger.updateOco(id, (pair) => {
      pair.takeProfitOrderId = takeProfit.orderId;
    });

    let stopLoss: Order;
    try {
      stopLoss = await this.orders.submit(this.stopLossSpec(id, spec));
    } catch (error) {
      await this.cancelLeg(id, takeProfit.orderId);
      this.abort(id, `stop-loss leg failed: ${errorMessage(error)}`);
      throw error;
    }
    this.legs.set(stopLoss.orderId, { pairId: id, leg: "STOP_LOSS" });

    const active = this.ledger.updateOco(id, (pair) => {
      pair.stopLossOrderId = stopLoss.orderId;
      pair.status = "ACTIVE";
    });
    logEvent("oco_activated", `[OCO] ${id} active: TP ${takeProfit.orderId} @ ${spec.takeProfitPrice}, SL ${stopLoss.orderId} @ ${spec.stopLossPrice}`, {
      strategyId: id,
      symbol: spec.symbol,
      takeProfitOrderId: takeProfit.orderId,
      stopLossOrderId: stopLoss.orderId,
    });

    // Either leg may have settled while the other was being placed
    for (const orderId of [takeProfit.orderId, stopLoss.orderId]) {
      const leg = this.ledger.getOrder(orderId);
      if (leg) this.handleLegUpdate(leg);
    }

    return this.ledger.getOco(id) ?? active;
  }

  /**
   * Cancel both legs. Only ACTIVE pairs can be cancelled.
   */
  async cancel(pairId: string): Promise<OcoPair> {
    const pair = this.status(pairId);
    if (pair.status !== "ACTIVE") {
      throw new StateError(`OCO ${pairId} is ${pair.status}, only ACTIVE pairs can be cancelled`);
    }

    this.ledger.updateOco(pairId, (p) => {
      p.status = "CANCELLED";
    });

    for (const orderId of [pair.takeProfitOrderId, pair.stopLossOrderId]) {
      if (orderId) await this.cancelLeg(pairId, orderId);
    }

    logEvent("strategy_finished", `[OCO] ${pairId} cancelled`, { strategyId: pairId, status: "CANCELLED" });
    return this.status(pairId);
  }

  status(pairId: string): OcoPair {
    const pair = this.ledger.getOco(pairId);
    if (!pair) {
      throw new StateError(`Unknown OCO ${pairId}`);
    }
    return pair;
  }

  list(): OcoPair[] {
    return this.ledger.listOcos();
  }

  /** Stop listening to the Ledger */
  dispose(): void {
    this.ledger.off("order:updated", this.onOrderUpdated);
  }

  // ============================================
  // LEG TRACKING
  // ============================================

  private handleLegUpdate(order: Order): void {
    const ref = this.legs.get(order.orderId);
    if (!ref) return;

    const pair = this.ledger.getOco(ref.pairId);
    if (!pair) return;

    if (pair.status !== "ACTIVE") {
      if (order.status === "FILLED" && pair.filledLeg !== ref.leg && pair.status !== "CREATED") {
        logEvent("oco_race_detected", `[OCO] ${pair.id} ${ref.leg} filled after the pair was ${pair.status}`, {
          strategyId: pair.id,
          orderId: order.orderId,
          winner: pair.filledLeg ?? null,
        }, "warn");
      }
      return;
    }

    if (order.status === "FILLED") {
      this.complete(pair, ref.leg);
      return;
    }

    if (isTerminalStatus(order.status)) {
      const siblingId = ref.leg === "TAKE_PROFIT" ? pair.stopLossOrderId : pair.takeProfitOrderId;
      const sibling = siblingId ? this.ledger.getOrder(siblingId) : undefined;
      if (sibling && isTerminalStatus(sibling.status) && sibling.status !== "FILLED") {
        this.ledger.updateOco(pair.id, (p) => {
          p.status = "CANCELLED";
        });
        logEvent("strategy_finished", `[OCO] ${pair.id} both legs closed without a fill`, {
          strategyId: pair.id,
          status: "CANCELLED",
        });
      }
    }
  }

  /**
   * First observed fill wins. The status flips to COMPLETED before the
   * cancel goes out, so a second fill can never resolve the pair again.
   */
  private complete(pair: OcoPair, leg: OcoLeg): void {
    this.ledger.updateOco(pair.id, (p) => {
      p.status = "COMPLETED";
      p.filledLeg = leg;
    });
    logEvent("strategy_finished", `[OCO] ${pair.id} ${leg} filled`, {
      strategyId: pair.id,
      status: "COMPLETED",
      filledLeg: leg,
    });

    const siblingId = leg === "TAKE_PROFIT" ? pair.stopLossOrderId : pair.takeProfitOrderId;
    if (!siblingId) return;

    this.cancelLeg(pair.id, siblingId)
      .then((cancelled) => {
        if (cancelled) {
          logEvent("oco_sibling_cancelled", `[OCO] ${pair.id} sibling ${siblingId} cancelled`, {
            strategyId: pair.id,
            orderId: siblingId,
          });
        }
      })
      .catch((error) => {
        logger.error(`[OCO] ${pair.id} sibling handling failed: ${errorMessage(error)}`);
      });
  }

  /**
   * Best-effort cancel of one leg: failures are logged, never retried.
   * Returns whether a cancel was accepted.
   */
  private async cancelLeg(pairId: string, orderId: string): Promise<boolean> {
    const order = this.ledger.getOrder(orderId);
    if (!order || isTerminalStatus(order.status)) return false;

    try {
      await this.orders.cancel(orderId);
      return true;
    } catch (error) {
      logEvent("cancel_failed", `[OCO] ${pairId} could not cancel ${orderId}: ${errorMessage(error)}`, {
        strategyId: pairId,
        orderId,
        symbol: order.symbol,
      }, "warn");
      return false;
    }
  }

  private abort(pairId: string, reason: string): void {
    this.ledger.updateOco(pairId, (pair) => {
      pair.status = "CANCELLED";
    });
    logger.warn(`[OCO] ${pairId} aborted: ${reason}`, { strategyId: pairId });
  }

  private takeProfitSpec(pairId: string, spec: OcoSpec): OrderSpec {
    return {
      symbol: spec.symbol,
      side: oppositeSide(spec.side),
      quantity: spec.quantity,
      params: { kind: "LIMIT", price: spec.takeProfitPrice, timeInForce: "GTC" },
      strategyId: pairId,
    };
  }

  private stopLossSpec(pairId: string, spec: OcoSpec): OrderSpec {
    return {
      symbol: spec.symbol,
      side: oppositeSide(spec.side),
      quantity: spec.quantity,
      params: {
        kind: "STOP_LIMIT",
        stopPrice: spec.stopLossPrice,
        price: spec.stopLossLimitPrice,
        timeInForce: "GTC",
        workingType: "CONTRACT_PRICE",
      },
      strategyId: pairId,
    };
  }

  private generateId(): string {
    this.pairCounter++;
    return `OCO-${Date.now()}-${this.pairCounter}`;
  }
}
