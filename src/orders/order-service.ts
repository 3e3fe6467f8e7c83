/**
 * ORDER SERVICE
 * =============
 * The single path every order takes, standalone or strategy child:
 * validate → log `order_submitted` → gateway → Ledger → log result.
 *
 * A gateway rejection is recorded as a REJECTED order under a local id
 * and rethrown. A transient failure records nothing and is rethrown.
 */

import { GatewayRejectedError, StateError, errorMessage } from "../errors";
import { OrderLedger } from "../ledger";
import { ExchangeGateway, Order, OrderSpec, SubmitResult, isTerminalStatus } from "../types";
import { logEvent, logger } from "../utils/logger";
import { AmendInput, OrderValidator } from "../validation";
import { LimitOrder, MarketOrder, OrderSubmitter, StopLimitOrder } from "./order-types";

export class OrderService implements OrderSubmitter {
  readonly market: MarketOrder;
  readonly limit: LimitOrder;
  readonly stopLimit: StopLimitOrder;

  private rejectedCounter = 0;

  constructor(
    private readonly gateway: ExchangeGateway,
    private readonly ledger: OrderLedger,
    readonly validator: OrderValidator,
  ) {
    this.market = new MarketOrder(validator, this);
    this.limit = new LimitOrder(validator, this);
    this.stopLimit = new StopLimitOrder(validator, this);
  }

  /**
   * Submit an already validated spec and record the result
   */
  async submit(spec: OrderSpec): Promise<Order> {
    logEvent("order_submitted", `[ORDER] ${describe(spec)}`, {
      symbol: spec.symbol,
      side: spec.side,
      quantity: spec.quantity,
      kind: spec.params.kind,
      ...(spec.strategyId ? { strategyId: spec.strategyId } : {}),
    });

    let result: SubmitResult;
    try {
      result = await this.gateway.submitOrder(spec);
    } catch (error) {
      if (error instanceof GatewayRejectedError) {
        const rejected = this.recordRejected(spec, error);
        logEvent("order_rejected", `[ORDER] ${rejected.orderId} rejected: ${error.message}`, {
          orderId: rejected.orderId,
          symbol: spec.symbol,
          exchangeCode: error.exchangeCode,
          ...(spec.strategyId ? { strategyId: spec.strategyId } : {}),
        }, "warn");
      } else {
        logger.error(`[ORDER] ${spec.symbol} ${spec.side} ${spec.quantity} not sent: ${errorMessage(error)}`, {
          symbol: spec.symbol,
          ...(spec.strategyId ? { strategyId: spec.strategyId } : {}),
        });
      }
      throw error;
    }

    const now = new Date();
    const order = this.ledger.recordOrder({
      ...spec,
      orderId: result.orderId,
      status: result.status,
      filledQty: result.filledQty,
      avgPrice: result.avgPrice,
      createdAt: now,
      updatedAt: now,
    });

    const fill = order.filledQty > 0 ? ` ${order.filledQty} @ ${order.avgPrice}` : "";
    logger.info(`[ORDER] ${order.orderId} ${order.status}${fill}`, {
      orderId: order.orderId,
      symbol: order.symbol,
      status: order.status,
    });
    return order;
  }

  /**
   * Cancel an open order. StateError for unknown or terminal orders.
   */
  async cancel(orderId: string): Promise<Order> {
    const order = this.requireOrder(orderId);
    if (isTerminalStatus(order.status)) {
      throw new StateError(`Order ${orderId} is already ${order.status}`);
    }

    const result = await this.gateway.cancelOrder(order.symbol, orderId);
    const updated = this.ledger.applyUpdate(orderId, {
      status: result.status,
      filledQty: order.filledQty,
      avgPrice: order.avgPrice,
    });
    logger.info(`[ORDER] ${orderId} cancel -> ${result.status}`, { orderId, symbol: order.symbol });
    return updated ?? order;
  }

  /**
   * Cancel-and-replace a resting LIMIT order. The replacement is
   * validated before the original is cancelled. Returns the new order.
   */
  async amend(orderId: string, changes: AmendInput): Promise<Order> {
    const order = this.requireOrder(orderId);
    if (isTerminalStatus(order.status)) {
      throw new StateError(`Order ${orderId} is already ${order.status}`);
    }
    if (order.params.kind !== "LIMIT") {
      throw new StateError(`Order ${orderId} is ${order.params.kind}, only LIMIT orders can be amended`);
    }
    const spec = this.validator.validateAmend(order, order.params, changes);

    const cancelled = await this.cancel(orderId);
    if (cancelled.status !== "CANCELED") {
      throw new StateError(`Order ${orderId} is ${cancelled.status}, not replaced`);
    }

    const replacement = await this.submit(spec);
    logEvent("order_amended", `[ORDER] ${orderId} replaced by ${replacement.orderId}`, {
      orderId,
      replacementId: replacement.orderId,
      symbol: spec.symbol,
      quantity: spec.quantity,
      ...(spec.params.kind === "LIMIT" ? { price: spec.params.price } : {}),
    });
    return replacement;
  }

  /**
   * Re-query the gateway and feed the answer into the Ledger
   */
  async refresh(orderId: string): Promise<Order> {
    const order = this.requireOrder(orderId);
    const update = await this.gateway.queryOrder(order.symbol, orderId);
    return this.ledger.applyUpdate(orderId, update) ?? order;
  }

  status(orderId: string): Order {
    return this.requireOrder(orderId);
  }

  private requireOrder(orderId: string): Order {
    const order = this.ledger.getOrder(orderId);
    if (!order) {
      throw new StateError(`Unknown order ${orderId}`);
    }
    return order;
  }

  private recordRejected(spec: OrderSpec, error: GatewayRejectedError): Order {
    this.rejectedCounter++;
    const now = new Date();
    return this.ledger.recordOrder({
      ...spec,
      orderId: `REJ-${now.getTime()}-${this.rejectedCounter}`,
      status: "REJECTED",
      filledQty: 0,
      avgPrice: 0,
      createdAt: now,
      updatedAt: now,
      error: error.message,
    });
  }
}

function describe(spec: OrderSpec): string {
  const params = spec.params;
  const base = `${spec.side} ${spec.quantity} ${spec.symbol} ${params.kind}`;
  switch (params.kind) {
    case "MARKET":
      return base;
    case "LIMIT":
      return `${base} @ ${params.price} ${params.timeInForce}`;
    case "STOP_LIMIT":
      return `${base} stop ${params.stopPrice} limit ${params.price}`;
  }
}
