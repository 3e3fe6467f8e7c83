/**
 * CORE ORDER TYPES
 * ================
 * MARKET, LIMIT and STOP_LIMIT builders. Each one validates raw input
 * into an OrderSpec and hands it to the shared submission path.
 */

import { Order, OrderKind, OrderSpec } from "../types";
import {
  LimitOrderInput,
  MarketOrderInput,
  OrderValidator,
  StopLimitOrderInput,
} from "../validation";

/**
 * Where validated specs go (OrderService)
 */
export interface OrderSubmitter {
  submit(spec: OrderSpec): Promise<Order>;
}

export abstract class OrderType<TInput> {
  abstract readonly kind: OrderKind;

  constructor(
    protected readonly validator: OrderValidator,
    protected readonly submitter: OrderSubmitter,
  ) {}

  /** Validate and normalize; throws ValidationError */
  abstract build(input: TInput): OrderSpec;

  /**
   * Validate, submit, record. Nothing is sent when validation fails.
   */
  async place(input: TInput): Promise<Order> {
    const spec = this.build(input);
    return this.submitter.submit(spec);
  }
}

export class MarketOrder extends OrderType<MarketOrderInput> {
  readonly kind = "MARKET" as const;

  build(input: MarketOrderInput): OrderSpec {
    return this.validator.validateMarketOrder(input);
  }
}

export class LimitOrder extends OrderType<LimitOrderInput> {
  readonly kind = "LIMIT" as const;

  build(input: LimitOrderInput): OrderSpec {
    return this.validator.validateLimitOrder(input);
  }
}

export class StopLimitOrder extends OrderType<StopLimitOrderInput> {
  readonly kind = "STOP_LIMIT" as const;

  build(input: StopLimitOrderInput): OrderSpec {
    return this.validator.validateStopLimitOrder(input);
  }
}
