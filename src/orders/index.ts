export { OrderService } from "./order-service";
export { OrderType, MarketOrder, LimitOrder, StopLimitOrder } from "./order-types";
export type { OrderSubmitter } from "./order-types";
