/**
 * ORDER VALIDATOR
 * ===============
 * Turns raw user input (CLI strings or API numbers) into normalized,
 * typed order and strategy specs.
 *
 * Nothing reaches a gateway without passing through here first.
 * Every rejection throws ValidationError { field, rule, value } and is
 * logged as a `validation_rejected` event.
 */

import { DEFAULT_ORDER_LIMITS, OrderLimits } from "../config";
import { ValidationError } from "../errors";
import {
  GridDirection,
  GridSpec,
  GridStrategy,
  LimitParams,
  OcoSpec,
  Order,
  OrderSpec,
  Side,
  TimeInForce,
  TwapOrderKind,
  TwapSpec,
  WorkingType,
} from "../types";
import { roundDown, splitQuantity, subtractDecimal } from "../utils/decimal-math";
import { logEvent } from "../utils/logger";

export type NumericInput = number | string;

export interface MarketOrderInput {
  symbol: string;
  side: string;
  quantity: NumericInput;
  strategyId?: string;
}

export interface LimitOrderInput extends MarketOrderInput {
  price: NumericInput;
  timeInForce?: string;
  postOnly?: boolean;
  reduceOnly?: boolean;
}

export interface StopLimitOrderInput extends MarketOrderInput {
  stopPrice: NumericInput;
  price: NumericInput;
  timeInForce?: string;
  workingType?: string;
}

/** Fields a resting LIMIT order can be amended with */
export interface AmendInput {
  price?: NumericInput;
  /** Defaults to the unfilled quantity */
  quantity?: NumericInput;
}

export interface GridRangeInput {
  lowerPrice?: NumericInput;
  upperPrice?: NumericInput;
}

export interface OcoInput {
  symbol: string;
  side: string;
  quantity: NumericInput;
  takeProfitPrice: NumericInput;
  stopLossPrice: NumericInput;
  /** Defaults to the stop price */
  stopLossLimitPrice?: NumericInput;
}

export interface TwapInput {
  symbol: string;
  side: string;
  quantity: NumericInput;
  splits: NumericInput;
  interval: NumericInput;
  orderKind?: string;
  price?: NumericInput;
}

export interface GridInput {
  symbol: string;
  lowerPrice: NumericInput;
  upperPrice: NumericInput;
  gridCount: NumericInput;
  quantity: NumericInput;
  direction?: string;
  referencePrice?: NumericInput;
}

const SIDES: readonly Side[] = ["BUY", "SELL"];
const TIME_IN_FORCE: readonly TimeInForce[] = ["GTC", "IOC", "FOK"];
const WORKING_TYPES: readonly WorkingType[] = ["CONTRACT_PRICE", "MARK_PRICE"];
const TWAP_KINDS: readonly TwapOrderKind[] = ["MARKET", "LIMIT"];
const GRID_DIRECTIONS: readonly GridDirection[] = ["LONG", "SHORT"];

export const MIN_SPLITS = 2;
export const MAX_SPLITS = 100;
export const MIN_GRIDS = 2;
export const MAX_GRIDS = 100;

export class OrderValidator {
  readonly limits: OrderLimits;
  private symbols: ReadonlySet<string>;

  constructor(limits: Partial<OrderLimits> = {}) {
    this.limits = { ...DEFAULT_ORDER_LIMITS, ...limits };
    this.symbols = new Set(this.limits.symbols);
  }

  // ============================================
  // FIELD RULES
  // ============================================

  validateSymbol(value: unknown): string {
    if (typeof value !== "string" || value.trim() === "") {
      this.reject("symbol", "required", value, "Symbol is required");
    }
    const symbol = value.trim().toUpperCase();
    if (!this.symbols.has(symbol)) {
      this.reject("symbol", "supported", value, `Unsupported symbol '${symbol}'`);
    }
    return symbol;
  }

  validateSide(value: unknown): Side {
    return this.oneOf("side", value, SIDES);
  }

  validateQuantity(value: unknown, field = "quantity"): number {
    const quantity = this.toNumber(value, field);
    const { minQuantity, maxQuantity } = this.limits;
    if (quantity < minQuantity || quantity > maxQuantity) {
      this.reject(field, "range", value, `${field} must be between ${minQuantity} and ${maxQuantity}, got ${quantity}`);
    }
    return quantity;
  }

  validatePrice(value: unknown, field = "price"): number {
    const price = this.toNumber(value, field);
    const { minPrice, maxPrice } = this.limits;
    if (price < minPrice || price > maxPrice) {
      this.reject(field, "range", value, `${field} must be between ${minPrice} and ${maxPrice}, got ${price}`);
    }
    return price;
  }

  validateTimeInForce(value: unknown = "GTC"): TimeInForce {
    return this.oneOf("timeInForce", value, TIME_IN_FORCE);
  }

  validateWorkingType(value: unknown = "CONTRACT_PRICE"): WorkingType {
    return this.oneOf("workingType", value, WORKING_TYPES);
  }

  // ============================================
  // ORDERS
  // ============================================

  validateMarketOrder(input: MarketOrderInput): OrderSpec {
    return {
      symbol: this.validateSymbol(input.symbol),
      side: this.validateSide(input.side),
      quantity: this.validateQuantity(input.quantity),
      params: { kind: "MARKET" },
      ...(input.strategyId ? { strategyId: input.strategyId } : {}),
    };
  }

  validateLimitOrder(input: LimitOrderInput): OrderSpec {
    return {
      symbol: this.validateSymbol(input.symbol),
      side: this.validateSide(input.side),
      quantity: this.validateQuantity(input.quantity),
      params: {
        kind: "LIMIT",
        price: this.validatePrice(input.price),
        timeInForce: this.validateTimeInForce(input.timeInForce),
        ...(input.postOnly ? { postOnly: true } : {}),
        ...(input.reduceOnly ? { reduceOnly: true } : {}),
      },
      ...(input.strategyId ? { strategyId: input.strategyId } : {}),
    };
  }

  /**
   * Replacement for a resting LIMIT order. Side, time in force, flags and
   * strategy carry over from the original.
   */
  validateAmend(order: Order, params: LimitParams, changes: AmendInput): OrderSpec {
    if (changes.price === undefined && changes.quantity === undefined) {
      this.reject("price", "amend_change", changes, "Amend needs a new price, quantity or both");
    }
    return this.validateLimitOrder({
      symbol: order.symbol,
      side: order.side,
      quantity: changes.quantity ?? subtractDecimal(order.quantity, order.filledQty),
      price: changes.price ?? params.price,
      timeInForce: params.timeInForce,
      postOnly: params.postOnly,
      reduceOnly: params.reduceOnly,
      strategyId: order.strategyId,
    });
  }

  /**
   * BUY: stop below limit. SELL: stop above limit.
   */
  validateStopLimitOrder(input: StopLimitOrderInput): OrderSpec {
    const symbol = this.validateSymbol(input.symbol);
    const side = this.validateSide(input.side);
    const quantity = this.validateQuantity(input.quantity);
    const stopPrice = this.validatePrice(input.stopPrice, "stopPrice");
    const price = this.validatePrice(input.price);

    if (side === "BUY" && !(stopPrice < price)) {
      this.reject("stopPrice", "buy_stop_below_limit", input.stopPrice,
        `BUY stop-limit needs stop < limit (stop ${stopPrice}, limit ${price})`);
    }
    if (side === "SELL" && !(stopPrice > price)) {
      this.reject("stopPrice", "sell_stop_above_limit", input.stopPrice,
        `SELL stop-limit needs stop > limit (stop ${stopPrice}, limit ${price})`);
    }

    return {
      symbol,
      side,
      quantity,
      params: {
        kind: "STOP_LIMIT",
        stopPrice,
        price,
        timeInForce: this.validateTimeInForce(input.timeInForce),
        workingType: this.validateWorkingType(input.workingType),
      },
      ...(input.strategyId ? { strategyId: input.strategyId } : {}),
    };
  }

  // ============================================
  // STRATEGIES
  // ============================================

  /**
   * `side` is the protected position. BUY (long): take-profit above the stop.
   * SELL (short): take-profit below the stop.
   */
  validateOco(input: OcoInput): OcoSpec {
    const symbol = this.validateSymbol(input.symbol);
    const side = this.validateSide(input.side);
    const quantity = this.validateQuantity(input.quantity);
    const takeProfitPrice = this.validatePrice(input.takeProfitPrice, "takeProfitPrice");
    const stopLossPrice = this.validatePrice(input.stopLossPrice, "stopLossPrice");

    if (side === "BUY" && !(takeProfitPrice > stopLossPrice)) {
      this.reject("takeProfitPrice", "buy_tp_above_sl", input.takeProfitPrice,
        `BUY OCO needs take-profit > stop-loss (tp ${takeProfitPrice}, sl ${stopLossPrice})`);
    }
    if (side === "SELL" && !(takeProfitPrice < stopLossPrice)) {
      this.reject("takeProfitPrice", "sell_tp_below_sl", input.takeProfitPrice,
        `SELL OCO needs take-profit < stop-loss (tp ${takeProfitPrice}, sl ${stopLossPrice})`);
    }

    let stopLossLimitPrice = stopLossPrice;
    if (input.stopLossLimitPrice !== undefined) {
      stopLossLimitPrice = this.validatePrice(input.stopLossLimitPrice, "stopLossLimitPrice");
      // The stop-loss leg closes the position, so it trades on the opposite side
      if (side === "BUY" && stopLossLimitPrice > stopLossPrice) {
        this.reject("stopLossLimitPrice", "sell_limit_not_above_stop", input.stopLossLimitPrice,
          `Stop-loss limit ${stopLossLimitPrice} must not be above the stop ${stopLossPrice}`);
      }
      if (side === "SELL" && stopLossLimitPrice < stopLossPrice) {
        this.reject("stopLossLimitPrice", "buy_limit_not_below_stop", input.stopLossLimitPrice,
          `Stop-loss limit ${stopLossLimitPrice} must not be below the stop ${stopLossPrice}`);
      }
    }

    return { symbol, side, quantity, takeProfitPrice, stopLossPrice, stopLossLimitPrice };
  }

  validateTwap(input: TwapInput): TwapSpec {
    const symbol = this.validateSymbol(input.symbol);
    const side = this.validateSide(input.side);
    const totalQuantity = this.validateQuantity(input.quantity);
    const splits = this.validateInteger(input.splits, "splits", MIN_SPLITS, MAX_SPLITS);
    const interval = this.validateInteger(input.interval, "interval", 1, Number.MAX_SAFE_INTEGER);
    const orderKind = this.oneOf("orderKind", input.orderKind ?? "MARKET", TWAP_KINDS);

    let price: number | undefined;
    if (orderKind === "LIMIT") {
      if (input.price === undefined) {
        this.reject("price", "required_for_limit", input.price, "LIMIT TWAP needs a price");
      }
      price = this.validatePrice(input.price);
    }

    const sliceQuantities = splitQuantity(totalQuantity, splits, this.limits.quantityPrecision);
    const smallest = Math.min(...sliceQuantities);
    if (smallest < this.limits.minQuantity) {
      this.reject("quantity", "slice_min_quantity", input.quantity,
        `Slice quantity ${smallest} is below the minimum ${this.limits.minQuantity} (${totalQuantity} / ${splits})`);
    }

    return {
      symbol,
      side,
      totalQuantity,
      splits,
      interval,
      orderKind,
      ...(price !== undefined ? { price } : {}),
      sliceQuantities,
    };
  }

  validateGrid(input: GridInput): GridSpec {
    const symbol = this.validateSymbol(input.symbol);
    const lowerPrice = this.validatePrice(input.lowerPrice, "lowerPrice");
    const upperPrice = this.validatePrice(input.upperPrice, "upperPrice");
    if (!(lowerPrice < upperPrice)) {
      this.reject("lowerPrice", "lower_below_upper", input.lowerPrice,
        `Lower price ${lowerPrice} must be below upper price ${upperPrice}`);
    }
    const gridCount = this.validateInteger(input.gridCount, "gridCount", MIN_GRIDS, MAX_GRIDS);
    const totalQuantity = this.validateQuantity(input.quantity);
    const direction = this.oneOf("direction", input.direction ?? "LONG", GRID_DIRECTIONS);

    const quantityPerLevel = roundDown(totalQuantity / gridCount, this.limits.quantityPrecision);
    if (quantityPerLevel < this.limits.minQuantity) {
      this.reject("quantity", "level_min_quantity", input.quantity,
        `Quantity per level ${quantityPerLevel} is below the minimum ${this.limits.minQuantity}`);
    }

    return {
      symbol,
      direction,
      lowerPrice,
      upperPrice,
      gridCount,
      totalQuantity,
      quantityPerLevel,
      ...(input.referencePrice !== undefined
        ? { referencePrice: this.validatePrice(input.referencePrice, "referencePrice") }
        : {}),
    };
  }

  /** New bounds for a running grid; count, quantity and direction stay */
  validateGridRange(grid: GridStrategy, changes: GridRangeInput): GridSpec {
    if (changes.lowerPrice === undefined && changes.upperPrice === undefined) {
      this.reject("lowerPrice", "range_change", changes, "Grid update needs a new lower price, upper price or both");
    }
    return this.validateGrid({
      symbol: grid.symbol,
      direction: grid.direction,
      lowerPrice: changes.lowerPrice ?? grid.lowerPrice,
      upperPrice: changes.upperPrice ?? grid.upperPrice,
      gridCount: grid.gridCount,
      quantity: grid.totalQuantity,
    });
  }

  // ============================================
  // HELPERS
  // ============================================

  private toNumber(value: unknown, field: string): number {
    const parsed =
      typeof value === "number" ? value
        : typeof value === "string" && value.trim() !== "" ? Number(value)
          : NaN;
    if (!Number.isFinite(parsed)) {
      this.reject(field, "numeric", value, `${field} must be a finite number, got '${String(value)}'`);
    }
    return parsed;
  }

  private validateInteger(value: unknown, field: string, min: number, max: number): number {
    const parsed = this.toNumber(value, field);
    if (!Number.isInteger(parsed)) {
      this.reject(field, "integer", value, `${field} must be an integer, got ${parsed}`);
    }
    if (parsed < min || parsed > max) {
      const bounds = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `between ${min} and ${max}`;
      this.reject(field, "range", value, `${field} must be ${bounds}, got ${parsed}`);
    }
    return parsed;
  }

  private oneOf<T extends string>(field: string, value: unknown, allowed: readonly T[]): T {
    const normalized = typeof value === "string" ? value.trim().toUpperCase() : "";
    const match = allowed.find((candidate) => candidate === normalized);
    if (match === undefined) {
      this.reject(field, "enum", value, `${field} must be one of ${allowed.join("|")}, got '${String(value)}'`);
    }
    return match;
  }

  private reject(field: string, rule: string, value: unknown, message: string): never {
    logEvent("validation_rejected", `[VALIDATION] ${message}`, { field, rule, value }, "warn");
    throw new ValidationError(field, rule, value, message);
  }
}
