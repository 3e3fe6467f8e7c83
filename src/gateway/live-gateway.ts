/**
 * LIVE GATEWAY
 * ============
 * Places real orders on Binance USDT-M futures over REST.
 *
 * - Keep-alive undici dispatcher (injectable, tests pass a MockAgent)
 * - HMAC-SHA256 signed requests (X-MBX-APIKEY header + signature param)
 * - Client-side rate limiter and circuit breaker around every call
 * - Retries only for reads (queryOrder, getPrice, isReady); a submit
 *   or cancel is never sent twice
 *
 * HTTP 4xx with an exchange error body → GatewayRejectedError.
 * Network errors, 418/429 and 5xx → GatewayTransientError.
 * The API key, secret and signed query string are never logged.
 */

import { createHmac } from "node:crypto";
import Decimal from "decimal.js";
import { Agent, Dispatcher, fetch as undiciFetch } from "undici";
import { API_CONFIG, API_URLS } from "../config";
import { GatewayRejectedError, GatewayTransientError, errorMessage } from "../errors";
import {
  CancelResult,
  ExchangeGateway,
  OrderSpec,
  OrderStatus,
  OrderUpdate,
  SubmitResult,
  TradingMode,
} from "../types";
import { CircuitBreaker, withRetry } from "../utils/retry";
import { RateLimiter } from "../utils/rate-limiter";
import { logger } from "../utils/logger";

/** Keep-alive dispatcher shared by every live gateway in the process */
const exchangeDispatcher = new Agent({
  keepAliveTimeout: API_CONFIG.keepAliveTimeout,
  keepAliveMaxTimeout: API_CONFIG.keepAliveMaxTimeout,
  connections: API_CONFIG.connections,
  pipelining: API_CONFIG.pipelining,
});

export interface LiveGatewayConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
  /** Milliseconds the exchange accepts a signed request for */
  recvWindow: number;
  /** Minimum gap between REST calls */
  requestIntervalMs: number;
  /** Retries for reads on transient failures */
  maxRetries: number;
  /** First retry delay, doubled each attempt */
  retryDelayMs: number;
}

const DEFAULT_CONFIG: Omit<LiveGatewayConfig, "apiKey" | "apiSecret"> = {
  baseUrl: API_URLS.futures,
  recvWindow: 5000,
  requestIntervalMs: 50,
  maxRetries: 3,
  retryDelayMs: 500,
};

type HttpMethod = "GET" | "POST" | "DELETE";

type Params = Record<string, string>;

const ORDER_STATUSES: readonly OrderStatus[] = [
  "NEW",
  "PARTIALLY_FILLED",
  "FILLED",
  "CANCELED",
  "REJECTED",
  "EXPIRED",
];

/**
 * HMAC-SHA256 hex digest of the query string, as the exchange expects it
 */
export function signQuery(query: string, secret: string): string {
  return createHmac("sha256", secret).update(query).digest("hex");
}

/**
 * Exchange-side order parameters for a validated spec
 */
export function toExchangeParams(spec: OrderSpec): Params {
  const params: Params = {
    symbol: spec.symbol,
    side: spec.side,
    quantity: formatNumber(spec.quantity),
  };

  const kind = spec.params;
  switch (kind.kind) {
    case "MARKET":
      params.type = "MARKET";
      break;
    case "LIMIT":
      params.type = "LIMIT";
      params.price = formatNumber(kind.price);
      // GTX = good-till-crossing, the exchange's post-only
      params.timeInForce = kind.postOnly ? "GTX" : kind.timeInForce;
      if (kind.reduceOnly) params.reduceOnly = "true";
      break;
    case "STOP_LIMIT":
      params.type = "STOP";
      params.price = formatNumber(kind.price);
      params.stopPrice = formatNumber(kind.stopPrice);
      params.timeInForce = kind.timeInForce;
      params.workingType = kind.workingType;
      break;
  }

  return params;
}

export class LiveGateway implements ExchangeGateway {
  readonly mode: TradingMode = "live";

  private config: LiveGatewayConfig;
  private dispatcher: Dispatcher;
  private timeProvider: () => number;
  private rateLimiter: RateLimiter;
  private circuitBreaker: CircuitBreaker = new CircuitBreaker(5, 30_000);

  constructor(
    config: Pick<LiveGatewayConfig, "apiKey" | "apiSecret"> & Partial<LiveGatewayConfig>,
    dispatcher?: Dispatcher,
    timeProvider: () => number = Date.now,
  ) {
    if (!config.apiKey || !config.apiSecret) {
      throw new Error("Live gateway needs BINANCE_API_KEY and BINANCE_API_SECRET");
    }
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.dispatcher = dispatcher || exchangeDispatcher;
    this.timeProvider = timeProvider;
    this.rateLimiter = new RateLimiter(this.config.requestIntervalMs);
  }

  async submitOrder(spec: OrderSpec): Promise<SubmitResult> {
    const body = await this.signedRequest("POST", "/fapi/v1/order", toExchangeParams(spec));
    return { orderId: readOrderId(body), ...parseOrderUpdate(body) };
  }

  async cancelOrder(symbol: string, orderId: string): Promise<CancelResult> {
    const body = await this.signedRequest("DELETE", "/fapi/v1/order", { symbol, orderId });
    return { status: parseOrderUpdate(body).status };
  }

  async queryOrder(symbol: string, orderId: string): Promise<OrderUpdate> {
    const body = await this.withReadRetry("queryOrder", () =>
      this.signedRequest("GET", "/fapi/v1/order", { symbol, orderId }),
    );
    return parseOrderUpdate(body);
  }

  async getPrice(symbol: string): Promise<number> {
    const body = await this.withReadRetry("getPrice", () =>
      this.request("GET", "/fapi/v1/ticker/price", { symbol }),
    );
    const price = isRecord(body) ? Number(body.price) : NaN;
    if (!Number.isFinite(price) || price <= 0) {
      throw new GatewayTransientError(`Malformed price response for ${symbol}`);
    }
    return price;
  }

  async isReady(): Promise<boolean> {
    try {
      await this.withReadRetry("ping", () => this.request("GET", "/fapi/v1/ping", {}));
      return true;
    } catch (error) {
      logger.warn(`[LIVE] Exchange not reachable: ${errorMessage(error)}`);
      return false;
    }
  }

  getCircuitState(): string {
    return this.circuitBreaker.getState();
  }

  // ============================================
  // HTTP
  // ============================================

  private withReadRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxRetries: this.config.maxRetries,
      initialDelayMs: this.config.retryDelayMs,
      label,
    });
  }

  private signedRequest(method: HttpMethod, path: string, params: Params): Promise<unknown> {
    const query = new URLSearchParams({
      ...params,
      recvWindow: String(this.config.recvWindow),
      timestamp: String(this.timeProvider()),
    }).toString();
    const signature = signQuery(query, this.config.apiSecret);
    return this.send(method, path, `${query}&signature=${signature}`);
  }

  private request(method: HttpMethod, path: string, params: Params): Promise<unknown> {
    return this.send(method, path, new URLSearchParams(params).toString());
  }

  private async send(method: HttpMethod, path: string, query: string): Promise<unknown> {
    if (!this.circuitBreaker.allowRequest()) {
      throw new GatewayTransientError("Circuit breaker open, exchange calls paused");
    }
    await this.rateLimiter.waitForToken();

    const url = query ? `${this.config.baseUrl}${path}?${query}` : `${this.config.baseUrl}${path}`;
    logger.debug(`[LIVE] ${method} ${path}`);

    let status: number;
    let text: string;
    try {
      const res = await undiciFetch(url, {
        method,
        headers: { "X-MBX-APIKEY": this.config.apiKey },
        dispatcher: this.dispatcher,
      });
      status = res.status;
      text = await res.text();
    } catch (error) {
      this.circuitBreaker.recordFailure();
      throw new GatewayTransientError(`Network error on ${method} ${path}: ${errorMessage(error)}`);
    }

    const body = parseJson(text);

    if (status === 418 || status === 429 || status >= 500) {
      this.circuitBreaker.recordFailure();
      throw new GatewayTransientError(`HTTP ${status} on ${method} ${path}: ${exchangeMessage(body) ?? "no body"}`);
    }

    this.circuitBreaker.recordSuccess();

    if (status >= 400) {
      const message = exchangeMessage(body) ?? `HTTP ${status}`;
      const code = isRecord(body) && typeof body.code === "number" ? body.code : undefined;
      throw new GatewayRejectedError(message, code);
    }

    return body;
  }
}

// ============================================
// RESPONSE PARSING
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function exchangeMessage(body: unknown): string | undefined {
  if (isRecord(body) && typeof body.msg === "string") return body.msg;
  if (typeof body === "string" && body.length > 0) return body.slice(0, 200);
  return undefined;
}

function readOrderId(body: unknown): string {
  if (isRecord(body) && (typeof body.orderId === "number" || typeof body.orderId === "string")) {
    return String(body.orderId);
  }
  throw new GatewayTransientError("Order response without orderId");
}

function parseOrderUpdate(body: unknown): OrderUpdate {
  if (!isRecord(body) || typeof body.status !== "string") {
    throw new GatewayTransientError("Malformed order response");
  }
  return {
    status: toOrderStatus(body.status),
    filledQty: Number(body.executedQty ?? 0) || 0,
    avgPrice: Number(body.avgPrice ?? 0) || 0,
  };
}

function toOrderStatus(raw: string): OrderStatus {
  if (raw === "EXPIRED_IN_MATCH") return "EXPIRED";
  const status = ORDER_STATUSES.find((candidate) => candidate === raw);
  if (!status) {
    throw new GatewayTransientError(`Unknown order status '${raw}'`);
  }
  return status;
}

function formatNumber(value: number): string {
  return new Decimal(value).toFixed();
}
