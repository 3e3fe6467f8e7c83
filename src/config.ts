/**
 * Global Configuration
 */

import * as dotenv from "dotenv";
import { TradingMode } from "./types";
import { configureLogger, logger } from "./utils/logger";

export const API_CONFIG = {
  keepAliveTimeout: 30_000,      // Keep idle connections alive for 30s
  keepAliveMaxTimeout: 60_000,   // Max keep-alive duration
  connections: 10,               // Max concurrent connections per origin
  pipelining: 1,                 // HTTP pipelining (1 = disabled, safe default)
};

export const API_URLS = {
  futures: "https://fapi.binance.com",
  futuresTestnet: "https://testnet.binancefuture.com",
};

/** USDT-M pairs accepted by the validator */
export const SUPPORTED_SYMBOLS: readonly string[] = [
  "BTCUSDT", "ETHUSDT", "BNBUSDT", "ADAUSDT", "DOGEUSDT",
  "XRPUSDT", "MATICUSDT", "SOLUSDT", "LTCUSDT", "LINKUSDT",
  "AVAXUSDT", "ATOMUSDT", "ARBUSDT", "UNIUSDT", "APTUSDT",
  "GALAUSDT", "OPUSDT", "GMXUSDT", "RDNTUSDT", "PEPEUSDT",
];

/** Simulator reference prices; other symbols start at DEFAULT_SIMULATED_PRICE */
export const SIMULATED_PRICES: Readonly<Record<string, number>> = {
  BTCUSDT: 42500.5,
  ETHUSDT: 2350.25,
  BNBUSDT: 615.8,
  ADAUSDT: 0.98,
  DOGEUSDT: 0.38,
};

export const DEFAULT_SIMULATED_PRICE = 100;

export interface OrderLimits {
  minQuantity: number;
  maxQuantity: number;
  minPrice: number;
  maxPrice: number;
  /** Decimal places quantities are rounded down to when split */
  quantityPrecision: number;
  symbols: readonly string[];
}

export const DEFAULT_ORDER_LIMITS: OrderLimits = {
  minQuantity: 0.001,
  maxQuantity: 1_000_000,
  minPrice: 0.00001,
  maxPrice: 999_999,
  quantityPrecision: 3,
  symbols: SUPPORTED_SYMBOLS,
};

export interface EngineConfig {
  mode: TradingMode;
  limits: OrderLimits;
  /** Milliseconds in one TWAP interval unit (1000 = seconds) */
  intervalUnitMs: number;
  /** Consecutive failed TWAP slices before the strategy is FAILED */
  maxConsecutiveSliceFailures: number;
  /** How often open orders are re-queried from the gateway */
  statusPollIntervalMs: number;
  simulator: {
    slippageBps: number;
  };
  live: {
    baseUrl: string;
    apiKey: string;
    apiSecret: string;
    recvWindow: number;
    /** Minimum gap between REST calls */
    requestIntervalMs: number;
    maxRetries: number;
  };
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  mode: "sim",
  limits: DEFAULT_ORDER_LIMITS,
  intervalUnitMs: 1000,
  maxConsecutiveSliceFailures: 3,
  statusPollIntervalMs: 2000,
  simulator: {
    slippageBps: 0,
  },
  live: {
    baseUrl: API_URLS.futures,
    apiKey: "",
    apiSecret: "",
    recvWindow: 5000,
    requestIntervalMs: 50,
    maxRetries: 3,
  },
};

type Env = Record<string, string | undefined>;

/**
 * Load .env into process.env (no-op when the file is missing)
 */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : undefined);
  configureLogger();
}

/**
 * Build the engine configuration from environment variables.
 * Unparseable numbers fall back to the defaults with a warning.
 * BINANCE_TESTNET=true points the live gateway at the testnet unless
 * BINANCE_BASE_URL is set.
 */
export function loadConfig(env: Env = process.env): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  const symbols = env.SUPPORTED_SYMBOLS
    ? env.SUPPORTED_SYMBOLS.split(",").map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0)
    : defaults.limits.symbols;

  return {
    mode: parseMode(env.TRADING_MODE),
    limits: {
      minQuantity: readNumber(env, "MIN_QUANTITY", defaults.limits.minQuantity),
      maxQuantity: readNumber(env, "MAX_QUANTITY", defaults.limits.maxQuantity),
      minPrice: readNumber(env, "MIN_PRICE", defaults.limits.minPrice),
      maxPrice: readNumber(env, "MAX_PRICE", defaults.limits.maxPrice),
      quantityPrecision: readInteger(env, "QUANTITY_PRECISION", defaults.limits.quantityPrecision, 0),
      symbols,
    },
    intervalUnitMs: readNumber(env, "TWAP_INTERVAL_UNIT_MS", defaults.intervalUnitMs),
    maxConsecutiveSliceFailures: readInteger(
      env,
      "MAX_CONSECUTIVE_SLICE_FAILURES",
      defaults.maxConsecutiveSliceFailures,
      1,
    ),
    statusPollIntervalMs: readNumber(env, "STATUS_POLL_INTERVAL_MS", defaults.statusPollIntervalMs),
    simulator: {
      slippageBps: readNumber(env, "SIM_SLIPPAGE_BPS", defaults.simulator.slippageBps),
    },
    live: {
      baseUrl: env.BINANCE_BASE_URL || (env.BINANCE_TESTNET === "true" ? API_URLS.futuresTestnet : defaults.live.baseUrl),
      apiKey: env.BINANCE_API_KEY || "",
      apiSecret: env.BINANCE_API_SECRET || "",
      recvWindow: readInteger(env, "BINANCE_RECV_WINDOW", defaults.live.recvWindow, 1),
      requestIntervalMs: readNumber(env, "REQUEST_INTERVAL_MS", defaults.live.requestIntervalMs),
      maxRetries: readInteger(env, "MAX_API_RETRIES", defaults.live.maxRetries, 0),
    },
  };
}

export function parseMode(value: string | undefined): TradingMode {
  const mode = value?.trim().toLowerCase();
  if (!mode) return "sim";
  if (mode === "live") return "live";
  if (mode !== "sim") {
    logger.warn(`Invalid TRADING_MODE '${value}', defaulting to 'sim'`);
  }
  return "sim";
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn(`Invalid ${key} '${raw}', using ${fallback}`);
    return fallback;
  }
  return value;
}

/** Whole numbers no smaller than `min` */
function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < min) {
    logger.warn(`Invalid ${key} '${env[key]}', using ${fallback}`);
    return fallback;
  }
  return value;
}
