/**
 * GATEWAY FACTORY
 * ===============
 * Creates the exchange gateway for the configured trading mode.
 *
 * Usage:
 *   const gateway = createGateway(loadConfig());        // mode from TRADING_MODE
 *   const gateway = createGateway(config, { mode: "live" });
 */

import { Dispatcher } from "undici";
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from "../config";
import { ExchangeGateway, TradingMode } from "../types";
import { logger } from "../utils/logger";
import { LiveGateway } from "./live-gateway";
import { SimulatedGateway } from "./simulated-gateway";

export interface GatewayOverrides {
  mode?: TradingMode;
  /** HTTP dispatcher for the live gateway */
  dispatcher?: Dispatcher;
}

export function createGateway(
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  overrides: GatewayOverrides = {},
): ExchangeGateway {
  const mode = overrides.mode ?? config.mode;
  return mode === "live" ? createLiveGateway(config, overrides.dispatcher) : createSimulatedGateway(config);
}

export function createSimulatedGateway(config: EngineConfig = DEFAULT_ENGINE_CONFIG): SimulatedGateway {
  logger.info(`[GATEWAY] SIMULATED mode, no orders leave this process (slippage ${config.simulator.slippageBps} bps)`);
  return new SimulatedGateway({ slippageBps: config.simulator.slippageBps });
}

/**
 * Live gateway. Throws when credentials are missing.
 */
export function createLiveGateway(config: EngineConfig, dispatcher?: Dispatcher): LiveGateway {
  const { apiKey, apiSecret, baseUrl, recvWindow, requestIntervalMs, maxRetries } = config.live;

  if (!apiKey || !apiSecret) {
    logger.error("[GATEWAY] LIVE mode requires BINANCE_API_KEY and BINANCE_API_SECRET in .env");
    throw new Error("Missing exchange credentials for live mode");
  }

  logger.warn(`[GATEWAY] LIVE mode against ${baseUrl}, real orders will be placed`);
  return new LiveGateway({ apiKey, apiSecret, baseUrl, recvWindow, requestIntervalMs, maxRetries }, dispatcher);
}
