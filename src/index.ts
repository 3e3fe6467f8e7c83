#!/usr/bin/env node
/**
 * FUTURES ORDER ENGINE
 * ====================
 * Main entry point
 *
 * Places and tracks USDT-M futures orders (market, limit, stop-limit)
 * and runs OCO, TWAP and Grid strategies against either the in-process
 * simulator or the live exchange.
 *
 * Flow:
 * 1. Load .env and build the engine config
 * 2. Parse the command line and run one command (or a session)
 * 3. Stop running strategies and exit with 0 / 1
 */

import { runCli } from "./cli";
import { loadDotenv } from "./config";
import { TradingEngine } from "./engine";
import { errorMessage } from "./errors";

async function main(): Promise<void> {
  loadDotenv();

  let shuttingDown = false;

  const onEngine = (engine: TradingEngine): void => {
    // Graceful shutdown: stop TWAP slices and cancel grid orders
    const shutdown = async (): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;

      console.log("");
      console.log("Shutting down...");
      try {
        await engine.shutdown();
      } catch (error) {
        console.error(`Shutdown failed: ${errorMessage(error)}`);
      }

      const history = engine.history();
      const orders = history.filter((entry) => entry.type === "order").length;
      const strategies = history.length - orders;

      console.log("");
      console.log("╔═══════════════════════════════════════════════════════════╗");
      console.log("║                     SESSION SUMMARY                       ║");
      console.log("╠═══════════════════════════════════════════════════════════╣");
      console.log(`║  Mode:              ${engine.mode.toUpperCase().padEnd(38)}║`);
      console.log(`║  Orders:            ${String(orders).padEnd(38)}║`);
      console.log(`║  Strategies:        ${String(strategies).padEnd(38)}║`);
      console.log(`║  Open orders:       ${String(engine.ledger.openOrders().length).padEnd(38)}║`);
      console.log("╚═══════════════════════════════════════════════════════════╝");
      console.log("");
      process.exit(130);
    };

    const onSignal = (): void => {
      shutdown().catch((error) => {
        console.error("Fatal error during shutdown:", error);
        process.exit(1);
      });
    };

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  };

  process.exitCode = await runCli(process.argv.slice(2), { onEngine });
}

// Run!
main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
