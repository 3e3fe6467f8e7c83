/**
 * COMMAND LINE
 * ============
 * Thin command surface over the TradingEngine.
 *
 *   market SYMBOL SIDE QTY
 *   limit SYMBOL SIDE QTY PRICE [--tif GTC] [--post-only] [--reduce-only]
 *   stop-limit SYMBOL SIDE QTY STOP LIMIT [--tif GTC] [--working-type CONTRACT_PRICE]
 *   oco SYMBOL SIDE QTY TP SL [--sl-limit PRICE]
 *   twap SYMBOL SIDE QTY [--splits 5] [--interval 10] [--order-type MARKET] [--price P]
 *   grid SYMBOL LOWER UPPER [--grids 10] [--qty 0.1] [--type LONG] [--duration S]
 *   status ID [--symbol SYMBOL]
 *   history [--type order|oco|twap|grid]
 *   cancel ID
 *   amend ID [--price P] [--qty Q]
 *   grid-update ID [--lower P] [--upper P]
 *   price SYMBOL [PRICE]
 *   session
 *
 * Global: --mode sim|live (default TRADING_MODE, else sim).
 * Exit code 0 on success, 1 on validation, state or gateway failure.
 */

import * as readline from "readline";
import { Command, CommanderError } from "commander";
import { loadConfig, parseMode } from "./config";
import { TradingEngine } from "./engine";
import { EngineError, StateError, errorMessage } from "./errors";
import { SimulatedGateway } from "./gateway";
import { HistoryType } from "./ledger";
import { GridStatus, TwapStatus } from "./strategy";
import { GridStrategy, HistoryEntry, OcoPair, Order, TradingMode } from "./types";
import { sleep } from "./utils/retry";

export interface CliContext {
  /** Engine for this invocation (the session shares one) */
  getEngine(mode?: TradingMode): TradingEngine;
  print(line: string): void;
  /** Inside `session`: strategies keep running after the command returns */
  interactive: boolean;
  /** Starts the interactive prompt; absent inside a session */
  startSession?: (mode?: TradingMode) => Promise<void>;
}

export interface CliOptions {
  print?: (line: string) => void;
  /** Called once the command has created its engine */
  onEngine?: (engine: TradingEngine) => void;
}

const HISTORY_TYPES: readonly HistoryType[] = ["order", "oco", "twap", "grid"];

/**
 * Build the commander program for one invocation
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("futures-engine")
    .description("Order and strategy execution engine for USDT-M futures")
    .version("1.0.0")
    .option("--mode <mode>", "sim or live (default: TRADING_MODE, else sim)")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.print(str.trimEnd()),
      writeErr: (str) => ctx.print(str.trimEnd()),
    });

  const engine = (): TradingEngine => {
    const { mode } = program.opts<{ mode?: string }>();
    return ctx.getEngine(mode ? parseMode(mode) : undefined);
  };

  program
    .command("market")
    .description("Place a market order")
    .argument("<symbol>")
    .argument("<side>", "BUY or SELL")
    .argument("<quantity>")
    .action(async (symbol: string, side: string, quantity: string) => {
      const order = await engine().placeMarket({ symbol, side, quantity });
      printOrder(ctx, order);
    });

  program
    .command("limit")
    .description("Place a limit order")
    .argument("<symbol>")
    .argument("<side>", "BUY or SELL")
    .argument("<quantity>")
    .argument("<price>")
    .option("--tif <tif>", "GTC, IOC or FOK", "GTC")
    .option("--post-only", "maker only", false)
    .option("--reduce-only", "only reduce a position", false)
    .action(async (symbol: string, side: string, quantity: string, price: string,
      options: { tif: string; postOnly: boolean; reduceOnly: boolean }) => {
      const order = await engine().placeLimit({
        symbol,
        side,
        quantity,
        price,
        timeInForce: options.tif,
        postOnly: options.postOnly,
        reduceOnly: options.reduceOnly,
      });
      printOrder(ctx, order);
    });

  program
    .command("stop-limit")
    .description("Place a stop-limit order")
    .argument("<symbol>")
    .argument("<side>", "BUY or SELL")
    .argument("<quantity>")
    .argument("<stop>", "trigger price")
    .argument("<limit>", "limit price once triggered")
    .option("--tif <tif>", "GTC, IOC or FOK", "GTC")
    .option("--working-type <type>", "CONTRACT_PRICE or MARK_PRICE", "CONTRACT_PRICE")
    .action(async (symbol: string, side: string, quantity: string, stop: string, limit: string,
      options: { tif: string; workingType: string }) => {
      const order = await engine().placeStopLimit({
        symbol,
        side,
        quantity,
        stopPrice: stop,
        price: limit,
        timeInForce: options.tif,
        workingType: options.workingType,
      });
      printOrder(ctx, order);
    });

  program
    .command("oco")
    .description("Protect a position with a take-profit and a stop-loss")
    .argument("<symbol>")
    .argument("<side>", "side of the position being protected")
    .argument("<quantity>")
    .argument("<takeProfit>")
    .argument("<stopLoss>")
    .option("--sl-limit <price>", "stop-loss limit price (default: the stop price)")
    .action(async (symbol: string, side: string, quantity: string, takeProfit: string, stopLoss: string,
      options: { slLimit?: string }) => {
      const pair = await engine().createOco({
        symbol,
        side,
        quantity,
        takeProfitPrice: takeProfit,
        stopLossPrice: stopLoss,
        ...(options.slLimit !== undefined ? { stopLossLimitPrice: options.slLimit } : {}),
      });
      printOco(ctx, pair);
    });

  program
    .command("twap")
    .description("Split an order into slices over time")
    .argument("<symbol>")
    .argument("<side>", "BUY or SELL")
    .argument("<quantity>")
    .option("--splits <n>", "number of slices", "5")
    .option("--interval <n>", "time units between slices", "10")
    .option("--order-type <type>", "MARKET or LIMIT", "MARKET")
    .option("--price <price>", "limit price for LIMIT slices")
    .action(async (symbol: string, side: string, quantity: string,
      options: { splits: string; interval: string; orderType: string; price?: string }) => {
      const handle = engine().startTwap(
        {
          symbol,
          side,
          quantity,
          splits: options.splits,
          interval: options.interval,
          orderKind: options.orderType,
          ...(options.price !== undefined ? { price: options.price } : {}),
        },
        { onSliceComplete: (order) => ctx.print(`  slice ${order.orderId} ${order.status} ${order.filledQty} @ ${order.avgPrice}`) },
      );
      ctx.print(`TWAP ${handle.id} started`);

      if (ctx.interactive) return;
      await handle.done;
      printTwap(ctx, handle.status());
    });

  program
    .command("grid")
    .description("Run a grid of limit orders between two prices")
    .argument("<symbol>")
    .argument("<lower>")
    .argument("<upper>")
    .option("--grids <n>", "number of grid intervals", "10")
    .option("--qty <quantity>", "total quantity", "0.1")
    .option("--type <direction>", "LONG or SHORT", "LONG")
    .option("--duration <seconds>", "stop the grid after this many seconds")
    .action(async (symbol: string, lower: string, upper: string,
      options: { grids: string; qty: string; type: string; duration?: string }) => {
      const handle = engine().startGrid({
        symbol,
        lowerPrice: lower,
        upperPrice: upper,
        gridCount: options.grids,
        quantity: options.qty,
        direction: options.type,
      });
      await handle.ready;
      printGrid(ctx, handle.status());

      if (options.duration === undefined) return;
      const seconds = Number(options.duration);
      if (!Number.isFinite(seconds) || seconds < 0) {
        throw new StateError(`Invalid --duration '${options.duration}'`);
      }
      await sleep(seconds * 1000);
      if (handle.status().status === "RUNNING") {
        const result = await handle.stop();
        for (const failure of result.failures) {
          ctx.print(`  cancel failed: level ${failure.levelIndex} ${failure.orderId}: ${failure.error}`);
        }
      }
      printGrid(ctx, handle.status());
    });

  program
    .command("status")
    .description("Show an order, OCO, TWAP or grid")
    .argument("<id>")
    .option("--symbol <symbol>", "ask the exchange when the id is not from this session")
    .action(async (id: string, options: { symbol?: string }) => {
      const report = await engine().status(id, options.symbol);
      switch (report.type) {
        case "order":
          printOrder(ctx, report.record);
          break;
        case "oco":
          printOco(ctx, report.record);
          break;
        case "twap":
          printTwap(ctx, report.record);
          break;
        case "grid":
          printGrid(ctx, report.record);
          break;
        case "remote":
          ctx.print(`${report.orderId} ${report.symbol} ${report.record.status} filled ${report.record.filledQty} @ ${report.record.avgPrice}`);
          break;
      }
    });

  program
    .command("history")
    .description("List everything recorded in this session")
    .option("--type <type>", "order, oco, twap or grid")
    .action((options: { type?: string }) => {
      const type = options.type?.toLowerCase();
      const filter = HISTORY_TYPES.find((candidate) => candidate === type);
      if (type !== undefined && !filter) {
        throw new StateError(`Unknown history type '${options.type}'`);
      }
      const entries = engine().history(filter);
      if (entries.length === 0) {
        ctx.print("(no history)");
        return;
      }
      for (const entry of entries) ctx.print(formatHistoryEntry(entry));
    });

  program
    .command("cancel")
    .description("Cancel an order, OCO, TWAP or grid from this session")
    .argument("<id>")
    .action(async (id: string) => {
      const current = engine();
      if (current.ledger.getOrder(id)) {
        printOrder(ctx, await current.cancelOrder(id));
      } else if (current.ledger.getOco(id)) {
        printOco(ctx, await current.cancelOco(id));
      } else if (current.ledger.getTwap(id)) {
        current.cancelTwap(id);
        printTwap(ctx, current.twap.status(id));
      } else if (current.ledger.getGrid(id)) {
        await current.stopGrid(id);
        printGrid(ctx, current.grid.status(id));
      } else {
        throw new StateError(`Unknown id ${id}`);
      }
    });

  program
    .command("amend")
    .description("Replace a resting limit order at a new price or quantity")
    .argument("<id>")
    .option("--price <price>", "new limit price")
    .option("--qty <quantity>", "new quantity (defaults to what is unfilled)")
    .action(async (id: string, options: { price?: string; qty?: string }) => {
      const order = await engine().amendOrder(id, { price: options.price, quantity: options.qty });
      printOrder(ctx, order);
    });

  program
    .command("grid-update")
    .description("Move a running grid to new bounds")
    .argument("<id>")
    .option("--lower <price>", "new lower price")
    .option("--upper <price>", "new upper price")
    .action(async (id: string, options: { lower?: string; upper?: string }) => {
      const current = engine();
      const result = await current.updateGridRange(id, { lowerPrice: options.lower, upperPrice: options.upper });
      for (const failure of result.failures) {
        ctx.print(`  cancel failed: level ${failure.levelIndex} ${failure.orderId}: ${failure.error}`);
      }
      printGrid(ctx, current.grid.status(id));
    });

  program
    .command("price")
    .description("Show a price; in sim mode a second argument moves it")
    .argument("<symbol>")
    .argument("[price]")
    .action(async (symbol: string, price: string | undefined) => {
      const current = engine();
      const normalized = current.validator.validateSymbol(symbol);
      if (price !== undefined) {
        if (!(current.gateway instanceof SimulatedGateway)) {
          throw new StateError("Prices can only be set in sim mode");
        }
        current.gateway.setPrice(normalized, current.validator.validatePrice(price));
      }
      ctx.print(`${normalized} ${await current.gateway.getPrice(normalized)}`);
    });

  if (ctx.startSession) {
    const startSession = ctx.startSession;
    program
      .command("session")
      .description("Interactive prompt sharing one engine")
      .action(async () => {
        const { mode } = program.opts<{ mode?: string }>();
        await startSession(mode ? parseMode(mode) : undefined);
      });
  }

  return program;
}

/**
 * Run one command line; resolves to the process exit code
 */
export async function runCommand(argv: string[], ctx: CliContext): Promise<number> {
  const program = createProgram(ctx);
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    const label = error instanceof EngineError ? error.name : "Error";
    ctx.print(`${label}: ${errorMessage(error)}`);
    return 1;
  }
}

/**
 * Entry point for `futures-engine ...`. The engine is created on first use
 * and shut down when the command finishes.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const print = options.print ?? console.log;
  const session: { engine: TradingEngine | null } = { engine: null };
  const getEngine = (mode?: TradingMode): TradingEngine => {
    if (!session.engine) {
      session.engine = createEngine(mode);
      options.onEngine?.(session.engine);
    }
    return session.engine;
  };

  const ctx: CliContext = {
    interactive: false,
    print,
    getEngine,
    startSession: (mode) => runSession(getEngine(mode), print),
  };

  try {
    return await runCommand(argv, ctx);
  } finally {
    if (session.engine) await shutdownEngine(session.engine);
  }
}

/**
 * Read commands line by line against one shared engine until `exit`
 */
export function runSession(
  engine: TradingEngine,
  print: (line: string) => void,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<void> {
  const ctx: CliContext = { interactive: true, print, getEngine: () => engine };
  const rl = readline.createInterface({ input, output, terminal: false });

  print(`Session started in ${engine.mode.toUpperCase()} mode. Type 'help' for commands, 'exit' to quit.`);

  return new Promise((resolve) => {
    let queue = Promise.resolve();

    rl.on("line", (line) => {
      const args = line.trim().split(/\s+/).filter((arg) => arg.length > 0);
      if (args.length === 0) return;
      if (args[0] === "exit" || args[0] === "quit") {
        rl.close();
        return;
      }
      // One command at a time, in the order typed
      queue = queue.then(async () => {
        await runCommand(args, ctx);
      });
    });

    rl.on("close", () => {
      queue.then(resolve, resolve);
    });
  });
}

function createEngine(mode?: TradingMode): TradingEngine {
  const config = loadConfig();
  return new TradingEngine({ config: mode ? { ...config, mode } : config });
}

async function shutdownEngine(engine: TradingEngine): Promise<void> {
  try {
    await engine.shutdown();
  } catch (error) {
    console.error(`Shutdown failed: ${errorMessage(error)}`);
  }
}

// ============================================
// OUTPUT
// ============================================

function printOrder(ctx: CliContext, order: Order): void {
  const params = order.params;
  const price =
    params.kind === "MARKET" ? "" :
      params.kind === "LIMIT" ? ` @ ${params.price} ${params.timeInForce}` :
        ` stop ${params.stopPrice} limit ${params.price}`;
  ctx.print(`${order.orderId} ${order.side} ${order.quantity} ${order.symbol} ${params.kind}${price}`);
  ctx.print(`  status ${order.status} | filled ${order.filledQty} @ ${order.avgPrice}${order.error ? ` | ${order.error}` : ""}`);
}

function printOco(ctx: CliContext, pair: OcoPair): void {
  ctx.print(`OCO ${pair.id} ${pair.symbol} ${pair.side} ${pair.quantity} [${pair.status}]`);
  ctx.print(`  take-profit ${pair.takeProfitOrderId ?? "-"} @ ${pair.takeProfitPrice}`);
  ctx.print(`  stop-loss   ${pair.stopLossOrderId ?? "-"} @ ${pair.stopLossPrice} (limit ${pair.stopLossLimitPrice})`);
  if (pair.filledLeg) ctx.print(`  filled leg  ${pair.filledLeg}`);
}

function printTwap(ctx: CliContext, twap: TwapStatus): void {
  ctx.print(`TWAP ${twap.id} ${twap.side} ${twap.totalQuantity} ${twap.symbol} [${twap.status}]`);
  ctx.print(`  slices ${twap.slicesEmitted}/${twap.splits} sent | ${twap.slicesRemaining} remaining | ${twap.failedSlices} failed`);
  if (twap.childOrderIds.length > 0) ctx.print(`  children ${twap.childOrderIds.join(", ")}`);
  if (twap.error) ctx.print(`  error ${twap.error}`);
}

function printGrid(ctx: CliContext, grid: GridStatus): void {
  ctx.print(`GRID ${grid.id} ${grid.direction} ${grid.symbol} ${grid.lowerPrice}-${grid.upperPrice} step ${grid.step} [${grid.status}]`);
  for (const level of grid.levels) {
    const open =
      level.openOrderId ? `${level.openSide} ${level.openOrderId}` :
        level.pendingSide ? `${level.pendingSide} pending` : "empty";
    ctx.print(`  L${level.index} ${level.price}: ${open} | fills ${level.rebalanceCount} | pnl ${level.realizedPnl}`);
  }
  ctx.print(`  realized P&L ${grid.totalRealizedPnl} | open orders ${grid.openOrderCount} | pending ${grid.pendingLevelCount} | cycles ${grid.totalCycles}`);
}

export function formatHistoryEntry(entry: HistoryEntry): string {
  switch (entry.type) {
    case "order": {
      const o = entry.record;
      return `order ${o.orderId} ${o.side} ${o.quantity} ${o.symbol} ${o.params.kind} ${o.status}`;
    }
    case "oco": {
      const p = entry.record;
      return `oco   ${p.id} ${p.side} ${p.quantity} ${p.symbol} tp ${p.takeProfitPrice} sl ${p.stopLossPrice} ${p.status}`;
    }
    case "twap": {
      const t = entry.record;
      return `twap  ${t.id} ${t.side} ${t.totalQuantity} ${t.symbol} ${t.childOrderIds.length}/${t.splits} ${t.status}`;
    }
    case "grid":
      return formatGridLine(entry.record);
  }
}

function formatGridLine(grid: GridStrategy): string {
  return `grid  ${grid.id} ${grid.direction} ${grid.symbol} ${grid.lowerPrice}-${grid.upperPrice} x${grid.gridCount} ${grid.status}`;
}
