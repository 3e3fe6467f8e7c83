/**
 * GRID ENGINE TESTS
 * =================
 * BTCUSDT starts at 42500.5 in the simulator.
 * A 42000-43000 grid with 4 intervals has levels 42000, 42250, 42500, 42750, 43000.
 * Level orders are post-only: one that would match is turned away and its id is spent.
 */

import { GatewayRejectedError, StateError, ValidationError } from '../src/errors';
import { SimulatedGateway } from '../src/gateway';
import { OrderLedger } from '../src/ledger';
import { OrderService } from '../src/orders';
import { GridEngine, GridEngineConfig } from '../src/strategy';
import { GridLevel } from '../src/types';
import { GridInput, OrderValidator } from '../src/validation';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const GRID: GridInput = { symbol: 'BTCUSDT', lowerPrice: 42000, upperPrice: 43000, gridCount: 4, quantity: 0.1 };

describe('GridEngine', () => {
  let gateway: SimulatedGateway;
  let ledger: OrderLedger;
  let engine: GridEngine;

  // Pending levels are retried by hand unless a test shortens the timer
  const build = (config: Partial<GridEngineConfig> = {}): GridEngine =>
    new GridEngine(ledger, new OrderService(gateway, ledger, new OrderValidator()), gateway, {
      retryIntervalMs: 60_000,
      ...config,
    });

  beforeEach(() => {
    gateway = new SimulatedGateway();
    ledger = new OrderLedger();
    gateway.on('orderUpdate', (orderId, update) => {
      ledger.applyUpdate(orderId, update);
    });
    engine = build();
  });

  afterEach(async () => {
    await engine.shutdown();
    engine.dispose();
  });

  it('should lay out g + 1 levels and place around the reference price', async () => {
    const handle = engine.start(GRID);
    const grid = await handle.ready;

    expect(grid.status).toBe('RUNNING');
    expect(grid.referencePrice).toBe(42500.5);
    expect(grid.step).toBe(250);
    expect(grid.quantityPerLevel).toBe(0.025);
    expect(grid.levels.map((level) => level.price)).toEqual([42000, 42250, 42500, 42750, 43000]);
    expect(grid.levels.map((level) => level.openSide)).toEqual(['BUY', 'BUY', 'BUY', 'SELL', 'SELL']);
    expect(grid.levels.map((level) => level.openOrderId)).toEqual(['SIM-1', 'SIM-2', 'SIM-3', 'SIM-4', 'SIM-5']);
    expect(ledger.getOrder('SIM-1')).toMatchObject({
      side: 'BUY',
      quantity: 0.025,
      params: { kind: 'LIMIT', price: 42000, postOnly: true },
    });
  });

  it('should space g + 1 levels evenly from lower to upper', async () => {
    const cases: Array<[number, number, number]> = [
      [42000, 43000, 4],
      [0.1, 0.4, 3],
      [0.1, 0.2, 3],
      [1, 2, 7],
      [100, 250, 6],
    ];

    for (const [lowerPrice, upperPrice, gridCount] of cases) {
      const handle = engine.start({ symbol: 'BTCUSDT', lowerPrice, upperPrice, gridCount, quantity: 1, referencePrice: upperPrice });
      const grid = handle.status();
      const prices = grid.levels.map((level) => level.price);

      expect(prices).toHaveLength(gridCount + 1);
      expect(prices[0]).toBe(lowerPrice);
      expect(prices[gridCount]).toBe(upperPrice);
      for (let i = 1; i <= gridCount; i++) {
        expect(prices[i] - prices[i - 1]).toBeCloseTo(grid.step, 9);
      }
      await handle.ready;
    }
  });

  it('should skip a level sitting exactly on the reference price', async () => {
    const grid = await engine.start({ ...GRID, referencePrice: 42500 }).ready;

    expect(grid.levels[2].openOrderId).toBeNull();
    expect(engine.status(grid.id).openOrderCount).toBe(4);
  });

  it('should book one fill when the price lands exactly on a level', async () => {
    const handle = engine.start(GRID);
    await handle.ready;

    // BUY at 42500 fills; the SELL at 42500 would match at once, so it is turned away (SIM-6)
    gateway.setPrice('BTCUSDT', 42500);
    await flush();
    await flush();

    const status = handle.status();
    expect(status.totalRebalances).toBe(1);
    expect(status.levels[2]).toMatchObject({ openOrderId: null, openSide: null, pendingSide: 'SELL', entryPrice: 42500 });
    expect(status.pendingLevelCount).toBe(1);
    expect(status.openOrderCount).toBe(4);
    expect(gateway.submittedOrders()).toHaveLength(5);
    expect(ledger.listOrders({ status: 'REJECTED' })).toHaveLength(1);
  });

  it('should flip a LONG level once the price moves off it and realize the round trip', async () => {
    const rebalances: GridLevel[] = [];
    const handle = engine.start(GRID, { onRebalance: (level) => { rebalances.push(level); } });
    await handle.ready;

    // BUY at level 2 fills at 42450; a SELL at 42500 would match the market 42500.5
    gateway.fillOrder('SIM-3', 42450);
    await flush();
    expect(handle.status().levels[2]).toMatchObject({ openOrderId: null, pendingSide: 'SELL', entryPrice: 42450 });

    expect(await engine.retryPendingLevels()).toBe(0);

    gateway.setPrice('BTCUSDT', 42400);
    expect(await engine.retryPendingLevels(handle.id)).toBe(1);
    expect(handle.status().levels[2]).toMatchObject({ openOrderId: 'SIM-7', openSide: 'SELL', pendingSide: null });

    // SELL fills at its limit; the BUY at 42500 would match the market 42400 (SIM-8)
    gateway.fillOrder('SIM-7');
    await flush();

    const status = handle.status();
    const level = status.levels[2];
    expect(level.realizedPnl).toBe(1.25);
    expect(level.cyclesCompleted).toBe(1);
    expect(level.rebalanceCount).toBe(2);
    expect(level.entryPrice).toBeNull();
    expect(level.openOrderId).toBeNull();
    expect(level.pendingSide).toBe('BUY');

    expect(status.totalRealizedPnl).toBe(1.25);
    expect(status.totalRebalances).toBe(2);
    expect(status.totalCycles).toBe(1);
    expect(rebalances.map((l) => l.realizedPnl)).toEqual([0, 1.25]);

    gateway.setPrice('BTCUSDT', 42600);
    expect(await engine.retryPendingLevels()).toBe(1);
    expect(handle.status().levels[2]).toMatchObject({ openOrderId: 'SIM-9', openSide: 'BUY', pendingSide: null });
  });

  it('should realize falling prices as profit on a SHORT grid', async () => {
    const handle = engine.start({ ...GRID, direction: 'SHORT' });
    await handle.ready;

    // SELL at level 3 opens at 42800; the BUY at 42750 waits until the price is above it
    gateway.fillOrder('SIM-4', 42800);
    await flush();
    expect(handle.status().levels[3].pendingSide).toBe('BUY');

    gateway.setPrice('BTCUSDT', 42800);
    expect(await engine.retryPendingLevels()).toBe(1);

    gateway.fillOrder('SIM-7', 42700);
    await flush();

    const level = handle.status().levels[3];
    expect(level.realizedPnl).toBe(2.5);
    expect(level.cyclesCompleted).toBe(1);
    expect(level.pendingSide).toBe('SELL');
  });

  it('should retry pending levels on its timer', async () => {
    engine.dispose();
    engine = build({ retryIntervalMs: 10 });
    const handle = engine.start(GRID);
    await handle.ready;

    gateway.setPrice('BTCUSDT', 42500);
    await flush();
    expect(handle.status().levels[2].pendingSide).toBe('SELL');

    gateway.setPrice('BTCUSDT', 42400);
    await sleep(50);

    expect(handle.status().levels[2]).toMatchObject({ openOrderId: 'SIM-7', openSide: 'SELL', pendingSide: null });
    await handle.stop();
  });

  it('should leave a level pending when the exchange expires its order', async () => {
    const handle = engine.start(GRID);
    await handle.ready;

    gateway.closeOrder('SIM-4', 'EXPIRED');
    await flush();
    expect(handle.status().levels[3]).toMatchObject({ openOrderId: null, pendingSide: 'SELL' });

    expect(await engine.retryPendingLevels()).toBe(1);
    expect(handle.status().levels[3]).toMatchObject({ openOrderId: 'SIM-6', openSide: 'SELL' });
  });

  it('should keep one order per level as the price moves', async () => {
    const handle = engine.start(GRID);
    await handle.ready;

    gateway.setPrice('BTCUSDT', 42400);
    await flush();

    const level = handle.status().levels[2];
    expect(level.openSide).toBe('SELL');
    expect(level.openOrderId).toBe('SIM-6');
    expect(level.entryPrice).toBe(42500);
    expect(ledger.openOrders().filter((order) => order.params.kind === 'LIMIT' && order.params.price === 42500)).toHaveLength(1);
  });

  it('should cancel every open level on stop', async () => {
    const handle = engine.start(GRID);
    await handle.ready;

    const result = await handle.stop();

    expect(result.failures).toEqual([]);
    expect(result.grid.status).toBe('CANCELLED');
    expect(result.grid.levels.every((level) => level.openOrderId === null)).toBe(true);
    expect(ledger.openOrders()).toHaveLength(0);
  });

  it('should report cancel failures and keep cancelling the rest', async () => {
    const handle = engine.start(GRID);
    await handle.ready;
    gateway.rejectNext('Unknown order sent.', 'cancel');

    const result = await handle.stop();

    expect(result.failures).toEqual([{ levelIndex: 0, orderId: 'SIM-1', error: 'Unknown order sent.' }]);
    expect(result.grid.status).toBe('CANCELLED');
    expect(ledger.openOrders().map((order) => order.orderId)).toEqual(['SIM-1']);
  });

  it('should refuse to stop twice', async () => {
    const handle = engine.start(GRID);
    await handle.ready;
    await handle.stop();

    await expect(handle.stop()).rejects.toBeInstanceOf(StateError);
  });

  it('should fail when no level can be placed', async () => {
    jest.spyOn(gateway, 'submitOrder').mockRejectedValue(new GatewayRejectedError('Margin is insufficient.', -2019));

    const grid = await engine.start(GRID).ready;
    expect(grid.status).toBe('FAILED');
  });

  describe('updateRange', () => {
    it('should move a running grid and keep each level\'s counters', async () => {
      const handle = engine.start(GRID);
      await handle.ready;

      // One round trip on level 2: BUY fills at 42500, SELL rests as SIM-6 and fills at 42600
      gateway.setPrice('BTCUSDT', 42400);
      await flush();
      gateway.fillOrder('SIM-6', 42600);
      await flush();
      expect(handle.status().levels[2]).toMatchObject({ realizedPnl: 2.5, pendingSide: 'BUY' });

      const result = await engine.updateRange(handle.id, { lowerPrice: 41000, upperPrice: 42000 });

      expect(result.failures).toEqual([]);
      expect(result.grid).toMatchObject({ lowerPrice: 41000, upperPrice: 42000, step: 250, referencePrice: 42400, status: 'RUNNING' });
      expect(result.grid.levels.map((level) => level.price)).toEqual([41000, 41250, 41500, 41750, 42000]);
      expect(result.grid.levels.map((level) => level.openOrderId)).toEqual(['SIM-8', 'SIM-9', 'SIM-10', 'SIM-11', 'SIM-12']);
      expect(result.grid.levels.every((level) => level.openSide === 'BUY' && level.pendingSide === null)).toBe(true);
      expect(result.grid.levels[2]).toMatchObject({ realizedPnl: 2.5, rebalanceCount: 2, cyclesCompleted: 1 });

      expect(['SIM-1', 'SIM-2', 'SIM-4', 'SIM-5'].map((id) => ledger.getOrder(id)?.status)).toEqual([
        'CANCELED', 'CANCELED', 'CANCELED', 'CANCELED',
      ]);
      expect(ledger.openOrders()).toHaveLength(5);
    });

    it('should keep the untouched bound', async () => {
      const handle = engine.start(GRID);
      await handle.ready;

      const result = await engine.updateRange(handle.id, { upperPrice: 44000 });

      expect(result.grid.levels.map((level) => level.price)).toEqual([42000, 42500, 43000, 43500, 44000]);
      expect(result.grid.levels.map((level) => level.openSide)).toEqual(['BUY', 'BUY', 'SELL', 'SELL', 'SELL']);
    });

    it('should check the new bounds before touching any order', async () => {
      const handle = engine.start(GRID);
      await handle.ready;

      await expect(engine.updateRange(handle.id, {})).rejects.toBeInstanceOf(ValidationError);
      await expect(engine.updateRange(handle.id, { lowerPrice: 43500 })).rejects.toBeInstanceOf(ValidationError);
      expect(handle.status().levels.map((level) => level.openOrderId)).toEqual(['SIM-1', 'SIM-2', 'SIM-3', 'SIM-4', 'SIM-5']);
      expect(ledger.openOrders()).toHaveLength(5);
    });

    it('should refuse a grid that is not running', async () => {
      const handle = engine.start(GRID);
      await handle.ready;
      await handle.stop();

      await expect(engine.updateRange(handle.id, { lowerPrice: 41000 })).rejects.toBeInstanceOf(StateError);
    });
  });

  it('should validate before starting', () => {
    expect(() => engine.start({ ...GRID, lowerPrice: 45000, upperPrice: 40000 })).toThrow(ValidationError);
    expect(engine.list()).toHaveLength(0);
  });
});
