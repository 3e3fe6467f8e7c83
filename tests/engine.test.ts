/**
 * TRADING ENGINE TESTS
 * ====================
 * End to end through the simulator, plus a scripted live gateway
 * to check that live sessions fall back to polling.
 */

import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../src/config';
import { TradingEngine } from '../src/engine';
import { StateError, ValidationError } from '../src/errors';
import { SimulatedGateway } from '../src/gateway';
import {
  CancelResult,
  ExchangeGateway,
  OrderSpec,
  OrderUpdate,
  SubmitResult,
  TradingMode,
} from '../src/types';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const CONFIG: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, intervalUnitMs: 1 };

/** Accepts everything and never fills */
class ScriptedLiveGateway implements ExchangeGateway {
  readonly mode: TradingMode = 'live';
  private counter = 0;

  async submitOrder(spec: OrderSpec): Promise<SubmitResult> {
    this.counter++;
    return { orderId: `LIVE-${this.counter}`, status: spec.params.kind === 'MARKET' ? 'FILLED' : 'NEW', filledQty: 0, avgPrice: 0 };
  }

  async cancelOrder(): Promise<CancelResult> {
    return { status: 'CANCELED' };
  }

  async queryOrder(): Promise<OrderUpdate> {
    return { status: 'NEW', filledQty: 0, avgPrice: 0 };
  }

  async getPrice(): Promise<number> {
    return 42500.5;
  }

  async isReady(): Promise<boolean> {
    return true;
  }
}

describe('TradingEngine', () => {
  let gateway: SimulatedGateway;
  let engine: TradingEngine;

  beforeEach(() => {
    gateway = new SimulatedGateway();
    engine = new TradingEngine({ config: CONFIG, gateway });
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  it('should run in sim mode by default', () => {
    expect(engine.mode).toBe('sim');
  });

  it('should fill a market BUY at the simulated price', async () => {
    const order = await engine.placeMarket({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 });
    expect(order).toMatchObject({ status: 'FILLED', filledQty: 0.01, avgPrice: 42500.5 });
  });

  it('should reject invalid input before reaching the gateway', async () => {
    await expect(engine.placeLimit({ symbol: 'BTCUSDT', side: 'HOLD', quantity: 1, price: 42000 })).rejects.toBeInstanceOf(ValidationError);
    expect(gateway.submittedOrders()).toHaveLength(0);
  });

  it('should route simulated fills into the Ledger and complete an OCO', async () => {
    const pair = await engine.createOco({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.1, takeProfitPrice: 45000, stopLossPrice: 40000 });

    gateway.setPrice('BTCUSDT', 45000);
    await flush();

    expect(engine.ledger.getOrder('SIM-1')?.status).toBe('FILLED');
    expect(engine.ledger.getOrder('SIM-2')?.status).toBe('CANCELED');
    expect(engine.oco.status(pair.id).status).toBe('COMPLETED');
    expect(engine.poller.isRunning()).toBe(false);
  });

  describe('status', () => {
    it('should look up every kind of id', async () => {
      const order = await engine.placeLimit({ symbol: 'ETHUSDT', side: 'BUY', quantity: 1, price: 2300 });
      const pair = await engine.createOco({ symbol: 'ETHUSDT', side: 'SELL', quantity: 1, takeProfitPrice: 2200, stopLossPrice: 2400 });
      const twap = engine.startTwap({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.1, splits: 2, interval: 1 });
      await twap.done;
      const grid = await engine.startGrid({ symbol: 'BTCUSDT', lowerPrice: 42000, upperPrice: 43000, gridCount: 4, quantity: 0.1 }).ready;

      expect((await engine.status(order.orderId)).type).toBe('order');
      expect((await engine.status(pair.id)).type).toBe('oco');
      expect(await engine.status(twap.id)).toMatchObject({ type: 'twap', record: { status: 'COMPLETED', slicesEmitted: 2 } });
      expect(await engine.status(grid.id)).toMatchObject({ type: 'grid', record: { openOrderCount: 5 } });
    });

    it('should ask the gateway about ids from elsewhere', async () => {
      const placed = await gateway.submitOrder({ symbol: 'BTCUSDT', side: 'SELL', quantity: 0.5, params: { kind: 'MARKET' } });

      const report = await engine.status(placed.orderId, 'btcusdt');

      expect(report).toEqual({
        type: 'remote',
        orderId: placed.orderId,
        symbol: 'BTCUSDT',
        record: { status: 'FILLED', filledQty: 0.5, avgPrice: 42500.5 },
      });
    });

    it('should refuse unknown ids without a symbol', async () => {
      await expect(engine.status('SIM-404')).rejects.toBeInstanceOf(StateError);
    });
  });

  it('should list history by type', async () => {
    await engine.placeMarket({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 });
    await engine.createOco({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, takeProfitPrice: 45000, stopLossPrice: 40000 });

    expect(engine.history().map((entry) => entry.type)).toEqual(['order', 'oco', 'order', 'order']);
    expect(engine.history('oco')).toHaveLength(1);
    expect(engine.history('twap')).toHaveLength(0);
  });

  it('should stop running strategies on shutdown and leave plain orders alone', async () => {
    const slow = new TradingEngine({ config: { ...CONFIG, intervalUnitMs: 1000 }, gateway });
    const order = await slow.placeLimit({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
    const twap = slow.startTwap({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.1, splits: 3, interval: 60 });
    const grid = await slow.startGrid({ symbol: 'BTCUSDT', lowerPrice: 42000, upperPrice: 43000, gridCount: 4, quantity: 0.1 }).ready;

    await slow.shutdown();

    expect(slow.twap.status(twap.id).status).toBe('CANCELLED');
    expect(slow.grid.status(grid.id)).toMatchObject({ status: 'CANCELLED', openOrderCount: 0 });
    expect(slow.ledger.getOrder(order.orderId)?.status).toBe('NEW');
  });

  it('should poll for fills in live mode once a strategy runs', async () => {
    const live = new TradingEngine({ config: CONFIG, gateway: new ScriptedLiveGateway() });

    await live.placeLimit({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
    expect(live.poller.isRunning()).toBe(false);

    await live.createOco({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.1, takeProfitPrice: 45000, stopLossPrice: 40000 });
    expect(live.poller.isRunning()).toBe(true);

    await live.shutdown();
    expect(live.poller.isRunning()).toBe(false);
  });
});
