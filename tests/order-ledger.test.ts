/**
 * ORDER LEDGER TESTS
 * ==================
 */

import { StateError } from '../src/errors';
import { OrderLedger } from '../src/ledger';
import { Order, TwapStrategy } from '../src/types';

function makeOrder(orderId: string, overrides: Partial<Order> = {}): Order {
  const now = new Date('2026-01-01T00:00:00Z');
  return {
    orderId,
    symbol: 'BTCUSDT',
    side: 'BUY',
    quantity: 1,
    params: { kind: 'LIMIT', price: 42000, timeInForce: 'GTC' },
    status: 'NEW',
    filledQty: 0,
    avgPrice: 0,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

function makeTwap(id: string): TwapStrategy {
  const now = new Date('2026-01-01T00:00:00Z');
  return {
    id,
    symbol: 'BTCUSDT',
    side: 'BUY',
    totalQuantity: 1,
    splits: 2,
    interval: 1,
    orderKind: 'MARKET',
    sliceQuantities: [0.5, 0.5],
    status: 'RUNNING',
    childOrderIds: [],
    slicesRemaining: 2,
    failedSlices: 0,
    consecutiveFailures: 0,
    startedAt: now,
    updatedAt: now,
  };
}

describe('OrderLedger', () => {
  let ledger: OrderLedger;

  beforeEach(() => {
    ledger = new OrderLedger();
  });

  describe('orders', () => {
    it('should record an order and hand out copies', () => {
      ledger.recordOrder(makeOrder('A'));
      const copy = ledger.getOrder('A');
      if (!copy) throw new Error('missing order');
      copy.status = 'FILLED';

      expect(ledger.getOrder('A')?.status).toBe('NEW');
    });

    it('should refuse duplicate ids', () => {
      ledger.recordOrder(makeOrder('A'));
      expect(() => ledger.recordOrder(makeOrder('A'))).toThrow(StateError);
    });

    it('should apply fills and emit the previous state', () => {
      const listener = jest.fn();
      ledger.on('order:updated', listener);
      ledger.recordOrder(makeOrder('A'));

      const updated = ledger.applyUpdate('A', { status: 'PARTIALLY_FILLED', filledQty: 0.4, avgPrice: 42000 });

      expect(updated?.status).toBe('PARTIALLY_FILLED');
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].filledQty).toBe(0.4);
      expect(listener.mock.calls[0][1].status).toBe('NEW');
    });

    it('should never change a terminal order', () => {
      ledger.recordOrder(makeOrder('A'));
      ledger.applyUpdate('A', { status: 'FILLED', filledQty: 1, avgPrice: 42000 });

      const after = ledger.applyUpdate('A', { status: 'CANCELED', filledQty: 1, avgPrice: 42000 });
      expect(after?.status).toBe('FILLED');
    });

    it('should not move status backwards or shrink fills', () => {
      ledger.recordOrder(makeOrder('A'));
      ledger.applyUpdate('A', { status: 'PARTIALLY_FILLED', filledQty: 0.5, avgPrice: 42000 });

      const stale = ledger.applyUpdate('A', { status: 'NEW', filledQty: 0.2, avgPrice: 41000 });
      expect(stale).toMatchObject({ status: 'PARTIALLY_FILLED', filledQty: 0.5, avgPrice: 42000 });
    });

    it('should stay quiet when nothing changed', () => {
      const listener = jest.fn();
      ledger.recordOrder(makeOrder('A'));
      ledger.on('order:updated', listener);

      ledger.applyUpdate('A', { status: 'NEW', filledQty: 0, avgPrice: 0 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should ignore unknown ids', () => {
      expect(ledger.applyUpdate('nope', { status: 'FILLED', filledQty: 1, avgPrice: 1 })).toBeUndefined();
    });

    it('should filter orders and list open ones', () => {
      ledger.recordOrder(makeOrder('A', { strategyId: 'TWAP-1' }));
      ledger.recordOrder(makeOrder('B', { symbol: 'ETHUSDT', status: 'FILLED', filledQty: 1 }));

      expect(ledger.listOrders({ strategyId: 'TWAP-1' }).map((o) => o.orderId)).toEqual(['A']);
      expect(ledger.listOrders({ symbol: 'ETHUSDT' }).map((o) => o.orderId)).toEqual(['B']);
      expect(ledger.openOrders().map((o) => o.orderId)).toEqual(['A']);
    });
  });

  describe('write boundary', () => {
    it('should let listeners write after the commit', () => {
      ledger.recordOrder(makeOrder('A'));
      ledger.recordOrder(makeOrder('B'));
      ledger.on('order:updated', (order) => {
        if (order.orderId === 'A') ledger.applyUpdate('B', { status: 'CANCELED', filledQty: 0, avgPrice: 0 });
      });

      ledger.applyUpdate('A', { status: 'FILLED', filledQty: 1, avgPrice: 42000 });
      expect(ledger.getOrder('B')?.status).toBe('CANCELED');
    });
  });

  describe('strategies', () => {
    it('should keep TWAP children append-only', () => {
      ledger.saveTwap(makeTwap('T'));
      ledger.appendChild('T', 'A');
      ledger.appendChild('T', 'B');

      const twap = ledger.getTwap('T');
      if (!twap) throw new Error('missing twap');
      expect(twap.childOrderIds).toEqual(['A', 'B']);

      expect(() => ledger.saveTwap({ ...twap, childOrderIds: ['B'] })).toThrow('append-only');
    });

    it('should not reopen a finished TWAP', () => {
      ledger.saveTwap(makeTwap('T'));
      ledger.updateTwap('T', (t) => {
        t.status = 'CANCELLED';
      });

      expect(() =>
        ledger.updateTwap('T', (t) => {
          t.status = 'RUNNING';
        }),
      ).toThrow(StateError);
    });

    it('should emit strategy updates', () => {
      const listener = jest.fn();
      ledger.on('strategy:updated', listener);
      ledger.saveTwap(makeTwap('T'));

      expect(listener).toHaveBeenCalledWith(expect.objectContaining({ type: 'twap', record: expect.objectContaining({ id: 'T' }) }));
    });
  });

  it('should list history in creation order, optionally by type', () => {
    ledger.recordOrder(makeOrder('A'));
    ledger.saveTwap(makeTwap('T'));
    ledger.recordOrder(makeOrder('B'));

    expect(ledger.history().map((entry) => entry.type)).toEqual(['order', 'twap', 'order']);
    expect(ledger.history('order').map((entry) => (entry.type === 'order' ? entry.record.orderId : ''))).toEqual(['A', 'B']);
  });
});
