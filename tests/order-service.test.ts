/**
 * ORDER SERVICE TESTS
 * ===================
 */

import { GatewayRejectedError, GatewayTransientError, StateError, ValidationError } from '../src/errors';
import { SimulatedGateway } from '../src/gateway';
import { OrderLedger } from '../src/ledger';
import { OrderService } from '../src/orders';
import { logger } from '../src/utils/logger';
import { OrderValidator } from '../src/validation';

describe('OrderService', () => {
  let gateway: SimulatedGateway;
  let ledger: OrderLedger;
  let orders: OrderService;

  beforeEach(() => {
    gateway = new SimulatedGateway();
    ledger = new OrderLedger();
    orders = new OrderService(gateway, ledger, new OrderValidator());
  });

  it('should fill a market BUY at the simulated price and record it', async () => {
    const order = await orders.market.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 });

    expect(order).toMatchObject({
      orderId: 'SIM-1',
      symbol: 'BTCUSDT',
      side: 'BUY',
      quantity: 0.01,
      status: 'FILLED',
      filledQty: 0.01,
      avgPrice: 42500.5,
    });
    expect(ledger.getOrder('SIM-1')?.status).toBe('FILLED');
  });

  it('should place a resting limit order', async () => {
    const order = await orders.limit.place({ symbol: 'ETHUSDT', side: 'BUY', quantity: 1, price: 2300 });
    expect(order.status).toBe('NEW');
    expect(order.params).toEqual({ kind: 'LIMIT', price: 2300, timeInForce: 'GTC' });
  });

  it('should place a stop-limit order', async () => {
    const order = await orders.stopLimit.place({
      symbol: 'BTCUSDT',
      side: 'BUY',
      quantity: 0.01,
      stopPrice: 43000,
      price: 43100,
    });
    expect(order.status).toBe('NEW');
    expect(order.params.kind).toBe('STOP_LIMIT');
  });

  it('should send nothing when validation fails', async () => {
    const submit = jest.spyOn(gateway, 'submitOrder');
    await expect(orders.market.place({ symbol: 'INVALID', side: 'BUY', quantity: 1 })).rejects.toBeInstanceOf(ValidationError);
    expect(submit).not.toHaveBeenCalled();
    expect(ledger.listOrders()).toHaveLength(0);
  });

  it('should record a rejected order and rethrow', async () => {
    gateway.rejectNext('Margin is insufficient.');

    await expect(orders.market.place({ symbol: 'BTCUSDT', side: 'SELL', quantity: 1 })).rejects.toBeInstanceOf(GatewayRejectedError);

    const [rejected] = ledger.listOrders();
    expect(rejected.status).toBe('REJECTED');
    expect(rejected.error).toBe('Margin is insufficient.');
    expect(rejected.orderId.startsWith('REJ-')).toBe(true);
  });

  it('should record nothing on a transient failure', async () => {
    gateway.failNext();
    await expect(orders.market.place({ symbol: 'BTCUSDT', side: 'SELL', quantity: 1 })).rejects.toBeInstanceOf(GatewayTransientError);
    expect(ledger.listOrders()).toHaveLength(0);
  });

  it('should log the submission before the gateway call', async () => {
    const log = jest.spyOn(logger, 'log');
    try {
      await orders.market.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 });
      expect(log).toHaveBeenCalledWith('info', '[ORDER] BUY 0.01 BTCUSDT MARKET', {
        event: 'order_submitted',
        symbol: 'BTCUSDT',
        side: 'BUY',
        quantity: 0.01,
        kind: 'MARKET',
      });
    } finally {
      log.mockRestore();
    }
  });

  describe('cancel', () => {
    it('should cancel an open order', async () => {
      const order = await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
      const cancelled = await orders.cancel(order.orderId);
      expect(cancelled.status).toBe('CANCELED');
      expect(ledger.getOrder(order.orderId)?.status).toBe('CANCELED');
    });

    it('should refuse to cancel a filled order', async () => {
      const order = await orders.market.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 });
      await expect(orders.cancel(order.orderId)).rejects.toBeInstanceOf(StateError);
    });

    it('should refuse unknown ids', async () => {
      await expect(orders.cancel('SIM-999')).rejects.toThrow('Unknown order SIM-999');
    });
  });

  describe('amend', () => {
    it('should replace a resting limit at a new price and keep its flags', async () => {
      await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000, postOnly: true, reduceOnly: true });

      const replacement = await orders.amend('SIM-1', { price: 41000 });

      expect(replacement).toMatchObject({ orderId: 'SIM-2', side: 'BUY', quantity: 0.01, status: 'NEW' });
      expect(replacement.params).toEqual({ kind: 'LIMIT', price: 41000, timeInForce: 'GTC', postOnly: true, reduceOnly: true });
      expect(ledger.getOrder('SIM-1')?.status).toBe('CANCELED');
    });

    it('should default the quantity to what is still unfilled', async () => {
      await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.03, price: 40000 });
      gateway.fillOrder('SIM-1', 40000, 0.01);
      await orders.refresh('SIM-1');

      const replacement = await orders.amend('SIM-1', { price: '40500' });

      expect(replacement.quantity).toBe(0.02);
      expect(ledger.getOrder('SIM-1')).toMatchObject({ status: 'CANCELED', filledQty: 0.01 });
    });

    it('should check the replacement before cancelling', async () => {
      await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
      const cancel = jest.spyOn(gateway, 'cancelOrder');

      await expect(orders.amend('SIM-1', {})).rejects.toBeInstanceOf(ValidationError);
      await expect(orders.amend('SIM-1', { quantity: 0 })).rejects.toBeInstanceOf(ValidationError);
      expect(cancel).not.toHaveBeenCalled();
      expect(ledger.getOrder('SIM-1')?.status).toBe('NEW');
    });

    it('should only amend open LIMIT orders', async () => {
      await orders.market.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01 });
      await orders.stopLimit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, stopPrice: 43000, price: 43100 });

      await expect(orders.amend('SIM-1', { price: 41000 })).rejects.toThrow('Order SIM-1 is already FILLED');
      await expect(orders.amend('SIM-2', { price: 43200 })).rejects.toThrow('Order SIM-2 is STOP_LIMIT, only LIMIT orders can be amended');
    });
  });

  it('should refresh an order from the gateway', async () => {
    const order = await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
    // Nothing forwards simulator fills to the ledger here
    gateway.fillOrder(order.orderId);

    expect((await orders.refresh(order.orderId)).status).toBe('FILLED');
  });
});
