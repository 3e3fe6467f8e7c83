/**
 * STATUS POLLER TESTS
 * ===================
 * The simulator's push events are left unwired, so the Ledger only
 * learns about fills through pollOnce().
 */

import { GatewayTransientError } from '../src/errors';
import { SimulatedGateway } from '../src/gateway';
import { OrderLedger } from '../src/ledger';
import { OrderService } from '../src/orders';
import { StatusPoller } from '../src/polling';
import { OrderValidator } from '../src/validation';

describe('StatusPoller', () => {
  let gateway: SimulatedGateway;
  let ledger: OrderLedger;
  let orders: OrderService;
  let poller: StatusPoller;

  beforeEach(() => {
    gateway = new SimulatedGateway();
    ledger = new OrderLedger();
    orders = new OrderService(gateway, ledger, new OrderValidator());
    poller = new StatusPoller(gateway, ledger, { intervalMs: 10, maxConsecutiveErrors: 2 });
  });

  afterEach(() => {
    poller.stop();
  });

  it('should apply fills it finds on the exchange', async () => {
    const order = await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
    await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 39000 });
    gateway.fillOrder(order.orderId);

    const result = await poller.pollOnce();

    expect(result).toEqual({ checked: 2, changed: 1 });
    expect(ledger.getOrder(order.orderId)).toMatchObject({ status: 'FILLED', filledQty: 0.01, avgPrice: 40000 });
    expect(ledger.openOrders()).toHaveLength(1);
  });

  it('should skip orders the exchange does not know', async () => {
    const order = await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
    ledger.recordOrder({ ...order, orderId: 'GHOST-1' });
    const errors = jest.fn();
    poller.on('error', errors);

    const result = await poller.pollOnce();

    expect(result).toEqual({ checked: 2, changed: 0 });
    expect(errors).not.toHaveBeenCalled();
    expect(ledger.getOrder('GHOST-1')?.status).toBe('NEW');
  });

  it('should go degraded after repeated failures and recover', async () => {
    await orders.limit.place({ symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, price: 40000 });
    const query = jest.spyOn(gateway, 'queryOrder').mockRejectedValue(new GatewayTransientError('HTTP 503'));
    const degraded = jest.fn();
    const recovered = jest.fn();
    poller.on('degraded', degraded);
    poller.on('recovered', recovered);

    await poller.pollOnce();
    await poller.pollOnce();
    expect(degraded).toHaveBeenCalledWith(2);
    expect(poller.getStats().consecutiveErrors).toBe(2);

    query.mockRestore();
    await poller.pollOnce();
    expect(recovered).toHaveBeenCalledTimes(1);
    expect(poller.getStats().consecutiveErrors).toBe(0);
  });

  it('should start and stop once', () => {
    const started = jest.fn();
    poller.on('start', started);

    poller.start();
    poller.start();
    expect(started).toHaveBeenCalledTimes(1);
    expect(poller.isRunning()).toBe(true);

    poller.stop();
    expect(poller.isRunning()).toBe(false);
  });
});
