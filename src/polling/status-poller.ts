/**
 * ORDER STATUS POLLER
 * ===================
 * Keeps the Ledger in step with the exchange.
 *
 * What it does:
 * 1. Every X milliseconds, takes the Ledger's open orders
 * 2. Asks the gateway for each one's status and fills
 * 3. Feeds anything that changed into ledger.applyUpdate()
 *
 * Strategies (OCO, TWAP hooks, Grid) react to the resulting
 * `order:updated` events; they never poll by themselves.
 *
 * @example
 * const poller = new StatusPoller(gateway, ledger, { intervalMs: 2000 });
 * poller.on('degraded', (count) => console.warn(`${count} failed polls`));
 * poller.start();
 */

import { EventEmitter } from 'eventemitter3';
import { GatewayRejectedError, errorMessage } from '../errors';
import { OrderLedger } from '../ledger';
import { ExchangeGateway } from '../types';
import { logger } from '../utils/logger';

export interface StatusPollerConfig {
  /** Time between polls */
  intervalMs: number;
  /** Failed polls in a row before `degraded` fires */
  maxConsecutiveErrors: number;
}

const DEFAULT_CONFIG: StatusPollerConfig = {
  intervalMs: 2000,
  maxConsecutiveErrors: 5,
};

export interface PollResult {
  /** Open orders queried */
  checked: number;
  /** Orders whose status or fill changed */
  changed: number;
}

/**
 * Events emitted by the StatusPoller
 */
export interface StatusPollerEvents {
  /** Each poll completed (even if nothing changed) */
  poll: (result: PollResult) => void;

  /** A poll failed */
  error: (error: Error) => void;

  start: () => void;

  stop: () => void;

  /** Multiple consecutive failed polls */
  degraded: (errorCount: number) => void;

  /** First good poll after being degraded */
  recovered: () => void;
}

export class StatusPoller extends EventEmitter<StatusPollerEvents> {
  private config: StatusPollerConfig;

  private intervalId: NodeJS.Timeout | null = null;
  private polling = false;
  private consecutiveErrors = 0;
  private pollCount = 0;

  constructor(
    private readonly gateway: ExchangeGateway,
    private readonly ledger: OrderLedger,
    config: Partial<StatusPollerConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  start(): void {
    if (this.intervalId) return;

    this.intervalId = setInterval(() => {
      this.pollOnce().catch((error) => {
        logger.error(`[POLLER] Unhandled error: ${errorMessage(error)}`);
      });
    }, this.config.intervalMs);

    this.emit('start');
    logger.info(`[POLLER] Tracking open orders every ${this.config.intervalMs}ms`);
  }

  stop(): void {
    if (!this.intervalId) return;

    clearInterval(this.intervalId);
    this.intervalId = null;
    this.emit('stop');
    logger.info(`[POLLER] Stopped after ${this.pollCount} polls`);
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Query every open order once. Overlapping calls are skipped.
   */
  async pollOnce(): Promise<PollResult> {
    if (this.polling) return { checked: 0, changed: 0 };
    this.polling = true;
    this.pollCount++;

    const result: PollResult = { checked: 0, changed: 0 };
    let failure: Error | null = null;

    try {
      for (const order of this.ledger.openOrders()) {
        result.checked++;
        try {
          const update = await this.gateway.queryOrder(order.symbol, order.orderId);
          const updated = this.ledger.applyUpdate(order.orderId, update);
          if (updated && (updated.status !== order.status || updated.filledQty !== order.filledQty)) {
            result.changed++;
          }
        } catch (error) {
          if (error instanceof GatewayRejectedError) {
            // The exchange does not know this order; nothing to apply
            logger.warn(`[POLLER] ${order.orderId}: ${error.message}`);
            continue;
          }
          failure = error instanceof Error ? error : new Error(errorMessage(error));
        }
      }
    } finally {
      this.polling = false;
    }

    if (failure) {
      this.handleError(failure);
    } else {
      if (this.consecutiveErrors >= this.config.maxConsecutiveErrors) {
        logger.info('[POLLER] Recovered from errors');
        this.emit('recovered');
      }
      this.consecutiveErrors = 0;
    }

    this.emit('poll', result);
    return result;
  }

  getStats() {
    return {
      isRunning: this.isRunning(),
      pollCount: this.pollCount,
      consecutiveErrors: this.consecutiveErrors,
      openOrders: this.ledger.openOrders().length,
    };
  }

  private handleError(error: Error): void {
    this.consecutiveErrors++;
    logger.warn(`[POLLER] Poll failed (#${this.consecutiveErrors}): ${error.message}`);

    this.emit('error', error);

    if (this.consecutiveErrors === this.config.maxConsecutiveErrors) {
      logger.error(`[POLLER] DEGRADED: ${this.consecutiveErrors} consecutive failed polls`);
      this.emit('degraded', this.consecutiveErrors);
    }
  }
}
