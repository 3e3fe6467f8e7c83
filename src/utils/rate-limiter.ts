/**
 * RATE LIMITER
 * ============
 * Keeps a minimum gap between REST calls to stay under the exchange's
 * request weight limits. Concurrent callers are queued in arrival order.
 */

import { sleep } from "./retry";

export class RateLimiter {
  private nextSlot = 0;

  /**
   * @param minIntervalMs - Minimum interval between requests in milliseconds
   */
  constructor(
    private readonly minIntervalMs: number,
    private readonly timeProvider: () => number = Date.now,
  ) {}

  /**
   * Wait until this caller's slot comes up.
   * The slot is reserved before waiting, so two callers never share one.
   */
  async waitForToken(): Promise<void> {
    const now = this.timeProvider();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const waitTime = slot - now;
    if (waitTime > 0) {
      await sleep(waitTime);
    }
  }

  /** Milliseconds until the next request could go out */
  pendingDelay(): number {
    return Math.max(0, this.nextSlot - this.timeProvider());
  }
}
