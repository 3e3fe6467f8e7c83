/**
 * RETRY WITH EXPONENTIAL BACKOFF + CIRCUIT BREAKER
 * =================================================
 * Used by the live gateway: retries wrap idempotent reads only,
 * the breaker guards every REST call.
 */

import { GatewayRejectedError, GatewayTransientError } from "../errors";
import { logger } from "./logger";

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay cap in ms (default: 16000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Only retry if this predicate returns true for the error */
  retryIf?: (error: unknown) => boolean;
  /** Label used in retry log lines */
  label?: string;
}

/**
 * Execute an async function with retry and exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 16000,
    backoffMultiplier = 2,
    retryIf = isTransientError,
    label = "request",
  } = options;

  let delay = initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !retryIf(error)) {
        throw error;
      }

      logger.warn(`[RETRY] ${label} attempt ${attempt + 1}/${maxRetries} failed, retrying in ${delay}ms`);
      await sleep(delay);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}

export type CircuitState = "closed" | "open" | "half-open";

/**
 * Simple circuit breaker that opens after N consecutive failures
 * and resets after a cooldown period.
 */
export class CircuitBreaker {
  private failures = 0;
  private lastFailureTime = 0;
  private state: CircuitState = "closed";

  constructor(
    private readonly failureThreshold: number = 5,
    private readonly cooldownMs: number = 30_000,
    private readonly timeProvider: () => number = Date.now,
  ) {}

  /**
   * Check if the circuit allows a request.
   * Returns true if allowed, false if the circuit is open.
   */
  allowRequest(): boolean {
    if (this.state === "closed") return true;

    if (this.state === "open") {
      if (this.timeProvider() - this.lastFailureTime >= this.cooldownMs) {
        this.state = "half-open";
        return true; // one probe
      }
      return false;
    }

    return true;
  }

  recordSuccess(): void {
    this.failures = 0;
    this.state = "closed";
  }

  recordFailure(): void {
    this.failures++;
    this.lastFailureTime = this.timeProvider();

    if (this.state === "half-open" || this.failures >= this.failureThreshold) {
      this.state = "open";
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailures(): number {
    return this.failures;
  }
}

/**
 * Default check for transient (retryable) errors.
 * Exchange rejections are never retried.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof GatewayTransientError) return true;
  if (error instanceof GatewayRejectedError) return false;
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout")) return true;
    if (msg.includes("socket hang up") || msg.includes("network") || msg.includes("fetch failed")) return true;
  }
  return false;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
