/**
 * ENGINE ERRORS
 * =============
 * - ValidationError: bad input, never reaches the gateway
 * - GatewayTransientError: network/timeout/rate limit, caller may retry
 * - GatewayRejectedError: the exchange refused the order (terminal for that order)
 * - StateError: operation not allowed in the current order/strategy state
 */

export type EngineErrorCode =
  | "VALIDATION"
  | "GATEWAY_TRANSIENT"
  | "GATEWAY_REJECTED"
  | "STATE";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends EngineError {
  readonly code = "VALIDATION" as const;

  constructor(
    readonly field: string,
    readonly rule: string,
    readonly value: unknown,
    message: string,
  ) {
    super(message);
  }
}

export class GatewayTransientError extends EngineError {
  readonly code = "GATEWAY_TRANSIENT" as const;
}

export class GatewayRejectedError extends EngineError {
  readonly code = "GATEWAY_REJECTED" as const;

  /**
   * @param exchangeCode - Error code from the exchange body, when it sent one
   */
  constructor(message: string, readonly exchangeCode?: number) {
    super(message);
  }
}

/** Exchange code for a post-only order that would have taken liquidity */
export const POST_ONLY_REJECTED_CODE = -5022;

export class StateError extends EngineError {
  readonly code = "STATE" as const;
}

export function isGatewayError(error: unknown): error is GatewayTransientError | GatewayRejectedError {
  return error instanceof GatewayTransientError || error instanceof GatewayRejectedError;
}

export function isPostOnlyRejection(error: unknown): boolean {
  return error instanceof GatewayRejectedError && error.exchangeCode === POST_ONLY_REJECTED_CODE;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
