export type GatewayErrorCode =
  | 'GATEWAY_UNAVAILABLE'
  | 'GATEWAY_AUTH_ERROR'
  | 'GATEWAY_SETTLEMENT_ERROR'
  | 'GATEWAY_INVARIANT_VIOLATION'
  | 'REFUND_ERROR';

/**
 * Base of every failure raised while talking to a payment gateway.
 * Callers switch on `code`; the set of subclasses below is closed.
 */
export abstract class PaymentGatewayError extends Error {
  abstract readonly code: GatewayErrorCode;

  constructor(
    message: string,
    public readonly provider: string,
    public readonly details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport-level failure; the caller may retry. */
export class GatewayUnavailableError extends PaymentGatewayError {
  readonly code = 'GATEWAY_UNAVAILABLE';
}

/** Credentials rejected or the token response is malformed. */
export class GatewayAuthError extends PaymentGatewayError {
  readonly code = 'GATEWAY_AUTH_ERROR';
}

export class GatewaySettlementError extends PaymentGatewayError {
  readonly code = 'GATEWAY_SETTLEMENT_ERROR';
}

/**
 * The gateway reported a paid invoice whose payment row contradicts that.
 * Never retried and never swallowed.
 */
export class GatewayInvariantViolationError extends PaymentGatewayError {
  readonly code = 'GATEWAY_INVARIANT_VIOLATION';
}

export class RefundError extends PaymentGatewayError {
  readonly code = 'REFUND_ERROR';
}

export type GatewayError =
  | GatewayUnavailableError
  | GatewayAuthError
  | GatewaySettlementError
  | GatewayInvariantViolationError
  | RefundError;

export const isGatewayError = (error: unknown): error is GatewayError =>
  error instanceof PaymentGatewayError;
