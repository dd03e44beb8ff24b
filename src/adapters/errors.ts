/**
 * Exchange adapter error types.
 */

export type ExchangeErrorCode =
  | "AUTHENTICATION_FAILED"
  | "RATE_LIMITED"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_ORDER"
  | "INVALID_RESPONSE"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "UNKNOWN";

export class ExchangeError extends Error {
  public override readonly name = "ExchangeError";

  constructor(
    message: string,
    public readonly code: ExchangeErrorCode,
    public readonly exchange: string,
    public override readonly cause?: unknown,
    /** Numeric error code reported by the exchange, when there was one. */
    public readonly exchangeCode?: number,
  ) {
    super(message, { cause });
  }
}

/**
 * Raised when a client cannot be built from the supplied settings.
 */
export class ConfigurationError extends Error {
  public override readonly name = "ConfigurationError";
}
