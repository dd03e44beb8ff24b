import Decimal from "decimal.js";

import { ExchangeError } from "../../adapters/errors";
import type { FuturesExchangeClient, OrderPayload, OrderResponse } from "../../adapters/types";
import { type Logger, silentLogger } from "../../lib/logger";
import { type Result, err, ok } from "../../lib/result";
import { SubmissionError } from "./errors";
import type { OrderRequest } from "./types";

export const PRICE_DECIMALS = 8;

/**
 * Format a price as a plain decimal with exactly eight fractional digits.
 *
 * Ties round to even: 100.123456789 → "100.12345679", 0.001953125 → "0.00195312".
 * Large values never switch to exponent notation.
 */
export const formatPrice = (price: number): string =>
  new Decimal(price).toFixed(PRICE_DECIMALS, Decimal.ROUND_HALF_EVEN);

export const buildOrderPayload = (request: OrderRequest): OrderPayload => {
  const payload: OrderPayload = {
    symbol: request.symbol,
    side: request.side,
    type: request.orderType,
    quantity: request.quantity,
  };

  if (request.orderType === "LIMIT" && request.price !== undefined) {
    payload.timeInForce = "GTC";
    payload.price = formatPrice(request.price);
  }

  return payload;
};

const REJECTION_CODES = new Set(["INVALID_ORDER", "INSUFFICIENT_BALANCE"]);

const toSubmissionError = (error: unknown): SubmissionError => {
  if (error instanceof ExchangeError) {
    return REJECTION_CODES.has(error.code)
      ? new SubmissionError(`Order rejected by exchange: ${error.message}`, error)
      : new SubmissionError(`Exchange API error: ${error.message}`, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SubmissionError(`Unexpected error while placing order: ${message}`, error);
};

/**
 * Submit one order. No retries; every failure becomes a SubmissionError.
 *
 * @returns The exchange response, unmodified
 */
export const placeOrder = async (
  client: FuturesExchangeClient,
  request: OrderRequest,
  logger: Logger = silentLogger,
): Promise<Result<OrderResponse, SubmissionError>> => {
  const payload = buildOrderPayload(request);

  logger.info("Sending new order request", { exchange: client.exchange });
  logger.debug("Order request params", { ...payload });

  try {
    const response = await client.submitOrder(payload);
    logger.info("Order successfully placed");
    logger.debug("Order response", { ...response });
    return ok(response);
  } catch (error) {
    const submissionError = toSubmissionError(error);
    logger.error(
      "Order submission failed",
      error instanceof Error ? error : undefined,
      { reason: submissionError.message },
    );
    return err(submissionError);
  }
};
