import { ExchangeError } from "../../adapters/errors";
import type { FuturesExchangeClient } from "../../adapters/types";
import { type Logger, silentLogger } from "../../lib/logger";
import { type Result, err, ok } from "../../lib/result";
import { ValidationError } from "./errors";

export const METADATA_UNAVAILABLE_MESSAGE =
  "Unable to validate symbol with the exchange. Please try again later.";

/**
 * Confirm the symbol is listed on the exchange.
 *
 * A failed metadata fetch is reported as a validation failure: the order cannot be
 * placed either way. Errors other than ExchangeError are not expected here and
 * propagate to the caller.
 */
export const validateSymbolOnExchange = async (
  symbol: string,
  client: FuturesExchangeClient,
  logger: Logger = silentLogger,
): Promise<Result<string, ValidationError>> => {
  logger.debug("Fetching exchange info to validate symbol", { symbol });

  let listed: Set<string>;
  try {
    const info = await client.fetchExchangeInfo();
    listed = new Set((info.symbols ?? []).map((entry) => entry.symbol));
  } catch (error) {
    if (!(error instanceof ExchangeError)) {
      throw error;
    }
    logger.error("Failed to fetch exchange info", error, { symbol, code: error.code });
    return err(new ValidationError(METADATA_UNAVAILABLE_MESSAGE, error));
  }

  if (!listed.has(symbol)) {
    return err(new ValidationError(`Symbol '${symbol}' is not listed on the futures testnet.`));
  }

  return ok(symbol);
};
