import { ConfigurationError } from "../adapters/errors";
import type { FuturesExchangeClient } from "../adapters/types";
import {
  type OrderSummary,
  type RawOrderInput,
  type SubmissionError,
  type ValidationError,
  extractSummary,
  placeOrder,
  validateOrderRequest,
  validateSymbolOnExchange,
} from "../domains/order";
import type { Logger } from "../lib/logger";

/** Result of one command invocation, mapped to an exit code by the caller. */
export type CommandOutcome =
  | { kind: "success"; summary: OrderSummary }
  | { kind: "validation"; error: ValidationError }
  | { kind: "runtime"; error: SubmissionError | ConfigurationError }
  | { kind: "unexpected"; error: unknown };

export interface RunOrderDeps {
  /** Called once local validation has passed */
  getClient: () => FuturesExchangeClient;
  logger: Logger;
}

/**
 * Validate, check the symbol, submit and summarize a single order.
 *
 * Never throws: every failure is returned as an outcome.
 */
export const runOrderCommand = async (
  input: RawOrderInput,
  deps: RunOrderDeps,
): Promise<CommandOutcome> => {
  const { logger } = deps;

  try {
    const request = validateOrderRequest(input);
    if (!request.ok) {
      logger.warn("Order input rejected", { reason: request.error.message });
      return { kind: "validation", error: request.error };
    }

    const client = deps.getClient();

    const listed = await validateSymbolOnExchange(request.value.symbol, client, logger);
    if (!listed.ok) {
      logger.warn("Symbol check failed", { reason: listed.error.message });
      return { kind: "validation", error: listed.error };
    }

    const placed = await placeOrder(client, request.value, logger);
    if (!placed.ok) {
      return { kind: "runtime", error: placed.error };
    }

    return { kind: "success", summary: extractSummary(placed.value) };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("Exchange client configuration invalid", error);
      return { kind: "runtime", error };
    }
    logger.error("Unexpected failure", error instanceof Error ? error : undefined);
    return { kind: "unexpected", error };
  }
};
