/**
 * REST client for USDⓈ-M futures (testnet by default).
 *
 * Exposes the two capabilities the order command needs: exchange metadata and
 * order placement. No retries; every failure surfaces as an ExchangeError.
 */

import * as v from "valibot";

import { TESTNET_BASE_URL } from "../../lib/env/schema";
import { type Logger, silentLogger } from "../../lib/logger";
import { ConfigurationError, ExchangeError } from "../errors";
import {
  type ExchangeInfo,
  type FuturesExchangeClient,
  type OrderPayload,
  type OrderResponse,
  exchangeInfoSchema,
  orderResponseSchema,
} from "../types";
import { mapBinanceErrorCode } from "./error-codes";
import { BinanceErrorBodySchema } from "./schemas";
import { createBinanceSigner } from "./signer";

const EXCHANGE = "binance";

export const EXCHANGE_INFO_PATH = "/fapi/v1/exchangeInfo";
export const ORDER_PATH = "/fapi/v1/order";

export const DEFAULT_RECV_WINDOW_MS = 5000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

const positiveIntegerSchema = v.pipe(v.number(), v.integer(), v.minValue(1));

export const BinanceClientConfigSchema = v.object({
  baseUrl: v.optional(v.pipe(v.string(), v.url()), TESTNET_BASE_URL),
  apiKey: v.pipe(v.string(), v.minLength(1)),
  apiSecret: v.pipe(v.string(), v.minLength(1)),
  recvWindowMs: v.optional(positiveIntegerSchema, DEFAULT_RECV_WINDOW_MS),
  timeoutMs: v.optional(positiveIntegerSchema, DEFAULT_REQUEST_TIMEOUT_MS),
});

export type BinanceClientConfig = v.InferOutput<typeof BinanceClientConfigSchema>;

export const MISSING_CREDENTIALS_MESSAGE =
  "Missing API credentials. Please set BINANCE_API_KEY and BINANCE_API_SECRET in your environment or .env file.";

const CREDENTIAL_KEYS = new Set(["apiKey", "apiSecret"]);

/**
 * Validate raw client settings.
 *
 * @throws ConfigurationError when credentials are missing or a setting is invalid
 */
export const parseBinanceClientConfig = (config: unknown): BinanceClientConfig => {
  const result = v.safeParse(BinanceClientConfigSchema, config);
  if (result.success) {
    return result.output;
  }
  const keys = result.issues.map((issue) => v.getDotPath(issue) ?? "config");
  if (keys.some((key) => CREDENTIAL_KEYS.has(key))) {
    throw new ConfigurationError(MISSING_CREDENTIALS_MESSAGE);
  }
  throw new ConfigurationError(`Invalid exchange client configuration: ${keys.join(", ")}`);
};

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface BinanceClientDeps {
  fetch?: FetchLike;
  logger?: Logger;
  /** Clock for request timestamps */
  now?: () => number;
}

const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Create a futures REST client.
 *
 * @param config - Validated client settings (see parseBinanceClientConfig)
 * @param deps - Optional fetch implementation, logger and clock
 */
export const createBinanceFuturesClient = (
  config: BinanceClientConfig,
  deps: BinanceClientDeps = {},
): FuturesExchangeClient => {
  const fetchFn: FetchLike = deps.fetch ?? ((url, init) => fetch(url, init));
  const logger = deps.logger ?? silentLogger;
  const baseUrl = config.baseUrl.replace(/\/$/, "");
  const signer = createBinanceSigner({
    apiKey: config.apiKey,
    apiSecret: config.apiSecret,
    recvWindowMs: config.recvWindowMs,
    now: deps.now,
  });

  const request = async (endpoint: string, query: string, init: RequestInit): Promise<unknown> => {
    const url = `${baseUrl}${endpoint}${query ? `?${query}` : ""}`;
    logger.debug("Exchange request", { method: init.method, endpoint });

    let response: Response;
    let text: string;
    try {
      response = await fetchFn(url, { ...init, signal: AbortSignal.timeout(config.timeoutMs) });
      text = await response.text();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new ExchangeError(
          `Request to ${endpoint} timed out after ${config.timeoutMs}ms`,
          "TIMEOUT",
          EXCHANGE,
          error,
        );
      }
      throw new ExchangeError(
        `Request to ${endpoint} failed: ${describeError(error)}`,
        "NETWORK_ERROR",
        EXCHANGE,
        error,
      );
    }

    logger.debug("Exchange response", { endpoint, status: response.status });

    let body: unknown;
    try {
      body = text.length > 0 ? JSON.parse(text) : undefined;
    } catch (error) {
      if (response.ok) {
        throw new ExchangeError(
          `Malformed response from ${endpoint}`,
          "INVALID_RESPONSE",
          EXCHANGE,
          error,
        );
      }
      body = undefined;
    }

    if (!response.ok) {
      const parsed = v.safeParse(BinanceErrorBodySchema, body);
      if (parsed.success) {
        throw new ExchangeError(
          `${parsed.output.msg} (code ${parsed.output.code})`,
          mapBinanceErrorCode(response.status, parsed.output.code),
          EXCHANGE,
          body,
          parsed.output.code,
        );
      }
      throw new ExchangeError(
        `HTTP ${response.status} from ${endpoint}`,
        mapBinanceErrorCode(response.status),
        EXCHANGE,
        body,
      );
    }

    return body;
  };

  const parseBody = <TSchema extends v.GenericSchema>(
    schema: TSchema,
    body: unknown,
    endpoint: string,
  ): v.InferOutput<TSchema> => {
    const result = v.safeParse(schema, body);
    if (!result.success) {
      throw new ExchangeError(
        `Unexpected response from ${endpoint}`,
        "INVALID_RESPONSE",
        EXCHANGE,
        result.issues,
      );
    }
    return result.output;
  };

  return {
    exchange: EXCHANGE,

    fetchExchangeInfo: async (): Promise<ExchangeInfo> => {
      const body = await request(EXCHANGE_INFO_PATH, "", { method: "GET" });
      return parseBody(exchangeInfoSchema, body, EXCHANGE_INFO_PATH);
    },

    submitOrder: async (payload: OrderPayload): Promise<OrderResponse> => {
      const query = signer.buildSignedQuery({
        symbol: payload.symbol,
        side: payload.side,
        type: payload.type,
        quantity: payload.quantity,
        timeInForce: payload.timeInForce,
        price: payload.price,
      });
      const body = await request(ORDER_PATH, query, {
        method: "POST",
        headers: signer.headers(),
      });
      return parseBody(orderResponseSchema, body, ORDER_PATH);
    },
  };
};
