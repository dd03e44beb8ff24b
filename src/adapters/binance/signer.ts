/**
 * HMAC-SHA256 request signing for authenticated futures endpoints.
 *
 * Signed requests carry `timestamp`, `recvWindow` and a `signature` over the exact
 * query string that is sent, plus the `X-MBX-APIKEY` header.
 */

import { createHmac } from "node:crypto";

export type QueryValue = string | number | boolean | undefined | null;

export interface BinanceSignerConfig {
  apiKey: string;
  apiSecret: string;
  recvWindowMs: number;
  /** Clock used for the `timestamp` parameter */
  now?: () => number;
}

export interface BinanceSigner {
  buildQueryString: (params: Record<string, QueryValue>) => string;
  sign: (queryString: string) => string;
  buildSignedQuery: (params: Record<string, QueryValue>) => string;
  headers: () => Record<string, string>;
}

/** Serialize params in insertion order, skipping undefined/null values. */
export const buildQueryString = (params: Record<string, QueryValue>): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      search.append(key, String(value));
    }
  }
  return search.toString();
};

export const createBinanceSigner = (config: BinanceSignerConfig): BinanceSigner => {
  const now = config.now ?? Date.now;

  const sign = (queryString: string): string =>
    createHmac("sha256", config.apiSecret).update(queryString).digest("hex");

  return {
    buildQueryString,
    sign,

    buildSignedQuery: (params) => {
      const queryString = buildQueryString({
        ...params,
        timestamp: now(),
        recvWindow: config.recvWindowMs,
      });
      return `${queryString}&signature=${sign(queryString)}`;
    },

    headers: () => ({
      "X-MBX-APIKEY": config.apiKey,
      "Content-Type": "application/x-www-form-urlencoded",
    }),
  };
};
