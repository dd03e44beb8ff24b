import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

export const TESTNET_BASE_URL = "https://testnet.binancefuture.com";

const integerString = (min: number, max: number) =>
  v.pipe(
    v.string(),
    v.transform(Number),
    v.number(),
    v.integer(),
    v.minValue(min),
    v.maxValue(max),
  );

export const envSchema = v.object({
  // Exchange credentials (checked when the client is built)
  BINANCE_API_KEY: v.optional(v.string()),
  BINANCE_API_SECRET: v.optional(v.string()),

  // Exchange endpoint
  BINANCE_FUTURES_BASE_URL: v.optional(v.pipe(v.string(), v.url()), TESTNET_BASE_URL),
  BINANCE_RECV_WINDOW_MS: v.optional(integerString(1, 60000), "5000"),
  REQUEST_TIMEOUT_MS: v.optional(integerString(1, Number.MAX_SAFE_INTEGER), "10000"),

  // Logging
  LOG_LEVEL: v.optional(logLevelSchema, "info"),
  LOG_FILE: v.optional(v.pipe(v.string(), v.minLength(1)), "logs/order-cli.log"),
});

export type Env = v.InferOutput<typeof envSchema>;
