import type { Env } from "./env";
import type { LogLevel } from "./logger";

export interface AppConfig {
  exchange: {
    baseUrl: string;
    apiKey: string | undefined;
    apiSecret: string | undefined;
    recvWindowMs: number;
    timeoutMs: number;
  };
  logging: {
    level: LogLevel;
    file: string;
  };
}

export const createConfig = (env: Env): AppConfig => ({
  exchange: {
    baseUrl: env.BINANCE_FUTURES_BASE_URL,
    apiKey: env.BINANCE_API_KEY,
    apiSecret: env.BINANCE_API_SECRET,
    recvWindowMs: env.BINANCE_RECV_WINDOW_MS,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  },
  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
});
