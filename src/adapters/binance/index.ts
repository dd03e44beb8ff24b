export {
  BinanceClientConfigSchema,
  createBinanceFuturesClient,
  DEFAULT_RECV_WINDOW_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  EXCHANGE_INFO_PATH,
  MISSING_CREDENTIALS_MESSAGE,
  ORDER_PATH,
  parseBinanceClientConfig,
  type BinanceClientConfig,
  type BinanceClientDeps,
  type FetchLike,
} from "./client";
export { mapBinanceErrorCode } from "./error-codes";
export { buildQueryString, createBinanceSigner, type BinanceSigner } from "./signer";
