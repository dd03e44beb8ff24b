import type { ExchangeErrorCode } from "../errors";

const AUTHENTICATION_CODES = new Set([-1002, -1022, -2014, -2015]);
const RATE_LIMIT_CODES = new Set([-1003, -1015]);
const BALANCE_CODES = new Set([-2018, -2019]);
const ORDER_REJECTION_CODES = new Set([
  -2010, -2020, -2021, -2022, -2023, -2024, -2025, -2026, -2027,
]);

const isParameterError = (code: number): boolean => code <= -1100 && code >= -1199;

const isOrderFilterError = (code: number): boolean => code <= -4000 && code >= -4999;

/**
 * Map an HTTP status and optional exchange error code to an ExchangeErrorCode.
 *
 * @see https://developers.binance.com/docs/derivatives/usds-margined-futures/error-code
 */
export const mapBinanceErrorCode = (httpStatus: number, code?: number): ExchangeErrorCode => {
  if (httpStatus === 429 || httpStatus === 418) {
    return "RATE_LIMITED";
  }
  if (code === undefined) {
    return httpStatus === 401 || httpStatus === 403 ? "AUTHENTICATION_FAILED" : "UNKNOWN";
  }
  if (AUTHENTICATION_CODES.has(code)) {
    return "AUTHENTICATION_FAILED";
  }
  if (RATE_LIMIT_CODES.has(code)) {
    return "RATE_LIMITED";
  }
  if (BALANCE_CODES.has(code)) {
    return "INSUFFICIENT_BALANCE";
  }
  if (ORDER_REJECTION_CODES.has(code) || isParameterError(code) || isOrderFilterError(code)) {
    return "INVALID_ORDER";
  }
  return "UNKNOWN";
};
