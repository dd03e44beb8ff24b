export { SubmissionError, ValidationError } from "./errors";
export { METADATA_UNAVAILABLE_MESSAGE, validateSymbolOnExchange } from "./exchange-check";
export { buildOrderPayload, formatPrice, PRICE_DECIMALS, placeOrder } from "./submit";
export { extractSummary } from "./summary";
export type { OrderRequest, OrderSummary, RawOrderInput } from "./types";
export {
  parseDecimal,
  SYMBOL_MAX_LENGTH,
  SYMBOL_MIN_LENGTH,
  validateOrderRequest,
  validateOrderType,
  validatePrice,
  validateQuantity,
  validateSide,
  validateSymbolFormat,
} from "./validators";
