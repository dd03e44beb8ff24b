import type { OrderResponse } from "../../adapters/types";
import type { OrderSummary } from "./types";

type Wire = string | number | undefined;

const isPresent = (value: Wire): value is string | number => value !== undefined && value !== "";

const asText = (value: Wire): string | undefined =>
  value === undefined ? undefined : String(value);

/**
 * Reduce an order response to the four fields shown to the user.
 *
 * Newly placed or unfilled orders may report no average price, so `avgPrice` falls
 * back to the order price and then to "0". Numeric quantities and prices are rendered
 * as strings; missing keys pass through as undefined.
 */
export const extractSummary = (response: OrderResponse): OrderSummary => {
  let avgPrice = "0";
  if (isPresent(response.avgPrice)) {
    avgPrice = String(response.avgPrice);
  } else if (isPresent(response.price)) {
    avgPrice = String(response.price);
  }

  return {
    orderId: response.orderId,
    status: response.status,
    executedQty: asText(response.executedQty),
    avgPrice,
  };
};
