/**
 * Futures exchange client contract and shared wire types.
 */

import * as v from "valibot";

export type OrderSide = "BUY" | "SELL";

export type OrderType = "MARKET" | "LIMIT";

export type TimeInForce = "GTC";

/** Parameters sent to the exchange for a new order. */
export interface OrderPayload {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  timeInForce?: TimeInForce;
  /** Decimal string, required for LIMIT orders */
  price?: string;
}

/** Exchange metadata; only the listed symbols matter here. */
export const exchangeInfoSchema = v.looseObject({
  symbols: v.optional(
    v.array(
      v.looseObject({
        symbol: v.string(),
        status: v.optional(v.string()),
      }),
    ),
  ),
});

export type ExchangeInfo = v.InferOutput<typeof exchangeInfoSchema>;

/**
 * Order placement response. Fields are optional because their presence depends on
 * the order type and state; unknown fields are kept.
 */
export const orderResponseSchema = v.looseObject({
  orderId: v.optional(v.union([v.number(), v.string()])),
  symbol: v.optional(v.string()),
  status: v.optional(v.string()),
  executedQty: v.optional(v.union([v.string(), v.number()])),
  avgPrice: v.optional(v.union([v.string(), v.number()])),
  price: v.optional(v.union([v.string(), v.number()])),
});

export type OrderResponse = v.InferOutput<typeof orderResponseSchema>;

export interface FuturesExchangeClient {
  /** Name used in errors and logs */
  readonly exchange: string;

  fetchExchangeInfo(): Promise<ExchangeInfo>;
  submitOrder(payload: OrderPayload): Promise<OrderResponse>;
}
