import type { OrderSide, OrderType } from "../../adapters/types";

/** Validated, normalized order parameters for a single invocation. */
export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  orderType: OrderType;
  quantity: number;
  /** Present exactly when orderType is LIMIT */
  price: number | undefined;
}

/** Order parameters as received from the command line. */
export interface RawOrderInput {
  symbol?: unknown;
  side?: unknown;
  orderType?: unknown;
  quantity?: unknown;
  price?: unknown;
}

export interface OrderSummary {
  readonly orderId: number | string | undefined;
  readonly status: string | undefined;
  readonly executedQty: string | undefined;
  readonly avgPrice: string;
}
