import { describe, expect, it, vi } from "vitest";

import { ExchangeError } from "../../adapters/errors";
import type { FuturesExchangeClient, OrderPayload, OrderResponse } from "../../adapters/types";
import { SubmissionError } from "./errors";
import { buildOrderPayload, formatPrice, placeOrder } from "./submit";
import type { OrderRequest } from "./types";
import { validatePrice } from "./validators";

const MARKET_REQUEST: OrderRequest = {
  symbol: "BTCUSDT",
  side: "BUY",
  orderType: "MARKET",
  quantity: 0.001,
  price: undefined,
};

const LIMIT_REQUEST: OrderRequest = {
  symbol: "BTCUSDT",
  side: "SELL",
  orderType: "LIMIT",
  quantity: 0.5,
  price: 100.123456789,
};

const createFakeClient = (submit: (payload: OrderPayload) => Promise<OrderResponse>) => {
  const submitOrder = vi.fn(submit);
  const client: FuturesExchangeClient = {
    exchange: "fake",
    fetchExchangeInfo: vi.fn(async () => ({ symbols: [] })),
    submitOrder,
  };
  return { client, submitOrder };
};

describe("formatPrice", () => {
  it("should format with eight fractional digits", () => {
    expect(formatPrice(100.123456789)).toBe("100.12345679");
    expect(formatPrice(30000)).toBe("30000.00000000");
    expect(formatPrice(0.1)).toBe("0.10000000");
  });

  it("should round an exact tie to even", () => {
    expect(formatPrice(0.001953125)).toBe("0.00195312");
    expect(formatPrice(0.000000015)).toBe("0.00000002");
  });

  it("should never use exponent notation", () => {
    expect(formatPrice(1e21)).toBe("1000000000000000000000.00000000");
    expect(formatPrice(1e-9)).toBe("0.00000000");
  });

  it("should round down below the midpoint", () => {
    expect(formatPrice(1.000000004)).toBe("1.00000000");
  });
});

describe("buildOrderPayload", () => {
  it("should leave price and timeInForce out of MARKET orders", () => {
    expect(buildOrderPayload(MARKET_REQUEST)).toEqual({
      symbol: "BTCUSDT",
      side: "BUY",
      type: "MARKET",
      quantity: 0.001,
    });
    expect(buildOrderPayload(MARKET_REQUEST)).not.toHaveProperty("price");
  });

  it("should add GTC and a fixed-precision price to LIMIT orders", () => {
    expect(buildOrderPayload(LIMIT_REQUEST)).toEqual({
      symbol: "BTCUSDT",
      side: "SELL",
      type: "LIMIT",
      quantity: 0.5,
      timeInForce: "GTC",
      price: "100.12345679",
    });
  });

  it("should format a validated price of 1e21 as a plain decimal", () => {
    const price = validatePrice("1e21", true);
    expect(price).toEqual({ ok: true, value: 1e21 });

    const payload = buildOrderPayload({ ...LIMIT_REQUEST, price: price.ok ? price.value : 0 });

    expect(payload.price).toBe("1000000000000000000000.00000000");
  });
});

describe("placeOrder", () => {
  it("should submit once and return the raw response", async () => {
    const response = { orderId: 9, status: "NEW", clientOrderId: "abc" };
    const { client, submitOrder } = createFakeClient(async () => response);

    const result = await placeOrder(client, LIMIT_REQUEST);

    expect(result).toEqual({ ok: true, value: response });
    expect(submitOrder).toHaveBeenCalledTimes(1);
    expect(submitOrder).toHaveBeenCalledWith(buildOrderPayload(LIMIT_REQUEST));
  });

  it("should report order rejections", async () => {
    const cause = new ExchangeError(
      "Margin is insufficient. (code -2019)",
      "INSUFFICIENT_BALANCE",
      "fake",
    );
    const { client, submitOrder } = createFakeClient(async () => {
      throw cause;
    });

    const result = await placeOrder(client, MARKET_REQUEST);

    expect(submitOrder).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SubmissionError);
      expect(result.error.message).toBe(
        "Order rejected by exchange: Margin is insufficient. (code -2019)",
      );
      expect(result.error.cause).toBe(cause);
    }
  });

  it("should report other exchange errors as API errors", async () => {
    const { client } = createFakeClient(async () => {
      throw new ExchangeError("HTTP 503 from /fapi/v1/order", "UNKNOWN", "fake");
    });

    const result = await placeOrder(client, MARKET_REQUEST);

    expect(!result.ok && result.error.message).toBe(
      "Exchange API error: HTTP 503 from /fapi/v1/order",
    );
  });

  it("should wrap unexpected failures", async () => {
    const { client } = createFakeClient(async () => {
      throw new TypeError("socket hang up");
    });

    const result = await placeOrder(client, MARKET_REQUEST);

    expect(!result.ok && result.error.message).toBe(
      "Unexpected error while placing order: socket hang up",
    );
  });

  it("should wrap non-Error throwables", async () => {
    const { client } = createFakeClient(() => Promise.reject("boom"));

    const result = await placeOrder(client, MARKET_REQUEST);

    expect(!result.ok && result.error.message).toBe("Unexpected error while placing order: boom");
  });

  it("should log the request at debug level", async () => {
    const { client } = createFakeClient(async () => ({ orderId: 1 }));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await placeOrder(client, MARKET_REQUEST, logger);

    expect(logger.debug).toHaveBeenCalledWith("Order request params", {
      symbol: "BTCUSDT",
      side: "BUY",
      type: "MARKET",
      quantity: 0.001,
    });
  });
});
