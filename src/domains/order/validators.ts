/**
 * Local (syntactic) order input validation.
 *
 * Every validator takes raw, possibly untyped input and returns either the normalized
 * value or a ValidationError. None of them touch the network; the exchange listing
 * check lives in exchange-check.ts and runs only after these pass.
 */

import * as v from "valibot";

import type { OrderSide, OrderType } from "../../adapters/types";
import { type Result, err, ok } from "../../lib/result";
import { ValidationError } from "./errors";
import type { OrderRequest, RawOrderInput } from "./types";

export const SYMBOL_MIN_LENGTH = 6;
export const SYMBOL_MAX_LENGTH = 20;

const symbolSchema = v.pipe(
  v.string("Symbol must be a non-empty string."),
  v.nonEmpty("Symbol must be a non-empty string."),
  v.trim(),
  v.toUpperCase(),
  v.minLength(SYMBOL_MIN_LENGTH, "Symbol length looks invalid (expected something like BTCUSDT)."),
  v.maxLength(SYMBOL_MAX_LENGTH, "Symbol length looks invalid (expected something like BTCUSDT)."),
  v.regex(/^[A-Z0-9]+$/, "Symbol must be alphanumeric (e.g. BTCUSDT)."),
);

const sideSchema = v.pipe(
  v.string("Side must be either BUY or SELL."),
  v.trim(),
  v.toUpperCase(),
  v.picklist(["BUY", "SELL"] as const, "Side must be either BUY or SELL."),
);

const orderTypeSchema = v.pipe(
  v.string("Order type must be either MARKET or LIMIT."),
  v.trim(),
  v.toUpperCase(),
  v.picklist(["MARKET", "LIMIT"] as const, "Order type must be either MARKET or LIMIT."),
);

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const invalid = (message: string): { ok: false; error: ValidationError } =>
  err(new ValidationError(message));

const isAbsent = (raw: unknown): raw is undefined | null => raw === undefined || raw === null;

const parseWith = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  raw: unknown,
): Result<v.InferOutput<TSchema>, ValidationError> => {
  const result = v.safeParse(schema, raw);
  if (result.success) {
    return ok(result.output);
  }
  const [issue] = result.issues;
  return invalid(issue.message);
};

/**
 * Parse a finite decimal from a number or a plain decimal string.
 * Hex, empty and non-finite inputs are rejected.
 */
export const parseDecimal = (raw: unknown): number | undefined => {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
};

/**
 * Symbol format check (e.g. BTCUSDT). Listing on the exchange is checked separately.
 */
export const validateSymbolFormat = (raw: unknown): Result<string, ValidationError> =>
  parseWith(symbolSchema, raw);

export const validateSide = (raw: unknown): Result<OrderSide, ValidationError> => {
  if (isAbsent(raw) || raw === "") {
    return invalid("Side is required (BUY or SELL).");
  }
  return parseWith(sideSchema, raw);
};

export const validateOrderType = (raw: unknown): Result<OrderType, ValidationError> => {
  if (isAbsent(raw) || raw === "") {
    return invalid("Order type is required (MARKET or LIMIT).");
  }
  return parseWith(orderTypeSchema, raw);
};

export const validateQuantity = (raw: unknown): Result<number, ValidationError> => {
  const quantity = parseDecimal(raw);
  if (quantity === undefined) {
    return invalid("Quantity must be a number.");
  }
  if (quantity <= 0) {
    return invalid("Quantity must be greater than zero.");
  }
  return ok(quantity);
};

/**
 * LIMIT orders need a positive price; MARKET orders must not carry one at all.
 *
 * @param required - Whether the order type takes a price
 * @returns The parsed price, or undefined when none is allowed
 */
export const validatePrice = (
  raw: unknown,
  required: boolean,
): Result<number | undefined, ValidationError> => {
  if (!required) {
    return isAbsent(raw) ? ok(undefined) : invalid("Price must not be provided for MARKET orders.");
  }
  if (isAbsent(raw)) {
    return invalid("Price is required for LIMIT orders.");
  }
  const price = parseDecimal(raw);
  if (price === undefined) {
    return invalid("Price must be a number.");
  }
  if (price <= 0) {
    return invalid("Price must be greater than zero.");
  }
  return ok(price);
};

/**
 * Run all local checks in order and stop at the first failure.
 */
export const validateOrderRequest = (
  input: RawOrderInput,
): Result<OrderRequest, ValidationError> => {
  const symbol = validateSymbolFormat(input.symbol);
  if (!symbol.ok) {
    return symbol;
  }

  const side = validateSide(input.side);
  if (!side.ok) {
    return side;
  }

  const orderType = validateOrderType(input.orderType);
  if (!orderType.ok) {
    return orderType;
  }

  const quantity = validateQuantity(input.quantity);
  if (!quantity.ok) {
    return quantity;
  }

  const price = validatePrice(input.price, orderType.value === "LIMIT");
  if (!price.ok) {
    return price;
  }

  return ok({
    symbol: symbol.value,
    side: side.value,
    orderType: orderType.value,
    quantity: quantity.value,
    price: price.value,
  });
};
