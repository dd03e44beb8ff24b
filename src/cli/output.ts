import type { OrderSummary } from "../domains/order/types";
import type { CommandOutcome } from "./run";

export interface RenderedOutcome {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

const display = (value: number | string | undefined): string =>
  value === undefined ? "N/A" : String(value);

export const formatSummary = (summary: OrderSummary): string =>
  [
    "",
    "=== Order Summary ===",
    `Order ID    : ${display(summary.orderId)}`,
    `Status      : ${display(summary.status)}`,
    `Executed Qty: ${display(summary.executedQty)}`,
    `Avg Price   : ${display(summary.avgPrice)}`,
    "=====================",
    "",
    "",
  ].join("\n");

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Map an outcome to process output. Every failure kind exits with 1 and is told apart
 * only by its prefix.
 */
export const renderOutcome = (outcome: CommandOutcome): RenderedOutcome => {
  switch (outcome.kind) {
    case "success":
      return { exitCode: 0, stdout: formatSummary(outcome.summary) };
    case "validation":
      return { exitCode: 1, stderr: `Input error: ${outcome.error.message}\n` };
    case "runtime":
      return { exitCode: 1, stderr: `Error: ${outcome.error.message}\n` };
    case "unexpected":
      return { exitCode: 1, stderr: `Unexpected error: ${messageOf(outcome.error)}\n` };
  }
};
