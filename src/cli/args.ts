import { parseArgs } from "node:util";

import { ValidationError } from "../domains/order/errors";
import type { RawOrderInput } from "../domains/order/types";
import { type Result, err, ok } from "../lib/result";

export const USAGE = `Usage: futures-order --symbol <SYMBOL> --side <BUY|SELL> --type <MARKET|LIMIT> --quantity <QTY> [--price <PRICE>]

Place a single order on the futures testnet.

Options:
  --symbol <SYMBOL>    Trading symbol (e.g. BTCUSDT)
  --side <SIDE>        Order side: BUY or SELL
  --type <TYPE>        Order type: MARKET or LIMIT
  --quantity <QTY>     Order quantity (e.g. 0.001)
  --price <PRICE>      Price for LIMIT orders (not allowed for MARKET)
  -h, --help           Show this help
`;

const OPTIONS = {
  symbol: { type: "string" },
  side: { type: "string" },
  type: { type: "string" },
  quantity: { type: "string" },
  price: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

const REQUIRED_OPTIONS = ["symbol", "side", "type", "quantity"] as const;

export type CliCommand = { kind: "help" } | { kind: "order"; input: RawOrderInput };

const VALUE_FLAGS = new Set(["--symbol", "--side", "--type", "--quantity", "--price"]);

const NEGATIVE_NUMBER = /^-(\d|\.\d)/;

/**
 * Attach negative numbers to the flag before them (`--quantity -1` → `--quantity=-1`),
 * which strict parsing would otherwise reject as an ambiguous option.
 */
const joinNegativeValues = (argv: string[]): string[] => {
  const joined: string[] = [];
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    const next = argv[index + 1];
    if (VALUE_FLAGS.has(arg) && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      joined.push(`${arg}=${next}`);
      index++;
    } else {
      joined.push(arg);
    }
  }
  return joined;
};

const parse = (argv: string[]) =>
  parseArgs({
    args: joinNegativeValues(argv),
    options: OPTIONS,
    strict: true,
    allowPositionals: false,
  });

/**
 * Parse command-line flags. Malformed invocations are input errors like any other.
 */
export const parseCliArgs = (argv: string[]): Result<CliCommand, ValidationError> => {
  let values: ReturnType<typeof parse>["values"];
  try {
    ({ values } = parse(argv));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ValidationError(message, error));
  }

  if (values.help) {
    return ok({ kind: "help" });
  }

  const missing = REQUIRED_OPTIONS.filter((name) => values[name] === undefined);
  if (missing.length > 0) {
    return err(
      new ValidationError(
        `Missing required arguments: ${missing.map((name) => `--${name}`).join(", ")}`,
      ),
    );
  }

  return ok({
    kind: "order",
    input: {
      symbol: values.symbol,
      side: values.side,
      orderType: values.type,
      quantity: values.quantity,
      price: values.price,
    },
  });
};
