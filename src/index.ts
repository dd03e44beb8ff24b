/**
 * Futures testnet order CLI
 *
 * Entry point: places one order from command-line flags and prints its summary.
 */

import { main } from "./cli";

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("Unhandled error:", error);
    process.exitCode = 1;
  });
