/**
 * Valibot schemas for futures REST error bodies.
 *
 * Success bodies are validated against the shared schemas in `../types`.
 */

import * as v from "valibot";

export const BinanceErrorBodySchema = v.object({
  code: v.number(),
  msg: v.string(),
});
