import dotenv from "dotenv";
import * as v from "valibot";

import { type Env, envSchema } from "./schema";

export class EnvValidationError extends Error {
  public override readonly name = "EnvValidationError";

  constructor(public readonly issues: string[]) {
    super(`Environment variable validation failed: ${issues.join("; ")}`);
  }
}

/**
 * Load variables from a `.env` file in the working directory, if there is one.
 * Values already present in the environment win.
 */
export const loadEnvFile = (path?: string): void => {
  dotenv.config(path ? { path } : undefined);
};

export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (result.success) {
    return result.output;
  }
  throw new EnvValidationError(
    result.issues.map((issue) => `${v.getDotPath(issue) ?? "env"}: ${issue.message}`),
  );
};

// Re-export types
export type { Env } from "./schema";
