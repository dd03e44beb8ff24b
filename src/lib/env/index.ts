export { EnvValidationError, loadEnvFile, parseEnv, type Env } from "./env";
export { envSchema, TESTNET_BASE_URL } from "./schema";
