import { createBinanceFuturesClient, parseBinanceClientConfig } from "../adapters/binance";
import type { FuturesExchangeClient } from "../adapters/types";
import { type AppConfig, createConfig } from "../lib/config";
import { EnvValidationError, loadEnvFile, parseEnv } from "../lib/env";
import { type LogSink, type Logger, createLogger, createRotatingLogStream } from "../lib/logger";
import { USAGE, parseCliArgs } from "./args";
import { renderOutcome } from "./output";
import { runOrderCommand } from "./run";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface LogFile {
  sink: LogSink;
  close: () => Promise<void>;
}

export interface MainDeps {
  /** Environment to read; when omitted, `.env` is loaded into process.env first */
  env?: Record<string, string | undefined>;
  io?: CliIo;
  createClient?: (config: AppConfig["exchange"], logger: Logger) => FuturesExchangeClient;
  /** `onError` is called once if the file fails after opening; writes stop from then on */
  openLogFile?: (path: string, onError: (error: Error) => void) => LogFile;
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

const openRotatingLogFile = (path: string, onError: (error: Error) => void): LogFile => {
  const stream = createRotatingLogStream({ path });
  let failed = false;
  stream.on("error", (error) => {
    if (!failed) {
      failed = true;
      onError(error);
    }
  });

  return {
    sink: {
      write: (line) => {
        if (!failed) {
          stream.write(line);
        }
      },
    },
    close: () =>
      new Promise<void>((resolve) => {
        if (stream.closed) {
          resolve();
          return;
        }
        stream.once("close", () => resolve());
        if (!stream.destroyed) {
          stream.end();
        }
      }),
  };
};

const createExchangeClient = (
  config: AppConfig["exchange"],
  logger: Logger,
): FuturesExchangeClient =>
  createBinanceFuturesClient(
    parseBinanceClientConfig({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      apiSecret: config.apiSecret,
      recvWindowMs: config.recvWindowMs,
      timeoutMs: config.timeoutMs,
    }),
    { logger },
  );

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Run the CLI once.
 *
 * @param argv - Arguments after the executable and script path
 * @returns The process exit code
 */
export const main = async (argv: string[], deps: MainDeps = {}): Promise<number> => {
  const io = deps.io ?? processIo;

  if (deps.env === undefined) {
    loadEnvFile();
  }

  let config: AppConfig;
  try {
    config = createConfig(parseEnv(deps.env ?? process.env));
  } catch (error) {
    if (error instanceof EnvValidationError) {
      io.stderr(`Error: ${error.message}\n`);
      return 1;
    }
    io.stderr(`Unexpected error: ${describeError(error)}\n`);
    return 1;
  }

  let logFile: LogFile | undefined;
  try {
    const consoleLogger = createLogger({ level: config.logging.level });
    logFile = (deps.openLogFile ?? openRotatingLogFile)(config.logging.file, (error) => {
      consoleLogger.warn("Log file unavailable, file logging disabled", {
        path: config.logging.file,
        reason: error.message,
      });
    });
    const logger = createLogger({
      level: config.logging.level,
      file: { sink: logFile.sink, level: "debug" },
    });

    const command = parseCliArgs(argv);
    if (!command.ok) {
      const rendered = renderOutcome({ kind: "validation", error: command.error });
      io.stderr(rendered.stderr ?? "");
      return rendered.exitCode;
    }

    if (command.value.kind === "help") {
      io.stdout(USAGE);
      return 0;
    }

    logger.debug("Order command invoked", { argv });

    const buildClient = deps.createClient ?? createExchangeClient;
    let client: FuturesExchangeClient | undefined;
    const getClient = (): FuturesExchangeClient => {
      client ??= buildClient(config.exchange, logger);
      return client;
    };

    const outcome = await runOrderCommand(command.value.input, { getClient, logger });
    const rendered = renderOutcome(outcome);
    if (rendered.stdout !== undefined) {
      io.stdout(rendered.stdout);
    }
    if (rendered.stderr !== undefined) {
      io.stderr(rendered.stderr);
    }
    return rendered.exitCode;
  } catch (error) {
    io.stderr(`Unexpected error: ${describeError(error)}\n`);
    return 1;
  } finally {
    await logFile?.close();
  }
};
