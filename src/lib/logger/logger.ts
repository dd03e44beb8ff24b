import {
  type WriteStream,
  createWriteStream,
  existsSync,
  mkdirSync,
  renameSync,
  rmSync,
  statSync,
} from "node:fs";
import { dirname } from "node:path";

import type { LogLevel } from "./schema";

/** Anything that accepts whole log lines, e.g. a file WriteStream. */
export interface LogSink {
  write: (line: string) => unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Optional secondary sink receiving JSON lines at its own level. */
  file?: {
    sink: LogSink;
    level: LogLevel;
  };
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean => {
  const levelValue = logLevels[level];
  const currentLevelValue = logLevels[currentLevel];
  return levelValue >= currentLevelValue;
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
  return entry;
};

const formatConsoleLine = (entry: LogEntry): string =>
  `${entry.timestamp} | ${entry.level.toUpperCase()} | ${entry.message}${
    entry.context ? ` ${JSON.stringify(entry.context)}` : ""
  }${entry.error ? ` (${entry.error.name}: ${entry.error.message})` : ""}`;

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

export const createLogger = (loggerConfig: LoggerConfig = { level: "info" }): Logger => {
  const emit = (entry: LogEntry): void => {
    // stdout is reserved for command output
    if (shouldLog(entry.level, loggerConfig.level)) {
      console.error(formatConsoleLine(entry));
    }
    if (loggerConfig.file && shouldLog(entry.level, loggerConfig.file.level)) {
      loggerConfig.file.sink.write(`${JSON.stringify(entry)}\n`);
    }
  };

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      emit(createLogEntry("debug", message, context));
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      emit(createLogEntry("info", message, context));
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      emit(createLogEntry("warn", message, context));
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      emit(createLogEntry("error", message, context, error));
    },
  };
};

/** Logger that drops everything. Useful as a default dependency. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

// Log rotation utility
export interface RotatingLogStreamConfig {
  path: string;
  maxBytes?: number;
  maxFiles?: number;
}

export const DEFAULT_LOG_MAX_BYTES = 2 * 1024 * 1024;
export const DEFAULT_LOG_MAX_FILES = 5;

/**
 * Shift `path` to `path.1`, `path.1` to `path.2` and so on, dropping the oldest.
 */
export const rotateLogFiles = (path: string, maxFiles: number): void => {
  const oldest = `${path}.${maxFiles}`;
  if (existsSync(oldest)) {
    rmSync(oldest);
  }
  for (let index = maxFiles - 1; index >= 1; index--) {
    const source = `${path}.${index}`;
    if (existsSync(source)) {
      renameSync(source, `${path}.${index + 1}`);
    }
  }
  renameSync(path, `${path}.1`);
};

/**
 * Open the log file for appending, rotating it first once it has reached `maxBytes`.
 *
 * Rotation happens on open only; a single CLI run never grows the file by much.
 */
export const createRotatingLogStream = (config: RotatingLogStreamConfig): WriteStream => {
  const { path, maxBytes = DEFAULT_LOG_MAX_BYTES, maxFiles = DEFAULT_LOG_MAX_FILES } = config;
  const logDir = dirname(path);

  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  if (existsSync(path) && statSync(path).size >= maxBytes) {
    rotateLogFiles(path, maxFiles);
  }

  return createWriteStream(path, { flags: "a", encoding: "utf8" });
};
