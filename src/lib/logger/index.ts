export {
  createLogger,
  createRotatingLogStream,
  DEFAULT_LOG_MAX_BYTES,
  DEFAULT_LOG_MAX_FILES,
  rotateLogFiles,
  silentLogger,
  type Logger,
  type LoggerConfig,
  type LogSink,
  type RotatingLogStreamConfig,
} from "./logger";

export { logLevelSchema, type LogLevel } from "./schema";
