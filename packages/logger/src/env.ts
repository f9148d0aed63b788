import {isLogLevel} from "@polylist/utils";
import {getEmptyLogger} from "./empty.js";
import {
  ChildLogger,
  LogFormat,
  LoggerOptions,
  LogLevel,
  TimestampFormat,
  isLogFormat,
  isTimestampFormatCode,
} from "./interface.js";
import {ConsoleTransport} from "./utils/consoleTransport.js";
import {createWinstonLogger} from "./winston.js";

export function getEnvLogLevel(): LogLevel | null {
  const level = process.env.LOG_LEVEL;
  if (level && isLogLevel(level)) return level;
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

export function getEnvLogFormat(): LogFormat | undefined {
  const format = process.env.LOG_FORMAT;
  return format && isLogFormat(format) ? format : undefined;
}

export function getEnvTimestampFormat(): TimestampFormat | undefined {
  const format = process.env.LOG_TIMESTAMP_FORMAT;
  return format && isTimestampFormatCode(format) ? {format} : undefined;
}

/**
 * Logger configured from `LOG_LEVEL`, `DEBUG`, `VERBOSE`, `LOG_FORMAT` and `LOG_TIMESTAMP_FORMAT`.
 * Explicit options take precedence. Without any level configured all logs are dropped.
 */
export function getEnvLogger(opts?: Partial<LoggerOptions>): ChildLogger {
  const level = opts?.level ?? getEnvLogLevel();
  const format = opts?.format ?? getEnvLogFormat();
  const timestampFormat = opts?.timestampFormat ?? getEnvTimestampFormat();

  if (level != null) {
    return createWinstonLogger({...opts, level, format, timestampFormat}, [new ConsoleTransport({level})]);
  }

  return getEmptyLogger();
}
