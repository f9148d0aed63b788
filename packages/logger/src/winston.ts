import winston from "winston";
import type {Logger as Winston} from "winston";
import {ChildLogger, LogData, LoggerChildOpts, LoggerOptions, LogLevel, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

// Log level is meant to be configured BY TRANSPORT only. Winston's TransportStream compares its own
// level against `info[LEVEL]` using the levels of the parent logger (`logLevelNum` below) before
// formatting, so transports must be created with the desired level.

interface DefaultMeta {
  module: string;
}

export function createWinstonLogger(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
  return WinstonLogger.fromOpts(options, transports);
}

export class WinstonLogger implements ChildLogger {
  constructor(private readonly winston: Winston) {}

  static fromOpts(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
    const defaultMeta: DefaultMeta = {module: options.module || ""};

    return new WinstonLogger(
      winston.createLogger({
        level: options.level,
        defaultMeta,
        format: getFormat(options),
        transports,
        exitOnError: false,
        levels: logLevelNum,
      })
    );
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  child(options: LoggerChildOpts): WinstonLogger {
    const parentModule = this.getModule();
    const childModule = [parentModule, options.module].filter(Boolean).join("/");
    const defaultMeta: DefaultMeta = {module: childModule};

    // winston's own `.child` merges info objects with the parent taking precedence, so a child could
    // never overwrite `module`. Clone the instance instead and replace defaultMeta completely.
    const childWinston: Winston = Object.create(this.winston);
    childWinston.defaultMeta = defaultMeta;

    return new WinstonLogger(childWinston);
  }

  private getModule(): string {
    const meta: unknown = this.winston.defaultMeta;
    if (typeof meta === "object" && meta !== null && "module" in meta && typeof meta.module === "string") {
      return meta.module;
    }
    return "";
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Calling `winston.info(message, context, error)` would trigger the "splat" path, while the custom
    // formatter only needs the fields forwarded as they are.
    this.winston.log(level, {message, context, error});
  }
}
