import {LEVEL, MESSAGE} from "triple-beam";
import {LogLevel, Logger, LogHandler, LogData} from "@polylist/utils";

export {LogLevel, LEVEL, MESSAGE};
export type {Logger, LogHandler, LogData};

export const logLevelNum: {[K in LogLevel]: number} = {
  [LogLevel.error]: 0,
  [LogLevel.warn]: 1,
  [LogLevel.info]: 2,
  [LogLevel.verbose]: 3,
  [LogLevel.debug]: 4,
  [LogLevel.trace]: 5,
};

export type LogFormat = "human" | "json";
export const logFormats: LogFormat[] = ["human", "json"];

export function isLogFormat(value: string): value is LogFormat {
  return logFormats.some((format) => format === value);
}

export enum TimestampFormatCode {
  DateRegular = "regular",
  Hidden = "hidden",
}
export type TimestampFormat = {format: TimestampFormatCode};

export function isTimestampFormatCode(value: string): value is TimestampFormatCode {
  return Object.values(TimestampFormatCode).some((code) => code === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  format?: LogFormat;
  timestampFormat?: TimestampFormat;
}

export type LoggerChildOpts = {
  module: string;
};

export type ChildLogger = Logger & {
  child(opts: LoggerChildOpts): ChildLogger;
};

export interface WinstonLogInfo {
  module: string;
  [LEVEL]: LogLevel;
  [MESSAGE]: string;
}
