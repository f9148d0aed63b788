import winston, {format} from "winston";
import {PolylistError, isEmptyObject, logCtxToJson, logCtxToString} from "@polylist/utils";
import {LoggerOptions, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

// Shape of the info object produced by `WinstonLogger`, fields other than level and message are not typed by logform
type WinstonInfoArg = {
  level: string;
  message: unknown;
  [key: string]: unknown;
};

const PADDING_BETWEEN_INFO = 30;

export function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);
    case "human":
    default:
      return humanReadableLogFormat(opts);
  }
}

function humanReadableLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden
      ? []
      : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})]),
    format.colorize(),
    format.printf(humanReadableTemplateFn)
  );
}

function jsonLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden ? [] : [format.timestamp()]),
    format((info) => {
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return info;
    })(),
    format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(info: WinstonInfoArg): string {
  const infoString = typeof info.module === "string" ? info.module : "";
  const infoPad = PADDING_BETWEEN_INFO - infoString.length;

  let str = "";

  if (typeof info.timestamp === "string") str += info.timestamp;

  str += `[${infoString}] ${info.level.padStart(infoPad)}: ${String(info.message)}`;

  if (info.context !== undefined && !isEmptyObject(info.context)) str += " " + logCtxToString(info.context);
  if (info.error !== undefined) {
    str +=
      // PolylistError is formatted in the same way as context, it is either appended to
      // the log message (" ") or extends existing context properties (", "). For any other
      // error, the message is printed out and clearly separated from the log message (" - ").
      (info.error instanceof PolylistError ? (isEmptyObject(info.context) ? " " : ", ") : " - ") +
      logCtxToString(info.error);
  }

  return str;
}
