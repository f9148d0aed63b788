import {PolylistError} from "./errors.js";
import {isPlainObject, mapValues} from "./objects.js";

export type Json = string | number | boolean | null | undefined | Json[] | {[key: string]: Json};

/**
 * Renders any log Context to JSON up to one level of depth.
 *
 * By limiting recursiveness, it renders limited content while ensuring safer logging.
 * Consumers of the logger should ensure to send pre-formated data if they require nesting.
 */
export function logCtxToJson(arg: unknown, depth = 0, fromError = false): Json {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return null;

      // For any type that may include recursiveness break early at the first level
      if (depth > 0 && !fromError) {
        return "[object]";
      }

      if (arg instanceof Error) {
        let metadata: Record<string, Json>;
        if (arg instanceof PolylistError) {
          if (fromError) {
            return "[PolylistErrorCircular]";
          }
          metadata = mapValues(arg.getMetadata(), (value) => logCtxToJson(value, depth + 1, true));
        } else {
          metadata = {message: arg.message};
        }
        if (arg.stack) metadata.stack = arg.stack;
        return metadata;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToJson(item, depth + 1, fromError));
      }

      if (isPlainObject(arg)) {
        return mapValues(arg, (item) => logCtxToJson(item, depth + 1, fromError));
      }

      return String(arg);
    }

    case "number":
    case "string":
    case "boolean":
      return arg;

    default:
      return undefined;
  }
}

/**
 * Renders any log Context to a string up to one level of depth.
 *
 * ```
 * logCtxToString({index: 5, length: 3}) // "index=5, length=3"
 * ```
 */
export function logCtxToString(arg: unknown, depth = 0, fromError = false): string {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (depth > 0 && !fromError) {
        return "[object]";
      }

      if (arg instanceof Error) {
        let metadata: string;
        if (arg instanceof PolylistError) {
          if (fromError) {
            return "[PolylistErrorCircular]";
          }
          metadata = logCtxToString(arg.getMetadata(), depth + 1, true);
        } else {
          metadata = arg.message;
        }
        return arg.stack ? `${metadata}\n${arg.stack}` : metadata;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToString(item, depth + 1, fromError)).join(", ");
      }

      return Object.entries(arg)
        .map(([key, value]) => `${key}=${logCtxToString(value, depth + 1, fromError)}`)
        .join(", ");
    }

    default:
      return String(arg);
  }
}
