import {ChildLogger} from "./interface.js";

export function getEmptyLogger(): ChildLogger {
  const logger: ChildLogger = {
    error: function error(): void {
      // Do nothing
    },
    warn: function warn(): void {
      // Do nothing
    },
    info: function info(): void {
      // Do nothing
    },
    verbose: function verbose(): void {
      // Do nothing
    },
    debug: function debug(): void {
      // Do nothing
    },
    child: function child(): ChildLogger {
      return logger;
    },
  };
  return logger;
}
