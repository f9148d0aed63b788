import Transport from "winston-transport";
import {LEVEL, LogLevel, MESSAGE, WinstonLogInfo} from "../interface.js";

type ConsoleMethod = "error" | "warn" | "info" | "log";

/**
 * Writes formatted log lines through the global `console`, picking the console method by level.
 * Level filtering is done by `TransportStream` against the level given on construction.
 */
export class ConsoleTransport extends Transport {
  name = "ConsoleTransport";

  private readonly methods: Record<LogLevel, ConsoleMethod> = {
    error: "error",
    warn: "warn",
    info: "info",
    verbose: "log",
    debug: "log",
    trace: "log",
  };

  constructor(opts: {level: LogLevel}) {
    super({level: opts.level});
  }

  log(info: WinstonLogInfo, callback: () => void): void {
    setImmediate(() => {
      this.emit("logged", info);
    });

    console[this.methods[info[LEVEL]]](info[MESSAGE]);

    callback();
  }
}
