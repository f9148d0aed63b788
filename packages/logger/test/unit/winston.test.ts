import {describe, it, expect, afterEach, vi} from "vitest";
import {LogLevel, TimestampFormatCode, createWinstonLogger, ConsoleTransport} from "../../src/index.js";
import {stubConsole} from "../utils/console.js";

describe("winston logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function getLogger(level: LogLevel, module: string): ReturnType<typeof createWinstonLogger> {
    return createWinstonLogger({level, module, timestampFormat: {format: TimestampFormatCode.Hidden}}, [
      new ConsoleTransport({level}),
    ]);
  }

  describe("child logger", () => {
    it("should join child modules", async () => {
      const stubs = stubConsole();
      const loggerA = getLogger(LogLevel.info, "a");
      const loggerAB = loggerA.child({module: "b"});

      loggerA.info("test a");
      loggerAB.info("test a/b");

      await vi.waitFor(() => expect(stubs.info).toHaveBeenCalledTimes(2));
      expect(stubs.info).toHaveBeenNthCalledWith(1, "[a]                \u001b[32minfo\u001b[39m: test a");
      expect(stubs.info).toHaveBeenNthCalledWith(2, "[a/b]              \u001b[32minfo\u001b[39m: test a/b");
    });

    it("should not prefix a slash to a child of a root logger", async () => {
      const stubs = stubConsole();
      const logger = getLogger(LogLevel.info, "").child({module: "list"});

      logger.warn("test");

      await vi.waitFor(() => expect(stubs.warn).toHaveBeenCalledTimes(1));
      expect(stubs.warn).toHaveBeenCalledWith("[list]             \u001b[33mwarn\u001b[39m: test");
    });
  });

  describe("levels", () => {
    it("should expose a handler for every Logger level only", () => {
      const logger = getLogger(LogLevel.info, "a");
      const handlers = [LogLevel.error, LogLevel.warn, LogLevel.info, LogLevel.verbose, LogLevel.debug] as const;

      for (const level of handlers) {
        expect(typeof logger[level]).toBe("function");
      }
      expect("trace" in logger).toBe(false);
    });

    it("should drop logs above the transport level", async () => {
      const stubs = stubConsole();
      const logger = getLogger(LogLevel.info, "a");

      logger.debug("hidden");
      logger.verbose("hidden");
      logger.error("shown");

      await vi.waitFor(() => expect(stubs.error).toHaveBeenCalledTimes(1));
      expect(stubs.log).not.toHaveBeenCalled();
    });

    it("should route debug logs to console.log", async () => {
      const stubs = stubConsole();
      const logger = getLogger(LogLevel.debug, "a");

      logger.debug("shown");

      await vi.waitFor(() => expect(stubs.log).toHaveBeenCalledTimes(1));
      expect(stubs.log).toHaveBeenCalledWith("[a]               \u001b[34mdebug\u001b[39m: shown");
    });
  });
});
