import { LogLevel, shouldLog, type StructuredLogEvent } from "@constant-synthesis/shared";
import type { LogSink } from "./types";

interface ConsoleSinkOptions {
  level: LogLevel;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/**
 * Writes each event as one JSON line. Warnings and above go to stderr so
 * they stay out of rendered reports on stdout.
 */
export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      const line = JSON.stringify(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(line);
          break;
        case LogLevel.INFO:
          consoleImpl.info(line);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(line);
          break;
        default:
          consoleImpl.error(line);
      }
    }
  };
}
