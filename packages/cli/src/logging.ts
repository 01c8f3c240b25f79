import { nanoid } from "nanoid";
import type { LogLevel } from "@constant-synthesis/shared";
import { StructuredLogger, createConsoleSink, createFileSink, type LogSink } from "@constant-synthesis/logger";

export interface CliLoggerOptions {
  level: LogLevel;
  outputDir?: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
  sessionId?: string;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function createCliLogger(options: CliLoggerOptions): StructuredLogger {
  const sessionId = options.sessionId ?? `synth-${nanoid(8)}`;
  const consoleImpl = options.consoleImpl ?? console;
  const sinks: LogSink[] = [createConsoleSink({ level: options.level, consoleImpl })];
  if (options.outputDir) {
    sinks.push(
      createFileSink({
        sessionId,
        level: options.level,
        outputDir: options.outputDir,
        maxFileSizeMb: options.maxFileSizeMb,
        maxFiles: options.maxFiles,
        onError: (message, error) => consoleImpl.warn(message, error)
      })
    );
  }
  return new StructuredLogger({
    sessionId,
    baseComponent: "cli",
    level: options.level,
    sinks,
    onSinkError: (sink, error) => consoleImpl.warn(`[structured-logger] sink ${sink} failed`, error)
  });
}
