export { StructuredLogger, type StructuredLoggerOptions, type ChildLogger } from "./structuredLogger";
export { createConsoleSink } from "./sinks/consoleSink";
export { createFileSink, type FileSinkOptions } from "./sinks/fileSink";
export type { LogSink } from "./sinks/types";
