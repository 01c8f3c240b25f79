import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { LogLevel, type StructuredLogEvent } from "@constant-synthesis/shared";
import { StructuredLogger } from "../src/structuredLogger";
import type { LogSink } from "../src/sinks/types";
import { createFileSink } from "../src/sinks/fileSink";
import { createConsoleSink } from "../src/sinks/consoleSink";

function memorySink(received: StructuredLogEvent[]): LogSink {
  return {
    name: "memory",
    level: LogLevel.DEBUG,
    publish: async event => {
      received.push(event);
    }
  };
}

describe("StructuredLogger", () => {
  it("filters logs below minimum level and merges child context", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-1",
      baseComponent: "root",
      level: LogLevel.INFO,
      sinks: [memorySink(received)]
    });

    logger.log(LogLevel.DEBUG, "ignore");
    logger.log(LogLevel.ERROR, "root-event", { root: true });
    const child = logger.child("sink", { ledger: "demo" });
    child.log(LogLevel.INFO, "budget-drained", { residual: 0.5 });

    await logger.flushOutstanding();

    expect(received).toHaveLength(2);
    expect(received[0].event).toBe("root-event");
    expect(received[0].component).toBe("root");
    expect(received[1].component).toBe("sink");
    expect(received[1].payload?.ledger).toBe("demo");
    expect(received[1].payload?.residual).toBe(0.5);
  });

  it("nests child components and keeps outer context", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-2",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)],
      defaultContext: { run: 7 }
    });

    logger.child("synth", { stage: "alpha" }).child("policy").log(LogLevel.DEBUG, "selected", { name: "cosine" });
    await logger.flushOutstanding();

    expect(received).toHaveLength(1);
    expect(received[0].component).toBe("policy");
    expect(received[0].payload).toEqual({ run: 7, stage: "alpha", name: "cosine" });
  });

  it("adds dedup keys when dedup parts are given", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-3",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)]
    });

    logger.log(LogLevel.INFO, "a", {}, { dedupParts: ["x", 1] });
    logger.log(LogLevel.INFO, "b", {}, { dedupParts: ["x", 1, null] });
    await logger.flushOutstanding();

    expect(received[0].dedupKey).toHaveLength(40);
    expect(received[0].dedupKey).toBe(received[1].dedupKey);
  });

  it("reports sink failures without stopping other sinks", async () => {
    const received: StructuredLogEvent[] = [];
    const onSinkError = vi.fn();
    const failing: LogSink = {
      name: "broken",
      level: LogLevel.DEBUG,
      publish: async () => {
        throw new Error("disk full");
      }
    };
    const logger = new StructuredLogger({
      sessionId: "session-4",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [failing, memorySink(received)],
      onSinkError
    });

    logger.log(LogLevel.WARN, "still-delivered");
    await logger.flushOutstanding();

    expect(received).toHaveLength(1);
    expect(onSinkError).toHaveBeenCalledTimes(1);
    expect(onSinkError.mock.calls[0][0]).toBe("broken");
  });

  it("ignores events after stop", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-5",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)]
    });

    logger.log(LogLevel.INFO, "before");
    await logger.stop();
    logger.log(LogLevel.INFO, "after");
    await logger.flushOutstanding();

    expect(received.map(event => event.event)).toEqual(["before"]);
  });
});

describe("console sink", () => {
  it("routes levels to the matching console method", async () => {
    const consoleImpl = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sink = createConsoleSink({ level: LogLevel.INFO, consoleImpl });
    const base = { sessionId: "s", component: "c", timestamp: 1 };

    await sink.publish({ ...base, event: "d", level: LogLevel.DEBUG });
    await sink.publish({ ...base, event: "i", level: LogLevel.INFO });
    await sink.publish({ ...base, event: "w", level: LogLevel.WARN });
    await sink.publish({ ...base, event: "c", level: LogLevel.CRITICAL });

    expect(consoleImpl.debug).not.toHaveBeenCalled();
    expect(consoleImpl.info).toHaveBeenCalledTimes(1);
    expect(consoleImpl.warn).toHaveBeenCalledTimes(1);
    expect(consoleImpl.error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(consoleImpl.info.mock.calls[0][0]).event).toBe("i");
  });
});

describe("file sink", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "logger-test-"));
  });

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it("rotates files when exceeding max size", async () => {
    const sink = createFileSink({
      sessionId: "sessionA",
      level: LogLevel.DEBUG,
      outputDir: tempDir,
      maxFileSizeMb: 0.001, // force rotation quickly
      maxFiles: 5
    });
    await sink.start?.();

    for (let i = 0; i < 5; i += 1) {
      await sink.publish({
        sessionId: "sessionA",
        component: "test",
        event: `event-${i}`,
        level: LogLevel.INFO,
        timestamp: Date.now(),
        payload: { index: i, blob: "x".repeat(4096) }
      });
    }
    await sink.flush?.();
    await sink.stop?.();

    const files = await fs.readdir(tempDir);
    const jsonlFiles = files.filter(file => file.endsWith(".jsonl"));
    expect(jsonlFiles.length).toBeGreaterThan(1);
  });

  it("reports a failed write once, through the logger", async () => {
    const notADirectory = path.join(tempDir, "occupied");
    await fs.writeFile(notADirectory, "", "utf-8");
    const onError = vi.fn();
    const onSinkError = vi.fn();
    const logger = new StructuredLogger({
      sessionId: "sessionC",
      baseComponent: "root",
      level: LogLevel.INFO,
      sinks: [createFileSink({ sessionId: "sessionC", level: LogLevel.INFO, outputDir: notADirectory, onError })],
      onSinkError
    });

    logger.log(LogLevel.ERROR, "lost");
    await logger.stop();

    expect(onSinkError).toHaveBeenCalledTimes(1);
    expect(onSinkError.mock.calls[0][0]).toBe("file");
    expect(onError).not.toHaveBeenCalled();
  });

  it("writes one JSON line per event", async () => {
    const sink = createFileSink({
      sessionId: "sessionB",
      level: LogLevel.INFO,
      outputDir: tempDir
    });
    await sink.start?.();
    await sink.publish({ sessionId: "sessionB", component: "t", event: "skipped", level: LogLevel.DEBUG, timestamp: 1 });
    await sink.publish({ sessionId: "sessionB", component: "t", event: "kept", level: LogLevel.INFO, timestamp: 2 });
    await sink.stop?.();

    const contents = await fs.readFile(path.join(tempDir, "sessionB-0001.jsonl"), "utf-8");
    const lines = contents.trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).event).toBe("kept");
  });
});
