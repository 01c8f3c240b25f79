import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { shouldLog, type LogLevel, type StructuredLogEvent } from "@constant-synthesis/shared";
import type { LogSink } from "./types";

export interface FileSinkOptions {
  sessionId: string;
  level: LogLevel;
  outputDir: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
  onError?: (message: string, error: unknown) => void;
}

export function createFileSink(options: FileSinkOptions): LogSink {
  const sink = new RotatingFileSink(options);
  return {
    name: "file",
    level: options.level,
    start: () => sink.start(),
    stop: () => sink.stop(),
    flush: () => sink.flush(),
    publish: event => sink.publish(event)
  };
}

/**
 * Appends JSON lines to `<sessionId>-<n>.jsonl`, opening a new file once the
 * size limit would be exceeded and keeping at most `maxFiles` of them.
 */
class RotatingFileSink {
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private stream: WriteStream | null = null;
  private bytesWritten = 0;
  private sequence = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly options: FileSinkOptions) {
    this.maxBytes = Math.max(0.001, options.maxFileSizeMb ?? 25) * 1024 * 1024;
    this.maxFiles = Math.max(1, options.maxFiles ?? 10);
  }

  async start() {
    if (this.stream) {
      return;
    }
    await mkdir(this.options.outputDir, { recursive: true });
    await this.rotate();
  }

  async stop() {
    await this.pending;
    await this.closeStream();
  }

  async flush() {
    await this.pending;
  }

  publish(event: StructuredLogEvent): Promise<void> {
    if (!shouldLog(event.level, this.options.level)) {
      return Promise.resolve();
    }
    // Writes are chained so rotation never interleaves with an append. A
    // failed write rejects the returned promise only; the chain carries on.
    const next = this.pending.then(() => this.write(event));
    this.pending = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async write(event: StructuredLogEvent) {
    if (!this.stream) {
      await this.start();
    }
    const line = JSON.stringify(event) + "\n";
    const size = Buffer.byteLength(line);
    if (this.bytesWritten > 0 && this.bytesWritten + size > this.maxBytes) {
      await this.rotate();
    }
    const stream = this.stream;
    if (!stream) {
      throw new Error("File sink stream is not open");
    }
    await new Promise<void>((resolve, reject) => {
      stream.write(line, error => (error ? reject(error) : resolve()));
    });
    this.bytesWritten += size;
  }

  private async closeStream() {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }

  private async rotate() {
    await this.closeStream();
    this.sequence += 1;
    const fileName = `${this.options.sessionId}-${String(this.sequence).padStart(4, "0")}.jsonl`;
    this.stream = createWriteStream(path.join(this.options.outputDir, fileName), { flags: "a" });
    this.bytesWritten = 0;
    await this.pruneOldFiles();
  }

  private async pruneOldFiles() {
    try {
      const entries = await readdir(this.options.outputDir);
      const files = await Promise.all(
        entries
          .filter(entry => entry.startsWith(`${this.options.sessionId}-`) && entry.endsWith(".jsonl"))
          .map(async entry => {
            const fullPath = path.join(this.options.outputDir, entry);
            const info = await stat(fullPath);
            return { entry, fullPath, mtime: info.mtimeMs };
          })
      );
      if (files.length <= this.maxFiles) {
        return;
      }
      const newestFirst = files.sort((a, b) => b.mtime - a.mtime || b.entry.localeCompare(a.entry));
      await Promise.all(
        newestFirst.slice(this.maxFiles).map(file =>
          unlink(file.fullPath).catch(error => {
            this.options.onError?.("Failed to remove old log file", error);
          })
        )
      );
    } catch (error) {
      this.options.onError?.("Failed to prune log files", error);
    }
  }
}
