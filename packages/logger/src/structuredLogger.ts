import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type ComponentLogger,
  type StructuredLogEvent
} from "@constant-synthesis/shared";
import type { LogSink } from "./sinks/types";

export interface StructuredLoggerOptions {
  sessionId: string;
  baseComponent: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  defaultContext?: Record<string, unknown>;
  onDrop?: (event: StructuredLogEvent) => void;
  onSinkError?: (sink: string, error: unknown) => void;
}

interface LogOptions {
  component?: string;
  dedupParts?: Array<string | number | undefined | null>;
  tags?: string[];
}

export interface ChildLogger extends ComponentLogger {
  child(component: string, context?: Record<string, unknown>): ChildLogger;
}

/**
 * Queues structured events and fans them out to every sink. `log` never
 * blocks; call `flushOutstanding` (or `stop`) before the process exits.
 */
export class StructuredLogger implements ChildLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private readonly queueSize: number;
  private readonly defaultContext: Record<string, unknown>;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
    this.defaultContext = options.defaultContext ?? {};
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  async start() {
    await Promise.all(this.options.sinks.map(async sink => sink.start?.()));
  }

  async stop() {
    await this.flushOutstanding();
    this.stopped = true;
    await Promise.all(this.options.sinks.map(async sink => sink.stop?.()));
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await this.drainQueue();
    }
    await Promise.all(this.options.sinks.map(async sink => sink.flush?.()));
  }

  log(level: LogLevel, event: string, payload?: Record<string, unknown>, logOptions?: LogOptions) {
    if (this.stopped || !shouldLog(level, this.options.level)) {
      return;
    }
    const structured = createStructuredEvent({
      sessionId: this.options.sessionId,
      component: logOptions?.component ?? this.options.baseComponent,
      level,
      event,
      payload: { ...this.defaultContext, ...payload },
      dedupParts: logOptions?.dedupParts,
      tags: logOptions?.tags
    });
    if (this.queue.length >= this.queueSize) {
      this.options.onDrop?.(structured);
      return;
    }
    this.queue.push(structured);
    void this.drainQueue();
  }

  child(component: string, context?: Record<string, unknown>): ChildLogger {
    const merged = { ...context };
    return {
      log: (level, event, payload, options) => {
        this.log(level, event, { ...merged, ...payload }, { ...options, component });
      },
      child: (nextComponent, childContext) => this.child(nextComponent, { ...merged, ...childContext })
    };
  }

  private drainQueue(): Promise<void> {
    if (!this.draining) {
      this.draining = this.publishQueued().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  private async publishQueued() {
    let next = this.queue.shift();
    while (next) {
      const event = next;
      await Promise.all(
        this.options.sinks.map(async sink => {
          try {
            await sink.publish(event);
          } catch (error) {
            this.options.onSinkError?.(sink.name, error);
          }
        })
      );
      next = this.queue.shift();
    }
  }
}
