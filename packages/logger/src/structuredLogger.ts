import { LogLevel, meetsLevel, toLogEvent, type StructuredLogEvent } from "@warden/shared";
import type { LogSink } from "./sinks/types";

export interface ComponentLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>): void;
  child(component: string, context?: Record<string, unknown>): ComponentLogger;
}

export interface StructuredLoggerOptions {
  sessionId: string;
  component: string;
  level: LogLevel;
  sinks: LogSink[];
  /** Merged under every payload, including children's. */
  context?: Record<string, unknown>;
  /** Receives sink failures; defaults to console.warn. */
  onSinkError?: (sink: LogSink, error: unknown) => void;
  now?: () => number;
}

/**
 * Delivers records to every sink in emission order. Children share the
 * delivery chain and differ only in component and context.
 */
export class StructuredLogger implements ComponentLogger {
  private delivery: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly now: () => number;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.now = options.now ?? Date.now;
  }

  log(level: LogLevel, event: string, payload?: Record<string, unknown>) {
    this.emit(this.options.component, this.options.context ?? {}, level, event, payload);
  }

  child(component: string, context?: Record<string, unknown>): ComponentLogger {
    return this.scoped(component, { ...this.options.context, ...context });
  }

  /** Resolves once every record logged so far has reached the sinks. */
  async flush() {
    await this.delivery;
    await Promise.all(this.options.sinks.map(sink => this.invoke(sink, target => target.flush?.())));
  }

  async close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.flush();
    await Promise.all(this.options.sinks.map(sink => this.invoke(sink, target => target.close?.())));
  }

  private scoped(component: string, context: Record<string, unknown>): ComponentLogger {
    return {
      log: (level, event, payload) => this.emit(component, context, level, event, payload),
      child: (next, childContext) => this.scoped(next, { ...context, ...childContext })
    };
  }

  private emit(
    component: string,
    context: Record<string, unknown>,
    level: LogLevel,
    event: string,
    payload?: Record<string, unknown>
  ) {
    if (this.closed || !meetsLevel(level, this.options.level)) {
      return;
    }
    const record = toLogEvent(
      { sessionId: this.options.sessionId, component, event, level, timestamp: this.now() },
      { ...context, ...payload }
    );
    this.delivery = this.delivery.then(() => this.deliver(record));
  }

  private async deliver(record: StructuredLogEvent) {
    await Promise.all(this.options.sinks.map(sink => this.invoke(sink, target => target.publish(record))));
  }

  private async invoke(sink: LogSink, action: (sink: LogSink) => Promise<void> | void) {
    try {
      await action(sink);
    } catch (error) {
      if (this.options.onSinkError) {
        this.options.onSinkError(sink, error);
      } else {
        console.warn(`[structured-logger] sink ${sink.name} failed`, error);
      }
    }
  }
}
