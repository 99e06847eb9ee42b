import { LogLevel, meetsLevel, type StructuredLogEvent } from "@warden/shared";
import type { LogSink } from "./types";

interface ConsoleSinkOptions {
  level: LogLevel;
  format?: "json" | "pretty";
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function formatPretty(event: StructuredLogEvent): string {
  const time = new Date(event.timestamp).toISOString();
  const payload = event.payload && Object.keys(event.payload).length > 0
    ? ` ${JSON.stringify(event.payload)}`
    : "";
  return `${time} ${event.level.toUpperCase()} [${event.component}] ${event.event}${payload}`;
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  const render = options.format === "pretty" ? formatPretty : (event: StructuredLogEvent) => JSON.stringify(event);
  return {
    name: "console",
    async publish(event: StructuredLogEvent) {
      if (!meetsLevel(event.level, options.level)) {
        return;
      }
      const line = render(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(line);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(line);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(line);
          break;
        default:
          consoleImpl.info(line);
      }
    }
  };
}
