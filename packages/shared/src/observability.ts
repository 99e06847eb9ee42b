export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const severity: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.CRITICAL
];

export function isLogLevel(value: unknown): value is LogLevel {
  return severity.some(level => level === value);
}

/** True when `level` is at least as severe as `threshold`. */
export function meetsLevel(level: LogLevel, threshold: LogLevel): boolean {
  return severity.indexOf(level) >= severity.indexOf(threshold);
}

/**
 * One log record. `service` and `executionId` are copied out of the payload
 * so sinks and alerting can route on them.
 */
export interface StructuredLogEvent {
  sessionId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  service?: string;
  executionId?: string;
  payload?: Record<string, unknown>;
}

export type LogEventHeader = Pick<StructuredLogEvent, "sessionId" | "component" | "event" | "level" | "timestamp">;

export function toLogEvent(header: LogEventHeader, payload?: Record<string, unknown>): StructuredLogEvent {
  if (!payload || Object.keys(payload).length === 0) {
    return { ...header };
  }
  const record: StructuredLogEvent = { ...header, payload };
  if (typeof payload.service === "string") {
    record.service = payload.service;
  }
  if (typeof payload.executionId === "string") {
    record.executionId = payload.executionId;
  }
  return record;
}
