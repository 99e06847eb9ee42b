import { describe, it, expect } from "vitest";
import { LogLevel, isLogLevel, meetsLevel, toLogEvent } from "../src/observability";

describe("log levels", () => {
  it("orders levels by severity", () => {
    expect(meetsLevel(LogLevel.WARN, LogLevel.INFO)).toBe(true);
    expect(meetsLevel(LogLevel.INFO, LogLevel.INFO)).toBe(true);
    expect(meetsLevel(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
    expect(meetsLevel(LogLevel.CRITICAL, LogLevel.ERROR)).toBe(true);
  });

  it("recognises level names only", () => {
    expect(isLogLevel("critical")).toBe(true);
    expect(isLogLevel("CRITICAL")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe("toLogEvent", () => {
  const header = { sessionId: "s", component: "health.monitor", event: "health_checked", level: LogLevel.DEBUG, timestamp: 5 };

  it("omits an empty payload", () => {
    expect(toLogEvent(header, {})).toEqual(header);
    expect(toLogEvent(header)).toEqual(header);
  });

  it("lifts only string service and execution ids", () => {
    expect(toLogEvent(header, { service: 7, executionId: "exec-3" })).toEqual({
      ...header,
      executionId: "exec-3",
      payload: { service: 7, executionId: "exec-3" }
    });
  });
});
