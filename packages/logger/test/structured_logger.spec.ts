import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { LogLevel, type StructuredLogEvent } from "@warden/shared";
import { StructuredLogger } from "../src/structuredLogger";
import type { LogSink } from "../src/sinks/types";
import { createConsoleSink, formatPretty } from "../src/sinks/consoleSink";
import { createFileSink, recoveryTrailPath, sessionLogPath } from "../src/sinks/fileSink";
import { createWebhookSink } from "../src/sinks/webhookSink";
import { SnapshotReporter } from "../src/snapshotReporter";

function memorySink(received: StructuredLogEvent[]): LogSink {
  return {
    name: "memory",
    publish: async event => {
      received.push(event);
    }
  };
}

const flushMicrotasks = () => new Promise<void>(resolve => setImmediate(resolve));

describe("StructuredLogger", () => {
  it("filters logs below minimum level and merges child context", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-1",
      component: "root",
      level: LogLevel.INFO,
      sinks: [memorySink(received)]
    });

    logger.log(LogLevel.DEBUG, "ignore");
    logger.log(LogLevel.ERROR, "root-event", { root: true });
    const child = logger.child("child", { childCtx: true });
    child.log(LogLevel.INFO, "child-event", { foo: "bar" });

    await logger.flush();

    expect(received).toHaveLength(2);
    expect(received[0].event).toBe("root-event");
    expect(received[1].component).toBe("child");
    expect(received[1].payload).toEqual({ childCtx: true, foo: "bar" });
  });

  it("nests child context through grandchildren", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-1",
      component: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)],
      context: { host: "test" }
    });

    logger.child("monitor", { a: 1 }).child("monitor.checks", { b: 2 }).log(LogLevel.DEBUG, "tick");
    await logger.flush();

    expect(received).toHaveLength(1);
    expect(received[0].component).toBe("monitor.checks");
    expect(received[0].payload).toEqual({ host: "test", a: 1, b: 2 });
  });

  it("lifts the service and execution id out of the payload", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-1",
      component: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)],
      now: () => 42
    });

    logger.child("recovery.executor", { executionId: "exec-1" }).log(LogLevel.INFO, "step_started", {
      service: "api",
      step: 1
    });
    logger.log(LogLevel.INFO, "session_started");
    await logger.flush();

    expect(received).toEqual([
      {
        sessionId: "session-1",
        component: "recovery.executor",
        event: "step_started",
        level: LogLevel.INFO,
        timestamp: 42,
        service: "api",
        executionId: "exec-1",
        payload: { executionId: "exec-1", service: "api", step: 1 }
      },
      {
        sessionId: "session-1",
        component: "root",
        event: "session_started",
        level: LogLevel.INFO,
        timestamp: 42
      }
    ]);
  });

  it("keeps emission order behind a slow sink", async () => {
    const received: StructuredLogEvent[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const slow: LogSink = {
      name: "slow",
      publish: async event => {
        if (event.event === "first") {
          await gate;
        }
      }
    };
    const logger = new StructuredLogger({
      sessionId: "session-1",
      component: "root",
      level: LogLevel.DEBUG,
      sinks: [slow, memorySink(received)]
    });

    logger.log(LogLevel.INFO, "first");
    logger.log(LogLevel.INFO, "second");
    await flushMicrotasks();
    expect(received.map(event => event.event)).toEqual(["first"]);

    release();
    await logger.flush();
    expect(received.map(event => event.event)).toEqual(["first", "second"]);
  });

  it("reports sink failures without blocking other sinks", async () => {
    const received: StructuredLogEvent[] = [];
    const failing: LogSink = {
      name: "broken",
      publish: async () => {
        throw new Error("disk full");
      }
    };
    const onSinkError = vi.fn();
    const logger = new StructuredLogger({
      sessionId: "session-1",
      component: "root",
      level: LogLevel.DEBUG,
      sinks: [failing, memorySink(received)],
      onSinkError
    });

    logger.log(LogLevel.WARN, "still-delivered");
    logger.log(LogLevel.WARN, "also-delivered");
    await logger.flush();

    expect(received.map(event => event.event)).toEqual(["still-delivered", "also-delivered"]);
    expect(onSinkError).toHaveBeenCalledTimes(2);
    expect(onSinkError).toHaveBeenCalledWith(failing, expect.any(Error));
  });

  it("flushes and closes sinks once, then ignores later logs", async () => {
    const received: StructuredLogEvent[] = [];
    const close = vi.fn(async () => undefined);
    const logger = new StructuredLogger({
      sessionId: "session-1",
      component: "root",
      level: LogLevel.DEBUG,
      sinks: [{ ...memorySink(received), close }]
    });
    logger.log(LogLevel.INFO, "before");
    await logger.close();
    await logger.close();
    logger.log(LogLevel.INFO, "after");
    await logger.flush();

    expect(received.map(event => event.event)).toEqual(["before"]);
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe("console sink", () => {
  const event: StructuredLogEvent = {
    sessionId: "s",
    component: "recovery.executor",
    event: "step_failed",
    level: LogLevel.ERROR,
    timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
    payload: { step: 4 }
  };

  it("routes by level", async () => {
    const consoleImpl = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sink = createConsoleSink({ level: LogLevel.INFO, consoleImpl });
    await sink.publish(event);
    await sink.publish({ ...event, level: LogLevel.DEBUG });
    await sink.publish({ ...event, level: LogLevel.WARN });

    expect(consoleImpl.error).toHaveBeenCalledWith(JSON.stringify(event));
    expect(consoleImpl.debug).not.toHaveBeenCalled();
    expect(consoleImpl.warn).toHaveBeenCalledTimes(1);
  });

  it("formats pretty lines", () => {
    expect(formatPretty(event)).toBe(
      '2024-01-02T03:04:05.000Z ERROR [recovery.executor] step_failed {"step":4}'
    );
    expect(formatPretty({ ...event, payload: {} })).toBe(
      "2024-01-02T03:04:05.000Z ERROR [recovery.executor] step_failed"
    );
  });
});

describe("file sink", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "logger-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const base = { sessionId: "sessionB", component: "c", timestamp: 1 };

  it("writes one JSON document per line into the session file", async () => {
    const outputDir = path.join(tempDir, "nested");
    const sink = createFileSink({ sessionId: "sessionB", level: LogLevel.INFO, outputDir });
    await sink.publish({ ...base, event: "kept", level: LogLevel.INFO });
    await sink.publish({ ...base, event: "skipped", level: LogLevel.DEBUG });
    await sink.publish({ ...base, event: "step_failed", level: LogLevel.ERROR, executionId: "exec-1" });

    expect(await fs.readdir(outputDir)).toEqual(["sessionB.jsonl"]);
    const lines = (await fs.readFile(sessionLogPath(outputDir, "sessionB"), "utf-8")).trim().split("\n");
    expect(lines.map(line => JSON.parse(line).event)).toEqual(["kept", "step_failed"]);
  });

  it("copies execution events to the recovery trail", async () => {
    const sink = createFileSink({ sessionId: "sessionB", level: LogLevel.DEBUG, outputDir: tempDir, recoveryTrail: true });
    await sink.publish({ ...base, event: "health_checked", level: LogLevel.DEBUG, service: "api" });
    await sink.publish({ ...base, event: "step_started", level: LogLevel.INFO, service: "api", executionId: "exec-1" });

    const trail = (await fs.readFile(recoveryTrailPath(tempDir, "sessionB"), "utf-8")).trim().split("\n");
    expect(trail).toHaveLength(1);
    expect(JSON.parse(trail[0])).toEqual({
      ...base,
      event: "step_started",
      level: LogLevel.INFO,
      service: "api",
      executionId: "exec-1"
    });
  });
});

describe("webhook sink", () => {
  const event: StructuredLogEvent = {
    sessionId: "sessionA",
    component: "recovery.executor",
    event: "recovery_failed",
    level: LogLevel.ERROR,
    timestamp: 1
  };

  it("retries failed requests", async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValueOnce({ ok: false, status: 500 })
      .mockResolvedValue({ ok: true, status: 200 });

    const sink = createWebhookSink({
      level: LogLevel.DEBUG,
      url: "https://example.com/webhook",
      headers: { authorization: "Bearer test-secret" },
      batchSize: 1,
      retry: { attempts: 2, backoffMs: 10 },
      fetchImpl
    });

    await sink.publish(event);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    const [url, init] = fetchImpl.mock.calls[1];
    expect(url).toBe("https://example.com/webhook");
    expect(init.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-secret" });
    expect(JSON.parse(init.body)).toEqual({ events: [event] });
  });

  it("holds events until the batch fills or the sink flushes", async () => {
    const fetchImpl = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    const sink = createWebhookSink({ level: LogLevel.WARN, url: "https://example.com/webhook", batchSize: 3, fetchImpl });

    await sink.publish(event);
    await sink.publish({ ...event, level: LogLevel.INFO });
    await sink.publish({ ...event, event: "service_isolated", level: LogLevel.WARN });
    expect(fetchImpl).not.toHaveBeenCalled();

    await sink.flush?.();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [, init] = fetchImpl.mock.calls[0];
    expect(JSON.parse(init.body).events.map((sent: StructuredLogEvent) => sent.event)).toEqual([
      "recovery_failed",
      "service_isolated"
    ]);

    await sink.flush?.();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("rejects once every attempt has failed", async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new Error("connection refused"));
    const logger = { warn: vi.fn() };
    const sink = createWebhookSink({
      level: LogLevel.DEBUG,
      url: "https://example.com/webhook",
      batchSize: 1,
      retry: { attempts: 2, backoffMs: 0 },
      fetchImpl,
      logger
    });

    await expect(sink.publish(event)).rejects.toThrow("Webhook delivery of 1 event(s) failed after 2 attempts");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(2);

    fetchImpl.mockResolvedValue({ ok: true, status: 200 });
    await sink.flush?.();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});

describe("SnapshotReporter", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "snapshot-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("logs and persists the collected snapshot", async () => {
    const log = vi.fn();
    const filePath = path.join(tempDir, "nested", "metrics.json");
    const reporter = new SnapshotReporter({
      collect: () => ({ totalRecoveries: 2 }),
      logger: { log, child: vi.fn() },
      flushIntervalMs: 1000,
      filePath
    });

    const snapshot = await reporter.flush();

    expect(snapshot).toEqual({ totalRecoveries: 2 });
    expect(reporter.getLastSnapshot()).toEqual({ totalRecoveries: 2 });
    expect(JSON.parse(await fs.readFile(filePath, "utf-8"))).toEqual({ totalRecoveries: 2 });
    expect(log).toHaveBeenCalledWith(LogLevel.INFO, "metrics_snapshot", {
      snapshot: { totalRecoveries: 2 }
    });
  });
});
