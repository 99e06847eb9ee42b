import { describe, it, expect, vi, afterEach } from "vitest";
import { LogLevel, type RecoverySchedulingConfig } from "@warden/shared";
import { RecoveryScheduler } from "../../src/recovery/scheduler";
import { ExecutionStore } from "../../src/recovery/executionStore";
import {
  createClock,
  createLoggerStub,
  createPlan,
  deferred,
  loggedEvents,
  sequentialIds,
  type Deferred
} from "../utils/factories";

const config: RecoverySchedulingConfig = {
  queueIntervalMs: 60_000,
  maxConcurrentRecoveries: 2,
  retentionMs: 1_000
};

function setup() {
  const clock = createClock();
  const store = new ExecutionStore(clock.now, sequentialIds());
  const gates = new Map<string, Deferred>();
  const runner = {
    execute: vi.fn((executionId: string) => {
      const gate = deferred();
      gates.set(executionId, gate);
      return gate.promise;
    })
  };
  const logger = createLoggerStub();
  const scheduler = new RecoveryScheduler({ store, runner, config, logger });
  const enqueue = (serviceName: string) => {
    const execution = store.create(createPlan({ serviceName }), serviceName, "test");
    scheduler.enqueue(execution.id);
    return execution.id;
  };
  return { clock, store, runner, logger, scheduler, enqueue, gates };
}

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe("RecoveryScheduler", () => {
  let stopScheduler: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await stopScheduler?.();
    stopScheduler = undefined;
  });

  it("waits for a dispatch pass while stopped", () => {
    const { scheduler, enqueue, runner } = setup();
    enqueue("a");
    expect(runner.execute).not.toHaveBeenCalled();
    expect(scheduler.queuedCount()).toBe(1);
    expect(scheduler.dispatch()).toEqual(["exec-1"]);
    expect(scheduler.inFlightCount()).toBe(1);
  });

  it("never runs more than maxConcurrentRecoveries at once", async () => {
    const { scheduler, enqueue, runner, gates } = setup();
    scheduler.start();
    stopScheduler = () => scheduler.stop();
    enqueue("a");
    enqueue("b");
    enqueue("c");
    expect(runner.execute.mock.calls.map(([id]) => id)).toEqual(["exec-1", "exec-2"]);
    expect(scheduler.inFlightCount()).toBe(2);
    expect(scheduler.queuedCount()).toBe(1);

    gates.get("exec-1")?.resolve();
    await flush();
    expect(runner.execute.mock.calls.map(([id]) => id)).toEqual(["exec-1", "exec-2", "exec-3"]);
    expect(scheduler.inFlightCount()).toBe(2);
    expect(scheduler.queuedCount()).toBe(0);

    gates.get("exec-2")?.resolve();
    gates.get("exec-3")?.resolve();
    await scheduler.idle();
    expect(scheduler.inFlightCount()).toBe(0);
  });

  it("holds a service's next execution until its running task returns", async () => {
    const { scheduler, enqueue, gates } = setup();
    enqueue("a");
    enqueue("a");
    enqueue("b");

    expect(scheduler.dispatch()).toEqual(["exec-1", "exec-3"]);
    expect(scheduler.queuedCount()).toBe(1);

    gates.get("exec-3")?.resolve();
    await flush();
    expect(scheduler.dispatch()).toEqual([]);

    gates.get("exec-1")?.resolve();
    await flush();
    expect(scheduler.dispatch()).toEqual(["exec-2"]);
    expect(scheduler.queuedCount()).toBe(0);
  });

  it("skips executions that are no longer pending", () => {
    const { scheduler, enqueue, store, runner } = setup();
    const id = enqueue("a");
    const record = store.getRecord(id);
    if (record) {
      record.execution.status = "Cancelled";
    }
    expect(scheduler.dispatch()).toEqual([]);
    expect(runner.execute).not.toHaveBeenCalled();
    expect(scheduler.queuedCount()).toBe(0);
  });

  it("removes queued executions", () => {
    const { scheduler, enqueue } = setup();
    const id = enqueue("a");
    expect(scheduler.remove(id)).toBe(true);
    expect(scheduler.remove(id)).toBe(false);
    expect(scheduler.dispatch()).toEqual([]);
  });

  it("purges finished executions past retention", () => {
    const { scheduler, store, clock, logger } = setup();
    const execution = store.create(createPlan(), "api", "test");
    const record = store.getRecord(execution.id);
    if (record) {
      record.execution.status = "Success";
      record.execution.endTime = clock.now();
    }
    scheduler.dispatch();
    expect(store.get(execution.id)).toBeDefined();
    clock.advance(1_000);
    scheduler.dispatch();
    expect(store.get(execution.id)).toBeUndefined();
    expect(loggedEvents(logger, LogLevel.DEBUG)).toEqual(["executions_purged"]);
  });

  it("frees the slot of a crashed task", async () => {
    const { store, logger } = setup();
    const crashing = new RecoveryScheduler({
      store,
      runner: { execute: () => Promise.reject(new Error("executor exploded")) },
      config,
      logger
    });
    const execution = store.create(createPlan(), "api", "test");
    crashing.enqueue(execution.id);
    crashing.dispatch();
    await crashing.idle();
    expect(crashing.inFlightCount()).toBe(0);
    expect(logger.log).toHaveBeenCalledWith(LogLevel.ERROR, "recovery_task_crashed", {
      executionId: execution.id,
      error: "executor exploded"
    });
  });

  it("drains in-flight work on stop", async () => {
    const { scheduler, enqueue, gates } = setup();
    scheduler.start();
    enqueue("a");
    let stopped = false;
    const stopping = scheduler.stop({ drain: true }).then(() => {
      stopped = true;
    });
    await flush();
    expect(stopped).toBe(false);
    expect(scheduler.isRunning()).toBe(false);
    gates.get("exec-1")?.resolve();
    await stopping;
    expect(stopped).toBe(true);
  });
});
