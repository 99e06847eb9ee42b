import { vi, type Mock } from "vitest";
import {
  LogLevel,
  type HealthCheckResult,
  type MonitoredService,
  type ObservabilityConfig,
  type RecoveryPlan,
  type RecoveryStep,
  type RetryPolicy
} from "@warden/shared";
import type { ComponentLogger } from "@warden/logger";

export interface LoggerStub extends ComponentLogger {
  log: Mock<ComponentLogger["log"]>;
}

/** Every child shares the parent's `log` mock. */
export function createLoggerStub(): LoggerStub {
  const log = vi.fn<ComponentLogger["log"]>();
  const stub: LoggerStub = { log, child: () => stub };
  return stub;
}

export function loggedEvents(logger: LoggerStub, level?: LogLevel): string[] {
  return logger.log.mock.calls.filter(([callLevel]) => level === undefined || callLevel === level).map(call => call[1]);
}

export function createClock(start = 1_000) {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    }
  };
}

export function sequentialIds(prefix = "exec") {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

/**
 * In-memory service: `checkHealth` answers with `report` when set, else
 * `healthy`. `start()` brings it back up. Lifecycle hooks are recorded.
 */
export class FakeService implements MonitoredService {
  healthy = true;
  report?: HealthCheckResult;
  readonly calls: string[] = [];

  checkHealth(): HealthCheckResult {
    return this.report ?? this.healthy;
  }

  prepareRestart() {
    this.calls.push("prepareRestart");
  }

  stop() {
    this.calls.push("stop");
  }

  clearResources() {
    this.calls.push("clearResources");
  }

  start() {
    this.calls.push("start");
    this.healthy = true;
    this.report = undefined;
  }
}

export const immediateRetry: RetryPolicy = {
  maxRetries: 0,
  backoff: "Fixed",
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitter: false
};

export function createStep(
  name: string,
  action: RecoveryStep["action"] = () => true,
  overrides: Partial<RecoveryStep> = {}
): RecoveryStep {
  return {
    name,
    description: `${name} step`,
    timeoutMs: 1_000,
    action,
    ...overrides
  };
}

export function createPlan(overrides: Partial<RecoveryPlan> = {}): RecoveryPlan {
  return {
    id: "test_plan",
    serviceName: "api",
    strategy: "Restart",
    priority: 500,
    estimatedDurationMs: 1_000,
    userImpact: "Low",
    timeoutMs: 10_000,
    retryPolicy: immediateRetry,
    steps: [createStep("step-1")],
    ...overrides
  };
}

export function createObservabilityConfig(overrides: Partial<ObservabilityConfig> = {}): ObservabilityConfig {
  return {
    logs: {
      level: LogLevel.INFO,
      sinks: {
        console: { enabled: true, level: LogLevel.INFO }
      }
    },
    metrics: {
      enabled: true,
      flushIntervalMs: 60_000
    },
    alerts: {
      enabled: true,
      cooldownMs: 1_000,
      channels: [{ id: "console", type: "console", enabled: true, level: LogLevel.WARN }],
      triggers: {
        recoveryFailed: { id: "recoveryFailed", enabled: true, cooldownMs: 5_000 },
        serviceFailed: { id: "serviceFailed", enabled: true, cooldownMs: 5_000 },
        isolation: { id: "isolation", enabled: true, cooldownMs: 5_000 },
        unhealthyRatio: { id: "unhealthyRatio", enabled: true, cooldownMs: 5_000, threshold: 0.5 }
      }
    },
    ...overrides
  };
}

export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}
