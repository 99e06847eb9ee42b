import { describe, it, expect } from "vitest";
import type { ServiceStatus } from "@warden/shared";
import { selectStrategy } from "../../src/strategy/selector";

const health = (status: ServiceStatus, consecutiveFailures: number, errorRate = 0) => ({
  status,
  consecutiveFailures,
  errorRate
});

describe("selectStrategy", () => {
  it("isolates a failed service with a long streak", () => {
    expect(selectStrategy(health("Failed", 5), { hasFailoverTarget: true })).toBe("Isolate");
  });

  it("degrades on a high error rate unless the service has failed", () => {
    expect(selectStrategy(health("Unhealthy", 3, 0.6), { hasFailoverTarget: false })).toBe("Degrade");
    expect(selectStrategy(health("Failed", 4, 0.9), { hasFailoverTarget: false })).toBe("Restart");
  });

  it("requires the error rate to exceed the threshold", () => {
    expect(selectStrategy(health("Degraded", 1, 0.5), { hasFailoverTarget: false })).toBe("Restart");
  });

  it("restarts after repeated failures even with a backup", () => {
    expect(selectStrategy(health("Unhealthy", 3), { hasFailoverTarget: true })).toBe("Restart");
  });

  it("fails over an unhealthy service with a backup below the restart streak", () => {
    const thresholds = { isolateFailures: 5, degradeErrorRate: 0.5, restartFailures: 4 };
    expect(selectStrategy(health("Unhealthy", 3), { hasFailoverTarget: true }, thresholds)).toBe("Failover");
    expect(selectStrategy(health("Unhealthy", 3), { hasFailoverTarget: false }, thresholds)).toBe("Restart");
  });

  it("falls back to restart", () => {
    expect(selectStrategy(health("Healthy", 0), { hasFailoverTarget: false })).toBe("Restart");
  });
});
