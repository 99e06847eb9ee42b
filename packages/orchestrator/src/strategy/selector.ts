import {
  DEFAULT_SELECTION,
  type RecoveryStrategy,
  type ServiceHealth,
  type StrategySelectionConfig
} from "@warden/shared";

export interface StrategyContext {
  hasFailoverTarget: boolean;
}

/**
 * Picks a remedy from the health record. Rules are checked in order:
 * isolate a failed service with a long failure streak, degrade on a high
 * error rate, restart after repeated failures, fail over an unhealthy
 * service that has a backup, otherwise restart.
 */
export function selectStrategy(
  health: Pick<ServiceHealth, "status" | "consecutiveFailures" | "errorRate">,
  context: StrategyContext,
  thresholds: StrategySelectionConfig = DEFAULT_SELECTION
): RecoveryStrategy {
  if (health.status === "Failed" && health.consecutiveFailures >= thresholds.isolateFailures) {
    return "Isolate";
  }
  if (health.errorRate > thresholds.degradeErrorRate && health.status !== "Failed") {
    return "Degrade";
  }
  if (health.consecutiveFailures >= thresholds.restartFailures) {
    return "Restart";
  }
  if (context.hasFailoverTarget && health.status === "Unhealthy") {
    return "Failover";
  }
  return "Restart";
}
