import { DEFAULT_FAILURE_THRESHOLDS, type FailureThresholds, type ServiceStatus } from "@warden/shared";

export function classifyFailures(
  consecutiveFailures: number,
  thresholds: FailureThresholds = DEFAULT_FAILURE_THRESHOLDS
): ServiceStatus {
  if (consecutiveFailures >= thresholds.failed) {
    return "Failed";
  }
  if (consecutiveFailures >= thresholds.unhealthy) {
    return "Unhealthy";
  }
  if (consecutiveFailures >= thresholds.degraded && consecutiveFailures > 0) {
    return "Degraded";
  }
  return "Healthy";
}

export function isRecoveryCandidate(status: ServiceStatus): boolean {
  return status === "Unhealthy" || status === "Failed";
}
