import type {
  FailureThresholds,
  HealthMonitoringConfig,
  RecoverySchedulingConfig,
  StrategySelectionConfig
} from "./types";

export const DEFAULT_FAILURE_THRESHOLDS: FailureThresholds = {
  degraded: 1,
  unhealthy: 3,
  failed: 5
};

export const DEFAULT_MONITORING: HealthMonitoringConfig = {
  intervalMs: 10_000,
  checkTimeoutMs: 5_000,
  thresholds: DEFAULT_FAILURE_THRESHOLDS
};

export const DEFAULT_SCHEDULING: RecoverySchedulingConfig = {
  queueIntervalMs: 5_000,
  maxConcurrentRecoveries: 3,
  retentionMs: 60_000
};

// Rules are evaluated in order: isolate, degrade, restart, failover.
export const DEFAULT_SELECTION: StrategySelectionConfig = {
  isolateFailures: 5,
  degradeErrorRate: 0.5,
  restartFailures: 3
};
