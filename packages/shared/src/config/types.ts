import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/** Consecutive-failure counts at which a service enters each unhealthy status. */
export interface FailureThresholds {
  degraded: number;
  unhealthy: number;
  failed: number;
}

export interface HealthMonitoringConfig {
  intervalMs: number;
  checkTimeoutMs: number;
  thresholds: FailureThresholds;
}

export interface RecoverySchedulingConfig {
  queueIntervalMs: number;
  maxConcurrentRecoveries: number;
  retentionMs: number;
}

export interface StrategySelectionConfig {
  isolateFailures: number;
  degradeErrorRate: number;
  restartFailures: number;
}

export interface ServiceDiscoveryConfig {
  enabled: boolean;
  intervalMs: number;
}

interface SinkToggle {
  enabled: boolean;
  level?: LogLevel;
}

export interface ConsoleSinkConfig extends SinkToggle {
  format?: "json" | "pretty";
}

export interface FileSinkConfig extends SinkToggle {
  outputDir?: string;
  /** Also copy events that carry an executionId to `recoveries.jsonl`. */
  recoveryTrail?: boolean;
}

export interface WebhookSinkConfig extends SinkToggle {
  url?: string;
  headers?: Record<string, string>;
  batchSize?: number;
  retry?: {
    attempts: number;
    backoffMs: number;
  };
}

export interface ObservabilityLogsConfig {
  level: LogLevel;
  sinks: {
    console?: ConsoleSinkConfig;
    file?: FileSinkConfig;
    webhook?: WebhookSinkConfig;
  };
}

export interface ObservabilityMetricsConfig {
  enabled: boolean;
  flushIntervalMs: number;
}

export interface AlertTriggerConfig {
  id: string;
  enabled: boolean;
  cooldownMs: number;
  description?: string;
}

export interface AlertChannelConfig {
  id: string;
  type: "console" | "file" | "webhook";
  enabled: boolean;
  level?: LogLevel;
  path?: string;
  url?: string;
  headers?: Record<string, string>;
}

export interface ObservabilityAlertsConfig {
  enabled: boolean;
  cooldownMs: number;
  channels: AlertChannelConfig[];
  triggers: {
    recoveryFailed: AlertTriggerConfig;
    serviceFailed: AlertTriggerConfig;
    isolation: AlertTriggerConfig;
    unhealthyRatio: AlertTriggerConfig & { threshold: number };
  };
}

export interface ObservabilityConfig {
  logs: ObservabilityLogsConfig;
  metrics: ObservabilityMetricsConfig;
  alerts: ObservabilityAlertsConfig;
}

export interface RecoveryConfig {
  monitoring: HealthMonitoringConfig;
  recovery: RecoverySchedulingConfig;
  selection: StrategySelectionConfig;
  discovery: ServiceDiscoveryConfig;
  observability: ObservabilityConfig;
}
