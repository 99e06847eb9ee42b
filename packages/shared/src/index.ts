export * from "./observability";
export * from "./recovery";
export * from "./env/validator";
export * from "./env/schema";
export * as config from "./config";
export { ConfigurationManager, createConfigManager } from "./config/manager";
export { loadConfig, validateConfig } from "./config/loader";
export {
  DEFAULT_FAILURE_THRESHOLDS,
  DEFAULT_MONITORING,
  DEFAULT_SCHEDULING,
  DEFAULT_SELECTION
} from "./config/defaults";
export type {
  AlertChannelConfig,
  AlertTriggerConfig,
  ConsoleSinkConfig,
  FailureThresholds,
  FileSinkConfig,
  HealthMonitoringConfig,
  ObservabilityAlertsConfig,
  ObservabilityConfig,
  ObservabilityLogsConfig,
  ObservabilityMetricsConfig,
  RecoveryConfig,
  RecoverySchedulingConfig,
  ServiceDiscoveryConfig,
  StrategySelectionConfig,
  ValidationResult,
  WebhookSinkConfig
} from "./config/types";
