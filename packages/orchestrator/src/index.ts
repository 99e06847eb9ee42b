export { RecoveryOrchestrator } from "./orchestrator";
export type {
  OrchestratorSettings,
  RecoveryOrchestratorOptions,
  ServiceDiscoveryOptions
} from "./orchestrator";
export { ServiceRegistry } from "./registry/serviceRegistry";
export type { RegisterServiceOptions } from "./registry/serviceRegistry";
export { HealthMonitor } from "./health/monitor";
export type { ErrorReporter, HealthMonitorOptions } from "./health/monitor";
export { classifyFailures, isRecoveryCandidate } from "./health/classify";
export { RecoveryPlanCatalog, validatePlan } from "./recovery/catalog";
export { BUILTIN_PLANS } from "./recovery/builtinPlans";
export { ExecutionStore } from "./recovery/executionStore";
export { RecoveryExecutor } from "./recovery/executor";
export { RecoveryScheduler } from "./recovery/scheduler";
export { computeBackoffDelay } from "./recovery/backoff";
export type { RandomSource } from "./recovery/backoff";
export { runWithDeadline, sleep } from "./recovery/deadline";
export { selectStrategy } from "./strategy/selector";
export type { StrategyContext } from "./strategy/selector";
export { NotificationDispatcher, buildNotification } from "./notifications/notifier";
export type { UserNotifier } from "./notifications/notifier";
export { RecoveryEvents } from "./events";
export type { RecoveryListener } from "./events";
export { assessOrchestratorHealth, computeStatistics } from "./stats";
export * from "./errors";
export { ObservabilityService } from "./observability/service";
export type { AlertConsumer, ObservabilityServiceOptions } from "./observability/service";
export { AlertManager } from "./observability/alertManager";
export { run } from "./main";
export type { RunOptions, RunningOrchestrator, ServiceDefinition } from "./main";
export { createCli, formatPlan } from "./cli/commands";
export type { CliIo } from "./cli/commands";
