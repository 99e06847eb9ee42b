export type ServiceStatus = "Healthy" | "Degraded" | "Unhealthy" | "Failed" | "Recovering";

export const SERVICE_STATUSES = [
  "Healthy",
  "Degraded",
  "Unhealthy",
  "Failed",
  "Recovering"
] as const satisfies readonly ServiceStatus[];

export type RecoveryStrategy = "Restart" | "Degrade" | "Isolate" | "Failover";

export const RECOVERY_STRATEGIES = [
  "Restart",
  "Degrade",
  "Isolate",
  "Failover"
] as const satisfies readonly RecoveryStrategy[];

export type UserImpact = "None" | "Low" | "Medium" | "High";

export type BackoffStrategy = "Fixed" | "Linear" | "Exponential";

export type ExecutionStatus = "Pending" | "Running" | "Success" | "Failed" | "Cancelled" | "RolledBack";

/** Plan target matching every registered service. */
export const WILDCARD_SERVICE = "*";

export function isRecoveryStrategy(value: unknown): value is RecoveryStrategy {
  return RECOVERY_STRATEGIES.some(strategy => strategy === value);
}

export function isServiceStatus(value: unknown): value is ServiceStatus {
  return SERVICE_STATUSES.some(status => status === value);
}

export function isTerminalExecutionStatus(status: ExecutionStatus): boolean {
  return status !== "Pending" && status !== "Running";
}

export interface HealthReport {
  status: "healthy" | "degraded" | "unhealthy";
  errorRate?: number;
  details?: string;
  metrics?: Record<string, number>;
}

export type HealthCheckResult = boolean | HealthReport;

/** A hook reports failure by returning (or resolving to) `false`. */
export type HookResult = void | boolean | Promise<void | boolean>;

/**
 * Contract a supervised service exposes. Every member is optional: a handle
 * without `checkHealth` is healthy as long as it exists, and a missing
 * recovery hook makes the matching built-in step a no-op.
 */
export interface MonitoredService {
  checkHealth?(signal: AbortSignal): HealthCheckResult | Promise<HealthCheckResult>;
  prepareRestart?(signal: AbortSignal): HookResult;
  stop?(signal: AbortSignal): HookResult;
  clearResources?(signal: AbortSignal): HookResult;
  start?(signal: AbortSignal): HookResult;
  applyPerformanceLimits?(signal: AbortSignal): HookResult;
  disableNonEssentialFeatures?(signal: AbortSignal): HookResult;
  isolate?(signal: AbortSignal): HookResult;
  onDependencyIsolated?(dependency: string, signal: AbortSignal): HookResult;
  exportState?(signal: AbortSignal): unknown;
  importState?(state: unknown, signal: AbortSignal): HookResult;
  prepareFailover?(signal: AbortSignal): HookResult;
  activate?(signal: AbortSignal): HookResult;
}

export interface ServiceHealth {
  name: string;
  status: ServiceStatus;
  lastCheckTime: number;
  consecutiveFailures: number;
  uptimeStart: number;
  responseTimeMs: number;
  errorRate: number;
  dependencies: string[];
  failoverTarget?: string;
  lastRecoveryTime?: number;
  recoveryCount: number;
  lastError?: string;
  metadata: Record<string, unknown>;
}

export interface RetryPolicy {
  maxRetries: number;
  backoff: BackoffStrategy;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface ServiceHandleRef {
  name: string;
  service: MonitoredService;
}

export interface RecoveryStepContext {
  serviceName: string;
  service: MonitoredService;
  health: ServiceHealth;
  executionId: string;
  planId: string;
  stepIndex: number;
  attempt: number;
  signal: AbortSignal;
  failoverTarget?: ServiceHandleRef;
  dependents: ServiceHandleRef[];
  /**
   * Runs the health check of the recovering service, or of `target`, under the
   * step's signal. A degraded report passes only with `acceptDegraded`.
   */
  checkHealth(target?: string, options?: { acceptDegraded?: boolean }): Promise<boolean>;
  /** Scratch space shared by the steps of one execution. */
  state: Map<string, unknown>;
}

export type StepAction = (ctx: RecoveryStepContext) => boolean | Promise<boolean>;

export type StepRollback = (ctx: RecoveryStepContext) => HookResult;

export interface RecoveryStep {
  name: string;
  description: string;
  timeoutMs: number;
  /** Falls back to the plan's `retryPolicy.maxRetries` when omitted. */
  retryCount?: number;
  action: StepAction;
  verify?: StepAction;
  rollback?: StepRollback;
}

export interface RecoveryPlan {
  id: string;
  serviceName: string;
  strategy: RecoveryStrategy;
  priority: number;
  estimatedDurationMs: number;
  userImpact: UserImpact;
  steps: readonly RecoveryStep[];
  rollbackSteps?: readonly RecoveryStep[];
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  preconditions?: readonly string[];
  description?: string;
}

export interface RecoveryExecution {
  id: string;
  planId: string;
  serviceName: string;
  strategy: RecoveryStrategy;
  trigger: string;
  status: ExecutionStatus;
  startTime: number;
  endTime?: number;
  currentStep: number;
  totalSteps: number;
  errors: string[];
  metrics: Record<string, unknown>;
  userNotifications: boolean;
}

export type HealthChangeReason = "health_check" | "manual" | "recovery_triggered" | "recovery_succeeded" | "recovery_ended";

export interface HealthChangedEvent {
  serviceName: string;
  previousStatus: ServiceStatus;
  newStatus: ServiceStatus;
  reason: HealthChangeReason;
  health: ServiceHealth;
  timestamp: number;
}

export interface RecoveryStartedEvent {
  executionId: string;
  serviceName: string;
  planId: string;
  strategy: RecoveryStrategy;
  trigger: string;
  timestamp: number;
}

export interface RecoveryCompletedEvent {
  executionId: string;
  serviceName: string;
  strategy: RecoveryStrategy;
  durationMs: number;
  timestamp: number;
}

export interface RecoveryFailedEvent {
  executionId: string;
  serviceName: string;
  strategy: RecoveryStrategy;
  errors: string[];
  currentStep: number;
  timestamp: number;
}

export interface ServiceRecoveredEvent {
  serviceName: string;
  executionId: string;
  strategy: RecoveryStrategy;
  timestamp: number;
}

export interface RecoveryEventMap {
  "health-changed": HealthChangedEvent;
  "recovery-started": RecoveryStartedEvent;
  "recovery-completed": RecoveryCompletedEvent;
  "recovery-failed": RecoveryFailedEvent;
  "service-recovered": ServiceRecoveredEvent;
}

export type RecoveryEventName = keyof RecoveryEventMap;

export type NotificationPhase = "started" | "completed" | "failed";

export type NotificationSeverity = "info" | "warning" | "success" | "error";

export interface RecoveryNotification {
  serviceName: string;
  message: string;
  severity: NotificationSeverity;
  phase: NotificationPhase;
  executionId: string;
  timestamp: number;
}

export interface RecoveryStatistics {
  totalServices: number;
  healthyServices: number;
  degradedServices: number;
  unhealthyServices: number;
  failedServices: number;
  recoveringServices: number;
  totalRecoveries: number;
  successfulRecoveries: number;
  failedRecoveries: number;
  cancelledRecoveries: number;
  activeRecoveries: number;
  queuedRecoveries: number;
}

export type OrchestratorHealthState = "healthy" | "warning" | "degraded" | "critical";

export interface OrchestratorHealth {
  status: OrchestratorHealthState;
  recoveryRate: number;
  statistics: RecoveryStatistics;
}
