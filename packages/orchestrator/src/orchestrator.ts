import {
  DEFAULT_MONITORING,
  DEFAULT_SCHEDULING,
  DEFAULT_SELECTION,
  LogLevel,
  isServiceStatus,
  isTerminalExecutionStatus,
  type HealthChangeReason,
  type HealthMonitoringConfig,
  type MonitoredService,
  type OrchestratorHealth,
  type RecoveryEventMap,
  type RecoveryEventName,
  type RecoveryExecution,
  type RecoveryPlan,
  type RecoverySchedulingConfig,
  type RecoveryStatistics,
  type RecoveryStrategy,
  type ServiceHealth,
  type ServiceStatus,
  type StrategySelectionConfig
} from "@warden/shared";
import { StructuredLogger, createConsoleSink, type ComponentLogger } from "@warden/logger";
import { ServiceRegistry, type RegisterServiceOptions } from "./registry/serviceRegistry";
import { HealthMonitor, type ErrorReporter } from "./health/monitor";
import { classifyFailures, isRecoveryCandidate } from "./health/classify";
import { RecoveryPlanCatalog } from "./recovery/catalog";
import { ExecutionStore } from "./recovery/executionStore";
import { RecoveryExecutor } from "./recovery/executor";
import { RecoveryScheduler } from "./recovery/scheduler";
import type { RandomSource } from "./recovery/backoff";
import { selectStrategy } from "./strategy/selector";
import { NotificationDispatcher, type UserNotifier } from "./notifications/notifier";
import { RecoveryEvents, type RecoveryListener } from "./events";
import { assessOrchestratorHealth, computeStatistics } from "./stats";
import { describeError } from "./errors";

export interface ServiceDiscoveryOptions {
  /** Returns the services currently known to the environment, keyed by name. */
  source: () => Record<string, MonitoredService> | Promise<Record<string, MonitoredService>>;
  intervalMs: number;
}

export interface OrchestratorSettings {
  monitoring: HealthMonitoringConfig;
  recovery: RecoverySchedulingConfig;
  selection: StrategySelectionConfig;
}

export interface RecoveryOrchestratorOptions {
  monitoring?: Partial<HealthMonitoringConfig>;
  recovery?: Partial<RecoverySchedulingConfig>;
  selection?: Partial<StrategySelectionConfig>;
  logger?: ComponentLogger;
  errorReporter?: ErrorReporter;
  discovery?: ServiceDiscoveryOptions;
  /** Registers the four wildcard plans; defaults to true. */
  builtinPlans?: boolean;
  random?: RandomSource;
  now?: () => number;
  createId?: () => string;
}

function defaultLogger(): ComponentLogger {
  return new StructuredLogger({
    sessionId: "local",
    component: "orchestrator",
    level: LogLevel.INFO,
    sinks: [createConsoleSink({ level: LogLevel.INFO, format: "pretty" })]
  });
}

export class RecoveryOrchestrator {
  private settings: OrchestratorSettings;
  private readonly logger: ComponentLogger;
  private readonly now: () => number;
  private readonly registry: ServiceRegistry;
  private readonly catalog: RecoveryPlanCatalog;
  private readonly store: ExecutionStore;
  private readonly events: RecoveryEvents;
  private readonly notifications: NotificationDispatcher;
  private readonly monitor: HealthMonitor;
  private readonly executor: RecoveryExecutor;
  private readonly scheduler: RecoveryScheduler;
  private discoveryTimer?: NodeJS.Timeout;
  private started = false;

  constructor(private readonly options: RecoveryOrchestratorOptions = {}) {
    this.settings = {
      monitoring: {
        ...DEFAULT_MONITORING,
        ...options.monitoring,
        thresholds: { ...DEFAULT_MONITORING.thresholds, ...options.monitoring?.thresholds }
      },
      recovery: { ...DEFAULT_SCHEDULING, ...options.recovery },
      selection: { ...DEFAULT_SELECTION, ...options.selection }
    };
    this.logger = options.logger ?? defaultLogger();
    this.now = options.now ?? Date.now;
    this.registry = new ServiceRegistry(this.now);
    this.catalog = new RecoveryPlanCatalog({ builtins: options.builtinPlans ?? true });
    this.store = new ExecutionStore(this.now, options.createId);
    this.events = new RecoveryEvents(this.logger.child("orchestrator.events"));
    this.notifications = new NotificationDispatcher(this.logger.child("orchestrator.notifications"), this.now);
    this.monitor = new HealthMonitor({
      registry: this.registry,
      config: this.settings.monitoring,
      logger: this.logger.child("orchestrator.monitor"),
      errorReporter: options.errorReporter,
      now: this.now,
      onStatusChange: event => this.events.emit("health-changed", event),
      onRecoveryNeeded: serviceName => {
        this.triggerRecovery(serviceName, "auto");
      }
    });
    this.executor = new RecoveryExecutor({
      registry: this.registry,
      store: this.store,
      events: this.events,
      notifications: this.notifications,
      logger: this.logger.child("recovery.executor"),
      thresholds: () => this.settings.monitoring.thresholds,
      random: options.random,
      now: this.now,
      onFinished: execution => {
        if (execution.status === "Failed") {
          this.monitor.rearm(execution.serviceName);
        }
      }
    });
    this.scheduler = new RecoveryScheduler({
      store: this.store,
      runner: this.executor,
      config: this.settings.recovery,
      logger: this.logger.child("recovery.scheduler")
    });
  }

  // Lifecycle

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.monitor.start();
    this.scheduler.start();
    if (this.options.discovery) {
      this.scheduleDiscovery(0);
    }
    this.logger.log(LogLevel.INFO, "orchestrator_started", {
      services: this.registry.names().length,
      plans: Object.keys(this.catalog.list()).length
    });
  }

  async stop(options: { drain?: boolean } = {}): Promise<void> {
    if (this.discoveryTimer) {
      clearTimeout(this.discoveryTimer);
      this.discoveryTimer = undefined;
    }
    this.started = false;
    await this.monitor.stop();
    await this.scheduler.stop(options);
    this.logger.log(LogLevel.INFO, "orchestrator_stopped", { drained: options.drain === true });
  }

  isRunning(): boolean {
    return this.started;
  }

  /** One monitoring pass followed by one dispatch pass. */
  async tick(): Promise<void> {
    await this.monitor.runOnce();
    this.scheduler.dispatch();
  }

  /** Resolves once no recovery task is in flight. */
  idle(): Promise<void> {
    return this.scheduler.idle();
  }

  getSettings(): OrchestratorSettings {
    return {
      monitoring: { ...this.settings.monitoring, thresholds: { ...this.settings.monitoring.thresholds } },
      recovery: { ...this.settings.recovery },
      selection: { ...this.settings.selection }
    };
  }

  updateSettings(next: Partial<OrchestratorSettings>): void {
    this.settings = {
      monitoring: next.monitoring ? { ...next.monitoring, thresholds: { ...next.monitoring.thresholds } } : this.settings.monitoring,
      recovery: next.recovery ? { ...next.recovery } : this.settings.recovery,
      selection: next.selection ? { ...next.selection } : this.settings.selection
    };
    this.monitor.updateConfig(this.settings.monitoring);
    this.scheduler.updateConfig(this.settings.recovery);
    this.logger.log(LogLevel.INFO, "settings_updated", { sections: Object.keys(next) });
  }

  // Registration

  registerService(
    name: string,
    service: MonitoredService,
    dependencies: readonly string[] = [],
    options: RegisterServiceOptions = {}
  ): ServiceHealth {
    const active = this.store.activeFor(name.trim());
    if (active) {
      this.cancelRecovery(active.id);
    }
    const health = this.registry.register(name, service, dependencies, options);
    this.monitor.forget(health.name);
    this.logger.log(LogLevel.INFO, "service_registered", {
      service: health.name,
      dependencies: health.dependencies,
      failoverTarget: health.failoverTarget
    });
    return health;
  }

  unregisterService(name: string): boolean {
    const active = this.store.activeFor(name);
    if (active) {
      this.cancelRecovery(active.id);
    }
    const removed = this.registry.unregister(name);
    this.monitor.forget(name);
    if (removed) {
      this.logger.log(LogLevel.INFO, "service_unregistered", { service: name });
    }
    return removed;
  }

  registerRecoveryPlan(plan: RecoveryPlan): RecoveryPlan {
    const registered = this.catalog.register(plan);
    this.logger.log(LogLevel.INFO, "recovery_plan_registered", {
      planId: registered.id,
      serviceName: registered.serviceName,
      strategy: registered.strategy,
      steps: registered.steps.length
    });
    return registered;
  }

  addNotifier(notifier: UserNotifier): () => void {
    return this.notifications.add(notifier);
  }

  // Recovery control

  /**
   * Creates (or returns the already active) execution for `serviceName`.
   * Returns null when the service is unknown or no plan covers the strategy.
   */
  triggerRecovery(serviceName: string, cause: string, strategy?: RecoveryStrategy): string | null {
    const health = this.registry.get(serviceName);
    if (!health) {
      this.logger.log(LogLevel.WARN, "recovery_trigger_rejected", {
        service: serviceName,
        cause,
        reason: "unknown_service"
      });
      return null;
    }
    const active = this.store.activeFor(serviceName);
    if (active) {
      return active.id;
    }

    const chosen =
      strategy ??
      selectStrategy(
        health,
        { hasFailoverTarget: this.registry.failoverTargetOf(serviceName) !== undefined },
        this.settings.selection
      );
    const plan = this.catalog.resolve(serviceName, chosen);
    if (!plan) {
      this.logger.log(LogLevel.ERROR, "recovery_trigger_rejected", {
        service: serviceName,
        cause,
        strategy: chosen,
        reason: "no_plan"
      });
      return null;
    }

    const execution = this.store.create(plan, serviceName, cause);
    this.setStatus(serviceName, "Recovering", "recovery_triggered");
    this.logger.log(LogLevel.INFO, "recovery_triggered", {
      executionId: execution.id,
      service: serviceName,
      cause,
      strategy: chosen,
      planId: plan.id,
      consecutiveFailures: health.consecutiveFailures,
      errorRate: health.errorRate
    });
    this.scheduler.enqueue(execution.id);
    return execution.id;
  }

  /** Pending or Running executions only; a running step finishes before the cancellation is observed. */
  cancelRecovery(executionId: string): boolean {
    const record = this.store.getRecord(executionId);
    if (!record || isTerminalExecutionStatus(record.execution.status)) {
      return false;
    }
    const { execution } = record;
    execution.status = "Cancelled";
    execution.endTime = this.now();
    this.scheduler.remove(executionId);

    const current = this.registry.get(execution.serviceName);
    if (current?.status === "Recovering") {
      this.setStatus(
        execution.serviceName,
        classifyFailures(current.consecutiveFailures, this.settings.monitoring.thresholds),
        "recovery_ended"
      );
    }
    this.monitor.rearm(execution.serviceName);
    this.logger.log(LogLevel.WARN, "recovery_cancelled", {
      executionId,
      service: execution.serviceName,
      currentStep: execution.currentStep
    });
    return true;
  }

  rollbackRecovery(executionId: string): Promise<boolean> {
    return this.executor.rollback(executionId);
  }

  /**
   * Manual override that survives the next health tick. Any active recovery
   * for the service is cancelled first; forcing Unhealthy or Failed triggers
   * a new one.
   */
  forceServiceStatus(serviceName: string, status: ServiceStatus): boolean {
    if (!isServiceStatus(status) || status === "Recovering") {
      this.logger.log(LogLevel.WARN, "force_status_rejected", { service: serviceName, status });
      return false;
    }
    if (!this.registry.has(serviceName)) {
      this.logger.log(LogLevel.WARN, "force_status_rejected", {
        service: serviceName,
        status,
        reason: "unknown_service"
      });
      return false;
    }
    const active = this.store.activeFor(serviceName);
    if (active) {
      this.cancelRecovery(active.id);
    }
    this.setStatus(serviceName, status, "manual");
    this.monitor.markOverride(serviceName);
    this.logger.log(LogLevel.WARN, "service_status_forced", { service: serviceName, status });
    if (isRecoveryCandidate(status)) {
      this.triggerRecovery(serviceName, "manual");
    }
    return true;
  }

  // Queries

  getServiceHealth(): Record<string, ServiceHealth>;
  getServiceHealth(name: string): ServiceHealth | undefined;
  getServiceHealth(name?: string): ServiceHealth | Record<string, ServiceHealth> | undefined {
    return name === undefined ? this.registry.getAll() : this.registry.get(name);
  }

  /** Every retained execution, including finished ones still inside the retention window. */
  getActiveRecoveries(): Record<string, RecoveryExecution> {
    const result: Record<string, RecoveryExecution> = {};
    for (const execution of this.store.all()) {
      result[execution.id] = execution;
    }
    return result;
  }

  getRecovery(executionId: string): RecoveryExecution | undefined {
    return this.store.get(executionId);
  }

  getRecoveryPlans(): Record<string, RecoveryPlan> {
    return this.catalog.list();
  }

  getStatistics(): RecoveryStatistics {
    return computeStatistics(
      Object.values(this.registry.getAll()),
      this.store.all(),
      this.scheduler.queuedCount()
    );
  }

  getSelfHealth(): OrchestratorHealth {
    return assessOrchestratorHealth(this.getStatistics());
  }

  on<K extends RecoveryEventName>(event: K, listener: RecoveryListener<K>): () => void {
    return this.events.on(event, listener);
  }

  off<K extends RecoveryEventName>(event: K, listener: (payload: RecoveryEventMap[K]) => void): void {
    this.events.off(event, listener);
  }

  // Discovery

  /** Registers every service the discovery source reports that is not yet known. */
  async discoverServices(): Promise<string[]> {
    const discovery = this.options.discovery;
    if (!discovery) {
      return [];
    }
    const found = await discovery.source();
    const added: string[] = [];
    for (const [name, service] of Object.entries(found)) {
      if (!name.trim() || this.registry.has(name)) {
        continue;
      }
      this.registerService(name, service);
      added.push(name);
    }
    if (added.length > 0) {
      this.logger.log(LogLevel.INFO, "services_discovered", { services: added });
    }
    return added;
  }

  private scheduleDiscovery(delayMs: number): void {
    const discovery = this.options.discovery;
    if (!discovery) {
      return;
    }
    this.discoveryTimer = setTimeout(() => {
      this.discoverServices()
        .catch(error => {
          this.logger.log(LogLevel.WARN, "service_discovery_failed", { error: describeError(error) });
        })
        .finally(() => {
          if (this.started) {
            this.scheduleDiscovery(discovery.intervalMs);
          }
        });
    }, delayMs);
  }

  private setStatus(serviceName: string, status: ServiceStatus, reason: HealthChangeReason): void {
    const before = this.registry.get(serviceName);
    const after = this.registry.update(serviceName, health => {
      health.status = status;
    });
    if (!before || !after || before.status === after.status) {
      return;
    }
    this.events.emit("health-changed", {
      serviceName,
      previousStatus: before.status,
      newStatus: after.status,
      reason,
      health: after,
      timestamp: this.now()
    });
  }
}
