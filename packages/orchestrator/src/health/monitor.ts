import {
  LogLevel,
  type HealthChangedEvent,
  type HealthCheckResult,
  type HealthMonitoringConfig,
  type HealthReport
} from "@warden/shared";
import type { ComponentLogger } from "@warden/logger";
import type { ServiceRegistry } from "../registry/serviceRegistry";
import { HealthCheckTimeoutError, describeError } from "../errors";
import { runWithDeadline } from "../recovery/deadline";
import { classifyFailures, isRecoveryCandidate } from "./classify";

/** Receives every failed health check; failures inside the reporter are logged and dropped. */
export interface ErrorReporter {
  report(error: unknown, source: string, context: Record<string, unknown>): void;
}

export interface HealthMonitorOptions {
  registry: ServiceRegistry;
  config: HealthMonitoringConfig;
  logger: ComponentLogger;
  errorReporter?: ErrorReporter;
  onStatusChange?: (event: HealthChangedEvent) => void;
  /** Called when a service should be recovered; must be idempotent per service. */
  onRecoveryNeeded?: (serviceName: string) => void;
  now?: () => number;
}

interface CheckOutcome {
  ok: boolean;
  responseTimeMs: number;
  report?: HealthReport;
  error?: unknown;
}

export class HealthMonitor {
  private config: HealthMonitoringConfig;
  private readonly logger: ComponentLogger;
  private readonly now: () => number;
  private readonly overrides = new Set<string>();
  private readonly rearmed = new Set<string>();
  private timer?: NodeJS.Timeout;
  private current: Promise<void> | null = null;
  private running = false;

  constructor(private readonly options: HealthMonitorOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.cycle();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.current) {
      await this.current;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  updateConfig(next: HealthMonitoringConfig): void {
    this.config = next;
  }

  /** Keeps the next derived status from replacing a manually forced one. */
  markOverride(serviceName: string): void {
    this.overrides.add(serviceName);
  }

  /** Lets the next failing check of an unhealthy service trigger recovery again. */
  rearm(serviceName: string): void {
    this.rearmed.add(serviceName);
  }

  forget(serviceName: string): void {
    this.overrides.delete(serviceName);
    this.rearmed.delete(serviceName);
  }

  async runOnce(): Promise<void> {
    for (const name of this.options.registry.names()) {
      await this.checkService(name);
    }
  }

  async checkService(name: string): Promise<void> {
    const service = this.options.registry.getService(name);
    const atStart = this.options.registry.get(name);
    if (!service || !atStart) {
      return;
    }
    const outcome = await this.runCheck(name, service.checkHealth?.bind(service));

    // Status may have moved while the check was pending; compare against the live one.
    const before = this.options.registry.get(name);
    if (!before) {
      return;
    }
    if (!outcome.ok && atStart.status === "Recovering" && before.status !== "Recovering") {
      this.logger.log(LogLevel.DEBUG, "stale_health_check_dropped", {
        service: name,
        status: before.status,
        error: describeError(outcome.error)
      });
      return;
    }
    if (outcome.error !== undefined) {
      this.reportError(outcome.error, name);
    }

    const checkedAt = this.now();
    const overridden = this.overrides.delete(name);
    const after = this.options.registry.update(name, health => {
      health.lastCheckTime = checkedAt;
      health.responseTimeMs = outcome.responseTimeMs;
      if (outcome.report?.errorRate !== undefined) {
        health.errorRate = Math.min(1, Math.max(0, outcome.report.errorRate));
      }
      if (outcome.report?.metrics) {
        health.metadata.metrics = { ...outcome.report.metrics };
      }
      if (outcome.ok) {
        health.consecutiveFailures = 0;
        health.lastError = undefined;
      } else {
        health.consecutiveFailures += 1;
        health.lastError = describeError(outcome.error);
      }
      if (health.status !== "Recovering" && !overridden) {
        health.status = classifyFailures(health.consecutiveFailures, this.config.thresholds);
      }
    });
    if (!after) {
      return;
    }

    this.logger.log(LogLevel.DEBUG, "health_checked", {
      service: name,
      ok: outcome.ok,
      consecutiveFailures: after.consecutiveFailures,
      responseTimeMs: outcome.responseTimeMs
    });

    if (after.status !== before.status) {
      this.options.onStatusChange?.({
        serviceName: name,
        previousStatus: before.status,
        newStatus: after.status,
        reason: "health_check",
        health: after,
        timestamp: checkedAt
      });
    }

    if (outcome.ok) {
      this.rearmed.delete(name);
      return;
    }
    if (!isRecoveryCandidate(after.status)) {
      return;
    }
    const entered = after.status !== before.status;
    if (entered || this.rearmed.delete(name)) {
      this.requestRecovery(name);
    }
  }

  private cycle(): void {
    this.current = this.runOnce()
      .catch(error => {
        this.logger.log(LogLevel.ERROR, "health_tick_failed", { error: describeError(error) });
      })
      .finally(() => {
        this.current = null;
        if (this.running) {
          this.timer = setTimeout(() => this.cycle(), this.config.intervalMs);
        }
      });
  }

  private async runCheck(
    name: string,
    check: ((signal: AbortSignal) => HealthCheckResult | Promise<HealthCheckResult>) | undefined
  ): Promise<CheckOutcome> {
    const startedAt = this.now();
    if (!check) {
      return { ok: true, responseTimeMs: 0 };
    }
    try {
      const result = await runWithDeadline(check, this.config.checkTimeoutMs, {
        onTimeout: ms => new HealthCheckTimeoutError(name, ms)
      });
      const responseTimeMs = this.now() - startedAt;
      if (typeof result === "boolean") {
        return result
          ? { ok: true, responseTimeMs }
          : { ok: false, responseTimeMs, error: new Error(`Health check for '${name}' failed`) };
      }
      if (result.status === "healthy") {
        return { ok: true, responseTimeMs, report: result };
      }
      const detail = result.details ? `: ${result.details}` : "";
      return {
        ok: false,
        responseTimeMs,
        report: result,
        error: new Error(`Health check for '${name}' reported ${result.status}${detail}`)
      };
    } catch (error) {
      return { ok: false, responseTimeMs: this.now() - startedAt, error };
    }
  }

  private reportError(error: unknown, serviceName: string): void {
    if (!this.options.errorReporter) {
      return;
    }
    try {
      this.options.errorReporter.report(error, "health_monitor", { serviceName });
    } catch (reporterError) {
      this.logger.log(LogLevel.WARN, "error_reporter_failed", {
        service: serviceName,
        error: describeError(reporterError)
      });
    }
  }

  private requestRecovery(serviceName: string): void {
    try {
      this.options.onRecoveryNeeded?.(serviceName);
    } catch (error) {
      this.logger.log(LogLevel.ERROR, "recovery_request_failed", {
        service: serviceName,
        error: describeError(error)
      });
    }
  }
}
