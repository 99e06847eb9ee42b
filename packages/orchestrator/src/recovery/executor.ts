import {
  LogLevel,
  type FailureThresholds,
  type HookResult,
  type RecoveryExecution,
  type RecoveryPlan,
  type RecoveryStep,
  type RecoveryStepContext
} from "@warden/shared";
import type { ComponentLogger } from "@warden/logger";
import type { ServiceRegistry } from "../registry/serviceRegistry";
import type { RecoveryEvents } from "../events";
import type { NotificationDispatcher } from "../notifications/notifier";
import { classifyFailures } from "../health/classify";
import { StepTimeoutError, describeError } from "../errors";
import { computeBackoffDelay, type RandomSource } from "./backoff";
import { runWithDeadline, sleep } from "./deadline";
import { cloneExecution, type ExecutionStore } from "./executionStore";

export interface RecoveryExecutorOptions {
  registry: ServiceRegistry;
  store: ExecutionStore;
  events: RecoveryEvents;
  notifications: NotificationDispatcher;
  logger: ComponentLogger;
  thresholds: () => FailureThresholds;
  /** Called once an execution reaches Success or Failed. */
  onFinished?: (execution: RecoveryExecution) => void;
  random?: RandomSource;
  now?: () => number;
}

interface StepOutcome {
  ok: boolean;
  attempts: number;
  error?: string;
}

export class RecoveryExecutor {
  private readonly logger: ComponentLogger;
  private readonly now: () => number;
  private readonly random: RandomSource;

  constructor(private readonly options: RecoveryExecutorOptions) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /** Runs a Pending execution to completion; anything else is ignored. */
  async execute(executionId: string): Promise<void> {
    const record = this.options.store.getRecord(executionId);
    if (!record || record.execution.status !== "Pending") {
      return;
    }
    const { execution, plan } = record;
    const startedAt = this.now();
    const deadline = startedAt + plan.timeoutMs;
    execution.status = "Running";
    execution.currentStep = plan.steps.length > 0 ? 1 : 0;
    execution.metrics.queuedMs = startedAt - execution.startTime;

    this.logger.log(LogLevel.INFO, "recovery_started", {
      executionId,
      service: execution.serviceName,
      planId: plan.id,
      strategy: plan.strategy
    });
    this.options.events.emit("recovery-started", {
      executionId,
      serviceName: execution.serviceName,
      planId: plan.id,
      strategy: plan.strategy,
      trigger: execution.trigger,
      timestamp: startedAt
    });
    this.options.notifications.dispatch(cloneExecution(execution), "started");

    if (!this.options.registry.has(execution.serviceName)) {
      execution.errors.push(`Service '${execution.serviceName}' is no longer registered`);
      this.fail(execution, startedAt);
      return;
    }

    const scratch = new Map<string, unknown>();
    const stepAttempts: number[] = [];
    execution.metrics.stepAttempts = stepAttempts;

    for (let index = 0; index < plan.steps.length; index += 1) {
      if (this.isCancelled(execution)) {
        this.logCancelled(execution);
        return;
      }
      const step = plan.steps[index];
      const stepNumber = index + 1;
      execution.currentStep = stepNumber;

      const outcome = await this.runStep(execution, plan, step, stepNumber, deadline, scratch);
      stepAttempts.push(outcome.attempts);
      if (this.isCancelled(execution)) {
        this.logCancelled(execution);
        return;
      }
      if (!outcome.ok) {
        execution.errors.push(`Step ${stepNumber} (${step.name}): ${outcome.error ?? "failed"}`);
        await this.rollbackStep(execution, plan, step, stepNumber, scratch);
        await this.runPlanRollback(execution, plan, scratch);
        this.fail(execution, startedAt);
        return;
      }
    }

    this.succeed(execution, startedAt);
  }

  /**
   * Undoes a finished execution: step rollbacks in reverse up to the last
   * completed step, then the plan's rollback steps if they have not run yet.
   */
  async rollback(executionId: string): Promise<boolean> {
    const record = this.options.store.getRecord(executionId);
    if (!record) {
      return false;
    }
    const { execution, plan } = record;
    const succeeded = execution.status === "Success";
    if (!succeeded && execution.status !== "Failed") {
      return false;
    }
    const scratch = new Map<string, unknown>();
    const lastCompleted = succeeded ? execution.currentStep : execution.currentStep - 1;
    for (let stepNumber = lastCompleted; stepNumber >= 1; stepNumber -= 1) {
      await this.rollbackStep(execution, plan, plan.steps[stepNumber - 1], stepNumber, scratch);
    }
    if (succeeded) {
      await this.runPlanRollback(execution, plan, scratch);
    }
    execution.status = "RolledBack";
    execution.endTime = this.now();
    this.logger.log(LogLevel.WARN, "recovery_rolled_back", {
      executionId,
      service: execution.serviceName,
      planId: plan.id,
      rolledBackSteps: Math.max(0, lastCompleted)
    });
    return true;
  }

  private async runStep(
    execution: RecoveryExecution,
    plan: RecoveryPlan,
    step: RecoveryStep,
    stepNumber: number,
    deadline: number,
    scratch: Map<string, unknown>
  ): Promise<StepOutcome> {
    const attempts = (step.retryCount ?? plan.retryPolicy.maxRetries) + 1;
    let lastError = "failed";
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (this.isCancelled(execution)) {
        return { ok: false, attempts: attempt - 1, error: "cancelled" };
      }
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return {
          ok: false,
          attempts: attempt - 1,
          error: `plan '${plan.id}' exceeded its ${plan.timeoutMs}ms timeout`
        };
      }

      try {
        const acted = await this.runUnderDeadline(
          step.action,
          step.name,
          Math.min(step.timeoutMs, remaining),
          execution,
          plan,
          stepNumber,
          attempt,
          scratch
        );
        if (!acted) {
          lastError = "action reported failure";
        } else if (step.verify) {
          const verified = await this.runUnderDeadline(
            step.verify,
            `${step.name} verification`,
            Math.min(step.timeoutMs, Math.max(0, deadline - this.now())),
            execution,
            plan,
            stepNumber,
            attempt,
            scratch
          );
          if (verified) {
            return { ok: true, attempts: attempt };
          }
          lastError = "verification failed";
        } else {
          return { ok: true, attempts: attempt };
        }
      } catch (error) {
        lastError = describeError(error);
      }

      this.logger.log(LogLevel.WARN, "recovery_step_attempt_failed", {
        executionId: execution.id,
        service: execution.serviceName,
        step: stepNumber,
        stepName: step.name,
        attempt,
        attempts,
        error: lastError
      });

      if (attempt < attempts) {
        await sleep(computeBackoffDelay(plan.retryPolicy, attempt, this.random));
      }
    }
    return { ok: false, attempts, error: lastError };
  }

  private runUnderDeadline(
    fn: (ctx: RecoveryStepContext) => boolean | Promise<boolean>,
    label: string,
    timeoutMs: number,
    execution: RecoveryExecution,
    plan: RecoveryPlan,
    stepNumber: number,
    attempt: number,
    scratch: Map<string, unknown>
  ): Promise<boolean> {
    return runWithDeadline(
      signal => fn(this.buildContext(execution, plan, stepNumber, attempt, signal, scratch)),
      timeoutMs,
      { onTimeout: ms => new StepTimeoutError(label, ms) }
    );
  }

  private buildContext(
    execution: RecoveryExecution,
    plan: RecoveryPlan,
    stepNumber: number,
    attempt: number,
    signal: AbortSignal,
    scratch: Map<string, unknown>
  ): RecoveryStepContext {
    const { registry } = this.options;
    const serviceName = execution.serviceName;
    const service = registry.getService(serviceName) ?? {};
    const health = registry.get(serviceName);
    if (!health) {
      throw new Error(`Service '${serviceName}' is no longer registered`);
    }
    return {
      serviceName,
      service,
      health,
      executionId: execution.id,
      planId: plan.id,
      stepIndex: stepNumber,
      attempt,
      signal,
      failoverTarget: registry.failoverTargetOf(serviceName),
      dependents: registry.dependentsOf(serviceName),
      state: scratch,
      checkHealth: async (target = serviceName, checkOptions = {}) => {
        const handle = registry.getService(target);
        if (!handle) {
          throw new Error(`Service '${target}' is not registered`);
        }
        if (!handle.checkHealth) {
          return true;
        }
        const result = await handle.checkHealth(signal);
        if (typeof result === "boolean") {
          return result;
        }
        return result.status === "healthy" || (checkOptions.acceptDegraded === true && result.status === "degraded");
      }
    };
  }

  private async rollbackStep(
    execution: RecoveryExecution,
    plan: RecoveryPlan,
    step: RecoveryStep | undefined,
    stepNumber: number,
    scratch: Map<string, unknown>
  ): Promise<void> {
    const rollback = step?.rollback;
    if (!step || !rollback) {
      return;
    }
    try {
      const ok = await runWithDeadline(
        signal => settleHook(rollback(this.buildContext(execution, plan, stepNumber, 1, signal, scratch))),
        step.timeoutMs,
        { onTimeout: ms => new StepTimeoutError(`${step.name} rollback`, ms) }
      );
      if (!ok) {
        throw new Error("rollback reported failure");
      }
    } catch (error) {
      const message = describeError(error);
      execution.errors.push(`Rollback for step ${stepNumber} failed: ${message}`);
      this.logger.log(LogLevel.ERROR, "recovery_rollback_failed", {
        executionId: execution.id,
        service: execution.serviceName,
        step: stepNumber,
        error: message
      });
    }
  }

  private async runPlanRollback(
    execution: RecoveryExecution,
    plan: RecoveryPlan,
    scratch: Map<string, unknown>
  ): Promise<void> {
    const steps = plan.rollbackSteps ?? [];
    for (let index = 0; index < steps.length; index += 1) {
      const step = steps[index];
      try {
        const ok = await this.runUnderDeadline(
          step.action,
          step.name,
          step.timeoutMs,
          execution,
          plan,
          index + 1,
          1,
          scratch
        );
        if (!ok) {
          throw new Error("action reported failure");
        }
      } catch (error) {
        const message = describeError(error);
        execution.errors.push(`Rollback step '${step.name}' failed: ${message}`);
        this.logger.log(LogLevel.ERROR, "recovery_rollback_failed", {
          executionId: execution.id,
          service: execution.serviceName,
          rollbackStep: step.name,
          error: message
        });
      }
    }
  }

  private succeed(execution: RecoveryExecution, startedAt: number): void {
    const endTime = this.now();
    execution.status = "Success";
    execution.endTime = endTime;
    execution.metrics.durationMs = endTime - startedAt;

    const before = this.options.registry.get(execution.serviceName);
    const after = this.options.registry.update(execution.serviceName, health => {
      health.consecutiveFailures = 0;
      health.status = "Healthy";
      health.recoveryCount += 1;
      health.lastRecoveryTime = endTime;
      health.lastError = undefined;
    });

    this.logger.log(LogLevel.INFO, "recovery_completed", {
      executionId: execution.id,
      service: execution.serviceName,
      strategy: execution.strategy,
      durationMs: endTime - startedAt
    });
    if (before && after && before.status !== after.status) {
      this.options.events.emit("health-changed", {
        serviceName: execution.serviceName,
        previousStatus: before.status,
        newStatus: after.status,
        reason: "recovery_succeeded",
        health: after,
        timestamp: endTime
      });
    }
    this.options.events.emit("recovery-completed", {
      executionId: execution.id,
      serviceName: execution.serviceName,
      strategy: execution.strategy,
      durationMs: endTime - startedAt,
      timestamp: endTime
    });
    this.options.events.emit("service-recovered", {
      serviceName: execution.serviceName,
      executionId: execution.id,
      strategy: execution.strategy,
      timestamp: endTime
    });
    this.options.notifications.dispatch(cloneExecution(execution), "completed");
    this.options.onFinished?.(cloneExecution(execution));
  }

  private fail(execution: RecoveryExecution, startedAt: number): void {
    const endTime = this.now();
    execution.status = "Failed";
    execution.endTime = endTime;
    execution.metrics.durationMs = endTime - startedAt;

    const thresholds = this.options.thresholds();
    const before = this.options.registry.get(execution.serviceName);
    const after = this.options.registry.update(execution.serviceName, health => {
      if (health.status === "Recovering") {
        health.status = classifyFailures(health.consecutiveFailures, thresholds);
      }
    });

    this.logger.log(LogLevel.ERROR, "recovery_failed", {
      executionId: execution.id,
      service: execution.serviceName,
      strategy: execution.strategy,
      currentStep: execution.currentStep,
      errors: [...execution.errors]
    });
    if (before && after && before.status !== after.status) {
      this.options.events.emit("health-changed", {
        serviceName: execution.serviceName,
        previousStatus: before.status,
        newStatus: after.status,
        reason: "recovery_ended",
        health: after,
        timestamp: endTime
      });
    }
    this.options.events.emit("recovery-failed", {
      executionId: execution.id,
      serviceName: execution.serviceName,
      strategy: execution.strategy,
      errors: [...execution.errors],
      currentStep: execution.currentStep,
      timestamp: endTime
    });
    this.options.notifications.dispatch(cloneExecution(execution), "failed");
    this.options.onFinished?.(cloneExecution(execution));
  }

  // Reads through a call so status checks are not narrowed across awaits
  private isCancelled(execution: RecoveryExecution): boolean {
    return execution.status === "Cancelled";
  }

  private logCancelled(execution: RecoveryExecution): void {
    this.logger.log(LogLevel.WARN, "recovery_cancelled", {
      executionId: execution.id,
      service: execution.serviceName,
      currentStep: execution.currentStep
    });
  }
}

async function settleHook(result: HookResult): Promise<boolean> {
  return (await result) !== false;
}
