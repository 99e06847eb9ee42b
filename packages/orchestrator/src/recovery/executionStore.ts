import { randomUUID } from "node:crypto";
import {
  isTerminalExecutionStatus,
  type RecoveryExecution,
  type RecoveryPlan
} from "@warden/shared";

export interface ExecutionRecord {
  execution: RecoveryExecution;
  /** Plan as resolved at trigger time; later catalog changes do not affect it. */
  plan: RecoveryPlan;
}

export function cloneExecution(execution: RecoveryExecution): RecoveryExecution {
  return {
    ...execution,
    errors: [...execution.errors],
    metrics: Object.fromEntries(
      Object.entries(execution.metrics).map(([key, value]) => [key, Array.isArray(value) ? [...value] : value])
    )
  };
}

export class ExecutionStore {
  private readonly records = new Map<string, ExecutionRecord>();

  constructor(
    private readonly now: () => number = Date.now,
    private readonly createId: () => string = randomUUID
  ) {}

  create(plan: RecoveryPlan, serviceName: string, trigger: string): RecoveryExecution {
    const execution: RecoveryExecution = {
      id: this.createId(),
      planId: plan.id,
      serviceName,
      strategy: plan.strategy,
      trigger,
      status: "Pending",
      startTime: this.now(),
      currentStep: 0,
      totalSteps: plan.steps.length,
      errors: [],
      metrics: {},
      userNotifications: plan.userImpact !== "None"
    };
    this.records.set(execution.id, { execution, plan });
    return execution;
  }

  /** Live record; only the executor and cancellation mutate it. */
  getRecord(id: string): ExecutionRecord | undefined {
    return this.records.get(id);
  }

  get(id: string): RecoveryExecution | undefined {
    const record = this.records.get(id);
    return record ? cloneExecution(record.execution) : undefined;
  }

  all(): RecoveryExecution[] {
    return [...this.records.values()].map(record => cloneExecution(record.execution));
  }

  activeFor(serviceName: string): RecoveryExecution | undefined {
    for (const { execution } of this.records.values()) {
      if (execution.serviceName === serviceName && !isTerminalExecutionStatus(execution.status)) {
        return execution;
      }
    }
    return undefined;
  }

  /** Removes finished executions whose end lies more than `retentionMs` in the past. */
  purgeExpired(retentionMs: number): string[] {
    const cutoff = this.now() - retentionMs;
    const purged: string[] = [];
    for (const [id, { execution }] of this.records) {
      if (
        isTerminalExecutionStatus(execution.status) &&
        execution.endTime !== undefined &&
        execution.endTime <= cutoff
      ) {
        this.records.delete(id);
        purged.push(id);
      }
    }
    return purged;
  }
}
