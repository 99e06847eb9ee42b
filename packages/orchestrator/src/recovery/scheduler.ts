import { LogLevel, type RecoverySchedulingConfig } from "@warden/shared";
import type { ComponentLogger } from "@warden/logger";
import { describeError } from "../errors";
import type { ExecutionStore } from "./executionStore";

export interface ExecutionRunner {
  execute(executionId: string): Promise<void>;
}

export interface RecoverySchedulerOptions {
  store: ExecutionStore;
  runner: ExecutionRunner;
  config: RecoverySchedulingConfig;
  logger: ComponentLogger;
}

interface InFlightTask {
  serviceName: string;
  task: Promise<void>;
}

/**
 * FIFO admission of Pending executions, bounded by maxConcurrentRecoveries.
 * Slots are held by in-flight tasks rather than by Running statuses, so a
 * cancelled execution whose step is still running keeps its slot. At most one
 * task runs per service; later executions for a busy service stay queued in
 * their place.
 */
export class RecoveryScheduler {
  private readonly queue: string[] = [];
  private readonly inFlight = new Map<string, InFlightTask>();
  private config: RecoverySchedulingConfig;
  private timer?: NodeJS.Timeout;

  constructor(private readonly options: RecoverySchedulerOptions) {
    this.config = options.config;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.dispatch(), this.config.queueIntervalMs);
    this.dispatch();
  }

  async stop(options: { drain?: boolean } = {}): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (options.drain) {
      await this.idle();
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  updateConfig(next: RecoverySchedulingConfig): void {
    const intervalChanged = next.queueIntervalMs !== this.config.queueIntervalMs;
    this.config = next;
    if (intervalChanged && this.timer) {
      clearInterval(this.timer);
      this.timer = setInterval(() => this.dispatch(), this.config.queueIntervalMs);
    }
  }

  /** Queues a Pending execution; while started, admission happens right away. */
  enqueue(executionId: string): void {
    this.queue.push(executionId);
    if (this.timer) {
      this.dispatch();
    }
  }

  remove(executionId: string): boolean {
    const index = this.queue.indexOf(executionId);
    if (index === -1) {
      return false;
    }
    this.queue.splice(index, 1);
    return true;
  }

  queuedCount(): number {
    return this.queue.length;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  /** One scheduling pass: purge expired executions, then fill free slots. */
  dispatch(): string[] {
    const purged = this.options.store.purgeExpired(this.config.retentionMs);
    if (purged.length > 0) {
      this.options.logger.log(LogLevel.DEBUG, "executions_purged", { count: purged.length });
    }

    const busy = new Set([...this.inFlight.values()].map(entry => entry.serviceName));
    const held: string[] = [];
    const admitted: string[] = [];
    while (this.inFlight.size < this.config.maxConcurrentRecoveries && this.queue.length > 0) {
      const executionId = this.queue.shift();
      if (executionId === undefined) {
        break;
      }
      const record = this.options.store.getRecord(executionId);
      if (!record || record.execution.status !== "Pending") {
        continue;
      }
      const { serviceName } = record.execution;
      if (busy.has(serviceName)) {
        held.push(executionId);
        continue;
      }
      busy.add(serviceName);
      this.launch(executionId, serviceName);
      admitted.push(executionId);
    }
    this.queue.unshift(...held);
    return admitted;
  }

  /** Resolves once no execution task is in flight. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()].map(entry => entry.task));
    }
  }

  private launch(executionId: string, serviceName: string): void {
    const task = this.options.runner
      .execute(executionId)
      .catch(error => {
        this.options.logger.log(LogLevel.ERROR, "recovery_task_crashed", {
          executionId,
          error: describeError(error)
        });
      })
      .finally(() => {
        this.inFlight.delete(executionId);
        if (this.timer) {
          this.dispatch();
        }
      });
    this.inFlight.set(executionId, { serviceName, task });
  }
}
