import {
  LogLevel,
  type NotificationPhase,
  type NotificationSeverity,
  type RecoveryExecution,
  type RecoveryNotification
} from "@warden/shared";
import type { ComponentLogger } from "@warden/logger";
import { describeError } from "../errors";

export interface UserNotifier {
  notify(notification: RecoveryNotification): void | Promise<void>;
}

const phaseMessages: Record<NotificationPhase, { prefix: string; severity: NotificationSeverity }> = {
  started: { prefix: "Service recovery in progress", severity: "warning" },
  completed: { prefix: "Service recovery completed", severity: "success" },
  failed: { prefix: "Service recovery failed", severity: "error" }
};

export function buildNotification(
  execution: Pick<RecoveryExecution, "id" | "serviceName">,
  phase: NotificationPhase,
  timestamp: number
): RecoveryNotification {
  const { prefix, severity } = phaseMessages[phase];
  return {
    serviceName: execution.serviceName,
    message: `${prefix}: ${execution.serviceName}`,
    severity,
    phase,
    executionId: execution.id,
    timestamp
  };
}

export class NotificationDispatcher {
  private readonly notifiers = new Set<UserNotifier>();

  constructor(
    private readonly logger: ComponentLogger,
    private readonly now: () => number = Date.now
  ) {}

  add(notifier: UserNotifier): () => void {
    this.notifiers.add(notifier);
    return () => {
      this.notifiers.delete(notifier);
    };
  }

  /** Skipped for executions whose plan has no user impact. */
  dispatch(execution: RecoveryExecution, phase: NotificationPhase): void {
    if (!execution.userNotifications || this.notifiers.size === 0) {
      return;
    }
    const notification = buildNotification(execution, phase, this.now());
    for (const notifier of this.notifiers) {
      try {
        const pending = notifier.notify(notification);
        if (pending) {
          pending.catch(error => this.reportFailure(notification, error));
        }
      } catch (error) {
        this.reportFailure(notification, error);
      }
    }
  }

  private reportFailure(notification: RecoveryNotification, error: unknown): void {
    this.logger.log(LogLevel.WARN, "notifier_failed", {
      service: notification.serviceName,
      executionId: notification.executionId,
      phase: notification.phase,
      error: describeError(error)
    });
  }
}
