import path from "node:path";
import { appendFile, mkdir } from "node:fs/promises";
import {
  LogLevel,
  meetsLevel,
  type ObservabilityAlertsConfig,
  type RecoveryStatistics,
  type StructuredLogEvent
} from "@warden/shared";
import type { AlertConsumer, ObservabilityService } from "./service";

interface AlertState {
  lastTriggeredAt: number;
}

type TriggerId = keyof ObservabilityAlertsConfig["triggers"];

type AlertFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<unknown>;

const triggerLevels: Record<TriggerId, LogLevel> = {
  recoveryFailed: LogLevel.ERROR,
  serviceFailed: LogLevel.ERROR,
  isolation: LogLevel.WARN,
  unhealthyRatio: LogLevel.CRITICAL
};

export interface AlertManagerOptions {
  logger?: Pick<Console, "warn" | "error">;
  fetchImpl?: AlertFetch;
  now?: () => number;
}

export class AlertManager implements AlertConsumer {
  private readonly state = new Map<TriggerId, AlertState>();
  private readonly pending = new Set<Promise<void>>();
  private readonly logger: Pick<Console, "warn" | "error">;
  private readonly fetchImpl: AlertFetch;
  private readonly now: () => number;

  constructor(
    private alertsConfig: ObservabilityAlertsConfig,
    private readonly service: Pick<ObservabilityService, "log">,
    options: AlertManagerOptions = {}
  ) {
    this.logger = options.logger ?? console;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  updateConfig(next: ObservabilityAlertsConfig) {
    this.alertsConfig = next;
  }

  handleEvent(event: StructuredLogEvent): void {
    if (!this.alertsConfig.enabled) {
      return;
    }
    const payload = event.payload ?? {};
    if (event.event === "recovery_failed") {
      this.track(this.dispatch("recoveryFailed", payload));
    } else if (event.event === "service_status_changed" && payload.newStatus === "Failed") {
      this.track(this.dispatch("serviceFailed", payload));
    } else if (event.event === "recovery_triggered" && payload.strategy === "Isolate") {
      this.track(this.dispatch("isolation", payload));
    }
  }

  handleSnapshot(snapshot: RecoveryStatistics): void {
    if (!this.alertsConfig.enabled || snapshot.totalServices === 0) {
      return;
    }
    const trigger = this.alertsConfig.triggers.unhealthyRatio;
    const ratio = snapshot.unhealthyServices / snapshot.totalServices;
    if (trigger.enabled && ratio >= trigger.threshold) {
      this.track(
        this.dispatch("unhealthyRatio", {
          ratio,
          unhealthyServices: snapshot.unhealthyServices,
          totalServices: snapshot.totalServices
        })
      );
    }
  }

  /** Resolves once every dispatched alert has reached its channels. */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  private track(task: Promise<void>) {
    const tracked: Promise<void> = task
      .catch(error => {
        this.logger.error("Alert dispatch failed", error);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private async dispatch(triggerId: TriggerId, payload: unknown) {
    const triggerConfig = this.alertsConfig.triggers[triggerId];
    if (!triggerConfig.enabled) {
      return;
    }
    const now = this.now();
    const cooldownMs = triggerConfig.cooldownMs ?? this.alertsConfig.cooldownMs;
    const state = this.state.get(triggerId);
    if (state && now - state.lastTriggeredAt < cooldownMs) {
      this.service.log(LogLevel.DEBUG, "alert_suppressed", { triggerId, payload }, "observability.alerts");
      return;
    }
    this.state.set(triggerId, { lastTriggeredAt: now });
    const level = triggerLevels[triggerId];
    this.service.log(level, "alert_dispatched", { triggerId, payload }, "observability.alerts");
    await this.notifyChannels(level, triggerId, payload, now);
  }

  private async notifyChannels(level: LogLevel, triggerId: TriggerId, payload: unknown, timestamp: number) {
    const tasks = this.alertsConfig.channels
      .filter(channel => channel.enabled)
      .map(async channel => {
        if (!meetsLevel(level, channel.level ?? LogLevel.INFO)) {
          return;
        }
        const body = JSON.stringify({ triggerId, level, payload, timestamp });
        try {
          if (channel.type === "console") {
            this.logger.warn(`[alert:${triggerId}] ${body}`);
          } else if (channel.type === "file" && channel.path) {
            const resolved = path.resolve(channel.path);
            await mkdir(path.dirname(resolved), { recursive: true });
            await appendFile(resolved, `${body}\n`, "utf-8");
          } else if (channel.type === "webhook" && channel.url) {
            await this.fetchImpl(channel.url, {
              method: "POST",
              headers: {
                "content-type": "application/json",
                ...(channel.headers ?? {})
              },
              body
            });
          }
        } catch (error) {
          this.logger.error("Alert channel dispatch failed", error);
        }
      });
    await Promise.allSettled(tasks);
  }
}
