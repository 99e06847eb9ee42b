import path from "node:path";
import {
  LogLevel,
  toLogEvent,
  type ObservabilityConfig,
  type RecoveryStatistics,
  type StructuredLogEvent
} from "@warden/shared";
import {
  SnapshotReporter,
  StructuredLogger,
  createConsoleSink,
  createFileSink,
  createWebhookSink,
  type ComponentLogger,
  type LogSink
} from "@warden/logger";
import type { RecoveryOrchestrator } from "../orchestrator";

export interface ObservabilityServiceOptions {
  sessionId: string;
  sessionDir: string;
  config: ObservabilityConfig;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export interface AlertConsumer {
  handleEvent(event: StructuredLogEvent): void;
  handleSnapshot(snapshot: RecoveryStatistics): void;
}

export class ObservabilityService {
  private structuredLogger: StructuredLogger | null = null;
  private reporter: SnapshotReporter<RecoveryStatistics> | null = null;
  private sinks: LogSink[] = [];
  private alertConsumer?: AlertConsumer;
  private statsProvider?: () => RecoveryStatistics;
  private options: ObservabilityServiceOptions;

  constructor(options: ObservabilityServiceOptions) {
    this.options = options;
  }

  async init() {
    await this.applyConfig(this.options.config);
  }

  async applyConfig(nextConfig: ObservabilityConfig) {
    await this.dispose();
    this.options.config = nextConfig;
    this.sinks = this.buildSinks(nextConfig);
    const structuredLogger = new StructuredLogger({
      sessionId: this.options.sessionId,
      component: "orchestrator",
      level: nextConfig.logs.level,
      sinks: this.sinks
    });
    this.structuredLogger = structuredLogger;
    if (nextConfig.metrics.enabled) {
      this.reporter = new SnapshotReporter({
        collect: () => this.collectStatistics(),
        logger: structuredLogger.child("observability.metrics"),
        flushIntervalMs: nextConfig.metrics.flushIntervalMs,
        filePath: path.join(this.options.sessionDir, "metrics", "latest.json")
      });
      this.reporter.start();
    }
  }

  registerAlertConsumer(consumer: AlertConsumer) {
    this.alertConsumer = consumer;
  }

  /** Logger that survives applyConfig; hand this to long-lived components. */
  getLogger(): ComponentLogger {
    return this.forward("orchestrator", {});
  }

  log(
    level: LogLevel,
    event: string,
    payload?: Record<string, unknown>,
    component = "orchestrator"
  ) {
    if (!this.structuredLogger) {
      return;
    }
    this.structuredLogger.child(component).log(level, event, payload);
    this.alertConsumer?.handleEvent(
      toLogEvent({ sessionId: this.options.sessionId, component, event, level, timestamp: Date.now() }, payload)
    );
  }

  /** Mirrors orchestrator status changes into the log and feeds its statistics to the metrics snapshot. */
  attach(orchestrator: RecoveryOrchestrator): () => void {
    this.statsProvider = () => orchestrator.getStatistics();
    const detach = orchestrator.on("health-changed", change => {
      const unhealthy = change.newStatus === "Failed" || change.newStatus === "Unhealthy";
      this.log(
        unhealthy ? LogLevel.WARN : LogLevel.INFO,
        "service_status_changed",
        {
          service: change.serviceName,
          previousStatus: change.previousStatus,
          newStatus: change.newStatus,
          reason: change.reason,
          consecutiveFailures: change.health.consecutiveFailures
        },
        "observability.health"
      );
    });
    return () => {
      detach();
      this.statsProvider = undefined;
    };
  }

  async flush(): Promise<RecoveryStatistics | null> {
    if (!this.reporter) {
      return null;
    }
    const snapshot = await this.reporter.flush();
    this.alertConsumer?.handleSnapshot(snapshot);
    return snapshot;
  }

  async dispose() {
    if (this.reporter) {
      this.reporter.stop();
      this.reporter = null;
    }
    if (this.structuredLogger) {
      await this.structuredLogger.close();
      this.structuredLogger = null;
    }
    this.sinks = [];
  }

  private forward(component: string, context: Record<string, unknown>): ComponentLogger {
    return {
      log: (level, event, payload) => {
        this.log(level, event, { ...context, ...payload }, component);
      },
      child: (nextComponent, childContext) => this.forward(nextComponent, { ...context, ...childContext })
    };
  }

  private collectStatistics(): RecoveryStatistics {
    if (this.statsProvider) {
      return this.statsProvider();
    }
    return {
      totalServices: 0,
      healthyServices: 0,
      degradedServices: 0,
      unhealthyServices: 0,
      failedServices: 0,
      recoveringServices: 0,
      totalRecoveries: 0,
      successfulRecoveries: 0,
      failedRecoveries: 0,
      cancelledRecoveries: 0,
      activeRecoveries: 0,
      queuedRecoveries: 0
    };
  }

  private buildSinks(config: ObservabilityConfig): LogSink[] {
    const sinks: LogSink[] = [];
    const { console: consoleSink, file, webhook } = config.logs.sinks;
    if (consoleSink?.enabled) {
      sinks.push(
        createConsoleSink({
          level: consoleSink.level ?? config.logs.level,
          format: consoleSink.format ?? "pretty",
          consoleImpl: this.options.consoleImpl
        })
      );
    }
    if (file?.enabled && file.outputDir) {
      sinks.push(
        createFileSink({
          sessionId: this.options.sessionId,
          level: file.level ?? config.logs.level,
          outputDir: path.resolve(file.outputDir),
          recoveryTrail: file.recoveryTrail
        })
      );
    }
    if (webhook?.enabled && webhook.url) {
      sinks.push(
        createWebhookSink({
          level: webhook.level ?? config.logs.level,
          url: webhook.url,
          headers: webhook.headers,
          batchSize: webhook.batchSize,
          retry: webhook.retry
        })
      );
    }
    return sinks;
  }
}
