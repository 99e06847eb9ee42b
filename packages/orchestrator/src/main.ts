import path from "node:path";
import { mkdir } from "node:fs/promises";
import {
  LogLevel,
  createConfigManager,
  isLogLevel,
  mergeEnvFile,
  readEnv,
  type ConfigurationManager,
  type MonitoredService,
  type ObservabilityConfig
} from "@warden/shared";
import { RecoveryOrchestrator } from "./orchestrator";
import type { RegisterServiceOptions } from "./registry/serviceRegistry";
import type { ErrorReporter } from "./health/monitor";
import { ObservabilityService } from "./observability/service";
import { AlertManager } from "./observability/alertManager";
import { describeError } from "./errors";

export interface ServiceDefinition extends RegisterServiceOptions {
  service: MonitoredService;
  dependencies?: string[];
}

export interface RunOptions {
  env?: Record<string, string | undefined>;
  services?: Record<string, ServiceDefinition>;
  /** Polled when `discovery.enabled` is set in the config; unseen services get registered. */
  discover?: () => Record<string, MonitoredService> | Promise<Record<string, MonitoredService>>;
  errorReporter?: ErrorReporter;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
  /** Installs SIGINT/SIGTERM handlers that shut down gracefully; defaults to true. */
  handleSignals?: boolean;
}

export interface RunningOrchestrator {
  sessionId: string;
  orchestrator: RecoveryOrchestrator;
  observability: ObservabilityService;
  configManager: ConfigurationManager;
  shutdown(): Promise<void>;
}

export async function run(options: RunOptions = {}): Promise<RunningOrchestrator> {
  const source = options.env ?? process.env;
  const envFile = source.ENV_FILE?.trim();
  const env = readEnv("orchestrator", envFile ? mergeEnvFile(path.resolve(process.cwd(), envFile), source) : source);
  const configPath = path.resolve(process.cwd(), env.RECOVERY_CONFIG);
  const configManager = await createConfigManager(configPath);
  if (env.CONFIG_WATCH === "1") {
    configManager.startWatching();
  }

  const sessionId = env.SESSION_ID ?? Date.now().toString(36);
  const sessionDir = path.resolve(process.cwd(), env.LOGS_DIR, sessionId);
  await mkdir(sessionDir, { recursive: true });

  const withLevelOverride = (config: ObservabilityConfig): ObservabilityConfig => {
    const level = env.LOG_LEVEL;
    return isLogLevel(level) ? { ...config, logs: { ...config.logs, level } } : config;
  };
  const observabilityConfig = withLevelOverride(configManager.get("observability"));
  const observability = new ObservabilityService({
    sessionId,
    sessionDir,
    config: observabilityConfig,
    consoleImpl: options.consoleImpl
  });
  await observability.init();
  const alertManager = new AlertManager(observabilityConfig.alerts, observability, {
    logger: options.consoleImpl
  });
  observability.registerAlertConsumer(alertManager);

  const logger = observability.getLogger();
  const discovery = configManager.get("discovery");
  const orchestrator = new RecoveryOrchestrator({
    monitoring: configManager.get("monitoring"),
    recovery: configManager.get("recovery"),
    selection: configManager.get("selection"),
    logger,
    errorReporter: options.errorReporter,
    discovery:
      discovery.enabled && options.discover
        ? { source: options.discover, intervalMs: discovery.intervalMs }
        : undefined
  });
  const detachObservability = observability.attach(orchestrator);

  for (const [name, definition] of Object.entries(options.services ?? {})) {
    orchestrator.registerService(name, definition.service, definition.dependencies ?? [], {
      failoverTarget: definition.failoverTarget,
      metadata: definition.metadata
    });
  }

  const unsubscribers = [
    configManager.subscribe("monitoring", monitoring => orchestrator.updateSettings({ monitoring })),
    configManager.subscribe("recovery", recovery => orchestrator.updateSettings({ recovery })),
    configManager.subscribe("selection", selection => orchestrator.updateSettings({ selection })),
    configManager.subscribe("observability", observabilityConfig => {
      const next = withLevelOverride(observabilityConfig);
      alertManager.updateConfig(next.alerts);
      observability.applyConfig(next).catch(error => {
        logger.log(LogLevel.ERROR, "observability_reload_failed", { error: describeError(error) });
      });
    })
  ];

  orchestrator.start();
  logger.log(LogLevel.INFO, "session_started", { sessionId, configPath });

  let stopping: Promise<void> | null = null;
  const shutdown = () => {
    if (!stopping) {
      stopping = (async () => {
        for (const unsubscribe of unsubscribers) {
          unsubscribe();
        }
        await configManager.stopWatching();
        await orchestrator.stop({ drain: true });
        await observability.flush();
        await alertManager.settle();
        detachObservability();
        await observability.dispose();
      })();
    }
    return stopping;
  };

  if (options.handleSignals ?? true) {
    const onSignal = (signal: NodeJS.Signals) => {
      logger.log(LogLevel.WARN, "shutdown_requested", { signal });
      shutdown()
        .then(() => process.exit(0))
        .catch(error => {
          console.error("Shutdown failed", error);
          process.exit(1);
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  return { sessionId, orchestrator, observability, configManager, shutdown };
}
