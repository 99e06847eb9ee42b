import { watch, type FSWatcher } from "chokidar";
import type { RecoveryConfig } from "./types";
import { defaultSchemaPath, loadConfig } from "./loader";

type ConfigLogger = Pick<Console, "error">;

export type ConfigSection = keyof RecoveryConfig;

interface Subscription {
  section: ConfigSection;
  notify(next: RecoveryConfig, previous: RecoveryConfig | null): void;
}

function sameSection(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Holds the current recovery config and hands each top-level section to its
 * subscribers whenever a reload changes it. A reload that fails validation
 * keeps the previous config in place.
 */
export class ConfigurationManager {
  private current: RecoveryConfig | null = null;
  private configPath: string | null = null;
  private watcher: FSWatcher | null = null;
  private readonly subscriptions = new Set<Subscription>();
  private reloads: Promise<void> = Promise.resolve();

  constructor(
    private readonly schemaPath: string = defaultSchemaPath,
    private readonly logger: ConfigLogger = console
  ) {}

  /** Reads, validates and installs the file; every subscriber hears its section. */
  async load(configPath: string): Promise<RecoveryConfig> {
    const next = loadConfig(configPath, this.schemaPath);
    this.configPath = configPath;
    this.install(next);
    return next;
  }

  /**
   * Re-reads the config file. Reloads run one at a time; only subscribers
   * whose section changed are notified.
   */
  reload(configPath?: string): Promise<RecoveryConfig> {
    const target = configPath ?? this.configPath;
    if (!target) {
      return Promise.reject(new Error("No config file loaded"));
    }
    const pending = this.reloads.then(() => {
      const next = loadConfig(target, this.schemaPath);
      this.configPath = target;
      this.install(next);
      return next;
    });
    this.reloads = pending.then(
      () => undefined,
      error => {
        this.logger.error(`Config reload from ${target} failed; keeping the last valid config`, error);
      }
    );
    return pending;
  }

  get<K extends ConfigSection>(section: K): RecoveryConfig[K] {
    return this.getConfig()[section];
  }

  getConfig(): RecoveryConfig {
    if (!this.current) {
      throw new Error("Config not loaded");
    }
    return this.current;
  }

  /** @returns Function removing the subscription */
  subscribe<K extends ConfigSection>(section: K, listener: (value: RecoveryConfig[K]) => void): () => void {
    const subscription: Subscription = {
      section,
      notify: (next, previous) => {
        if (previous && sameSection(next[section], previous[section])) {
          return;
        }
        listener(next[section]);
      }
    };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  /** Reloads on every settled write to the loaded file. */
  startWatching(): void {
    const target = this.configPath;
    if (!target) {
      throw new Error("No config file loaded");
    }
    if (this.watcher) {
      return;
    }
    this.watcher = watch(target, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 50 }
    });
    this.watcher.on("change", () => {
      // failures are reported by the reload queue
      void this.reload(target);
    });
    this.watcher.on("unlink", () => {
      this.logger.error(`Config file removed: ${target}`);
    });
    this.watcher.on("error", error => {
      this.logger.error(`Config watcher failed for ${target}`, error);
    });
  }

  async stopWatching(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();
  }

  private install(next: RecoveryConfig) {
    const previous = this.current;
    this.current = next;
    for (const subscription of this.subscriptions) {
      try {
        subscription.notify(next, previous);
      } catch (error) {
        this.logger.error(`Config subscriber for ${subscription.section} failed`, error);
      }
    }
  }
}

export async function createConfigManager(configPath: string, schemaPath?: string): Promise<ConfigurationManager> {
  const manager = new ConfigurationManager(schemaPath);
  await manager.load(configPath);
  return manager;
}
