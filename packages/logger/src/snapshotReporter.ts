import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { LogLevel } from "@warden/shared";
import type { ComponentLogger } from "./structuredLogger";

export interface SnapshotReporterOptions<T> {
  /** Produces the snapshot written on every flush. */
  collect: () => T;
  logger: ComponentLogger;
  flushIntervalMs: number;
  /** When set, each snapshot is also persisted as pretty-printed JSON. */
  filePath?: string;
  event?: string;
}

/**
 * Periodically logs a snapshot of some in-memory state and optionally mirrors
 * it to disk. The timer is unref'd so it never keeps the process alive.
 */
export class SnapshotReporter<T> {
  private flushTimer?: NodeJS.Timeout;
  private lastSnapshot: T | null = null;

  constructor(private readonly options: SnapshotReporterOptions<T>) {}

  start() {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setInterval(() => {
      this.flush().catch(error => {
        this.options.logger.log(LogLevel.WARN, "snapshot_flush_failed", {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    }, this.options.flushIntervalMs);
    this.flushTimer.unref();
  }

  stop() {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = undefined;
    }
  }

  getLastSnapshot(): T | null {
    return this.lastSnapshot;
  }

  async flush(): Promise<T> {
    const snapshot = this.options.collect();
    this.lastSnapshot = snapshot;
    if (this.options.filePath) {
      await mkdir(path.dirname(this.options.filePath), { recursive: true });
      await writeFile(this.options.filePath, JSON.stringify(snapshot, null, 2), "utf-8");
    }
    this.options.logger.log(LogLevel.INFO, this.options.event ?? "metrics_snapshot", { snapshot });
    return snapshot;
  }
}
