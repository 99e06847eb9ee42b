import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { LogLevel, meetsLevel, type StructuredLogEvent } from "@warden/shared";
import type { LogSink } from "./types";

interface FileSinkOptions {
  sessionId: string;
  level: LogLevel;
  outputDir: string;
  recoveryTrail?: boolean;
}

export function sessionLogPath(outputDir: string, sessionId: string): string {
  return path.join(outputDir, `${sessionId}.jsonl`);
}

export function recoveryTrailPath(outputDir: string, sessionId: string): string {
  return path.join(outputDir, `${sessionId}.recoveries.jsonl`);
}

/**
 * Appends one JSON line per event to `<sessionId>.jsonl`. With `recoveryTrail`,
 * events tied to an execution are also appended to `<sessionId>.recoveries.jsonl`.
 */
export function createFileSink(options: FileSinkOptions): LogSink {
  const sessionFile = sessionLogPath(options.outputDir, options.sessionId);
  const trailFile = recoveryTrailPath(options.outputDir, options.sessionId);
  let directoryReady = false;

  return {
    name: "file",
    async publish(event: StructuredLogEvent) {
      if (!meetsLevel(event.level, options.level)) {
        return;
      }
      if (!directoryReady) {
        await mkdir(options.outputDir, { recursive: true });
        directoryReady = true;
      }
      const line = `${JSON.stringify(event)}\n`;
      await appendFile(sessionFile, line, "utf-8");
      if (options.recoveryTrail && event.executionId) {
        await appendFile(trailFile, line, "utf-8");
      }
    }
  };
}
