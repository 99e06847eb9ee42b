export { StructuredLogger } from "./structuredLogger";
export type { ComponentLogger, StructuredLoggerOptions } from "./structuredLogger";
export { SnapshotReporter } from "./snapshotReporter";
export type { SnapshotReporterOptions } from "./snapshotReporter";
export { createConsoleSink, formatPretty } from "./sinks/consoleSink";
export { createFileSink, recoveryTrailPath, sessionLogPath } from "./sinks/fileSink";
export { createWebhookSink } from "./sinks/webhookSink";
export type { LogSink, SinkLogger } from "./sinks/types";
