import type { StructuredLogEvent } from "@warden/shared";

export interface LogSink {
  readonly name: string;
  publish(event: StructuredLogEvent): Promise<void>;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export type SinkLogger = Pick<Console, "warn">;
