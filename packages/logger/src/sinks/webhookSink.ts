import { setTimeout as delay } from "node:timers/promises";
import { LogLevel, meetsLevel, type StructuredLogEvent } from "@warden/shared";
import type { LogSink, SinkLogger } from "./types";

type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number }>;

interface WebhookSinkOptions {
  level: LogLevel;
  url: string;
  headers?: Record<string, string>;
  batchSize?: number;
  retry?: {
    attempts: number;
    backoffMs: number;
  };
  fetchImpl?: FetchLike;
  logger?: SinkLogger;
}

/**
 * Buffers events and POSTs them as `{ events: [...] }` once `batchSize` is
 * reached or on flush. A batch that fails every attempt is dropped and the
 * failure surfaces to the logger.
 */
export function createWebhookSink(options: WebhookSinkOptions): LogSink {
  const batchSize = Math.max(1, options.batchSize ?? 10);
  const attempts = Math.max(1, options.retry?.attempts ?? 3);
  const backoffMs = Math.max(0, options.retry?.backoffMs ?? 1000);
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  let buffer: StructuredLogEvent[] = [];

  async function post(batch: StructuredLogEvent[]) {
    const body = JSON.stringify({ events: batch });
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const response = await fetchImpl(options.url, {
          method: "POST",
          headers: { "content-type": "application/json", ...options.headers },
          body
        });
        if (response.ok) {
          return;
        }
        lastError = new Error(`Webhook responded with status ${response.status}`);
      } catch (error) {
        lastError = error;
      }
      options.logger?.warn(`Webhook sink attempt ${attempt} failed`, lastError);
      if (attempt < attempts) {
        await delay(backoffMs * attempt);
      }
    }
    throw new Error(`Webhook delivery of ${batch.length} event(s) failed after ${attempts} attempts`, {
      cause: lastError
    });
  }

  async function drain() {
    while (buffer.length > 0) {
      const batch = buffer.slice(0, batchSize);
      buffer = buffer.slice(batchSize);
      await post(batch);
    }
  }

  return {
    name: "webhook",
    async publish(event: StructuredLogEvent) {
      if (!meetsLevel(event.level, options.level)) {
        return;
      }
      buffer.push(event);
      if (buffer.length >= batchSize) {
        await drain();
      }
    },
    flush: drain,
    close: drain
  };
}
