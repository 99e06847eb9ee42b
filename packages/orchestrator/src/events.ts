import { EventEmitter } from "node:events";
import { LogLevel, type RecoveryEventMap, type RecoveryEventName } from "@warden/shared";
import type { ComponentLogger } from "@warden/logger";
import { describeError } from "./errors";

export type RecoveryListener<K extends RecoveryEventName> = (payload: RecoveryEventMap[K]) => void;

/** EventEmitter with typed payloads; a throwing listener is logged and does not stop the others. */
export class RecoveryEvents {
  private readonly emitter = new EventEmitter();
  private readonly detachers = new Map<RecoveryEventName, Map<unknown, () => void>>();

  constructor(private readonly logger: ComponentLogger) {
    this.emitter.setMaxListeners(0);
  }

  on<K extends RecoveryEventName>(event: K, listener: RecoveryListener<K>): () => void {
    this.off(event, listener);
    const guarded = (payload: RecoveryEventMap[K]) => {
      try {
        listener(payload);
      } catch (error) {
        this.logger.log(LogLevel.WARN, "event_listener_failed", { event, error: describeError(error) });
      }
    };
    this.emitter.on(event, guarded);
    let forEvent = this.detachers.get(event);
    if (!forEvent) {
      forEvent = new Map();
      this.detachers.set(event, forEvent);
    }
    forEvent.set(listener, () => {
      this.emitter.off(event, guarded);
    });
    return () => this.off(event, listener);
  }

  off<K extends RecoveryEventName>(event: K, listener: RecoveryListener<K>): void {
    const forEvent = this.detachers.get(event);
    const detach = forEvent?.get(listener);
    if (detach) {
      detach();
      forEvent?.delete(listener);
    }
  }

  emit<K extends RecoveryEventName>(event: K, payload: RecoveryEventMap[K]): void {
    this.emitter.emit(event, payload);
  }
}
