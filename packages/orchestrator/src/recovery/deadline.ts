export interface DeadlineOptions {
  /** Upstream signal; its abort propagates to the task's signal. */
  signal?: AbortSignal;
  /** Builds the rejection used when the deadline passes. */
  onTimeout: (timeoutMs: number) => Error;
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise settles at the deadline even when the task ignores its signal; the
 * task's own late result is discarded.
 */
export function runWithDeadline<T>(
  task: (signal: AbortSignal) => T | Promise<T>,
  timeoutMs: number,
  options: DeadlineOptions
): Promise<T> {
  const controller = new AbortController();
  const allottedMs = Math.max(0, timeoutMs);
  const detachUpstream = attachUpstreamSignal(options.signal, controller);

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeoutId);
      detachUpstream();
      fn();
    };

    const timeoutId = setTimeout(() => {
      const error = options.onTimeout(allottedMs);
      controller.abort(error);
      settle(() => reject(error));
    }, allottedMs);

    if (controller.signal.aborted) {
      settle(() => reject(controller.signal.reason));
      return;
    }
    controller.signal.addEventListener(
      "abort",
      () => settle(() => reject(controller.signal.reason)),
      { once: true }
    );

    let pending: Promise<T>;
    try {
      pending = Promise.resolve(task(controller.signal));
    } catch (error) {
      settle(() => reject(error));
      return;
    }
    pending.then(
      value => settle(() => resolve(value)),
      error => settle(() => reject(error))
    );
  });
}

export function attachUpstreamSignal(signal: AbortSignal | undefined, controller: AbortController): () => void {
  if (!signal) {
    return () => {
      /* noop */
    };
  }
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => {
      /* noop */
    };
  }

  const listener = () => controller.abort(signal.reason);
  signal.addEventListener("abort", listener, { once: true });
  return () => {
    signal.removeEventListener("abort", listener);
  };
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(signal?.reason);
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
