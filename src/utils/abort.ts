import { setTimeout as delay } from "node:timers/promises";
import { AgentError } from "../protocol/errors";

/** The AgentError an aborted signal stands for (Timeout or Cancelled). */
export function abortReason(signal: AbortSignal): AgentError {
  const reason: unknown = signal.reason;
  if (reason instanceof AgentError) {
    return reason;
  }
  return new AgentError("Cancelled", "Run cancelled by caller", { cause: reason });
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortReason(signal);
  }
}

/** Settle with `promise`, or reject as soon as `signal` aborts. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export async function sleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) {
      throw abortReason(signal);
    }
    throw error;
  }
}

export interface Deadline {
  readonly signal: AbortSignal;
  /** Abort the guarded work now, with `reason` or Cancelled. */
  cancel(reason?: AgentError): void;
  dispose(): void;
}

/**
 * A signal that aborts with Timeout after `timeoutMs`, or with Cancelled when
 * `parent` aborts. Call `dispose` once the guarded work settles.
 */
export function createDeadline(timeoutMs: number | undefined, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const onParentAbort = () => {
    controller.abort(parent ? abortReason(parent) : undefined);
  };

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
    timer = setTimeout(() => {
      controller.abort(new AgentError("Timeout", `Deadline of ${timeoutMs}ms exceeded`));
    }, timeoutMs);
    timer.unref();
  }

  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cancel(reason) {
      if (!controller.signal.aborted) {
        controller.abort(reason ?? new AgentError("Cancelled", "Run cancelled by caller"));
      }
    },
    dispose() {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
