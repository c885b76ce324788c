import pTimeout from "p-timeout";
import { createTaggedError, type TaggedError } from "./Retry.js";

/**
 * Wall-clock deadline for a whole session. Absent timeout means unbounded.
 */
export class Deadline {
  private readonly expiresAt: number | undefined;

  constructor(
    timeoutMs?: number,
    private readonly now: () => number = Date.now,
  ) {
    this.expiresAt = timeoutMs === undefined ? undefined : now() + timeoutMs;
  }

  /** Milliseconds left, or undefined when unbounded */
  remaining(): number | undefined {
    if (this.expiresAt === undefined) return undefined;
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    const left = this.remaining();
    return left !== undefined && left <= 0;
  }

  /**
   * Budget for one decision or tool call: min(stepTimeoutMs, remaining).
   */
  callBudget(stepTimeoutMs?: number): number | undefined {
    const left = this.remaining();
    if (left === undefined) return stepTimeoutMs;
    if (stepTimeoutMs === undefined) return left;
    return Math.min(stepTimeoutMs, left);
  }
}

export interface TimedCallOptions {
  /** No bound when undefined */
  timeoutMs?: number;
  /** Parent signal (caller cancellation); forwarded to the call */
  signal?: AbortSignal;
  /** Tagged error kind raised on timeout */
  timeoutKind: string;
  label: string;
}

/**
 * Run one call under a timeout. The call receives its own AbortSignal, which
 * fires when the timeout elapses or the parent signal aborts.
 */
export async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T> | T,
  options: TimedCallOptions,
): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    const promise = Promise.resolve().then(() => fn(controller.signal));
    if (options.timeoutMs === undefined) return await promise;

    const timeoutError: TaggedError = createTaggedError(
      options.timeoutKind,
      `${options.label} timed out after ${options.timeoutMs}ms`,
    );
    try {
      return await pTimeout(promise, {
        milliseconds: options.timeoutMs,
        message: timeoutError,
      });
    } catch (error) {
      if (error === timeoutError) controller.abort(timeoutError);
      throw error;
    }
  } finally {
    parent?.removeEventListener("abort", onParentAbort);
  }
}
