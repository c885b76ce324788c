import pRetry, { type Options as PRetryOptions } from "p-retry";

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Extra attempts after the first (default: 1) */
  maxRetries?: number;
  /** Delay before each retry in ms (default: 0, retries run immediately) */
  delayMs?: number;
  /** Error filter: return true to retry, false to abort */
  shouldRetry?: (error: Error) => boolean;
  /** Callback after each failed attempt; `willRetry` is false on the last one */
  onFailedAttempt?: (error: Error, attempt: number, willRetry: boolean) => void;
}

/**
 * Error kinds that are never retried (deterministic failures).
 */
const NON_RETRYABLE_ERRORS = new Set([
  "cancelled",
  "deadline_exceeded",
  "invalid_run_config",
  "provider_auth_failed",
]);

/**
 * Error carrying a machine-readable `kind` code.
 */
export type TaggedError = Error & { kind: string; details?: unknown };

export function isTaggedError(error: unknown): error is TaggedError {
  return (
    error instanceof Error &&
    "kind" in error &&
    typeof error.kind === "string"
  );
}

/**
 * Determine if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (isTaggedError(error) && NON_RETRYABLE_ERRORS.has(error.kind)) {
    return false;
  }
  return true;
}

/**
 * Execute a function, retrying a fixed number of times without backoff.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxRetries = 1, delayMs = 0, shouldRetry, onFailedAttempt } = options;

  if (maxRetries <= 0) {
    try {
      return await fn(1);
    } catch (error) {
      onFailedAttempt?.(toError(error), 1, false);
      throw error;
    }
  }

  const pRetryOptions: PRetryOptions = {
    retries: maxRetries,
    minTimeout: delayMs,
    maxTimeout: delayMs,
    factor: 1,
    randomize: false,
    onFailedAttempt: (error) => {
      const retryable =
        error.retriesLeft > 0 &&
        isRetryable(error) &&
        (shouldRetry ? shouldRetry(error) : true);
      onFailedAttempt?.(error, error.attemptNumber, retryable);
      if (!retryable) {
        throw error; // Abort retry
      }
    },
  };

  return pRetry(fn, pRetryOptions);
}

/**
 * Create a tagged error with a kind field for retry classification.
 */
export function createTaggedError(
  kind: string,
  message: string,
  details?: unknown,
): TaggedError {
  return Object.assign(new Error(message), { kind, details });
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Machine-readable code for a thrown value ("tool_error" when untagged).
 */
export function errorKind(error: unknown, fallback = "tool_error"): string {
  return isTaggedError(error) ? error.kind : fallback;
}
