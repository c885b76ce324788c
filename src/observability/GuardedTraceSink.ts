import type { TraceEvent, TraceSink } from "../types/Events.js";
import type { Logger } from "./Logger.js";

/**
 * Keeps a failing trace backend from disturbing the loop.
 * The first failure is logged at warn level, later ones at debug.
 */
export class GuardedTraceSink implements TraceSink {
  private failures = 0;

  constructor(
    private readonly inner: TraceSink,
    private readonly logger: Logger,
  ) {}

  record(event: TraceEvent): void {
    try {
      this.inner.record(event);
    } catch (err) {
      this.failures++;
      const meta = {
        kind: event.kind,
        sessionId: event.sessionId,
        error: err instanceof Error ? err.message : String(err),
      };
      if (this.failures === 1) this.logger.warn("trace.sink.failed", meta);
      else this.logger.debug("trace.sink.failed", meta);
    }
  }

  /** Number of events the inner sink rejected */
  get failureCount(): number {
    return this.failures;
  }
}

/**
 * Fan out to several sinks. Each sink is guarded on its own.
 */
export function combineTraceSinks(logger: Logger, ...sinks: TraceSink[]): TraceSink {
  const guarded = sinks.map((s) => (s instanceof GuardedTraceSink ? s : new GuardedTraceSink(s, logger)));
  return {
    record(event: TraceEvent): void {
      for (const sink of guarded) sink.record(event);
    },
  };
}
