import type {
  TraceEvent,
  TraceEventKind,
  TraceEventPayloads,
  TraceSink,
} from "../types/Events.js";
import type { Logger } from "./Logger.js";

/**
 * Stamps events of one session with sequence numbers and timestamps.
 */
export class SessionTracer {
  private seq = 0;

  constructor(
    readonly sessionId: string,
    private readonly sink: TraceSink,
    /** Session-scoped; entries already carry the session id */
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  emit<K extends TraceEventKind>(kind: K, step: number, payload: TraceEventPayloads[K]): TraceEvent<K> {
    const event: TraceEvent<K> = Object.freeze({
      sessionId: this.sessionId,
      seq: ++this.seq,
      step,
      kind,
      timestamp: this.now().toISOString(),
      payload,
    });
    this.sink.record(event);
    if (this.logger.options.logEvents) {
      this.logger.debug("event", { seq: event.seq, step, kind });
    }
    return event;
  }

  get emitted(): number {
    return this.seq;
  }
}
