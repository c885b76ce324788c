import { EventEmitter } from "eventemitter3";
import type { TraceEvent, TraceEventKind, TraceSink } from "../types/Events.js";

/**
 * Trace log entry with a log-wide position.
 */
export interface TraceLogEntry {
  position: number;
  event: TraceEvent;
}

export type TraceListener = (entry: TraceLogEntry) => void;

export interface TraceQuery {
  sessionId?: string;
  kind?: TraceEventKind;
  /** Only entries after this log position */
  since?: number;
  /** Keep the most recent N matches */
  limit?: number;
}

/**
 * In-memory append-only trace sink with subscriptions.
 * Oldest entries are dropped once `maxEntries` is exceeded.
 */
export class TraceLog implements TraceSink {
  private readonly entries: TraceLogEntry[] = [];
  private position = 0;
  private readonly maxEntries: number;
  private readonly emitter = new EventEmitter();

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  record(event: TraceEvent): void {
    const entry: TraceLogEntry = { position: ++this.position, event: Object.freeze(event) };
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.emitter.emit("event", entry);
    this.emitter.emit(event.kind, entry);
  }

  /**
   * Subscribe to all events.
   */
  on(listener: TraceListener): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }

  /**
   * Subscribe to events of one kind.
   */
  onKind(kind: TraceEventKind, listener: TraceListener): () => void {
    this.emitter.on(kind, listener);
    return () => this.emitter.off(kind, listener);
  }

  query(filter: TraceQuery = {}): TraceEvent[] {
    let results = this.entries;
    const { since, sessionId, kind, limit } = filter;

    if (since !== undefined) {
      results = results.filter((e) => e.position > since);
    }
    if (sessionId) {
      results = results.filter((e) => e.event.sessionId === sessionId);
    }
    if (kind) {
      results = results.filter((e) => e.event.kind === kind);
    }
    if (limit !== undefined) {
      results = limit > 0 ? results.slice(-limit) : [];
    }
    return results.map((e) => e.event);
  }

  /**
   * Events of one session in emission order.
   */
  forSession(sessionId: string): TraceEvent[] {
    return this.query({ sessionId });
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Drop every entry. Positions keep counting, so a `since` cursor taken
   * before the clear never matches older events again.
   */
  clear(): void {
    this.entries.length = 0;
  }
}
