import type { ActionType } from "./Action.js";
import type { DenyReason, PolicySnapshot } from "./Policy.js";
import type {
  SessionError,
  SessionStatus,
  TerminationReason,
} from "./Session.js";

/**
 * Event kinds recorded by the AgentRuntime.
 */
export type TraceEventKind =
  | "session_started"
  | "decision_requested"
  | "decision_received"
  | "policy_checked"
  | "tool_executed"
  | "tool_failed"
  | "tool_rejected"
  | "final_returned"
  | "step_limit_hit"
  | "memory_error"
  | "session_ended";

/**
 * Payload shape per event kind.
 */
export interface TraceEventPayloads {
  session_started: {
    task: string;
    maxSteps: number;
    tools: string[];
    policy: PolicySnapshot;
  };
  decision_requested: {
    attempt: number;
    messageCount: number;
    droppedMessages: number;
  };
  decision_received:
    | { attempt: number; ok: true; actionType: ActionType; rawLength: number }
    | { attempt: number; ok: false; error: SessionError; willRetry: boolean };
  policy_checked: {
    tool: string;
    allowed: boolean;
    reason?: DenyReason;
  };
  tool_executed: {
    tool: string;
    durationMs: number;
    originalLength: number;
    observationLength: number;
    truncated: boolean;
  };
  tool_failed: {
    tool: string;
    durationMs: number;
    errorCode: string;
    message: string;
  };
  tool_rejected: {
    tool: string;
    errorCode: "unknown_tool" | "schema_invalid";
    message: string;
  };
  final_returned: {
    contentLength: number;
    fallback: boolean;
  };
  step_limit_hit: {
    maxSteps: number;
    reason: "max_steps" | "deadline_exceeded";
  };
  memory_error: {
    operation: "search" | "append";
    message: string;
  };
  session_ended: {
    status: SessionStatus;
    reason: TerminationReason;
    steps: number;
    error?: SessionError;
  };
}

/**
 * Immutable trace record. Ordered by step, then by `seq` within a session.
 */
export interface TraceEvent<K extends TraceEventKind = TraceEventKind> {
  readonly sessionId: string;
  /** Emission order within the session, starting at 1 */
  readonly seq: number;
  readonly step: number;
  readonly kind: K;
  /** ISO 8601 */
  readonly timestamp: string;
  readonly payload: TraceEventPayloads[K];
}

export function isTraceEventKind<K extends TraceEventKind>(
  event: TraceEvent,
  kind: K,
): event is TraceEvent<K> {
  return event.kind === kind;
}

/**
 * Append-only destination for trace events.
 * Implementations must not throw on the hot path.
 */
export interface TraceSink {
  record(event: TraceEvent): void;
}
