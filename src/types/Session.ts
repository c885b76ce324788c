import type { Action } from "./Action.js";
import type { PolicySnapshot } from "./Policy.js";

export type SessionStatus =
  | "running"
  | "completed"
  | "failed"
  | "step_limit_reached";

/**
 * Why a session left the running state.
 */
export type TerminationReason =
  | "final_answer"
  | "max_steps"
  | "deadline_exceeded"
  | "decision_provider_failed"
  | "cancelled"
  | "capacity_exceeded"
  | "internal_error";

export type MessageRole = "system" | "user" | "assistant" | "tool_observation";

export type ObservationOutcome = "success" | "error" | "denied";

interface MessageBase {
  /** ISO 8601 */
  readonly timestamp: string;
}

export interface SystemMessage extends MessageBase {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage extends MessageBase {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantMessage extends MessageBase {
  readonly role: "assistant";
  /** Raw decision text as returned by the provider */
  readonly content: string;
  readonly action: Action;
}

export interface ObservationMessage extends MessageBase {
  readonly role: "tool_observation";
  readonly content: string;
  readonly toolName: string;
  readonly outcome: ObservationOutcome;
  readonly errorCode?: string;
}

export type Message =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ObservationMessage;

export interface MemoryRunOptions {
  /** Search memory for the task at session start */
  recall?: boolean;
  /** Append every turn to memory */
  persist?: boolean;
  recallLimit?: number;
}

/**
 * Options for one run. Only `maxSteps` is required.
 */
export interface RunConfig {
  maxSteps: number;
  /** Deadline for the whole run */
  timeoutMs?: number;
  /** Bound for each decision call and each tool call */
  stepTimeoutMs?: number;
  /** Extra attempts after a failed decision call (default: 1) */
  decisionRetries?: number;
  /** Cap on observation text entering the transcript (default: 4000) */
  maxObservationChars?: number;
  /** Size above which the transcript view drops old turns (default: 32000) */
  maxTranscriptChars?: number;
  memory?: MemoryRunOptions;
  /** Caller cancellation */
  signal?: AbortSignal;
  sessionId?: string;
}

/**
 * Resolved configuration snapshot stored on the session.
 */
export interface SessionConfig {
  readonly maxSteps: number;
  readonly timeoutMs?: number;
  readonly stepTimeoutMs?: number;
  readonly decisionRetries: number;
  readonly maxObservationChars: number;
  readonly maxTranscriptChars: number;
  readonly memory: Readonly<Required<MemoryRunOptions>>;
}

export interface SessionError {
  kind: string;
  message: string;
}

/**
 * Read-only view of one execution of the control loop.
 */
export interface Session {
  readonly id: string;
  readonly task: string;
  readonly transcript: readonly Message[];
  readonly step: number;
  readonly status: SessionStatus;
  readonly config: SessionConfig;
  readonly policy: PolicySnapshot;
  readonly finalAnswer?: string;
  readonly terminationReason?: TerminationReason;
  readonly error?: SessionError;
  readonly startedAt: string;
  readonly endedAt?: string;
}

export interface RunResult {
  finalAnswer: string;
  session: Session;
}
