import type { Action } from "../types/Action.js";
import type { PolicySnapshot } from "../types/Policy.js";
import type {
  AssistantMessage,
  Message,
  ObservationMessage,
  Session,
  SessionConfig,
  SessionError,
  SessionStatus,
  TerminationReason,
} from "../types/Session.js";

type Terminal = Exclude<SessionStatus, "running">;

/**
 * Mutable session record owned by the runtime executing it.
 * Messages are frozen on append; callers only ever see snapshots.
 */
export class SessionState {
  private readonly messages: Message[] = [];
  private stepCount = 0;
  private currentStatus: SessionStatus = "running";
  private finalAnswer: string | undefined;
  private reason: TerminationReason | undefined;
  private error: SessionError | undefined;
  private endedAt: string | undefined;
  private lastFreeText = "";
  readonly startedAt: string;

  constructor(
    readonly id: string,
    readonly task: string,
    readonly config: SessionConfig,
    readonly policy: PolicySnapshot,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.startedAt = this.timestamp();
  }

  get step(): number {
    return this.stepCount;
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get transcript(): readonly Message[] {
    return this.messages;
  }

  /**
   * Most recent non-empty prose the model wrote around its actions.
   */
  get bestEffortText(): string {
    return this.lastFreeText;
  }

  timestamp(): string {
    return this.now().toISOString();
  }

  appendSystem(content: string): void {
    this.push({ role: "system", content, timestamp: this.timestamp() });
  }

  appendUser(content: string): void {
    this.push({ role: "user", content, timestamp: this.timestamp() });
  }

  appendAssistant(content: string, action: Action, freeText: string): AssistantMessage {
    if (freeText.trim() !== "") this.lastFreeText = freeText.trim();
    const message: AssistantMessage = {
      role: "assistant",
      content,
      action: Object.freeze(action),
      timestamp: this.timestamp(),
    };
    this.push(message);
    return message;
  }

  appendObservation(observation: Omit<ObservationMessage, "role" | "timestamp">): ObservationMessage {
    const message: ObservationMessage = {
      role: "tool_observation",
      ...observation,
      timestamp: this.timestamp(),
    };
    this.push(message);
    return message;
  }

  /**
   * Count one completed iteration. Never exceeds maxSteps.
   */
  completeStep(): void {
    this.assertRunning();
    if (this.stepCount >= this.config.maxSteps) {
      throw new Error(`Session ${this.id} already used ${this.config.maxSteps} steps`);
    }
    this.stepCount++;
  }

  finish(
    status: Terminal,
    reason: TerminationReason,
    outcome: { finalAnswer?: string; error?: SessionError } = {},
  ): void {
    this.assertRunning();
    this.currentStatus = status;
    this.reason = reason;
    this.finalAnswer = outcome.finalAnswer;
    this.error = outcome.error;
    this.endedAt = this.timestamp();
  }

  snapshot(): Session {
    return Object.freeze({
      id: this.id,
      task: this.task,
      transcript: Object.freeze([...this.messages]),
      step: this.stepCount,
      status: this.currentStatus,
      config: this.config,
      policy: this.policy,
      finalAnswer: this.finalAnswer,
      terminationReason: this.reason,
      error: this.error,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
    });
  }

  private push(message: Message): void {
    this.assertRunning();
    this.messages.push(Object.freeze(message));
  }

  private assertRunning(): void {
    if (this.currentStatus !== "running") {
      throw new Error(`Session ${this.id} is ${this.currentStatus}`);
    }
  }
}
