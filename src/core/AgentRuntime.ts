import { bulkhead, BulkheadRejectedError, type BulkheadPolicy } from "cockatiel";
import { v4 as uuidv4 } from "uuid";
import type { DecisionProvider } from "../llm/DecisionProvider.js";
import type { MemoryPort } from "../memory/MemoryPort.js";
import { GuardedTraceSink } from "../observability/GuardedTraceSink.js";
import { createLogger, summarizeForLog } from "../observability/Logger.js";
import type { DebugOptions, Logger } from "../observability/Logger.js";
import { Metrics } from "../observability/Metrics.js";
import { SessionTracer } from "../observability/SessionTracer.js";
import { TraceLog } from "../observability/TraceLog.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import type { TraceSink } from "../types/Events.js";
import type { RunConfig, RunResult, SessionConfig, SessionError } from "../types/Session.js";
import { Deadline } from "./Deadline.js";
import { PolicyGate } from "./PolicyGate.js";
import { resolveRunConfig, type RunDefaults } from "./RunConfig.js";
import { SessionState } from "./SessionState.js";
import { buildSystemPrompt } from "./Transcript.js";
import {
  persistTurn,
  recallMemories,
  requestDecision,
  runToolCall,
  type StepContext,
} from "./AgentRuntimeSteps.js";

/**
 * Answer used when the step budget runs out and the model never wrote prose.
 */
export const STEP_LIMIT_MESSAGE = "Unable to complete the task within the step limit.";

export interface AgentRuntimeOptions {
  registry: ToolRegistry;
  decisionProvider: DecisionProvider;
  policy?: PolicyGate;
  /** Defaults to an in-memory TraceLog */
  traceSink?: TraceSink;
  memory?: MemoryPort;
  metrics?: Metrics;
  /** Run options applied when a run does not set them */
  defaults?: RunDefaults;
  /** Sessions executing at once (default: 8) */
  maxConcurrentSessions?: number;
  /** Sessions waiting for a slot before submissions are rejected (default: 64) */
  maxQueuedSessions?: number;
  debug?: DebugOptions;
  logger?: Logger;
  /** Clock for timestamps */
  now?: () => Date;
}

/**
 * Agent runtime: drives the decide → gate → execute → observe loop.
 *
 * Per step:
 * 1. Assemble the transcript view
 * 2. Request a decision (deadline + deterministic retry)
 * 3. Parse it into one Action
 * 4. Final / plain text → complete
 * 5. Tool call → resolve, validate, authorize, execute, observe
 *
 * Never throws for runtime failures; the returned session says what happened.
 * Only an invalid run configuration rejects.
 */
export class AgentRuntime {
  readonly registry: ToolRegistry;
  readonly policy: PolicyGate;
  readonly metrics: Metrics;
  readonly logger: Logger;
  private readonly provider: DecisionProvider;
  private readonly traceSink: TraceSink;
  private readonly guardedSink: GuardedTraceSink;
  private readonly memory?: MemoryPort;
  private readonly defaults: RunDefaults;
  private readonly sessions: BulkheadPolicy;
  private readonly now: () => Date;

  constructor(options: AgentRuntimeOptions) {
    this.registry = options.registry;
    this.provider = options.decisionProvider;
    this.policy = options.policy ?? new PolicyGate();
    this.metrics = options.metrics ?? new Metrics();
    this.memory = options.memory;
    this.defaults = options.defaults ?? {};
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ ...options.debug, prefix: "AgentRuntime" });
    this.traceSink = options.traceSink ?? new TraceLog();
    this.guardedSink =
      this.traceSink instanceof GuardedTraceSink
        ? this.traceSink
        : new GuardedTraceSink(this.traceSink, this.logger);
    this.sessions = bulkhead(
      options.maxConcurrentSessions ?? 8,
      options.maxQueuedSessions ?? 64,
    );
  }

  /**
   * The sink events are recorded to (as passed in, unguarded).
   */
  getTraceSink(): TraceSink {
    return this.traceSink;
  }

  /**
   * Run one task to a terminal session.
   */
  async run(task: string, config: Partial<RunConfig> = {}): Promise<RunResult> {
    const sessionConfig = resolveRunConfig(config, this.defaults);
    const sessionId = config.sessionId ?? uuidv4();

    try {
      return await this.sessions.execute(() =>
        this.execute(task, sessionId, sessionConfig, config.signal),
      );
    } catch (err) {
      if (!(err instanceof BulkheadRejectedError)) throw err;
      return this.reject(task, sessionId, sessionConfig, {
        kind: "capacity_exceeded",
        message: `Too many concurrent sessions (${this.sessions.executionSlots} free slots, ${this.sessions.queueSlots} free queue slots)`,
      });
    }
  }

  private async execute(
    task: string,
    sessionId: string,
    config: SessionConfig,
    signal: AbortSignal | undefined,
  ): Promise<RunResult> {
    const state = new SessionState(sessionId, task, config, this.policy.snapshot(), this.now);
    const tools = this.registry.snapshot();
    const log = this.logger.child({ sessionId });
    const ctx: StepContext = {
      state,
      tracer: new SessionTracer(sessionId, this.guardedSink, log, this.now),
      log,
      deadline: new Deadline(config.timeoutMs),
      signal,
      deps: {
        tools,
        policy: this.policy,
        provider: this.provider,
        metrics: this.metrics,
        memory: this.memory,
      },
    };

    ctx.tracer.emit("session_started", 0, {
      task,
      maxSteps: config.maxSteps,
      tools: tools.catalog().map((t) => t.name),
      policy: state.policy,
    });
    log.info("session.start", {
      task: summarizeForLog(task),
      maxSteps: config.maxSteps,
    });

    try {
      const memories = config.memory.recall
        ? await recallMemories(ctx, config.memory.recallLimit)
        : [];
      state.appendSystem(
        buildSystemPrompt({
          policySummary: this.policy.describe(state.policy),
          tools: tools.catalog(),
          memories,
        }),
      );
      state.appendUser(task);
      await persistTurn(ctx, { role: "user", content: task });
      await this.loop(ctx);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error("session.internal_error", { error: message });
      if (state.status === "running") {
        state.finish("failed", "internal_error", { error: { kind: "internal_error", message } });
      }
    }

    return this.complete(state, ctx.tracer, log);
  }

  private async loop(ctx: StepContext): Promise<void> {
    const { state, tracer, signal, deadline } = ctx;
    const maxSteps = state.config.maxSteps;

    while (state.step < maxSteps) {
      if (signal?.aborted) {
        this.cancel(ctx);
        return;
      }
      if (deadline.expired()) {
        this.stepLimit(ctx, "deadline_exceeded");
        return;
      }

      const outcome = await requestDecision(ctx);
      if (!outcome.ok) {
        if (outcome.error.kind === "cancelled") this.cancel(ctx);
        else if (outcome.error.kind === "deadline_exceeded") this.stepLimit(ctx, "deadline_exceeded");
        else state.finish("failed", "decision_provider_failed", { error: outcome.error });
        return;
      }

      const { raw, decision } = outcome;
      const step = state.step;
      state.appendAssistant(raw, decision.action, decision.freeText);
      await persistTurn(ctx, { role: "assistant", content: raw });

      if (decision.action.type !== "tool_call") {
        const content = decision.action.content;
        state.completeStep();
        this.metrics.recordStep(decision.action.type);
        state.finish("completed", "final_answer", { finalAnswer: content });
        tracer.emit("final_returned", step, {
          contentLength: content.length,
          fallback: decision.action.type === "plain_text",
        });
        return;
      }

      const toolOutcome = await runToolCall(ctx, decision.action);
      if (toolOutcome === "cancelled") {
        this.cancel(ctx);
        return;
      }
      state.completeStep();
      this.metrics.recordStep(decision.action.type);
    }

    this.stepLimit(ctx, "max_steps");
  }

  private stepLimit(ctx: StepContext, reason: "max_steps" | "deadline_exceeded"): void {
    const { state } = ctx;
    ctx.tracer.emit("step_limit_hit", state.step, { maxSteps: state.config.maxSteps, reason });
    state.finish("step_limit_reached", reason, {
      finalAnswer: state.bestEffortText || STEP_LIMIT_MESSAGE,
    });
  }

  private cancel(ctx: StepContext): void {
    ctx.state.finish("failed", "cancelled", {
      error: { kind: "cancelled", message: "Session cancelled by caller" },
    });
  }

  private complete(state: SessionState, tracer: SessionTracer, log: Logger): RunResult {
    const session = state.snapshot();
    const reason = session.terminationReason ?? "internal_error";
    tracer.emit("session_ended", session.step, {
      status: session.status,
      reason,
      steps: session.step,
      ...(session.error ? { error: session.error } : {}),
    });
    this.metrics.recordSession(session.status, reason);
    log.info("session.end", {
      status: session.status,
      reason,
      steps: session.step,
    });
    return { finalAnswer: session.finalAnswer ?? "", session };
  }

  /**
   * Terminal session for a submission that never got a slot.
   */
  private reject(
    task: string,
    sessionId: string,
    config: SessionConfig,
    error: SessionError,
  ): RunResult {
    const state = new SessionState(sessionId, task, config, this.policy.snapshot(), this.now);
    const log = this.logger.child({ sessionId });
    const tracer = new SessionTracer(sessionId, this.guardedSink, log, this.now);
    tracer.emit("session_started", 0, {
      task,
      maxSteps: config.maxSteps,
      tools: this.registry.list(),
      policy: state.policy,
    });
    log.warn("session.rejected", { error: error.message });
    state.finish("failed", "capacity_exceeded", { error });
    return this.complete(state, tracer, log);
  }
}
