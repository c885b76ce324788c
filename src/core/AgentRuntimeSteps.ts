import type { DecisionProvider } from "../llm/DecisionProvider.js";
import type { MemoryPort, MemoryRecord } from "../memory/MemoryPort.js";
import type { Logger } from "../observability/Logger.js";
import { sanitizeForLog, summarizeForLog } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import type { SessionTracer } from "../observability/SessionTracer.js";
import { UnknownToolError } from "../registry/errors.js";
import type { ToolView } from "../registry/ToolRegistry.js";
import type { ToolCallAction } from "../types/Action.js";
import type { ObservationMessage, SessionError } from "../types/Session.js";
import type { Tool } from "../types/ToolSpec.js";
import { parseAction, type ParsedDecision } from "./ActionParser.js";
import { runWithTimeout, type Deadline } from "./Deadline.js";
import type { PolicyGate } from "./PolicyGate.js";
import {
  createTaggedError,
  errorKind,
  isTaggedError,
  withRetry,
  type TaggedError,
} from "./Retry.js";
import type { SessionState } from "./SessionState.js";
import { buildTranscriptView } from "./Transcript.js";

export interface StepDependencies {
  tools: ToolView;
  policy: PolicyGate;
  provider: DecisionProvider;
  metrics: Metrics;
  memory?: MemoryPort;
}

/**
 * Everything one session's loop needs.
 */
export interface StepContext {
  state: SessionState;
  tracer: SessionTracer;
  /** Session-scoped logger (entries carry the session id) */
  log: Logger;
  deadline: Deadline;
  signal?: AbortSignal;
  deps: StepDependencies;
}

export type DecisionOutcome =
  | { ok: true; raw: string; decision: ParsedDecision }
  | { ok: false; error: SessionError };

export type ToolStepOutcome = "observed" | "cancelled";

/**
 * Loop step: ask the provider for the next decision.
 * Each attempt emits one decision_requested and exactly one decision_received.
 */
export async function requestDecision(ctx: StepContext): Promise<DecisionOutcome> {
  const { state, tracer, log, deadline, signal, deps } = ctx;
  const step = state.step;
  let outstanding = 0;

  try {
    const result = await withRetry(
      async (attempt) => {
        assertCanProceed(ctx);
        const view = buildTranscriptView(state.transcript, state.config.maxTranscriptChars);
        tracer.emit("decision_requested", step, {
          attempt,
          messageCount: view.messages.length,
          droppedMessages: view.dropped,
        });
        outstanding = attempt;

        let raw: string;
        try {
          raw = await runWithTimeout(
            (callSignal) =>
              deps.provider.decide({
                sessionId: state.id,
                step,
                messages: view.messages,
                tools: deps.tools.catalog(),
                signal: callSignal,
              }),
            {
              timeoutMs: deadline.callBudget(state.config.stepTimeoutMs),
              signal,
              timeoutKind: "decision_timeout",
              label: "Decision",
            },
          );
        } catch (err) {
          throw classifyDecisionError(err, ctx);
        }

        const decision = parseAction(raw);
        outstanding = 0;
        tracer.emit("decision_received", step, {
          attempt,
          ok: true,
          actionType: decision.action.type,
          rawLength: raw.length,
        });
        if (log.isEnabled("debug")) {
          log.debug("decision.received", {
            step,
            action: decision.action.type,
            raw: log.options.includeRaw ? summarizeForLog(raw) : undefined,
          });
        }
        return { raw, decision };
      },
      {
        maxRetries: state.config.decisionRetries,
        onFailedAttempt: (error, attempt, willRetry) => {
          if (outstanding !== attempt) return;
          outstanding = 0;
          tracer.emit("decision_received", step, {
            attempt,
            ok: false,
            error: toSessionError(error),
            willRetry,
          });
          if (willRetry) deps.metrics.recordDecisionRetry();
          log.warn("decision.failed", {
            step,
            attempt,
            willRetry,
            error: error.message,
          });
        },
      },
    );
    return { ok: true, ...result };
  } catch (err) {
    return { ok: false, error: toSessionError(err) };
  }
}

/**
 * Loop step: resolve, validate, authorize and execute one tool call.
 * Every path except cancellation appends exactly one observation.
 */
export async function runToolCall(
  ctx: StepContext,
  action: ToolCallAction,
): Promise<ToolStepOutcome> {
  const { state, tracer, log, deps } = ctx;
  const step = state.step;

  let tool: Tool;
  try {
    tool = deps.tools.resolve(action.toolName);
  } catch (err) {
    if (!(err instanceof UnknownToolError)) throw err;
    const available = deps.tools.catalog().map((t) => t.name).join(", ") || "(none)";
    const message = `Unknown tool: ${action.toolName}. Available tools: ${available}`;
    tracer.emit("tool_rejected", step, { tool: action.toolName, errorCode: "unknown_tool", message });
    await observe(ctx, {
      toolName: action.toolName,
      outcome: "error",
      errorCode: "unknown_tool",
      content: formatErrorObservation("unknown_tool", message),
    });
    return "observed";
  }

  const validation = deps.tools.validate(tool, action.arguments);
  if (!validation.ok) {
    const message = `Invalid arguments for ${tool.name}: ${validation.error.message}`;
    tracer.emit("tool_rejected", step, { tool: tool.name, errorCode: "schema_invalid", message });
    await observe(ctx, {
      toolName: tool.name,
      outcome: "error",
      errorCode: "schema_invalid",
      content: formatErrorObservation("schema_invalid", message),
    });
    return "observed";
  }

  const decision = deps.policy.authorize(tool, validation.args, state);
  tracer.emit("policy_checked", step, {
    tool: tool.name,
    allowed: decision.allowed,
    ...(decision.allowed ? {} : { reason: decision.reason }),
  });
  deps.metrics.recordPolicyDecision(
    tool.name,
    decision.allowed,
    decision.allowed ? undefined : decision.reason,
  );
  if (!decision.allowed) {
    log.info("policy.denied", { step, tool: tool.name, reason: decision.reason });
    await observe(ctx, {
      toolName: tool.name,
      outcome: "denied",
      errorCode: decision.reason,
      content: JSON.stringify({ ok: false, denied: decision.reason }),
    });
    return "observed";
  }

  if (ctx.signal?.aborted) return "cancelled";

  if (log.isEnabled("debug")) {
    log.debug("tool.start", {
      step,
      tool: tool.name,
      args: log.options.includeArgs ? sanitizeForLog(validation.args) : undefined,
    });
  }

  const started = Date.now();
  try {
    const output = await runWithTimeout(
      (callSignal) =>
        tool.execute(validation.args, { sessionId: state.id, step, signal: callSignal }),
      {
        timeoutMs: ctx.deadline.callBudget(state.config.stepTimeoutMs),
        signal: ctx.signal,
        timeoutKind: "tool_timeout",
        label: `Tool ${tool.name}`,
      },
    );
    const durationMs = Date.now() - started;
    const cap = state.config.maxObservationChars;
    const text = String(output);
    const content = text.length > cap ? text.slice(0, cap) : text;

    const observed = appendObservation(ctx, { toolName: tool.name, outcome: "success", content });
    tracer.emit("tool_executed", step, {
      tool: tool.name,
      durationMs,
      originalLength: text.length,
      observationLength: content.length,
      truncated: content.length < text.length,
    });
    await persistObservation(ctx, observed);
    deps.metrics.recordInvocation(tool.name, true, durationMs);
    if (log.isEnabled("debug")) {
      log.debug("tool.ok", {
        step,
        tool: tool.name,
        durationMs,
        result: log.options.includeResults ? summarizeForLog(content) : undefined,
      });
    }
  } catch (err) {
    const durationMs = Date.now() - started;
    const code = errorKind(err);
    const message = err instanceof Error ? err.message : String(err);
    const observed = appendObservation(ctx, {
      toolName: tool.name,
      outcome: "error",
      errorCode: code,
      content: formatErrorObservation(code, message),
    });
    tracer.emit("tool_failed", step, { tool: tool.name, durationMs, errorCode: code, message });
    await persistObservation(ctx, observed);
    deps.metrics.recordInvocation(tool.name, false, durationMs);
    log.debug("tool.failed", { step, tool: tool.name, code, message });
  }
  return "observed";
}

/**
 * Memory recall at session start. Failures degrade to no memories.
 */
export async function recallMemories(ctx: StepContext, limit: number): Promise<MemoryRecord[]> {
  const memory = ctx.deps.memory;
  if (!memory) return [];
  try {
    return await memory.search(ctx.state.task, limit);
  } catch (err) {
    reportMemoryError(ctx, "search", err);
    return [];
  }
}

/**
 * Persist one turn. Failures are traced and logged, never fatal.
 */
export async function persistTurn(
  ctx: StepContext,
  record: Omit<MemoryRecord, "sessionId" | "timestamp">,
): Promise<void> {
  const memory = ctx.deps.memory;
  if (!memory || !ctx.state.config.memory.persist) return;
  try {
    await memory.append({
      ...record,
      sessionId: ctx.state.id,
      timestamp: ctx.state.timestamp(),
    });
  } catch (err) {
    reportMemoryError(ctx, "append", err);
  }
}

/**
 * JSON body of an error observation, capped like any other observation.
 */
export function formatErrorObservation(code: string, message: string): string {
  return JSON.stringify({ ok: false, error: { code, message } });
}

function reportMemoryError(
  ctx: StepContext,
  operation: "search" | "append",
  err: unknown,
): void {
  const message = err instanceof Error ? err.message : String(err);
  ctx.tracer.emit("memory_error", ctx.state.step, { operation, message });
  ctx.log.warn("memory.failed", { operation, error: message });
}

/**
 * Append an observation and persist it. Execution outcomes are traced
 * between the two steps instead (policy_checked stays next to tool_executed).
 */
async function observe(
  ctx: StepContext,
  observation: Omit<ObservationMessage, "role" | "timestamp">,
): Promise<void> {
  await persistObservation(ctx, appendObservation(ctx, observation));
}

function appendObservation(
  ctx: StepContext,
  observation: Omit<ObservationMessage, "role" | "timestamp">,
): ObservationMessage {
  const cap = ctx.state.config.maxObservationChars;
  const content =
    observation.content.length > cap ? observation.content.slice(0, cap) : observation.content;
  return ctx.state.appendObservation({ ...observation, content });
}

async function persistObservation(ctx: StepContext, message: ObservationMessage): Promise<void> {
  await persistTurn(ctx, {
    role: "tool_observation",
    content: message.content,
    toolName: message.toolName,
  });
}

function assertCanProceed(ctx: StepContext): void {
  if (ctx.signal?.aborted) {
    throw createTaggedError("cancelled", "Session cancelled by caller");
  }
  if (ctx.deadline.expired()) {
    throw createTaggedError("deadline_exceeded", "Session deadline exceeded");
  }
}

function classifyDecisionError(err: unknown, ctx: StepContext): TaggedError {
  if (ctx.signal?.aborted) {
    return createTaggedError("cancelled", "Session cancelled by caller");
  }
  if (ctx.deadline.expired()) {
    return createTaggedError("deadline_exceeded", "Session deadline exceeded");
  }
  if (isTaggedError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return createTaggedError("decision_provider_error", message);
}

function toSessionError(err: unknown): SessionError {
  return {
    kind: errorKind(err, "decision_provider_error"),
    message: err instanceof Error ? err.message : String(err),
  };
}
