import { mkdtemp, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AgentRuntime, type AgentRuntimeOptions } from "../../src/core/AgentRuntime.js";
import {
  ScriptedDecisionProvider,
  type ScriptedReply,
} from "../../src/llm/ScriptedDecisionProvider.js";
import { TraceLog } from "../../src/observability/TraceLog.js";
import { ToolRegistry } from "../../src/registry/ToolRegistry.js";
import type { TraceEventKind } from "../../src/types/Events.js";
import type { ObservationMessage, Session } from "../../src/types/Session.js";
import type { ToolDefinition, ToolExecutor } from "../../src/types/ToolSpec.js";

/**
 * Test fixture: a pure tool that echoes its text argument.
 */
export const echoDefinition: ToolDefinition = {
  description: "Echo text back",
  inputSchema: {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
    additionalProperties: false,
  },
  riskClass: "pure",
};

export const echoExecutor: ToolExecutor = (args) => `echo:${String(args["text"])}`;

/**
 * Test fixture: a filesystem-write tool (target in "path").
 */
export const writerDefinition: ToolDefinition = {
  description: "Write a note",
  inputSchema: {
    type: "object",
    properties: { path: { type: "string" }, content: { type: "string", default: "" } },
    required: ["path"],
    additionalProperties: false,
  },
  riskClass: "filesystem-write",
};

/**
 * Test fixture: a network tool scoped by its "url" argument.
 */
export const fetchDefinition: ToolDefinition = {
  description: "Fetch a URL",
  inputSchema: {
    type: "object",
    properties: { url: { type: "string" } },
    required: ["url"],
    additionalProperties: false,
  },
  riskClass: "network",
  targetArg: "url",
};

/** Wire-format tool call */
export function toolCall(tool: string, args: Record<string, unknown> = {}): string {
  return JSON.stringify({ action: "tool", tool, args });
}

/** Wire-format final answer */
export function finalReply(content: string): string {
  return JSON.stringify({ action: "final", content });
}

export interface TestRuntime {
  runtime: AgentRuntime;
  registry: ToolRegistry;
  provider: ScriptedDecisionProvider;
  traceLog: TraceLog;
}

/**
 * Runtime over a scripted provider, recording into a fresh TraceLog.
 */
export function createTestRuntime(
  replies: ScriptedReply[],
  options: Partial<AgentRuntimeOptions> = {},
): TestRuntime {
  const registry = options.registry ?? new ToolRegistry();
  const provider = new ScriptedDecisionProvider(replies);
  const traceLog = new TraceLog();
  const runtime = new AgentRuntime({
    traceSink: traceLog,
    debug: { enabled: false },
    ...options,
    registry,
    decisionProvider: provider,
  });
  return { runtime, registry, provider, traceLog };
}

export function eventKinds(traceLog: TraceLog, sessionId: string): TraceEventKind[] {
  return traceLog.forSession(sessionId).map((e) => e.kind);
}

export function observations(session: Session): ObservationMessage[] {
  return session.transcript.filter(
    (m): m is ObservationMessage => m.role === "tool_observation",
  );
}

/**
 * Fresh temp directory, realpath'd (macOS /var → /private/var).
 */
export async function tempWorkspace(prefix = "agent-test-"): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), prefix)));
}

/**
 * Promise plus its resolver, for holding a call open.
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
