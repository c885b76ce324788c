import type { PromptMessage } from "../llm/DecisionProvider.js";
import type { MemoryRecord } from "../memory/MemoryPort.js";
import type { Message, ObservationMessage, ObservationOutcome } from "../types/Session.js";
import type { ToolCatalogEntry } from "../types/ToolSpec.js";

const PROTOCOL = [
  "Respond with exactly one JSON object per turn, in one of these forms:",
  '{"action":"tool","tool":"<tool name>","args":{...}}',
  '{"action":"final","content":"<your answer>"}',
  "Only one tool call is honored per turn. Tool results arrive as observations.",
  "Denied calls report a reason code; do not retry them unchanged.",
].join("\n");

export interface SystemPromptInput {
  policySummary: string;
  tools: readonly ToolCatalogEntry[];
  memories?: readonly MemoryRecord[];
}

/**
 * System prompt: role, wire protocol, tool catalog, policy and recalled memory.
 */
export function buildSystemPrompt(input: SystemPromptInput): string {
  const sections = [
    "You are an agent that completes the user's task using the tools below.",
    PROTOCOL,
    "Available tools:\n" + formatCatalog(input.tools),
    "Policy:\n" + input.policySummary,
  ];
  if (input.memories && input.memories.length > 0) {
    sections.push(
      "Relevant memory:\n" +
        input.memories.map((m) => `- (${m.role}) ${m.content}`).join("\n"),
    );
  }
  return sections.join("\n\n");
}

function formatCatalog(tools: readonly ToolCatalogEntry[]): string {
  if (tools.length === 0) return "(none)";
  return tools
    .map(
      (t) =>
        `- ${t.name} [${t.riskClass}]: ${t.description || "(no description)"}\n  args schema: ${JSON.stringify(t.inputSchema)}`,
    )
    .join("\n");
}

const OBSERVATION_HEADER = /^\[observation tool=(\S+) outcome=(success|error|denied)\]\n/;

/**
 * Prompt form of a tool observation.
 */
export function formatObservation(message: ObservationMessage): string {
  return `[observation tool=${message.toolName} outcome=${message.outcome}]\n${message.content}`;
}

/**
 * Inverse of formatObservation, for offline providers.
 */
export function parseObservation(
  content: string,
): { toolName: string; outcome: ObservationOutcome; content: string } | undefined {
  const match = OBSERVATION_HEADER.exec(content);
  const toolName = match?.[1];
  const outcome = match?.[2];
  if (!match || toolName === undefined || !isOutcome(outcome)) return undefined;
  return { toolName, outcome, content: content.slice(match[0].length) };
}

function isOutcome(value: string | undefined): value is ObservationOutcome {
  return value === "success" || value === "error" || value === "denied";
}

export function toPromptMessage(message: Message): PromptMessage {
  switch (message.role) {
    case "system":
    case "user":
    case "assistant":
      return { role: message.role, content: message.content };
    case "tool_observation":
      return { role: "user", content: formatObservation(message) };
  }
}

export interface TranscriptView {
  messages: PromptMessage[];
  /** Transcript messages left out of this view */
  dropped: number;
}

/**
 * Prompt view of a transcript that fits in `maxChars`.
 * The system message, the task and the most recent message are always kept;
 * other turns are dropped oldest first. The transcript itself is not touched.
 */
export function buildTranscriptView(
  transcript: readonly Message[],
  maxChars: number,
): TranscriptView {
  const messages = transcript.map(toPromptMessage);
  const size = (list: readonly PromptMessage[]) =>
    list.reduce((n, m) => n + m.content.length, 0);

  const [system, task, ...rest] = messages;
  if (!system || !task || rest.length <= 1 || size(messages) <= maxChars) {
    return { messages, dropped: 0 };
  }

  const kept = [...rest];
  let dropped = 0;
  let total = size(messages);
  while (kept.length > 1 && total > maxChars) {
    const removed = kept.shift();
    total -= removed?.content.length ?? 0;
    dropped++;
  }

  const note = `\n\n(${dropped} earlier message${dropped === 1 ? "" : "s"} omitted)`;
  return {
    messages: [{ role: "system", content: system.content + note }, task, ...kept],
    dropped,
  };
}
