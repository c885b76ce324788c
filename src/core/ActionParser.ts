import { z } from "zod";
import type { Action } from "../types/Action.js";

/**
 * Marker used when the provider returns nothing usable.
 */
export const EMPTY_RESPONSE_MARKER = "[empty response]";

const ToolCallWire = z.object({
  action: z.literal("tool"),
  tool: z.string().min(1),
  args: z.record(z.unknown()).optional(),
});

const FinalWire = z.object({
  action: z.literal("final"),
  content: z.string(),
});

const WireAction = z.discriminatedUnion("action", [ToolCallWire, FinalWire]);

export type WireAction = z.infer<typeof WireAction>;

/**
 * Parsed decision plus the prose the model wrote around the structured part.
 */
export interface ParsedDecision {
  action: Action;
  /** Text outside the JSON payload, trimmed; empty when there is none */
  freeText: string;
}

interface JsonCandidate {
  value: unknown;
  start: number;
  end: number;
}

const FENCE = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;

/**
 * Parse raw decision text into exactly one Action.
 * Never throws: anything that does not follow the protocol becomes plain text.
 */
export function parseAction(raw: string): ParsedDecision {
  const text = raw.trim();
  if (text.length === 0) {
    return {
      action: { type: "plain_text", content: EMPTY_RESPONSE_MARKER },
      freeText: "",
    };
  }

  const candidates = findJsonCandidates(text);
  const candidate = candidates[0];
  if (!candidate) {
    return { action: { type: "plain_text", content: text }, freeText: text };
  }

  const parsed = WireAction.safeParse(firstOf(candidate.value));
  if (!parsed.success) {
    return { action: { type: "plain_text", content: text }, freeText: text };
  }

  // Only the first action is honored; further actions are not prose either.
  const removed: JsonCandidate[] = [candidate];
  for (const other of candidates.slice(1)) {
    if (removed.some((r) => other.start < r.end && r.start < other.end)) continue;
    if (WireAction.safeParse(firstOf(other.value)).success) removed.push(other);
  }
  const freeText = stripSpans(text, removed);

  const wire = parsed.data;
  if (wire.action === "final") {
    return { action: { type: "final", content: wire.content }, freeText };
  }
  return {
    action: { type: "tool_call", toolName: wire.tool, arguments: wire.args ?? {} },
    freeText,
  };
}

/**
 * Serialize an action in the wire format (used by offline providers).
 */
export function formatAction(action: WireAction): string {
  return JSON.stringify(action);
}

/**
 * Bracket candidates tried per decision; the rest of the text stays prose.
 */
const MAX_PARSE_ATTEMPTS = 64;

/**
 * JSON values in the text in priority order: fenced code blocks first, then
 * balanced objects and arrays by start position.
 */
function findJsonCandidates(text: string): JsonCandidate[] {
  const found: JsonCandidate[] = [];
  for (const match of text.matchAll(FENCE)) {
    const value = tryParse(match[1]?.trim() ?? "");
    if (value !== undefined && typeof value === "object" && value !== null) {
      const start = match.index ?? 0;
      found.push({ value, start, end: start + match[0].length });
    }
  }

  let attempts = 0;
  for (const [start, end] of balancedSpans(text)) {
    if (attempts++ >= MAX_PARSE_ATTEMPTS) break;
    const value = tryParse(text.slice(start, end));
    if (value === undefined) continue;
    // Bracketed prose such as "[1]" is not a decision.
    if (Array.isArray(value) && !isObject(value[0])) continue;
    found.push({ value, start, end });
  }
  return found;
}

/**
 * Every balanced bracket pair as [start, end), sorted by start. One pass:
 * quotes only open strings inside a bracket, and a mismatched close drops
 * every bracket still open.
 */
function balancedSpans(text: string): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  const open: Array<{ index: number; close: "}" | "]" }> = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = open.length > 0;
    else if (ch === "{") open.push({ index: i, close: "}" });
    else if (ch === "[") open.push({ index: i, close: "]" });
    else if (ch === "}" || ch === "]") {
      const top = open.pop();
      if (!top) continue;
      if (top.close !== ch) {
        open.length = 0;
        continue;
      }
      spans.push([top.index, i + 1]);
    }
  }
  return spans.sort((a, b) => a[0] - b[0]);
}

function stripSpans(text: string, spans: readonly JsonCandidate[]): string {
  const ordered = [...spans].sort((a, b) => a.start - b.start);
  const parts: string[] = [];
  let cursor = 0;
  for (const span of ordered) {
    parts.push(text.slice(cursor, span.start));
    cursor = span.end;
  }
  parts.push(text.slice(cursor));
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function isObject(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(body: string): unknown {
  try {
    const value: unknown = JSON.parse(body);
    return value;
  } catch {
    return undefined;
  }
}
