import type { ToolCatalogEntry } from "../types/ToolSpec.js";

/**
 * Message as seen by a model backend.
 */
export interface PromptMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface DecisionRequest {
  sessionId: string;
  step: number;
  /** Transcript view: system prompt first, possibly with old turns dropped */
  messages: readonly PromptMessage[];
  tools: readonly ToolCatalogEntry[];
  /** Aborted on step timeout or cancellation */
  signal: AbortSignal;
}

/**
 * Model backend. Returns the raw decision text; transport failures reject.
 */
export interface DecisionProvider {
  readonly name?: string;
  decide(request: DecisionRequest): Promise<string>;
}
