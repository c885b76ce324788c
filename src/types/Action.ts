/**
 * The model asked for one tool to run.
 */
export interface ToolCallAction {
  type: "tool_call";
  toolName: string;
  /** Untrusted until validated against the tool's schema */
  arguments: Readonly<Record<string, unknown>>;
}

/**
 * The model produced its final answer.
 */
export interface FinalAction {
  type: "final";
  content: string;
}

/**
 * Output that did not follow the action protocol. Ends the session like a final answer.
 */
export interface PlainTextAction {
  type: "plain_text";
  content: string;
}

/**
 * One parsed decision.
 */
export type Action = ToolCallAction | FinalAction | PlainTextAction;

export type ActionType = Action["type"];
