/**
 * Risk classification declared by every tool.
 * Used by the PolicyGate to decide whether a call may run.
 */
export type RiskClass = "pure" | "filesystem-read" | "filesystem-write" | "network";

export const RISK_CLASSES: readonly RiskClass[] = [
  "pure",
  "filesystem-read",
  "filesystem-write",
  "network",
];

/**
 * JSON Schema for a tool's arguments. Always describes an object.
 */
export type ToolInputSchema = Readonly<Record<string, unknown>>;

/**
 * Arguments that passed schema validation (types coerced, defaults applied).
 */
export type ValidatedArgs = Readonly<Record<string, unknown>>;

/**
 * Context handed to an executor for one invocation.
 */
export interface ToolExecutionContext {
  sessionId: string;
  step: number;
  /** Aborted on step timeout or caller cancellation. Honoring it is up to the tool. */
  signal: AbortSignal;
}

/**
 * Executes a tool. Resolves with the observation text; failures are thrown
 * (tagged errors carry a `kind` code that is surfaced to the model).
 */
export type ToolExecutor = (
  args: ValidatedArgs,
  ctx: ToolExecutionContext,
) => Promise<string> | string;

/**
 * Everything about a tool except its name and executor.
 */
export interface ToolDefinition {
  description?: string;
  /** JSON Schema for input validation */
  inputSchema: ToolInputSchema;
  riskClass: RiskClass;
  /**
   * Argument carrying the call's target. For network tools it holds the URL or
   * host and turns on domain scoping; for filesystem-write tools it holds the
   * path (defaults to "path").
   */
  targetArg?: string;
}

/**
 * A registered, invocable tool.
 */
export interface Tool extends ToolDefinition {
  readonly name: string;
  readonly execute: ToolExecutor;
}

/**
 * Catalog entry given to the decision provider.
 */
export interface ToolCatalogEntry {
  readonly name: string;
  readonly description: string;
  readonly riskClass: RiskClass;
  readonly inputSchema: ToolInputSchema;
}
