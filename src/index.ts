// === Types ===
export type {
  RiskClass,
  ToolInputSchema,
  ValidatedArgs,
  ToolExecutionContext,
  ToolExecutor,
  ToolDefinition,
  Tool,
  ToolCatalogEntry,
} from "./types/ToolSpec.js";
export { RISK_CLASSES } from "./types/ToolSpec.js";

export type {
  ToolCallAction,
  FinalAction,
  PlainTextAction,
  Action,
  ActionType,
} from "./types/Action.js";

export type { PolicySnapshot, DenyReason, PolicyDecision } from "./types/Policy.js";

export type {
  SessionStatus,
  TerminationReason,
  MessageRole,
  ObservationOutcome,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ObservationMessage,
  Message,
  MemoryRunOptions,
  RunConfig,
  SessionConfig,
  SessionError,
  Session,
  RunResult,
} from "./types/Session.js";

export type {
  TraceEventKind,
  TraceEventPayloads,
  TraceEvent,
  TraceSink,
} from "./types/Events.js";
export { isTraceEventKind } from "./types/Events.js";

// === Core ===
export { AgentRuntime, STEP_LIMIT_MESSAGE } from "./core/AgentRuntime.js";
export type { AgentRuntimeOptions } from "./core/AgentRuntime.js";
export {
  resolveRunConfig,
  InvalidRunConfigError,
  DEFAULT_MAX_STEPS,
  DEFAULT_MAX_OBSERVATION_CHARS,
  DEFAULT_MAX_TRANSCRIPT_CHARS,
} from "./core/RunConfig.js";
export type { RunDefaults } from "./core/RunConfig.js";
export {
  PolicyGate,
  createPolicySnapshot,
  evaluatePolicy,
  describePolicy,
  isDomainAllowed,
} from "./core/PolicyGate.js";
export type { PolicyConfig } from "./core/PolicyGate.js";
export { parseAction, formatAction, EMPTY_RESPONSE_MARKER } from "./core/ActionParser.js";
export type { ParsedDecision, WireAction } from "./core/ActionParser.js";
export { SchemaValidator } from "./core/SchemaValidator.js";
export type { ValidationResult } from "./core/SchemaValidator.js";
export { buildSystemPrompt, buildTranscriptView, formatObservation, parseObservation } from "./core/Transcript.js";
export type { TranscriptView } from "./core/Transcript.js";
export { Deadline, runWithTimeout } from "./core/Deadline.js";
export { withRetry, isRetryable, createTaggedError, isTaggedError } from "./core/Retry.js";
export type { RetryOptions, TaggedError } from "./core/Retry.js";

// === Registry ===
export { ToolRegistry } from "./registry/ToolRegistry.js";
export type {
  ToolSearchQuery,
  ToolView,
  ArgsValidation,
  ValidationIssue,
} from "./registry/ToolRegistry.js";
export {
  DuplicateToolError,
  InvalidToolDefinitionError,
  UnknownToolError,
} from "./registry/errors.js";

// === Memory ===
export type { MemoryPort, MemoryRecord } from "./memory/MemoryPort.js";
export { InMemoryMemory } from "./memory/InMemoryMemory.js";

// === Observability ===
export { TraceLog } from "./observability/TraceLog.js";
export type { TraceLogEntry, TraceListener, TraceQuery } from "./observability/TraceLog.js";
export { JsonlTraceSink } from "./observability/JsonlTraceSink.js";
export { GuardedTraceSink, combineTraceSinks } from "./observability/GuardedTraceSink.js";
export { createLogger, sanitizeForLog, summarizeForLog } from "./observability/Logger.js";
export type {
  Logger,
  LogFields,
  LogLevel,
  DebugOptions,
  ResolvedDebugOptions,
} from "./observability/Logger.js";
export { Metrics } from "./observability/Metrics.js";
export type { HistogramValue, MetricLabels } from "./observability/Metrics.js";

// === Decision providers ===
export type { DecisionProvider, DecisionRequest, PromptMessage } from "./llm/DecisionProvider.js";
export {
  OpenAICompatibleClient,
  OpenAICompatibleProvider,
  createOpenAICompatibleClient,
} from "./llm/OpenAICompatibleClient.js";
export type {
  ChatOptions,
  ChatResult,
  OpenAICompatibleClientConfig,
} from "./llm/OpenAICompatibleClient.js";
export { ScriptedDecisionProvider } from "./llm/ScriptedDecisionProvider.js";
export type { ScriptedReply } from "./llm/ScriptedDecisionProvider.js";
export { MockDecisionProvider } from "./llm/MockDecisionProvider.js";

// === Built-in tools ===
export { registerBuiltinTools, BUILTIN_TOOLS } from "./tools/BuiltinToolsModule.js";
export type { BuiltinToolsUserConfig } from "./tools/BuiltinToolsModule.js";
export { BUILTIN_TOOL_NAMES, DEFAULT_BUILTIN_TOOLS_CONFIG } from "./tools/types.js";
export type { BuiltinTool, BuiltinToolName, BuiltinToolsConfig } from "./tools/types.js";
export { evaluateExpression } from "./tools/math/calculator.js";
export { resolveSandboxedPath } from "./tools/security/sandbox.js";
export { validateUrl, isIpInBlockedCidrs } from "./tools/security/ssrf.js";

// === Config & bootstrap ===
export {
  AgentConfigSchema,
  AgentConfigError,
  DEFAULT_CONFIG_FILE,
  loadAgentConfig,
  parseAgentConfig,
} from "./config/AgentConfig.js";
export type { AgentConfig, AgentConfigLoadResult, ProviderConfig } from "./config/AgentConfig.js";
export { createAgent, createAgentFromConfig, createDecisionProvider } from "./agent-runtime.js";
export type { Agent, AgentOverrides } from "./agent-runtime.js";

// === Evaluation ===
export { loadEvalCases, parseEvalCases, runEval, EvalCaseError } from "./eval/EvalHarness.js";
export type { EvalCase, EvalResult, EvalSummary } from "./eval/EvalHarness.js";
