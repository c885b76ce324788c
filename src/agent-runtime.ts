import path from "node:path";
import { AgentRuntime } from "./core/AgentRuntime.js";
import { PolicyGate } from "./core/PolicyGate.js";
import {
  DEFAULT_CONFIG_FILE,
  loadAgentConfig,
  type AgentConfig,
  type ProviderConfig,
} from "./config/AgentConfig.js";
import type { DecisionProvider } from "./llm/DecisionProvider.js";
import { MockDecisionProvider } from "./llm/MockDecisionProvider.js";
import {
  OpenAICompatibleClient,
  OpenAICompatibleProvider,
} from "./llm/OpenAICompatibleClient.js";
import { InMemoryMemory } from "./memory/InMemoryMemory.js";
import { combineTraceSinks } from "./observability/GuardedTraceSink.js";
import { JsonlTraceSink } from "./observability/JsonlTraceSink.js";
import { createLogger, type Logger } from "./observability/Logger.js";
import { TraceLog } from "./observability/TraceLog.js";
import { ToolRegistry } from "./registry/ToolRegistry.js";
import { registerBuiltinTools } from "./tools/BuiltinToolsModule.js";
import type { TraceSink } from "./types/Events.js";

export interface AgentOverrides {
  /** Replaces the configured workspace (and the policy's workspace root) */
  workspace?: string;
  maxSteps?: number;
  /** Replaces the configured decision provider */
  decisionProvider?: DecisionProvider;
  /** Environment used to look up provider API keys (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * A runtime wired from configuration, plus the parts callers may inspect.
 */
export interface Agent {
  config: AgentConfig;
  runtime: AgentRuntime;
  registry: ToolRegistry;
  policy: PolicyGate;
  traceLog: TraceLog;
  traceFile?: JsonlTraceSink;
  memory?: InMemoryMemory;
  logger: Logger;
  /** Waits for pending trace writes */
  flush(): Promise<void>;
}

/**
 * Build the decision provider a config names.
 */
export function createDecisionProvider(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): DecisionProvider {
  switch (config.type) {
    case "mock":
      return new MockDecisionProvider();
    case "openai-compatible": {
      const apiKey = config.apiKeyEnv ? env[config.apiKeyEnv] : undefined;
      const client = new OpenAICompatibleClient({
        baseUrl: config.baseUrl,
        model: config.model,
        apiKey,
        temperature: config.temperature,
      });
      return new OpenAICompatibleProvider(client, { timeoutMs: config.timeoutMs });
    }
  }
}

/**
 * Wire registry, built-in tools, policy, memory, trace sinks, provider and
 * runtime from a validated config.
 */
export function createAgent(config: AgentConfig, overrides: AgentOverrides = {}): Agent {
  const workspace = overrides.workspace
    ? path.resolve(process.cwd(), overrides.workspace)
    : config.workspace;
  const effective: AgentConfig = {
    ...config,
    workspace,
    runtime: { ...config.runtime, maxSteps: overrides.maxSteps ?? config.runtime.maxSteps },
  };
  const logger = createLogger({ ...effective.debug, prefix: "agent" });

  const registry = new ToolRegistry();
  registerBuiltinTools(registry, {
    workspaceRoot: workspace,
    ...(effective.tools.enabled ? { enabled: effective.tools.enabled } : {}),
    ...(effective.tools.maxReadBytes ? { maxReadBytes: effective.tools.maxReadBytes } : {}),
    ...(effective.tools.maxHttpBytes ? { maxHttpBytes: effective.tools.maxHttpBytes } : {}),
    ...(effective.tools.httpTimeoutMs ? { httpTimeoutMs: effective.tools.httpTimeoutMs } : {}),
    ...(effective.tools.blockedCidrs ? { blockedCidrs: effective.tools.blockedCidrs } : {}),
  });

  const policy = new PolicyGate({ ...effective.policy, workspaceRoot: workspace });

  const traceLog = new TraceLog({ maxEntries: effective.trace.maxEntries });
  const traceFile = effective.trace.file
    ? new JsonlTraceSink(effective.trace.file, { logger })
    : undefined;
  const traceSink: TraceSink = traceFile
    ? combineTraceSinks(logger, traceLog, traceFile)
    : traceLog;

  const memory = effective.memory.enabled
    ? new InMemoryMemory({ maxRecords: effective.memory.maxRecords })
    : undefined;

  const { maxConcurrentSessions, maxQueuedSessions, ...runDefaults } = effective.runtime;
  const runtime = new AgentRuntime({
    registry,
    decisionProvider:
      overrides.decisionProvider ?? createDecisionProvider(effective.provider, overrides.env),
    policy,
    traceSink,
    memory,
    defaults: {
      ...runDefaults,
      memory: {
        recall: effective.memory.recall,
        persist: effective.memory.persist,
        recallLimit: effective.memory.recallLimit,
      },
    },
    maxConcurrentSessions,
    maxQueuedSessions,
    debug: effective.debug,
  });

  return {
    config: effective,
    runtime,
    registry,
    policy,
    traceLog,
    traceFile,
    memory,
    logger,
    flush: async () => {
      await traceFile?.flush();
    },
  };
}

/**
 * Load a YAML config file and build an Agent from it.
 *
 * ```ts
 * const agent = await createAgentFromConfig("agent.yaml");
 * const { finalAnswer } = await agent.runtime.run("What is 23*19?");
 * ```
 */
export async function createAgentFromConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  overrides: AgentOverrides = {},
): Promise<Agent> {
  const { config } = await loadAgentConfig(configPath);
  return createAgent(config, overrides);
}
