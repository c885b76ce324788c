import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { BUILTIN_TOOL_NAMES, type BuiltinToolName } from "../tools/types.js";

/** Default config filename used when no path is given (e.g. CLI). */
export const DEFAULT_CONFIG_FILE = "agent.yaml";

const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug"]);

const ToolNameSchema = z.custom<BuiltinToolName>(
  (value) => typeof value === "string" && BUILTIN_TOOL_NAMES.some((name) => name === value),
  { message: `expected one of: ${BUILTIN_TOOL_NAMES.join(", ")}` },
);

const ProviderSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("mock") }),
  z.object({
    type: z.literal("openai-compatible"),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    /** Environment variable holding the API key */
    apiKeyEnv: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
]);

export const AgentConfigSchema = z.object({
  workspace: z.string().min(1).default("."),
  runtime: z
    .object({
      maxSteps: z.number().int().min(1).optional(),
      timeoutMs: z.number().int().positive().optional(),
      stepTimeoutMs: z.number().int().positive().optional(),
      decisionRetries: z.number().int().min(0).max(10).optional(),
      maxObservationChars: z.number().int().min(1).optional(),
      maxTranscriptChars: z.number().int().min(1).optional(),
      maxConcurrentSessions: z.number().int().min(1).optional(),
      maxQueuedSessions: z.number().int().min(0).optional(),
    })
    .default({}),
  policy: z
    .object({
      allowNetwork: z.boolean().default(false),
      allowedDomains: z.array(z.string().min(1)).default([]),
      allowWrites: z.boolean().default(false),
      deniedTools: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  tools: z
    .object({
      enabled: z.array(ToolNameSchema).optional(),
      maxReadBytes: z.number().int().positive().optional(),
      maxHttpBytes: z.number().int().positive().optional(),
      httpTimeoutMs: z.number().int().positive().optional(),
      blockedCidrs: z.array(z.string()).optional(),
    })
    .default({}),
  provider: ProviderSchema.default({ type: "mock" }),
  memory: z
    .object({
      enabled: z.boolean().default(false),
      recall: z.boolean().default(true),
      persist: z.boolean().default(true),
      recallLimit: z.number().int().min(1).default(5),
      maxRecords: z.number().int().min(1).optional(),
    })
    .default({}),
  trace: z
    .object({
      /** JSONL trace file; relative to the config file */
      file: z.string().min(1).optional(),
      maxEntries: z.number().int().min(1).optional(),
    })
    .default({}),
  debug: z
    .object({
      enabled: z.boolean().optional(),
      level: LogLevelSchema.optional(),
      includeArgs: z.boolean().optional(),
      includeResults: z.boolean().optional(),
      includeRaw: z.boolean().optional(),
      logEvents: z.boolean().optional(),
    })
    .optional(),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ProviderConfig = AgentConfig["provider"];

export interface AgentConfigLoadResult {
  configPath: string;
  rawConfig: unknown;
  /** Validated config with paths made absolute */
  config: AgentConfig;
}

/**
 * Raised when a config file is missing, unreadable or invalid.
 */
export class AgentConfigError extends Error {
  public readonly kind = "invalid_config";

  constructor(
    message: string,
    public readonly configPath: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "AgentConfigError";
  }
}

/**
 * Validate raw config data. Relative paths resolve against `configDir`.
 */
export function parseAgentConfig(
  raw: unknown,
  configDir: string,
  configPath = "<inline>",
): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "config"}: ${i.message}`,
    );
    throw new AgentConfigError(
      `Invalid config ${configPath}: ${issues.join("; ")}`,
      configPath,
      issues,
    );
  }
  const config = parsed.data;
  return {
    ...config,
    workspace: path.resolve(configDir, config.workspace),
    trace: {
      ...config.trace,
      file: config.trace.file ? path.resolve(configDir, config.trace.file) : undefined,
    },
  };
}

export async function loadAgentConfig(configPath: string): Promise<AgentConfigLoadResult> {
  const resolvedPath = path.resolve(process.cwd(), configPath);
  let text: string;
  try {
    text = await fs.readFile(resolvedPath, "utf-8");
  } catch (err) {
    throw new AgentConfigError(
      `Cannot read config ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      resolvedPath,
    );
  }

  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(text) ?? {};
  } catch (err) {
    throw new AgentConfigError(
      `Invalid YAML in ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      resolvedPath,
    );
  }

  return {
    configPath: resolvedPath,
    rawConfig,
    config: parseAgentConfig(rawConfig, path.dirname(resolvedPath), resolvedPath),
  };
}
