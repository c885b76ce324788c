import { z } from "zod";
import type { RunConfig, SessionConfig } from "../types/Session.js";

export const DEFAULT_MAX_STEPS = 10;
export const DEFAULT_MAX_OBSERVATION_CHARS = 4_000;
export const DEFAULT_MAX_TRANSCRIPT_CHARS = 32_000;

const MemoryOptionsSchema = z.object({
  recall: z.boolean().default(true),
  persist: z.boolean().default(true),
  recallLimit: z.number().int().min(1).default(5),
});

export const RunConfigSchema = z.object({
  maxSteps: z.number().int().min(1),
  timeoutMs: z.number().int().positive().optional(),
  stepTimeoutMs: z.number().int().positive().optional(),
  decisionRetries: z.number().int().min(0).max(10).default(1),
  maxObservationChars: z.number().int().min(1).default(DEFAULT_MAX_OBSERVATION_CHARS),
  maxTranscriptChars: z.number().int().min(1).default(DEFAULT_MAX_TRANSCRIPT_CHARS),
  memory: MemoryOptionsSchema.default({}),
});

/**
 * Run options that may be preset on a runtime.
 */
export type RunDefaults = Partial<Omit<RunConfig, "signal" | "sessionId">>;

/**
 * Raised for a malformed run configuration, before any session exists.
 */
export class InvalidRunConfigError extends Error {
  public readonly kind = "invalid_run_config";

  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "InvalidRunConfigError";
  }
}

/**
 * Merge run options over runtime defaults and validate the result.
 */
export function resolveRunConfig(
  config: Partial<RunConfig> = {},
  defaults: RunDefaults = {},
): SessionConfig {
  const merged = {
    maxSteps: config.maxSteps ?? defaults.maxSteps ?? DEFAULT_MAX_STEPS,
    timeoutMs: config.timeoutMs ?? defaults.timeoutMs,
    stepTimeoutMs: config.stepTimeoutMs ?? defaults.stepTimeoutMs,
    decisionRetries: config.decisionRetries ?? defaults.decisionRetries,
    maxObservationChars: config.maxObservationChars ?? defaults.maxObservationChars,
    maxTranscriptChars: config.maxTranscriptChars ?? defaults.maxTranscriptChars,
    memory: { ...defaults.memory, ...config.memory },
  };

  if (config.sessionId !== undefined && config.sessionId.trim() === "") {
    throw new InvalidRunConfigError("Invalid run config: sessionId must not be empty", [
      "sessionId: must not be empty",
    ]);
  }

  const parsed = RunConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "config"}: ${i.message}`,
    );
    throw new InvalidRunConfigError(`Invalid run config: ${issues.join("; ")}`, issues);
  }
  return Object.freeze({
    ...parsed.data,
    memory: Object.freeze(parsed.data.memory),
  });
}
