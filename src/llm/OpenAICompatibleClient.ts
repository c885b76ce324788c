/**
 * Minimal client for the OpenAI-compatible chat completions API.
 * Use createOpenAICompatibleClient(baseUrl, model, apiKey?) and then .chat(messages).
 */

import { z } from "zod";
import { createTaggedError } from "../core/Retry.js";
import type { DecisionProvider, DecisionRequest, PromptMessage } from "./DecisionProvider.js";

export interface ChatOptions {
  /** Request timeout in milliseconds. Default 60000. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ChatResult {
  content: string;
  raw: unknown;
}

export interface OpenAICompatibleClientConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;

const ChatCompletion = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.string().nullable().optional() })
          .optional(),
      }),
    )
    .optional(),
});

const ErrorBody = z.object({ error: z.union([z.string(), z.record(z.unknown())]) });

export function createOpenAICompatibleClient(
  baseUrl: string,
  model: string,
  apiKey?: string
): OpenAICompatibleClient {
  return new OpenAICompatibleClient({ baseUrl, model, apiKey });
}

export class OpenAICompatibleClient {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly temperature?: number;

  constructor(config: OpenAICompatibleClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.temperature = config.temperature;
  }

  async chat(
    messages: readonly PromptMessage[],
    options?: ChatOptions
  ): Promise<ChatResult> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const raw = await this.request(
      {
        model: this.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
      },
      timeoutMs,
      options?.signal
    );
    const parsed = ChatCompletion.safeParse(raw);
    if (!parsed.success) {
      throw createTaggedError("provider_bad_response", "LLM response has no choices array");
    }
    const content = parsed.data.choices?.[0]?.message?.content ?? "";
    return { content, raw };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }

  private async request(
    body: object,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = `${this.baseUrl}/chat/completions`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    else signal?.addEventListener("abort", onAbort, { once: true });
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        if (signal?.aborted)
          throw createTaggedError("cancelled", "LLM request aborted");
        throw createTaggedError("provider_timeout", `LLM request timed out after ${timeoutMs}ms`);
      }
      throw createTaggedError(
        "provider_unreachable",
        err instanceof Error ? err.message : String(err)
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      const kind =
        response.status === 401 || response.status === 403
          ? "provider_auth_failed"
          : "provider_http_error";
      throw createTaggedError(
        kind,
        `LLM API error ${response.status}: ${describeErrorBody(text)}`,
        { status: response.status }
      );
    }
    try {
      return JSON.parse(text);
    } catch {
      throw createTaggedError(
        "provider_bad_response",
        `LLM API returned non-JSON body (status ${response.status})`
      );
    }
  }
}

/**
 * The `error` field of a JSON error body, the whole JSON body otherwise,
 * or the first 200 characters of a non-JSON one.
 */
function describeErrorBody(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    const trimmed = text.trim();
    return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed;
  }
  const errBody = ErrorBody.safeParse(parsed);
  return JSON.stringify(errBody.success ? errBody.data.error : parsed);
}

/**
 * Decision provider backed by an OpenAI-compatible endpoint.
 */
export class OpenAICompatibleProvider implements DecisionProvider {
  readonly name = "openai-compatible";

  constructor(
    private readonly client: OpenAICompatibleClient,
    private readonly options: { timeoutMs?: number } = {}
  ) {}

  async decide(request: DecisionRequest): Promise<string> {
    const result = await this.client.chat(request.messages, {
      signal: request.signal,
      timeoutMs: this.options.timeoutMs,
    });
    return result.content;
  }
}
