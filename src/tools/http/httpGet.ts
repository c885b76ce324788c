import type { BuiltinTool } from "../types.js";
import { optionalNumberArg, stringArg } from "../types.js";
import { validateUrl } from "../security/ssrf.js";
import { createTaggedError } from "../../core/Retry.js";

export const httpGetInputSchema = {
  type: "object",
  properties: {
    url: { type: "string", format: "uri", description: "http(s) URL to fetch" },
    maxBytes: {
      type: "integer",
      minimum: 1,
      description: "Maximum response size in bytes (default: from config)",
    },
  },
  required: ["url"],
  additionalProperties: false,
} as const;

export const httpGetTool: BuiltinTool = {
  name: "http_get",
  definition: {
    description: "Fetch a URL with GET and return the status line and body text",
    inputSchema: httpGetInputSchema,
    riskClass: "network",
    targetArg: "url",
  },
  create: (config) => async (args, ctx) => {
    const url = stringArg(args, "url");
    const maxBytes = Math.min(optionalNumberArg(args, "maxBytes") ?? config.maxHttpBytes, config.maxHttpBytes);

    await validateUrl(url, config.blockedCidrs);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.httpTimeoutMs);
    const onAbort = () => controller.abort();
    if (ctx.signal.aborted) controller.abort();
    else ctx.signal.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: { "User-Agent": config.httpUserAgent },
        redirect: "error",
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw ctx.signal.aborted
          ? createTaggedError("cancelled", `Request to ${url} was aborted`, { url })
          : createTaggedError(
              "http_timeout",
              `Request to ${url} timed out after ${config.httpTimeoutMs}ms`,
              { url, timeoutMs: config.httpTimeoutMs },
            );
      }
      throw createTaggedError(
        "upstream_error",
        `Fetch failed for ${url}: ${err instanceof Error ? err.message : String(err)}`,
        { url },
      );
    } finally {
      clearTimeout(timer);
      ctx.signal.removeEventListener("abort", onAbort);
    }

    // Check content-length before reading body
    const contentLength = response.headers.get("content-length");
    if (contentLength && parseInt(contentLength, 10) > maxBytes) {
      throw createTaggedError(
        "http_too_large",
        `Response Content-Length ${contentLength} exceeds limit of ${maxBytes} bytes`,
        { url, contentLength: parseInt(contentLength, 10), limit: maxBytes },
      );
    }

    const text = await readResponseWithLimit(response, maxBytes, url);
    return `HTTP ${response.status}\n\n${text}`;
  },
};

async function readResponseWithLimit(
  response: Response,
  maxBytes: number,
  url: string,
): Promise<string> {
  if (!response.body) {
    return response.text();
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw createTaggedError(
          "http_too_large",
          `Response body exceeded limit of ${maxBytes} bytes while reading from ${url}`,
          { url, bytesRead: totalBytes, limit: maxBytes },
        );
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } finally {
    reader.releaseLock();
  }

  return chunks.join("");
}
