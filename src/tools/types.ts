import type { ToolDefinition, ToolExecutor } from "../types/ToolSpec.js";

/**
 * Names of the tools shipped with the runtime.
 */
export type BuiltinToolName = "calculator" | "file_read" | "file_write" | "http_get";

export const BUILTIN_TOOL_NAMES: readonly BuiltinToolName[] = [
  "calculator",
  "file_read",
  "file_write",
  "http_get",
];

/**
 * Configuration for the built-in tools.
 */
export interface BuiltinToolsConfig {
  /** Absolute path. All file operations are confined within this root. */
  workspaceRoot: string;
  /** Tools to register (default: all) */
  enabled: BuiltinToolName[];
  /** Maximum bytes for file_read (default: 1MB) */
  maxReadBytes: number;
  /** Maximum bytes for an HTTP response body (default: 1MB) */
  maxHttpBytes: number;
  /** CIDR ranges http_get refuses to reach. Defaults include RFC1918 + loopback + link-local. */
  blockedCidrs: string[];
  /** HTTP timeout in ms (default: 15000) */
  httpTimeoutMs: number;
  /** User-Agent header for HTTP requests */
  httpUserAgent: string;
}

export const DEFAULT_BUILTIN_TOOLS_CONFIG: Omit<BuiltinToolsConfig, "workspaceRoot"> = {
  enabled: [...BUILTIN_TOOL_NAMES],
  maxReadBytes: 1024 * 1024,
  maxHttpBytes: 1024 * 1024,
  blockedCidrs: [
    "127.0.0.0/8",
    "10.0.0.0/8",
    "172.16.0.0/12",
    "192.168.0.0/16",
    "169.254.0.0/16",
    "0.0.0.0/8",
    "::1/128",
    "fc00::/7",
    "fe80::/10",
  ],
  httpTimeoutMs: 15_000,
  httpUserAgent: "gated-agent-runtime/0.1",
};

/**
 * A built-in tool: definition plus an executor factory bound to config.
 */
export interface BuiltinTool {
  name: BuiltinToolName;
  definition: ToolDefinition;
  create(config: BuiltinToolsConfig): ToolExecutor;
}

/**
 * Narrow a validated argument. Schema validation has already run, so a
 * mismatch here is a definition bug.
 */
export function stringArg(args: Readonly<Record<string, unknown>>, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw new TypeError(`Argument "${key}" must be a string`);
  }
  return value;
}

export function optionalNumberArg(
  args: Readonly<Record<string, unknown>>,
  key: string,
): number | undefined {
  const value = args[key];
  return typeof value === "number" ? value : undefined;
}

export function booleanArg(
  args: Readonly<Record<string, unknown>>,
  key: string,
  fallback: boolean,
): boolean {
  const value = args[key];
  return typeof value === "boolean" ? value : fallback;
}
