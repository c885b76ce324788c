import type { ToolRegistry } from "../registry/ToolRegistry.js";
import type { Tool } from "../types/ToolSpec.js";
import type { BuiltinTool, BuiltinToolsConfig } from "./types.js";
import { DEFAULT_BUILTIN_TOOLS_CONFIG } from "./types.js";

import { calculatorTool } from "./math/calculator.js";
import { fileReadTool } from "./fs/readText.js";
import { fileWriteTool } from "./fs/writeText.js";
import { httpGetTool } from "./http/httpGet.js";

/**
 * All built-in tools, in catalog order.
 */
export const BUILTIN_TOOLS: readonly BuiltinTool[] = [
  calculatorTool,
  fileReadTool,
  fileWriteTool,
  httpGetTool,
];

/**
 * User-provided config for registerBuiltinTools.
 * `workspaceRoot` is required; the rest have defaults.
 */
export type BuiltinToolsUserConfig = Pick<BuiltinToolsConfig, "workspaceRoot"> &
  Partial<Omit<BuiltinToolsConfig, "workspaceRoot">>;

/**
 * Register the enabled built-in tools with a ToolRegistry.
 *
 * Usage:
 * ```ts
 * const registry = new ToolRegistry();
 * registerBuiltinTools(registry, {
 *   workspaceRoot: "/srv/agent/workspace",
 *   enabled: ["calculator", "file_read"],
 * });
 * ```
 */
export function registerBuiltinTools(
  registry: ToolRegistry,
  userConfig: BuiltinToolsUserConfig,
): Tool[] {
  const config: BuiltinToolsConfig = {
    ...DEFAULT_BUILTIN_TOOLS_CONFIG,
    ...userConfig,
  };

  return BUILTIN_TOOLS.filter((tool) => config.enabled.includes(tool.name)).map((tool) =>
    registry.register(tool.name, tool.definition, tool.create(config)),
  );
}
