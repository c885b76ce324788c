import { writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { BuiltinTool } from "../types.js";
import { booleanArg, stringArg } from "../types.js";
import { resolveSandboxedPath } from "../security/sandbox.js";
import { createTaggedError } from "../../core/Retry.js";

export const fileWriteInputSchema = {
  type: "object",
  properties: {
    path: { type: "string", minLength: 1, description: "File path relative to the workspace" },
    content: { type: "string", description: "UTF-8 text content to write" },
    overwrite: {
      type: "boolean",
      default: false,
      description: "Allow overwriting existing files",
    },
  },
  required: ["path", "content"],
  additionalProperties: false,
} as const;

export const fileWriteTool: BuiltinTool = {
  name: "file_write",
  definition: {
    description: "Write UTF-8 text to a file in the workspace (parent directories are created)",
    inputSchema: fileWriteInputSchema,
    riskClass: "filesystem-write",
    targetArg: "path",
  },
  create: (config) => async (args) => {
    const inputPath = stringArg(args, "path");
    const content = stringArg(args, "content");
    const overwrite = booleanArg(args, "overwrite", false);

    const resolvedPath = await resolveSandboxedPath(inputPath, config.workspaceRoot);
    await mkdir(dirname(resolvedPath), { recursive: true });

    try {
      await writeFile(resolvedPath, content, { encoding: "utf-8", flag: overwrite ? "w" : "wx" });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw createTaggedError(
          "file_exists",
          `File already exists: ${inputPath}. Set overwrite=true to replace it.`,
        );
      }
      throw err;
    }

    const bytes = Buffer.byteLength(content, "utf-8");
    return `Wrote ${bytes} bytes to ${inputPath}`;
  },
};
