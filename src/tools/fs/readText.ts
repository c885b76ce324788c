import { readFile, stat } from "node:fs/promises";
import type { BuiltinTool } from "../types.js";
import { optionalNumberArg, stringArg } from "../types.js";
import { isNotFound, resolveSandboxedPath } from "../security/sandbox.js";
import { createTaggedError } from "../../core/Retry.js";

export const fileReadInputSchema = {
  type: "object",
  properties: {
    path: { type: "string", minLength: 1, description: "File path relative to the workspace" },
    maxBytes: {
      type: "integer",
      minimum: 1,
      description: "Maximum bytes to read (default: from config)",
    },
  },
  required: ["path"],
  additionalProperties: false,
} as const;

export const fileReadTool: BuiltinTool = {
  name: "file_read",
  definition: {
    description: "Read a UTF-8 text file from the workspace",
    inputSchema: fileReadInputSchema,
    riskClass: "filesystem-read",
  },
  create: (config) => async (args) => {
    const inputPath = stringArg(args, "path");
    const maxBytes = Math.min(optionalNumberArg(args, "maxBytes") ?? config.maxReadBytes, config.maxReadBytes);

    const resolvedPath = await resolveSandboxedPath(inputPath, config.workspaceRoot);

    try {
      const fileStat = await stat(resolvedPath);
      if (!fileStat.isFile()) {
        throw createTaggedError("not_a_file", `Not a regular file: ${inputPath}`);
      }
      if (fileStat.size > maxBytes) {
        throw createTaggedError(
          "file_too_large",
          `File size ${fileStat.size} bytes exceeds limit of ${maxBytes} bytes`,
          { path: inputPath, size: fileStat.size, limit: maxBytes },
        );
      }
      return await readFile(resolvedPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        throw createTaggedError("file_not_found", `File not found: ${inputPath}`);
      }
      throw err;
    }
  },
};
