import { resolve, normalize, dirname, basename, relative, isAbsolute, sep } from "node:path";
import { realpath } from "node:fs/promises";
import { createTaggedError } from "../../core/Retry.js";

/**
 * Resolve an input path to an absolute real path within the workspace.
 * Throws `path_outside_workspace` if it escapes the root (symlinks included).
 *
 * Existing paths go through realpath; for a missing path the nearest existing
 * ancestor is resolved instead.
 */
export async function resolveSandboxedPath(
  inputPath: string,
  workspaceRoot: string,
): Promise<string> {
  // Resolve the root itself (e.g. macOS /var -> /private/var)
  const root = await realpathOr(resolve(workspaceRoot), normalize(resolve(workspaceRoot)));
  const resolved = resolve(root, inputPath);
  const real = await resolveExistingPrefix(resolved);

  if (!isWithinRoot(real, root)) {
    throw createTaggedError(
      "path_outside_workspace",
      `Path "${inputPath}" resolves outside the workspace`,
      { inputPath, resolvedPath: real, workspaceRoot: root },
    );
  }
  return real;
}

/**
 * Real path of the deepest existing ancestor, with the missing tail re-appended.
 */
async function resolveExistingPrefix(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  for (;;) {
    try {
      const real = await realpath(current);
      return missing.length > 0 ? resolve(real, ...missing.reverse()) : real;
    } catch (err) {
      if (!isNotFound(err)) throw err;
      const parent = dirname(current);
      if (parent === current) return target;
      missing.push(basename(current));
      current = parent;
    }
  }
}

async function realpathOr(path: string, fallback: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (isNotFound(err)) return fallback;
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

function isWithinRoot(path: string, root: string): boolean {
  const rel = relative(root, path);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
