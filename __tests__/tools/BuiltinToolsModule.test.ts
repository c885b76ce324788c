import { describe, it, expect } from "vitest";
import { ToolRegistry } from "../../src/registry/ToolRegistry.js";
import { registerBuiltinTools } from "../../src/tools/BuiltinToolsModule.js";

describe("registerBuiltinTools", () => {
  it("registers every built-in tool by default", () => {
    const registry = new ToolRegistry();
    const tools = registerBuiltinTools(registry, { workspaceRoot: "/srv/ws" });

    expect(tools.map((t) => t.name)).toEqual(["calculator", "file_read", "file_write", "http_get"]);
    expect(registry.catalog().map((t) => t.riskClass)).toEqual([
      "pure",
      "filesystem-read",
      "filesystem-write",
      "network",
    ]);
    expect(registry.resolve("http_get").targetArg).toBe("url");
    expect(registry.resolve("file_write").targetArg).toBe("path");
  });

  it("registers only the enabled tools", () => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry, { workspaceRoot: "/srv/ws", enabled: ["calculator"] });
    expect(registry.list()).toEqual(["calculator"]);
  });

  it("validates arguments against the built-in schemas", () => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry, { workspaceRoot: "/srv/ws" });

    const write = registry.validate(registry.resolve("file_write"), { path: "a.txt", content: "x" });
    expect(write).toEqual({ ok: true, args: { path: "a.txt", content: "x", overwrite: false } });
    expect(registry.validate(registry.resolve("http_get"), { url: "not a uri" }).ok).toBe(false);
  });
});
