import { describe, it, expect, afterEach } from "vitest";
import path from "node:path";
import { rm, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import {
  AgentConfigError,
  loadAgentConfig,
  parseAgentConfig,
} from "../src/config/AgentConfig.js";
import { tempWorkspace } from "./fixtures/index.js";

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

describe("parseAgentConfig", () => {
  it("fills in restrictive defaults", () => {
    const config = parseAgentConfig({}, "/srv/app");

    expect(config.workspace).toBe(path.resolve("/srv/app"));
    expect(config.provider).toEqual({ type: "mock" });
    expect(config.policy).toEqual({
      allowNetwork: false,
      allowedDomains: [],
      allowWrites: false,
      deniedTools: [],
    });
    expect(config.memory).toEqual({ enabled: false, recall: true, persist: true, recallLimit: 5 });
    expect(config.runtime).toEqual({});
    expect(config.trace.file).toBeUndefined();
    expect(config.debug).toBeUndefined();
  });

  it("resolves the workspace and trace file against the config directory", () => {
    const config = parseAgentConfig({ workspace: "ws", trace: { file: "logs/run.jsonl" } }, "/srv/app");

    expect(config.workspace).toBe(path.resolve("/srv/app", "ws"));
    expect(config.trace.file).toBe(path.resolve("/srv/app", "logs/run.jsonl"));
  });

  it("accepts an OpenAI-compatible provider", () => {
    const config = parseAgentConfig(
      {
        provider: {
          type: "openai-compatible",
          baseUrl: "http://localhost:11434/v1",
          model: "local-model",
          apiKeyEnv: "TEST_LLM_KEY",
        },
      },
      "/srv/app",
    );
    expect(config.provider).toEqual({
      type: "openai-compatible",
      baseUrl: "http://localhost:11434/v1",
      model: "local-model",
      apiKeyEnv: "TEST_LLM_KEY",
    });
  });

  it("reports every issue with its path", () => {
    let caught: unknown;
    try {
      parseAgentConfig({ runtime: { maxSteps: 0 }, tools: { enabled: ["shell"] } }, "/srv/app");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(AgentConfigError);
    expect(caught).toMatchObject({
      kind: "invalid_config",
      configPath: "<inline>",
      issues: [
        "runtime.maxSteps: Number must be greater than or equal to 1",
        "tools.enabled.0: expected one of: calculator, file_read, file_write, http_get",
      ],
    });
  });

  it("rejects an OpenAI-compatible provider without a model", () => {
    expect(() =>
      parseAgentConfig({ provider: { type: "openai-compatible", baseUrl: "http://localhost:1/v1" } }, "/srv/app"),
    ).toThrow(AgentConfigError);
  });
});

describe("loadAgentConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("loads a YAML file", async () => {
    const configPath = path.join(fixturesDir, "agent.yaml");
    const { config, configPath: resolved } = await loadAgentConfig(configPath);

    expect(resolved).toBe(configPath);
    expect(config.workspace).toBe(path.join(fixturesDir, "workspace"));
    expect(config.runtime).toEqual({ maxSteps: 4, decisionRetries: 1 });
    expect(config.policy.allowedDomains).toEqual(["api.example.com"]);
    expect(config.tools).toEqual({ enabled: ["calculator", "file_read"], maxReadBytes: 4096 });
    expect(config.memory).toEqual({ enabled: true, recall: true, persist: true, recallLimit: 3 });
  });

  it("treats an empty file as defaults", async () => {
    dir = await tempWorkspace("config-test-");
    await writeFile(path.join(dir, "agent.yaml"), "");

    const { config } = await loadAgentConfig(path.join(dir, "agent.yaml"));
    expect(config.workspace).toBe(dir);
    expect(config.provider).toEqual({ type: "mock" });
  });

  it("reports a missing file", async () => {
    dir = await tempWorkspace("config-test-");
    const missing = path.join(dir, "nope.yaml");

    await expect(loadAgentConfig(missing)).rejects.toThrow(`Cannot read config ${missing}:`);
  });

  it("reports malformed YAML", async () => {
    dir = await tempWorkspace("config-test-");
    const file = path.join(dir, "agent.yaml");
    await writeFile(file, "workspace: [unclosed\n");

    await expect(loadAgentConfig(file)).rejects.toThrow(`Invalid YAML in ${file}:`);
  });

  it("names the file in validation errors", async () => {
    dir = await tempWorkspace("config-test-");
    const file = path.join(dir, "agent.yaml");
    await writeFile(file, "memory:\n  enabled: maybe\n");

    await expect(loadAgentConfig(file)).rejects.toMatchObject({
      configPath: file,
      issues: ["memory.enabled: Expected boolean, received string"],
    });
  });
});
